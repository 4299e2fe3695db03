import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TrackerService } from '../src/services/tracker.js';
import { silentLog, testStatuses } from './helpers.js';

const baseConfig = {
  token: 'test-secret',
  orgId: 'org-1',
  cloudOrgId: null,
  apiUrl: 'https://tracker.test/v2/',
  timeoutMs: 20,
};

const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });
const empty = () => new Response('', { status: 200 });

describe('TrackerService', () => {
  const fetchMock = vi.fn<typeof fetch>();
  let tracker: TrackerService;

  function call(index: number): { url: string; method: string; headers: Headers; body: unknown } {
    const [input, init] = fetchMock.mock.calls[index] ?? [];
    const raw = init?.body;
    return {
      url: String(input),
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof raw === 'string' ? JSON.parse(raw) : raw,
    };
  }

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    tracker = new TrackerService(baseConfig, testStatuses(), silentLog);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  // ── Requests ──────────────────────────────────────────────

  it('creates an issue with org headers and only the fields that are set', async () => {
    fetchMock.mockResolvedValueOnce(json({ key: 'HR-1', summary: 'Hire', status: { key: 'open', display: 'Open' } }));

    const created = await tracker.createIssue({
      queue: 'HR',
      summary: 'Hire',
      description: '',
      priority: 'critical',
      tags: ['telegram', 'hr'],
      assignee: 'hr.lead',
      followers: [],
    });

    expect(created.ok && created.value.key).toBe('HR-1');
    const sent = call(0);
    expect(sent.url).toBe('https://tracker.test/v2/issues');
    expect(sent.method).toBe('POST');
    expect(sent.headers.get('authorization')).toBe('OAuth test-secret');
    expect(sent.headers.get('x-org-id')).toBe('org-1');
    expect(sent.headers.get('x-cloud-org-id')).toBeNull();
    expect(sent.headers.get('content-type')).toBe('application/json');
    expect(sent.body).toEqual({
      queue: 'HR',
      summary: 'Hire',
      description: '',
      priority: 'critical',
      tags: ['telegram', 'hr'],
      assignee: 'hr.lead',
    });
  });

  it('uses the cloud organization header when one is configured', async () => {
    tracker = new TrackerService({ ...baseConfig, orgId: null, cloudOrgId: 'cloud-1' }, testStatuses(), silentLog);
    fetchMock.mockResolvedValueOnce(json({ key: 'HR-1' }));

    await tracker.getIssue('HR-1');

    const sent = call(0);
    expect(sent.headers.get('x-cloud-org-id')).toBe('cloud-1');
    expect(sent.headers.get('x-org-id')).toBeNull();
  });

  it('searches a page of 100 issues and stops on a short page', async () => {
    fetchMock.mockResolvedValueOnce(json([{ key: 'HR-1' }, { key: 'HR-2' }]));

    const found = await tracker.searchIssues({ query: 'Assignee: anna Resolution: empty()' });

    expect(found.ok && found.value.map((i) => i.key)).toEqual(['HR-1', 'HR-2']);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(call(0).url).toBe('https://tracker.test/v2/issues/_search?perPage=100&page=1');
    expect(call(0).body).toEqual({ query: 'Assignee: anna Resolution: empty()' });
  });

  it('follows search pages until one comes back short', async () => {
    const keys = (from: number, count: number) => Array.from({ length: count }, (_, i) => ({ key: `HR-${from + i}` }));
    fetchMock.mockResolvedValueOnce(json(keys(1, 100))).mockResolvedValueOnce(json(keys(101, 30)));

    const found = await tracker.searchIssues({ query: 'Queue: HR' });

    expect(found.ok && found.value).toHaveLength(130);
    expect(found.ok && found.value[129]?.key).toBe('HR-130');
    expect(call(1).url).toBe('https://tracker.test/v2/issues/_search?perPage=100&page=2');
    expect(call(1).body).toEqual({ query: 'Queue: HR' });
  });

  it('normalizes numeric comment and author ids to strings', async () => {
    fetchMock.mockResolvedValueOnce(json([{ id: 7, text: 'Done', createdBy: { id: 1130000, display: 'Boris' } }]));

    const comments = await tracker.getComments('HR-1');

    expect(comments).toEqual({
      ok: true,
      value: [{ id: '7', text: 'Done', createdBy: { id: '1130000', display: 'Boris' } }],
    });
    expect(call(0).url).toBe('https://tracker.test/v2/issues/HR-1/comments?perPage=100');
  });

  it('reads every comment of a long thread, continuing after the last id', async () => {
    const thread = Array.from({ length: 130 }, (_, i) => ({ id: i + 1, text: `Comment ${i + 1}` }));
    fetchMock.mockImplementation(async (input) => {
      const url = new URL(String(input));
      const perPage = Number(url.searchParams.get('perPage'));
      const after = Number(url.searchParams.get('id') ?? 0);
      return json(thread.filter((c) => c.id > after).slice(0, perPage));
    });

    const comments = await tracker.getComments('HR-1');

    expect(comments.ok && comments.value).toHaveLength(130);
    expect(comments.ok && comments.value[129]).toEqual({ id: '130', text: 'Comment 130' });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(call(1).url).toBe('https://tracker.test/v2/issues/HR-1/comments?perPage=100&id=100');
  });

  // ── Failures ──────────────────────────────────────────────

  it('reads errorMessages from a failed response', async () => {
    fetchMock.mockResolvedValueOnce(json({ errorMessages: ['Queue does not exist'] }, 400));

    const created = await tracker.createIssue({
      queue: 'NOPE',
      summary: 'Hire',
      description: '',
      priority: 'normal',
      tags: [],
    });

    expect(created).toEqual({ ok: false, error: '400 Queue does not exist' });
  });

  it('falls back to field errors and then the status text', async () => {
    fetchMock.mockResolvedValueOnce(json({ errors: { assignee: 'unknown user' } }, 422));
    expect(await tracker.updateAssignee('HR-1', 'ghost')).toEqual({ ok: false, error: '422 assignee: unknown user' });

    fetchMock.mockResolvedValueOnce(new Response('', { status: 503, statusText: 'Service Unavailable' }));
    expect(await tracker.getIssue('HR-1')).toEqual({ ok: false, error: '503 Service Unavailable' });
  });

  it('reports a response of the wrong shape', async () => {
    fetchMock.mockResolvedValueOnce(json({ summary: 'no key' }));

    expect(await tracker.getIssue('HR-1')).toEqual({
      ok: false,
      error: 'Unexpected response shape from GET /issues/HR-1: Required',
    });
  });

  it('aborts a request that outlives the timeout', async () => {
    fetchMock.mockImplementationOnce(
      (_input, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
        })
    );

    expect(await tracker.getIssue('HR-1')).toEqual({ ok: false, error: 'Request timed out after 20ms' });
  });

  it('keeps each failure with its own call when requests overlap', async () => {
    fetchMock.mockImplementation(async (input) =>
      String(input).endsWith('/issues/HR-1')
        ? json({ errorMessages: ['Issue not found'] }, 404)
        : new Response('', { status: 503, statusText: 'Service Unavailable' })
    );

    const [first, second] = await Promise.all([tracker.getIssue('HR-1'), tracker.getIssue('DEV-2')]);

    expect(first).toEqual({ ok: false, error: '404 Issue not found' });
    expect(second).toEqual({ ok: false, error: '503 Service Unavailable' });
  });

  // ── Closing ───────────────────────────────────────────────

  describe('closeIssue', () => {
    it('takes a direct transition into a completed status with a resolution', async () => {
      fetchMock
        .mockResolvedValueOnce(json([{ id: 'start', to: { key: 'inProgress' } }, { id: 'close', to: { key: 'closed' } }]))
        .mockResolvedValueOnce(empty());

      expect(await tracker.closeIssue('HR-1')).toEqual({ ok: true });
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(call(1).url).toBe('https://tracker.test/v2/issues/HR-1/transitions/close/_execute');
      expect(call(1).body).toEqual({ resolution: 'fixed' });
    });

    it('matches transitions by display label too', async () => {
      fetchMock
        .mockResolvedValueOnce(json([{ id: 'finish', to: { key: 'custom', display: 'Done' } }]))
        .mockResolvedValueOnce(empty());

      expect(await tracker.closeIssue('HR-1')).toEqual({ ok: true });
      expect(call(1).url).toBe('https://tracker.test/v2/issues/HR-1/transitions/finish/_execute');
    });

    it('moves through an in-progress status when there is no direct close', async () => {
      fetchMock
        .mockResolvedValueOnce(json([{ id: 'start', to: { key: 'inProgress' } }]))
        .mockResolvedValueOnce(empty())
        .mockResolvedValueOnce(json([{ id: 'resolve', to: { key: 'resolved' } }]))
        .mockResolvedValueOnce(empty());

      expect(await tracker.closeIssue('HR-1')).toEqual({ ok: true });
      expect(fetchMock).toHaveBeenCalledTimes(4);
      expect(call(1).url).toBe('https://tracker.test/v2/issues/HR-1/transitions/start/_execute');
      expect(call(1).body).toEqual({});
      expect(call(3).url).toBe('https://tracker.test/v2/issues/HR-1/transitions/resolve/_execute');
      expect(call(3).body).toEqual({ resolution: 'fixed' });
    });

    it('gives up after one intermediate hop', async () => {
      fetchMock
        .mockResolvedValueOnce(json([{ id: 'start', to: { key: 'inProgress' } }]))
        .mockResolvedValueOnce(empty())
        .mockResolvedValueOnce(json([{ id: 'again', to: { key: 'В работе' } }]));

      expect(await tracker.closeIssue('HR-1')).toEqual({
        ok: false,
        reason: 'no-transition',
        error: 'No transition to a closed status is available for HR-1',
      });
      const gets = fetchMock.mock.calls.filter(([, init]) => (init?.method ?? 'GET') === 'GET');
      expect(gets).toHaveLength(2);
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('reports no-transition without executing anything when nothing leads forward', async () => {
      fetchMock.mockResolvedValueOnce(json([{ id: 'reopen', to: { key: 'open' } }]));

      const result = await tracker.closeIssue('HR-1');

      expect(result.ok).toBe(false);
      expect(result.ok === false && result.reason).toBe('no-transition');
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('reports a transport failure with the underlying error', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      expect(await tracker.closeIssue('HR-1')).toEqual({ ok: false, reason: 'transport', error: 'fetch failed' });
    });

    it('reports a failed final transition as transport', async () => {
      fetchMock
        .mockResolvedValueOnce(json([{ id: 'close', to: { key: 'closed' } }]))
        .mockResolvedValueOnce(json({ errorMessages: ['Resolution is required'] }, 422));

      expect(await tracker.closeIssue('HR-1')).toEqual({
        ok: false,
        reason: 'transport',
        error: '422 Resolution is required',
      });
    });
  });
});
