import { z } from 'zod';
import type { Config } from '../config.js';
import type { Logger } from '../logger.js';
import type { StatusClassifier, StatusCategory } from '../routing/status.js';
import {
  trackerAttachmentSchema,
  trackerBoardSchema,
  trackerCommentSchema,
  trackerIssueSchema,
  trackerTransitionSchema,
  trackerUserSchema,
  type CloseResult,
  type CreateIssueInput,
  type TrackerAttachment,
  type TrackerBoard,
  type TrackerComment,
  type TrackerIssue,
  type TrackerResult,
  type TrackerTransition,
  type TrackerUser,
} from '../types.js';
import { TrackerError, classifyFetchError, errorMessage, parseTrackerErrorBody } from '../utils/errors.js';

/** Resolution sent with the final hop into a closed status. */
const CLOSE_RESOLUTION = 'fixed';

const PAGE_SIZE = 100;

/** Upper bound on pages read for one listing. */
const MAX_PAGES = 50;

export interface AttachmentFile {
  data: Uint8Array;
  filename: string;
  contentType: string;
}

export interface SearchQuery {
  query?: string;
  filter?: Record<string, unknown>;
  queue?: string;
}

/**
 * What the rest of the bot needs from the tracker. No method throws; each
 * failure comes back as `{ ok: false, error }` for that call alone.
 */
export interface TrackerGateway {
  createIssue(input: CreateIssueInput): Promise<TrackerResult<TrackerIssue>>;
  getIssue(key: string): Promise<TrackerResult<TrackerIssue>>;
  updateAssignee(key: string, login: string | null): Promise<TrackerResult<TrackerIssue>>;
  addComment(key: string, text: string): Promise<TrackerResult<TrackerComment>>;
  getComments(key: string): Promise<TrackerResult<TrackerComment[]>>;
  searchIssues(search: SearchQuery): Promise<TrackerResult<TrackerIssue[]>>;
  attachFile(key: string, file: AttachmentFile): Promise<TrackerResult<TrackerAttachment>>;
  getTransitions(key: string): Promise<TrackerResult<TrackerTransition[]>>;
  executeTransition(key: string, transitionId: string, body?: Record<string, unknown>): Promise<TrackerResult<void>>;
  closeIssue(key: string): Promise<CloseResult>;
  getUser(idOrLogin: string): Promise<TrackerResult<TrackerUser>>;
  createBoard(name: string, queue: string, tag: string): Promise<TrackerResult<TrackerBoard>>;
}

interface RequestOptions {
  query?: Record<string, string>;
  body?: unknown;
  form?: FormData;
}

export class TrackerService implements TrackerGateway {
  private baseUrl: string;

  constructor(
    private config: Config['tracker'],
    private statuses: StatusClassifier,
    private log: Logger
  ) {
    this.baseUrl = config.apiUrl.replace(/\/$/, '');
  }

  // ── Transport ─────────────────────────────────────────────

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `OAuth ${this.config.token}`,
    };
    if (this.config.cloudOrgId) {
      headers['X-Cloud-Org-ID'] = this.config.cloudOrgId;
    } else if (this.config.orgId) {
      headers['X-Org-ID'] = this.config.orgId;
    }
    return headers;
  }

  private url(path: string, query?: Record<string, string>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private async request<T extends z.ZodTypeAny>(
    method: string,
    path: string,
    schema: T,
    options: RequestOptions = {}
  ): Promise<z.output<T>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const headers = this.headers();
      const init: RequestInit = { method, headers, signal: controller.signal };
      if (options.form) {
        init.body = options.form;
      } else if (options.body !== undefined) {
        headers['Content-Type'] = 'application/json';
        init.body = JSON.stringify(options.body);
      }

      const response = await fetch(this.url(path, options.query), init);
      const text = await response.text();

      if (!response.ok) {
        const detail = parseTrackerErrorBody(text) ?? (text.trim() || response.statusText);
        throw new TrackerError(`${response.status} ${detail}`, 'http', response.status);
      }

      let json: unknown = null;
      if (text.trim()) {
        try {
          json = JSON.parse(text);
        } catch {
          throw new TrackerError(`Unparseable response from ${method} ${path}`, 'invalid-response', response.status);
        }
      }

      const parsed = schema.safeParse(json);
      if (!parsed.success) {
        throw new TrackerError(
          `Unexpected response shape from ${method} ${path}: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
          'invalid-response',
          response.status
        );
      }
      return parsed.data;
    } catch (error) {
      throw classifyFetchError(error, this.config.timeoutMs);
    } finally {
      clearTimeout(timeout);
    }
  }

  /** Runs one tracker call, converting any failure into a failed result. */
  private async attempt<T>(label: string, fn: () => Promise<T>): Promise<TrackerResult<T>> {
    try {
      return { ok: true, value: await fn() };
    } catch (error) {
      const message = errorMessage(error);
      this.log.error(`${label} failed: ${message}`);
      return { ok: false, error: message };
    }
  }

  // ── Issues ────────────────────────────────────────────────

  async getMyself(): Promise<TrackerUser> {
    return this.request('GET', '/myself', trackerUserSchema);
  }

  async createIssue(input: CreateIssueInput): Promise<TrackerResult<TrackerIssue>> {
    const body: Record<string, unknown> = {
      queue: input.queue,
      summary: input.summary,
      description: input.description,
      priority: input.priority,
      tags: input.tags,
    };
    if (input.assignee) body.assignee = input.assignee;
    if (input.deadline) body.deadline = input.deadline;
    if (input.followers && input.followers.length > 0) body.followers = input.followers;

    const result = await this.attempt(`Create issue in ${input.queue}`, () =>
      this.request('POST', '/issues', trackerIssueSchema, { body })
    );
    if (result.ok) this.log.info(`Created ${result.value.key}: ${input.summary}`);
    return result;
  }

  async getIssue(key: string): Promise<TrackerResult<TrackerIssue>> {
    return this.attempt(`Get ${key}`, () =>
      this.request('GET', `/issues/${encodeURIComponent(key)}`, trackerIssueSchema)
    );
  }

  async updateAssignee(key: string, login: string | null): Promise<TrackerResult<TrackerIssue>> {
    return this.attempt(`Assign ${key}`, () =>
      this.request('PATCH', `/issues/${encodeURIComponent(key)}`, trackerIssueSchema, {
        body: { assignee: login },
      })
    );
  }

  async searchIssues(search: SearchQuery): Promise<TrackerResult<TrackerIssue[]>> {
    return this.attempt('Search issues', async () => {
      const found: TrackerIssue[] = [];
      for (let page = 1; page <= MAX_PAGES; page++) {
        const batch = await this.request('POST', '/issues/_search', z.array(trackerIssueSchema), {
          query: { perPage: String(PAGE_SIZE), page: String(page) },
          body: search,
        });
        found.push(...batch);
        if (batch.length < PAGE_SIZE) break;
      }
      return found;
    });
  }

  // ── Comments & attachments ────────────────────────────────

  async addComment(key: string, text: string): Promise<TrackerResult<TrackerComment>> {
    return this.attempt(`Comment on ${key}`, () =>
      this.request('POST', `/issues/${encodeURIComponent(key)}/comments`, trackerCommentSchema, {
        body: { text },
      })
    );
  }

  /** All comments, oldest first. Later pages start after the last id seen. */
  async getComments(key: string): Promise<TrackerResult<TrackerComment[]>> {
    return this.attempt(`Comments of ${key}`, async () => {
      const path = `/issues/${encodeURIComponent(key)}/comments`;
      const comments: TrackerComment[] = [];
      let after: string | null = null;
      for (let page = 1; page <= MAX_PAGES; page++) {
        const query: Record<string, string> = { perPage: String(PAGE_SIZE) };
        if (after !== null) query.id = after;
        const batch = await this.request('GET', path, z.array(trackerCommentSchema), { query });
        comments.push(...batch);
        const last = batch[batch.length - 1];
        if (batch.length < PAGE_SIZE || !last) break;
        after = last.id;
      }
      return comments;
    });
  }

  async attachFile(key: string, file: AttachmentFile): Promise<TrackerResult<TrackerAttachment>> {
    const form = new FormData();
    form.append('file', new Blob([file.data], { type: file.contentType }), file.filename);
    return this.attempt(`Attach ${file.filename} to ${key}`, () =>
      this.request('POST', `/issues/${encodeURIComponent(key)}/attachments`, trackerAttachmentSchema, { form })
    );
  }

  // ── Workflow transitions ──────────────────────────────────

  async getTransitions(key: string): Promise<TrackerResult<TrackerTransition[]>> {
    return this.attempt(`Transitions of ${key}`, () =>
      this.request('GET', `/issues/${encodeURIComponent(key)}/transitions`, z.array(trackerTransitionSchema))
    );
  }

  async executeTransition(
    key: string,
    transitionId: string,
    body: Record<string, unknown> = {}
  ): Promise<TrackerResult<void>> {
    return this.attempt(`Transition ${key} via ${transitionId}`, async () => {
      await this.request(
        'POST',
        `/issues/${encodeURIComponent(key)}/transitions/${encodeURIComponent(transitionId)}/_execute`,
        z.unknown(),
        { body }
      );
    });
  }

  private findTransition(transitions: TrackerTransition[], category: StatusCategory): TrackerTransition | null {
    return transitions.find((t) => this.statuses.classify(t.to) === category) ?? null;
  }

  /**
   * Moves an issue into a completed status. Workflows here need at most one
   * intermediate hop through an in-progress status, so the walk is: look for a
   * direct closing transition, otherwise take one in-progress hop, re-fetch and
   * look exactly once more.
   */
  async closeIssue(key: string): Promise<CloseResult> {
    const transport = (failure: { error: string }): CloseResult => ({
      ok: false,
      reason: 'transport',
      error: failure.error,
    });
    const noTransition = (): CloseResult => {
      const error = `No transition to a closed status is available for ${key}`;
      this.log.warn(error);
      return { ok: false, reason: 'no-transition', error };
    };

    const available = await this.getTransitions(key);
    if (!available.ok) return transport(available);

    let target = this.findTransition(available.value, 'completed');

    if (!target) {
      const progress = this.findTransition(available.value, 'in-progress');
      if (!progress) return noTransition();

      this.log.info(`${key} → no direct close, moving through "${progress.to.display ?? progress.to.key}" first`);
      const hop = await this.executeTransition(key, progress.id);
      if (!hop.ok) return transport(hop);

      const afterHop = await this.getTransitions(key);
      if (!afterHop.ok) return transport(afterHop);

      target = this.findTransition(afterHop.value, 'completed');
      if (!target) return noTransition();
    }

    const closed = await this.executeTransition(key, target.id, { resolution: CLOSE_RESOLUTION });
    if (!closed.ok) return transport(closed);

    this.log.success(`${key} → ${target.to.display ?? target.to.key ?? 'closed'}`);
    return { ok: true };
  }

  // ── Users & boards ────────────────────────────────────────

  async getUser(idOrLogin: string): Promise<TrackerResult<TrackerUser>> {
    return this.attempt(`User ${idOrLogin}`, () =>
      this.request('GET', `/users/${encodeURIComponent(idOrLogin)}`, trackerUserSchema)
    );
  }

  async createBoard(name: string, queue: string, tag: string): Promise<TrackerResult<TrackerBoard>> {
    return this.attempt(`Create board ${name}`, () =>
      this.request('POST', '/boards', trackerBoardSchema, {
        body: { name, boardType: 'default', filter: { queue, tags: [tag] } },
      })
    );
  }
}
