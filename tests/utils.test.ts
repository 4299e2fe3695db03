import { describe, expect, it } from 'vitest';
import { splitMessage, truncate } from '../src/messages.js';
import { mapWithConcurrency } from '../src/utils/concurrency.js';
import { TrackerError, classifyFetchError, parseTrackerErrorBody } from '../src/utils/errors.js';
import { addDays, zonedClock } from '../src/utils/time.js';

describe('zonedClock', () => {
  it('reports the day, time and weekday in the zone', () => {
    expect(zonedClock(new Date('2026-03-06T21:30:00.000Z'), 'Europe/Moscow')).toEqual({
      day: '2026-03-07',
      time: '00:30',
      weekday: 6,
    });
  });

  it('counts Sunday as weekday 7', () => {
    expect(zonedClock(new Date('2026-03-08T12:00:00.000Z'), 'UTC').weekday).toBe(7);
  });
});

describe('addDays', () => {
  it('crosses month and year boundaries', () => {
    expect(addDays('2026-03-01', -1)).toBe('2026-02-28');
    expect(addDays('2026-12-31', 1)).toBe('2027-01-01');
    expect(addDays('2026-03-06', -6)).toBe('2026-02-28');
  });
});

describe('mapWithConcurrency', () => {
  it('keeps input order and never exceeds the limit', async () => {
    let active = 0;
    let peak = 0;
    const results = await mapWithConcurrency([30, 10, 20, 5], 2, async (ms, index) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, ms));
      active--;
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30]);
    expect(peak).toBe(2);
  });

  it('handles an empty list', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});

describe('tracker errors', () => {
  it('joins errorMessages', () => {
    expect(parseTrackerErrorBody('{"errorMessages":["One","Two"]}')).toBe('One; Two');
  });

  it('returns null for bodies without error details', () => {
    expect(parseTrackerErrorBody('<html>Bad gateway</html>')).toBeNull();
    expect(parseTrackerErrorBody('{"errorMessages":[],"errors":{}}')).toBeNull();
  });

  it('classifies aborts as timeouts and keeps tracker errors as they are', () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    expect(classifyFetchError(abort, 5000)).toMatchObject({ kind: 'timeout', message: 'Request timed out after 5000ms' });

    const http = new TrackerError('404 Not found', 'http', 404);
    expect(classifyFetchError(http, 5000)).toBe(http);

    expect(classifyFetchError('socket hang up', 5000)).toMatchObject({ kind: 'network', message: 'socket hang up' });
  });
});

describe('truncate', () => {
  it('keeps short text and cuts long text with an ellipsis', () => {
    expect(truncate('  short  ', 10)).toBe('short');
    expect(truncate('abcdefghijkl', 6)).toBe('abcde…');
  });

  it('never cuts an emoji in half', () => {
    expect(truncate('a😀😀😀', 3)).toBe('a😀…');
    expect(truncate('😀😀', 2)).toBe('😀😀');
  });
});

describe('splitMessage', () => {
  it('leaves text within the limit as one part', () => {
    expect(splitMessage('short', 10)).toEqual(['short']);
  });

  it('breaks between lines', () => {
    expect(splitMessage('aaaa\nbbbb\ncccc', 10)).toEqual(['aaaa\nbbbb', 'cccc']);
  });

  it('cuts a line over the limit between code points', () => {
    expect(splitMessage('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
    expect(splitMessage('😀😀', 3)).toEqual(['😀', '😀']);
  });
});
