import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Scheduler } from '../src/scheduler.js';
import { silentLog } from './helpers.js';

describe('Scheduler', () => {
  let clock: Date;
  let scheduler: Scheduler;

  beforeEach(() => {
    // Friday, 12:00 in Moscow
    clock = new Date('2026-03-06T09:00:10.000Z');
    scheduler = new Scheduler('Europe/Moscow', silentLog, () => clock);
  });

  afterEach(() => {
    scheduler.stop();
    vi.useRealTimers();
  });

  it('fires a daily job in its minute once per day', async () => {
    const run = vi.fn(async () => {});
    scheduler.dailyAt('digest', '12:00', run);

    await scheduler.tick();
    clock = new Date('2026-03-06T09:00:40.000Z');
    await scheduler.tick();
    expect(run).toHaveBeenCalledTimes(1);

    clock = new Date('2026-03-07T09:00:10.000Z');
    await scheduler.tick();
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('does not fire outside the configured minute', async () => {
    const run = vi.fn(async () => {});
    scheduler.dailyAt('digest', '12:01', run);

    await scheduler.tick();

    expect(run).not.toHaveBeenCalled();
  });

  it('fires a weekly job only on its weekday', async () => {
    const run = vi.fn(async () => {});
    scheduler.weeklyAt('report', 5, '12:00', run);

    clock = new Date('2026-03-05T09:00:10.000Z');
    await scheduler.tick();
    expect(run).not.toHaveBeenCalled();

    clock = new Date('2026-03-06T09:00:10.000Z');
    await scheduler.tick();
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('keeps ticking after a job throws', async () => {
    const failing = vi.fn(async () => {
      throw new Error('boom');
    });
    const other = vi.fn(async () => {});
    scheduler.dailyAt('failing', '12:00', failing).dailyAt('other', '12:00', other);

    await expect(scheduler.tick()).resolves.toBeUndefined();
    expect(other).toHaveBeenCalledTimes(1);
  });

  it('skips a job that is still running from its previous run', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const run = vi.fn(() => gate);
    scheduler.dailyAt('slow', '12:00', run);

    const first = scheduler.tick();
    clock = new Date('2026-03-07T09:00:10.000Z');
    await scheduler.tick();
    release();
    await first;

    expect(run).toHaveBeenCalledTimes(1);
  });

  it('fires a later clock job while an earlier one is still running', async () => {
    vi.useFakeTimers();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const slow = vi.fn(() => gate);
    const noon = vi.fn(async () => {});
    scheduler.dailyAt('slow', '11:59', slow).dailyAt('noon', '12:00', noon);

    clock = new Date('2026-03-06T08:59:05.000Z');
    scheduler.start();
    await vi.advanceTimersByTimeAsync(30_000);
    expect(slow).toHaveBeenCalledTimes(1);

    clock = new Date('2026-03-06T09:00:05.000Z');
    await vi.advanceTimersByTimeAsync(30_000);
    expect(noon).toHaveBeenCalledTimes(1);

    release();
    await vi.advanceTimersByTimeAsync(0);
  });

  it('runs interval jobs immediately and then on their period until stopped', async () => {
    vi.useFakeTimers();
    const run = vi.fn(async () => {});
    scheduler.every('reconcile', 60, run, { runImmediately: true });

    scheduler.start();
    expect(run).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(run).toHaveBeenCalledTimes(2);

    scheduler.stop();
    await vi.advanceTimersByTimeAsync(120_000);
    expect(run).toHaveBeenCalledTimes(2);
  });
});
