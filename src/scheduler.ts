import type { Logger } from './logger.js';
import { errorMessage } from './utils/errors.js';
import { zonedClock } from './utils/time.js';

type JobFn = () => Promise<unknown>;

interface ClockJob {
  name: string;
  time: string;
  /** ISO weekday, or null for every day. */
  weekday: number | null;
  run: JobFn;
  lastFired: string | null;
}

interface IntervalJob {
  name: string;
  seconds: number;
  run: JobFn;
  runImmediately: boolean;
}

const TICK_MS = 30_000;

/**
 * Interval and wall-clock triggers in one timezone. Clock jobs fire on the tick
 * that lands in their minute, at most once per day, each independently of the
 * others. A job still running when it comes due again is skipped.
 */
export class Scheduler {
  private clockJobs: ClockJob[] = [];
  private intervalJobs: IntervalJob[] = [];
  private running = new Set<string>();
  private timers: NodeJS.Timeout[] = [];

  constructor(
    private timezone: string,
    private log: Logger,
    private now: () => Date = () => new Date()
  ) {}

  every(name: string, seconds: number, run: JobFn, options: { runImmediately?: boolean } = {}): this {
    this.intervalJobs.push({ name, seconds, run, runImmediately: options.runImmediately ?? false });
    return this;
  }

  dailyAt(name: string, time: string, run: JobFn): this {
    this.clockJobs.push({ name, time, weekday: null, run, lastFired: null });
    return this;
  }

  weeklyAt(name: string, weekday: number, time: string, run: JobFn): this {
    this.clockJobs.push({ name, time, weekday, run, lastFired: null });
    return this;
  }

  start(): void {
    for (const job of this.intervalJobs) {
      this.log.info(`${job.name}: every ${job.seconds}s`);
      this.timers.push(setInterval(() => this.launch(job.name, job.run), job.seconds * 1000));
      if (job.runImmediately) this.launch(job.name, job.run);
    }

    for (const job of this.clockJobs) {
      this.log.info(`${job.name}: ${job.weekday === null ? 'daily' : `weekday ${job.weekday}`} at ${job.time} (${this.timezone})`);
    }
    if (this.clockJobs.length > 0) {
      this.timers.push(
        setInterval(() => {
          this.tick().catch((error) => this.log.error(`Clock tick failed: ${errorMessage(error)}`));
        }, TICK_MS)
      );
    }
  }

  stop(): void {
    for (const timer of this.timers) clearInterval(timer);
    this.timers = [];
  }

  /**
   * Fires every clock job due at the current minute. Resolves once they finish;
   * ticks are never guarded, so a slow job only holds back its own next run.
   */
  async tick(): Promise<void> {
    const clock = zonedClock(this.now(), this.timezone);
    const due = this.clockJobs.filter(
      (job) =>
        job.time === clock.time &&
        (job.weekday === null || job.weekday === clock.weekday) &&
        job.lastFired !== clock.day
    );

    await Promise.all(
      due.map((job) => {
        job.lastFired = clock.day;
        return this.fire(job.name, job.run);
      })
    );
  }

  private launch(name: string, run: JobFn): void {
    this.fire(name, run).catch((error) => {
      this.log.error(`${name} failed: ${errorMessage(error)}`);
    });
  }

  private async fire(name: string, run: JobFn): Promise<void> {
    if (this.running.has(name)) {
      this.log.warn(`${name} is still running, skipping`);
      return;
    }

    this.running.add(name);
    try {
      await run();
    } catch (error) {
      this.log.error(`${name} failed: ${errorMessage(error)}`);
    } finally {
      this.running.delete(name);
    }
  }
}
