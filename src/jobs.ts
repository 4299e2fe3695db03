import type { Logger } from './logger.js';
import * as messages from './messages.js';
import type { Routing } from './routing/table.js';
import type { Directory } from './services/directory.js';
import type { Notifier } from './services/notifier.js';
import type { StateManager } from './services/state.js';
import type { TrackerGateway } from './services/tracker.js';
import type { TrackedEntity } from './types.js';
import { addDays, zonedClock } from './utils/time.js';

/**
 * Daily and weekly reminders. Every job walks its inputs, sends, and then sets
 * a marker for today; a marker already set today suppresses the send, so a
 * restart or a second trigger in the same day does not repeat it.
 */
export class ScheduledJobs {
  constructor(
    private routing: Routing,
    private state: StateManager,
    private tracker: TrackerGateway,
    private notifier: Notifier,
    private directory: Directory,
    private log: Logger,
    private now: () => Date = () => new Date()
  ) {}

  private today(): string {
    return zonedClock(this.now(), this.routing.timezone).day;
  }

  private dayOf(iso: string): string {
    return zonedClock(new Date(iso), this.routing.timezone).day;
  }

  /** Each mapped assignee gets their unresolved issues. Returns how many digests went out. */
  async assigneeDigest(): Promise<number> {
    const day = this.today();
    let sent = 0;

    for (const login of this.routing.loginToHandle.keys()) {
      const marker = `assignee-digest:${login}`;
      if (this.state.hasMarker(marker, day)) continue;

      const chatId = this.directory.chatIdForLogin(login);
      if (chatId === null) {
        this.log.debug(`Assignee digest: ${login} has not talked to the bot yet`);
        continue;
      }

      const found = await this.tracker.searchIssues({ query: `Assignee: ${login} Resolution: empty()` });
      if (!found.ok) continue;
      const issues = found.value;

      if (issues.length > 0 && (await this.notifier.send(chatId, messages.assigneeDigest(this.routing, issues)))) {
        sent++;
      }
      this.state.setMarker(marker, day);
    }

    this.log.info(`Assignee digest: ${sent} sent`);
    return sent;
  }

  /** Reminds creators of open entities past their deadline, once per sweep time per day. */
  async overdueSweep(time: string): Promise<number> {
    const day = this.today();
    let sent = 0;

    const overdue = this.state.openEntities().filter((e) => e.deadline !== null && e.deadline < day);
    for (const entity of overdue) {
      if (entity.creatorId === null) continue;
      const marker = `overdue:${time}:${entity.key}`;
      if (this.state.hasMarker(marker, day)) continue;

      if (await this.notifier.send(entity.creatorId, messages.overdueReminder(this.routing, entity))) sent++;
      this.state.setMarker(marker, day);
    }

    if (overdue.length > 0) this.log.info(`Overdue sweep ${time}: ${sent}/${overdue.length} reminders sent`);
    return sent;
  }

  async departmentDigest(): Promise<number> {
    const day = this.today();
    const marker = 'department-digest';
    if (this.state.hasMarker(marker, day)) return 0;

    const groups = new Map<string | null, TrackedEntity[]>();
    for (const entity of this.state.openEntities()) {
      const list = groups.get(entity.departmentCode) ?? [];
      list.push(entity);
      groups.set(entity.departmentCode, list);
    }

    let delivered = 0;
    if (groups.size > 0) {
      const recipients = this.directory.resolveHandles(this.routing.recipients.departmentDigest);
      delivered = await this.notifier.fanOut(recipients, messages.departmentDigest(this.routing, day, groups));
      this.log.info(`Department digest: delivered to ${delivered}/${recipients.length}`);
    }
    this.state.setMarker(marker, day);
    return delivered;
  }

  /** Created and closed counts per department over the last seven days. */
  async weeklyReport(): Promise<number> {
    const day = this.today();
    const marker = 'weekly-report';
    if (this.state.hasMarker(marker, day)) return 0;

    const from = addDays(day, -6);
    const inRange = (iso: string) => {
      const d = this.dayOf(iso);
      return d >= from && d <= day;
    };

    const rows = new Map<string | null, messages.WeeklyRow>();
    const row = (code: string | null) => {
      let r = rows.get(code);
      if (!r) {
        r = { code, created: 0, closed: 0 };
        rows.set(code, r);
      }
      return r;
    };

    for (const entity of this.state.listEntities()) {
      if (inRange(entity.createdAt)) row(entity.departmentCode).created++;
      if (entity.status === 'closed' && inRange(entity.updatedAt)) row(entity.departmentCode).closed++;
    }

    const recipients = this.directory.resolveHandles(this.routing.recipients.weeklyReport);
    const delivered = await this.notifier.fanOut(
      recipients,
      messages.weeklyReport(this.routing, from, day, [...rows.values()])
    );
    this.log.info(`Weekly report: delivered to ${delivered}/${recipients.length}`);
    this.state.setMarker(marker, day);
    return delivered;
  }
}
