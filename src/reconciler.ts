import type { Logger } from './logger.js';
import * as messages from './messages.js';
import type { StatusClassifier } from './routing/status.js';
import type { Routing } from './routing/table.js';
import type { CompletionActions } from './services/actions.js';
import { isRelayComment } from './services/comments.js';
import type { Directory } from './services/directory.js';
import type { Notifier } from './services/notifier.js';
import type { StateManager } from './services/state.js';
import type { TrackerGateway } from './services/tracker.js';
import type { EntityPatch, TrackedEntity, TrackerIssue } from './types.js';
import { mapWithConcurrency } from './utils/concurrency.js';
import { errorMessage } from './utils/errors.js';

export type ReconcileOutcome = 'closed' | 'updated' | 'unchanged' | 'fetch-failed' | 'busy' | 'not-open' | 'error';

export interface CycleSummary {
  startedAt: string;
  durationMs: number;
  entities: number;
  outcomes: Partial<Record<ReconcileOutcome, number>>;
}

export interface ReconcilerStatus {
  running: boolean;
  cycles: number;
  skippedCycles: number;
  inFlight: string[];
  lastCycle: CycleSummary | null;
}

type IssueAssignee = NonNullable<TrackerIssue['assignee']>;

/**
 * Polls the tracker for every open entity and turns remote changes into chat
 * notifications. Each detector compares against its own cursor on the entity,
 * so a failed delivery never holds another detector back. Detectors run in a
 * fixed order: closure, approval, assignee, comments.
 */
export class Reconciler {
  private processing = new Set<string>();
  private running = false;
  private cycles = 0;
  private skippedCycles = 0;
  private lastCycle: CycleSummary | null = null;

  constructor(
    private routing: Routing,
    private state: StateManager,
    private tracker: TrackerGateway,
    private notifier: Notifier,
    private directory: Directory,
    private actions: CompletionActions,
    private statuses: StatusClassifier,
    private log: Logger,
    private concurrency: number = 4
  ) {}

  // ── Cycles ──────────────────────────────────────────────────

  /** One pass over all open entities. Returns null when a previous pass is still running. */
  async runCycle(): Promise<CycleSummary | null> {
    if (this.running) {
      this.skippedCycles++;
      this.log.warn('Previous reconciliation cycle still running, skipping this one');
      return null;
    }

    this.running = true;
    const started = Date.now();
    try {
      const open = this.state.openEntities();
      this.log.debug(`Reconciling ${open.length} open entities...`);

      const results = await mapWithConcurrency(open, this.concurrency, (entity) => this.reconcileEntity(entity.key));

      const outcomes: Partial<Record<ReconcileOutcome, number>> = {};
      for (const outcome of results) {
        outcomes[outcome] = (outcomes[outcome] ?? 0) + 1;
      }

      const summary: CycleSummary = {
        startedAt: new Date(started).toISOString(),
        durationMs: Date.now() - started,
        entities: open.length,
        outcomes,
      };
      this.cycles++;
      this.lastCycle = summary;

      if (outcomes.closed || outcomes['fetch-failed'] || outcomes.error) {
        this.log.info(
          `Reconciled ${open.length}: ${outcomes.closed ?? 0} closed, ${outcomes['fetch-failed'] ?? 0} fetch failures, ${outcomes.error ?? 0} errors`
        );
      }
      return summary;
    } finally {
      this.running = false;
    }
  }

  /** Reconciles specific keys now (webhook, /mytasks). Unknown and closed keys report `not-open`. */
  async reconcileKeys(keys: readonly string[]): Promise<Map<string, ReconcileOutcome>> {
    const unique = [...new Set(keys)];
    const results = await mapWithConcurrency(unique, this.concurrency, (key) => this.reconcileEntity(key));
    return new Map(unique.map((key, i) => [key, results[i]]));
  }

  async reconcileEntity(key: string): Promise<ReconcileOutcome> {
    if (this.processing.has(key)) return 'busy';

    const entity = this.state.getEntity(key);
    if (!entity || entity.status !== 'open') return 'not-open';

    this.processing.add(key);
    try {
      return await this.detect(entity);
    } catch (error) {
      this.log.error(`${key} → reconciliation error: ${errorMessage(error)}`);
      return 'error';
    } finally {
      this.processing.delete(key);
    }
  }

  getStatus(): ReconcilerStatus {
    return {
      running: this.running,
      cycles: this.cycles,
      skippedCycles: this.skippedCycles,
      inFlight: [...this.processing],
      lastCycle: this.lastCycle,
    };
  }

  // ── Detectors ───────────────────────────────────────────────

  private async detect(entity: TrackedEntity): Promise<ReconcileOutcome> {
    const fetched = await this.tracker.getIssue(entity.key);
    if (!fetched.ok) {
      this.log.warn(`${entity.key} → fetch failed, skipping this cycle: ${fetched.error}`);
      return 'fetch-failed';
    }
    const issue = fetched.value;

    const patch: EntityPatch = {};
    const statusKey = issue.status?.key ?? null;
    const statusLabel = issue.status?.display ?? statusKey ?? '?';
    if (statusKey !== null && statusKey !== entity.lastKnownStatusKey) {
      patch.lastKnownStatusKey = statusKey;
    }

    if (this.statuses.isCompleted(issue.status)) {
      patch.status = 'closed';
      try {
        await this.notifyClosure(entity, statusLabel);
      } finally {
        this.state.updateEntity(entity.key, patch);
      }
      this.log.event(`${entity.key} → closed in Tracker (${statusLabel})`);
      return 'closed';
    }

    const deadline = issue.deadline ?? null;
    if (deadline !== entity.deadline) patch.deadline = deadline;

    // Whatever was already notified stays recorded even if a later detector throws.
    try {
      await this.detectApproval(entity, issue, statusLabel);
      await this.detectAssignee(entity, issue, patch);
      await this.detectComments(entity, patch);
    } finally {
      if (Object.keys(patch).length > 0) this.state.updateEntity(entity.key, patch);
    }

    return Object.keys(patch).length === 0 ? 'unchanged' : 'updated';
  }

  private async notifyClosure(entity: TrackedEntity, statusLabel: string): Promise<void> {
    if (entity.creatorId !== null) {
      await this.notifier.send(entity.creatorId, messages.closureNotice(this.routing, entity, statusLabel));
    }
    await this.actions.retract(entity);
  }

  private async detectApproval(entity: TrackedEntity, issue: TrackerIssue, statusLabel: string): Promise<void> {
    if (!this.statuses.isApproval(issue.status)) return;
    if (this.statuses.isApproval({ key: entity.lastKnownStatusKey })) return;

    const recipients = this.directory.resolveHandles(this.routing.recipients.approval);
    const delivered = await this.notifier.fanOut(recipients, messages.approvalNeeded(this.routing, entity, statusLabel));
    this.log.info(`${entity.key} → awaiting approval, notified ${delivered}/${recipients.length}`);
  }

  private async detectAssignee(entity: TrackedEntity, issue: TrackerIssue, patch: EntityPatch): Promise<void> {
    const assignee = issue.assignee;
    // Unassignment keeps the cached assignee; only a new person is a change.
    if (!assignee || assignee.id === entity.lastKnownAssignee) return;

    if (entity.lastKnownAssignee === null) {
      const login = await this.assigneeLogin(assignee);
      const chatId = login ? this.directory.chatIdForLogin(login) : null;
      if (chatId !== null) {
        await this.notifier.send(chatId, messages.assignedToYou(this.routing, entity));
      } else {
        this.log.debug(`${entity.key} → assignee ${login ?? assignee.id} has no known chat`);
      }
    } else if (entity.creatorId !== null) {
      const name = assignee.display ?? assignee.login ?? assignee.id;
      await this.notifier.send(entity.creatorId, messages.assigneeChanged(this.routing, entity, name));
    }

    patch.lastKnownAssignee = assignee.id;
  }

  private async assigneeLogin(assignee: IssueAssignee): Promise<string | null> {
    if (assignee.login) return assignee.login;
    const user = await this.tracker.getUser(assignee.id);
    return user.ok ? user.value.login : null;
  }

  private async detectComments(entity: TrackedEntity, patch: EntityPatch): Promise<void> {
    const fetched = await this.tracker.getComments(entity.key);
    if (!fetched.ok) {
      this.log.warn(`${entity.key} → comments unavailable this cycle: ${fetched.error}`);
      return;
    }
    const comments = fetched.value;
    if (comments.length === entity.lastKnownCommentCount) return;

    for (const comment of comments.slice(entity.lastKnownCommentCount)) {
      if (isRelayComment(comment.text)) continue;
      if (entity.creatorId === null) continue;
      const author = comment.createdBy?.display ?? comment.createdBy?.login ?? 'Someone';
      await this.notifier.send(entity.creatorId, messages.newComment(this.routing, entity, author, comment.text));
    }

    patch.lastKnownCommentCount = comments.length;
  }
}
