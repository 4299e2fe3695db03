import type { Logger } from './logger.js';
import * as messages from './messages.js';
import type { Reconciler, ReconcilerStatus } from './reconciler.js';
import { classifyMessage } from './routing/classify.js';
import { isPartnerEntity, partnerTag, type Routing } from './routing/table.js';
import { completeAction } from './services/actions.js';
import type { CommentRelay } from './services/comments.js';
import type { Notifier } from './services/notifier.js';
import type { StateManager } from './services/state.js';
import type { TaskCreator } from './services/tasks.js';
import type { TrackerGateway } from './services/tracker.js';
import type { InboundMessage, TrackedEntity } from './types.js';

const HISTORY_DAYS = 7;

export type CompletionOutcome = 'completed' | 'not-found' | 'forbidden' | 'already-closed' | 'busy' | 'failed';

/** The message a "complete" button was pressed on. */
export interface ActionSource {
  chatId: number;
  messageId: number;
  text: string;
}

const byNewest = (field: 'createdAt' | 'updatedAt') => (a: TrackedEntity, b: TrackedEntity) =>
  b[field].localeCompare(a[field]);

export class Workflow {
  private completing = new Set<string>();

  constructor(
    private routing: Routing,
    private state: StateManager,
    private tracker: TrackerGateway,
    private notifier: Notifier,
    private relay: CommentRelay,
    private creator: TaskCreator,
    private reconciler: Reconciler,
    private log: Logger,
    private now: () => Date = () => new Date()
  ) {}

  isManager(userId: number): boolean {
    return this.routing.managers.has(userId);
  }

  registerSender(message: Pick<InboundMessage, 'senderId' | 'senderUsername' | 'senderFirstName'>): void {
    if (!message.senderUsername) return;
    this.state.registerUser(message.senderId, message.senderUsername, message.senderFirstName);
  }

  private reply(message: InboundMessage, text: string) {
    return this.notifier.send(message.chatId, text, { replyToMessageId: message.messageId });
  }

  // ── Inbound messages ────────────────────────────────────────

  async handleMessage(message: InboundMessage): Promise<void> {
    if (message.replyToText && (await this.relay.handle(message))) return;

    const classification = classifyMessage(message.text, this.isManager(message.senderId), this.routing);

    switch (classification.kind) {
      case 'department':
        this.log.info(`Department task (${classification.departmentCode}) from ${message.senderId} in ${message.chatId}`);
        await this.creator.create({
          message,
          summary: classification.summary,
          description: classification.description,
          departmentCodes: [classification.departmentCode],
          partnerId: null,
        });
        break;
      case 'partner':
        this.log.info(
          `Manager task from ${message.senderId}: departments [${classification.departmentCodes.join(', ')}], partner ${classification.partnerId ?? 'none'}`
        );
        await this.creator.create({
          message,
          summary: classification.summary,
          description: classification.description,
          departmentCodes: classification.departmentCodes,
          partnerId: classification.partnerId,
        });
        break;
      case 'rejected':
        this.log.info(`Task marker from non-manager ${message.senderId}, rejected`);
        await this.reply(message, messages.notPrivileged(this.routing));
        break;
      case 'malformed':
        await this.reply(message, messages.formatHint(this.routing));
        break;
      case 'ignored':
        break;
    }
  }

  // ── Completion ──────────────────────────────────────────────

  /** Closes an entity from its "complete" button. */
  async completeTask(key: string, userId: number, source: ActionSource | null): Promise<CompletionOutcome> {
    const entity = this.state.getEntity(key);
    const answerIn = source?.chatId ?? userId;

    if (!entity) {
      await this.notifier.send(answerIn, messages.completeNotFound(key));
      return 'not-found';
    }
    if (entity.creatorId !== userId && !this.isManager(userId)) {
      return 'forbidden';
    }
    if (entity.status === 'closed') {
      if (source) await this.refreshSource(source, key);
      return 'already-closed';
    }
    if (this.completing.has(key)) return 'busy';

    this.completing.add(key);
    try {
      this.log.info(`${key} → completion requested by ${userId}`);
      const result = await this.tracker.closeIssue(key);

      if (!result.ok) {
        const text =
          result.reason === 'no-transition'
            ? messages.completeNoTransition(this.routing, key)
            : messages.completeTransport(this.routing, key, result.error);
        await this.notifier.send(answerIn, text);
        return 'failed';
      }

      this.state.updateEntity(key, { status: 'closed' });
      if (source) {
        await this.refreshSource(source, key, messages.completedSuffix(key));
      }
      this.state.updateEntity(key, { dmChatId: null, dmMessageId: null });
      await this.notifier.send(entity.originChatId, messages.completedInChat(entity));

      this.log.event(`${key} completed by ${userId}`);
      return 'completed';
    } finally {
      this.completing.delete(key);
    }
  }

  /** Rewrites the button message so only still-open entities keep their buttons. */
  private async refreshSource(source: ActionSource, key: string, suffix = ''): Promise<void> {
    const remaining = this.state
      .entitiesByDmMessage(source.chatId, source.messageId)
      .filter((e) => e.key !== key && e.status === 'open')
      .map((e) => completeAction(e.key));

    if (suffix) {
      await this.notifier.edit(source.chatId, source.messageId, `${source.text}${suffix}`, remaining);
    } else {
      await this.notifier.setActions(source.chatId, source.messageId, remaining);
    }
  }

  // ── Commands ────────────────────────────────────────────────

  async start(message: InboundMessage): Promise<void> {
    await this.reply(
      message,
      messages.start(this.routing, message.senderFirstName, message.senderId, this.isManager(message.senderId))
    );
  }

  async help(message: InboundMessage): Promise<void> {
    await this.reply(message, messages.help(this.routing, this.isManager(message.senderId)));
  }

  async info(message: InboundMessage): Promise<void> {
    await this.reply(message, messages.info(message.senderId, message.chatId, message.chatType));
  }

  /** Lists the caller's open entities after reconciling them, so closed ones drop out. */
  async myTasks(message: InboundMessage): Promise<void> {
    const keys = this.state.entitiesByCreator(message.senderId, 'open').map((e) => e.key);
    const outcomes = await this.reconciler.reconcileKeys(keys);
    const justClosed = [...outcomes.values()].filter((o) => o === 'closed').length;

    const open = this.state.entitiesByCreator(message.senderId, 'open').sort(byNewest('createdAt'));
    await this.reply(message, messages.myTasks(this.routing, open, justClosed));
  }

  async history(message: InboundMessage): Promise<void> {
    const since = new Date(this.now().getTime() - HISTORY_DAYS * 24 * 60 * 60 * 1000).toISOString();
    const closed = this.state
      .entitiesByCreator(message.senderId, 'closed')
      .filter((e) => e.updatedAt >= since)
      .sort(byNewest('updatedAt'));
    await this.reply(message, messages.history(this.routing, closed));
  }

  async partners(message: InboundMessage): Promise<void> {
    if (!this.isManager(message.senderId)) {
      await this.reply(message, messages.managersOnly());
      return;
    }

    const groups = new Map<string, TrackedEntity[]>();
    for (const entity of this.state.openEntities()) {
      if (!isPartnerEntity(this.routing, entity) || !entity.departmentCode) continue;
      const list = groups.get(entity.departmentCode) ?? [];
      list.push(entity);
      groups.set(entity.departmentCode, list);
    }
    await this.reply(message, messages.partnersOverview(this.routing, groups));
  }

  /** `/partner WEB2`, `/partner WEB#2` and `/partner 2` all name partner 2. */
  async partner(message: InboundMessage, args: string): Promise<void> {
    if (!this.isManager(message.senderId)) {
      await this.reply(message, messages.managersOnly());
      return;
    }

    const prefix = this.routing.partners.tagPrefix.toUpperCase();
    const raw = args.trim().split(/\s+/)[0]?.toUpperCase() ?? '';
    const partnerId = (raw.startsWith(prefix) ? raw.slice(prefix.length) : raw).replace(/^#/, '');
    if (!/^\d+$/.test(partnerId)) {
      await this.reply(message, messages.partnerUsage(this.routing));
      return;
    }

    const tag = partnerTag(this.routing, partnerId);
    const entities = this.state
      .openEntities()
      .filter((e) => e.queue === this.routing.partners.queue && e.departmentCode === tag)
      .sort(byNewest('createdAt'));
    await this.reply(message, messages.partnerTasks(this.routing, partnerId, entities));
  }

  getStatus(): { entities: { open: number; closed: number }; reconciler: ReconcilerStatus } {
    const all = this.state.listEntities();
    const open = all.filter((e) => e.status === 'open').length;
    return {
      entities: { open, closed: all.length - open },
      reconciler: this.reconciler.getStatus(),
    };
  }
}
