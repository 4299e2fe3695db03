import type { Logger } from '../logger.js';
import * as messages from '../messages.js';
import { findDepartment, partnerAssignee, partnerTag, type Routing } from '../routing/table.js';
import type { CreateIssueInput, InboundMessage, OutboundAction, TrackedEntity } from '../types.js';
import { addDays, zonedClock } from '../utils/time.js';
import { completeAction } from './actions.js';
import type { Directory } from './directory.js';
import type { Notifier } from './notifier.js';
import type { PartnerBoards } from './partners.js';
import type { StateManager } from './state.js';
import type { TrackerGateway } from './tracker.js';

export interface TaskRequest {
  message: InboundMessage;
  summary: string;
  description: string;
  departmentCodes: string[];
  partnerId: string | null;
}

export interface CreationOutcome {
  created: TrackedEntity[];
  failed: messages.FailedItem[];
}

interface Target {
  kind: 'department' | 'partner' | 'general';
  queue: string;
  departmentCode: string | null;
  label: string;
  assignee: string | null;
  followers: string[];
  tags: string[];
}

/**
 * Turns one routed chat message into tracker issues: one per department, one
 * for the partner, or a single default-queue issue when neither is named.
 */
export class TaskCreator {
  constructor(
    private routing: Routing,
    private state: StateManager,
    private tracker: TrackerGateway,
    private notifier: Notifier,
    private directory: Directory,
    private boards: PartnerBoards,
    private log: Logger,
    private now: () => Date = () => new Date()
  ) {}

  private deadline(): string | null {
    if (this.routing.deadlineDays === null) return null;
    return addDays(zonedClock(this.now(), this.routing.timezone).day, this.routing.deadlineDays);
  }

  private targets(request: TaskRequest, requesterLogin: string | null): Target[] {
    const chatTag = `chat_${request.message.chatId}`;
    const withRequester = (followers: readonly string[]) =>
      requesterLogin && !followers.includes(requesterLogin) ? [...followers, requesterLogin] : [...followers];

    const targets: Target[] = [];
    for (const code of request.departmentCodes) {
      const department = findDepartment(this.routing, code);
      if (!department) {
        this.log.warn(`Unknown department "${code}", skipping`);
        continue;
      }
      targets.push({
        kind: 'department',
        queue: department.queue,
        departmentCode: code,
        label: department.name,
        assignee: department.assignee,
        followers: withRequester(department.followers),
        tags: [this.routing.originTag, code, chatTag],
      });
    }

    if (request.partnerId) {
      const tag = partnerTag(this.routing, request.partnerId);
      targets.push({
        kind: 'partner',
        queue: this.routing.partners.queue,
        departmentCode: tag,
        label: tag,
        assignee: partnerAssignee(this.routing, request.partnerId),
        followers: withRequester([]),
        tags: [this.routing.originTag, 'partner', tag, chatTag],
      });
    }

    if (targets.length === 0) {
      targets.push({
        kind: 'general',
        queue: this.routing.defaultQueue,
        departmentCode: null,
        label: 'General',
        assignee: null,
        followers: withRequester([]),
        tags: [this.routing.originTag, chatTag],
      });
    }
    return targets;
  }

  private description(request: TaskRequest, target: Target): string {
    const { message } = request;
    const author = message.senderUsername ? `@${message.senderUsername}` : message.senderFirstName;
    const header = [
      '📱 Created from Telegram',
      `👤 Author: ${author} (ID: ${message.senderId})`,
      `🏢 ${target.kind === 'partner' ? 'Partner' : 'Department'}: ${target.label}`,
      `💬 Chat ID: ${message.chatId}`,
    ].join('\n');
    return request.description ? `${header}\n\n${request.description}` : header;
  }

  async create(request: TaskRequest): Promise<CreationOutcome> {
    const { message } = request;
    const requesterLogin = this.directory.loginForHandle(message.senderUsername);
    const deadline = this.deadline();
    const boardPromise = request.partnerId ? this.boards.getOrCreate(request.partnerId) : null;

    const created: TrackedEntity[] = [];
    const createdItems: messages.CreatedItem[] = [];
    const failed: messages.FailedItem[] = [];

    for (const target of this.targets(request, requesterLogin)) {
      const input: CreateIssueInput = {
        queue: target.queue,
        summary: request.summary,
        description: this.description(request, target),
        assignee: target.assignee,
        priority: this.routing.defaultPriority,
        tags: target.tags,
        deadline,
        followers: target.followers,
      };

      const result = await this.tracker.createIssue(input);
      if (!result.ok) {
        failed.push({ label: target.label, error: result.error });
        continue;
      }
      const issue = result.value;

      const entity = this.state.addEntity({
        key: issue.key,
        originChatId: message.chatId,
        originMessageId: message.messageId,
        summary: request.summary,
        queue: target.queue,
        departmentCode: target.departmentCode,
        creatorId: message.senderId,
        lastKnownStatusKey: issue.status?.key ?? null,
        deadline: issue.deadline ?? deadline,
      });
      created.push(entity);
      createdItems.push({ key: entity.key, label: target.label, queue: target.queue });
      this.log.event(`${entity.key} created in ${target.queue} (${target.label}) by ${message.senderId}`);
    }

    const board = boardPromise ? await boardPromise : null;
    await this.confirm(request, {
      created,
      createdItems,
      failed,
      deadline,
      boardUrl: board ? this.boards.boardUrl(board) : null,
    });
    return { created, failed };
  }

  private async confirm(
    request: TaskRequest,
    result: {
      created: TrackedEntity[];
      createdItems: messages.CreatedItem[];
      failed: messages.FailedItem[];
      deadline: string | null;
      boardUrl: string | null;
    }
  ): Promise<void> {
    const { message } = request;
    const replyInChat = (text: string, actions: OutboundAction[] = []) =>
      this.notifier.send(message.chatId, text, { replyToMessageId: message.messageId, actions });

    if (result.created.length === 0) {
      const error = result.failed[result.failed.length - 1]?.error ?? '';
      await replyInChat(messages.creationFailed(error));
      return;
    }

    if (message.chatType === 'group' || message.chatType === 'supergroup') {
      await replyInChat(messages.groupConfirmation(request.summary, result.createdItems.map((c) => c.label)));
    }

    const detailed = messages.detailedConfirmation(this.routing, {
      summary: request.summary,
      deadline: result.deadline,
      created: result.createdItems,
      failed: result.failed,
      boardUrl: result.boardUrl,
    });
    const actions = result.created.map((e) => completeAction(e.key));

    let sent = await this.notifier.send(message.senderId, detailed, { actions });
    if (!sent) {
      this.log.warn(`DM to ${message.senderId} failed, posting details in chat ${message.chatId}`);
      sent = await replyInChat(`${detailed}\n\n${messages.dmUnavailable()}`, actions);
    }
    if (sent) {
      for (const entity of result.created) {
        this.state.updateEntity(entity.key, { dmChatId: sent.chatId, dmMessageId: sent.messageId });
      }
    }

    const watchers = this.directory
      .resolveHandles(this.routing.recipients.allTasks)
      .filter((id) => id !== message.senderId);
    if (watchers.length > 0) {
      const delivered = await this.notifier.fanOut(watchers, detailed);
      this.log.debug(`Task copy delivered to ${delivered}/${new Set(watchers).size} watchers`);
    }
  }
}
