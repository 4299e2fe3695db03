import { Logger } from '../src/logger.js';
import { StatusClassifier } from '../src/routing/status.js';
import { buildRouting, type Routing, type RoutingInput } from '../src/routing/table.js';
import type { ChatTransport, SendOptions } from '../src/services/notifier.js';
import type { AttachmentFile, SearchQuery, TrackerGateway } from '../src/services/tracker.js';
import type {
  CloseResult,
  CreateIssueInput,
  InboundMessage,
  OutboundAction,
  SentMessage,
  TrackerAttachment,
  TrackerBoard,
  TrackerComment,
  TrackerIssue,
  TrackerResult,
  TrackerTransition,
  TrackerUser,
} from '../src/types.js';

export const silentLog = new Logger('silent');

export const MANAGER_ID = 100;
export const USER_ID = 200;
export const GROUP_CHAT_ID = -1001;

export function routingInput(overrides: Partial<RoutingInput> = {}): RoutingInput {
  return {
    timezone: 'Europe/Moscow',
    taskMarker: '#задача',
    originTag: 'telegram',
    trackerWebUrl: 'https://tracker.example.test',
    defaults: { queue: 'MNG', priority: 'critical', deadlineDays: 2 },
    departments: {
      hr: { name: 'HR', queue: 'HR', assignee: 'hr.lead', followers: ['hr.deputy'] },
      razrab: { name: 'Development', queue: 'RAZRAB', assignee: 'dev.lead' },
      mgr: { name: 'Managers', queue: 'MNG' },
    },
    hashtags: {
      '#hr': 'hr',
      '#razrab': 'razrab',
      '#dev': 'razrab',
      '#менедж': 'mgr',
      '#менеджер': 'mgr',
    },
    partners: {
      queue: 'PARTNERS',
      tagPrefix: 'WEB',
      idPattern: 'WEB\\s*#?\\s*(\\d+)',
      assignees: { '42': 'partner.manager' },
      defaultAssignee: 'sales.lead',
    },
    managers: [MANAGER_ID],
    loginToHandle: {
      'hr.lead': '@HR_Lead',
      'dev.lead': 'dev_lead',
      anna: 'anna_tg',
    },
    recipients: {
      allTasks: ['boss'],
      approval: ['approver'],
      departmentDigest: ['boss'],
      weeklyReport: ['boss'],
    },
    statuses: {
      completed: ['closed', 'resolved', 'done'],
      inProgress: ['inProgress', 'В работе'],
      approval: ['needsApproval'],
    },
    ...overrides,
  };
}

export function testRouting(overrides: Partial<RoutingInput> = {}): Routing {
  return buildRouting(routingInput(overrides));
}

export function testStatuses(routing: Routing = testRouting()): StatusClassifier {
  return new StatusClassifier(routing.statuses);
}

export function inbound(overrides: Partial<InboundMessage> = {}): InboundMessage {
  return {
    messageId: 10,
    chatId: GROUP_CHAT_ID,
    chatType: 'supergroup',
    senderId: USER_ID,
    senderUsername: 'anna_tg',
    senderFirstName: 'Anna',
    text: '',
    replyToText: null,
    photoFileId: null,
    ...overrides,
  };
}

export function issue(key: string, overrides: Partial<TrackerIssue> = {}): TrackerIssue {
  return { key, summary: `Summary of ${key}`, status: { key: 'open', display: 'Open' }, ...overrides };
}

export function comment(id: string, text: string, author = 'Boris'): TrackerComment {
  return { id, text, createdBy: { id: `u-${author}`, login: author.toLowerCase(), display: author } };
}

// ── Tracker fake ─────────────────────────────────────────────

export function ok<T>(value: T): TrackerResult<T> {
  return { ok: true, value };
}

export function failed(error: string): { ok: false; error: string } {
  return { ok: false, error };
}

/** In-memory tracker. Keys are issued per queue as QUEUE-1, QUEUE-2, ... */
export class FakeTracker implements TrackerGateway {
  issues = new Map<string, TrackerIssue>();
  comments = new Map<string, TrackerComment[]>();
  users = new Map<string, TrackerUser>();
  searchResults = new Map<string, TrackerIssue[]>();
  transitions = new Map<string, TrackerTransition[]>();

  failingQueues = new Set<string>();
  failingGets = new Set<string>();
  failingComments = new Set<string>();
  closeResult: CloseResult = { ok: true };

  created: CreateIssueInput[] = [];
  addedComments: Array<{ key: string; text: string }> = [];
  attachments: Array<{ key: string; file: AttachmentFile }> = [];
  searches: SearchQuery[] = [];
  closed: string[] = [];
  boards: Array<{ name: string; queue: string; tag: string }> = [];
  getIssueCalls: string[] = [];

  private counters = new Map<string, number>();

  async createIssue(input: CreateIssueInput): Promise<TrackerResult<TrackerIssue>> {
    this.created.push(input);
    if (this.failingQueues.has(input.queue)) return failed(`400 Queue ${input.queue} rejected the issue`);
    const next = (this.counters.get(input.queue) ?? 0) + 1;
    this.counters.set(input.queue, next);
    const created = issue(`${input.queue}-${next}`, { summary: input.summary, deadline: input.deadline ?? null });
    this.issues.set(created.key, created);
    return ok(created);
  }

  async getIssue(key: string): Promise<TrackerResult<TrackerIssue>> {
    this.getIssueCalls.push(key);
    if (this.failingGets.has(key)) return failed('Request timed out after 10000ms');
    const found = this.issues.get(key);
    return found ? ok(found) : failed(`404 Issue ${key} not found`);
  }

  async updateAssignee(key: string, login: string | null): Promise<TrackerResult<TrackerIssue>> {
    const current = this.issues.get(key);
    if (!current) return failed(`404 Issue ${key} not found`);
    const updated = { ...current, assignee: login ? { id: login, login } : null };
    this.issues.set(key, updated);
    return ok(updated);
  }

  async addComment(key: string, text: string): Promise<TrackerResult<TrackerComment>> {
    if (this.failingComments.has(key)) return failed('503 Service Unavailable');
    this.addedComments.push({ key, text });
    return ok({ id: `c${this.addedComments.length}`, text });
  }

  async getComments(key: string): Promise<TrackerResult<TrackerComment[]>> {
    if (this.failingComments.has(key)) return failed('503 Service Unavailable');
    return ok(this.comments.get(key) ?? []);
  }

  async searchIssues(search: SearchQuery): Promise<TrackerResult<TrackerIssue[]>> {
    this.searches.push(search);
    return ok(this.searchResults.get(search.query ?? '') ?? []);
  }

  async attachFile(key: string, file: AttachmentFile): Promise<TrackerResult<TrackerAttachment>> {
    this.attachments.push({ key, file });
    return ok({ id: `a${this.attachments.length}`, name: file.filename });
  }

  async getTransitions(key: string): Promise<TrackerResult<TrackerTransition[]>> {
    return ok(this.transitions.get(key) ?? []);
  }

  async executeTransition(): Promise<TrackerResult<void>> {
    return ok(undefined);
  }

  async closeIssue(key: string): Promise<CloseResult> {
    if (this.closeResult.ok) this.closed.push(key);
    return this.closeResult;
  }

  async getUser(idOrLogin: string): Promise<TrackerResult<TrackerUser>> {
    const user = this.users.get(idOrLogin);
    return user ? ok(user) : failed(`404 User ${idOrLogin} not found`);
  }

  async createBoard(name: string, queue: string, tag: string): Promise<TrackerResult<TrackerBoard>> {
    this.boards.push({ name, queue, tag });
    return ok({ id: this.boards.length, name });
  }
}

// ── Chat fake ────────────────────────────────────────────────

export interface SentRecord {
  chatId: number;
  messageId: number;
  text: string;
  options: SendOptions;
}

/** Records every outbound call. Chat ids in `unreachable` throw like a blocked bot would. */
export class FakeTransport implements ChatTransport {
  sent: SentRecord[] = [];
  edits: Array<{ chatId: number; messageId: number; text: string; actions: OutboundAction[] | undefined }> = [];
  actionUpdates: Array<{ chatId: number; messageId: number; actions: OutboundAction[] }> = [];
  unreachable = new Set<number>();
  files = new Map<string, { data: Uint8Array; filePath: string }>();

  private nextMessageId = 500;

  async sendMessage(chatId: number, text: string, options: SendOptions = {}): Promise<SentMessage> {
    if (this.unreachable.has(chatId)) {
      throw new Error('Forbidden: bot was blocked by the user');
    }
    const messageId = this.nextMessageId++;
    this.sent.push({ chatId, messageId, text, options });
    return { chatId, messageId };
  }

  async editMessageText(chatId: number, messageId: number, text: string, actions?: OutboundAction[]): Promise<void> {
    this.edits.push({ chatId, messageId, text, actions });
  }

  async editMessageActions(chatId: number, messageId: number, actions: OutboundAction[]): Promise<void> {
    this.actionUpdates.push({ chatId, messageId, actions });
  }

  async downloadFile(fileId: string): Promise<{ data: Uint8Array; filePath: string }> {
    const file = this.files.get(fileId);
    if (!file) throw new Error(`Bad Request: file ${fileId} not found`);
    return file;
  }

  to(chatId: number): SentRecord[] {
    return this.sent.filter((s) => s.chatId === chatId);
  }
}
