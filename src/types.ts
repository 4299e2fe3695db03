import { z } from 'zod';

// ── Local state ─────────────────────────────────────────────

export type EntityStatus = 'open' | 'closed';

export interface TrackedEntity {
  key: string;
  originChatId: number;
  originMessageId: number;
  summary: string;
  queue: string;
  /** Department code, partner tag, or null for the default queue. */
  departmentCode: string | null;
  creatorId: number | null;
  status: EntityStatus;
  lastKnownStatusKey: string | null;
  lastKnownAssignee: string | null;
  lastKnownCommentCount: number;
  deadline: string | null;
  createdAt: string;
  updatedAt: string;
  dmChatId: number | null;
  dmMessageId: number | null;
}

export type NewEntity = Pick<
  TrackedEntity,
  'key' | 'originChatId' | 'originMessageId' | 'summary' | 'queue' | 'departmentCode' | 'creatorId'
> &
  Partial<Pick<TrackedEntity, 'lastKnownStatusKey' | 'lastKnownAssignee' | 'deadline'>>;

export type EntityPatch = Partial<
  Pick<
    TrackedEntity,
    | 'status'
    | 'lastKnownStatusKey'
    | 'lastKnownAssignee'
    | 'lastKnownCommentCount'
    | 'deadline'
    | 'dmChatId'
    | 'dmMessageId'
  >
>;

export interface UserIdentity {
  userId: number;
  username: string | null;
  firstName: string;
  registeredAt: string;
}

// ── Chat ────────────────────────────────────────────────────

export type ChatType = 'private' | 'group' | 'supergroup' | 'channel';

export interface InboundMessage {
  messageId: number;
  chatId: number;
  chatType: ChatType;
  senderId: number;
  senderUsername: string | null;
  senderFirstName: string;
  /** Message text or photo caption. */
  text: string;
  replyToText: string | null;
  photoFileId: string | null;
}

export interface OutboundAction {
  label: string;
  data: string;
}

export interface SentMessage {
  chatId: number;
  messageId: number;
}

// ── Tracker API ─────────────────────────────────────────────

const idSchema = z.union([z.string(), z.number()]).transform(String);

const statusRefSchema = z.object({
  key: z.string(),
  display: z.string().optional(),
});

const userRefSchema = z.object({
  id: idSchema,
  login: z.string().optional(),
  display: z.string().optional(),
});

export const trackerIssueSchema = z.object({
  key: z.string(),
  summary: z.string().default(''),
  status: statusRefSchema.optional(),
  assignee: userRefSchema.nullish(),
  deadline: z.string().nullish(),
  queue: z.object({ key: z.string() }).optional(),
});

export const trackerTransitionSchema = z.object({
  id: idSchema,
  display: z.string().optional(),
  to: z
    .object({
      key: z.string().optional(),
      display: z.string().optional(),
    })
    .default({}),
});

export const trackerCommentSchema = z.object({
  id: idSchema,
  text: z.string().default(''),
  createdBy: userRefSchema.optional(),
  createdAt: z.string().optional(),
});

export const trackerUserSchema = z.object({
  login: z.string(),
  display: z.string().optional(),
});

export const trackerBoardSchema = z.object({
  id: z.number(),
  name: z.string().optional(),
});

export const trackerAttachmentSchema = z.object({
  id: idSchema,
  name: z.string().optional(),
});

export type TrackerIssue = z.infer<typeof trackerIssueSchema>;
export type TrackerTransition = z.infer<typeof trackerTransitionSchema>;
export type TrackerComment = z.infer<typeof trackerCommentSchema>;
export type TrackerUser = z.infer<typeof trackerUserSchema>;
export type TrackerBoard = z.infer<typeof trackerBoardSchema>;
export type TrackerAttachment = z.infer<typeof trackerAttachmentSchema>;

export interface CreateIssueInput {
  queue: string;
  summary: string;
  description: string;
  assignee?: string | null;
  priority: string;
  tags: string[];
  deadline?: string | null;
  followers?: string[];
}

/** Outcome of one tracker call. A failure carries its own error text. */
export type TrackerResult<T> = { ok: true; value: T } | { ok: false; error: string };

export type CloseResult =
  | { ok: true }
  | { ok: false; reason: 'no-transition' | 'transport'; error: string };
