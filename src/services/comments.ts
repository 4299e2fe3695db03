import { extname, basename } from 'path';
import type { Logger } from '../logger.js';
import * as messages from '../messages.js';
import { extractIssueKey } from '../routing/classify.js';
import type { InboundMessage } from '../types.js';
import { errorMessage } from '../utils/errors.js';
import type { ChatTransport, Notifier } from './notifier.js';
import type { StateManager } from './state.js';
import type { AttachmentFile, TrackerGateway } from './tracker.js';

/** Prefix of every comment the bot writes; comments starting with it are never relayed back. */
export const RELAY_MARKER = '\u{1F4AC} Comment from ';

export function relayCommentText(handle: string, text: string): string {
  return `${RELAY_MARKER}@${handle}:\n\n${text}`;
}

export function isRelayComment(text: string): boolean {
  return text.trimStart().startsWith(RELAY_MARKER);
}

const CONTENT_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.webp': 'image/webp',
};

/**
 * Replies to a bot message that names a tracked issue become comments on that
 * issue, with an attached photo uploaded first.
 */
export class CommentRelay {
  constructor(
    private state: StateManager,
    private tracker: TrackerGateway,
    private transport: ChatTransport,
    private notifier: Notifier,
    private log: Logger
  ) {}

  /** Returns false when the message is not a reply to a tracked issue. */
  async handle(message: InboundMessage): Promise<boolean> {
    const key = extractIssueKey(message.replyToText);
    if (!key || !this.state.hasEntity(key)) return false;

    const reply = (text: string) =>
      this.notifier.send(message.chatId, text, { replyToMessageId: message.messageId });

    const text = message.text.trim();
    if (!text && !message.photoFileId) {
      await reply(messages.commentEmpty(key));
      return true;
    }

    const attached = message.photoFileId ? await this.attachPhoto(key, message.photoFileId) : false;

    const handle = message.senderUsername ?? message.senderFirstName;
    const body = text || (attached ? '📎 Photo attached' : '📎 Photo could not be attached');
    const comment = await this.tracker.addComment(key, relayCommentText(handle, body));

    if (comment.ok) {
      this.log.event(`Comment from @${handle} → ${key}`);
      await reply(messages.commentAdded(key, attached));
    } else {
      await reply(messages.commentFailed(key, comment.error));
    }
    return true;
  }

  private async attachPhoto(key: string, fileId: string): Promise<boolean> {
    let file: AttachmentFile;
    try {
      const downloaded = await this.transport.downloadFile(fileId);
      const ext = extname(downloaded.filePath).toLowerCase();
      file = {
        data: downloaded.data,
        filename: basename(downloaded.filePath),
        contentType: CONTENT_TYPES[ext] ?? 'application/octet-stream',
      };
    } catch (error) {
      this.log.warn(`${key} → photo download failed: ${errorMessage(error)}`);
      return false;
    }

    const attachment = await this.tracker.attachFile(key, file);
    return attachment.ok;
  }
}
