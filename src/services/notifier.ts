import type { Logger } from '../logger.js';
import { splitMessage } from '../messages.js';
import type { OutboundAction, SentMessage } from '../types.js';
import { errorMessage } from '../utils/errors.js';

export interface SendOptions {
  actions?: OutboundAction[];
  replyToMessageId?: number;
}

/** The chat platform as the rest of the bot sees it. Implementations may throw. */
export interface ChatTransport {
  sendMessage(chatId: number, text: string, options?: SendOptions): Promise<SentMessage>;
  editMessageText(chatId: number, messageId: number, text: string, actions?: OutboundAction[]): Promise<void>;
  /** Replaces the inline actions of a sent message; an empty list removes them. */
  editMessageActions(chatId: number, messageId: number, actions: OutboundAction[]): Promise<void>;
  downloadFile(fileId: string): Promise<{ data: Uint8Array; filePath: string }>;
}

/**
 * Best-effort delivery. Each send is its own attempt: failures are logged and
 * reported as null/false, never thrown, so one bad recipient cannot stop a batch.
 * Text over the message limit goes out in several parts.
 */
export class Notifier {
  constructor(
    private transport: ChatTransport,
    private log: Logger
  ) {}

  /** Returns the last part sent, which is the one carrying the actions. */
  async send(chatId: number, text: string, options: SendOptions = {}): Promise<SentMessage | null> {
    const parts = splitMessage(text);
    try {
      let sent: SentMessage | null = null;
      for (const [index, part] of parts.entries()) {
        const partOptions = parts.length === 1 ? options : optionsForPart(options, index, parts.length);
        sent = await this.transport.sendMessage(chatId, part, partOptions);
      }
      return sent;
    } catch (error) {
      this.log.warn(`Delivery to ${chatId} failed: ${errorMessage(error)}`);
      return null;
    }
  }

  /** Sends the same text to every distinct recipient; returns how many got it. */
  async fanOut(chatIds: Iterable<number>, text: string, options: SendOptions = {}): Promise<number> {
    let delivered = 0;
    for (const chatId of new Set(chatIds)) {
      if (await this.send(chatId, text, options)) delivered++;
    }
    return delivered;
  }

  async edit(chatId: number, messageId: number, text: string, actions?: OutboundAction[]): Promise<boolean> {
    try {
      await this.transport.editMessageText(chatId, messageId, text, actions);
      return true;
    } catch (error) {
      this.log.warn(`Editing message ${messageId} in ${chatId} failed: ${errorMessage(error)}`);
      return false;
    }
  }

  async setActions(chatId: number, messageId: number, actions: OutboundAction[]): Promise<boolean> {
    try {
      await this.transport.editMessageActions(chatId, messageId, actions);
      return true;
    } catch (error) {
      this.log.warn(`Updating actions of message ${messageId} in ${chatId} failed: ${errorMessage(error)}`);
      return false;
    }
  }
}

/** The reply goes on the first part, the actions on the last. */
function optionsForPart(options: SendOptions, index: number, count: number): SendOptions {
  const part: SendOptions = {};
  if (index === 0 && options.replyToMessageId !== undefined) part.replyToMessageId = options.replyToMessageId;
  if (index === count - 1 && options.actions) part.actions = options.actions;
  return part;
}
