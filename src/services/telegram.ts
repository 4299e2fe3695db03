import { InlineKeyboard, type Api } from 'grammy';
import type { OutboundAction, SentMessage } from '../types.js';
import type { ChatTransport, SendOptions } from './notifier.js';

const FILE_DOWNLOAD_TIMEOUT_MS = 30_000;

function keyboard(actions: OutboundAction[]): InlineKeyboard {
  const kb = new InlineKeyboard();
  for (const action of actions) {
    kb.text(action.label, action.data).row();
  }
  return kb;
}

/** Plain-text Telegram delivery through the grammy Bot API client. */
export class TelegramTransport implements ChatTransport {
  constructor(
    private api: Api,
    private token: string
  ) {}

  async sendMessage(chatId: number, text: string, options: SendOptions = {}): Promise<SentMessage> {
    const message = await this.api.sendMessage(chatId, text, {
      link_preview_options: { is_disabled: true },
      ...(options.actions && options.actions.length > 0 ? { reply_markup: keyboard(options.actions) } : {}),
      ...(options.replyToMessageId
        ? { reply_parameters: { message_id: options.replyToMessageId, allow_sending_without_reply: true } }
        : {}),
    });
    return { chatId: message.chat.id, messageId: message.message_id };
  }

  async editMessageText(chatId: number, messageId: number, text: string, actions?: OutboundAction[]): Promise<void> {
    await this.api.editMessageText(chatId, messageId, text, {
      link_preview_options: { is_disabled: true },
      reply_markup: keyboard(actions ?? []),
    });
  }

  async editMessageActions(chatId: number, messageId: number, actions: OutboundAction[]): Promise<void> {
    await this.api.editMessageReplyMarkup(chatId, messageId, { reply_markup: keyboard(actions) });
  }

  async downloadFile(fileId: string): Promise<{ data: Uint8Array; filePath: string }> {
    const file = await this.api.getFile(fileId);
    if (!file.file_path) {
      throw new Error(`Telegram returned no path for file ${fileId}`);
    }

    const response = await fetch(`https://api.telegram.org/file/bot${this.token}/${file.file_path}`, {
      signal: AbortSignal.timeout(FILE_DOWNLOAD_TIMEOUT_MS),
    });
    if (!response.ok) {
      throw new Error(`Downloading ${file.file_path} failed: ${response.status} ${response.statusText}`);
    }
    return { data: new Uint8Array(await response.arrayBuffer()), filePath: file.file_path };
  }
}
