import { Bot, type Context } from 'grammy';
import type { Logger } from './logger.js';
import * as messages from './messages.js';
import { parseCompleteAction } from './services/actions.js';
import type { InboundMessage } from './types.js';
import { errorMessage } from './utils/errors.js';
import type { CompletionOutcome, Workflow } from './workflow.js';

/** Normalizes a grammy update into the message shape the workflow consumes. */
export function toInboundMessage(ctx: Context): InboundMessage | null {
  const msg = ctx.msg;
  const from = ctx.from;
  const chat = ctx.chat;
  if (!msg || !from || !chat) return null;

  const reply = msg.reply_to_message;
  const photos = msg.photo ?? [];
  return {
    messageId: msg.message_id,
    chatId: chat.id,
    chatType: chat.type,
    senderId: from.id,
    senderUsername: from.username ?? null,
    senderFirstName: from.first_name,
    text: msg.text ?? msg.caption ?? '',
    replyToText: reply ? (reply.text ?? reply.caption ?? null) : null,
    photoFileId: photos.length > 0 ? photos[photos.length - 1].file_id : null,
  };
}

function callbackAnswer(key: string, outcome: CompletionOutcome): string {
  switch (outcome) {
    case 'completed':
      return `✅ ${key} completed`;
    case 'not-found':
      return messages.completeNotFound(key);
    case 'forbidden':
      return messages.completeForbidden(key);
    case 'already-closed':
      return messages.completeAlreadyClosed(key);
    case 'busy':
      return `⏳ ${key} is already being completed`;
    case 'failed':
      return `❌ ${key} was not completed`;
  }
}

export function createBot(token: string, workflow: Workflow, log: Logger): Bot {
  const bot = new Bot(token);

  // Every sender with a handle becomes resolvable for notifications
  bot.use(async (ctx, next) => {
    if (ctx.from && !ctx.from.is_bot) {
      workflow.registerSender({
        senderId: ctx.from.id,
        senderUsername: ctx.from.username ?? null,
        senderFirstName: ctx.from.first_name,
      });
    }
    await next();
  });

  const command = (name: string, handler: (message: InboundMessage, args: string) => Promise<void>) => {
    bot.command(name, async (ctx) => {
      const message = toInboundMessage(ctx);
      if (!message) return;
      await handler(message, typeof ctx.match === 'string' ? ctx.match : '');
    });
  };

  command('start', (m) => workflow.start(m));
  command('help', (m) => workflow.help(m));
  command('info', (m) => workflow.info(m));
  command('mytasks', (m) => workflow.myTasks(m));
  command('history', (m) => workflow.history(m));
  command('partners', (m) => workflow.partners(m));
  command('partner', (m, args) => workflow.partner(m, args));

  bot.on(['message:text', 'message:photo'], async (ctx) => {
    const message = toInboundMessage(ctx);
    if (!message || message.text.startsWith('/')) return;
    await workflow.handleMessage(message);
  });

  bot.on('callback_query:data', async (ctx) => {
    const key = parseCompleteAction(ctx.callbackQuery.data);
    if (!key) {
      await ctx.answerCallbackQuery();
      return;
    }

    const pressed = ctx.callbackQuery.message;
    const source = pressed
      ? {
          chatId: pressed.chat.id,
          messageId: pressed.message_id,
          text: 'text' in pressed ? (pressed.text ?? '') : '',
        }
      : null;

    const outcome = await workflow.completeTask(key, ctx.from.id, source);
    await ctx.answerCallbackQuery({ text: callbackAnswer(key, outcome), show_alert: outcome === 'forbidden' });
  });

  bot.catch((err) => {
    log.error(`Update ${err.ctx.update.update_id} failed: ${errorMessage(err.error)}`);
  });

  return bot;
}
