import { Bot, type Context } from 'grammy';
import { handleChatMessage, type ChatServiceDeps } from '../chat/chat-service';
import { messages } from '../feedback/messages';
import { getMainMenuKeyboard, isMenuAction, type MenuAction } from './buttons';
import {
  addExpenseCommand,
  categoriesCommand,
  categoryCommand,
  clearHistoryCommand,
  type CommandDeps,
  deleteExpenseCommand,
  editExpenseCommand,
  expensesCommand,
  groupCommand,
  groupsCommand,
  historyCommand,
  summaryCommand,
} from './commands';

export type BotDeps = ChatServiceDeps & CommandDeps;

// Show animated thinking message that cycles through dots
async function showThinking(ctx: Context): Promise<() => Promise<void>> {
  const chatId = ctx.chat?.id;
  if (!chatId) return async () => {};

  const frames = ['.', '..', '...'];
  let frameIndex = 0;
  const msg = await ctx.reply(frames[0]);

  const interval = setInterval(() => {
    frameIndex = (frameIndex + 1) % frames.length;
    ctx.api.editMessageText(chatId, msg.message_id, frames[frameIndex]).catch((error: unknown) => {
      console.error('[Bot] Thinking frame not updated:', error instanceof Error ? error.message : error);
    });
  }, 400);

  return async () => {
    clearInterval(interval);
    try {
      await ctx.api.deleteMessage(chatId, msg.message_id);
    } catch (error) {
      console.error('[Bot] Thinking message not deleted:', error instanceof Error ? error.message : error);
    }
  };
}

function runMenuAction(deps: BotDeps, userId: string, action: MenuAction): string {
  switch (action) {
    case 'summary':
      return summaryCommand(deps, userId);
    case 'expenses':
      return expensesCommand(deps, userId);
    case 'categories':
      return categoriesCommand(deps, userId);
    case 'groups':
      return groupsCommand(deps, userId);
    case 'history':
      return historyCommand(deps, userId);
    case 'clear':
      return clearHistoryCommand(deps, userId);
  }
}

export function createBot(token: string, deps: BotDeps): Bot {
  const bot = new Bot(token);

  bot.use(async (ctx, next) => {
    if (ctx.from) {
      deps.store.ensureUser(ctx.from.id.toString(), ctx.from.username);
    }
    await next();
  });

  bot.command('start', async (ctx) => {
    await ctx.reply(messages.info.welcome, { reply_markup: getMainMenuKeyboard() });
  });

  bot.command('help', async (ctx) => {
    await ctx.reply(messages.info.help);
  });

  const simple: [string, (userId: string, args: string) => string][] = [
    ['summary', (userId) => summaryCommand(deps, userId)],
    ['expenses', (userId, args) => expensesCommand(deps, userId, args)],
    ['add', (userId, args) => addExpenseCommand(deps, userId, args)],
    ['edit', (userId, args) => editExpenseCommand(deps, userId, args)],
    ['delete', (userId, args) => deleteExpenseCommand(deps, userId, args.trim())],
    ['categories', (userId) => categoriesCommand(deps, userId)],
    ['category', (userId, args) => categoryCommand(deps, userId, args)],
    ['groups', (userId) => groupsCommand(deps, userId)],
    ['group', (userId, args) => groupCommand(deps, userId, args)],
    ['history', (userId) => historyCommand(deps, userId)],
    ['clear', (userId) => clearHistoryCommand(deps, userId)],
  ];

  for (const [name, run] of simple) {
    bot.command(name, async (ctx) => {
      const userId = ctx.from?.id.toString();
      if (!userId) {
        await ctx.reply(messages.error.unknownUser);
        return;
      }
      await ctx.reply(run(userId, ctx.match));
    });
  }

  bot.on('callback_query:data', async (ctx) => {
    const action = ctx.callbackQuery.data;
    const userId = ctx.from?.id.toString();
    await ctx.answerCallbackQuery();

    if (userId && isMenuAction(action)) {
      await ctx.reply(runMenuAction(deps, userId, action));
    }
  });

  bot.on('message:text', async (ctx) => {
    const text = ctx.message.text;
    const userId = ctx.from?.id.toString();

    if (!userId) {
      await ctx.reply(messages.error.unknownUser);
      return;
    }

    if (text.startsWith('/')) {
      await ctx.reply(messages.info.help);
      return;
    }

    const hideThinking = await showThinking(ctx);
    try {
      const reply = await handleChatMessage(deps, userId, text);
      await hideThinking();
      await ctx.reply(reply.message);
    } catch (e) {
      await hideThinking();
      throw e;
    }
  });

  bot.catch((err) => {
    const reason = err.error instanceof Error ? err.error.message : String(err.error);
    console.error(`[Bot] Error while handling update ${err.ctx.update.update_id}:`, reason);
    err.ctx.reply(messages.error.unexpected).catch((replyError: unknown) => {
      console.error('[Bot] Failed to send error reply:', replyError instanceof Error ? replyError.message : replyError);
    });
  });

  return bot;
}
