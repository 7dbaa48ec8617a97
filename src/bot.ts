import type { BotConfig } from './config/env';
import { answerCallback, type AnswerContext } from './handlers/answerCallback';
import type { CallbackResolver } from './services/CallbackResolver';
import type { QuizDispatcher } from './services/QuizDispatcher';
import { errorMessage } from './utils/errors';
import { START_TEXT } from './utils/quizMessage';

export interface QuizBotServices {
  dispatcher: Pick<QuizDispatcher, 'sendOne'>;
  resolver: Pick<CallbackResolver, 'resolve'>;
}

/** What the command handlers read from grammy's command context. */
export interface CommandContextLike {
  chat: { id: number };
  reply(text: string, other?: { parse_mode?: 'HTML' }): Promise<unknown>;
}

/** The parts of a grammy `Bot` the handlers are registered on. */
export interface QuizBotHost {
  api: { setMyCommands(commands: Array<{ command: string; description: string }>): Promise<unknown> };
  command(command: string, handler: (ctx: CommandContextLike) => Promise<void>): unknown;
  on(filter: 'callback_query:data', handler: (ctx: AnswerContext) => Promise<void>): unknown;
  catch(handler: (err: { error: unknown }) => void): unknown;
}

const pad2 = (n: number) => n.toString().padStart(2, '0');

export const BOT_COMMANDS = [
  { command: 'start', description: '🚀 Start' },
  { command: 'quiz', description: '❓ Get a question now' },
  { command: 'id', description: '🆔 Chat ID' },
  { command: 'help', description: 'ℹ️ Help' },
];

export function buildHelpText(config: BotConfig): string {
  return `ℹ️ Commands:

/quiz - Get a question right now
/id - Show this chat's ID
/help - Show this message

Scheduled quiz: ${config.questionsPerRun} question(s) daily at ${pad2(config.scheduleHour)}:${pad2(config.scheduleMinute)} (${config.timezone}).
Chapters: ${config.chapters.join(', ')}`;
}

/**
 * Registers commands and the answer-button handler. Polling is started by the caller.
 */
export function registerQuizHandlers(bot: QuizBotHost, config: BotConfig, services: QuizBotServices): void {
  bot.api.setMyCommands(BOT_COMMANDS).catch((err) => {
    console.warn('[Bot] setMyCommands failed (e.g. rate limit):', errorMessage(err));
  });

  bot.command('start', async (ctx) => {
    await ctx.reply(START_TEXT);
  });

  bot.command('help', async (ctx) => {
    await ctx.reply(buildHelpText(config));
  });

  // Handy for finding the value to put into CHAT_ID
  bot.command('id', async (ctx) => {
    await ctx.reply(`🆔 Chat ID: <code>${ctx.chat.id}</code>`, { parse_mode: 'HTML' });
  });

  bot.command('quiz', async (ctx) => {
    try {
      await services.dispatcher.sendOne(ctx.chat.id);
    } catch (error) {
      console.error('[Bot] Error in quiz command:', error);
      await ctx.reply('❌ Could not load a question right now. Try again later.');
    }
  });

  bot.on('callback_query:data', (ctx) => answerCallback(ctx, services.resolver));

  bot.catch((err) => {
    console.error('[Bot] Bot error:', err.error);
  });
}
