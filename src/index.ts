import dotenv from 'dotenv';
import { Bot } from 'grammy';
import path from 'path';
import { registerQuizHandlers } from './bot';
import { loadConfig, projectRoot, type BotConfig } from './config/env';
import { CallbackResolver } from './services/CallbackResolver';
import { QuestionSelector } from './services/QuestionSelector';
import { QuestionStore } from './services/QuestionStore';
import { QuizDispatcher } from './services/QuizDispatcher';
import { SchedulerService } from './services/SchedulerService';
import { ConfigurationError } from './utils/errors';

// Load .env from project root so it works regardless of process.cwd()
dotenv.config({ path: path.join(projectRoot, '.env') });

function readConfig(): BotConfig {
  try {
    return loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`[Config] ${error.message}. Exiting.`);
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  console.log(`[Config] Chapters: ${config.chapters.join(', ')}`);

  const store = new QuestionStore({
    questionsDir: config.questionsDir,
    remoteBaseUrl: config.remoteBaseUrl,
    remoteTimeoutMs: config.remoteTimeoutMs,
    remoteRetries: config.remoteRetries,
  });
  const selector = new QuestionSelector();
  const resolver = new CallbackResolver(store, config.chapters);

  const bot = new Bot(config.botToken);
  const dispatcher = new QuizDispatcher(config, store, selector, bot.api);
  registerQuizHandlers(bot, config, { dispatcher, resolver });

  const scheduler = new SchedulerService(config, dispatcher);
  scheduler.start();

  const shutdown = async (signal: string) => {
    console.log(`[Bot] ${signal} received, shutting down...`);
    await scheduler.stop();
    await bot.stop();
  };
  const onSignal = (signal: string) => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('[Bot] Error during shutdown:', err);
        process.exit(1);
      });
  };
  process.once('SIGINT', () => onSignal('SIGINT'));
  process.once('SIGTERM', () => onSignal('SIGTERM'));

  console.log('[Bot] Starting bot polling...');
  await bot.start({
    onStart: (info) => console.log(`✅ Bot @${info.username} started`),
  });
}

main().catch((err) => {
  console.error('[Bot] Fatal error:', err);
  process.exit(1);
});
