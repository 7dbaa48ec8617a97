import type { InlineKeyboard } from 'grammy';
import type { BotConfig } from '../config/env';
import type { BatchReport, Question } from '../types/quiz';
import { NotFoundError } from '../utils/errors';
import { logFailure } from '../utils/failureLog';
import { formatQuestionMessage } from '../utils/quizMessage';
import { buildQuestionKeyboard } from '../utils/quizKeyboard';
import type { QuestionSelector } from './QuestionSelector';
import type { QuestionStore } from './QuestionStore';

/** The part of the Telegram API the dispatcher needs; grammy's `bot.api` satisfies it. */
export interface MessageSender {
  sendMessage(
    chatId: number | string,
    text: string,
    other?: { parse_mode?: 'HTML'; reply_markup?: InlineKeyboard }
  ): Promise<unknown>;
}

export type QuestionLoader = Pick<QuestionStore, 'load'>;

export interface QuizDispatcherOptions {
  /** Pause between consecutive sends in a batch (Telegram rate limits). */
  pacingMs?: number;
}

const DEFAULT_PACING_MS = 600;

export interface SentQuestion {
  chapter: string;
  question: Question;
}

/** How far one send got; read when it fails. */
interface SendProgress {
  stage: 'load' | 'render' | 'send';
  questionId?: number;
}

export class QuizDispatcher {
  private readonly pacingMs: number;

  constructor(
    private readonly config: BotConfig,
    private readonly store: QuestionLoader,
    private readonly selector: QuestionSelector,
    private readonly sender: MessageSender,
    options: QuizDispatcherOptions = {}
  ) {
    this.pacingMs = options.pacingMs ?? DEFAULT_PACING_MS;
  }

  /**
   * Sends one question from a pre-selected chapter.
   * Throws on load, keyboard or transport failure; callers decide how to report it.
   */
  async sendQuestion(chatId: number | string, chapter: string): Promise<SentQuestion> {
    return this.deliver(chatId, chapter, { stage: 'load' });
  }

  private async deliver(
    chatId: number | string,
    chapter: string,
    progress: SendProgress
  ): Promise<SentQuestion> {
    const questions = await this.store.load(chapter);
    if (questions.length === 0) {
      throw new NotFoundError(chapter, `Chapter '${chapter}' has no questions`);
    }
    const question = this.selector.pickQuestion(questions);
    progress.questionId = question.id;

    progress.stage = 'render';
    const text = formatQuestionMessage(chapter, question);
    const keyboard = buildQuestionKeyboard(question, chapter);

    progress.stage = 'send';
    await this.sender.sendMessage(chatId, text, { parse_mode: 'HTML', reply_markup: keyboard });
    console.log(`[Dispatcher] Sent question id=${question.id} from chapter=${chapter} to chat ${chatId}`);
    return { chapter, question };
  }

  /** Picks a chapter by the configured mode and sends one question to `chatId`. */
  async sendOne(chatId: number | string): Promise<SentQuestion> {
    const chapter = this.selector.pickChapter(this.config.chapters, this.config.mode);
    return this.sendQuestion(chatId, chapter);
  }

  /**
   * Sends `n` questions (at least 1) to the configured chat.
   * A failed item is logged and skipped; the batch never rejects.
   */
  async runBatch(n: number = this.config.questionsPerRun): Promise<BatchReport> {
    const total = Math.max(1, Math.floor(Number.isFinite(n) ? n : 1));
    const report: BatchReport = { attempted: 0, sent: 0, failed: 0 };
    console.log(`[Dispatcher] Starting batch of ${total} question(s) for chat ${this.config.chatId}`);

    for (let i = 0; i < total; i++) {
      if (i > 0 && this.pacingMs > 0) {
        await new Promise((r) => setTimeout(r, this.pacingMs));
      }

      const chapter = this.selector.pickChapter(this.config.chapters, this.config.mode);
      const progress: SendProgress = { stage: 'load' };
      report.attempted++;
      try {
        await this.deliver(this.config.chatId, chapter, progress);
        report.sent++;
      } catch (err) {
        report.failed++;
        logFailure(
          '[Dispatcher] Question send failed:',
          {
            source: 'QuizDispatcher',
            type: 'batch_item_failed',
            stage: progress.stage,
            chapter,
            questionId: progress.questionId,
            details: { item: i + 1, total },
          },
          err,
          'SEND_FAILED'
        );
      }
    }

    console.log(
      `[Dispatcher] Batch finished: attempted=${report.attempted} sent=${report.sent} failed=${report.failed}`
    );
    return report;
  }
}
