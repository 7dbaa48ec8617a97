import * as cron from 'node-cron';
import { formatInTimeZone } from 'date-fns-tz';
import type { BotConfig } from '../config/env';
import type { QuizDispatcher } from './QuizDispatcher';

const pad2 = (n: number) => n.toString().padStart(2, '0');

/** Daily cron expression: "<minute> <hour> * * *". */
export function dailyCronExpression(hour: number, minute: number): string {
  return `${minute} ${hour} * * *`;
}

export class SchedulerService {
  private cronTasks: cron.ScheduledTask[] = [];

  constructor(
    private readonly config: BotConfig,
    private readonly dispatcher: Pick<QuizDispatcher, 'runBatch'>
  ) {}

  /** One scheduled run. Item failures are handled inside runBatch; this only guards the run itself. */
  async runNow(): Promise<void> {
    console.log('[Scheduler] Running scheduled quiz batch...');
    try {
      await this.dispatcher.runBatch(this.config.questionsPerRun);
    } catch (err) {
      console.error('[Scheduler] Error in scheduled batch:', err);
    }
  }

  start(): void {
    const { scheduleHour, scheduleMinute, timezone } = this.config;
    const expression = dailyCronExpression(scheduleHour, scheduleMinute);

    const task = cron.schedule(expression, () => this.runNow(), {
      name: 'daily-quiz',
      timezone,
      noOverlap: true,
    });
    this.cronTasks.push(task);

    if (this.config.mode === 'sequential') {
      console.warn(
        `[Scheduler] MODE=sequential always sends from the first chapter (${this.config.chapters[0]})`
      );
    }
    const nowInZone = formatInTimeZone(new Date(), timezone, 'yyyy-MM-dd HH:mm');
    console.log(
      `[Scheduler] Scheduler set for ${pad2(scheduleHour)}:${pad2(scheduleMinute)} ${timezone} (now ${nowInZone}), ${this.config.questionsPerRun} question(s) per run`
    );
  }

  /**
   * Stop all cron tasks
   */
  async stop(): Promise<void> {
    console.log('[Scheduler] Stopping all cron tasks...');
    for (const task of this.cronTasks) {
      await task.stop();
    }
    this.cronTasks = [];
    console.log('[Scheduler] All cron tasks stopped');
  }
}
