import path from 'path';
import type { BotConfig } from '../src/config/env';
import type { Question } from '../src/types/quiz';

export const fixturesDir = path.join(__dirname, 'fixtures', 'questions');

export function makeConfig(overrides: Partial<BotConfig> = {}): BotConfig {
  return {
    botToken: 'test-token',
    chatId: '-1001',
    questionsPerRun: 1,
    scheduleHour: 10,
    scheduleMinute: 0,
    timezone: 'Asia/Kolkata',
    mode: 'random',
    chapters: ['ch1', 'ch2'],
    questionsDir: fixturesDir,
    remoteTimeoutMs: 15000,
    remoteRetries: 0,
    ...overrides,
  };
}

/** Same question as tests/fixtures/questions/ch1.json, after defaults. */
export function makeAdditionQuestion(): Question {
  return {
    id: 1,
    question: '2+2=?',
    options: [
      { text: '3', correct: false, explanation: '' },
      { text: '4', correct: true, explanation: 'basic addition' },
      { text: '5', correct: false, explanation: '' },
    ],
  };
}

/** Returns the given values in order, cycling. */
export function sequence(...values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}
