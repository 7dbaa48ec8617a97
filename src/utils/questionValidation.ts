/**
 * Load-time validation of a chapter file.
 * Turns the loosely typed JSON into Question records with defaults applied:
 * `correct` false, `explanation` "".
 */

import type { Question, QuizOption } from '../types/quiz';
import { QuestionFormatError } from './errors';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseId(value: unknown): number | null {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return parseInt(value, 10);
  return null;
}

function parseOption(chapter: string, raw: unknown, where: string): QuizOption {
  if (!isRecord(raw)) {
    throw new QuestionFormatError(chapter, `${where} is not an object`);
  }
  const { text, correct, explanation } = raw;
  if (typeof text !== 'string') {
    throw new QuestionFormatError(chapter, `${where} has no string "text"`);
  }
  if (correct !== undefined && typeof correct !== 'boolean') {
    throw new QuestionFormatError(chapter, `${where} has a non-boolean "correct"`);
  }
  if (explanation !== undefined && explanation !== null && typeof explanation !== 'string') {
    throw new QuestionFormatError(chapter, `${where} has a non-string "explanation"`);
  }
  return {
    text,
    correct: correct === true,
    explanation: typeof explanation === 'string' ? explanation : '',
  };
}

function parseQuestion(chapter: string, raw: unknown, index: number): Question {
  const where = `question #${index}`;
  if (!isRecord(raw)) {
    throw new QuestionFormatError(chapter, `${where} is not an object`);
  }

  const id = parseId(raw.id);
  if (id === null) {
    throw new QuestionFormatError(chapter, `${where} has no integer "id"`);
  }
  const text = raw.question;
  if (typeof text !== 'string' || !text.trim()) {
    throw new QuestionFormatError(chapter, `${where} (id=${id}) has no "question" text`);
  }
  const rawOptions = raw.options;
  if (!Array.isArray(rawOptions) || rawOptions.length === 0) {
    throw new QuestionFormatError(chapter, `${where} (id=${id}) has no "options"`);
  }

  const options = rawOptions.map((opt: unknown, i: number) =>
    parseOption(chapter, opt, `${where} (id=${id}) option #${i}`)
  );
  return { id, question: text, options };
}

export function parseChapter(chapter: string, data: unknown): Question[] {
  if (!Array.isArray(data)) {
    throw new QuestionFormatError(chapter, 'expected a JSON array of questions');
  }

  const seenIds = new Set<number>();
  return data.map((raw: unknown, index: number) => {
    const question = parseQuestion(chapter, raw, index);
    if (seenIds.has(question.id)) {
      throw new QuestionFormatError(chapter, `duplicate question id ${question.id}`);
    }
    seenIds.add(question.id);
    return question;
  });
}
