import type { ChoiceToken } from '../types/quiz';
import { MalformedTokenError } from './errors';

/** Separator inside callback_data: chapter|questionId|optionIndex */
export const CHOICE_TOKEN_DELIMITER = '|';

/** Telegram rejects callback_data longer than this. */
export const MAX_CALLBACK_DATA_BYTES = 64;

const INTEGER_PATTERN = /^-?\d+$/;
const INDEX_PATTERN = /^\d+$/;

export function encodeChoiceToken(chapter: string, questionId: number, optionIndex: number): string {
  if (!chapter || chapter.includes(CHOICE_TOKEN_DELIMITER)) {
    throw new MalformedTokenError(
      `Chapter name '${chapter}' cannot be encoded (empty or contains '${CHOICE_TOKEN_DELIMITER}')`
    );
  }
  if (!Number.isInteger(questionId) || !Number.isInteger(optionIndex) || optionIndex < 0) {
    throw new MalformedTokenError(`Cannot encode question ${questionId} option ${optionIndex}`);
  }
  return [chapter, questionId, optionIndex].join(CHOICE_TOKEN_DELIMITER);
}

export function decodeChoiceToken(token: string): ChoiceToken {
  const parts = token.split(CHOICE_TOKEN_DELIMITER);
  if (parts.length !== 3) {
    throw new MalformedTokenError(`Expected 3 fields in choice token, got ${parts.length}`);
  }

  const [chapter, rawId, rawIndex] = parts;
  if (!chapter) {
    throw new MalformedTokenError('Choice token has an empty chapter');
  }
  if (!INTEGER_PATTERN.test(rawId) || !INDEX_PATTERN.test(rawIndex)) {
    throw new MalformedTokenError(`Choice token has non-numeric fields: '${rawId}', '${rawIndex}'`);
  }

  return {
    chapter,
    questionId: parseInt(rawId, 10),
    optionIndex: parseInt(rawIndex, 10),
  };
}

export function fitsCallbackData(token: string): boolean {
  return Buffer.byteLength(token, 'utf8') <= MAX_CALLBACK_DATA_BYTES;
}
