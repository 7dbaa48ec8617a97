/**
 * Error taxonomy.
 * ConfigurationError is fatal at startup; everything else is caught at the
 * boundary of a single send or a single button press.
 */

export type QuizErrorCode =
  | 'CONFIGURATION'
  | 'NOT_FOUND'
  | 'REMOTE_FETCH'
  | 'QUESTION_FORMAT'
  | 'MALFORMED_TOKEN'
  | 'INVALID_SELECTION';

export abstract class QuizBotError extends Error {
  abstract readonly code: QuizErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends QuizBotError {
  readonly code = 'CONFIGURATION';
}

export class NotFoundError extends QuizBotError {
  readonly code = 'NOT_FOUND';

  constructor(readonly chapter: string, message?: string) {
    super(message ?? `Chapter file for '${chapter}' not found locally or via GITHUB_RAW_BASE`);
  }
}

export class RemoteFetchError extends QuizBotError {
  readonly code = 'REMOTE_FETCH';

  constructor(
    readonly url: string,
    readonly status: number | undefined,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class QuestionFormatError extends QuizBotError {
  readonly code = 'QUESTION_FORMAT';

  constructor(readonly chapter: string, message: string, options?: { cause?: unknown }) {
    super(`Chapter '${chapter}': ${message}`, options);
  }
}

export class MalformedTokenError extends QuizBotError {
  readonly code = 'MALFORMED_TOKEN';
}

export class InvalidSelectionError extends QuizBotError {
  readonly code = 'INVALID_SELECTION';

  constructor(readonly selectedIndex: number, readonly optionCount: number) {
    super(`Option index ${selectedIndex} is out of range for ${optionCount} option(s)`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
