import { QuizBotError, errorMessage } from './errors';

/** Where a failed unit of work stopped, and what it was working on. */
export interface FailureContext {
  source: string;
  type: string;
  stage: string;
  chapter?: string;
  questionId?: number;
  /** Copied into the payload next to the fields above. */
  details?: Record<string, string | number>;
}

/**
 * Log one failed send or button press as a single JSON line, so failures
 * can be grepped by `type`, `stage` or `errorCode`.
 */
export function logFailure(
  label: string,
  context: FailureContext,
  error: unknown,
  fallbackCode = 'UNEXPECTED'
): void {
  const { details, ...fields } = context;
  const payload = {
    level: 'error',
    ...fields,
    ...details,
    errorCode: error instanceof QuizBotError ? error.code : fallbackCode,
    errorMessage: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
    timestamp: new Date().toISOString(),
  };
  console.error(label, JSON.stringify(payload));
}
