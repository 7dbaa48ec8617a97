import { GrammyError } from 'grammy';
import type { CallbackResolver } from '../services/CallbackResolver';
import { decodeChoiceToken } from '../utils/choiceToken';
import { MalformedTokenError } from '../utils/errors';
import { logFailure } from '../utils/failureLog';
import { ANSWER_ERROR_TEXT } from '../utils/quizMessage';

/** The slice of grammy's callback-query context this handler touches. */
export interface AnswerContext {
  callbackQuery: { data?: string };
  answerCallbackQuery(): Promise<unknown>;
  editMessageText(text: string, other?: { parse_mode?: 'HTML' }): Promise<unknown>;
}

/** Telegram refuses an edit that would leave the message unchanged (e.g. a double tap). */
function isMessageNotModified(error: unknown): boolean {
  return error instanceof GrammyError && error.description.includes('message is not modified');
}

function describeToken(token: string): { chapter?: string; questionId?: number } {
  try {
    const { chapter, questionId } = decodeChoiceToken(token);
    return { chapter, questionId };
  } catch (error) {
    if (error instanceof MalformedTokenError) return {};
    throw error;
  }
}

/**
 * Button press: acknowledge immediately (clears the spinner), then replace
 * the question with the reveal. Any failure ends as a generic message.
 */
export async function answerCallback(
  ctx: AnswerContext,
  resolver: Pick<CallbackResolver, 'resolve'>
): Promise<void> {
  await ctx.answerCallbackQuery();

  const token = ctx.callbackQuery.data ?? '';
  let stage: 'resolve' | 'edit' = 'resolve';
  try {
    const text = await resolver.resolve(token);
    stage = 'edit';
    await ctx.editMessageText(text, { parse_mode: 'HTML' });
  } catch (error) {
    if (stage === 'edit' && isMessageNotModified(error)) {
      console.log(`[Callback] Reveal for '${token}' is already shown`);
      return;
    }
    logFailure(
      '[Callback] Answer processing failed:',
      {
        source: 'Callback',
        type: 'callback_failed',
        stage,
        ...describeToken(token),
        details: { token },
      },
      error
    );
    await ctx.editMessageText(ANSWER_ERROR_TEXT);
  }
}
