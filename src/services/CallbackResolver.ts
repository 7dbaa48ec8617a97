import { decodeChoiceToken } from '../utils/choiceToken';
import { MalformedTokenError } from '../utils/errors';
import { QUESTION_NOT_FOUND_TEXT, renderResult } from '../utils/quizMessage';
import type { QuestionLoader } from './QuizDispatcher';

/**
 * Turns a pressed button's token back into the reveal text.
 *
 * There is no session: the chapter is loaded again and the question found
 * by id. If the bank changed and the id is gone, the user gets a "not found"
 * text instead of an error. Malformed tokens, chapters outside the configured
 * set, out-of-range options and load failures are thrown for the caller to
 * convert.
 */
export class CallbackResolver {
  constructor(
    private readonly store: QuestionLoader,
    private readonly chapters: readonly string[]
  ) {}

  async resolve(token: string): Promise<string> {
    const { chapter, questionId, optionIndex } = decodeChoiceToken(token);
    // callback_data comes from the client and is not trusted
    if (!this.chapters.includes(chapter)) {
      throw new MalformedTokenError(`Choice token names unknown chapter '${chapter}'`);
    }

    const questions = await this.store.load(chapter);
    const question = questions.find((q) => q.id === questionId);
    if (!question) {
      console.warn(`[Callback] Question id=${questionId} no longer in chapter=${chapter}`);
      return QUESTION_NOT_FOUND_TEXT;
    }
    return renderResult(question, optionIndex);
  }
}
