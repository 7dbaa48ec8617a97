import { InlineKeyboard } from 'grammy';
import type { KeyboardChoice, Question } from '../types/quiz';
import { encodeChoiceToken, fitsCallbackData, MAX_CALLBACK_DATA_BYTES } from './choiceToken';
import { MalformedTokenError } from './errors';

/**
 * One choice per option, in option order. The reveal later indexes options
 * by the same position, so the order must not change here.
 */
export function encodeQuestionChoices(question: Question, chapter: string): KeyboardChoice[] {
  return question.options.map((option, index) => ({
    label: option.text,
    token: encodeChoiceToken(chapter, question.id, index),
  }));
}

/** Builds the inline keyboard: one button per row. */
export function buildQuestionKeyboard(question: Question, chapter: string): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  for (const choice of encodeQuestionChoices(question, chapter)) {
    if (!fitsCallbackData(choice.token)) {
      throw new MalformedTokenError(
        `Choice token '${choice.token}' exceeds ${MAX_CALLBACK_DATA_BYTES} bytes; shorten the chapter name`
      );
    }
    keyboard.row({ text: choice.label, callback_data: choice.token });
  }
  return keyboard;
}
