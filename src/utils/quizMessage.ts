import type { Question } from '../types/quiz';
import { InvalidSelectionError } from './errors';

export const CORRECT_MARKER = '✅';
export const INCORRECT_MARKER = '❌';
export const NEUTRAL_MARKER = '▫️';

export const START_TEXT = "Bot active ✅. You'll get scheduled quizzes at configured time.";
export const QUESTION_NOT_FOUND_TEXT = 'Question data not found.';
export const ANSWER_ERROR_TEXT = 'An error occurred while processing your answer.';

const escape = (text: string) => text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

/** Outbound question text (HTML): chapter label, then the question. */
export function formatQuestionMessage(chapter: string, question: Question): string {
  return `📚 <b>${escape(chapter)}</b>\n\n❓ ${escape(question.question)}`;
}

/**
 * Reveal shown in place of the question after a button press.
 *
 * The correct option is the first one flagged `correct`; with none flagged,
 * no line gets the correct marker. The explanation comes from the option the
 * user picked, not from the correct one.
 */
export function renderResult(question: Question, selectedIndex: number): string {
  const { options } = question;
  if (!Number.isInteger(selectedIndex) || selectedIndex < 0 || selectedIndex >= options.length) {
    throw new InvalidSelectionError(selectedIndex, options.length);
  }

  const correctIndex = options.findIndex((o) => o.correct);

  const lines = [`<b>❓ ${escape(question.question)}</b>\n`];
  options.forEach((option, i) => {
    let prefix = NEUTRAL_MARKER;
    if (i === correctIndex) {
      prefix = CORRECT_MARKER;
    } else if (i === selectedIndex) {
      prefix = INCORRECT_MARKER;
    }
    lines.push(`${prefix} ${escape(option.text)}`);
  });
  lines.push(`\n💡 ${escape(options[selectedIndex].explanation)}`);
  return lines.join('\n');
}
