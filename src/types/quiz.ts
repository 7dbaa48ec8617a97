/**
 * Quiz data shared by the question store, keyboard, renderer and dispatcher.
 */

export interface QuizOption {
  text: string;
  /** false when the source file omits it */
  correct: boolean;
  /** "" when the source file omits it */
  explanation: string;
}

export interface Question {
  /** Unique within its chapter */
  id: number;
  question: string;
  options: QuizOption[];
}

/** What a button press carries back: everything needed to re-render the answer. */
export interface ChoiceToken {
  chapter: string;
  questionId: number;
  optionIndex: number;
}

export type SelectionMode = 'random' | 'sequential';

export const SELECTION_MODES: readonly SelectionMode[] = ['random', 'sequential'];

export interface KeyboardChoice {
  label: string;
  token: string;
}

export interface BatchReport {
  attempted: number;
  sent: number;
  failed: number;
}
