import type { Question, SelectionMode } from '../types/quiz';

export type RandomSource = () => number;

function pickIndex(length: number, random: RandomSource): number {
  return Math.min(length - 1, Math.floor(random() * length));
}

export class QuestionSelector {
  constructor(private readonly random: RandomSource = Math.random) {}

  /**
   * `sequential` always yields the first configured chapter; it does not
   * advance between runs. An empty list is rejected at config load, so it is
   * not handled here.
   */
  pickChapter(chapters: readonly string[], mode: SelectionMode): string {
    if (mode === 'sequential') {
      return chapters[0];
    }
    return chapters[pickIndex(chapters.length, this.random)];
  }

  /** Uniform pick. Callers reject an empty chapter before calling. */
  pickQuestion(questions: readonly Question[]): Question {
    return questions[pickIndex(questions.length, this.random)];
  }
}
