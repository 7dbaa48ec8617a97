import { describe, expect, it } from 'vitest';
import { MalformedTokenError } from '../src/utils/errors';
import { buildQuestionKeyboard, encodeQuestionChoices } from '../src/utils/quizKeyboard';
import { makeAdditionQuestion } from './helpers';

describe('encodeQuestionChoices', () => {
  it('returns one choice per option in option order', () => {
    expect(encodeQuestionChoices(makeAdditionQuestion(), 'ch1')).toEqual([
      { label: '3', token: 'ch1|1|0' },
      { label: '4', token: 'ch1|1|1' },
      { label: '5', token: 'ch1|1|2' },
    ]);
  });
});

describe('buildQuestionKeyboard', () => {
  it('puts each option on its own row with the choice token as callback data', () => {
    const keyboard = buildQuestionKeyboard(makeAdditionQuestion(), 'ch1');
    const rows = keyboard.inline_keyboard.filter((row) => row.length > 0);

    expect(rows.map((row) => row.length)).toEqual([1, 1, 1]);
    expect(
      rows.flat().map((b) => [b.text, 'callback_data' in b ? b.callback_data : undefined])
    ).toEqual([
      ['3', 'ch1|1|0'],
      ['4', 'ch1|1|1'],
      ['5', 'ch1|1|2'],
    ]);
  });

  it('refuses tokens that Telegram would reject', () => {
    expect(() => buildQuestionKeyboard(makeAdditionQuestion(), 'x'.repeat(70))).toThrow(
      MalformedTokenError
    );
  });
});
