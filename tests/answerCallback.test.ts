import { GrammyError } from 'grammy';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { answerCallback } from '../src/handlers/answerCallback';
import { CallbackResolver } from '../src/services/CallbackResolver';
import { QuestionStore } from '../src/services/QuestionStore';
import { MalformedTokenError } from '../src/utils/errors';
import { ANSWER_ERROR_TEXT } from '../src/utils/quizMessage';
import { fixturesDir } from './helpers';

function makeContext(data?: string) {
  return {
    callbackQuery: { data },
    answerCallbackQuery: vi.fn().mockResolvedValue(true),
    editMessageText: vi.fn().mockResolvedValue(true),
  };
}

function notModifiedError() {
  return new GrammyError(
    "Call to 'editMessageText' failed!",
    {
      ok: false,
      error_code: 400,
      description:
        'Bad Request: message is not modified: specified new message content and reply markup are exactly the same as a current content and reply markup of the message',
    },
    'editMessageText',
    {}
  );
}

let errorSpy: MockInstance<typeof console.error>;

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('answerCallback', () => {
  it('acknowledges before resolving, then edits the message with HTML', async () => {
    const ctx = makeContext('ch1|1|1');
    const resolver = { resolve: vi.fn().mockResolvedValue('<b>reveal</b>') };

    await answerCallback(ctx, resolver);

    expect(ctx.answerCallbackQuery).toHaveBeenCalledTimes(1);
    expect(ctx.answerCallbackQuery.mock.invocationCallOrder[0]).toBeLessThan(
      resolver.resolve.mock.invocationCallOrder[0]
    );
    expect(resolver.resolve).toHaveBeenCalledWith('ch1|1|1');
    expect(ctx.editMessageText).toHaveBeenCalledWith('<b>reveal</b>', { parse_mode: 'HTML' });
  });

  it('replaces the message with a generic error when resolving fails', async () => {
    const ctx = makeContext('garbage');
    const resolver = {
      resolve: vi.fn().mockRejectedValue(new MalformedTokenError('Expected 3 fields in choice token, got 1')),
    };

    await answerCallback(ctx, resolver);

    expect(ctx.answerCallbackQuery).toHaveBeenCalledTimes(1);
    expect(ctx.editMessageText).toHaveBeenCalledTimes(1);
    expect(ctx.editMessageText).toHaveBeenCalledWith(ANSWER_ERROR_TEXT);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    const [label, json] = errorSpy.mock.calls[0];
    expect(label).toBe('[Callback] Answer processing failed:');
    const payload = JSON.parse(String(json));
    expect(payload).toMatchObject({
      level: 'error',
      source: 'Callback',
      type: 'callback_failed',
      stage: 'resolve',
      token: 'garbage',
      errorCode: 'MALFORMED_TOKEN',
      errorMessage: 'Expected 3 fields in choice token, got 1',
    });
    expect(payload).not.toHaveProperty('chapter');
  });

  it('logs the chapter, question id and edit stage when the edit fails', async () => {
    const ctx = makeContext('ch1|1|1');
    ctx.editMessageText
      .mockRejectedValueOnce(new Error('Bad Request: message to edit not found'))
      .mockResolvedValueOnce(true);
    const resolver = { resolve: vi.fn().mockResolvedValue('<b>reveal</b>') };

    await answerCallback(ctx, resolver);

    expect(JSON.parse(String(errorSpy.mock.calls[0][1]))).toMatchObject({
      stage: 'edit',
      chapter: 'ch1',
      questionId: 1,
      errorCode: 'UNEXPECTED',
      errorMessage: 'Bad Request: message to edit not found',
    });
    expect(ctx.editMessageText).toHaveBeenLastCalledWith(ANSWER_ERROR_TEXT);
  });

  it('keeps the reveal when a second tap would not change the message', async () => {
    const ctx = makeContext('ch1|1|1');
    ctx.editMessageText.mockRejectedValueOnce(notModifiedError());
    const resolver = { resolve: vi.fn().mockResolvedValue('<b>reveal</b>') };

    await answerCallback(ctx, resolver);

    expect(ctx.editMessageText).toHaveBeenCalledTimes(1);
    expect(ctx.editMessageText).toHaveBeenCalledWith('<b>reveal</b>', { parse_mode: 'HTML' });
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('turns an out-of-range option from a real chapter into the generic error', async () => {
    const ctx = makeContext('ch1|1|9');
    const resolver = new CallbackResolver(
      new QuestionStore({ questionsDir: fixturesDir, remoteTimeoutMs: 15000, remoteRetries: 0 }),
      ['ch1']
    );

    await answerCallback(ctx, resolver);

    expect(ctx.editMessageText).toHaveBeenCalledWith(ANSWER_ERROR_TEXT);
  });

  it('passes an empty token when the button carried no data', async () => {
    const ctx = makeContext(undefined);
    const resolver = { resolve: vi.fn().mockRejectedValue(new MalformedTokenError('empty')) };

    await answerCallback(ctx, resolver);

    expect(resolver.resolve).toHaveBeenCalledWith('');
    expect(ctx.editMessageText).toHaveBeenCalledWith(ANSWER_ERROR_TEXT);
  });
});
