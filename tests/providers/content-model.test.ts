/**
 * Tests for content models and bounded model invocation.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ProviderContentModel,
  invokeModel,
  type ContentModel,
  type ContentCallOptions,
} from '../../src/providers/content-model.js';
import { ProviderError, type ChatOptions, type ChatResponse, type LLMProvider, type Message } from '../../src/providers/types.js';
import { CallLimiter } from '../../src/utilities/call-limiter.js';
import { CancellationError, ModelTimeoutError } from '../../src/errors/index.js';

function recordingProvider(answer: string, stopReason: ChatResponse['stopReason'] = 'end_turn') {
  const calls: Array<{ messages: Message[]; options?: ChatOptions }> = [];
  const provider: LLMProvider = {
    name: 'recording',
    defaultModel: 'recording-1',
    chat: async (messages, options) => {
      calls.push({ messages, options });
      return { content: answer, stopReason };
    },
  };
  return { provider, calls };
}

function fixedModel(generate: (options?: ContentCallOptions) => Promise<string>): ContentModel {
  return { id: 'fixed', provider: 'test', generate: (_prompt, options) => generate(options) };
}

function hang(options?: ContentCallOptions): Promise<string> {
  return new Promise((_, reject) => {
    options?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

describe('ProviderContentModel', () => {
  it('should send the system and user prompt as chat messages', async () => {
    const { provider, calls } = recordingProvider('<svg/>');
    const model = new ProviderContentModel('recording-2', provider);

    const text = await model.generate({ system: 'Be precise.', prompt: 'Draw it.' });

    expect(text).toBe('<svg/>');
    expect(model.provider).toBe('recording');
    expect(calls[0].messages).toEqual([
      { role: 'system', content: 'Be precise.' },
      { role: 'user', content: 'Draw it.' },
    ]);
    expect(calls[0].options).toEqual({ model: 'recording-2', signal: undefined });
  });

  it('should omit an absent system prompt', async () => {
    const { provider, calls } = recordingProvider('ok');

    await new ProviderContentModel('m', provider).generate({ prompt: 'Only this.' });

    expect(calls[0].messages).toEqual([{ role: 'user', content: 'Only this.' }]);
  });

  it('should reject an answer cut off at the output token limit', async () => {
    const { provider } = recordingProvider('<svg><rect', 'max_tokens');

    const error = await new ProviderContentModel('recording-2', provider)
      .generate({ prompt: 'Draw it.' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      code: 'OUTPUT_TRUNCATED',
      provider: 'recording',
      message: 'Model "recording-2" stopped at the output token limit before finishing its answer',
      recoverable: false,
    });
  });
});

describe('invokeModel', () => {
  it('should return the model answer', async () => {
    const model = fixedModel(async () => 'answer');

    await expect(invokeModel(model, { prompt: 'p' }, { timeoutMs: 1000 })).resolves.toBe('answer');
  });

  it('should fail with ModelTimeoutError when the budget elapses', async () => {
    let sawAbort = false;
    const model = fixedModel((options) => {
      options?.signal?.addEventListener('abort', () => {
        sawAbort = true;
      });
      return hang(options);
    });

    const error = await invokeModel(model, { prompt: 'p' }, { timeoutMs: 20 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelTimeoutError);
    expect(error).toHaveProperty('message', 'Model "fixed" did not answer within 20ms');
    expect(sawAbort).toBe(true);
  });

  it('should time out even when the model ignores its signal', async () => {
    const model = fixedModel(() => new Promise<string>(() => {}));

    await expect(invokeModel(model, { prompt: 'p' }, { timeoutMs: 20 })).rejects.toBeInstanceOf(ModelTimeoutError);
  });

  it('should fail with CancellationError when the run is aborted mid-call', async () => {
    const controller = new AbortController();
    const model = fixedModel(hang);

    const pending = invokeModel(model, { prompt: 'p' }, { timeoutMs: 5000, signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancellationError);
  });

  it('should not call the model after cancellation', async () => {
    const controller = new AbortController();
    controller.abort();
    const generate = vi.fn(async () => 'never');

    await expect(
      invokeModel(fixedModel(generate), { prompt: 'p' }, { timeoutMs: 1000, signal: controller.signal })
    ).rejects.toBeInstanceOf(CancellationError);
    expect(generate).not.toHaveBeenCalled();
  });

  it('should pass model errors through', async () => {
    const model = fixedModel(async () => {
      throw new Error('HTTP 500');
    });

    await expect(invokeModel(model, { prompt: 'p' }, { timeoutMs: 1000 })).rejects.toThrow('HTTP 500');
  });

  it('should hold a limiter slot for the duration of each call', async () => {
    const limiter = new CallLimiter(2);
    let inFlight = 0;
    let peak = 0;
    const model = fixedModel(async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 10));
      inFlight--;
      return 'ok';
    });

    const answers = await Promise.all(
      Array.from({ length: 5 }, () => invokeModel(model, { prompt: 'p' }, { timeoutMs: 1000, limiter }))
    );

    expect(answers).toEqual(['ok', 'ok', 'ok', 'ok', 'ok']);
    expect(peak).toBe(2);
    expect(limiter.getStats()).toMatchObject({ active: 0, waiting: 0, totalAcquires: 5, peakActive: 2 });
  });
});
