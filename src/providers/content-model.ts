/**
 * Content Models
 *
 * The workflow only needs one capability from a model: turn a prompt into a
 * text payload. `ContentModel` is that capability; `ProviderContentModel`
 * backs it with any registered LLM provider, so the generator and the
 * evaluator can each be pointed at a different vendor by model id alone.
 */

import { ProviderError, type LLMProvider } from './types.js';
import { getProviderForModel } from './provider.js';
import { CancellationError, ModelTimeoutError } from '../errors/index.js';
import type { CallLimiter } from '../utilities/call-limiter.js';
import { logger } from '../utilities/logger.js';

// =============================================================================
// CAPABILITY INTERFACE
// =============================================================================

export interface ContentPrompt {
  /** Standing instructions (role, output format) */
  system?: string;
  /** The task itself */
  prompt: string;
}

export interface ContentCallOptions {
  signal?: AbortSignal;
}

export interface ContentModel {
  /** Model identifier, e.g. `gpt-4o-mini` or `anthropic/claude-sonnet-4` */
  readonly id: string;
  /** Provider serving the model */
  readonly provider: string;
  generate(prompt: ContentPrompt, options?: ContentCallOptions): Promise<string>;
}

/**
 * Resolves model identifiers to content models.
 */
export type ContentModelFactory = (modelId: string) => ContentModel;

// =============================================================================
// PROVIDER-BACKED IMPLEMENTATION
// =============================================================================

export class ProviderContentModel implements ContentModel {
  readonly provider: string;

  constructor(
    readonly id: string,
    private readonly llm: LLMProvider
  ) {
    this.provider = llm.name;
  }

  /**
   * @throws ProviderError (OUTPUT_TRUNCATED) when the answer was cut off at
   *   the output token limit
   */
  async generate(prompt: ContentPrompt, options?: ContentCallOptions): Promise<string> {
    const response = await this.llm.chat(
      [
        ...(prompt.system ? [{ role: 'system' as const, content: prompt.system }] : []),
        { role: 'user' as const, content: prompt.prompt },
      ],
      { model: this.id, signal: options?.signal }
    );

    logger.debug('Model answered', {
      model: this.id,
      provider: this.provider,
      stopReason: response.stopReason,
      ...response.usage,
    });

    if (response.stopReason === 'max_tokens') {
      throw new ProviderError(
        `Model "${this.id}" stopped at the output token limit before finishing its answer`,
        this.provider,
        'OUTPUT_TRUNCATED'
      );
    }
    return response.content;
  }
}

/**
 * Default factory: route the id through the provider registry.
 */
export const createContentModel: ContentModelFactory = (modelId) =>
  new ProviderContentModel(modelId, getProviderForModel(modelId));

// =============================================================================
// BOUNDED INVOCATION
// =============================================================================

export interface InvokeOptions {
  /** Per-call time budget; the call is aborted and fails once it elapses */
  timeoutMs: number;
  /** Run-wide cancellation */
  signal?: AbortSignal;
  /** Shared bound on concurrent model calls */
  limiter?: CallLimiter;
}

/**
 * Call a model under the shared limiter and a per-call timeout.
 *
 * Throws ModelTimeoutError when the budget elapses (time spent waiting for a
 * limiter slot does not count), CancellationError when the run is aborted,
 * and otherwise whatever the model threw.
 */
export async function invokeModel(
  model: ContentModel,
  prompt: ContentPrompt,
  options: InvokeOptions
): Promise<string> {
  const { timeoutMs, signal, limiter } = options;

  const call = async (): Promise<string> => {
    if (signal?.aborted) {
      throw new CancellationError('Run cancelled before the model call started', { model: model.id });
    }

    const controller = new AbortController();
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    // Rejects on timeout or cancellation even if the model ignores its signal
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
        reject(new ModelTimeoutError(model.id, timeoutMs));
      }, timeoutMs);
      controller.signal.addEventListener(
        'abort',
        () => {
          if (!timedOut) reject(new CancellationError('Run cancelled during the model call', { model: model.id }));
        },
        { once: true }
      );
    });

    try {
      return await Promise.race([model.generate(prompt, { signal: controller.signal }), deadline]);
    } catch (error) {
      if (timedOut) throw new ModelTimeoutError(model.id, timeoutMs);
      if (signal?.aborted) throw new CancellationError('Run cancelled during the model call', { model: model.id });
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  };

  return limiter ? limiter.run(call, signal) : call();
}
