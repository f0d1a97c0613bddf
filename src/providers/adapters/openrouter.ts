/**
 * OpenRouter Provider Adapter
 *
 * OpenRouter speaks the OpenAI wire format and serves `vendor/model` ids
 * (e.g. `anthropic/claude-sonnet-4`, `google/gemini-2.0-flash-001`) through
 * a single API key.
 */

import type { LLMProvider, Message, ChatOptions, ChatResponse } from '../types.js';
import { MAX_OUTPUT_TOKENS, ProviderError } from '../types.js';
import { registerProvider, requireEnv } from '../provider.js';
import { resilientFetch, ResilientFetchError } from '../resilient-fetch.js';
import { toError } from '../../errors/index.js';

interface OpenRouterCompletion {
  choices: Array<{
    message: { content: string | null };
    finish_reason: string | null;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
  };
  error?: { message: string; code?: number };
}

// =============================================================================
// OPENROUTER PROVIDER
// =============================================================================

export class OpenRouterProvider implements LLMProvider {
  readonly name = 'openrouter';
  readonly defaultModel = 'google/gemini-2.0-flash-001';

  private apiKey = requireEnv('OPENROUTER_API_KEY');
  private baseUrl = 'https://openrouter.ai/api/v1';
  /** Attribution headers shown on openrouter.ai */
  private siteUrl = process.env.OPENROUTER_SITE_URL;
  private siteName = process.env.OPENROUTER_SITE_NAME;

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const body = {
      model: options?.model ?? this.defaultModel,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      max_tokens: MAX_OUTPUT_TOKENS,
    };

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Authorization': `Bearer ${this.apiKey}`,
    };
    if (this.siteUrl) {
      headers['HTTP-Referer'] = this.siteUrl;
    }
    if (this.siteName) {
      headers['X-Title'] = this.siteName;
    }

    try {
      const response = await resilientFetch({
        provider: this.name,
        url: `${this.baseUrl}/chat/completions`,
        init: {
          method: 'POST',
          headers,
          body: JSON.stringify(body),
        },
        signal: options?.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw this.handleError(response.status, error);
      }

      const data = await response.json() as OpenRouterCompletion;

      // OpenRouter reports some upstream failures inside a 200 body
      if (data.error) {
        throw new ProviderError(`OpenRouter upstream error: ${data.error.message}`, this.name, 'SERVER_ERROR');
      }

      const choice = data.choices[0];
      if (!choice) {
        throw new ProviderError('OpenRouter returned no choices', this.name, 'UNKNOWN');
      }

      return {
        content: choice.message.content ?? '',
        stopReason: choice.finish_reason === 'length' ? 'max_tokens' : 'end_turn',
        usage: data.usage && {
          inputTokens: data.usage.prompt_tokens,
          outputTokens: data.usage.completion_tokens,
        },
      };
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      if (error instanceof ResilientFetchError) throw error.toProviderError();
      const cause = toError(error);
      throw new ProviderError(`OpenRouter request failed: ${cause.message}`, this.name, 'UNKNOWN', cause);
    }
  }

  private handleError(status: number, body: string): ProviderError {
    let code: ProviderError['code'] = 'UNKNOWN';
    if (status === 401 || status === 403) code = 'AUTHENTICATION_FAILED';
    else if (status === 402 || status === 400 || status === 404) code = 'INVALID_REQUEST';
    else if (status === 429) code = 'RATE_LIMITED';
    else if (status >= 500) code = 'SERVER_ERROR';

    return new ProviderError(`OpenRouter API error (${status}): ${body}`, this.name, code);
  }
}

// =============================================================================
// REGISTRATION
// =============================================================================

registerProvider('openrouter', {
  priority: 2,
  envKey: 'OPENROUTER_API_KEY',
  matches: (model) => model.includes('/'),
  create: () => new OpenRouterProvider(),
});
