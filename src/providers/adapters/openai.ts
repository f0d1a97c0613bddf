/**
 * OpenAI Provider Adapter
 *
 * Adapts the OpenAI chat completions API to our LLMProvider interface.
 * `OPENAI_BASE_URL` points it at any OpenAI-compatible endpoint.
 */

import type { LLMProvider, Message, ChatOptions, ChatResponse } from '../types.js';
import { MAX_OUTPUT_TOKENS, ProviderError } from '../types.js';
import { registerProvider, requireEnv } from '../provider.js';
import { resilientFetch, ResilientFetchError } from '../resilient-fetch.js';
import { toError } from '../../errors/index.js';

// =============================================================================
// OPENAI API TYPES
// =============================================================================

/** OpenAI chat completion response */
interface OpenAIChatCompletion {
  id: string;
  model: string;
  choices: Array<{
    index: number;
    message: {
      role: string;
      content: string | null;
    };
    finish_reason: string;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

// =============================================================================
// OPENAI PROVIDER
// =============================================================================

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai';
  readonly defaultModel = 'gpt-4o-mini';

  private apiKey = requireEnv('OPENAI_API_KEY');
  private baseUrl = (process.env.OPENAI_BASE_URL || 'https://api.openai.com').replace(/\/+$/, '');
  private organization = process.env.OPENAI_ORG_ID;

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const body = {
      model: options?.model ?? this.defaultModel,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      max_completion_tokens: MAX_OUTPUT_TOKENS,
    };

    try {
      const response = await resilientFetch({
        provider: this.name,
        url: `${this.baseUrl}/v1/chat/completions`,
        init: {
          method: 'POST',
          headers: this.buildHeaders(),
          body: JSON.stringify(body),
        },
        signal: options?.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw this.handleError(response.status, error);
      }

      const data = await response.json() as OpenAIChatCompletion;
      return this.parseResponse(data);
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      if (error instanceof ResilientFetchError) throw error.toProviderError();
      const cause = toError(error);
      throw new ProviderError(`OpenAI request failed: ${cause.message}`, this.name, 'UNKNOWN', cause);
    }
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Authorization': `Bearer ${this.apiKey}`,
    };
    if (this.organization) {
      headers['OpenAI-Organization'] = this.organization;
    }
    return headers;
  }

  private parseResponse(data: OpenAIChatCompletion): ChatResponse {
    const choice = data.choices[0];
    if (!choice) {
      throw new ProviderError('OpenAI returned no choices', this.name, 'UNKNOWN');
    }

    return {
      content: choice.message.content ?? '',
      stopReason: this.mapStopReason(choice.finish_reason),
      usage: data.usage && {
        inputTokens: data.usage.prompt_tokens,
        outputTokens: data.usage.completion_tokens,
      },
    };
  }

  private handleError(status: number, body: string): ProviderError {
    let code: ProviderError['code'] = 'UNKNOWN';

    if (status === 401 || status === 403) code = 'AUTHENTICATION_FAILED';
    else if (status === 429) code = 'RATE_LIMITED';
    else if (status === 400) {
      if (body.includes('context_length') || body.includes('maximum context length')) {
        code = 'CONTEXT_LENGTH_EXCEEDED';
      } else {
        code = 'INVALID_REQUEST';
      }
    }
    else if (status === 404) code = 'INVALID_REQUEST';
    else if (status >= 500) code = 'SERVER_ERROR';

    return new ProviderError(
      `OpenAI API error (${status}): ${body}`,
      this.name,
      code
    );
  }

  private mapStopReason(reason: string): ChatResponse['stopReason'] {
    switch (reason) {
      case 'length': return 'max_tokens';
      default: return 'end_turn';
    }
  }
}

// =============================================================================
// REGISTRATION
// =============================================================================

registerProvider('openai', {
  priority: 100,
  envKey: 'OPENAI_API_KEY',
  matches: () => true,
  create: () => new OpenAIProvider(),
});
