/**
 * Anthropic Claude Provider Adapter
 *
 * Adapts the Anthropic Messages API to our LLMProvider interface.
 */

import type { LLMProvider, Message, ChatOptions, ChatResponse } from '../types.js';
import { MAX_OUTPUT_TOKENS, ProviderError } from '../types.js';
import { registerProvider, requireEnv } from '../provider.js';
import { resilientFetch, ResilientFetchError } from '../resilient-fetch.js';
import { toError } from '../../errors/index.js';

interface AnthropicMessagesResponse {
  content: Array<{ type: string; text?: string }>;
  stop_reason: string;
  usage: {
    input_tokens: number;
    output_tokens: number;
  };
}

// =============================================================================
// ANTHROPIC PROVIDER
// =============================================================================

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  readonly defaultModel = 'claude-sonnet-4-20250514';

  private apiKey = requireEnv('ANTHROPIC_API_KEY');
  private baseUrl = 'https://api.anthropic.com';

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const model = options?.model ?? this.defaultModel;

    // System prompt travels outside the conversation
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const conversation = messages
      .filter((m): m is Message & { role: 'user' | 'assistant' } => m.role !== 'system')
      .map((m) => ({ role: m.role, content: m.content }));

    const body = {
      model,
      max_tokens: MAX_OUTPUT_TOKENS,
      ...(system && { system }),
      messages: conversation,
    };

    try {
      const response = await resilientFetch({
        provider: this.name,
        url: `${this.baseUrl}/v1/messages`,
        init: {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'x-api-key': this.apiKey,
            'anthropic-version': '2023-06-01',
          },
          body: JSON.stringify(body),
        },
        signal: options?.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw this.handleError(response.status, error);
      }

      const data = await response.json() as AnthropicMessagesResponse;

      const content = data.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join('');

      return {
        content,
        stopReason: this.mapStopReason(data.stop_reason),
        usage: {
          inputTokens: data.usage.input_tokens,
          outputTokens: data.usage.output_tokens,
        },
      };
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      if (error instanceof ResilientFetchError) throw error.toProviderError();
      const cause = toError(error);
      throw new ProviderError(`Anthropic request failed: ${cause.message}`, this.name, 'UNKNOWN', cause);
    }
  }

  private handleError(status: number, body: string): ProviderError {
    let code: ProviderError['code'] = 'UNKNOWN';

    if (status === 401 || status === 403) code = 'AUTHENTICATION_FAILED';
    else if (status === 429) code = 'RATE_LIMITED';
    else if (status === 400) {
      code = body.includes('prompt is too long') ? 'CONTEXT_LENGTH_EXCEEDED' : 'INVALID_REQUEST';
    }
    else if (status === 404) code = 'INVALID_REQUEST';
    else if (status >= 500) code = 'SERVER_ERROR';

    return new ProviderError(`Anthropic API error (${status}): ${body}`, this.name, code);
  }

  private mapStopReason(reason: string): ChatResponse['stopReason'] {
    switch (reason) {
      case 'max_tokens': return 'max_tokens';
      case 'stop_sequence': return 'stop_sequence';
      default: return 'end_turn';
    }
  }
}

// =============================================================================
// REGISTRATION
// =============================================================================

registerProvider('anthropic', {
  priority: 1,
  envKey: 'ANTHROPIC_API_KEY',
  matches: (model) => /^claude[-\w.]*$/i.test(model),
  create: () => new AnthropicProvider(),
});
