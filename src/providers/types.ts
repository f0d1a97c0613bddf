/**
 * Provider Abstraction Types
 *
 * Types shared by every LLM provider adapter.
 */

import { ErrorCategory, WorkflowError } from '../errors/index.js';

// =============================================================================
// MESSAGE TYPES
// =============================================================================

export interface Message {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

// =============================================================================
// PROVIDER INTERFACE
// =============================================================================

/**
 * Options for chat requests.
 */
export interface ChatOptions {
  /** Model override (uses provider default if not specified) */
  model?: string;

  /** Aborts the request (and any pending retry) when fired */
  signal?: AbortSignal;
}

export interface ChatResponse {
  /** The assistant's response text */
  content: string;

  /** Why the response stopped */
  stopReason: 'end_turn' | 'max_tokens' | 'stop_sequence';

  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

/**
 * The core LLM provider interface.
 * All providers must implement this.
 */
export interface LLMProvider {
  /** Provider name for logging/debugging */
  readonly name: string;

  /** Model used when a request names none */
  readonly defaultModel: string;

  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}

/** Output budget sent to every vendor; a chart's SVG runs to a few thousand tokens */
export const MAX_OUTPUT_TOKENS = 8192;

export type ProviderName = 'openai' | 'anthropic' | 'openrouter' | 'mock';

// =============================================================================
// PROVIDER ERRORS
// =============================================================================

export type ProviderErrorCode =
  | 'AUTHENTICATION_FAILED'
  | 'RATE_LIMITED'
  | 'CONTEXT_LENGTH_EXCEEDED'
  | 'OUTPUT_TRUNCATED'
  | 'INVALID_REQUEST'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'UNKNOWN';

const CODE_CATEGORY: Record<ProviderErrorCode, ErrorCategory> = {
  AUTHENTICATION_FAILED: ErrorCategory.PERMANENT,
  RATE_LIMITED: ErrorCategory.RATE_LIMITED,
  CONTEXT_LENGTH_EXCEEDED: ErrorCategory.PERMANENT,
  OUTPUT_TRUNCATED: ErrorCategory.PERMANENT,
  INVALID_REQUEST: ErrorCategory.PERMANENT,
  SERVER_ERROR: ErrorCategory.TRANSIENT,
  NETWORK_ERROR: ErrorCategory.TRANSIENT,
  TIMEOUT: ErrorCategory.TRANSIENT,
  CANCELLED: ErrorCategory.CANCELLED,
  UNKNOWN: ErrorCategory.INTERNAL,
};

/**
 * Error raised by a provider adapter.
 */
export class ProviderError extends WorkflowError {
  readonly provider: string;
  readonly code: ProviderErrorCode;

  constructor(message: string, provider: string, code: ProviderErrorCode, cause?: Error) {
    const category = CODE_CATEGORY[code];
    super(
      message,
      category,
      category === ErrorCategory.TRANSIENT || category === ErrorCategory.RATE_LIMITED,
      { provider, code },
      cause
    );
    this.name = 'ProviderError';
    this.provider = provider;
    this.code = code;
  }
}
