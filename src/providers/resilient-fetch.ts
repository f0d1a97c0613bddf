/**
 * Resilient Fetch
 *
 * The HTTP transport under every vendor adapter. One chat request is
 * retried while its failure is worth retrying (connection errors, attempt
 * timeouts, 429 and 5xx answers); any other status is handed back for the
 * adapter to map. The caller's signal carries the per-call deadline and run
 * cancellation, and stops both the request and the wait between attempts.
 */

import { ProviderError, type ProviderErrorCode } from './types.js';
import { toError } from '../errors/index.js';
import { logger } from '../utilities/logger.js';

// =============================================================================
// TYPES
// =============================================================================

export interface RetryPolicy {
  /** Budget of a single attempt */
  attemptTimeoutMs: number;
  /** Attempts in total, the first one included */
  maxAttempts: number;
  /** Backoff before the first retry; doubles on each further retry */
  baseDelayMs: number;
  maxDelayMs: number;
}

/** A full SVG answer can take a while, so attempts get two minutes */
export const MODEL_RETRY_POLICY: RetryPolicy = {
  attemptTimeoutMs: 120_000,
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

/** 529: Anthropic's "overloaded" */
const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504, 529]);

export interface RetryNotice {
  provider: string;
  /** The attempt that failed */
  attempt: number;
  delayMs: number;
  reason: string;
}

export interface ChatRequest {
  /** Provider name, used in messages and error attribution */
  provider: string;
  url: string;
  init: RequestInit;
  policy?: Partial<RetryPolicy>;
  signal?: AbortSignal;
  /** Defaults to a warning on the global logger */
  onRetry?: (notice: RetryNotice) => void;
  /** Injected for tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export type FetchFailureReason = 'cancelled' | 'timeout' | 'network' | 'status';

const REASON_CODE: Record<Exclude<FetchFailureReason, 'status'>, ProviderErrorCode> = {
  cancelled: 'CANCELLED',
  timeout: 'TIMEOUT',
  network: 'NETWORK_ERROR',
};

/**
 * The request was cancelled, or every attempt failed.
 */
export class ResilientFetchError extends Error {
  constructor(
    message: string,
    readonly provider: string,
    readonly reason: FetchFailureReason,
    /** Last HTTP status, when the final attempt got an answer */
    readonly status?: number
  ) {
    super(message);
    this.name = 'ResilientFetchError';
  }

  toProviderError(): ProviderError {
    const code =
      this.reason === 'status' ? (this.status === 429 ? 'RATE_LIMITED' : 'SERVER_ERROR') : REASON_CODE[this.reason];
    return new ProviderError(this.message, this.provider, code, this);
  }
}

// =============================================================================
// RESILIENT FETCH
// =============================================================================

type Attempt =
  | { kind: 'response'; response: Response }
  | { kind: 'timeout'; detail: string }
  | { kind: 'network'; detail: string };

/**
 * Send a chat request, retrying transient failures.
 *
 * @returns the first response whose status is not retryable, ok or not
 * @throws ResilientFetchError when cancelled or out of attempts
 */
export async function resilientFetch(request: ChatRequest): Promise<Response> {
  const { provider, url, init, signal, onRetry = logRetry, sleep = abortableSleep } = request;
  const policy = { ...MODEL_RETRY_POLICY, ...request.policy };

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw new ResilientFetchError(`${provider} request cancelled`, provider, 'cancelled');
    }

    const outcome = await attemptOnce(url, init, policy.attemptTimeoutMs, signal);
    if (signal?.aborted) {
      throw new ResilientFetchError(`${provider} request cancelled`, provider, 'cancelled');
    }
    if (outcome.kind === 'response' && !RETRYABLE_STATUS.has(outcome.response.status)) {
      return outcome.response;
    }

    const status = outcome.kind === 'response' ? outcome.response.status : undefined;
    const detail = outcome.kind === 'response' ? `HTTP ${outcome.response.status}` : outcome.detail;
    if (attempt >= policy.maxAttempts) {
      throw new ResilientFetchError(
        `${provider} request failed after ${attempt} ${attempt === 1 ? 'attempt' : 'attempts'}: ${detail}`,
        provider,
        outcome.kind === 'response' ? 'status' : outcome.kind,
        status
      );
    }

    const retryAfter = outcome.kind === 'response' ? parseRetryAfter(outcome.response.headers.get('Retry-After')) : null;
    const delayMs = retryAfter ?? backoffDelay(attempt, policy);
    onRetry({ provider, attempt, delayMs, reason: detail });
    await sleep(delayMs, signal);
  }
}

async function attemptOnce(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<Attempt> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const forward = () => controller.abort();
  signal?.addEventListener('abort', forward, { once: true });

  try {
    return { kind: 'response', response: await fetch(url, { ...init, signal: controller.signal }) };
  } catch (error) {
    if (controller.signal.aborted && !signal?.aborted) {
      return { kind: 'timeout', detail: `no answer within ${timeoutMs}ms` };
    }
    return { kind: 'network', detail: toError(error).message };
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', forward);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function logRetry(notice: RetryNotice): void {
  logger.warn(`${notice.provider} attempt ${notice.attempt} failed (${notice.reason}), retrying`, {
    delayMs: Math.round(notice.delayMs),
  });
}

/**
 * Retry-After as milliseconds: delay seconds or an HTTP date.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
  if (!header) return null;

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const date = Date.parse(header);
  if (Number.isNaN(date)) return null;
  const delay = date - now;
  return delay > 0 ? delay : null;
}

/**
 * Exponential backoff with ±25% jitter, clamped to the max delay.
 */
function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const base = policy.baseDelayMs * 2 ** (attempt - 1);
  const jitter = base * 0.25 * (Math.random() * 2 - 1);
  return Math.min(base + jitter, policy.maxDelayMs);
}

/** Resolves early on abort; the loop then reports the cancellation */
function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}
