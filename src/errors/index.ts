/**
 * Centralized Error Types
 *
 * Typed, categorized errors for the chart workflow. Every error raised for a
 * request carries that request's identifying fields (dataset, case label,
 * case group) in `context`, so a batch report can attribute the failure.
 *
 * Error Categories:
 * - TRANSIENT: network, timeout
 * - PERMANENT: conflicts, bad requests
 * - VALIDATION: invalid configuration or arguments
 * - DEPENDENCY: dataset or model failures
 * - CANCELLED: run aborted before the work finished
 *
 * @example
 * ```typescript
 * throw new DataUnavailableError(
 *   'Dataset not found: sales.csv',
 *   { dataset: 'sales.csv', caseLabel: 'chart' },
 * );
 * ```
 */

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

export enum ErrorCategory {
  /** Transient errors - may resolve on retry (network, timeout) */
  TRANSIENT = 'TRANSIENT',

  /** Permanent errors - will not resolve on retry */
  PERMANENT = 'PERMANENT',

  /** Validation errors - invalid input or configuration */
  VALIDATION = 'VALIDATION',

  /** Rate limited - API rate limits hit */
  RATE_LIMITED = 'RATE_LIMITED',

  /** Dependency errors - dataset or model provider failures */
  DEPENDENCY = 'DEPENDENCY',

  /** Internal errors - unexpected internal failures */
  INTERNAL = 'INTERNAL',

  /** Cancelled - operation was cancelled */
  CANCELLED = 'CANCELLED',
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all workflow errors.
 */
export class WorkflowError extends Error {
  readonly category: ErrorCategory;

  /** Whether the error may resolve on retry */
  readonly recoverable: boolean;

  readonly timestamp: Date;

  /** Additional context for attribution and debugging */
  readonly context: Record<string, unknown>;

  /** Original error that caused this one (if wrapping) */
  override readonly cause?: Error;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = 'WorkflowError';
    this.category = category;
    this.recoverable = recoverable;
    this.timestamp = new Date();
    this.context = context ?? {};
    this.cause = cause;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Create a serializable representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      recoverable: this.recoverable,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause?.message,
    };
  }

  /**
   * Format error for logging.
   */
  toLogString(): string {
    const parts = [
      `[${this.name}]`,
      `(${this.category})`,
      this.message,
    ];

    if (Object.keys(this.context).length > 0) {
      parts.push(`context=${JSON.stringify(this.context)}`);
    }

    return parts.join(' ');
  }
}

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Missing credentials, unreadable config or bad arguments.
 * Fatal: reported before any model call is attempted.
 */
export class ConfigurationError extends WorkflowError {
  /** Setting(s) at fault, e.g. an environment variable name */
  readonly settings: string[];

  constructor(message: string, settings: string[] = [], context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, false, { ...context, settings });
    this.name = 'ConfigurationError';
    this.settings = settings;
  }

  static missingCredential(envVar: string, model: string): ConfigurationError {
    return new ConfigurationError(
      `Missing API key: set ${envVar} in the environment or .env file to use model "${model}"`,
      [envVar],
      { model }
    );
  }

  /**
   * Create error from a Zod validation result.
   */
  static fromZodError(
    source: string,
    error: { issues: Array<{ path: (string | number)[]; message: string }> }
  ): ConfigurationError {
    const fields = error.issues.map((i) => i.path.join('.'));
    const messages = error.issues.map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`);
    return new ConfigurationError(`Invalid ${source}: ${messages.join(', ')}`, fields, { source });
  }
}

/**
 * The dataset reference could not be resolved to readable tabular data.
 */
export class DataUnavailableError extends WorkflowError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCategory.DEPENDENCY, false, context, cause);
    this.name = 'DataUnavailableError';
  }
}

/**
 * The generation model failed, timed out, or returned an unusable payload.
 */
export class GenerationFailure extends WorkflowError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error, timedOut = false) {
    super(
      message,
      timedOut ? ErrorCategory.TRANSIENT : ErrorCategory.DEPENDENCY,
      timedOut,
      { ...context, ...(timedOut && { timedOut }) },
      cause
    );
    this.name = 'GenerationFailure';
  }
}

/**
 * The reflection model failed, timed out, or returned an unusable critique
 * or revision. Non-fatal for the request: V1 stays the final artifact.
 */
export class EvaluationFailure extends WorkflowError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error, timedOut = false) {
    super(
      message,
      timedOut ? ErrorCategory.TRANSIENT : ErrorCategory.DEPENDENCY,
      timedOut,
      { ...context, ...(timedOut && { timedOut }) },
      cause
    );
    this.name = 'EvaluationFailure';
  }
}

/**
 * An artifact file from a prior run already exists and overwrite is off.
 */
export class ArtifactConflictError extends WorkflowError {
  readonly path: string;

  constructor(path: string, context?: Record<string, unknown>) {
    super(
      `Refusing to overwrite existing artifact: ${path} (pass --overwrite to replace it)`,
      ErrorCategory.PERMANENT,
      false,
      { ...context, path }
    );
    this.name = 'ArtifactConflictError';
    this.path = path;
  }
}

/**
 * The artifact could not be written to its final path.
 */
export class ArtifactWriteError extends WorkflowError {
  readonly path: string;

  constructor(path: string, context?: Record<string, unknown>, cause?: Error) {
    const reason = cause?.message ? `: ${cause.message}` : '';
    super(`Could not write artifact ${path}${reason}`, ErrorCategory.DEPENDENCY, false, { ...context, path }, cause);
    this.name = 'ArtifactWriteError';
    this.path = path;
  }
}

/**
 * The run was cancelled before this piece of work finished.
 */
export class CancellationError extends WorkflowError {
  readonly reason: string;

  constructor(reason: string = 'Operation cancelled', context?: Record<string, unknown>) {
    super(reason, ErrorCategory.CANCELLED, false, { ...context, reason });
    this.name = 'CancellationError';
    this.reason = reason;
  }
}

/**
 * A model call exceeded its per-call time budget.
 */
export class ModelTimeoutError extends WorkflowError {
  readonly model: string;
  readonly timeoutMs: number;

  constructor(model: string, timeoutMs: number) {
    super(
      `Model "${model}" did not answer within ${timeoutMs}ms`,
      ErrorCategory.TRANSIENT,
      true,
      { model, timeoutMs }
    );
    this.name = 'ModelTimeoutError';
    this.model = model;
    this.timeoutMs = timeoutMs;
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

/**
 * Wrap an unknown error as a WorkflowError.
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): WorkflowError {
  if (error instanceof WorkflowError) {
    return error;
  }

  const err = toError(error);
  return new WorkflowError(err.message, ErrorCategory.INTERNAL, false, context, err);
}

/**
 * Normalise a thrown value to an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function isWorkflowError(error: unknown): error is WorkflowError {
  return error instanceof WorkflowError;
}

/**
 * Format error for display to user.
 */
export function formatError(error: unknown): string {
  if (error instanceof WorkflowError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
