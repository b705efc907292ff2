/**
 * Standardized error types for signalpath.
 *
 * All errors extend from SignalpathError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 * - Consistent error messages
 *
 * Each class maps to one failure family of the message pipeline. The
 * orchestrator decides per family whether to degrade, retry, or fall back.
 *
 * ## Usage
 *
 * ```typescript
 * import { RetrievalError } from './errors.js';
 *
 * try {
 *   await searchIndex(query);
 * } catch (err) {
 *   throw new RetrievalError('Knowledge index unreachable', 'KNOWLEDGE_UNAVAILABLE', err);
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all signalpath errors.
 */
export class SignalpathError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    // Normalize cause to Error
    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof SignalpathError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Classification Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Intent classification failed. Never surfaced to the user: the classifier
 * degrades to a knowledge query.
 *
 * Common codes:
 * - `CLASSIFIER_FAILED`: Model call failed or timed out
 * - `UNPARSEABLE_LABEL`: Model replied with no recognizable label
 */
export class ClassificationError extends SignalpathError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Retrieval Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One evidence source failed. The source is omitted from the context.
 *
 * Common codes:
 * - `KNOWLEDGE_UNAVAILABLE`: Vector index could not be queried
 * - `EMBEDDING_FAILED`: Query embedding failed
 * - `WEB_SEARCH_FAILED`: Search service returned an error
 * - `RETRIEVAL_TIMEOUT`: Source exceeded its deadline
 */
export class RetrievalError extends SignalpathError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Generation Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Model invocation failed.
 *
 * Common codes:
 * - `MODEL_FAILED`: A single model call failed
 * - `GENERATION_EXHAUSTED`: All attempts failed, fallback text used
 * - `SUMMARY_FAILED`: Summarization call failed
 */
export class GenerationError extends SignalpathError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Persistence Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Conversation history could not be written.
 *
 * Common codes:
 * - `APPEND_FAILED`: Turn insert failed
 * - `PERSISTENCE_EXHAUSTED`: Retries exhausted, operators must look
 * - `SUMMARY_APPLY_FAILED`: Summary update failed
 */
export class PersistenceError extends SignalpathError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Deadline Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A deadline elapsed before the guarded work finished.
 *
 * Common codes:
 * - `MESSAGE_DEADLINE`: Per-message processing deadline exceeded
 * - `RETRIEVAL_TIMEOUT`: Per-retriever deadline exceeded
 */
export class DeadlineError extends SignalpathError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_INVALID`: Configuration validation failed
 * - `MISSING_REQUIRED`: Required field or secret missing
 */
export class ConfigError extends SignalpathError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a signalpath error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof SignalpathError && error.code === code;
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}

export function isGenerationError(error: unknown): error is GenerationError {
  return error instanceof GenerationError;
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}

export function isDeadlineError(error: unknown): error is DeadlineError {
  return error instanceof DeadlineError;
}

/**
 * Error message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error in a SignalpathError.
 *
 * If the error is already a SignalpathError, returns it unchanged.
 * Otherwise wraps it in a new SignalpathError with UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): SignalpathError {
  if (error instanceof SignalpathError) {
    return error;
  }

  return new SignalpathError(message ?? errorMessage(error), 'UNKNOWN', error);
}
