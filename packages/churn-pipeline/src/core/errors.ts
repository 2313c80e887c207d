/**
 * Churnline Error Types
 *
 * Structured errors for the prediction pipeline. Each carries a stable `code`
 * that the serving layer forwards to clients, and a type guard for callers
 * that receive `unknown` from a catch clause.
 *
 * SURFACING RULES:
 * - ValidationError halts the pipeline before anything is executed or cached
 * - ExecutionError is recovered by the simulator unless fallback is disabled
 * - BusyError surfaces to the caller with a retry hint
 * - CancelledError ends a run whose caller gave up; nothing is cached
 * - NotFoundError is returned when no batch has been computed yet
 */

import type { ExecutionFailureReason } from './types.js';

// ============================================================================
// Validation
// ============================================================================

export type ValidationIssueCode =
  | 'missing-column'
  | 'duplicate-column'
  | 'empty-table'
  | 'ragged-row'
  | 'blank-identifier'
  | 'duplicate-identifier'
  | 'invalid-probability'
  | 'missing-identifier'
  | 'unexpected-identifier'
  | 'malformed-input';

export interface ValidationIssue {
  readonly code: ValidationIssueCode;
  readonly message: string;
  readonly column?: string;
  /** 1-based data row numbers (header excluded) */
  readonly rows?: readonly number[];
  readonly ids?: readonly string[];
}

/**
 * Error raised when a table (upload or scoring artifact) is malformed or
 * incomplete. The pipeline never proceeds past it.
 *
 * @example
 * ```typescript
 * throw new ValidationError('Upload rejected', [
 *   { code: 'missing-column', column: 'customerID', message: 'Missing required column: customerID' },
 * ]);
 * ```
 */
export class ValidationError extends Error {
  public override readonly name = 'ValidationError' as const;
  public readonly code = 'VALIDATION_FAILED' as const;

  constructor(
    message: string,
    public readonly issues: readonly ValidationIssue[]
  ) {
    super(message);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  /**
   * Columns reported missing, in issue order
   */
  get missingColumns(): readonly string[] {
    return this.issues
      .filter((issue) => issue.code === 'missing-column' && issue.column !== undefined)
      .map((issue) => issue.column ?? '');
  }

  toLogString(): string {
    const lines = [`ValidationError: ${this.message}`];
    for (const issue of this.issues.slice(0, 5)) {
      lines.push(`  - [${issue.code}] ${issue.message}`);
    }
    if (this.issues.length > 5) {
      lines.push(`  ... and ${this.issues.length - 5} more issues`);
    }
    return lines.join('\n');
  }
}

// ============================================================================
// Execution
// ============================================================================

/**
 * Error surfaced when the external scoring process failed and fallback is
 * disabled.
 */
export class ExecutionError extends Error {
  public override readonly name = 'ExecutionError' as const;
  public readonly code = 'EXECUTION_FAILED' as const;

  constructor(
    public readonly reason: ExecutionFailureReason,
    public readonly detail: string
  ) {
    super(`Scoring process failed (${reason}): ${detail}`);
    Object.setPrototypeOf(this, ExecutionError.prototype);
  }
}

/**
 * Error thrown when a run is requested while another one is in flight
 */
export class BusyError extends Error {
  public override readonly name = 'BusyError' as const;
  public readonly code = 'BUSY' as const;

  constructor(public readonly retryAfterMs: number) {
    super('A prediction run is already in progress');
    Object.setPrototypeOf(this, BusyError.prototype);
  }

  /** Retry-After header value in whole seconds */
  get retryAfterSeconds(): number {
    return Math.max(1, Math.ceil(this.retryAfterMs / 1000));
  }
}

export class NotFoundError extends Error {
  public override readonly name = 'NotFoundError' as const;

  constructor(
    message: string,
    public readonly code: 'NO_BATCH' | 'NOT_FOUND' = 'NOT_FOUND'
  ) {
    super(message);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Error thrown when the caller aborts a run before it completes
 */
export class CancelledError extends Error {
  public override readonly name = 'CancelledError' as const;
  public readonly code = 'CANCELLED' as const;

  constructor(message = 'Prediction run was cancelled') {
    super(message);
    Object.setPrototypeOf(this, CancelledError.prototype);
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isExecutionError(error: unknown): error is ExecutionError {
  return error instanceof ExecutionError;
}

export function isBusyError(error: unknown): error is BusyError {
  return error instanceof BusyError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

/**
 * HTTP status for a pipeline error (500 for anything unrecognized)
 */
export function toHttpStatus(error: unknown): number {
  if (isValidationError(error)) return 400;
  if (isNotFoundError(error)) return 404;
  if (isBusyError(error)) return 409;
  if (isExecutionError(error)) return 502;
  // Client closed the request
  if (isCancelledError(error)) return 499;
  return 500;
}

/**
 * Error message for logging, whatever was thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
