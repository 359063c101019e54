/**
 * PipelineError: structured error class for every failure the pipeline
 * reports.
 *
 * Stages throw or complete operations with PipelineError so callers can
 * branch on a machine-readable code. Errors raised by collaborators
 * (transports, credential sources) are carried through unchanged.
 */

import type { ErrorCodeValue, ErrorPayload } from '../types/errors.js';
import { ERROR_RETRIABLE_DEFAULTS, DEFECT_CODES } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Brand symbol
// ---------------------------------------------------------------------------

/**
 * Brand used for cross-module checks, so two copies of this module loaded
 * side by side still recognize each other's errors.
 */
const PIPELINE_ERROR_BRAND = Symbol.for('device-pipeline.PipelineError');

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Options for constructing a PipelineError. */
export interface PipelineErrorOptions {
  code: ErrorCodeValue;
  message: string;
  /** Defaults to ERROR_RETRIABLE_DEFAULTS[code]. */
  retriable?: boolean;
  /** Operation kind the error relates to. */
  kind?: string;
  /** Operation id the error relates to. */
  operationId?: number;
  cause?: unknown;
}

// ---------------------------------------------------------------------------
// PipelineError class
// ---------------------------------------------------------------------------

export class PipelineError extends Error {
  readonly code: ErrorCodeValue;
  readonly retriable: boolean;
  readonly kind?: string;
  readonly operationId?: number;

  /** @internal */
  readonly [PIPELINE_ERROR_BRAND] = true as const;

  constructor(options: PipelineErrorOptions) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PipelineError';
    this.code = options.code;
    this.retriable = options.retriable ?? ERROR_RETRIABLE_DEFAULTS[options.code];

    if (options.kind !== undefined) {
      this.kind = options.kind;
    }
    if (options.operationId !== undefined) {
      this.operationId = options.operationId;
    }
  }

  /** True for programming-error classes (double completion, off-context access). */
  get isDefect(): boolean {
    return DEFECT_CODES.has(this.code);
  }

  /** JSON-safe payload without stack or cause. */
  toErrorPayload(): ErrorPayload {
    const payload: ErrorPayload = {
      code: this.code,
      message: this.message,
      retriable: this.retriable,
    };

    if (this.kind !== undefined) {
      payload.kind = this.kind;
    }
    if (this.operationId !== undefined) {
      payload.operationId = this.operationId;
    }

    return payload;
  }
}

// ---------------------------------------------------------------------------
// Guards and helpers
// ---------------------------------------------------------------------------

/** Type guard that also recognizes PipelineErrors from another module copy. */
export function isPipelineError(value: unknown): value is PipelineError {
  if (value instanceof PipelineError) {
    return true;
  }

  return (
    typeof value === 'object' &&
    value !== null &&
    PIPELINE_ERROR_BRAND in value &&
    value[PIPELINE_ERROR_BRAND] === true
  );
}

/** True if `value` is a PipelineError with the given code. */
export function hasErrorCode(value: unknown, code: ErrorCodeValue): value is PipelineError {
  return isPipelineError(value) && value.code === code;
}

/** Normalize anything thrown into an Error, keeping Errors as they are. */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : `Non-error thrown: ${String(value)}`);
}
