/**
 * Error taxonomy for the device pipeline.
 *
 * Every failure that reaches a caller is carried on the operation it
 * belongs to, tagged with one of these codes. Codes are grouped by who
 * is at fault:
 *
 *   VALIDATION_FAILED       malformed operation/event construction
 *   PIPELINE_MISCONFIGURED  no stage handles a kind (wiring bug)
 *   DOUBLE_COMPLETION       an operation was completed twice (defect)
 *   CONTEXT_VIOLATION       stage code ran off the pipeline context (defect)
 *   PIPELINE_SHUTDOWN       operation still pending at teardown
 *   TRANSPORT_ERROR         transport rejected the request
 *   TRANSPORT_TIMEOUT       transport never acknowledged the request
 *   OPERATION_FAILED        a stage could not satisfy the operation
 */

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

export const ErrorCode = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  PIPELINE_MISCONFIGURED: 'PIPELINE_MISCONFIGURED',
  DOUBLE_COMPLETION: 'DOUBLE_COMPLETION',
  CONTEXT_VIOLATION: 'CONTEXT_VIOLATION',
  PIPELINE_SHUTDOWN: 'PIPELINE_SHUTDOWN',
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
  TRANSPORT_TIMEOUT: 'TRANSPORT_TIMEOUT',
  OPERATION_FAILED: 'OPERATION_FAILED',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ---------------------------------------------------------------------------
// Error payload
// ---------------------------------------------------------------------------

/** JSON-safe description of a pipeline failure. */
export interface ErrorPayload {
  code: ErrorCodeValue;
  message: string;
  retriable: boolean;
  /** Operation kind the error was raised for, when known. */
  kind?: string;
  /** Identifier of the operation the error was raised for, when known. */
  operationId?: number;
}

// ---------------------------------------------------------------------------
// Retriable defaults
// ---------------------------------------------------------------------------

/**
 * Whether an error with the given code may succeed if the same operation
 * is issued again. Only transport failures are transient; everything else
 * is a caller or wiring problem that a retry cannot fix.
 */
export const ERROR_RETRIABLE_DEFAULTS: Readonly<Record<ErrorCodeValue, boolean>> = {
  [ErrorCode.VALIDATION_FAILED]: false,
  [ErrorCode.PIPELINE_MISCONFIGURED]: false,
  [ErrorCode.DOUBLE_COMPLETION]: false,
  [ErrorCode.CONTEXT_VIOLATION]: false,
  [ErrorCode.PIPELINE_SHUTDOWN]: false,
  [ErrorCode.TRANSPORT_ERROR]: true,
  [ErrorCode.TRANSPORT_TIMEOUT]: true,
  [ErrorCode.OPERATION_FAILED]: false,
};

/**
 * Codes that indicate a programming error rather than a runtime failure.
 * These are surfaced loudly and are never delivered as an ordinary
 * operation outcome.
 */
export const DEFECT_CODES: ReadonlySet<ErrorCodeValue> = new Set([
  ErrorCode.DOUBLE_COMPLETION,
  ErrorCode.CONTEXT_VIOLATION,
]);
