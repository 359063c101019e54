/**
 * Construction and completion of operations and events.
 *
 * `createOperation` validates the payload for its kind and fails at
 * construction time, never later in the chain. `completeOp` is the only
 * way an operation is completed; it runs each registered callback once
 * and refuses to run a second time.
 */

import { ErrorCode } from '../../types/errors.js';
import type {
  Operation,
  OperationCallback,
  OperationKind,
  OperationOf,
  OperationPayloads,
  TransportOperation,
  TransportOperationKind,
} from '../../types/operations.js';
import { TRANSPORT_OPERATION_KINDS } from '../../types/operations.js';
import type { EventKind, EventOf, EventPayloads, PipelineEvent } from '../../types/events.js';
import type { TransportEvent, TransportRequest } from '../../types/transport.js';
import { PipelineError } from '../pipeline-error.js';
import { getPayloadValidator } from '../payload-validator.js';

// ---------------------------------------------------------------------------
// Identifiers
// ---------------------------------------------------------------------------

let lastOperationId = 0;

function nextOperationId(): number {
  lastOperationId += 1;
  return lastOperationId;
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

/**
 * Create a validated operation.
 *
 * @param kind - Operation kind.
 * @param payload - Kind-specific fields; validated against the kind's schema.
 * @param callback - Optional first completion callback.
 * @throws PipelineError(VALIDATION_FAILED) if a mandatory field is missing
 *   or any field has the wrong shape.
 */
export function createOperation<K extends OperationKind>(
  kind: K,
  payload: OperationPayloads[K],
  callback?: OperationCallback,
): Operation<K> {
  const result = getPayloadValidator().validateOperation(kind, payload);
  if (!result.valid) {
    throw new PipelineError({
      code: ErrorCode.VALIDATION_FAILED,
      message: `Invalid "${kind}" operation: ${result.errors.join('; ')}`,
      kind,
    });
  }

  const op: OperationOf<K> = {
    id: nextOperationId(),
    kind,
    payload,
    callbacks: callback ? [callback] : [],
    completed: false,
    error: null,
  };
  return op;
}

/**
 * Register an additional completion callback. Callbacks run last-added
 * first, so a stage that wraps an operation sees its outcome before the
 * stages above it do.
 *
 * @throws PipelineError(DOUBLE_COMPLETION) if the operation already completed.
 */
export function addCallback(op: Operation, callback: OperationCallback): void {
  if (op.completed) {
    throw new PipelineError({
      code: ErrorCode.DOUBLE_COMPLETION,
      message: `Cannot add a callback to completed operation #${op.id} ("${op.kind}")`,
      kind: op.kind,
      operationId: op.id,
    });
  }
  op.callbacks.push(callback);
}

/**
 * Complete an operation exactly once.
 *
 * Every registered callback runs, even if an earlier one throws; the
 * first thrown error is rethrown afterwards.
 *
 * @throws PipelineError(DOUBLE_COMPLETION) on a second call.
 */
export function completeOp(op: Operation, error: Error | null = null): void {
  if (op.completed) {
    throw new PipelineError({
      code: ErrorCode.DOUBLE_COMPLETION,
      message: `Operation #${op.id} ("${op.kind}") was completed twice`,
      kind: op.kind,
      operationId: op.id,
      cause: error ?? undefined,
    });
  }

  op.completed = true;
  op.error = error;

  let firstFailure: unknown = undefined;
  let failed = false;
  while (op.callbacks.length > 0) {
    const callback = op.callbacks.pop();
    if (callback === undefined) break;
    try {
      callback(op, error);
    } catch (err: unknown) {
      if (!failed) {
        failed = true;
        firstFailure = err;
      }
    }
  }

  if (failed) {
    throw firstFailure;
  }
}

// ---------------------------------------------------------------------------
// Transport vocabulary
// ---------------------------------------------------------------------------

const TRANSPORT_KINDS: ReadonlySet<OperationKind> = new Set(TRANSPORT_OPERATION_KINDS);

/** True if the operation belongs to the low-level transport vocabulary. */
export function isTransportOperation(op: Operation): op is TransportOperation {
  return TRANSPORT_KINDS.has(op.kind);
}

/** Strip an operation down to the request a transport consumes. */
export function toTransportRequest<K extends TransportOperationKind>(
  op: Operation<K>,
): TransportRequest<K> {
  const request: { id: number; kind: K; payload: Readonly<OperationPayloads[K]> } = {
    id: op.id,
    kind: op.kind,
    payload: op.payload,
  };
  return request;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

/**
 * Create a validated event.
 *
 * @throws PipelineError(VALIDATION_FAILED) if the payload does not match
 *   the schema for its kind.
 */
export function createEvent<K extends EventKind>(
  kind: K,
  payload: EventPayloads[K],
): PipelineEvent<K> {
  const result = getPayloadValidator().validateEvent(kind, payload);
  if (!result.valid) {
    throw new PipelineError({
      code: ErrorCode.VALIDATION_FAILED,
      message: `Invalid "${kind}" event: ${result.errors.join('; ')}`,
      kind,
    });
  }

  const event: EventOf<K> = { kind, payload };
  return event;
}

/**
 * Turn an event reported by a transport into a pipeline event.
 *
 * @throws PipelineError(VALIDATION_FAILED) if the payload does not match
 *   the schema for its kind.
 */
export function eventFromTransport(raw: TransportEvent): PipelineEvent {
  return parseEvent(raw.kind, raw.payload);
}

function parseEvent<K extends EventKind>(kind: K, payload: unknown): PipelineEvent<K> {
  const validator = getPayloadValidator();
  if (!validator.isEventPayload(kind, payload)) {
    throw new PipelineError({
      code: ErrorCode.VALIDATION_FAILED,
      message: `Invalid "${kind}" event from transport: ${validator.validateEvent(kind, payload).errors.join('; ')}`,
      kind,
    });
  }

  const event: EventOf<K> = { kind, payload };
  return event;
}
