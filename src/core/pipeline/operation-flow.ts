/**
 * Operation flow helpers.
 *
 * Stateless functions every stage uses to move work along the chain:
 *
 *   passToNext        hand an operation to the next stage verbatim
 *   completeOp        finish an operation (exactly once)
 *   delegate          replace an operation with one new operation
 *   delegateSequence  replace an operation with dependent operations,
 *                     issued one after another
 *   sendEventUp       hand an event to the previous stage or the sink
 *
 * Replacement operations always go to `stage.next`, never back into the
 * delegating stage.
 */

import type { Operation } from '../../types/operations.js';
import type { PipelineEvent } from '../../types/events.js';
import { ErrorCode } from '../../types/errors.js';
import { PipelineError, isPipelineError, toError } from '../pipeline-error.js';
import { addCallback, completeOp } from './operations.js';
import type { PipelineStage } from './stage.js';

export { completeOp } from './operations.js';

/** Builds the next operation of a sequence once the previous one succeeded. */
export type OperationFactory = () => Operation;

// ---------------------------------------------------------------------------
// Down
// ---------------------------------------------------------------------------

/**
 * Forward an operation unchanged to `stage.next`.
 *
 * @throws PipelineError(PIPELINE_MISCONFIGURED) when `stage` is the tail:
 *   nothing below it can handle the operation.
 */
export function passToNext(stage: PipelineStage, op: Operation): void {
  const next = stage.next;
  if (next === null) {
    throw new PipelineError({
      code: ErrorCode.PIPELINE_MISCONFIGURED,
      message: `Pipeline misconfigured: no stage handles "${op.kind}" and none remain after "${stage.name}"`,
      kind: op.kind,
      operationId: op.id,
    });
  }
  next.run(op);
}

/**
 * Complete `op` with a thrown value, unless it is already completed.
 *
 * Rethrows when the error cannot be delivered on `op` (it already
 * completed) or when it is a defect that must surface loudly.
 */
export function failOperation(op: Operation, thrown: unknown): void {
  const alreadyCompleted = op.completed;
  if (!alreadyCompleted) {
    completeOp(op, toError(thrown));
  }
  if (alreadyCompleted || (isPipelineError(thrown) && thrown.isDefect)) {
    throw thrown;
  }
}

function submitToNext(stage: PipelineStage, op: Operation): void {
  try {
    passToNext(stage, op);
  } catch (err: unknown) {
    failOperation(op, err);
  }
}

/**
 * Replace `original` with `replacement`.
 *
 * The replacement's outcome (success or its error) completes the
 * original. The replacement is submitted to the next stage.
 */
export function delegate(stage: PipelineStage, original: Operation, replacement: Operation): void {
  stage.logger.debug('delegating operation', {
    operation: original.id,
    kind: original.kind,
    replacement: replacement.id,
    replacementKind: replacement.kind,
  });

  addCallback(replacement, (_op, error) => {
    completeOp(original, error);
  });
  submitToNext(stage, replacement);
}

/**
 * Replace `original` with a sequence of dependent operations.
 *
 * Each factory runs only after the previous operation succeeded, so
 * later steps are built from up-to-date state. The first failure
 * completes `original` with that error and no further step is issued.
 * When every step succeeds, `original` completes without error.
 */
export function delegateSequence(
  stage: PipelineStage,
  original: Operation,
  steps: readonly OperationFactory[],
): void {
  const runStep = (index: number): void => {
    const factory = steps[index];
    if (factory === undefined) {
      completeOp(original, null);
      return;
    }

    let step: Operation;
    try {
      step = factory();
    } catch (err: unknown) {
      completeOp(original, toError(err));
      return;
    }

    stage.logger.debug('delegating sequence step', {
      operation: original.id,
      kind: original.kind,
      step: index + 1,
      of: steps.length,
      replacement: step.id,
      replacementKind: step.kind,
    });

    addCallback(step, (_op, error) => {
      if (error !== null) {
        completeOp(original, error);
      } else {
        runStep(index + 1);
      }
    });
    submitToNext(stage, step);
  };

  runStep(0);
}

// ---------------------------------------------------------------------------
// Up
// ---------------------------------------------------------------------------

/** Pass an event to the previous stage, or to the pipeline sink at the head. */
export function sendEventUp(stage: PipelineStage, event: PipelineEvent): void {
  const previous = stage.previous;
  if (previous === null) {
    stage.nucleus.emitEvent(event);
    return;
  }
  previous.handleEvent(event);
}
