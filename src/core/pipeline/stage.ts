/**
 * PipelineStage: base class for every stage in the chain.
 *
 * Centralizes dispatch, the context guard and error propagation so a
 * concrete stage only overrides `runOp` / `handlePipelineEvent` for the
 * kinds it transforms. Anything it does not recognize falls through to
 * the defaults: operations go down to `next`, events go up to `previous`
 * (or to the pipeline's event sink at the head).
 */

import type { Operation } from '../../types/operations.js';
import type { PipelineEvent } from '../../types/events.js';
import { ErrorCode } from '../../types/errors.js';
import { PipelineError, isPipelineError } from '../pipeline-error.js';
import type { Logger } from '../logger.js';
import type { PipelineNucleus } from './types.js';
import { failOperation, passToNext, sendEventUp } from './operation-flow.js';

export abstract class PipelineStage {
  /** Stage identifier used in diagnostics. */
  abstract readonly name: string;

  /** The single successor. Null only for the tail. */
  next: PipelineStage | null = null;

  /** Non-owning back-reference, used for upward propagation only. */
  previous: PipelineStage | null = null;

  private attached: PipelineNucleus | null = null;
  private stageLogger: Logger | null = null;

  // -------------------------------------------------------------------------
  // Wiring
  // -------------------------------------------------------------------------

  /**
   * Link this stage into a pipeline. Called once by the Pipeline root;
   * the links are fixed afterwards.
   */
  attach(nucleus: PipelineNucleus, previous: PipelineStage | null, next: PipelineStage | null): void {
    if (this.attached !== null) {
      throw new PipelineError({
        code: ErrorCode.PIPELINE_MISCONFIGURED,
        message: `Stage "${this.name}" is already part of pipeline "${this.attached.name}"`,
      });
    }
    this.attached = nucleus;
    this.previous = previous;
    this.next = next;
    this.stageLogger = nucleus.logger.withContext({ stage: this.name });
  }

  /** The owning pipeline's shared nucleus. */
  get nucleus(): PipelineNucleus {
    if (this.attached === null) {
      throw new PipelineError({
        code: ErrorCode.PIPELINE_MISCONFIGURED,
        message: `Stage "${this.name}" is not attached to a pipeline`,
      });
    }
    return this.attached;
  }

  get logger(): Logger {
    if (this.stageLogger === null) {
      return this.nucleus.logger;
    }
    return this.stageLogger;
  }

  // -------------------------------------------------------------------------
  // Entry points
  // -------------------------------------------------------------------------

  /**
   * Accept an operation at this stage. Must be called on the pipeline
   * context. If the stage throws, the operation is completed with the
   * thrown error; it is never left pending.
   */
  run(op: Operation): void {
    const nucleus = this.nucleus;
    nucleus.executor.assertOnContext(`stage:${this.name}.run`);
    nucleus.track(op);

    try {
      this.runOp(op);
    } catch (err: unknown) {
      this.logger.debug('stage raised while handling operation', {
        operation: op.id,
        kind: op.kind,
        error_code: isPipelineError(err) ? err.code : undefined,
      });
      failOperation(op, err);
    }
  }

  /**
   * Accept an event from the stage below. Must be called on the pipeline
   * context. Errors raised while handling an event have no operation to
   * travel on and go to the pipeline's background error reporter.
   */
  handleEvent(event: PipelineEvent): void {
    const nucleus = this.nucleus;
    nucleus.executor.assertOnContext(`stage:${this.name}.handleEvent`);

    try {
      this.handlePipelineEvent(event);
    } catch (err: unknown) {
      if (isPipelineError(err) && err.isDefect) {
        throw err;
      }
      nucleus.reportBackgroundError(err);
    }
  }

  /** Release timers, sockets or other resources. Called once at shutdown. */
  teardown(): void | Promise<void> {}

  // -------------------------------------------------------------------------
  // Overridable behavior
  // -------------------------------------------------------------------------

  /** Handle an operation. Default: pass it down unchanged. */
  protected runOp(op: Operation): void {
    passToNext(this, op);
  }

  /** Handle an event. Default: pass it up unchanged. */
  protected handlePipelineEvent(event: PipelineEvent): void {
    sendEventUp(this, event);
  }
}
