/**
 * Pipeline: root object owning the stage chain.
 *
 * The root links the stages once, owns the serialization context and is
 * the only public entry point for operations. Every operation submitted
 * here is marshalled onto the executor before the head stage sees it, so
 * callers may submit from anywhere.
 *
 * Lifecycle:
 *   new Pipeline({ stages })  link the chain (fixed from here on)
 *   runOp(op)                 marshal op to the head stage, FIFO
 *   onEvent(handler)          single top-level event sink
 *   shutdown()                teardown, fail pending ops, stop the executor
 */

import type { Operation } from '../../types/operations.js';
import type { EventHandler, PipelineEvent } from '../../types/events.js';
import { ErrorCode } from '../../types/errors.js';
import { PipelineError, isPipelineError, toError } from '../pipeline-error.js';
import { createLogger, type Logger } from '../logger.js';
import { addCallback, completeOp } from './operations.js';
import { SerialExecutor, type DefectHandler } from './serial-executor.js';
import type { PipelineStage } from './stage.js';
import type { PipelineNucleus, SharedState } from './types.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface PipelineOptions {
  /** Stages in chain order, head first. */
  stages: readonly PipelineStage[];
  /** Name used in log lines and error messages. Defaults to "pipeline". */
  name?: string;
  logger?: Logger;
  /**
   * Receives defects: double completion, context violations and
   * callbacks that throw. Defaults to rethrowing on a fresh microtask.
   */
  onDefect?: DefectHandler;
}

/** Receives errors no pending operation can carry. */
export type BackgroundErrorHandler = (error: unknown) => void;

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export class Pipeline {
  readonly name: string;
  readonly executor: SerialExecutor;
  readonly state: SharedState = { connected: false, connectionArgs: null };

  private readonly logger: Logger;
  private readonly stages: readonly PipelineStage[];
  private readonly head: PipelineStage;
  private readonly pending = new Set<Operation>();
  private readonly defectHandler: DefectHandler | undefined;
  private eventHandler: EventHandler | null = null;
  private backgroundErrorHandler: BackgroundErrorHandler | null = null;
  private shuttingDown = false;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: PipelineOptions) {
    const [head] = options.stages;
    if (head === undefined) {
      throw new PipelineError({
        code: ErrorCode.PIPELINE_MISCONFIGURED,
        message: 'A pipeline needs at least one stage',
      });
    }

    this.name = options.name ?? 'pipeline';
    this.logger = (options.logger ?? createLogger('pipeline')).withContext({ pipeline: this.name });
    this.defectHandler = options.onDefect;
    this.executor = new SerialExecutor({
      name: this.name,
      onDefect: (error) => this.reportDefect(error),
    });
    this.stages = [...options.stages];
    this.head = head;

    const nucleus: PipelineNucleus = {
      name: this.name,
      executor: this.executor,
      logger: this.logger,
      state: this.state,
      track: (op) => this.track(op),
      emitEvent: (event) => this.deliverEvent(event),
      reportBackgroundError: (error) => this.reportBackgroundError(error),
    };

    this.stages.forEach((stage, index) => {
      stage.attach(nucleus, this.stages[index - 1] ?? null, this.stages[index + 1] ?? null);
    });

    this.logger.debug('pipeline linked', { stages: this.stageNames });
  }

  // -------------------------------------------------------------------------
  // Operations
  // -------------------------------------------------------------------------

  /**
   * Submit an operation. May be called from any context; the head stage
   * receives it on the pipeline context, in submission order.
   */
  runOp(op: Operation): void {
    if (this.shuttingDown) {
      completeOp(op, this.shutdownError(op));
      return;
    }

    const submittedAt = Date.now();
    this.logger.debug('operation submitted', { operation: op.id, kind: op.kind });
    addCallback(op, (_op, error) => {
      this.logger.debug('operation completed', {
        operation: op.id,
        kind: op.kind,
        ok: error === null,
        duration_ms: Date.now() - submittedAt,
        error_code: isPipelineError(error) ? error.code : undefined,
      });
    });
    this.track(op);

    this.executor.schedule(() => {
      this.head.run(op);
    });
  }

  /** Alias of `runOp`. */
  submit(op: Operation): void {
    this.runOp(op);
  }

  /** Stage names in chain order, head first. */
  get stageNames(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  /** Number of operations submitted or delegated and not yet completed. */
  get pendingCount(): number {
    return this.pending.size;
  }

  /** Resolves once every queued task has run. */
  whenIdle(): Promise<void> {
    return this.executor.whenIdle();
  }

  // -------------------------------------------------------------------------
  // Events and errors
  // -------------------------------------------------------------------------

  /** Register the top-level event sink, replacing any previous one. */
  onEvent(handler: EventHandler): void {
    this.eventHandler = handler;
  }

  /** Register the receiver for errors raised while handling events. */
  onBackgroundError(handler: BackgroundErrorHandler): void {
    this.backgroundErrorHandler = handler;
  }

  // -------------------------------------------------------------------------
  // Shutdown
  // -------------------------------------------------------------------------

  /**
   * Tear the pipeline down. Idempotent: later calls return the first
   * call's promise.
   *
   * Every stage's teardown runs on the context, then every operation still
   * pending is completed with PIPELINE_SHUTDOWN, newest first, and the
   * executor stops. The promise settles once asynchronous teardowns have.
   */
  shutdown(): Promise<void> {
    if (this.shutdownPromise !== null) {
      return this.shutdownPromise;
    }
    this.shuttingDown = true;
    this.logger.info('pipeline shutting down', { pending: this.pending.size });

    this.shutdownPromise = new Promise<void>((resolve, reject) => {
      const scheduled = this.executor.schedule(() => {
        const teardowns: Array<Promise<void>> = [];
        for (const stage of this.stages) {
          try {
            teardowns.push(Promise.resolve(stage.teardown()));
          } catch (err: unknown) {
            teardowns.push(Promise.reject(err));
          }
        }

        this.failPending();
        this.executor.stop();

        Promise.all(teardowns).then(() => {
          this.logger.info('pipeline stopped');
          resolve();
        }, reject);
      });

      if (!scheduled) {
        resolve();
      }
    });
    return this.shutdownPromise;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private track(op: Operation): void {
    if (this.pending.has(op)) return;
    this.pending.add(op);
    addCallback(op, () => {
      this.pending.delete(op);
      if (!this.executor.isOnContext()) {
        this.reportDefect(
          new PipelineError({
            code: ErrorCode.CONTEXT_VIOLATION,
            message: `Operation #${op.id} ("${op.kind}") completed off the "${this.name}" pipeline context`,
            kind: op.kind,
            operationId: op.id,
          }),
        );
      }
    });
  }

  private failPending(): void {
    const newestFirst = [...this.pending].sort((a, b) => b.id - a.id);
    for (const op of newestFirst) {
      if (op.completed) continue;
      try {
        completeOp(op, this.shutdownError(op));
      } catch (err: unknown) {
        this.reportDefect(err);
      }
    }
  }

  private shutdownError(op: Operation): PipelineError {
    return new PipelineError({
      code: ErrorCode.PIPELINE_SHUTDOWN,
      message: `Pipeline "${this.name}" is shutting down`,
      kind: op.kind,
      operationId: op.id,
    });
  }

  private deliverEvent(event: PipelineEvent): void {
    if (this.eventHandler === null) {
      this.logger.warn('event dropped: no event handler registered', { kind: event.kind });
      return;
    }
    this.eventHandler(event);
  }

  private reportBackgroundError(error: unknown): void {
    if (this.backgroundErrorHandler !== null) {
      this.backgroundErrorHandler(error);
      return;
    }
    this.logger.error('error raised while handling an event', {
      error: toError(error),
      error_code: isPipelineError(error) ? error.code : undefined,
    });
  }

  private reportDefect(error: unknown): void {
    this.logger.error('pipeline defect', {
      error: toError(error),
      error_code: isPipelineError(error) ? error.code : undefined,
    });
    if (this.defectHandler !== undefined) {
      this.defectHandler(error);
      return;
    }
    queueMicrotask(() => {
      throw error;
    });
  }
}
