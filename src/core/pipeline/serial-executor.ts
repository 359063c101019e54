/**
 * Serial executor: the pipeline's single serialization context.
 *
 * Every stage method for one pipeline runs as a task on one executor.
 * Producers (callers, transport callbacks, retry timers) never touch
 * stage state directly; they `schedule()` a task. Tasks run strictly one
 * at a time in FIFO order, each to completion, so stage fields need no
 * locking.
 *
 * `isOnContext()` is true only while a task is executing synchronously.
 * Stage entry points call `assertOnContext()`, which turns an off-context
 * call into a CONTEXT_VIOLATION defect instead of a silent race.
 */

import { ErrorCode } from '../../types/errors.js';
import { PipelineError } from '../pipeline-error.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A unit of work. Tasks must not block; they may schedule follow-ups. */
export type Task = () => void;

/** Receives anything a task throws. */
export type DefectHandler = (error: unknown) => void;

export interface SerialExecutorOptions {
  /** Name used in error messages. */
  name?: string;
  /** Receives errors thrown out of tasks. Defaults to rethrowing on a fresh microtask. */
  onDefect?: DefectHandler;
}

// ---------------------------------------------------------------------------
// SerialExecutor
// ---------------------------------------------------------------------------

export class SerialExecutor {
  readonly name: string;
  private readonly queue: Task[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private onDefect: DefectHandler;
  private draining = false;
  private drainScheduled = false;
  private running = false;
  private stopped = false;

  constructor(options?: SerialExecutorOptions) {
    this.name = options?.name ?? 'pipeline';
    this.onDefect = options?.onDefect ?? rethrowAsync;
  }

  /**
   * Queue a task. Returns false (and drops the task) once the executor
   * has been stopped.
   */
  schedule(task: Task): boolean {
    if (this.stopped) {
      return false;
    }
    this.queue.push(task);
    this.requestDrain();
    return true;
  }

  /** True while a task of this executor is executing. */
  isOnContext(): boolean {
    return this.running;
  }

  /**
   * Throw CONTEXT_VIOLATION unless called from inside a task.
   *
   * @param where - Label for the error message (e.g. "stage:retry.run").
   */
  assertOnContext(where: string): void {
    if (!this.running) {
      throw new PipelineError({
        code: ErrorCode.CONTEXT_VIOLATION,
        message: `${where} called off the "${this.name}" pipeline context`,
      });
    }
  }

  /** Replace the defect handler. */
  setDefectHandler(handler: DefectHandler): void {
    this.onDefect = handler;
  }

  /** Number of tasks waiting to run. */
  get pending(): number {
    return this.queue.length;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /** Resolves once the queue is empty and no task is running. */
  whenIdle(): Promise<void> {
    if (!this.draining && !this.drainScheduled && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Refuse further tasks and drop the ones still queued. A task that is
   * currently running finishes normally.
   */
  stop(): void {
    this.stopped = true;
    this.queue.length = 0;
    if (!this.draining) {
      this.notifyIdle();
    }
  }

  // -------------------------------------------------------------------------
  // Draining
  // -------------------------------------------------------------------------

  private requestDrain(): void {
    if (this.draining || this.drainScheduled) return;
    this.drainScheduled = true;
    queueMicrotask(() => {
      this.drainScheduled = false;
      this.drain();
    });
  }

  private drain(): void {
    this.draining = true;
    try {
      let task = this.queue.shift();
      while (task !== undefined) {
        this.running = true;
        try {
          task();
        } catch (err: unknown) {
          this.reportDefect(err);
        } finally {
          this.running = false;
        }
        task = this.stopped ? undefined : this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
    this.notifyIdle();
  }

  private reportDefect(error: unknown): void {
    try {
      this.onDefect(error);
    } catch (handlerError: unknown) {
      rethrowAsync(handlerError);
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters.splice(0);
    for (const resolve of waiters) {
      resolve();
    }
  }
}

function rethrowAsync(error: unknown): void {
  queueMicrotask(() => {
    throw error;
  });
}
