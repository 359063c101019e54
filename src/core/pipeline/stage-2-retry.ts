/**
 * Pipeline Stage 2: Retry.
 *
 * Re-issues transport-bound operations whose attempt failed with a
 * retriable PipelineError (TRANSPORT_ERROR, TRANSPORT_TIMEOUT). Each
 * attempt is a fresh copy of the original sent to the next stage; the
 * original completes once, with the outcome of the last attempt.
 *
 * Delay before attempt n+1 is `initialDelayMs * multiplier^(n-1)`, capped
 * at `maxDelayMs`. Timers re-enter the pipeline through the executor.
 *
 * Attempts of different operations may overtake each other: a retried
 * send can land after a later send that succeeded first time.
 */

import type { Operation, OperationKind } from '../../types/operations.js';
import type { RetryConfig } from '../../types/config.js';
import { DEFAULT_CONFIG } from '../../types/config.js';
import { isPipelineError } from '../pipeline-error.js';
import { addCallback, createOperation } from './operations.js';
import { completeOp, failOperation, passToNext } from './operation-flow.js';
import { PipelineStage } from './stage.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RetryOptions {
  /** Total attempts, including the first. */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

/** Map the `[retry]` config section onto stage options. */
export function retryOptionsFromConfig(config: RetryConfig): RetryOptions {
  return {
    maxAttempts: config.max_attempts,
    initialDelayMs: config.initial_delay_ms,
    maxDelayMs: config.max_delay_ms,
    multiplier: config.multiplier,
  };
}

/** Kinds that end in a transport round trip and may be retried. */
export const RETRIED_KINDS: ReadonlySet<OperationKind> = new Set<OperationKind>([
  'connect',
  'send',
  'sendTelemetry',
  'uploadBlob',
  'methodResponse',
  'register',
]);

/** Delay before the attempt following `attempt` (1-based). */
export function backoffDelay(options: RetryOptions, attempt: number): number {
  const delay = options.initialDelayMs * options.multiplier ** (attempt - 1);
  return Math.min(delay, options.maxDelayMs);
}

// ---------------------------------------------------------------------------
// Stage
// ---------------------------------------------------------------------------

export class RetryStage extends PipelineStage {
  readonly name = 'retry';
  private readonly options: RetryOptions;
  private readonly timers = new Set<NodeJS.Timeout>();

  constructor(options: Partial<RetryOptions> = {}) {
    super();
    const defaults = retryOptionsFromConfig(DEFAULT_CONFIG.retry);
    this.options = {
      maxAttempts: options.maxAttempts ?? defaults.maxAttempts,
      initialDelayMs: options.initialDelayMs ?? defaults.initialDelayMs,
      maxDelayMs: options.maxDelayMs ?? defaults.maxDelayMs,
      multiplier: options.multiplier ?? defaults.multiplier,
    };
  }

  protected override runOp(op: Operation): void {
    if (!RETRIED_KINDS.has(op.kind)) {
      passToNext(this, op);
      return;
    }
    this.attempt(op, 1);
  }

  override teardown(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  private attempt(original: Operation, attempt: number): void {
    const copy = createOperation(original.kind, original.payload);

    addCallback(copy, (_op, error) => {
      if (error === null || !this.shouldRetry(error, attempt)) {
        if (error !== null && attempt > 1) {
          this.logger.warn('giving up on operation', {
            operation: original.id,
            kind: original.kind,
            attempts: attempt,
            error_code: isPipelineError(error) ? error.code : undefined,
          });
        }
        completeOp(original, error);
        return;
      }

      const delay = backoffDelay(this.options, attempt);
      this.logger.info('retrying operation', {
        operation: original.id,
        kind: original.kind,
        attempt: attempt + 1,
        delay_ms: delay,
        error_code: isPipelineError(error) ? error.code : undefined,
      });
      this.scheduleAttempt(original, attempt + 1, delay);
    });

    try {
      passToNext(this, copy);
    } catch (err: unknown) {
      failOperation(copy, err);
    }
  }

  private shouldRetry(error: Error, attempt: number): boolean {
    return attempt < this.options.maxAttempts && isPipelineError(error) && error.retriable;
  }

  private scheduleAttempt(original: Operation, attempt: number, delay: number): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.nucleus.executor.schedule(() => {
        if (original.completed) return;
        try {
          this.attempt(original, attempt);
        } catch (err: unknown) {
          failOperation(original, err);
        }
      });
    }, delay);
    this.timers.add(timer);
  }
}
