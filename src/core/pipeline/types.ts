/**
 * Pipeline types shared by the root object and every stage.
 *
 * The nucleus is the one piece of state all stages of a pipeline can
 * reach: the serialization context, the logger, shared connection state
 * and the top-level event sink. It is owned by the Pipeline root and
 * only ever touched from the pipeline context.
 */

import type { ConnectionArgs, Operation } from '../../types/operations.js';
import type { PipelineEvent } from '../../types/events.js';
import type { Logger } from '../logger.js';
import type { SerialExecutor } from './serial-executor.js';

// ---------------------------------------------------------------------------
// Shared state
// ---------------------------------------------------------------------------

/**
 * State shared across stages. Written by the coordination stage, read by
 * any stage that needs to know whether a connection exists.
 */
export interface SharedState {
  connected: boolean;
  connectionArgs: ConnectionArgs | null;
}

// ---------------------------------------------------------------------------
// Nucleus
// ---------------------------------------------------------------------------

export interface PipelineNucleus {
  readonly name: string;
  readonly executor: SerialExecutor;
  readonly logger: Logger;
  readonly state: SharedState;

  /** Record an operation as in flight until it completes. */
  track(op: Operation): void;

  /** Deliver an event that reached the head of the chain. */
  emitEvent(event: PipelineEvent): void;

  /** Report an error that no pending operation can carry. */
  reportBackgroundError(error: unknown): void;
}
