/**
 * Pipeline Stage 4: Transport.
 *
 * Tail of the chain. Hands each low-level operation to a `Transport` and
 * completes it when the transport settles. Settlements and transport
 * events arrive on whatever context the transport uses; both are
 * marshalled onto the pipeline executor before any stage state is
 * touched.
 *
 * Kinds outside the transport vocabulary fall off the end of the chain
 * and complete with PIPELINE_MISCONFIGURED.
 */

import type { Operation, TransportOperation } from '../../types/operations.js';
import type { PipelineEvent } from '../../types/events.js';
import type { Transport, TransportEvent } from '../../types/transport.js';
import { isPipelineError, toError } from '../pipeline-error.js';
import { eventFromTransport, isTransportOperation, toTransportRequest } from './operations.js';
import { completeOp, passToNext } from './operation-flow.js';
import { PipelineStage } from './stage.js';
import type { PipelineNucleus } from './types.js';

export class TransportStage extends PipelineStage {
  readonly name = 'transport';
  private readonly transport: Transport;

  constructor(transport: Transport) {
    super();
    this.transport = transport;
  }

  override attach(nucleus: PipelineNucleus, previous: PipelineStage | null, next: PipelineStage | null): void {
    super.attach(nucleus, previous, next);
    this.transport.onEvent((raw) => {
      const scheduled = nucleus.executor.schedule(() => {
        this.receive(raw);
      });
      if (!scheduled) {
        this.logger.debug('transport event after shutdown dropped', { kind: raw.kind });
      }
    });
  }

  override teardown(): Promise<void> {
    return this.transport.close();
  }

  protected override runOp(op: Operation): void {
    if (!isTransportOperation(op)) {
      passToNext(this, op);
      return;
    }
    this.execute(op);
  }

  private execute(op: TransportOperation): void {
    const startedAt = Date.now();
    this.logger.debug('transport request', { operation: op.id, kind: op.kind });

    void this.transport.execute(toTransportRequest(op)).then(
      () => this.settle(op, null, startedAt),
      (err: unknown) => this.settle(op, toError(err), startedAt),
    );
  }

  private settle(op: TransportOperation, error: Error | null, startedAt: number): void {
    const scheduled = this.nucleus.executor.schedule(() => {
      this.logger.debug('transport settled', {
        operation: op.id,
        kind: op.kind,
        ok: error === null,
        duration_ms: Date.now() - startedAt,
        error_code: isPipelineError(error) ? error.code : undefined,
      });
      completeOp(op, error);
    });
    if (!scheduled) {
      this.logger.debug('transport settlement after shutdown dropped', { operation: op.id, kind: op.kind });
    }
  }

  private receive(raw: TransportEvent): void {
    let event: PipelineEvent;
    try {
      event = eventFromTransport(raw);
    } catch (err: unknown) {
      this.nucleus.reportBackgroundError(err);
      return;
    }
    this.handleEvent(event);
  }
}
