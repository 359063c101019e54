/**
 * Pipeline Stage 3: Transport coordination.
 *
 * Translates caller-level operations into the transport vocabulary and
 * keeps the connection state every stage can read.
 *
 *   setConnectionArgs + credential  → setConnectionArgs, then
 *                                     setCredentialToken | setClientCertificate
 *   sendTelemetry                   → send devices/{registrationId}/telemetry
 *   uploadBlob                      → send devices/{registrationId}/blobs/{blobName}
 *   methodResponse                  → send devices/{registrationId}/methods/res/{requestId}
 *   register                        → send provisioning/{idScope}/registrations/{registrationId}
 *
 * Message operations issued while disconnected wait for a `connect`.
 * One connect is in flight at a time; messages that arrive meanwhile
 * queue behind it and go out in arrival order once it succeeds. They
 * fail with OPERATION_FAILED when no connection arguments have been set.
 */

import type {
  ConnectionArgs,
  Operation,
  OperationOf,
  OperationPayloads,
} from '../../types/operations.js';
import type { PipelineEvent } from '../../types/events.js';
import { ErrorCode } from '../../types/errors.js';
import { PipelineError, toError } from '../pipeline-error.js';
import { addCallback, createOperation } from './operations.js';
import {
  completeOp,
  delegate,
  delegateSequence,
  failOperation,
  passToNext,
  sendEventUp,
  type OperationFactory,
} from './operation-flow.js';
import { PipelineStage } from './stage.js';

type SendPayload = OperationPayloads['send'];

/** A connect on its way down, with the messages waiting for it. */
interface ConnectInFlight {
  readonly op: OperationOf<'connect'>;
  readonly waiters: Array<(error: Error | null) => void>;
}

// ---------------------------------------------------------------------------
// Topics
// ---------------------------------------------------------------------------

export const topics = {
  telemetry: (args: ConnectionArgs): string => `devices/${args.registrationId}/telemetry`,
  blob: (args: ConnectionArgs, blobName: string): string =>
    `devices/${args.registrationId}/blobs/${blobName}`,
  methodResponse: (args: ConnectionArgs, requestId: string): string =>
    `devices/${args.registrationId}/methods/res/${requestId}`,
  registration: (args: ConnectionArgs): string =>
    `provisioning/${args.idScope}/registrations/${args.registrationId}`,
};

// ---------------------------------------------------------------------------
// Stage
// ---------------------------------------------------------------------------

export class TransportCoordinationStage extends PipelineStage {
  readonly name = 'coordination';
  private connecting: ConnectInFlight | null = null;

  protected override runOp(op: Operation): void {
    switch (op.kind) {
      case 'setConnectionArgs':
        this.setConnectionArgs(op);
        return;
      case 'connect':
        this.watchConnect(op);
        this.trackConnection(op);
        passToNext(this, op);
        return;
      case 'disconnect':
        this.trackConnection(op);
        passToNext(this, op);
        return;
      case 'sendTelemetry': {
        const { body, properties } = op.payload;
        this.sendMessage(op, (args) => withProperties({ topic: topics.telemetry(args), body }, properties));
        return;
      }
      case 'uploadBlob': {
        const { blobName, content, contentType } = op.payload;
        this.sendMessage(op, (args) =>
          withProperties(
            { topic: topics.blob(args, blobName), body: content },
            contentType !== undefined ? { 'content-type': contentType } : undefined,
          ),
        );
        return;
      }
      case 'methodResponse': {
        const { requestId, status, body } = op.payload;
        this.sendMessage(op, (args) => ({
          topic: topics.methodResponse(args, requestId),
          body: { status, payload: body ?? null },
        }));
        return;
      }
      case 'register': {
        const { payload } = op.payload;
        this.sendMessage(op, (args) => ({
          topic: topics.registration(args),
          body: { registrationId: args.registrationId, payload: payload ?? {} },
        }));
        return;
      }
      default:
        passToNext(this, op);
    }
  }

  protected override handlePipelineEvent(event: PipelineEvent): void {
    if (event.kind === 'connectionStateChanged') {
      this.nucleus.state.connected = event.payload.connected;
      this.logger.debug('connection state changed', {
        connected: event.payload.connected,
        reason: event.payload.reason,
      });
    }
    sendEventUp(this, event);
  }

  // -------------------------------------------------------------------------
  // Connection arguments
  // -------------------------------------------------------------------------

  private setConnectionArgs(op: OperationOf<'setConnectionArgs'>): void {
    const { provisioningHost, registrationId, idScope, sasToken, clientCertificate } = op.payload;
    const args: ConnectionArgs = { provisioningHost, registrationId, idScope };

    addCallback(op, (_op, error) => {
      if (error === null) {
        this.nucleus.state.connectionArgs = args;
      }
    });

    if (sasToken === undefined && clientCertificate === undefined) {
      passToNext(this, op);
      return;
    }

    const steps: OperationFactory[] = [() => createOperation('setConnectionArgs', args)];
    if (sasToken !== undefined) {
      steps.push(() => createOperation('setCredentialToken', { sasToken }));
    }
    if (clientCertificate !== undefined) {
      steps.push(() => createOperation('setClientCertificate', { certificate: clientCertificate }));
    }
    delegateSequence(this, op, steps);
  }

  // -------------------------------------------------------------------------
  // Connection state
  // -------------------------------------------------------------------------

  private trackConnection(op: OperationOf<'connect'> | OperationOf<'disconnect'>): void {
    const connected = op.kind === 'connect';
    addCallback(op, (_op, error) => {
      if (error === null) {
        this.nucleus.state.connected = connected;
      }
    });
  }

  /**
   * Record `connect` as the connect in flight, unless one already is.
   * Its waiters run after the connection state has been updated.
   */
  private watchConnect(connect: OperationOf<'connect'>): ConnectInFlight {
    if (this.connecting !== null) {
      return this.connecting;
    }
    const inFlight: ConnectInFlight = { op: connect, waiters: [] };
    this.connecting = inFlight;
    addCallback(connect, (_op, error) => {
      if (this.connecting === inFlight) {
        this.connecting = null;
      }
      for (const waiter of inFlight.waiters.splice(0)) {
        waiter(error);
      }
    });
    return inFlight;
  }

  // -------------------------------------------------------------------------
  // Messages
  // -------------------------------------------------------------------------

  private sendMessage(op: Operation, build: (args: ConnectionArgs) => SendPayload): void {
    const args = this.nucleus.state.connectionArgs;
    if (args === null) {
      throw new PipelineError({
        code: ErrorCode.OPERATION_FAILED,
        message: `Cannot perform "${op.kind}" before connection arguments are set`,
        kind: op.kind,
        operationId: op.id,
      });
    }

    if (this.nucleus.state.connected) {
      this.delegateSend(op, build, args);
      return;
    }

    let connect: OperationOf<'connect'> | null = null;
    let inFlight = this.connecting;
    if (inFlight === null) {
      connect = createOperation('connect', {});
      inFlight = this.watchConnect(connect);
      this.trackConnection(connect);
    } else {
      this.logger.debug('waiting for connect in flight', {
        operation: op.id,
        kind: op.kind,
        connect: inFlight.op.id,
      });
    }

    inFlight.waiters.push((error) => {
      if (op.completed) return;
      if (error !== null) {
        completeOp(op, error);
        return;
      }
      this.delegateSend(op, build, args);
    });

    if (connect !== null) {
      this.submitConnect(connect);
    }
  }

  private submitConnect(connect: OperationOf<'connect'>): void {
    try {
      passToNext(this, connect);
    } catch (err: unknown) {
      failOperation(connect, err);
    }
  }

  private delegateSend(
    op: Operation,
    build: (args: ConnectionArgs) => SendPayload,
    args: ConnectionArgs,
  ): void {
    let send: Operation<'send'>;
    try {
      send = createOperation('send', build(args));
    } catch (err: unknown) {
      completeOp(op, toError(err));
      return;
    }
    delegate(this, op, send);
  }
}

function withProperties(
  message: { topic: string; body: SendPayload['body'] },
  properties: Readonly<Record<string, string>> | undefined,
): SendPayload {
  return properties !== undefined ? { ...message, properties: { ...properties } } : message;
}
