/**
 * DEALER-socket transport.
 *
 * Talks to a local device gateway over one ZeroMQ DEALER socket. Each
 * request goes out as a single JSON frame and stays pending until the
 * gateway acknowledges it (by id) or `timeoutMs` passes. The gateway may
 * also push unsolicited event frames at any time.
 *
 *   → { id, kind, payload }
 *   ← { type: "ack", id, error?: { message, code? } }
 *   ← { type: "event", event: { kind, payload } }
 *
 * The socket is opened lazily on the first request. Inbound frames that
 * fail to decode or validate are logged and dropped.
 */

import type { DealerSocket, SocketFactory } from '../types/socket.js';
import type { TransportConfig } from '../types/config.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import type {
  AckFrame,
  Transport,
  TransportEvent,
  TransportEventHandler,
  TransportRequest,
} from '../types/transport.js';
import { ErrorCode } from '../types/errors.js';
import { PipelineError } from './pipeline-error.js';
import { getPayloadValidator } from './payload-validator.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface DealerTransportOptions {
  socketFactory: SocketFactory;
  /** Gateway address (e.g. "ipc:///tmp/device-gateway.sock"). */
  address: string;
  /** Ack deadline per request. Defaults to the `[transport]` default. */
  timeoutMs?: number;
  logger?: Logger;
}

/** Map the `[transport]` config section onto transport options. */
export function dealerTransportOptionsFromConfig(
  config: TransportConfig,
  socketFactory: SocketFactory,
): DealerTransportOptions {
  return { socketFactory, address: config.address, timeoutMs: config.timeout_ms };
}

interface PendingRequest {
  request: TransportRequest;
  resolve: () => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

// ---------------------------------------------------------------------------
// DealerTransport
// ---------------------------------------------------------------------------

export class DealerTransport implements Transport {
  private readonly socketFactory: SocketFactory;
  private readonly address: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly handlers: TransportEventHandler[] = [];
  private connecting: Promise<DealerSocket> | null = null;
  private socket: DealerSocket | null = null;
  private closed = false;

  constructor(options: DealerTransportOptions) {
    this.socketFactory = options.socketFactory;
    this.address = options.address;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CONFIG.transport.timeout_ms;
    this.logger = options.logger ?? createLogger('dealer-transport');
  }

  /** Number of requests waiting for an ack. */
  get pendingCount(): number {
    return this.pending.size;
  }

  onEvent(handler: TransportEventHandler): void {
    this.handlers.push(handler);
  }

  async execute(request: TransportRequest): Promise<void> {
    if (this.closed) {
      throw this.closedError(request);
    }

    const frame = this.encode(request);

    let socket: DealerSocket;
    try {
      socket = await this.ensureSocket();
    } catch (err: unknown) {
      this.connecting = null;
      throw new PipelineError({
        code: ErrorCode.TRANSPORT_ERROR,
        message: `Could not reach gateway at ${this.address}`,
        kind: request.kind,
        operationId: request.id,
        cause: err,
      });
    }

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(request.id);
        this.logger.warn('request timed out', { operation: request.id, kind: request.kind, timeout_ms: this.timeoutMs });
        reject(
          new PipelineError({
            code: ErrorCode.TRANSPORT_TIMEOUT,
            message: `Gateway did not acknowledge "${request.kind}" within ${this.timeoutMs}ms`,
            kind: request.kind,
            operationId: request.id,
          }),
        );
      }, this.timeoutMs);

      this.pending.set(request.id, { request, resolve, reject, timer });

      void socket.send(frame).catch((err: unknown) => {
        if (!this.pending.delete(request.id)) return;
        clearTimeout(timer);
        reject(
          new PipelineError({
            code: ErrorCode.TRANSPORT_ERROR,
            message: `Failed to send "${request.kind}" to gateway`,
            kind: request.kind,
            operationId: request.id,
            cause: err,
          }),
        );
      });
    });
  }

  private encode(request: TransportRequest): Buffer {
    try {
      return Buffer.from(JSON.stringify(request));
    } catch (err: unknown) {
      throw new PipelineError({
        code: ErrorCode.VALIDATION_FAILED,
        message: `Cannot encode "${request.kind}" for the gateway`,
        kind: request.kind,
        operationId: request.id,
        cause: err,
      });
    }
  }

  /** Fail every pending request and close the socket. Idempotent. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer);
      entry.reject(this.closedError(entry.request));
    }
    this.pending.clear();

    const socket = this.socket;
    this.socket = null;
    if (socket !== null) {
      await socket.close();
    }
  }

  // -------------------------------------------------------------------------
  // Socket
  // -------------------------------------------------------------------------

  private ensureSocket(): Promise<DealerSocket> {
    if (this.connecting === null) {
      this.connecting = this.openSocket();
    }
    return this.connecting;
  }

  private async openSocket(): Promise<DealerSocket> {
    const socket = this.socketFactory.createDealer();
    socket.on('message', (payload) => this.receive(payload));
    try {
      await socket.connect(this.address);
    } catch (err: unknown) {
      await socket.close();
      throw err;
    }
    if (this.closed) {
      await socket.close();
      throw new Error('Transport closed while connecting');
    }
    this.socket = socket;
    this.logger.debug('connected to gateway', { address: this.address });
    return socket;
  }

  // -------------------------------------------------------------------------
  // Inbound frames
  // -------------------------------------------------------------------------

  private receive(payload: Buffer): void {
    let decoded: unknown;
    try {
      decoded = JSON.parse(payload.toString('utf8'));
    } catch (err: unknown) {
      this.logger.warn('dropped undecodable frame', { error: err instanceof Error ? err : String(err) });
      return;
    }

    const validator = getPayloadValidator();
    if (!validator.isInboundFrame(decoded)) {
      this.logger.warn('dropped invalid frame', { errors: validator.lastFrameErrors() });
      return;
    }

    if (decoded.type === 'ack') {
      this.acknowledge(decoded);
    } else {
      this.emit(decoded.event);
    }
  }

  private acknowledge(frame: AckFrame): void {
    const entry = this.pending.get(frame.id);
    if (entry === undefined) {
      this.logger.debug('ack for unknown request ignored', { operation: frame.id });
      return;
    }
    this.pending.delete(frame.id);
    clearTimeout(entry.timer);

    const { request } = entry;
    if (frame.error !== undefined) {
      const suffix = frame.error.code !== undefined ? ` [${frame.error.code}]` : '';
      entry.reject(
        new PipelineError({
          code: ErrorCode.TRANSPORT_ERROR,
          message: `Gateway rejected "${request.kind}": ${frame.error.message}${suffix}`,
          kind: request.kind,
          operationId: request.id,
        }),
      );
      return;
    }

    if (request.kind === 'connect') {
      this.emit({ kind: 'connectionStateChanged', payload: { connected: true } });
    } else if (request.kind === 'disconnect') {
      this.emit({ kind: 'connectionStateChanged', payload: { connected: false, reason: 'disconnect requested' } });
    }
    entry.resolve();
  }

  private emit(event: TransportEvent): void {
    for (const handler of this.handlers) {
      handler(event);
    }
  }

  private closedError(request: TransportRequest): PipelineError {
    return new PipelineError({
      code: ErrorCode.TRANSPORT_ERROR,
      message: 'Transport is closed',
      retriable: false,
      kind: request.kind,
      operationId: request.id,
    });
  }
}
