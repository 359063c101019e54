/**
 * FakeGateway: in-process stand-in for the local device gateway.
 *
 * Binds a fake ROUTER socket, decodes every request frame a dealer
 * sends, and answers through a responder. Tests can also push event
 * frames or raw bytes to every dealer that has spoken to it.
 */

import type { FakeSocketFactory } from './fake-socket-factory.js';
import type { FakeRouterSocket } from './fake-sockets.js';

export interface GatewayRequest {
  id: number;
  kind: string;
  payload: Record<string, unknown>;
}

/**
 * How the gateway answers a request:
 *   'ack'                    acknowledge success
 *   { error }                acknowledge with an error
 *   'ignore'                 never answer (the request times out)
 */
export type GatewayReply = 'ack' | 'ignore' | { error: { message: string; code?: string } };

export type GatewayResponder = (request: GatewayRequest) => GatewayReply;

export class FakeGateway {
  readonly requests: GatewayRequest[] = [];
  readonly undecodable: Buffer[] = [];
  responder: GatewayResponder = () => 'ack';

  private readonly router: FakeRouterSocket;
  private readonly peers = new Map<string, Buffer>();

  private constructor(router: FakeRouterSocket) {
    this.router = router;
    router.on('message', (identity, _delimiter, payload) => this.receive(identity, payload));
  }

  /** Bind a gateway at `address` on the factory's endpoint registry. */
  static async start(factory: FakeSocketFactory, address: string): Promise<FakeGateway> {
    const router = factory.createFakeRouter();
    await router.bind(address);
    return new FakeGateway(router);
  }

  /** Kinds of every decoded request, in arrival order. */
  kinds(): string[] {
    return this.requests.map((request) => request.kind);
  }

  /** Push an event frame to every known dealer. */
  async pushEvent(event: { kind: string; payload: unknown }): Promise<void> {
    await this.broadcast(Buffer.from(JSON.stringify({ type: 'event', event })));
  }

  /** Push arbitrary bytes to every known dealer. */
  async pushRaw(frame: string | Buffer): Promise<void> {
    await this.broadcast(typeof frame === 'string' ? Buffer.from(frame) : frame);
  }

  /** Acknowledge a request the responder chose to ignore. */
  async ack(id: number, error?: { message: string; code?: string }): Promise<void> {
    const frame = error === undefined ? { type: 'ack', id } : { type: 'ack', id, error };
    await this.broadcast(Buffer.from(JSON.stringify(frame)));
  }

  async stop(): Promise<void> {
    await this.router.close();
  }

  private receive(identity: Buffer, payload: Buffer): void {
    this.peers.set(identity.toString(), identity);

    const request = decodeRequest(payload);
    if (request === null) {
      this.undecodable.push(payload);
      return;
    }
    this.requests.push(request);

    const reply = this.responder(request);
    if (reply === 'ignore') return;
    const frame = reply === 'ack' ? { type: 'ack', id: request.id } : { type: 'ack', id: request.id, ...reply };
    void this.router.send(identity, Buffer.alloc(0), Buffer.from(JSON.stringify(frame)));
  }

  private async broadcast(frame: Buffer): Promise<void> {
    await Promise.all(
      [...this.peers.values()].map((identity) => this.router.send(identity, Buffer.alloc(0), frame)),
    );
  }
}

function decodeRequest(payload: Buffer): GatewayRequest | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload.toString('utf8'));
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;
  const { id, kind, payload: body } = parsed;
  if (typeof id !== 'number' || typeof kind !== 'string' || !isRecord(body)) {
    return null;
  }
  return { id, kind, payload: body };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
