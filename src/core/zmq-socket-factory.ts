/**
 * Production SocketFactory backed by real ZeroMQ sockets.
 *
 * Adapts the zeromq v6 class API (async iterators, multipart arrays) to
 * the callback-based DealerSocket interface in src/types/socket.ts.
 *
 * @see src/types/socket.ts for the interfaces
 * @see src/testing/fake-socket-factory.ts for the test double
 */

import * as zmq from 'zeromq';

import type { SocketFactory, DealerSocket, DealerMessageHandler } from '../types/socket.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Receive loop
// ---------------------------------------------------------------------------

/**
 * Drain a socket's async iterator into `deliver` until it ends. A failure
 * after close() is the normal end of the loop; any other failure is
 * logged.
 */
function startReceiveLoop(
  socket: AsyncIterable<Buffer[]>,
  deliver: (frames: Buffer[]) => void,
  isOpen: () => boolean,
  logger: Logger,
): void {
  void (async () => {
    try {
      for await (const frames of socket) {
        deliver(frames);
      }
    } catch (err: unknown) {
      if (isOpen()) {
        logger.warn('receive loop failed', { error: err instanceof Error ? err : String(err) });
      }
    }
  })();
}

// ---------------------------------------------------------------------------
// ZMQ Dealer adapter
// ---------------------------------------------------------------------------

class ZmqDealerSocket implements DealerSocket {
  private readonly socket: zmq.Dealer;
  private readonly handlers: DealerMessageHandler[] = [];
  private receiving = false;
  private closed = false;
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
    this.socket = new zmq.Dealer();
    this.socket.linger = 0;
  }

  async connect(address: string): Promise<void> {
    this.socket.connect(address);
  }

  async send(payload: Buffer): Promise<void> {
    await this.socket.send([payload]);
  }

  on(_event: 'message', handler: DealerMessageHandler): void {
    this.handlers.push(handler);
    if (this.receiving) return;
    this.receiving = true;
    startReceiveLoop(
      this.socket,
      ([payload]) => {
        if (payload === undefined) return;
        for (const h of this.handlers) {
          h(payload);
        }
      },
      () => !this.closed,
      this.logger,
    );
  }

  async close(): Promise<void> {
    this.closed = true;
    this.socket.close();
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * SocketFactory that creates real ZeroMQ sockets.
 *
 * Sockets are created with `linger = 0` so close() never blocks on unsent
 * frames; the gateway is always local.
 */
export class ZmqSocketFactory implements SocketFactory {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('zmq');
  }

  createDealer(): DealerSocket {
    return new ZmqDealerSocket(this.logger.child('dealer'));
  }
}
