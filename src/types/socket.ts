/**
 * Socket abstraction interfaces.
 *
 * These interfaces decouple the DEALER transport from the concrete ZeroMQ
 * implementation so that tests can swap in fake (in-memory) sockets
 * without touching real network I/O.
 *
 *   DEALER: device side, one per pipeline, talks to the local gateway
 *   ROUTER: gateway side, implemented only by the in-memory test gateway
 *
 * Every I/O method returns Promise<void>. Message delivery uses a callback
 * registration pattern rather than Node EventEmitter so that
 * implementations stay framework-agnostic.
 */

// ---------------------------------------------------------------------------
// Message handler types
// ---------------------------------------------------------------------------

/** Handler for ROUTER socket incoming messages (identity + delimiter + payload). */
export type RouterMessageHandler = (identity: Buffer, delimiter: Buffer, payload: Buffer) => void;

/** Handler for DEALER socket incoming messages (payload frame only). */
export type DealerMessageHandler = (payload: Buffer) => void;

// ---------------------------------------------------------------------------
// ROUTER socket
// ---------------------------------------------------------------------------

/**
 * Router side of the ROUTER/DEALER channel.
 *
 * Binds to an address and multiplexes messages to/from multiple dealer
 * connections. Each dealer is identified by a unique identity frame.
 */
export interface RouterSocket {
  /** Bind to a transport address. */
  bind(address: string): Promise<void>;

  /**
   * Register a handler for incoming messages.
   * Messages arrive as [identity, delimiter (empty), payload].
   */
  on(event: 'message', handler: RouterMessageHandler): void;

  /**
   * Send a message to a specific dealer.
   * Frames: [identity, delimiter (empty), payload].
   */
  send(identity: Buffer, delimiter: Buffer, payload: Buffer): Promise<void>;

  /** Close the socket and release resources. */
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// DEALER socket
// ---------------------------------------------------------------------------

/**
 * Dealer side of the ROUTER/DEALER channel.
 *
 * Connects to a router and exchanges single-frame payloads. The router
 * prepends/strips the identity frame transparently.
 */
export interface DealerSocket {
  /** Connect to a router address. */
  connect(address: string): Promise<void>;

  /** Send a single payload frame to the router. */
  send(payload: Buffer): Promise<void>;

  /** Register a handler for incoming messages from the router. */
  on(event: 'message', handler: DealerMessageHandler): void;

  /** Close the socket and release resources. */
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Socket factory
// ---------------------------------------------------------------------------

/**
 * Abstract factory for creating socket instances.
 *
 * Production code injects a factory backed by real ZeroMQ sockets; tests
 * inject a FakeSocketFactory that creates in-memory fakes.
 */
export interface SocketFactory {
  /** Create a new DEALER socket. */
  createDealer(): DealerSocket;
}
