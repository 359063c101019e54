/**
 * DeviceClient: promise-returning facade over a device pipeline.
 *
 * Each method creates one operation, submits it, and settles when that
 * operation completes: resolved on success, rejected with the operation's
 * error otherwise. Validation failures reject before anything is
 * submitted.
 *
 * @example
 * ```ts
 * const client = createDeviceClient({ socketFactory: new ZmqSocketFactory(), config });
 * client.onEvent((event) => console.log(event.kind));
 * await client.useSymmetricKey(source);
 * await client.connect();
 * await client.sendTelemetry({ temperature: 21.5 });
 * await client.shutdown();
 * ```
 */

import type {
  CertificateCredentialSource,
  SymmetricKeyCredentialSource,
} from '../types/credentials.js';
import type { MessageBody, MessageProperties, Operation } from '../types/operations.js';
import type { EventHandler } from '../types/events.js';
import type { PipelineConfig } from '../types/config.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import type { SocketFactory } from '../types/socket.js';
import type { Transport } from '../types/transport.js';
import type { Logger } from './logger.js';
import type { DefectHandler } from './pipeline/serial-executor.js';
import type { BackgroundErrorHandler, Pipeline } from './pipeline/pipeline.js';
import { addCallback, createOperation } from './pipeline/operations.js';
import { createDevicePipeline } from './device-pipeline.js';
import { DealerTransport, dealerTransportOptionsFromConfig } from './dealer-transport.js';

// ---------------------------------------------------------------------------
// DeviceClient
// ---------------------------------------------------------------------------

export class DeviceClient {
  readonly pipeline: Pipeline;

  constructor(pipeline: Pipeline) {
    this.pipeline = pipeline;
  }

  /** Authenticate with a shared access signature source. */
  useSymmetricKey(source: SymmetricKeyCredentialSource): Promise<void> {
    return this.submit(() => createOperation('setSymmetricKeySecurityClient', { securityClient: source }));
  }

  /** Authenticate with an X.509 client certificate source. */
  useCertificate(source: CertificateCredentialSource): Promise<void> {
    return this.submit(() => createOperation('setX509SecurityClient', { securityClient: source }));
  }

  connect(): Promise<void> {
    return this.submit(() => createOperation('connect', {}));
  }

  disconnect(): Promise<void> {
    return this.submit(() => createOperation('disconnect', {}));
  }

  sendTelemetry(body: MessageBody, properties?: MessageProperties): Promise<void> {
    return this.submit(() =>
      createOperation('sendTelemetry', properties !== undefined ? { body, properties } : { body }),
    );
  }

  uploadBlob(blobName: string, content: string, contentType?: string): Promise<void> {
    return this.submit(() =>
      createOperation(
        'uploadBlob',
        contentType !== undefined ? { blobName, content, contentType } : { blobName, content },
      ),
    );
  }

  /** Answer a `methodRequest` event. */
  sendMethodResponse(requestId: string, status: number, body?: unknown): Promise<void> {
    return this.submit(() =>
      createOperation(
        'methodResponse',
        body !== undefined ? { requestId, status, body } : { requestId, status },
      ),
    );
  }

  /** Register the device with the provisioning service. */
  register(payload?: Record<string, unknown>): Promise<void> {
    return this.submit(() => createOperation('register', payload !== undefined ? { payload } : {}));
  }

  /** Receive every event that reaches the top of the pipeline. Replaces any earlier handler. */
  onEvent(handler: EventHandler): void {
    this.pipeline.onEvent(handler);
  }

  onBackgroundError(handler: BackgroundErrorHandler): void {
    this.pipeline.onBackgroundError(handler);
  }

  /** Shut the pipeline down; pending calls reject with PIPELINE_SHUTDOWN. */
  shutdown(): Promise<void> {
    return this.pipeline.shutdown();
  }

  private submit(create: () => Operation): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const op = create();
      addCallback(op, (_op, error) => {
        if (error === null) {
          resolve();
        } else {
          reject(error);
        }
      });
      this.pipeline.runOp(op);
    });
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

interface DeviceClientBaseOptions {
  config?: PipelineConfig;
  name?: string;
  logger?: Logger;
  onDefect?: DefectHandler;
}

/** Either a ready transport, or a socket factory for the gateway DEALER transport. */
export type DeviceClientOptions = DeviceClientBaseOptions &
  ({ transport: Transport } | { socketFactory: SocketFactory });

/**
 * Build a client over the standard device pipeline. With a socket
 * factory, requests go to the gateway named in `[transport]`.
 */
export function createDeviceClient(options: DeviceClientOptions): DeviceClient {
  const config = options.config ?? DEFAULT_CONFIG;
  const transport =
    'transport' in options
      ? options.transport
      : new DealerTransport({
          ...dealerTransportOptionsFromConfig(config.transport, options.socketFactory),
          logger: options.logger?.child('transport'),
        });

  return new DeviceClient(
    createDevicePipeline({
      transport,
      config,
      name: options.name,
      logger: options.logger,
      onDefect: options.onDefect,
    }),
  );
}
