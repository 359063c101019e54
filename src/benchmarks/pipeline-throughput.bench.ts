/**
 * Pipeline throughput benchmark.
 *
 * Measures telemetry operations/second through the standard four-stage
 * device pipeline, once over an in-memory transport and once over the
 * DEALER transport talking to an in-process fake gateway.
 */

import { bench, describe } from 'vitest';
import { createDeviceClient } from '../core/device-client.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import { configureLogging } from '../core/logger.js';
import { FakeTransport } from '../testing/fake-transport.js';
import { FakeSocketFactory } from '../testing/fake-socket-factory.js';
import { FakeGateway } from '../testing/fake-gateway.js';
import { createSymmetricKeySource } from '../testing/factories.js';

configureLogging({ level: 'error' });

// Module-level setup: runs once before benchmarks
const direct = createDeviceClient({ transport: new FakeTransport(() => null), name: 'bench-direct' });
await direct.useSymmetricKey(createSymmetricKeySource());
await direct.connect();

const factory = new FakeSocketFactory();
await FakeGateway.start(factory, 'inproc://bench-gateway');
const gatewayed = createDeviceClient({
  socketFactory: factory,
  config: { ...DEFAULT_CONFIG, transport: { address: 'inproc://bench-gateway', timeout_ms: 5_000 } },
  name: 'bench-gateway',
});
await gatewayed.useSymmetricKey(createSymmetricKeySource());
await gatewayed.connect();

describe('pipeline throughput', () => {
  bench(
    'sendTelemetry over an in-memory transport',
    async () => {
      await direct.sendTelemetry({ temperature: 21.5 });
    },
    { iterations: 1_000, time: 5000 },
  );

  bench(
    'sendTelemetry over the DEALER transport',
    async () => {
      await gatewayed.sendTelemetry({ temperature: 21.5 });
    },
    { iterations: 500, time: 5000 },
  );

  bench(
    '50 concurrent sendTelemetry calls',
    async () => {
      await Promise.all(Array.from({ length: 50 }, (_, reading) => direct.sendTelemetry({ reading })));
    },
    { iterations: 100, time: 5000 },
  );
});
