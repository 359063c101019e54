/**
 * Telemetry device: minimal example of a device built on the pipeline.
 *
 * Reads pipeline.toml, authenticates with a shared access signature from
 * the environment, answers "reboot" method requests and sends one
 * temperature reading every five seconds until interrupted.
 *
 *   DEVICE_SAS_TOKEN=... DEVICE_REGISTRATION_ID=device-001 node dist/examples/telemetry-device.js
 */

import {
  applyLoggingConfig,
  createDeviceClient,
  createLogger,
  loadConfig,
  ZmqSocketFactory,
  type SymmetricKeyCredentialSource,
} from '../src/index.js';

const logger = createLogger('telemetry-device');
const config = loadConfig();
applyLoggingConfig(config);

const source: SymmetricKeyCredentialSource = {
  getHost: () => process.env['DEVICE_PROVISIONING_HOST'] ?? 'localhost',
  getRegistrationId: () => process.env['DEVICE_REGISTRATION_ID'] ?? 'device-001',
  getScope: () => process.env['DEVICE_ID_SCOPE'] ?? 'local',
  getCurrentToken: () => {
    const token = process.env['DEVICE_SAS_TOKEN'];
    if (token === undefined || token.length === 0) {
      throw new Error('DEVICE_SAS_TOKEN is not set');
    }
    return token;
  },
};

const client = createDeviceClient({ socketFactory: new ZmqSocketFactory(), config, name: 'telemetry-device' });

client.onEvent((event) => {
  switch (event.kind) {
    case 'connectionStateChanged':
      logger.info('connection state changed', { connected: event.payload.connected });
      return;
    case 'methodRequest':
      if (event.payload.methodName === 'reboot') {
        client.sendMethodResponse(event.payload.requestId, 200, { accepted: true }).catch((err: unknown) => {
          logger.error('method response failed', { error: err instanceof Error ? err : String(err) });
        });
      } else {
        client.sendMethodResponse(event.payload.requestId, 404).catch((err: unknown) => {
          logger.error('method response failed', { error: err instanceof Error ? err : String(err) });
        });
      }
      return;
    case 'messageReceived':
      logger.info('message received', { topic: event.payload.topic });
      return;
  }
});

await client.useSymmetricKey(source);
await client.register({ model: 'example-thermometer' });

const timer = setInterval(() => {
  const temperature = 20 + Math.round(Math.random() * 50) / 10;
  client.sendTelemetry({ temperature }, { unit: 'celsius' }).catch((err: unknown) => {
    logger.warn('telemetry not delivered', { error: err instanceof Error ? err : String(err) });
  });
}, 5_000);

process.once('SIGINT', () => {
  clearInterval(timer);
  void client.shutdown().then(
    () => logger.info('stopped'),
    (err: unknown) => logger.error('shutdown failed', { error: err instanceof Error ? err : String(err) }),
  );
});
