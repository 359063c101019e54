import { describe, it, expect, vi } from 'vitest';
import { ErrorCode } from '../../types/errors.js';
import { Pipeline } from './pipeline.js';
import { createEvent, createOperation } from './operations.js';
import { TransportCoordinationStage, topics } from './stage-3-coordination.js';
import { RecordingStage } from '../../testing/recording-stage.js';
import { createClientCertificate, createConnectionArgs } from '../../testing/factories.js';

function setup(options: { connected?: boolean; withArgs?: boolean } = {}) {
  const tail = new RecordingStage({ name: 'tail' });
  const pipeline = new Pipeline({ stages: [new TransportCoordinationStage(), tail] });
  if (options.withArgs ?? true) {
    pipeline.state.connectionArgs = createConnectionArgs();
  }
  pipeline.state.connected = options.connected ?? false;
  return { pipeline, tail };
}

// ---------------------------------------------------------------------------
// topics
// ---------------------------------------------------------------------------

describe('topics', () => {
  const args = createConnectionArgs({ registrationId: 'pump-3', idScope: '0ne-scope' });

  it('derives every topic from the connection arguments', () => {
    expect(topics.telemetry(args)).toBe('devices/pump-3/telemetry');
    expect(topics.blob(args, 'dump.bin')).toBe('devices/pump-3/blobs/dump.bin');
    expect(topics.methodResponse(args, 'r-9')).toBe('devices/pump-3/methods/res/r-9');
    expect(topics.registration(args)).toBe('provisioning/0ne-scope/registrations/pump-3');
  });
});

// ---------------------------------------------------------------------------
// TransportCoordinationStage
// ---------------------------------------------------------------------------

describe('TransportCoordinationStage', () => {
  describe('connection arguments', () => {
    it('forwards plain connection arguments and records them on success', async () => {
      const { pipeline, tail } = setup({ withArgs: false });
      const op = createOperation('setConnectionArgs', createConnectionArgs());

      pipeline.runOp(op);
      await pipeline.whenIdle();
      expect(tail.received).toEqual([op]);
      expect(pipeline.state.connectionArgs).toBeNull();

      tail.settle(op);
      await pipeline.whenIdle();
      expect(pipeline.state.connectionArgs).toEqual(createConnectionArgs());
    });

    it('keeps the previous arguments when setting new ones fails', async () => {
      const { pipeline, tail } = setup();
      const op = createOperation('setConnectionArgs', createConnectionArgs({ registrationId: 'other' }));

      pipeline.runOp(op);
      await pipeline.whenIdle();
      tail.settle(op, new Error('rejected'));
      await pipeline.whenIdle();

      expect(pipeline.state.connectionArgs).toEqual(createConnectionArgs());
    });

    it('splits a token-carrying operation into arguments, then the token', async () => {
      const { pipeline, tail } = setup({ withArgs: false });
      const op = createOperation('setConnectionArgs', { ...createConnectionArgs(), sasToken: 'test-token' });

      pipeline.runOp(op);
      await pipeline.whenIdle();
      expect(tail.kinds()).toEqual(['setConnectionArgs']);
      expect(tail.received[0].payload).toEqual(createConnectionArgs());

      tail.settle(tail.received[0]);
      await pipeline.whenIdle();
      expect(tail.kinds()).toEqual(['setConnectionArgs', 'setCredentialToken']);
      expect(tail.received[1].payload).toEqual({ sasToken: 'test-token' });
      expect(op.completed).toBe(false);

      tail.settle(tail.received[1]);
      await pipeline.whenIdle();
      expect(op.completed).toBe(true);
      expect(op.error).toBeNull();
      expect(pipeline.state.connectionArgs).toEqual(createConnectionArgs());
    });

    it('splits a certificate-carrying operation into arguments, then the certificate', async () => {
      const { pipeline, tail } = setup({ withArgs: false });
      const certificate = createClientCertificate();
      const op = createOperation('setConnectionArgs', { ...createConnectionArgs(), clientCertificate: certificate });

      pipeline.runOp(op);
      await pipeline.whenIdle();
      tail.settle(tail.received[0]);
      await pipeline.whenIdle();

      expect(tail.kinds()).toEqual(['setConnectionArgs', 'setClientCertificate']);
      expect(tail.received[1].payload).toEqual({ certificate });
    });

    it('does not send the credential when the arguments are rejected', async () => {
      const { pipeline, tail } = setup({ withArgs: false });
      const failure = new Error('unknown scope');
      const op = createOperation('setConnectionArgs', { ...createConnectionArgs(), sasToken: 'test-token' });

      pipeline.runOp(op);
      await pipeline.whenIdle();
      tail.settle(tail.received[0], failure);
      await pipeline.whenIdle();

      expect(tail.kinds()).toEqual(['setConnectionArgs']);
      expect(op.error).toBe(failure);
      expect(pipeline.state.connectionArgs).toBeNull();
    });
  });

  describe('connection state', () => {
    it('marks the pipeline connected when connect succeeds', async () => {
      const { pipeline, tail } = setup();
      const op = createOperation('connect', {});

      pipeline.runOp(op);
      await pipeline.whenIdle();
      expect(tail.received).toEqual([op]);
      expect(pipeline.state.connected).toBe(false);

      tail.settle(op);
      await pipeline.whenIdle();
      expect(pipeline.state.connected).toBe(true);
    });

    it('marks the pipeline disconnected when disconnect succeeds', async () => {
      const { pipeline, tail } = setup({ connected: true });
      const op = createOperation('disconnect', {});

      pipeline.runOp(op);
      await pipeline.whenIdle();
      tail.settle(op);
      await pipeline.whenIdle();

      expect(pipeline.state.connected).toBe(false);
    });

    it('leaves the state alone when connect fails', async () => {
      const { pipeline, tail } = setup();
      const op = createOperation('connect', {});

      pipeline.runOp(op);
      await pipeline.whenIdle();
      tail.settle(op, new Error('refused'));
      await pipeline.whenIdle();

      expect(pipeline.state.connected).toBe(false);
    });

    it('follows connectionStateChanged events and passes them up', async () => {
      const { pipeline, tail } = setup({ connected: true });
      const handler = vi.fn();
      pipeline.onEvent(handler);
      const event = createEvent('connectionStateChanged', { connected: false, reason: 'gateway restarted' });

      tail.emit(event);
      await pipeline.whenIdle();

      expect(pipeline.state.connected).toBe(false);
      expect(handler).toHaveBeenCalledWith(event);
    });

    it('passes other events up untouched', async () => {
      const { pipeline, tail } = setup({ connected: true });
      const handler = vi.fn();
      pipeline.onEvent(handler);
      const event = createEvent('methodRequest', { requestId: 'r-1', methodName: 'reboot' });

      tail.emit(event);
      await pipeline.whenIdle();

      expect(pipeline.state.connected).toBe(true);
      expect(handler).toHaveBeenCalledWith(event);
    });
  });

  describe('messages', () => {
    it('fails with OPERATION_FAILED before connection arguments are set', async () => {
      const { pipeline, tail } = setup({ withArgs: false });
      const op = createOperation('sendTelemetry', { body: 'reading' });

      pipeline.runOp(op);
      await pipeline.whenIdle();

      expect(op.error).toMatchObject({
        code: ErrorCode.OPERATION_FAILED,
        kind: 'sendTelemetry',
        message: 'Cannot perform "sendTelemetry" before connection arguments are set',
      });
      expect(tail.received).toEqual([]);
    });

    it('connects first when disconnected', async () => {
      const { pipeline, tail } = setup();
      const op = createOperation('sendTelemetry', { body: { temperature: 19 }, properties: { unit: 'C' } });

      pipeline.runOp(op);
      await pipeline.whenIdle();
      expect(tail.kinds()).toEqual(['connect']);

      tail.settle(tail.received[0]);
      await pipeline.whenIdle();
      expect(pipeline.state.connected).toBe(true);
      expect(tail.kinds()).toEqual(['connect', 'send']);
      expect(tail.received[1].payload).toEqual({
        topic: 'devices/device-001/telemetry',
        body: { temperature: 19 },
        properties: { unit: 'C' },
      });

      tail.settle(tail.received[1]);
      await pipeline.whenIdle();
      expect(op.completed).toBe(true);
      expect(op.error).toBeNull();
    });

    it('fails the message when the implicit connect fails', async () => {
      const { pipeline, tail } = setup();
      const failure = new Error('refused');
      const op = createOperation('sendTelemetry', { body: 'reading' });

      pipeline.runOp(op);
      await pipeline.whenIdle();
      tail.settle(tail.received[0], failure);
      await pipeline.whenIdle();

      expect(tail.kinds()).toEqual(['connect']);
      expect(op.error).toBe(failure);
      expect(pipeline.state.connected).toBe(false);
    });

    it('shares one connect between messages that arrive while it is in flight', async () => {
      const { pipeline, tail } = setup();
      const ops = [1, 2, 3].map((n) => createOperation('sendTelemetry', { body: { reading: n } }));

      for (const op of ops) {
        pipeline.runOp(op);
      }
      await pipeline.whenIdle();
      expect(tail.kinds()).toEqual(['connect']);

      tail.settle(tail.received[0]);
      await pipeline.whenIdle();
      expect(tail.kinds()).toEqual(['connect', 'send', 'send', 'send']);
      expect(tail.received.slice(1).map((op) => op.payload)).toEqual([
        { topic: 'devices/device-001/telemetry', body: { reading: 1 } },
        { topic: 'devices/device-001/telemetry', body: { reading: 2 } },
        { topic: 'devices/device-001/telemetry', body: { reading: 3 } },
      ]);

      for (const send of tail.received.slice(1)) {
        tail.settle(send);
      }
      await pipeline.whenIdle();
      expect(ops.map((op) => op.completed)).toEqual([true, true, true]);
      expect(ops.map((op) => op.error)).toEqual([null, null, null]);
    });

    it('fails every waiting message when the shared connect fails', async () => {
      const { pipeline, tail } = setup();
      const failure = new Error('refused');
      const ops = [1, 2, 3].map((n) => createOperation('sendTelemetry', { body: n }));

      for (const op of ops) {
        pipeline.runOp(op);
      }
      await pipeline.whenIdle();
      tail.settle(tail.received[0], failure);
      await pipeline.whenIdle();

      expect(tail.kinds()).toEqual(['connect']);
      expect(ops.map((op) => op.error)).toEqual([failure, failure, failure]);
      expect(pipeline.pendingCount).toBe(0);
    });

    it('waits for a connect issued by the caller', async () => {
      const { pipeline, tail } = setup();
      const connect = createOperation('connect', {});
      const op = createOperation('sendTelemetry', { body: 'reading' });

      pipeline.runOp(connect);
      pipeline.runOp(op);
      await pipeline.whenIdle();
      expect(tail.received).toEqual([connect]);

      tail.settle(connect);
      await pipeline.whenIdle();
      expect(tail.kinds()).toEqual(['connect', 'send']);
    });

    it('issues a fresh connect after the previous one failed', async () => {
      const { pipeline, tail } = setup();

      pipeline.runOp(createOperation('sendTelemetry', { body: 1 }));
      await pipeline.whenIdle();
      tail.settle(tail.received[0], new Error('refused'));
      await pipeline.whenIdle();

      pipeline.runOp(createOperation('sendTelemetry', { body: 2 }));
      await pipeline.whenIdle();
      expect(tail.kinds()).toEqual(['connect', 'connect']);
      expect(tail.received[1]).not.toBe(tail.received[0]);
    });

    it('sends directly when already connected', async () => {
      const { pipeline, tail } = setup({ connected: true });
      const op = createOperation('sendTelemetry', { body: 'reading' });

      pipeline.runOp(op);
      await pipeline.whenIdle();

      expect(tail.kinds()).toEqual(['send']);
      expect(tail.received[0].payload).toEqual({ topic: 'devices/device-001/telemetry', body: 'reading' });
    });

    it('sends a blob with its content type', async () => {
      const { pipeline, tail } = setup({ connected: true });

      pipeline.runOp(createOperation('uploadBlob', { blobName: 'log.txt', content: 'boot ok', contentType: 'text/plain' }));
      pipeline.runOp(createOperation('uploadBlob', { blobName: 'empty.bin', content: '' }));
      await pipeline.whenIdle();

      expect(tail.received.map((op) => op.payload)).toEqual([
        { topic: 'devices/device-001/blobs/log.txt', body: 'boot ok', properties: { 'content-type': 'text/plain' } },
        { topic: 'devices/device-001/blobs/empty.bin', body: '' },
      ]);
    });

    it('sends a method response with its status', async () => {
      const { pipeline, tail } = setup({ connected: true });

      pipeline.runOp(createOperation('methodResponse', { requestId: 'r-1', status: 200, body: { rebooted: true } }));
      pipeline.runOp(createOperation('methodResponse', { requestId: 'r-2', status: 404 }));
      await pipeline.whenIdle();

      expect(tail.received.map((op) => op.payload)).toEqual([
        { topic: 'devices/device-001/methods/res/r-1', body: { status: 200, payload: { rebooted: true } } },
        { topic: 'devices/device-001/methods/res/r-2', body: { status: 404, payload: null } },
      ]);
    });

    it('sends a registration request', async () => {
      const { pipeline, tail } = setup({ connected: true });

      pipeline.runOp(createOperation('register', { payload: { model: 'thermo-2' } }));
      pipeline.runOp(createOperation('register', {}));
      await pipeline.whenIdle();

      expect(tail.received.map((op) => op.payload)).toEqual([
        {
          topic: 'provisioning/0ne-test-scope/registrations/device-001',
          body: { registrationId: 'device-001', payload: { model: 'thermo-2' } },
        },
        {
          topic: 'provisioning/0ne-test-scope/registrations/device-001',
          body: { registrationId: 'device-001', payload: {} },
        },
      ]);
    });

    it('forwards low-level kinds it does not translate', async () => {
      const { pipeline, tail } = setup();
      const op = createOperation('send', { topic: 'custom/topic', body: 'raw' });

      pipeline.runOp(op);
      await pipeline.whenIdle();

      expect(tail.received).toEqual([op]);
    });
  });
});
