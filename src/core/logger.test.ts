import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  createLogger,
  configureLogging,
  resetLogging,
  createFileLogSink,
  NEVER_LOG_FIELDS,
  META_STRING_MAX_LENGTH,
  type LogEntry,
  type LogSink,
} from './logger.js';
import { assertValidLogEntry } from '../testing/factories.js';

// ---------------------------------------------------------------------------
// Test sink that captures log entries
// ---------------------------------------------------------------------------

function createTestSink(): { sink: LogSink; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const sink: LogSink = (entry: LogEntry) => {
    entries.push(entry);
  };
  return { sink, entries };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    const test = createTestSink();
    entries = test.entries;
    configureLogging({ level: 'debug', sink: test.sink });
  });

  afterEach(() => {
    resetLogging();
  });

  // -----------------------------------------------------------------------
  // createLogger
  // -----------------------------------------------------------------------

  describe('createLogger', () => {
    it('writes entries with the component, level and message', () => {
      createLogger('pipeline').info('pipeline linked');

      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({ level: 'info', component: 'pipeline', msg: 'pipeline linked' });
      assertValidLogEntry(entries[0]);
    });

    it('writes one entry per level method', () => {
      const logger = createLogger('pipeline');
      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(entries.map((entry) => entry.level)).toEqual(['debug', 'info', 'warn', 'error']);
    });

    it('omits meta when none is given', () => {
      createLogger('pipeline').info('plain');
      expect(entries[0].meta).toBeUndefined();
    });

    it('stamps an ISO 8601 timestamp', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
      try {
        createLogger('pipeline').info('tick');
      } finally {
        vi.useRealTimers();
      }
      expect(entries[0].ts).toBe('2026-03-01T12:00:00.000Z');
    });
  });

  // -----------------------------------------------------------------------
  // Level filtering
  // -----------------------------------------------------------------------

  describe('level filtering', () => {
    it('drops entries below the configured level', () => {
      configureLogging({ level: 'warn' });
      const logger = createLogger('pipeline');
      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(entries.map((entry) => entry.msg)).toEqual(['w', 'e']);
    });

    it('keeps the sink when only the level changes', () => {
      configureLogging({ level: 'error' });
      createLogger('pipeline').error('still captured');
      expect(entries).toHaveLength(1);
    });

    it('resetLogging restores the info level', () => {
      resetLogging();
      const { sink, entries: captured } = createTestSink();
      configureLogging({ sink });
      const logger = createLogger('pipeline');
      logger.debug('hidden');
      logger.info('shown');

      expect(captured.map((entry) => entry.msg)).toEqual(['shown']);
    });
  });

  // -----------------------------------------------------------------------
  // child / withContext
  // -----------------------------------------------------------------------

  describe('child', () => {
    it('appends the sub-component after a colon', () => {
      createLogger('stage').child('retry').info('x');
      expect(entries[0].component).toBe('stage:retry');
    });

    it('nests', () => {
      createLogger('device').child('transport').child('socket').info('x');
      expect(entries[0].component).toBe('device:transport:socket');
    });

    it('keeps bound context', () => {
      createLogger('stage', { pipeline: 'thermostat' }).child('retry').info('x');
      expect(entries[0].pipeline).toBe('thermostat');
    });
  });

  describe('withContext', () => {
    it('adds pipeline and stage to every entry', () => {
      const logger = createLogger('stage').withContext({ pipeline: 'thermostat', stage: 'retry' });
      logger.info('a');
      logger.warn('b');

      for (const entry of entries) {
        expect(entry).toMatchObject({ pipeline: 'thermostat', stage: 'retry' });
      }
    });

    it('merges with context bound earlier', () => {
      createLogger('stage', { pipeline: 'first' }).withContext({ stage: 'coordination' }).info('x');
      expect(entries[0]).toMatchObject({ pipeline: 'first', stage: 'coordination' });
    });

    it('later context overrides earlier', () => {
      createLogger('stage', { pipeline: 'first' }).withContext({ pipeline: 'second' }).info('x');
      expect(entries[0].pipeline).toBe('second');
    });

    it('leaves the original logger unchanged', () => {
      const base = createLogger('stage');
      base.withContext({ pipeline: 'thermostat' });
      base.info('x');
      expect(entries[0].pipeline).toBeUndefined();
    });
  });

  // -----------------------------------------------------------------------
  // Promotion
  // -----------------------------------------------------------------------

  describe('field promotion', () => {
    it('moves tracing fields to the top level', () => {
      createLogger('pipeline').debug('operation completed', {
        operation: 7,
        kind: 'connect',
        duration_ms: 12,
        ok: false,
        error_code: 'TRANSPORT_TIMEOUT',
        attempt: 2,
      });

      expect(entries[0]).toMatchObject({
        operation: 7,
        kind: 'connect',
        duration_ms: 12,
        ok: false,
        error_code: 'TRANSPORT_TIMEOUT',
        meta: { attempt: 2 },
      });
    });

    it('drops promoted keys with the wrong type', () => {
      createLogger('pipeline').info('x', { operation: 'seven', kind: 3 });

      expect(entries[0].operation).toBeUndefined();
      expect(entries[0].kind).toBeUndefined();
      expect(entries[0].meta).toBeUndefined();
    });

    it('lets meta override bound context', () => {
      createLogger('pipeline', { stage: 'retry' }).info('x', { stage: 'transport' });
      expect(entries[0].stage).toBe('transport');
    });

    it('skips an undefined error_code', () => {
      createLogger('pipeline').info('x', { error_code: undefined });
      expect('error_code' in entries[0]).toBe(false);
    });
  });

  // -----------------------------------------------------------------------
  // Sanitization
  // -----------------------------------------------------------------------

  describe('metadata sanitization', () => {
    it('never logs credential fields', () => {
      createLogger('stage').info('credential applied', {
        sasToken: 'test-secret',
        clientCertificate: { cert: 'c', key: 'k' },
        registrationId: 'device-001',
      });

      expect(entries[0].meta).toEqual({ registrationId: 'device-001' });
    });

    it('denies every listed field', () => {
      const meta = Object.fromEntries([...NEVER_LOG_FIELDS].map((field) => [field, 'test-secret']));
      createLogger('stage').info('x', meta);

      expect(entries[0].meta).toBeUndefined();
    });

    it('truncates long strings', () => {
      createLogger('stage').info('x', { body: 'a'.repeat(META_STRING_MAX_LENGTH + 10) });

      expect(entries[0].meta?.['body']).toBe('a'.repeat(META_STRING_MAX_LENGTH) + '...[truncated]');
    });

    it('keeps strings at the limit', () => {
      const body = 'a'.repeat(META_STRING_MAX_LENGTH);
      createLogger('stage').info('x', { body });

      expect(entries[0].meta?.['body']).toBe(body);
    });

    it('serializes errors', () => {
      const error = new TypeError('bad frame');
      createLogger('stage').warn('x', { error });

      expect(entries[0].meta?.['error']).toEqual({ name: 'TypeError', message: 'bad frame', stack: error.stack });
    });

    it('passes other values through', () => {
      createLogger('stage').info('x', { attempts: 3, stages: ['retry', 'transport'], nothing: null });

      expect(entries[0].meta).toEqual({ attempts: 3, stages: ['retry', 'transport'], nothing: null });
    });
  });

  // -----------------------------------------------------------------------
  // Default sink
  // -----------------------------------------------------------------------

  describe('default sink', () => {
    it('writes one JSON line to stderr', () => {
      resetLogging();
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      try {
        createLogger('pipeline').warn('event dropped');
        expect(write).toHaveBeenCalledTimes(1);
        const [line] = write.mock.calls[0];
        expect(typeof line).toBe('string');
        const text = String(line);
        expect(text.endsWith('\n')).toBe(true);
        expect(JSON.parse(text)).toMatchObject({ level: 'warn', component: 'pipeline', msg: 'event dropped' });
      } finally {
        write.mockRestore();
      }
    });
  });
});

// ---------------------------------------------------------------------------
// createFileLogSink
// ---------------------------------------------------------------------------

describe('createFileLogSink', () => {
  function fakeFs(): {
    mkdirSync: ReturnType<typeof vi.fn>;
    appendFileSync: ReturnType<typeof vi.fn>;
  } {
    return { mkdirSync: vi.fn(), appendFileSync: vi.fn() };
  }

  const entry: LogEntry = {
    level: 'info',
    ts: '2026-03-01T12:00:00.000Z',
    component: 'pipeline',
    msg: 'pipeline stopped',
  };

  it('creates the parent directory', () => {
    const fs = fakeFs();
    createFileLogSink('/var/log/device/pipeline.jsonl', fs);

    expect(fs.mkdirSync).toHaveBeenCalledWith('/var/log/device', { recursive: true });
  });

  it('appends one JSON line per entry', () => {
    const fs = fakeFs();
    const sink = createFileLogSink('/var/log/device/pipeline.jsonl', fs);

    sink(entry);
    sink({ ...entry, msg: 'again' });

    expect(fs.appendFileSync).toHaveBeenCalledTimes(2);
    expect(fs.appendFileSync).toHaveBeenNthCalledWith(1, '/var/log/device/pipeline.jsonl', JSON.stringify(entry) + '\n');
  });

  it('ignores entries after close', () => {
    const fs = fakeFs();
    const sink = createFileLogSink('/var/log/device/pipeline.jsonl', fs);

    sink.close();
    sink(entry);

    expect(fs.appendFileSync).not.toHaveBeenCalled();
  });

  it('works as the global sink', () => {
    const fs = fakeFs();
    configureLogging({ level: 'info', sink: createFileLogSink('/tmp/logs/device.jsonl', fs) });
    try {
      createLogger('pipeline').info('pipeline linked');
    } finally {
      resetLogging();
    }

    expect(fs.appendFileSync).toHaveBeenCalledTimes(1);
    const [, line] = fs.appendFileSync.mock.calls[0];
    expect(JSON.parse(String(line))).toMatchObject({ component: 'pipeline', msg: 'pipeline linked' });
  });
});
