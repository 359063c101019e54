/**
 * Pipeline configuration schema and config path resolution.
 *
 * Defines the TypeScript types for pipeline.toml sections and the
 * validation applied to a raw parsed document. Loading from disk lives in
 * core/config-loader.ts.
 */

import { join } from 'node:path';
import type { LogLevel } from '../core/logger.js';

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** `[retry]` section of pipeline.toml. */
export interface RetryConfig {
  /** Total attempts per operation, including the first. */
  max_attempts: number;
  initial_delay_ms: number;
  max_delay_ms: number;
  multiplier: number;
}

/** `[transport]` section of pipeline.toml. */
export interface TransportConfig {
  /** Gateway address for the DEALER socket (e.g. "ipc:///tmp/gateway.sock"). */
  address: string;
  /** How long to wait for an ack before failing with TRANSPORT_TIMEOUT. */
  timeout_ms: number;
}

/** `[logging]` section of pipeline.toml. */
export interface LoggingConfig {
  level: LogLevel;
  /** Append JSONL entries to this file instead of writing to stderr. */
  file?: string;
}

// ---------------------------------------------------------------------------
// Top-level config
// ---------------------------------------------------------------------------

/**
 * Full pipeline configuration.
 *
 * Known sections are strongly typed. Unknown top-level keys are
 * preserved as-is so newer config files still load.
 */
export interface PipelineConfig {
  retry: RetryConfig;
  transport: TransportConfig;
  logging: LoggingConfig;
  [section: string]: unknown;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Default configuration applied when pipeline.toml is absent or partial. */
export const DEFAULT_CONFIG: PipelineConfig = {
  retry: {
    max_attempts: 3,
    initial_delay_ms: 1_000,
    max_delay_ms: 30_000,
    multiplier: 2,
  },
  transport: {
    address: 'ipc:///tmp/device-gateway.sock',
    timeout_ms: 30_000,
  },
  logging: { level: 'info' },
};

const VALID_LEVELS: ReadonlySet<string> = new Set<LogLevel>(['debug', 'info', 'warn', 'error']);

const KNOWN_SECTIONS = ['retry', 'transport', 'logging'];

// ---------------------------------------------------------------------------
// resolveConfigPath()
// ---------------------------------------------------------------------------

/**
 * Resolve the pipeline.toml location.
 *
 * Precedence:
 *  1. `$DEVICE_PIPELINE_CONFIG` (if non-empty)
 *  2. `pipeline.toml` in the working directory
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): string {
  const envValue = env['DEVICE_PIPELINE_CONFIG'];
  if (envValue !== undefined && envValue.trim().length > 0) {
    return envValue.trim();
  }
  return join(cwd, 'pipeline.toml');
}

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new Error(`[${name}] must be a table`);
  }
  return value;
}

function readPositiveInteger(
  section: Record<string, unknown>,
  path: string,
  key: string,
  fallback: number,
): number {
  const value = section[key] ?? fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new Error(`${path}.${key} must be a positive integer`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

/**
 * Parse and validate a raw config object (e.g. from TOML parsing) into a
 * fully typed `PipelineConfig`. Applies defaults for missing sections and
 * fields and rejects values of the wrong shape.
 *
 * Unknown top-level sections are passed through for extensibility.
 */
export function parseConfig(raw: Record<string, unknown>): PipelineConfig {
  const extra: Record<string, unknown> = {};
  for (const key of Object.keys(raw)) {
    if (!KNOWN_SECTIONS.includes(key)) {
      extra[key] = raw[key];
    }
  }

  // --- retry ---
  const rawRetry = readSection(raw, 'retry');
  const defaults = DEFAULT_CONFIG.retry;
  const retry: RetryConfig = {
    max_attempts: readPositiveInteger(rawRetry, 'retry', 'max_attempts', defaults.max_attempts),
    initial_delay_ms: readPositiveInteger(
      rawRetry,
      'retry',
      'initial_delay_ms',
      defaults.initial_delay_ms,
    ),
    max_delay_ms: readPositiveInteger(rawRetry, 'retry', 'max_delay_ms', defaults.max_delay_ms),
    multiplier: defaults.multiplier,
  };
  const multiplier = rawRetry['multiplier'] ?? defaults.multiplier;
  if (typeof multiplier !== 'number' || !Number.isFinite(multiplier) || multiplier < 1) {
    throw new Error('retry.multiplier must be a number >= 1');
  }
  retry.multiplier = multiplier;
  if (retry.max_delay_ms < retry.initial_delay_ms) {
    throw new Error('retry.max_delay_ms must not be less than retry.initial_delay_ms');
  }

  // --- transport ---
  const rawTransport = readSection(raw, 'transport');
  const address = rawTransport['address'] ?? DEFAULT_CONFIG.transport.address;
  if (typeof address !== 'string' || address.length === 0) {
    throw new Error('transport.address must be a non-empty string');
  }
  const transport: TransportConfig = {
    address,
    timeout_ms: readPositiveInteger(
      rawTransport,
      'transport',
      'timeout_ms',
      DEFAULT_CONFIG.transport.timeout_ms,
    ),
  };

  // --- logging ---
  const rawLogging = readSection(raw, 'logging');
  const level = rawLogging['level'] ?? DEFAULT_CONFIG.logging.level;
  if (typeof level !== 'string' || !isLogLevel(level)) {
    throw new Error(
      `Invalid logging.level: "${String(level)}". ` +
        `Must be one of: ${[...VALID_LEVELS].join(', ')}`,
    );
  }

  const logging: LoggingConfig = { level };
  const file = rawLogging['file'];
  if (file !== undefined) {
    if (typeof file !== 'string' || file.length === 0) {
      throw new Error('logging.file must be a non-empty string');
    }
    logging.file = file;
  }

  return { ...extra, retry, transport, logging };
}

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.has(value);
}
