/**
 * TOML-based configuration loader.
 *
 * Reads `pipeline.toml`, parses it with smol-toml, validates it with
 * `parseConfig`, and returns a fully typed `PipelineConfig`.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { parseConfig, resolveConfigPath, DEFAULT_CONFIG } from '../types/config.js';
import type { PipelineConfig } from '../types/config.js';
import { configureLogging, createFileLogSink } from './logger.js';

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

/**
 * Load and validate a pipeline.toml.
 *
 * If the file does not exist or is empty, returns `DEFAULT_CONFIG`.
 * Throws on invalid TOML syntax or schema validation errors, prefixed
 * with the file path.
 *
 * @param configPath - Defaults to `resolveConfigPath()`.
 */
export function loadConfig(configPath: string = resolveConfigPath()): PipelineConfig {
  if (!existsSync(configPath)) {
    return structuredClone(DEFAULT_CONFIG);
  }

  const content = readFileSync(configPath, 'utf-8');
  if (content.trim().length === 0) {
    return structuredClone(DEFAULT_CONFIG);
  }

  try {
    return parseConfig(parseTOML(content));
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`${configPath}: ${reason}`, { cause: err });
  }
}

/**
 * Apply the `[logging]` section to the global logger. With `file` set,
 * entries go to that file instead of stderr.
 */
export function applyLoggingConfig(config: PipelineConfig): void {
  const { level, file } = config.logging;
  if (file === undefined) {
    configureLogging({ level });
    return;
  }
  configureLogging({ level, sink: createFileLogSink(file) });
}
