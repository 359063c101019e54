/**
 * Standard device pipeline composition.
 *
 * The stage order is fixed:
 *
 *   security-client → retry → coordination → transport
 *
 * Credential operations must become connection arguments before retry
 * sees them, and retry must sit above coordination so a retried message
 * re-runs its auto-connect.
 */

import type { PipelineConfig } from '../types/config.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import type { Transport } from '../types/transport.js';
import type { Logger } from './logger.js';
import type { DefectHandler } from './pipeline/serial-executor.js';
import { Pipeline } from './pipeline/pipeline.js';
import { UseSecurityClientStage } from './pipeline/stage-1-security-client.js';
import { RetryStage, retryOptionsFromConfig } from './pipeline/stage-2-retry.js';
import { TransportCoordinationStage } from './pipeline/stage-3-coordination.js';
import { TransportStage } from './pipeline/stage-4-transport.js';

export interface DevicePipelineOptions {
  transport: Transport;
  /** Only `[retry]` is read here. Defaults to DEFAULT_CONFIG. */
  config?: PipelineConfig;
  name?: string;
  logger?: Logger;
  onDefect?: DefectHandler;
}

/** Build a pipeline with the standard stage order over `transport`. */
export function createDevicePipeline(options: DevicePipelineOptions): Pipeline {
  const config = options.config ?? DEFAULT_CONFIG;
  return new Pipeline({
    name: options.name,
    logger: options.logger,
    onDefect: options.onDefect,
    stages: [
      new UseSecurityClientStage(),
      new RetryStage(retryOptionsFromConfig(config.retry)),
      new TransportCoordinationStage(),
      new TransportStage(options.transport),
    ],
  });
}
