/**
 * device-pipeline: client-side operation/event pipeline for
 * provisioning and operating connected devices.
 */

export const VERSION = '0.1.0';

export * from './types/index.js';
export * from './core/pipeline/index.js';

export { PipelineError, isPipelineError, hasErrorCode, toError } from './core/pipeline-error.js';
export { PayloadValidator, getPayloadValidator, type ValidationResult } from './core/payload-validator.js';
export {
  createLogger,
  configureLogging,
  resetLogging,
  createFileLogSink,
  type Logger,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type LogContext,
  type FileLogSink,
} from './core/logger.js';
export { loadConfig, applyLoggingConfig } from './core/config-loader.js';
export {
  DealerTransport,
  dealerTransportOptionsFromConfig,
  type DealerTransportOptions,
} from './core/dealer-transport.js';
export { ZmqSocketFactory } from './core/zmq-socket-factory.js';
export { createDevicePipeline, type DevicePipelineOptions } from './core/device-pipeline.js';
export { DeviceClient, createDeviceClient, type DeviceClientOptions } from './core/device-client.js';
