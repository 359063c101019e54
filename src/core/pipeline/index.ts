export type { PipelineNucleus, SharedState } from './types.js';

export { SerialExecutor, type Task, type DefectHandler, type SerialExecutorOptions } from './serial-executor.js';
export {
  createOperation,
  createEvent,
  addCallback,
  completeOp,
  isTransportOperation,
  toTransportRequest,
  eventFromTransport,
} from './operations.js';
export {
  passToNext,
  failOperation,
  delegate,
  delegateSequence,
  sendEventUp,
  type OperationFactory,
} from './operation-flow.js';
export { PipelineStage } from './stage.js';
export { Pipeline, type PipelineOptions, type BackgroundErrorHandler } from './pipeline.js';

export { UseSecurityClientStage } from './stage-1-security-client.js';
export {
  RetryStage,
  retryOptionsFromConfig,
  backoffDelay,
  RETRIED_KINDS,
  type RetryOptions,
} from './stage-2-retry.js';
export { TransportCoordinationStage, topics } from './stage-3-coordination.js';
export { TransportStage } from './stage-4-transport.js';
