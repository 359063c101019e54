export {
  ErrorCode,
  type ErrorCodeValue,
  type ErrorPayload,
  ERROR_RETRIABLE_DEFAULTS,
  DEFECT_CODES,
} from './errors.js';

export {
  type CredentialSource,
  type SymmetricKeyCredentialSource,
  type CertificateCredentialSource,
  type ClientCertificate,
} from './credentials.js';

export {
  type MessageBody,
  type MessageProperties,
  type ConnectionArgs,
  type OperationPayloads,
  type OperationKind,
  type OperationCallback,
  type OperationOf,
  type Operation,
  type TransportOperationKind,
  type TransportOperation,
  TRANSPORT_OPERATION_KINDS,
  OPERATION_KINDS,
} from './operations.js';

export {
  type EventPayloads,
  type EventKind,
  type EventOf,
  type PipelineEvent,
  type EventHandler,
  EVENT_KINDS,
} from './events.js';

export { OPERATION_PAYLOAD_SCHEMAS, EVENT_PAYLOAD_SCHEMAS } from './operation-schema.js';

export {
  type TransportRequest,
  type TransportEvent,
  type TransportEventHandler,
  type Transport,
  type AckFrame,
  type EventFrame,
  type InboundFrame,
  INBOUND_FRAME_SCHEMA,
} from './transport.js';

export {
  type RouterMessageHandler,
  type DealerMessageHandler,
  type RouterSocket,
  type DealerSocket,
  type SocketFactory,
} from './socket.js';

export {
  type RetryConfig,
  type TransportConfig,
  type LoggingConfig,
  type PipelineConfig,
  DEFAULT_CONFIG,
  resolveConfigPath,
  parseConfig,
} from './config.js';
