/**
 * Operation model.
 *
 * An operation is one requested unit of work travelling down the stage
 * chain. The set of kinds is closed: `OperationPayloads` maps every kind to
 * its payload, and `Operation` is the tagged union over that map, so a
 * `switch (op.kind)` narrows `op.payload` and an exhaustive switch is
 * checked by the compiler.
 *
 * Construction and completion live in core/pipeline/operations.ts.
 */

import type {
  CertificateCredentialSource,
  ClientCertificate,
  SymmetricKeyCredentialSource,
} from './credentials.js';

// ---------------------------------------------------------------------------
// Payloads
// ---------------------------------------------------------------------------

/** Message body. Objects are serialized as JSON by the transport. */
export type MessageBody = string | Record<string, unknown>;

/** Application properties attached to an outgoing message. */
export type MessageProperties = Record<string, string>;

/** Resolved connection arguments, without credential material. */
export interface ConnectionArgs {
  provisioningHost: string;
  registrationId: string;
  idScope: string;
}

/** Kind → payload map for every operation the pipeline understands. */
export interface OperationPayloads {
  // Caller-facing lifecycle
  connect: Record<string, never>;
  disconnect: Record<string, never>;

  // Credential selection
  setSymmetricKeySecurityClient: { securityClient: SymmetricKeyCredentialSource };
  setX509SecurityClient: { securityClient: CertificateCredentialSource };

  // Connection arguments, optionally carrying the credential
  setConnectionArgs: ConnectionArgs & {
    sasToken?: string;
    clientCertificate?: ClientCertificate;
  };
  setCredentialToken: { sasToken: string };
  setClientCertificate: { certificate: ClientCertificate };

  // Messaging
  send: { topic: string; body: MessageBody; properties?: MessageProperties };
  sendTelemetry: { body: MessageBody; properties?: MessageProperties };
  uploadBlob: { blobName: string; content: string; contentType?: string };
  methodResponse: { requestId: string; status: number; body?: unknown };
  register: { payload?: Record<string, unknown> };
}

/** Every operation kind. */
export type OperationKind = keyof OperationPayloads;

// ---------------------------------------------------------------------------
// Operation
// ---------------------------------------------------------------------------

/**
 * Completion callback. Invoked exactly once per registration, with the
 * operation and `null` on success or the failure.
 */
export type OperationCallback = (op: Operation, error: Error | null) => void;

/** An operation of one specific kind. */
export interface OperationOf<K extends OperationKind> {
  /** Monotonically assigned identifier, for tracing. */
  readonly id: number;
  readonly kind: K;
  readonly payload: Readonly<OperationPayloads[K]>;
  /** Completion callbacks, invoked last-registered first. */
  readonly callbacks: OperationCallback[];
  completed: boolean;
  error: Error | null;
}

/**
 * Tagged union over operation kinds. With no type argument this is the
 * union of every kind; with a generic `K` it resolves to `OperationOf<K>`.
 */
export type Operation<K extends OperationKind = OperationKind> = {
  [P in K]: OperationOf<P>;
}[K];

// ---------------------------------------------------------------------------
// Transport vocabulary
// ---------------------------------------------------------------------------

/** The low-level kinds the transport stage accepts. */
export const TRANSPORT_OPERATION_KINDS = [
  'connect',
  'disconnect',
  'send',
  'setConnectionArgs',
  'setCredentialToken',
  'setClientCertificate',
] as const satisfies readonly OperationKind[];

export type TransportOperationKind = (typeof TRANSPORT_OPERATION_KINDS)[number];

/** An operation the transport stage can hand to a transport. */
export type TransportOperation = Operation<TransportOperationKind>;

/** Every operation kind, in declaration order. */
export const OPERATION_KINDS = [
  'connect',
  'disconnect',
  'setSymmetricKeySecurityClient',
  'setX509SecurityClient',
  'setConnectionArgs',
  'setCredentialToken',
  'setClientCertificate',
  'send',
  'sendTelemetry',
  'uploadBlob',
  'methodResponse',
  'register',
] as const satisfies readonly OperationKind[];
