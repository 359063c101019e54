/**
 * Runtime JSON Schemas for operation and event payloads.
 *
 * Kept as plain objects (not TypeScript types) so they can be fed
 * directly to ajv. Credential sources are checked with the custom
 * `callable` keyword registered by core/payload-validator.ts.
 */

import type { SchemaObject } from 'ajv';
import type { OperationKind } from './operations.js';
import type { EventKind } from './events.js';

// ---------------------------------------------------------------------------
// Shared fragments
// ---------------------------------------------------------------------------

const nonEmptyString = { type: 'string', minLength: 1 } as const;

const emptyPayload = {
  type: 'object' as const,
  additionalProperties: false,
  properties: {},
};

const messageBody = {
  anyOf: [{ type: 'string' }, { type: 'object' }],
};

const messageProperties = {
  type: 'object' as const,
  additionalProperties: { type: 'string' },
};

const clientCertificate = {
  type: 'object' as const,
  required: ['cert', 'key'],
  additionalProperties: false,
  properties: {
    cert: nonEmptyString,
    key: nonEmptyString,
    passphrase: { type: 'string' },
  },
};

const credentialSourceMethods = {
  getHost: { callable: true },
  getRegistrationId: { callable: true },
  getScope: { callable: true },
};

function securityClientPayload(accessor: 'getCurrentToken' | 'getCertificate') {
  return {
    type: 'object' as const,
    required: ['securityClient'],
    additionalProperties: false,
    properties: {
      securityClient: {
        type: 'object',
        required: ['getHost', 'getRegistrationId', 'getScope', accessor],
        properties: { ...credentialSourceMethods, [accessor]: { callable: true } },
      },
    },
  };
}

// ---------------------------------------------------------------------------
// Operation payloads
// ---------------------------------------------------------------------------

export const OPERATION_PAYLOAD_SCHEMAS: Readonly<Record<OperationKind, SchemaObject>> = {
  connect: emptyPayload,
  disconnect: emptyPayload,

  setSymmetricKeySecurityClient: securityClientPayload('getCurrentToken'),
  setX509SecurityClient: securityClientPayload('getCertificate'),

  setConnectionArgs: {
    type: 'object',
    required: ['provisioningHost', 'registrationId', 'idScope'],
    additionalProperties: false,
    properties: {
      provisioningHost: nonEmptyString,
      registrationId: nonEmptyString,
      idScope: nonEmptyString,
      sasToken: nonEmptyString,
      clientCertificate,
    },
    not: { required: ['sasToken', 'clientCertificate'] },
  },

  setCredentialToken: {
    type: 'object',
    required: ['sasToken'],
    additionalProperties: false,
    properties: { sasToken: nonEmptyString },
  },

  setClientCertificate: {
    type: 'object',
    required: ['certificate'],
    additionalProperties: false,
    properties: { certificate: clientCertificate },
  },

  send: {
    type: 'object',
    required: ['topic', 'body'],
    additionalProperties: false,
    properties: {
      topic: nonEmptyString,
      body: messageBody,
      properties: messageProperties,
    },
  },

  sendTelemetry: {
    type: 'object',
    required: ['body'],
    additionalProperties: false,
    properties: {
      body: messageBody,
      properties: messageProperties,
    },
  },

  uploadBlob: {
    type: 'object',
    required: ['blobName', 'content'],
    additionalProperties: false,
    properties: {
      blobName: nonEmptyString,
      content: { type: 'string' },
      contentType: nonEmptyString,
    },
  },

  methodResponse: {
    type: 'object',
    required: ['requestId', 'status'],
    additionalProperties: false,
    properties: {
      requestId: nonEmptyString,
      status: { type: 'integer', minimum: 100, maximum: 599 },
      body: {},
    },
  },

  register: {
    type: 'object',
    additionalProperties: false,
    properties: {
      payload: { type: 'object' },
    },
  },
};

// ---------------------------------------------------------------------------
// Event payloads
// ---------------------------------------------------------------------------

export const EVENT_PAYLOAD_SCHEMAS: Readonly<Record<EventKind, SchemaObject>> = {
  connectionStateChanged: {
    type: 'object',
    required: ['connected'],
    additionalProperties: false,
    properties: {
      connected: { type: 'boolean' },
      reason: { type: 'string' },
    },
  },

  messageReceived: {
    type: 'object',
    required: ['topic', 'body'],
    additionalProperties: false,
    properties: {
      topic: nonEmptyString,
      body: messageBody,
      properties: messageProperties,
    },
  },

  methodRequest: {
    type: 'object',
    required: ['requestId', 'methodName'],
    additionalProperties: false,
    properties: {
      requestId: nonEmptyString,
      methodName: nonEmptyString,
      body: {},
    },
  },
};
