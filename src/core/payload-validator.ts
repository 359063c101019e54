/**
 * Payload validation for operations, events and transport frames.
 *
 * Every payload schema is compiled once, the first time the validator is
 * created, and reused for every construction. Validation errors are
 * flattened to short path-prefixed messages.
 */

import _Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

import { OPERATION_PAYLOAD_SCHEMAS, EVENT_PAYLOAD_SCHEMAS } from '../types/operation-schema.js';
import { INBOUND_FRAME_SCHEMA } from '../types/transport.js';
import type { InboundFrame } from '../types/transport.js';
import type { OperationKind } from '../types/operations.js';
import type { EventKind, EventPayloads } from '../types/events.js';

// ---------------------------------------------------------------------------
// Validation result
// ---------------------------------------------------------------------------

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

// ---------------------------------------------------------------------------
// Error formatting
// ---------------------------------------------------------------------------

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((err) => {
    const path = err.instancePath || '';
    if (err.keyword === 'additionalProperties' && 'additionalProperty' in err.params) {
      return `${path}: additional property "${String(err.params.additionalProperty)}" not allowed`;
    }
    if (err.keyword === 'required' && 'missingProperty' in err.params) {
      return `${path}: required property "${String(err.params.missingProperty)}" is missing`;
    }
    if (err.keyword === 'callable') {
      return `${path}: must be a function`;
    }
    return `${path}: ${err.message ?? 'unknown error'}`;
  });
}

// ---------------------------------------------------------------------------
// PayloadValidator
// ---------------------------------------------------------------------------

export class PayloadValidator {
  private readonly operationValidators = new Map<OperationKind, ValidateFunction>();
  private readonly eventValidators = new Map<EventKind, ValidateFunction>();
  private readonly frameValidator: ValidateFunction;

  constructor() {
    const ajv = new Ajv({ allErrors: true, strict: false });
    ajv.addKeyword({
      keyword: 'callable',
      schemaType: 'boolean',
      errors: false,
      validate: (schema: boolean, data: unknown) => !schema || typeof data === 'function',
    });

    for (const [kind, schema] of entriesOf(OPERATION_PAYLOAD_SCHEMAS)) {
      this.operationValidators.set(kind, ajv.compile(schema));
    }
    for (const [kind, schema] of entriesOf(EVENT_PAYLOAD_SCHEMAS)) {
      this.eventValidators.set(kind, ajv.compile(schema));
    }
    this.frameValidator = ajv.compile(INBOUND_FRAME_SCHEMA);
  }

  /** Validate an operation payload against the schema for its kind. */
  validateOperation(kind: OperationKind, payload: unknown): ValidationResult {
    return run(this.operationValidators.get(kind), kind, payload);
  }

  /** Validate an event payload against the schema for its kind. */
  validateEvent(kind: EventKind, payload: unknown): ValidationResult {
    return run(this.eventValidators.get(kind), kind, payload);
  }

  /** Type guard form of `validateEvent`. */
  isEventPayload<K extends EventKind>(kind: K, payload: unknown): payload is EventPayloads[K] {
    return this.validateEvent(kind, payload).valid;
  }

  /** Type guard for a decoded gateway frame. */
  isInboundFrame(value: unknown): value is InboundFrame {
    return this.frameValidator(value) === true;
  }

  /** Errors from the most recent `isInboundFrame` call. */
  lastFrameErrors(): string[] {
    return formatErrors(this.frameValidator.errors);
  }
}

function run(validate: ValidateFunction | undefined, kind: string, payload: unknown): ValidationResult {
  if (!validate) {
    return { valid: false, errors: [`unknown kind "${kind}"`] };
  }
  if (validate(payload) === true) {
    return { valid: true, errors: [] };
  }
  return { valid: false, errors: formatErrors(validate.errors) };
}

function entriesOf<K extends string, V>(record: Readonly<Record<K, V>>): Array<[K, V]> {
  const keys = Object.keys(record).filter((key): key is K => key in record);
  return keys.map((key) => [key, record[key]]);
}

// ---------------------------------------------------------------------------
// Shared instance
// ---------------------------------------------------------------------------

let shared: PayloadValidator | null = null;

/** Lazily created validator shared by every pipeline in the process. */
export function getPayloadValidator(): PayloadValidator {
  if (shared === null) {
    shared = new PayloadValidator();
  }
  return shared;
}
