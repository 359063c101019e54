/**
 * Transport boundary.
 *
 * The transport stage is the tail of the chain. It hands each low-level
 * operation to a `Transport` as a plain request (no callbacks, no
 * completion state) and feeds whatever the transport emits back up the
 * chain as events.
 *
 * Wire format used by the DEALER-socket transport (one JSON frame each):
 *
 *   request  { id, kind, payload }
 *   ack      { type: "ack", id, error? }
 *   event    { type: "event", event: { kind, payload } }
 */

import type { OperationPayloads, TransportOperationKind } from './operations.js';
import type { EventKind } from './events.js';
import { EVENT_KINDS } from './events.js';

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

/** A low-level operation stripped down to what crosses the boundary. */
export type TransportRequest<K extends TransportOperationKind = TransportOperationKind> = {
  [P in K]: { id: number; kind: P; payload: Readonly<OperationPayloads[P]> };
}[K];

/** Raw event as reported by a transport, validated before it enters the chain. */
export interface TransportEvent {
  kind: EventKind;
  payload: Record<string, unknown>;
}

/** Consumer of transport events. */
export type TransportEventHandler = (event: TransportEvent) => void;

/**
 * A transport implementation consuming the low-level vocabulary.
 *
 * `execute` settles once the transport has acknowledged (or failed) the
 * request. Rejections should be `PipelineError`s; anything else is
 * carried through unchanged.
 */
export interface Transport {
  execute(request: TransportRequest): Promise<void>;
  onEvent(handler: TransportEventHandler): void;
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Frames
// ---------------------------------------------------------------------------

/** Acknowledgement frame sent by the gateway for every request. */
export interface AckFrame {
  type: 'ack';
  id: number;
  error?: { message: string; code?: string };
}

/** Unsolicited event frame sent by the gateway. */
export interface EventFrame {
  type: 'event';
  event: TransportEvent;
}

export type InboundFrame = AckFrame | EventFrame;

/** JSON Schema for frames arriving from the gateway. */
export const INBOUND_FRAME_SCHEMA = {
  oneOf: [
    {
      type: 'object',
      required: ['type', 'id'],
      additionalProperties: false,
      properties: {
        type: { const: 'ack' },
        id: { type: 'integer', minimum: 1 },
        error: {
          type: 'object',
          required: ['message'],
          additionalProperties: false,
          properties: {
            message: { type: 'string' },
            code: { type: 'string' },
          },
        },
      },
    },
    {
      type: 'object',
      required: ['type', 'event'],
      additionalProperties: false,
      properties: {
        type: { const: 'event' },
        event: {
          type: 'object',
          required: ['kind', 'payload'],
          additionalProperties: false,
          properties: {
            kind: { enum: [...EVENT_KINDS] },
            payload: { type: 'object' },
          },
        },
      },
    },
  ],
} as const;
