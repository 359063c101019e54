/**
 * Event model.
 *
 * Events are unsolicited occurrences that travel up the chain from the
 * transport towards the caller. Unlike operations they carry no callback
 * and are never completed.
 */

import type { MessageBody, MessageProperties } from './operations.js';

/** Kind → payload map for every event the pipeline emits. */
export interface EventPayloads {
  connectionStateChanged: { connected: boolean; reason?: string };
  messageReceived: { topic: string; body: MessageBody; properties?: MessageProperties };
  methodRequest: { requestId: string; methodName: string; body?: unknown };
}

export type EventKind = keyof EventPayloads;

/** An event of one specific kind. */
export interface EventOf<K extends EventKind> {
  readonly kind: K;
  readonly payload: Readonly<EventPayloads[K]>;
}

/** Tagged union over event kinds. */
export type PipelineEvent<K extends EventKind = EventKind> = {
  [P in K]: EventOf<P>;
}[K];

/** Top-level consumer of events that reach the head of the chain. */
export type EventHandler = (event: PipelineEvent) => void;

export const EVENT_KINDS = [
  'connectionStateChanged',
  'messageReceived',
  'methodRequest',
] as const satisfies readonly EventKind[];
