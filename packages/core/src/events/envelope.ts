import { canonicalizeBytes } from '../crypto/jcs.js';
import { sha256Hex } from '../crypto/hash.js';

export const EVENT_ENVELOPE_VERSION = 1;

export type EventScalar = string | number | boolean | null;

/** Event payloads are flat JSON records; amounts travel as decimal strings. */
export type EventPayload = Record<string, EventScalar>;

export interface EventEnvelope<P extends EventPayload = EventPayload> {
  v: typeof EVENT_ENVELOPE_VERSION;
  seq: number;
  type: string;
  emitter: string;
  block: number;
  ts: number;
  payload: P;
  prev: string | null;
  hash: string;
}

export type UnhashedEnvelope<P extends EventPayload = EventPayload> = Omit<EventEnvelope<P>, 'hash'>;

export function stripHash<P extends EventPayload>(envelope: EventEnvelope<P>): UnhashedEnvelope<P> {
  const { hash: _hash, ...rest } = envelope;
  return rest;
}

export function eventHashHex(envelope: UnhashedEnvelope | EventEnvelope): string {
  const body = 'hash' in envelope ? stripHash(envelope) : envelope;
  return sha256Hex(canonicalizeBytes(body));
}

export function sealEnvelope<P extends EventPayload>(envelope: UnhashedEnvelope<P>): EventEnvelope<P> {
  return { ...envelope, hash: eventHashHex(envelope) };
}
