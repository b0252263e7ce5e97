import {
  EVENT_ENVELOPE_VERSION,
  EventEnvelope,
  EventPayload,
  eventHashHex,
  sealEnvelope,
} from './envelope.js';

export interface EventClock {
  blockNumber(): number;
  timestamp(): number;
}

export type EventListener = (envelope: EventEnvelope) => void;

export interface EventLogOptions {
  /** Called when a subscriber throws. Defaults to console.error. */
  onListenerError?: (error: unknown, envelope: EventEnvelope) => void;
}

function defaultListenerError(error: unknown, envelope: EventEnvelope): void {
  console.error(`[event-log] listener failed on ${envelope.type} #${envelope.seq}:`, error);
}

/**
 * Append-only, hash-chained log of observable events.
 *
 * Each envelope carries the hash of its predecessor, so `verify()` detects
 * any edit or reordering of recorded history.
 */
export class EventLog {
  private readonly events: EventEnvelope[] = [];
  private readonly listeners = new Set<EventListener>();
  private readonly onListenerError: (error: unknown, envelope: EventEnvelope) => void;

  constructor(
    private readonly clock: EventClock,
    options: EventLogOptions = {},
  ) {
    this.onListenerError = options.onListenerError ?? defaultListenerError;
  }

  append<P extends EventPayload>(emitter: string, type: string, payload: P): EventEnvelope<P> {
    if (!type || type.trim().length === 0) {
      throw new Error('type is required');
    }
    const envelope = sealEnvelope<P>({
      v: EVENT_ENVELOPE_VERSION,
      seq: this.events.length,
      type,
      emitter,
      block: this.clock.blockNumber(),
      ts: this.clock.timestamp(),
      payload: { ...payload },
      prev: this.head(),
    });
    this.events.push(envelope);
    for (const listener of this.listeners) {
      try {
        listener(envelope);
      } catch (error) {
        this.onListenerError(error, envelope);
      }
    }
    return envelope;
  }

  head(): string | null {
    const last = this.events[this.events.length - 1];
    return last ? last.hash : null;
  }

  size(): number {
    return this.events.length;
  }

  list(): EventEnvelope[] {
    return [...this.events];
  }

  ofType(type: string): EventEnvelope[] {
    return this.events.filter((event) => event.type === type);
  }

  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  verify(): boolean {
    let prev: string | null = null;
    for (let i = 0; i < this.events.length; i++) {
      const event = this.events[i];
      if (event.seq !== i || event.prev !== prev) {
        return false;
      }
      if (eventHashHex(event) !== event.hash) {
        return false;
      }
      prev = event.hash;
    }
    return true;
  }
}
