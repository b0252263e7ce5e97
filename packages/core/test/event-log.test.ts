import { describe, expect, it, vi } from 'vitest';
import { EventLog } from '../src/events/log.js';
import { eventHashHex, sealEnvelope } from '../src/events/envelope.js';

function fixedClock(block = 7, ts = 1_700_000_000) {
  return {
    blockNumber: () => block,
    timestamp: () => ts,
  };
}

describe('event envelopes', () => {
  it('hashes independently of payload key order', () => {
    const base = {
      v: 1 as const,
      seq: 0,
      type: 'stake.deposited',
      emitter: 'ledger',
      block: 1,
      ts: 10,
      prev: null,
    };
    const a = sealEnvelope({ ...base, payload: { account: '0x01', amount: '5' } });
    const b = sealEnvelope({ ...base, payload: { amount: '5', account: '0x01' } });
    expect(a.hash).toBe(b.hash);
    expect(a.hash).toMatch(/^[0-9a-f]{64}$/);
    expect(eventHashHex(a)).toBe(a.hash);
  });
});

describe('event log', () => {
  it('chains envelopes and stamps them with the clock', () => {
    const log = new EventLog(fixedClock());
    const first = log.append('ledger', 'stake.deposited', { amount: '10' });
    const second = log.append('ledger', 'stake.withdrawn', { amount: '4' });

    expect(first.seq).toBe(0);
    expect(first.prev).toBeNull();
    expect(first.block).toBe(7);
    expect(first.ts).toBe(1_700_000_000);
    expect(second.seq).toBe(1);
    expect(second.prev).toBe(first.hash);
    expect(log.head()).toBe(second.hash);
    expect(log.size()).toBe(2);
    expect(log.verify()).toBe(true);
  });

  it('filters by type', () => {
    const log = new EventLog(fixedClock());
    log.append('engine', 'proposal.created', { proposalId: 0 });
    log.append('engine', 'proposal.voted', { proposalId: 0 });
    log.append('engine', 'proposal.created', { proposalId: 1 });

    const created = log.ofType('proposal.created');
    expect(created.map((event) => event.payload.proposalId)).toEqual([0, 1]);
  });

  it('detects tampering', () => {
    const log = new EventLog(fixedClock());
    log.append('treasury', 'treasury.deposited', { amount: '3' });
    log.append('treasury', 'treasury.deposited', { amount: '4' });

    const [first] = log.list();
    first.payload.amount = '300';
    expect(log.verify()).toBe(false);
  });

  it('rejects an empty type', () => {
    const log = new EventLog(fixedClock());
    expect(() => log.append('engine', '  ', {})).toThrow('type is required');
  });

  it('delivers to subscribers until they unsubscribe', () => {
    const log = new EventLog(fixedClock());
    const seen: string[] = [];
    const unsubscribe = log.subscribe((event) => seen.push(event.type));

    log.append('engine', 'proposal.created', {});
    unsubscribe();
    log.append('engine', 'proposal.queued', {});

    expect(seen).toEqual(['proposal.created']);
  });

  it('routes listener failures away from the emitter', () => {
    const onListenerError = vi.fn();
    const log = new EventLog(fixedClock(), { onListenerError });
    log.subscribe(() => {
      throw new Error('listener boom');
    });

    const envelope = log.append('engine', 'proposal.cancelled', { proposalId: 2 });

    expect(log.size()).toBe(1);
    expect(onListenerError).toHaveBeenCalledTimes(1);
    expect(onListenerError.mock.calls[0][1]).toBe(envelope);
  });
});
