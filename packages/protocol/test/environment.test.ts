import { describe, expect, it } from 'vitest';
import { getAddress } from 'ethers';
import { MemoryHost } from '../src/index.js';
import { ALICE, BOB } from './helpers.js';

const LOWER = '0xabcdef0000000000000000000000000000000001';
const UPPER = '0xABCDEF0000000000000000000000000000000001';

describe('MemoryHost', () => {
  it('keys balances by checksummed address', () => {
    const host = new MemoryHost();
    host.fund(LOWER, 7n);
    host.fund(UPPER, 3n);

    expect(host.balanceOf(getAddress(LOWER))).toBe(10n);
    expect(host.sendValue(UPPER, ALICE, 4n)).toBe(true);
    expect(host.balanceOf(LOWER)).toBe(6n);
    expect(host.balanceOf(ALICE)).toBe(4n);
  });

  it('runs a hook registered under any casing', () => {
    const host = new MemoryHost();
    host.fund(ALICE, 5n);
    const received: bigint[] = [];
    host.onReceive(LOWER, (_from, amount) => {
      received.push(amount);
    });

    host.sendValue(ALICE, getAddress(LOWER), 2n);
    expect(received).toEqual([2n]);

    host.onReceive(UPPER, null);
    host.sendValue(ALICE, LOWER, 1n);
    expect(received).toEqual([2n]);
  });

  it('undoes a transfer the recipient refuses', () => {
    const host = new MemoryHost();
    host.fund(ALICE, 5n);
    host.onReceive(BOB, () => {
      throw new Error('refused');
    });

    expect(host.sendValue(ALICE, BOB, 5n)).toBe(false);
    expect(host.balanceOf(ALICE)).toBe(5n);
    expect(host.balanceOf(BOB)).toBe(0n);
  });

  it('reports failure instead of throwing on bad input', () => {
    const host = new MemoryHost();
    host.fund(ALICE, 5n);
    expect(host.sendValue(ALICE, 'nobody', 1n)).toBe(false);
    expect(host.sendValue(ALICE, BOB, 6n)).toBe(false);
    expect(host.balanceOf(ALICE)).toBe(5n);
  });

  it('advances block and time together', () => {
    const host = new MemoryHost();
    host.mine(3);
    expect(host.blockNumber()).toBe(4);
    expect(host.timestamp()).toBe(1_700_000_036);
    expect(() => host.setTime(1_700_000_000)).toThrow('time cannot move backwards');
  });
});
