/**
 * Governance: Host Environment
 *
 * The governance components never keep their own clock or move value
 * themselves; they read block height and time from the host and ask it
 * to transfer native value.
 */

import { isAddress } from 'ethers';
import { normalizeAddress } from './guards.js';
import type { Address } from './types.js';

export interface HostEnvironment {
  /** Current block height; never decreases. */
  blockNumber(): number;
  /** Current wall-clock time in seconds. */
  timestamp(): number;
  balanceOf(account: Address): bigint;
  /**
   * Move `amount` of native value. Returns false when the transfer cannot
   * happen (insufficient balance, recipient refuses); never throws.
   */
  sendValue(from: Address, to: Address, amount: bigint): boolean;
}

export type ReceiveHook = (from: Address, amount: bigint) => void;

export interface MemoryHostOptions {
  block?: number;
  timestamp?: number;
  /** Seconds added to the clock for every mined block. */
  blockTime?: number;
}

/**
 * In-process host: balances map, manual block/time control and per-account
 * receive hooks, all keyed by checksummed address. A hook runs after the
 * balances move; if it throws the move is undone and `sendValue` reports
 * failure.
 */
export class MemoryHost implements HostEnvironment {
  private readonly balances = new Map<Address, bigint>();
  private readonly hooks = new Map<Address, ReceiveHook>();
  private block: number;
  private now: number;
  private readonly blockTime: number;

  constructor(options: MemoryHostOptions = {}) {
    this.block = options.block ?? 1;
    this.now = options.timestamp ?? 1_700_000_000;
    this.blockTime = options.blockTime ?? 12;
  }

  blockNumber(): number {
    return this.block;
  }

  timestamp(): number {
    return this.now;
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(normalizeAddress(account, 'account')) ?? 0n;
  }

  fund(account: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new Error('amount must be >= 0');
    }
    const key = normalizeAddress(account, 'account');
    this.balances.set(key, this.balanceOf(key) + amount);
  }

  mine(blocks = 1): void {
    if (!Number.isInteger(blocks) || blocks < 0) {
      throw new Error('blocks must be a non-negative integer');
    }
    this.block += blocks;
    this.now += blocks * this.blockTime;
  }

  increaseTime(seconds: number): void {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new Error('seconds must be a non-negative integer');
    }
    this.now += seconds;
  }

  setTime(timestamp: number): void {
    if (timestamp < this.now) {
      throw new Error('time cannot move backwards');
    }
    this.now = timestamp;
  }

  onReceive(account: Address, hook: ReceiveHook | null): void {
    const key = normalizeAddress(account, 'account');
    if (hook) {
      this.hooks.set(key, hook);
    } else {
      this.hooks.delete(key);
    }
  }

  sendValue(sender: Address, recipient: Address, amount: bigint): boolean {
    if (!isAddress(sender) || !isAddress(recipient)) {
      return false;
    }
    const from = normalizeAddress(sender, 'from');
    const to = normalizeAddress(recipient, 'to');
    if (amount < 0n || this.balanceOf(from) < amount) {
      return false;
    }
    this.balances.set(from, this.balanceOf(from) - amount);
    this.balances.set(to, this.balanceOf(to) + amount);

    const hook = this.hooks.get(to);
    if (!hook) {
      return true;
    }
    try {
      hook(from, amount);
      return true;
    } catch {
      // recipient refused: undo the move
      this.balances.set(to, this.balanceOf(to) - amount);
      this.balances.set(from, this.balanceOf(from) + amount);
      return false;
    }
  }
}
