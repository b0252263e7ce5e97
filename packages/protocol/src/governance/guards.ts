import { getAddress, isAddress, ZeroAddress } from 'ethers';
import { GovernanceError } from './errors.js';
import type { Address } from './types.js';

/** Checksummed form of `value`; the zero address passes through. */
export function normalizeAddress(value: string, field: string): Address {
  if (typeof value !== 'string' || !isAddress(value)) {
    throw new GovernanceError('InvalidAddress', `${field} must be a 20-byte hex address`);
  }
  return getAddress(value);
}

/** Checksummed form of `value`; rejects the zero address. */
export function requireAccount(value: string, field: string): Address {
  const address = normalizeAddress(value, field);
  if (address === ZeroAddress) {
    throw new GovernanceError('ZeroAddress', `${field} cannot be the zero address`);
  }
  return address;
}

export function requirePositive(amount: bigint): void {
  if (typeof amount !== 'bigint' || amount <= 0n) {
    throw new GovernanceError('InvalidAmount');
  }
}

/**
 * Single-entry lock around operations that hand control to another account
 * (value transfers). A nested entry while the lock is held throws.
 */
export class ReentrancyGuard {
  private entered = false;

  run<T>(fn: () => T): T {
    if (this.entered) {
      throw new GovernanceError('ReentrantCall');
    }
    this.entered = true;
    try {
      return fn();
    } finally {
      this.entered = false;
    }
  }
}
