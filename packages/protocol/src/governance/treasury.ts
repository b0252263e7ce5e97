/**
 * Governance: Category Treasury
 *
 * Native value held on the treasury's host account, partitioned into
 * risk-tiered categories with per-category ceilings. Anyone may fund a
 * category; only the owner (the governance engine once deployment hands
 * ownership over) may pay out.
 */

import type { HostEnvironment } from './environment.js';
import { GovernanceError } from './errors.js';
import { EventEmitterPort, EventSink } from './events.js';
import { ReentrancyGuard, requireAccount, requirePositive } from './guards.js';
import {
  Address,
  componentAddress,
  DEFAULT_CATEGORY_LIMITS,
  isTreasuryCategory,
  TREASURY_CATEGORIES,
  TreasuryCategory,
} from './types.js';

export interface TreasuryPort {
  transferFunds(caller: Address, category: TreasuryCategory, recipient: Address, amount: bigint): void;
}

export interface TreasuryOptions {
  host: HostEnvironment;
  owner: Address;
  limits?: Partial<Record<TreasuryCategory, bigint>>;
  events?: EventSink;
  address?: Address;
}

function requireCategory(category: string): TreasuryCategory {
  if (!isTreasuryCategory(category)) {
    throw new GovernanceError('InvalidParameter', `unknown treasury category: ${category}`);
  }
  return category;
}

export class Treasury implements TreasuryPort {
  readonly address: Address;
  private readonly host: HostEnvironment;
  private readonly events: EventEmitterPort;
  private readonly guard = new ReentrancyGuard();
  private readonly balances: Record<TreasuryCategory, bigint>;
  private readonly limits: Record<TreasuryCategory, bigint>;
  private currentOwner: Address;

  constructor(options: TreasuryOptions) {
    this.host = options.host;
    this.address = options.address ?? componentAddress('vaultgov.treasury');
    this.events = new EventEmitterPort(this.address, options.events);
    this.currentOwner = requireAccount(options.owner, 'owner');
    this.balances = {
      high_conviction: 0n,
      experimental_bet: 0n,
      operational_expense: 0n,
    };
    this.limits = { ...DEFAULT_CATEGORY_LIMITS, ...options.limits };
    for (const category of TREASURY_CATEGORIES) {
      if (this.limits[category] < 0n) {
        throw new GovernanceError('InvalidParameter', `${category} limit must be >= 0`);
      }
    }
  }

  owner(): Address {
    return this.currentOwner;
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.requireOwner(caller);
    const next = requireAccount(newOwner, 'newOwner');
    const previous = this.currentOwner;
    this.currentOwner = next;
    this.events.emit('ownership.transferred', {
      component: 'treasury',
      previousOwner: previous,
      newOwner: next,
    });
  }

  depositToCategory(caller: Address, category: TreasuryCategory, amount: bigint): bigint {
    const from = requireAccount(caller, 'caller');
    const target = requireCategory(category);
    requirePositive(amount);
    const balance = this.balances[target] + amount;
    if (balance > this.limits[target]) {
      throw new GovernanceError('CategoryLimitExceeded');
    }
    if (!this.host.sendValue(from, this.address, amount)) {
      throw new GovernanceError('TransferFailed', 'Deposit value could not be collected');
    }

    this.balances[target] = balance;

    this.events.emit('treasury.deposited', {
      category: target,
      from,
      amount: amount.toString(),
      balance: balance.toString(),
    });
    return balance;
  }

  /**
   * Pays `amount` out of `category`. The category balance is debited before
   * the host transfer and credited back if the transfer fails, so a
   * recipient re-entering during the transfer sees the reduced balance.
   */
  transferFunds(
    caller: Address,
    category: TreasuryCategory,
    recipient: Address,
    amount: bigint,
  ): void {
    this.guard.run(() => {
      this.requireOwner(caller);
      const target = requireCategory(category);
      const to = requireAccount(recipient, 'recipient');
      requirePositive(amount);
      const current = this.balances[target];
      if (current < amount) {
        throw new GovernanceError('InsufficientCategoryBalance');
      }
      if (this.totalBalance() < amount) {
        throw new GovernanceError('InsufficientTotalBalance');
      }

      const balance = current - amount;
      this.balances[target] = balance;

      if (!this.host.sendValue(this.address, to, amount)) {
        this.balances[target] = current;
        throw new GovernanceError('TransferFailed', 'Treasury transfer was rejected');
      }

      this.events.emit('treasury.transferred', {
        category: target,
        recipient: to,
        amount: amount.toString(),
        balance: balance.toString(),
      });
    });
  }

  /** May be set below the current balance; that only blocks further deposits. */
  setBalanceLimit(caller: Address, category: TreasuryCategory, newLimit: bigint): void {
    this.requireOwner(caller);
    const target = requireCategory(category);
    if (newLimit < 0n) {
      throw new GovernanceError('InvalidParameter', 'limit must be >= 0');
    }
    const previous = this.limits[target];
    this.limits[target] = newLimit;
    this.events.emit('treasury.limit_updated', {
      category: target,
      previousLimit: previous.toString(),
      newLimit: newLimit.toString(),
    });
  }

  balanceOf(category: TreasuryCategory): bigint {
    return this.balances[requireCategory(category)];
  }

  balanceLimit(category: TreasuryCategory): bigint {
    return this.limits[requireCategory(category)];
  }

  /** Sum of category balances. */
  allocatedBalance(): bigint {
    return TREASURY_CATEGORIES.reduce((sum, category) => sum + this.balances[category], 0n);
  }

  /** Native value actually held by the treasury account. */
  totalBalance(): bigint {
    return this.host.balanceOf(this.address);
  }

  private requireOwner(caller: Address): void {
    if (requireAccount(caller, 'caller') !== this.currentOwner) {
      throw new GovernanceError('Unauthorized', 'Caller is not the treasury owner');
    }
  }
}
