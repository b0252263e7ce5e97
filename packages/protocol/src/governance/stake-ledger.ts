/**
 * Governance: Stake Ledger
 *
 * Holds member stakes as native value on the ledger's own host account and
 * derives quadratic voting power from them.
 */

import type { HostEnvironment } from './environment.js';
import { GovernanceError } from './errors.js';
import { EventEmitterPort, EventSink } from './events.js';
import { normalizeAddress, ReentrancyGuard, requireAccount, requirePositive } from './guards.js';
import { Address, componentAddress } from './types.js';
import { quadraticVotingPower } from './voting.js';

export interface VotingPowerSource {
  votingPower(account: Address): bigint;
  totalVotingPower(): bigint;
}

export interface StakeSource extends VotingPowerSource {
  stakeOf(account: Address): bigint;
}

export interface StakeLedgerOptions {
  host: HostEnvironment;
  events?: EventSink;
  address?: Address;
}

export class StakeLedger implements StakeSource {
  readonly address: Address;
  private readonly host: HostEnvironment;
  private readonly events: EventEmitterPort;
  private readonly guard = new ReentrancyGuard();
  private readonly stakes = new Map<Address, bigint>();
  private total = 0n;

  constructor(options: StakeLedgerOptions) {
    this.host = options.host;
    this.address = options.address ?? componentAddress('vaultgov.stake-ledger');
    this.events = new EventEmitterPort(this.address, options.events);
  }

  deposit(caller: Address, amount: bigint): bigint {
    const account = requireAccount(caller, 'caller');
    requirePositive(amount);
    if (!this.host.sendValue(account, this.address, amount)) {
      throw new GovernanceError('TransferFailed', 'Deposit value could not be collected');
    }

    const stake = this.stakeOf(account) + amount;
    this.stakes.set(account, stake);
    this.total += amount;

    this.events.emit('stake.deposited', {
      account,
      amount: amount.toString(),
      stake: stake.toString(),
    });
    return stake;
  }

  withdraw(caller: Address, amount: bigint): bigint {
    return this.guard.run(() => {
      const account = requireAccount(caller, 'caller');
      requirePositive(amount);
      const current = this.stakeOf(account);
      if (amount > current) {
        throw new GovernanceError('InsufficientStake');
      }

      const stake = current - amount;
      this.stakes.set(account, stake);
      this.total -= amount;

      if (!this.host.sendValue(this.address, account, amount)) {
        this.stakes.set(account, current);
        this.total += amount;
        throw new GovernanceError('TransferFailed', 'Withdrawal could not be paid out');
      }

      this.events.emit('stake.withdrawn', {
        account,
        amount: amount.toString(),
        stake: stake.toString(),
      });
      return stake;
    });
  }

  stakeOf(account: Address): bigint {
    return this.stakes.get(normalizeAddress(account, 'account')) ?? 0n;
  }

  totalStake(): bigint {
    return this.total;
  }

  votingPower(account: Address): bigint {
    return quadraticVotingPower(this.stakeOf(account));
  }

  /**
   * sqrt of the aggregate stake. Because sqrt is sub-additive this is at most
   * the sum of individual powers; it is only used as the quorum base.
   */
  totalVotingPower(): bigint {
    return quadraticVotingPower(this.total);
  }
}
