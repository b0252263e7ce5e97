/**
 * Governance: Delegation Registry
 *
 * One outgoing delegation per account. The forward map and the reverse
 * index are only ever touched together, through link()/unlink().
 *
 * Delegation is a single hop: a delegate's effective power counts the own
 * power of its delegators, never what was delegated to them. Chains and
 * cycles therefore cannot multiply power.
 */

import { ZeroAddress } from 'ethers';
import { GovernanceError } from './errors.js';
import { EventEmitterPort, EventSink } from './events.js';
import { normalizeAddress, requireAccount } from './guards.js';
import type { StakeSource } from './stake-ledger.js';
import { Address, componentAddress } from './types.js';

export interface DelegatedPowerSource {
  votingPowerWithDelegation(account: Address): bigint;
}

export interface DelegationRegistryOptions {
  stakes: StakeSource;
  events?: EventSink;
  address?: Address;
}

export class DelegationRegistry implements DelegatedPowerSource {
  readonly address: Address;
  private readonly stakes: StakeSource;
  private readonly events: EventEmitterPort;
  private readonly delegateByDelegator = new Map<Address, Address>();
  private readonly delegatorsByDelegate = new Map<Address, Address[]>();

  constructor(options: DelegationRegistryOptions) {
    this.stakes = options.stakes;
    this.address = options.address ?? componentAddress('vaultgov.delegation');
    this.events = new EventEmitterPort(this.address, options.events);
  }

  delegate(caller: Address, delegatee: Address): void {
    const delegator = requireAccount(caller, 'caller');
    const target = requireAccount(delegatee, 'delegatee');
    if (target === delegator) {
      throw new GovernanceError('SelfDelegation');
    }
    if (this.stakes.stakeOf(delegator) === 0n) {
      throw new GovernanceError('NoStake');
    }
    const previous = this.delegateByDelegator.get(delegator);
    if (previous === target) {
      throw new GovernanceError('AlreadyDelegated');
    }

    if (previous !== undefined) {
      this.unlink(delegator, previous);
    }
    this.link(delegator, target);

    this.events.emit('delegation.created', {
      delegator,
      delegatee: target,
      previous: previous ?? null,
    });
  }

  revokeDelegation(caller: Address): void {
    const delegator = requireAccount(caller, 'caller');
    const current = this.delegateByDelegator.get(delegator);
    if (current === undefined) {
      throw new GovernanceError('NoDelegation');
    }

    this.unlink(delegator, current);

    this.events.emit('delegation.revoked', { delegator, delegatee: current });
  }

  /** Current delegatee, or the zero address when none. */
  delegateOf(delegator: Address): Address {
    return this.delegateByDelegator.get(normalizeAddress(delegator, 'delegator')) ?? ZeroAddress;
  }

  delegatorsOf(delegatee: Address): Address[] {
    return [...(this.delegatorsByDelegate.get(normalizeAddress(delegatee, 'delegatee')) ?? [])];
  }

  /**
   * Own power (dropped while the account delegates out, so it is never
   * counted twice) plus the own power of every current delegator.
   * Recomputed on every call.
   */
  votingPowerWithDelegation(account: Address): bigint {
    const target = normalizeAddress(account, 'account');
    let power = this.delegateByDelegator.has(target) ? 0n : this.stakes.votingPower(target);
    for (const delegator of this.delegatorsByDelegate.get(target) ?? []) {
      power += this.stakes.votingPower(delegator);
    }
    return power;
  }

  private link(delegator: Address, delegatee: Address): void {
    this.delegateByDelegator.set(delegator, delegatee);
    const list = this.delegatorsByDelegate.get(delegatee) ?? [];
    list.push(delegator);
    this.delegatorsByDelegate.set(delegatee, list);
  }

  // swap-with-last removal; order of the remaining delegators is not kept
  private unlink(delegator: Address, delegatee: Address): void {
    this.delegateByDelegator.delete(delegator);
    const list = this.delegatorsByDelegate.get(delegatee);
    if (!list) {
      return;
    }
    const index = list.indexOf(delegator);
    if (index !== -1) {
      list[index] = list[list.length - 1];
      list.pop();
    }
    if (list.length === 0) {
      this.delegatorsByDelegate.delete(delegatee);
    }
  }
}
