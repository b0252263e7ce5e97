/**
 * Governance: Observable Events
 *
 * Event types:
 *   stake.deposited               Stake added
 *   stake.withdrawn               Stake returned
 *   delegation.created            Delegation set or replaced
 *   delegation.revoked            Delegation cleared
 *   proposal.created              Proposal submitted
 *   proposal.voted                Vote recorded
 *   proposal.queued               Proposal entered the timelock
 *   proposal.executed             Treasury transfer performed
 *   proposal.cancelled            Guardian cancellation
 *   treasury.deposited            Category funded
 *   treasury.transferred          Category paid out
 *   treasury.limit_updated        Category ceiling changed
 *   role.granted / role.revoked   Access registry membership
 *   ownership.transferred         Component owner changed
 *   governance.parameters_updated Delay, period or threshold changed
 *   governance.quorum_updated     Quorum percentage changed
 *   governance.timelock_updated   Timelock delay changed
 *
 * Amounts and powers are decimal strings so envelopes stay JSON.
 */

import type { EventPayload } from '@vaultgov/core';

export interface GovernanceEventMap {
  'stake.deposited': { account: string; amount: string; stake: string };
  'stake.withdrawn': { account: string; amount: string; stake: string };
  'delegation.created': { delegator: string; delegatee: string; previous: string | null };
  'delegation.revoked': { delegator: string; delegatee: string };
  'proposal.created': {
    proposalId: number;
    proposer: string;
    recipient: string;
    amount: string;
    proposalType: string;
    startBlock: number;
    endBlock: number;
    description: string;
  };
  'proposal.voted': { proposalId: number; voter: string; support: number; weight: string };
  'proposal.queued': { proposalId: number; eta: number };
  'proposal.executed': { proposalId: number; recipient: string; amount: string; category: string };
  'proposal.cancelled': { proposalId: number; guardian: string };
  'treasury.deposited': { category: string; from: string; amount: string; balance: string };
  'treasury.transferred': { category: string; recipient: string; amount: string; balance: string };
  'treasury.limit_updated': { category: string; previousLimit: string; newLimit: string };
  'role.granted': { role: string; roleId: string; account: string; sender: string };
  'role.revoked': { role: string; roleId: string; account: string; sender: string };
  'ownership.transferred': { component: string; previousOwner: string; newOwner: string };
  'governance.parameters_updated': {
    votingDelay: number;
    votingPeriod: number;
    proposalThreshold: string;
  };
  'governance.quorum_updated': { proposalType: string; percentage: number };
  'governance.timelock_updated': { proposalType: string; delay: number };
}

export type GovernanceEventType = keyof GovernanceEventMap;

export const GOVERNANCE_EVENT_TYPES: readonly GovernanceEventType[] = [
  'stake.deposited',
  'stake.withdrawn',
  'delegation.created',
  'delegation.revoked',
  'proposal.created',
  'proposal.voted',
  'proposal.queued',
  'proposal.executed',
  'proposal.cancelled',
  'treasury.deposited',
  'treasury.transferred',
  'treasury.limit_updated',
  'role.granted',
  'role.revoked',
  'ownership.transferred',
  'governance.parameters_updated',
  'governance.quorum_updated',
  'governance.timelock_updated',
];

/** Anything that accepts events; `EventLog` from core satisfies it. */
export interface EventSink {
  append(emitter: string, type: string, payload: EventPayload): unknown;
}

/**
 * Typed emitter bound to one component. Without a sink, emission is a no-op.
 */
export class EventEmitterPort {
  constructor(
    private readonly emitter: string,
    private readonly sink?: EventSink,
  ) {}

  emit<K extends GovernanceEventType>(type: K, payload: GovernanceEventMap[K]): void {
    this.sink?.append(this.emitter, type, payload);
  }
}
