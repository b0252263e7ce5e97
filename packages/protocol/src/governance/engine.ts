/**
 * Governance: Engine
 *
 * Owns the proposal lifecycle:
 *
 *   pending ─▶ active ─▶ defeated
 *                    └─▶ succeeded ─(queue)─▶ queued ─(eta reached, execute)─▶ executed
 *   any non-terminal ─(guardian cancel)─▶ cancelled
 *
 * Stake, delegation, treasury and roles are injected collaborators; the
 * engine reads power from them and is the single writer to the treasury.
 */

import type { DelegatedPowerSource } from './delegation.js';
import type { HostEnvironment } from './environment.js';
import { GovernanceError } from './errors.js';
import { EventEmitterPort, EventSink } from './events.js';
import { ReentrancyGuard, requireAccount, requirePositive } from './guards.js';
import type { RoleChecker } from './access.js';
import type { VotingPowerSource } from './stake-ledger.js';
import { proposalState, quorumVotes, totalVotesCast } from './state.js';
import type { TreasuryPort } from './treasury.js';
import {
  Address,
  CATEGORY_FOR_PROPOSAL_TYPE,
  componentAddress,
  DEFAULT_GOVERNANCE_PARAMS,
  GovernanceParams,
  isProposalType,
  isVoteSupport,
  Proposal,
  PROPOSAL_TYPES,
  ProposalState,
  ProposalType,
  Role,
  VoteReceipt,
  VoteSupport,
} from './types.js';

export interface GovernanceEngineOptions {
  host: HostEnvironment;
  stakes: VotingPowerSource;
  delegation: DelegatedPowerSource;
  treasury: TreasuryPort;
  access: RoleChecker;
  params?: Partial<GovernanceParams>;
  events?: EventSink;
  address?: Address;
}

export interface GovernanceParameterUpdate {
  votingDelay: number;
  votingPeriod: number;
  proposalThreshold: bigint;
}

// ---------------------------------------------------------------------------
// Parameter validation
// ---------------------------------------------------------------------------

function requireBlockCount(value: number, field: string, min: number): void {
  if (!Number.isSafeInteger(value) || value < min) {
    throw new GovernanceError('InvalidParameter', `${field} must be an integer >= ${min}`);
  }
}

function requireDelay(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new GovernanceError('InvalidParameter', `${field} must be a non-negative integer`);
  }
}

function requirePercentage(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 100) {
    throw new GovernanceError('InvalidParameter', `${field} must be an integer in 0..100`);
  }
}

function requireProposalType(type: string): ProposalType {
  if (!isProposalType(type)) {
    throw new GovernanceError('InvalidProposalType', `unknown proposal type: ${type}`);
  }
  return type;
}

function resolveParams(overrides: Partial<GovernanceParams> = {}): GovernanceParams {
  const params: GovernanceParams = {
    votingDelay: overrides.votingDelay ?? DEFAULT_GOVERNANCE_PARAMS.votingDelay,
    votingPeriod: overrides.votingPeriod ?? DEFAULT_GOVERNANCE_PARAMS.votingPeriod,
    proposalThreshold: overrides.proposalThreshold ?? DEFAULT_GOVERNANCE_PARAMS.proposalThreshold,
    quorumPercentage: {
      ...DEFAULT_GOVERNANCE_PARAMS.quorumPercentage,
      ...overrides.quorumPercentage,
    },
    timelockDelay: {
      ...DEFAULT_GOVERNANCE_PARAMS.timelockDelay,
      ...overrides.timelockDelay,
    },
  };
  requireBlockCount(params.votingDelay, 'votingDelay', 0);
  requireBlockCount(params.votingPeriod, 'votingPeriod', 1);
  if (params.proposalThreshold < 0n) {
    throw new GovernanceError('InvalidParameter', 'proposalThreshold must be >= 0');
  }
  for (const type of PROPOSAL_TYPES) {
    requirePercentage(params.quorumPercentage[type], `quorumPercentage.${type}`);
    requireDelay(params.timelockDelay[type], `timelockDelay.${type}`);
  }
  return params;
}

function copyProposal(proposal: Proposal): Proposal {
  return { ...proposal };
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class GovernanceEngine {
  readonly address: Address;
  private readonly host: HostEnvironment;
  private readonly stakes: VotingPowerSource;
  private readonly delegation: DelegatedPowerSource;
  private readonly treasury: TreasuryPort;
  private readonly access: RoleChecker;
  private readonly events: EventEmitterPort;
  private readonly guard = new ReentrancyGuard();
  private readonly proposals: Proposal[] = [];
  private readonly receipts = new Map<number, Map<Address, VoteReceipt>>();
  private params: GovernanceParams;

  constructor(options: GovernanceEngineOptions) {
    this.host = options.host;
    this.stakes = options.stakes;
    this.delegation = options.delegation;
    this.treasury = options.treasury;
    this.access = options.access;
    this.address = options.address ?? componentAddress('vaultgov.governance');
    this.events = new EventEmitterPort(this.address, options.events);
    this.params = resolveParams(options.params);
  }

  // ── Lifecycle ──────────────────────────────────────────────────────

  createProposal(
    caller: Address,
    recipient: Address,
    amount: bigint,
    description: string,
    type: ProposalType,
  ): number {
    const proposer = requireAccount(caller, 'caller');
    const to = requireAccount(recipient, 'recipient');
    requirePositive(amount);
    if (typeof description !== 'string' || description.trim().length === 0) {
      throw new GovernanceError('EmptyDescription');
    }
    const proposalType = requireProposalType(type);
    // own power only: delegated power does not entitle anyone to propose
    if (this.stakes.votingPower(proposer) < this.params.proposalThreshold) {
      throw new GovernanceError('InsufficientProposalPower');
    }

    const id = this.proposals.length;
    const startBlock = this.host.blockNumber() + this.params.votingDelay;
    const endBlock = startBlock + this.params.votingPeriod;
    this.proposals.push({
      id,
      proposer,
      recipient: to,
      amount,
      description,
      type: proposalType,
      startBlock,
      endBlock,
      forVotes: 0n,
      againstVotes: 0n,
      abstainVotes: 0n,
      cancelled: false,
      executed: false,
      queued: false,
      eta: 0,
    });
    this.receipts.set(id, new Map());

    this.events.emit('proposal.created', {
      proposalId: id,
      proposer,
      recipient: to,
      amount: amount.toString(),
      proposalType,
      startBlock,
      endBlock,
      description,
    });
    return id;
  }

  /** Records the vote and returns the weight counted for it. */
  castVote(caller: Address, proposalId: number, support: number): bigint {
    const voter = requireAccount(caller, 'caller');
    const proposal = this.requireProposal(proposalId);
    if (proposal.cancelled) {
      throw new GovernanceError('ProposalCancelled');
    }
    const receipts = this.receiptsFor(proposalId);
    if (receipts.has(voter)) {
      throw new GovernanceError('AlreadyVoted');
    }
    if (!isVoteSupport(support)) {
      throw new GovernanceError('InvalidSupport');
    }
    if (this.currentState(proposal) !== 'active') {
      throw new GovernanceError('NotActive');
    }
    const weight = this.delegation.votingPowerWithDelegation(voter);
    if (weight === 0n) {
      throw new GovernanceError('NoVotingPower');
    }

    // record first, then count
    receipts.set(voter, { hasVoted: true, support, weight });
    switch (support) {
      case VoteSupport.Against:
        proposal.againstVotes += weight;
        break;
      case VoteSupport.For:
        proposal.forVotes += weight;
        break;
      case VoteSupport.Abstain:
        proposal.abstainVotes += weight;
        break;
    }

    this.events.emit('proposal.voted', {
      proposalId,
      voter,
      support,
      weight: weight.toString(),
    });
    return weight;
  }

  /** Moves a passed proposal into the timelock; returns its eta. */
  queueProposal(caller: Address, proposalId: number): number {
    requireAccount(caller, 'caller');
    const proposal = this.requireProposal(proposalId);
    if (proposal.cancelled) {
      throw new GovernanceError('ProposalCancelled');
    }
    if (proposal.queued) {
      throw new GovernanceError('AlreadyQueued');
    }
    const state = this.currentState(proposal);
    if (state !== 'succeeded' && state !== 'defeated') {
      throw new GovernanceError('VotingNotEnded');
    }
    if (proposal.forVotes <= proposal.againstVotes) {
      throw new GovernanceError('ProposalNotPassed');
    }
    const required = this.quorumVotes(proposal.type);
    if (totalVotesCast(proposal) < required) {
      throw new GovernanceError('QuorumNotReached');
    }

    const eta = this.host.timestamp() + this.params.timelockDelay[proposal.type];
    proposal.queued = true;
    proposal.eta = eta;

    this.events.emit('proposal.queued', { proposalId, eta });
    return eta;
  }

  /**
   * Pays the proposal out of its category. The executed flag is set before
   * the treasury call and cleared again if the call throws, so a failed
   * payout leaves the proposal queued and retryable.
   */
  executeProposal(caller: Address, proposalId: number): void {
    this.guard.run(() => {
      requireAccount(caller, 'caller');
      const proposal = this.requireProposal(proposalId);
      if (proposal.cancelled) {
        throw new GovernanceError('ProposalCancelled');
      }
      if (proposal.executed) {
        throw new GovernanceError('AlreadyExecuted');
      }
      if (!proposal.queued) {
        throw new GovernanceError('NotQueued');
      }
      if (this.host.timestamp() < proposal.eta) {
        throw new GovernanceError('TimelockNotExpired');
      }

      const category = CATEGORY_FOR_PROPOSAL_TYPE[proposal.type];
      proposal.executed = true;
      try {
        this.treasury.transferFunds(this.address, category, proposal.recipient, proposal.amount);
      } catch (error) {
        proposal.executed = false;
        throw error;
      }

      this.events.emit('proposal.executed', {
        proposalId,
        recipient: proposal.recipient,
        amount: proposal.amount.toString(),
        category,
      });
    });
  }

  /** Guardian emergency brake. There is no way back from cancellation. */
  cancelProposal(caller: Address, proposalId: number): void {
    const guardian = this.requireRole(caller, 'GUARDIAN_ROLE', 'Only guardians can cancel proposals');
    const proposal = this.requireProposal(proposalId);
    if (proposal.cancelled) {
      throw new GovernanceError('AlreadyCancelled');
    }
    if (proposal.executed) {
      throw new GovernanceError('AlreadyExecuted');
    }

    proposal.cancelled = true;

    this.events.emit('proposal.cancelled', { proposalId, guardian });
  }

  // ── Parameters ─────────────────────────────────────────────────────

  setTimelockDelay(caller: Address, type: ProposalType, delay: number): void {
    this.requireRole(caller, 'TIMELOCK_ADMIN_ROLE', 'Only timelock admins can change the timelock');
    const proposalType = requireProposalType(type);
    requireDelay(delay, 'delay');
    this.params = {
      ...this.params,
      timelockDelay: { ...this.params.timelockDelay, [proposalType]: delay },
    };
    this.events.emit('governance.timelock_updated', { proposalType, delay });
  }

  setQuorumPercentage(caller: Address, type: ProposalType, percentage: number): void {
    this.requireRole(caller, 'TIMELOCK_ADMIN_ROLE', 'Only timelock admins can change the quorum');
    const proposalType = requireProposalType(type);
    requirePercentage(percentage, 'percentage');
    this.params = {
      ...this.params,
      quorumPercentage: { ...this.params.quorumPercentage, [proposalType]: percentage },
    };
    this.events.emit('governance.quorum_updated', { proposalType, percentage });
  }

  /** Applies to proposals created afterwards; existing start/end blocks stay fixed. */
  setGovernanceParameters(caller: Address, update: GovernanceParameterUpdate): void {
    this.requireRole(caller, 'TIMELOCK_ADMIN_ROLE', 'Only timelock admins can change parameters');
    requireBlockCount(update.votingDelay, 'votingDelay', 0);
    requireBlockCount(update.votingPeriod, 'votingPeriod', 1);
    if (update.proposalThreshold < 0n) {
      throw new GovernanceError('InvalidParameter', 'proposalThreshold must be >= 0');
    }
    this.params = {
      ...this.params,
      votingDelay: update.votingDelay,
      votingPeriod: update.votingPeriod,
      proposalThreshold: update.proposalThreshold,
    };
    this.events.emit('governance.parameters_updated', {
      votingDelay: update.votingDelay,
      votingPeriod: update.votingPeriod,
      proposalThreshold: update.proposalThreshold.toString(),
    });
  }

  // ── Queries ────────────────────────────────────────────────────────

  state(proposalId: number): ProposalState {
    return this.currentState(this.requireProposal(proposalId));
  }

  getProposal(proposalId: number): Proposal {
    return copyProposal(this.requireProposal(proposalId));
  }

  listProposals(state?: ProposalState): Proposal[] {
    const all = this.proposals.map(copyProposal);
    if (!state) return all;
    return all.filter((proposal) => this.currentState(proposal) === state);
  }

  proposalCount(): number {
    return this.proposals.length;
  }

  hasVoted(proposalId: number, account: Address): boolean {
    return this.getReceipt(proposalId, account) !== undefined;
  }

  getReceipt(proposalId: number, account: Address): VoteReceipt | undefined {
    this.requireProposal(proposalId);
    const receipt = this.receiptsFor(proposalId).get(requireAccount(account, 'account'));
    return receipt ? { ...receipt } : undefined;
  }

  /** Eta in seconds, or 0 while the proposal is not queued. */
  executionTime(proposalId: number): number {
    return this.requireProposal(proposalId).eta;
  }

  timelockDelay(type: ProposalType): number {
    return this.params.timelockDelay[requireProposalType(type)];
  }

  quorumPercentage(type: ProposalType): number {
    return this.params.quorumPercentage[requireProposalType(type)];
  }

  quorumVotes(type: ProposalType): bigint {
    return quorumVotes(this.stakes.totalVotingPower(), this.quorumPercentage(type));
  }

  parameters(): GovernanceParams {
    return {
      ...this.params,
      quorumPercentage: { ...this.params.quorumPercentage },
      timelockDelay: { ...this.params.timelockDelay },
    };
  }

  // ── Internals ──────────────────────────────────────────────────────

  private currentState(proposal: Proposal): ProposalState {
    return proposalState(proposal, this.host.blockNumber());
  }

  private requireProposal(proposalId: number): Proposal {
    const proposal = Number.isInteger(proposalId) ? this.proposals[proposalId] : undefined;
    if (!proposal) {
      throw new GovernanceError('ProposalNotFound', `proposal ${proposalId} not found`);
    }
    return proposal;
  }

  private receiptsFor(proposalId: number): Map<Address, VoteReceipt> {
    let receipts = this.receipts.get(proposalId);
    if (!receipts) {
      receipts = new Map();
      this.receipts.set(proposalId, receipts);
    }
    return receipts;
  }

  private requireRole(caller: Address, role: Role, message: string): Address {
    const account = requireAccount(caller, 'caller');
    if (!this.access.hasRole(role, account)) {
      throw new GovernanceError('Unauthorized', message);
    }
    return account;
  }
}
