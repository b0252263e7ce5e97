/**
 * Governance: Domain Types
 *
 * Quadratic stake-weighted voting over three risk-tiered treasury pools.
 * Each proposal type selects its own quorum and timelock, and pays out of
 * the treasury category of the same risk tier.
 */

import { dataSlice, getAddress, id } from 'ethers';

export type Address = string;

// ---------------------------------------------------------------------------
// Proposal Types & Treasury Categories
// ---------------------------------------------------------------------------

export const PROPOSAL_TYPES = [
  'high_conviction',
  'experimental_bet',
  'operational_expense',
] as const;

export type ProposalType = (typeof PROPOSAL_TYPES)[number];

export function isProposalType(value: string): value is ProposalType {
  return (PROPOSAL_TYPES as readonly string[]).includes(value);
}

export const TREASURY_CATEGORIES = [
  'high_conviction',
  'experimental_bet',
  'operational_expense',
] as const;

export type TreasuryCategory = (typeof TREASURY_CATEGORIES)[number];

export function isTreasuryCategory(value: string): value is TreasuryCategory {
  return (TREASURY_CATEGORIES as readonly string[]).includes(value);
}

export const CATEGORY_FOR_PROPOSAL_TYPE: Record<ProposalType, TreasuryCategory> = {
  high_conviction: 'high_conviction',
  experimental_bet: 'experimental_bet',
  operational_expense: 'operational_expense',
};

// ---------------------------------------------------------------------------
// Proposal State
// ---------------------------------------------------------------------------

export const PROPOSAL_STATES = [
  'pending',
  'active',
  'defeated',
  'succeeded',
  'queued',
  'executed',
  'cancelled',
] as const;

export type ProposalState = (typeof PROPOSAL_STATES)[number];

// ---------------------------------------------------------------------------
// Votes
// ---------------------------------------------------------------------------

export enum VoteSupport {
  Against = 0,
  For = 1,
  Abstain = 2,
}

export function isVoteSupport(value: number): value is VoteSupport {
  return value === VoteSupport.Against || value === VoteSupport.For || value === VoteSupport.Abstain;
}

export interface VoteReceipt {
  hasVoted: boolean;
  support: VoteSupport;
  weight: bigint;
}

// ---------------------------------------------------------------------------
// Proposal
// ---------------------------------------------------------------------------

export interface Proposal {
  id: number;
  proposer: Address;
  recipient: Address;
  amount: bigint;
  description: string;
  type: ProposalType;
  startBlock: number;
  endBlock: number;
  forVotes: bigint;
  againstVotes: bigint;
  abstainVotes: bigint;
  cancelled: boolean;
  executed: boolean;
  queued: boolean;
  /** Earliest execution timestamp (seconds); 0 until queued. */
  eta: number;
}

// ---------------------------------------------------------------------------
// Roles
// ---------------------------------------------------------------------------

export const ROLES = [
  'PROPOSER_ROLE',
  'VOTER_ROLE',
  'EXECUTOR_ROLE',
  'GUARDIAN_ROLE',
  'TIMELOCK_ADMIN_ROLE',
] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: string): value is Role {
  return (ROLES as readonly string[]).includes(value);
}

/** bytes32 role identifier: keccak256 of the role name. */
export function roleId(role: Role): string {
  return id(role);
}

// ---------------------------------------------------------------------------
// Governance Parameters (TimelockAdmin-adjustable)
// ---------------------------------------------------------------------------

export interface GovernanceParams {
  /** Blocks between creation and the start of voting. */
  votingDelay: number;
  /** Blocks voting stays open. */
  votingPeriod: number;
  /** Own (non-delegated) voting power needed to create a proposal. */
  proposalThreshold: bigint;
  /** Whole percent of total voting power that must participate. */
  quorumPercentage: Record<ProposalType, number>;
  /** Seconds between queueing and earliest execution. */
  timelockDelay: Record<ProposalType, number>;
}

const HOUR = 60 * 60;
const DAY = 24 * HOUR;

export const DEFAULT_GOVERNANCE_PARAMS: GovernanceParams = {
  votingDelay: 1,
  votingPeriod: 50_400,
  proposalThreshold: 10n ** 18n,
  quorumPercentage: {
    high_conviction: 20,
    experimental_bet: 15,
    operational_expense: 10,
  },
  timelockDelay: {
    high_conviction: 3 * DAY,
    experimental_bet: 1 * DAY,
    operational_expense: 6 * HOUR,
  },
};

export const DEFAULT_CATEGORY_LIMITS: Record<TreasuryCategory, bigint> = {
  high_conviction: 100n * 10n ** 18n,
  experimental_bet: 50n * 10n ** 18n,
  operational_expense: 10n * 10n ** 18n,
};

/**
 * Deterministic account address for a named component, so the ledger,
 * treasury and engine can hold native value on the host.
 */
export function componentAddress(label: string): Address {
  return getAddress(dataSlice(id(label), 12));
}
