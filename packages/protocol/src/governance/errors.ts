/**
 * Governance: Typed Errors
 *
 * Every rejected operation throws a GovernanceError before it writes any
 * state. Callers branch on `code`; `message` is for humans.
 */

export const GOVERNANCE_ERROR_CODES = [
  'InvalidAmount',
  'InsufficientStake',
  'InvalidAddress',
  'ZeroAddress',
  'SelfDelegation',
  'NoStake',
  'NoDelegation',
  'AlreadyDelegated',
  'CategoryLimitExceeded',
  'InsufficientCategoryBalance',
  'InsufficientTotalBalance',
  'TransferFailed',
  'Unauthorized',
  'EmptyDescription',
  'InvalidProposalType',
  'InsufficientProposalPower',
  'ProposalNotFound',
  'ProposalCancelled',
  'AlreadyVoted',
  'InvalidSupport',
  'NotActive',
  'NoVotingPower',
  'AlreadyQueued',
  'VotingNotEnded',
  'ProposalNotPassed',
  'QuorumNotReached',
  'AlreadyExecuted',
  'NotQueued',
  'TimelockNotExpired',
  'AlreadyCancelled',
  'InvalidParameter',
  'ReentrantCall',
] as const;

export type GovernanceErrorCode = (typeof GOVERNANCE_ERROR_CODES)[number];

const DEFAULT_MESSAGES: Record<GovernanceErrorCode, string> = {
  InvalidAmount: 'Amount must be greater than zero',
  InsufficientStake: 'Insufficient stake',
  InvalidAddress: 'Invalid address',
  ZeroAddress: 'Zero address not allowed',
  SelfDelegation: 'Cannot delegate to self',
  NoStake: 'Delegator has no stake',
  NoDelegation: 'No active delegation',
  AlreadyDelegated: 'Already delegating to this account',
  CategoryLimitExceeded: 'Category balance limit exceeded',
  InsufficientCategoryBalance: 'Insufficient category balance',
  InsufficientTotalBalance: 'Insufficient treasury balance',
  TransferFailed: 'Value transfer failed',
  Unauthorized: 'Caller is not authorized',
  EmptyDescription: 'Description is required',
  InvalidProposalType: 'Unknown proposal type',
  InsufficientProposalPower: 'Insufficient voting power to propose',
  ProposalNotFound: 'Proposal not found',
  ProposalCancelled: 'Proposal is cancelled',
  AlreadyVoted: 'Voter already voted',
  InvalidSupport: 'Invalid vote type',
  NotActive: 'Proposal is not active',
  NoVotingPower: 'No voting power',
  AlreadyQueued: 'Proposal already queued',
  VotingNotEnded: 'Voting period not ended',
  ProposalNotPassed: 'Proposal did not pass',
  QuorumNotReached: 'Quorum not reached',
  AlreadyExecuted: 'Proposal already executed',
  NotQueued: 'Proposal not queued',
  TimelockNotExpired: 'Timelock not expired',
  AlreadyCancelled: 'Proposal already cancelled',
  InvalidParameter: 'Invalid governance parameter',
  ReentrantCall: 'Reentrant call rejected',
};

export class GovernanceError extends Error {
  constructor(
    public readonly code: GovernanceErrorCode,
    message: string = DEFAULT_MESSAGES[code],
  ) {
    super(message);
    this.name = 'GovernanceError';
  }
}

export function isGovernanceError(
  error: unknown,
  code?: GovernanceErrorCode,
): error is GovernanceError {
  if (!(error instanceof GovernanceError)) {
    return false;
  }
  return code === undefined || error.code === code;
}
