/**
 * Governance: Proposal State
 *
 * Proposal state is never stored. It is recomputed from the proposal's own
 * fields and the current block on every query.
 */

import type { Proposal, ProposalState } from './types.js';

export type ProposalStateInput = Pick<
  Proposal,
  'cancelled' | 'executed' | 'queued' | 'startBlock' | 'endBlock' | 'forVotes' | 'againstVotes'
>;

export function proposalState(proposal: ProposalStateInput, currentBlock: number): ProposalState {
  if (proposal.cancelled) return 'cancelled';
  if (proposal.executed) return 'executed';
  if (proposal.queued) return 'queued';
  if (currentBlock <= proposal.startBlock) return 'pending';
  if (currentBlock <= proposal.endBlock) return 'active';
  // a tie is a loss
  if (proposal.forVotes <= proposal.againstVotes) return 'defeated';
  return 'succeeded';
}

export function totalVotesCast(
  proposal: Pick<Proposal, 'forVotes' | 'againstVotes' | 'abstainVotes'>,
): bigint {
  return proposal.forVotes + proposal.againstVotes + proposal.abstainVotes;
}

/** Votes required for quorum; integer division rounds the requirement down. */
export function quorumVotes(totalVotingPower: bigint, quorumPercentage: number): bigint {
  return (totalVotingPower * BigInt(quorumPercentage)) / 100n;
}

export function isTerminal(state: ProposalState): boolean {
  return state === 'executed' || state === 'cancelled';
}
