/**
 * Test-data seeding for development deployments: funds and stakes members,
 * sets up delegations, fills treasury categories, opens proposals and
 * casts the first votes once voting is open.
 */

import { formatEther } from 'ethers';
import {
  Address,
  HostEnvironment,
  ProposalType,
  TreasuryCategory,
  VoteSupport,
} from '@vaultgov/protocol';
import type { Logger } from './logger.js';
import type { GovernanceSystem } from './system.js';

/** A host that can mint balances and advance blocks, such as `MemoryHost`. */
export interface DevHost extends HostEnvironment {
  fund(account: Address, amount: bigint): void;
  mine(blocks?: number): void;
}

export interface SeedMember {
  account: Address;
  stake: bigint;
  /** Extra balance minted beyond the stake. */
  spare?: bigint;
}

export interface SeedProposal {
  proposer: Address;
  recipient: Address;
  amount: bigint;
  description: string;
  type: ProposalType;
}

export interface SeedVote {
  voter: Address;
  /** Index into `proposals` of the plan. */
  proposal: number;
  support: VoteSupport;
}

export interface SeedPlan {
  members: SeedMember[];
  delegations?: { from: Address; to: Address }[];
  deposits?: { from: Address; category: TreasuryCategory; amount: bigint }[];
  proposals?: SeedProposal[];
  votes?: SeedVote[];
}

export interface SeedResult {
  proposalIds: number[];
}

export function seedGovernance(
  system: GovernanceSystem,
  host: DevHost,
  plan: SeedPlan,
  logger?: Logger,
): SeedResult {
  const { ledger, delegation, treasury, engine } = system;

  for (const member of plan.members) {
    host.fund(member.account, member.stake + (member.spare ?? 0n));
    ledger.deposit(member.account, member.stake);
    logger?.info(
      '[seed] %s staked %s (voting power %s)',
      member.account,
      formatEther(member.stake),
      formatEther(ledger.votingPower(member.account)),
    );
  }

  for (const { from, to } of plan.delegations ?? []) {
    delegation.delegate(from, to);
    logger?.info('[seed] %s delegates to %s', from, to);
  }

  for (const { from, category, amount } of plan.deposits ?? []) {
    host.fund(from, amount);
    treasury.depositToCategory(from, category, amount);
    logger?.info('[seed] deposited %s to %s', formatEther(amount), category);
  }

  const proposalIds = (plan.proposals ?? []).map((proposal) => {
    const id = engine.createProposal(
      proposal.proposer,
      proposal.recipient,
      proposal.amount,
      proposal.description,
      proposal.type,
    );
    logger?.info('[seed] proposal %d: %s (%s to %s)', id, proposal.description, formatEther(proposal.amount), proposal.recipient);
    return id;
  });

  const votes = plan.votes ?? [];
  if (votes.length > 0) {
    host.mine(engine.parameters().votingDelay + 1);
    for (const vote of votes) {
      const id = proposalIds[vote.proposal];
      if (id === undefined) {
        throw new Error(`votes: proposal index ${vote.proposal} is not in the plan`);
      }
      const weight = engine.castVote(vote.voter, id, vote.support);
      logger?.info('[seed] %s voted %s on proposal %d with %s', vote.voter, VoteSupport[vote.support], id, formatEther(weight));
    }
  }

  logger?.info(
    '[seed] done: %d members, %d delegations, %d proposals, treasury holds %s',
    plan.members.length,
    plan.delegations?.length ?? 0,
    proposalIds.length,
    formatEther(treasury.totalBalance()),
  );
  return { proposalIds };
}
