import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '@vaultgov/core';
import { MemoryHost, VoteSupport } from '@vaultgov/protocol';
import { resolveSettings } from '../src/settings.js';
import { attachEventLogger, deployGovernance } from '../src/system.js';
import { ALICE, BOB, captureLogger, DEPLOYER, RECIPIENT } from './helpers.js';

const ETHER = 10n ** 18n;

function deploy(config = DEFAULT_CONFIG) {
  const host = new MemoryHost();
  const { logger, lines } = captureLogger();
  const system = deployGovernance({ settings: resolveSettings(config), host, deployer: DEPLOYER, logger });
  return { host, system, lines };
}

describe('deployGovernance', () => {
  it('hands the treasury to the engine', () => {
    const { system } = deploy();
    expect(system.treasury.owner()).toBe(system.engine.address);
    expect(system.access.owner()).toBe(DEPLOYER);
    expect(system.access.hasRole('EXECUTOR_ROLE', system.engine.address)).toBe(true);
  });

  it('makes the deployer guardian and timelock admin', () => {
    const { system } = deploy();
    expect(system.access.membersOf('GUARDIAN_ROLE')).toEqual([DEPLOYER]);
    expect(system.access.membersOf('TIMELOCK_ADMIN_ROLE')).toEqual([DEPLOYER]);
    expect(system.access.membersOf('PROPOSER_ROLE')).toEqual([]);
  });

  it('grants the configured roles once each', () => {
    const { system } = deploy({
      ...DEFAULT_CONFIG,
      roles: { guardians: [ALICE, DEPLOYER], timelockAdmins: [BOB], proposers: [ALICE], voters: [ALICE, BOB] },
    });

    expect(system.access.membersOf('GUARDIAN_ROLE')).toEqual([DEPLOYER, ALICE]);
    expect(system.access.membersOf('TIMELOCK_ADMIN_ROLE')).toEqual([DEPLOYER, BOB]);
    expect(system.access.membersOf('PROPOSER_ROLE')).toEqual([ALICE]);
    expect(system.access.membersOf('VOTER_ROLE')).toEqual([ALICE, BOB]);
    // executor + 2 guardians + 2 admins + 1 proposer + 2 voters
    expect(system.events.ofType('role.granted')).toHaveLength(8);
  });

  it('applies configured parameters and limits', () => {
    const { system } = deploy({
      ...DEFAULT_CONFIG,
      governance: { ...DEFAULT_CONFIG.governance, votingPeriod: 10, proposalThreshold: '3' },
      treasury: { limits: { operational_expense: '20' } },
    });
    expect(system.engine.parameters().votingPeriod).toBe(10);
    expect(system.engine.parameters().proposalThreshold).toBe(3n * ETHER);
    expect(system.treasury.balanceLimit('operational_expense')).toBe(20n * ETHER);
    expect(system.treasury.balanceLimit('high_conviction')).toBe(100n * ETHER);
  });

  it('records deployment in one verifiable log', () => {
    const { system } = deploy();
    const types = system.events.list().map((event) => event.type);
    expect(types).toEqual(['role.granted', 'role.granted', 'role.granted', 'ownership.transferred']);
    expect(system.events.verify()).toBe(true);
  });

  it('logs each component and a summary', () => {
    const { system, lines } = deploy();
    const messages = lines.map((line) => line.message);
    expect(messages).toContain(`[deploy] deploying governance from ${DEPLOYER}`);
    expect(messages).toContain(`[deploy] treasury at ${system.treasury.address}`);
    expect(messages).toContain('[deploy] treasury ownership transferred to the engine');
    expect(messages).toContain('Deployment Summary');
    expect(messages).toContain(`GovernanceEngine:   ${system.engine.address}`);
    expect(messages).toContain('Voting: delay 1 blocks, period 50400 blocks, threshold 1.0');
    expect(messages).toContain('  operational_expense: quorum 10%, timelock 21600s, limit 10.0');
  });

  it('runs a proposal from stake to payout', () => {
    const { host, system } = deploy({
      ...DEFAULT_CONFIG,
      governance: { ...DEFAULT_CONFIG.governance, votingPeriod: 5 },
    });
    const { ledger, treasury, engine } = system;
    host.fund(ALICE, 100n * ETHER);
    host.fund(BOB, 100n * ETHER);
    ledger.deposit(ALICE, 16n * ETHER);
    treasury.depositToCategory(BOB, 'experimental_bet', 10n * ETHER);

    const id = engine.createProposal(ALICE, RECIPIENT, 3n * ETHER, 'Pilot integration', 'experimental_bet');
    host.mine(2);
    expect(engine.castVote(ALICE, id, VoteSupport.For)).toBe(4n * ETHER);
    host.mine(5);
    const eta = engine.queueProposal(ALICE, id);
    host.setTime(eta);
    engine.executeProposal(BOB, id);

    expect(engine.state(id)).toBe('executed');
    expect(host.balanceOf(RECIPIENT)).toBe(3n * ETHER);
    expect(treasury.balanceOf('experimental_bet')).toBe(7n * ETHER);
    expect(system.events.verify()).toBe(true);
  });
});

describe('attachEventLogger', () => {
  it('logs events at debug and cancellations at warn', () => {
    const { host, system } = deploy();
    const { logger, lines } = captureLogger();
    const detach = attachEventLogger(system.events, logger);
    host.fund(ALICE, 10n * ETHER);
    system.ledger.deposit(ALICE, 4n * ETHER);
    const id = system.engine.createProposal(ALICE, RECIPIENT, ETHER, 'Tooling', 'operational_expense');

    system.engine.cancelProposal(DEPLOYER, id);

    expect(lines[0]).toEqual({
      level: 'debug',
      message: `[governance] stake.deposited {"account":"${ALICE}","amount":"4000000000000000000","stake":"4000000000000000000"}`,
    });
    expect(lines.slice(-2)).toEqual([
      {
        level: 'debug',
        message: `[governance] proposal.cancelled {"proposalId":0,"guardian":"${DEPLOYER}"}`,
      },
      { level: 'warn', message: `[governance] proposal 0 cancelled by ${DEPLOYER}` },
    ]);

    detach();
    system.ledger.deposit(ALICE, ETHER);
    expect(lines).toHaveLength(4);
  });
});
