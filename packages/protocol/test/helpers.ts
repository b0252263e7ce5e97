import { expect } from 'vitest';
import { EventLog } from '@vaultgov/core';
import {
  AccessRegistry,
  DelegationRegistry,
  GovernanceEngine,
  GovernanceErrorCode,
  GovernanceParams,
  isGovernanceError,
  MemoryHost,
  StakeLedger,
  Treasury,
} from '../src/index.js';

export const ETHER = 10n ** 18n;

export const DEPLOYER = '0x1000000000000000000000000000000000000001';
export const ALICE = '0x2000000000000000000000000000000000000002';
export const BOB = '0x3000000000000000000000000000000000000003';
export const CAROL = '0x4000000000000000000000000000000000000004';
export const DAVE = '0x5000000000000000000000000000000000000005';
export const RECIPIENT = '0x6000000000000000000000000000000000000006';
export const OUTSIDER = '0x7000000000000000000000000000000000000007';

export function expectGovernanceError(fn: () => unknown, code: GovernanceErrorCode): void {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(isGovernanceError(caught, code), `expected ${code}, got ${String(caught)}`).toBe(true);
}

export interface Fixture {
  host: MemoryHost;
  log: EventLog;
  ledger: StakeLedger;
  delegation: DelegationRegistry;
  treasury: Treasury;
  access: AccessRegistry;
  engine: GovernanceEngine;
}

/**
 * Fully wired system: deployer is guardian and timelock admin, the engine
 * owns the treasury, every named account holds 1000 ether on the host.
 */
export function createFixture(params?: Partial<GovernanceParams>): Fixture {
  const host = new MemoryHost();
  const log = new EventLog(host);
  for (const account of [DEPLOYER, ALICE, BOB, CAROL, DAVE, OUTSIDER]) {
    host.fund(account, 1000n * ETHER);
  }

  const ledger = new StakeLedger({ host, events: log });
  const delegation = new DelegationRegistry({ stakes: ledger, events: log });
  const treasury = new Treasury({ host, owner: DEPLOYER, events: log });
  const access = new AccessRegistry({ owner: DEPLOYER, events: log });
  const engine = new GovernanceEngine({
    host,
    stakes: ledger,
    delegation,
    treasury,
    access,
    params,
    events: log,
  });

  access.grantRole(DEPLOYER, 'GUARDIAN_ROLE', DEPLOYER);
  access.grantRole(DEPLOYER, 'TIMELOCK_ADMIN_ROLE', DEPLOYER);
  access.grantRole(DEPLOYER, 'EXECUTOR_ROLE', engine.address);
  treasury.transferOwnership(DEPLOYER, engine.address);

  return { host, log, ledger, delegation, treasury, access, engine };
}

/** Stakes 10 / 100 / 50 ether for Alice / Bob / Carol. */
export function stakeMembers(fixture: Fixture): void {
  fixture.ledger.deposit(ALICE, 10n * ETHER);
  fixture.ledger.deposit(BOB, 100n * ETHER);
  fixture.ledger.deposit(CAROL, 50n * ETHER);
}
