#!/usr/bin/env node

import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseEther } from 'ethers';
import { loadConfig, resolveStoragePaths } from '@vaultgov/core';
import { Address, componentAddress, MemoryHost, VoteSupport } from '@vaultgov/protocol';
import { createLogger, Logger } from './logger.js';
import { SeedPlan, seedGovernance } from './seed.js';
import { resolveSettings } from './settings.js';
import { attachEventLogger, deployGovernance, GovernanceSystem } from './system.js';

export interface CliArgs {
  dataDir?: string;
  seed: boolean;
  help: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  let dataDir: string | undefined;
  let seed = false;
  let help = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--data-dir') {
      dataDir = argv[++i];
      if (!dataDir) {
        throw new Error('--data-dir needs a path');
      }
      continue;
    }
    if (arg === '--seed') {
      seed = true;
      continue;
    }
    if (arg === '--help' || arg === '-h') {
      help = true;
      continue;
    }
    throw new Error(`unknown option: ${arg}`);
  }
  return { dataDir, seed, help };
}

/** Deterministic development account for `label`. */
export function devAccount(label: string): Address {
  return componentAddress(`vaultgov.dev.${label}`);
}

/** Five members of uneven stake, two delegations, funded categories and one proposal per type. */
export function sampleSeedPlan(): SeedPlan {
  const member = (n: number) => devAccount(`member-${n}`);
  return {
    members: [
      { account: member(1), stake: parseEther('20') },
      { account: member(2), stake: parseEther('10') },
      { account: member(3), stake: parseEther('5') },
      { account: member(4), stake: parseEther('2') },
      { account: member(5), stake: parseEther('1') },
    ],
    delegations: [
      { from: member(4), to: member(1) },
      { from: member(5), to: member(2) },
    ],
    deposits: [
      { from: devAccount('funder'), category: 'high_conviction', amount: parseEther('30') },
      { from: devAccount('funder'), category: 'experimental_bet', amount: parseEther('15') },
      { from: devAccount('funder'), category: 'operational_expense', amount: parseEther('5') },
    ],
    proposals: [
      {
        proposer: member(1),
        recipient: devAccount('recipient-1'),
        amount: parseEther('5'),
        description: 'Invest in an early-stage venture',
        type: 'high_conviction',
      },
      {
        proposer: member(2),
        recipient: devAccount('recipient-2'),
        amount: parseEther('2'),
        description: 'Small position in a new lending protocol',
        type: 'experimental_bet',
      },
      {
        proposer: member(3),
        recipient: devAccount('recipient-3'),
        amount: parseEther('0.5'),
        description: 'Hosting and tooling for the quarter',
        type: 'operational_expense',
      },
    ],
    votes: [
      { voter: member(1), proposal: 0, support: VoteSupport.For },
      { voter: member(2), proposal: 0, support: VoteSupport.For },
      { voter: member(3), proposal: 1, support: VoteSupport.Against },
      { voter: member(2), proposal: 2, support: VoteSupport.Abstain },
    ],
  };
}

export interface DeploymentRun {
  host: MemoryHost;
  system: GovernanceSystem;
  logger: Logger;
  proposalIds: number[];
  stop: () => Promise<void>;
}

/**
 * Loads the config under the data dir, deploys onto an in-memory host and
 * optionally seeds sample data. Logs go to the console and to
 * `<data-dir>/logs/vaultgovd.log` unless the config names another file.
 */
export async function runDeployment(argv: string[]): Promise<DeploymentRun> {
  const args = parseArgs(argv);
  const paths = resolveStoragePaths(args.dataDir);
  const config = await loadConfig(paths);
  const settings = resolveSettings(config);
  // a relative log file lands under <data-dir>/logs
  const logger = createLogger({
    ...settings.logging,
    file: resolve(paths.logs, settings.logging.file ?? 'vaultgovd.log'),
  });

  const host = new MemoryHost();
  const deployer = devAccount('deployer');
  const system = deployGovernance({ settings, host, deployer, logger });
  const detach = attachEventLogger(system.events, logger);

  let proposalIds: number[] = [];
  if (args.seed) {
    proposalIds = seedGovernance(system, host, sampleSeedPlan(), logger).proposalIds;
  }
  logger.info('[vaultgovd] data dir %s, %d events recorded', paths.root, system.events.size());

  const stop = async (): Promise<void> => {
    detach();
    await logger.flush();
  };
  return { host, system, logger, proposalIds, stop };
}

function printHelp(): void {
  console.log(`
vaultgovd [options]

Options:
  --data-dir <path>  Override storage root (env: VAULTGOV_HOME)
  --seed             Seed sample members, deposits and proposals
  -h, --help         Show help
`);
}

async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  if (parseArgs(argv).help) {
    printHelp();
    return;
  }
  const run = await runDeployment(argv);
  await run.stop();
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && resolve(entry) === fileURLToPath(import.meta.url);
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    console.error('[vaultgovd] fatal error:', error);
    process.exit(1);
  });
}
