/**
 * Governance deployment
 *
 * Wires the stake ledger, delegation registry, treasury, access registry
 * and engine onto one host, hands the treasury to the engine and assigns
 * the configured roles. The returned system shares a single event log.
 */

import { formatEther } from 'ethers';
import { EventLog } from '@vaultgov/core';
import {
  AccessRegistry,
  Address,
  CATEGORY_FOR_PROPOSAL_TYPE,
  DelegationRegistry,
  GovernanceEngine,
  HostEnvironment,
  requireAccount,
  PROPOSAL_TYPES,
  Role,
  StakeLedger,
  Treasury,
} from '@vaultgov/protocol';
import type { Logger } from './logger.js';
import type { GovernanceSettings } from './settings.js';

export interface GovernanceSystem {
  deployer: Address;
  events: EventLog;
  ledger: StakeLedger;
  delegation: DelegationRegistry;
  treasury: Treasury;
  access: AccessRegistry;
  engine: GovernanceEngine;
}

export interface DeployOptions {
  settings: GovernanceSettings;
  host: HostEnvironment;
  deployer: Address;
  logger?: Logger;
  /** Existing log to append to; a fresh one on `host` otherwise. */
  events?: EventLog;
}

const SEPARATOR = '━'.repeat(40);

export function deployGovernance(options: DeployOptions): GovernanceSystem {
  const { settings, host, logger } = options;
  const deployer = requireAccount(options.deployer, 'deployer');
  const events =
    options.events ??
    new EventLog(host, {
      onListenerError: (error, envelope) => {
        logger?.error('[deploy] event listener failed on %s #%d: %s', envelope.type, envelope.seq, error);
      },
    });

  logger?.info('[deploy] deploying governance from %s', deployer);

  const ledger = new StakeLedger({ host, events });
  logger?.info('[deploy] stake ledger at %s', ledger.address);

  const delegation = new DelegationRegistry({ stakes: ledger, events });
  logger?.info('[deploy] delegation registry at %s', delegation.address);

  const treasury = new Treasury({ host, owner: deployer, limits: settings.limits, events });
  logger?.info('[deploy] treasury at %s', treasury.address);

  const access = new AccessRegistry({ owner: deployer, events });
  logger?.info('[deploy] access registry at %s', access.address);

  const engine = new GovernanceEngine({
    host,
    stakes: ledger,
    delegation,
    treasury,
    access,
    params: settings.params,
    events,
  });
  logger?.info('[deploy] governance engine at %s', engine.address);

  const grant = (role: Role, accounts: Address[]): void => {
    for (const account of accounts) {
      if (access.grantRole(deployer, role, account)) {
        logger?.debug('[deploy] granted %s to %s', role, account);
      }
    }
  };
  grant('EXECUTOR_ROLE', [engine.address]);
  grant('GUARDIAN_ROLE', [deployer, ...settings.roles.guardians]);
  grant('TIMELOCK_ADMIN_ROLE', [deployer, ...settings.roles.timelockAdmins]);
  grant('PROPOSER_ROLE', settings.roles.proposers);
  grant('VOTER_ROLE', settings.roles.voters);

  treasury.transferOwnership(deployer, engine.address);
  logger?.info('[deploy] treasury ownership transferred to the engine');

  if (logger) {
    logDeploymentSummary(logger, { deployer, events, ledger, delegation, treasury, access, engine });
  }
  return { deployer, events, ledger, delegation, treasury, access, engine };
}

function logDeploymentSummary(logger: Logger, system: GovernanceSystem): void {
  const params = system.engine.parameters();
  logger.info(SEPARATOR);
  logger.info('Deployment Summary');
  logger.info(SEPARATOR);
  logger.info(`StakeLedger:        ${system.ledger.address}`);
  logger.info(`DelegationRegistry: ${system.delegation.address}`);
  logger.info(`Treasury:           ${system.treasury.address}`);
  logger.info(`AccessRegistry:     ${system.access.address}`);
  logger.info(`GovernanceEngine:   ${system.engine.address}`);
  logger.info(
    `Voting: delay ${params.votingDelay} blocks, period ${params.votingPeriod} blocks, threshold ${formatEther(params.proposalThreshold)}`,
  );
  for (const type of PROPOSAL_TYPES) {
    const limit = system.treasury.balanceLimit(CATEGORY_FOR_PROPOSAL_TYPE[type]);
    logger.info(
      `  ${type}: quorum ${params.quorumPercentage[type]}%, timelock ${params.timelockDelay[type]}s, limit ${formatEther(limit)}`,
    );
  }
  logger.info(SEPARATOR);
}

/**
 * Logs every governance event at debug; cancellations also at warn.
 * Returns the unsubscribe function.
 */
export function attachEventLogger(events: EventLog, logger: Logger): () => void {
  return events.subscribe((envelope) => {
    logger.debug('[governance] %s %s', envelope.type, JSON.stringify(envelope.payload));
    if (envelope.type === 'proposal.cancelled') {
      logger.warn(
        '[governance] proposal %s cancelled by %s',
        envelope.payload.proposalId,
        envelope.payload.guardian,
      );
    }
  });
}
