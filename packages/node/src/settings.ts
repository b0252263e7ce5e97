/**
 * Deployment settings
 *
 * Turns the on-disk `DeploymentConfig` (ether strings, raw addresses,
 * loosely keyed records) into the typed values the governance components
 * take. Every problem is reported against the config field it came from.
 */

import { getAddress, parseEther, ZeroAddress } from 'ethers';
import type { DeploymentConfig } from '@vaultgov/core';
import {
  Address,
  DEFAULT_CATEGORY_LIMITS,
  DEFAULT_GOVERNANCE_PARAMS,
  GovernanceParams,
  isProposalType,
  isTreasuryCategory,
  ProposalType,
  TreasuryCategory,
} from '@vaultgov/protocol';
import { isLogLevel, LogLevel } from './logger.js';

export interface RoleAssignments {
  guardians: Address[];
  timelockAdmins: Address[];
  proposers: Address[];
  voters: Address[];
}

export interface GovernanceSettings {
  params: GovernanceParams;
  limits: Record<TreasuryCategory, bigint>;
  roles: RoleAssignments;
  logging: {
    level: LogLevel;
    file?: string;
  };
}

function integerField(value: unknown, field: string, min: number, max?: number): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < min) {
    throw new Error(`${field} must be an integer >= ${min}`);
  }
  if (max !== undefined && value > max) {
    throw new Error(`${field} must be <= ${max}`);
  }
  return value;
}

function etherField(value: unknown, field: string): bigint {
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new Error(`${field} must be an ether amount`);
  }
  let amount: bigint;
  try {
    amount = parseEther(String(value));
  } catch {
    throw new Error(`${field} must be an ether amount, got ${JSON.stringify(value)}`);
  }
  if (amount < 0n) {
    throw new Error(`${field} must be >= 0`);
  }
  return amount;
}

function addressList(value: unknown, field: string): Address[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new Error(`${field} must be a list of addresses`);
  }
  const seen = new Set<Address>();
  value.forEach((entry: unknown, index) => {
    let address: Address;
    try {
      address = getAddress(String(entry));
    } catch {
      throw new Error(`${field}[${index}] must be an address`);
    }
    if (address === ZeroAddress) {
      throw new Error(`${field}[${index}] cannot be the zero address`);
    }
    seen.add(address);
  });
  return [...seen];
}

function byProposalType(
  record: Record<string, number> | undefined,
  defaults: Record<ProposalType, number>,
  field: string,
  max?: number,
): Record<ProposalType, number> {
  const resolved = { ...defaults };
  for (const [key, value] of Object.entries(record ?? {})) {
    if (!isProposalType(key)) {
      throw new Error(`${field}.${key} is not a proposal type`);
    }
    resolved[key] = integerField(value, `${field}.${key}`, 0, max);
  }
  return resolved;
}

function categoryLimits(record: Record<string, string> | undefined): Record<TreasuryCategory, bigint> {
  const resolved = { ...DEFAULT_CATEGORY_LIMITS };
  for (const [key, value] of Object.entries(record ?? {})) {
    if (!isTreasuryCategory(key)) {
      throw new Error(`treasury.limits.${key} is not a treasury category`);
    }
    resolved[key] = etherField(value, `treasury.limits.${key}`);
  }
  return resolved;
}

export function resolveSettings(config: DeploymentConfig): GovernanceSettings {
  if (config.v !== 1) {
    throw new Error(`v must be 1, got ${String(config.v)}`);
  }
  const governance = config.governance ?? {};
  const defaults = DEFAULT_GOVERNANCE_PARAMS;

  const params: GovernanceParams = {
    votingDelay: integerField(governance.votingDelay ?? defaults.votingDelay, 'governance.votingDelay', 0),
    votingPeriod: integerField(
      governance.votingPeriod ?? defaults.votingPeriod,
      'governance.votingPeriod',
      1,
    ),
    proposalThreshold:
      governance.proposalThreshold === undefined
        ? defaults.proposalThreshold
        : etherField(governance.proposalThreshold, 'governance.proposalThreshold'),
    quorumPercentage: byProposalType(
      governance.quorumPercentage,
      defaults.quorumPercentage,
      'governance.quorumPercentage',
      100,
    ),
    timelockDelay: byProposalType(governance.timelockDelay, defaults.timelockDelay, 'governance.timelockDelay'),
  };

  const level = config.logging?.level ?? 'info';
  if (!isLogLevel(level)) {
    throw new Error('logging.level must be one of debug, info, warn, error');
  }

  return {
    params,
    limits: categoryLimits(config.treasury?.limits),
    roles: {
      guardians: addressList(config.roles?.guardians, 'roles.guardians'),
      timelockAdmins: addressList(config.roles?.timelockAdmins, 'roles.timelockAdmins'),
      proposers: addressList(config.roles?.proposers, 'roles.proposers'),
      voters: addressList(config.roles?.voters, 'roles.voters'),
    },
    logging: {
      level,
      file: config.logging?.file,
    },
  };
}
