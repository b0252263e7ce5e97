import { readFile, writeFile } from 'node:fs/promises';
import { parse, stringify } from 'yaml';
import { ensureStorageDirs, StoragePaths } from './paths.js';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * On-disk deployment configuration. Values stay in their file form
 * (ether amounts as decimal strings, raw address strings); the node
 * package turns them into typed settings.
 */
export interface DeploymentConfig {
  v: 1;
  governance?: {
    votingDelay?: number;
    votingPeriod?: number;
    proposalThreshold?: string;
    quorumPercentage?: Record<string, number>;
    timelockDelay?: Record<string, number>;
  };
  treasury?: {
    limits?: Record<string, string>;
  };
  roles?: {
    guardians?: string[];
    timelockAdmins?: string[];
    proposers?: string[];
    voters?: string[];
  };
  logging?: {
    level?: LogLevelName;
    file?: string;
  };
}

export const DEFAULT_CONFIG: DeploymentConfig = {
  v: 1,
  governance: {
    votingDelay: 1,
    votingPeriod: 50_400,
    proposalThreshold: '1',
    quorumPercentage: {
      high_conviction: 20,
      experimental_bet: 15,
      operational_expense: 10,
    },
    timelockDelay: {
      high_conviction: 3 * 24 * 60 * 60,
      experimental_bet: 24 * 60 * 60,
      operational_expense: 6 * 60 * 60,
    },
  },
  treasury: {
    limits: {
      high_conviction: '100',
      experimental_bet: '50',
      operational_expense: '10',
    },
  },
  roles: {
    guardians: [],
    timelockAdmins: [],
    proposers: [],
    voters: [],
  },
  logging: {
    level: 'info',
  },
};

function mergeConfig(base: DeploymentConfig, overrides: Partial<DeploymentConfig>): DeploymentConfig {
  return {
    ...base,
    ...overrides,
    governance: {
      ...base.governance,
      ...overrides.governance,
      quorumPercentage: {
        ...base.governance?.quorumPercentage,
        ...overrides.governance?.quorumPercentage,
      },
      timelockDelay: {
        ...base.governance?.timelockDelay,
        ...overrides.governance?.timelockDelay,
      },
    },
    treasury: {
      ...base.treasury,
      ...overrides.treasury,
      limits: {
        ...base.treasury?.limits,
        ...overrides.treasury?.limits,
      },
    },
    roles: {
      ...base.roles,
      ...overrides.roles,
    },
    logging: {
      ...base.logging,
      ...overrides.logging,
    },
  };
}

export async function loadConfig(
  paths: StoragePaths,
  defaults: DeploymentConfig = DEFAULT_CONFIG,
): Promise<DeploymentConfig> {
  await ensureStorageDirs(paths);
  try {
    const raw = await readFile(paths.configFile, 'utf8');
    const parsed = (parse(raw) ?? {}) as Partial<DeploymentConfig>;
    return mergeConfig(defaults, parsed);
  } catch (error) {
    if ((error as { code?: string }).code === 'ENOENT') {
      return defaults;
    }
    throw error;
  }
}

export async function saveConfig(paths: StoragePaths, config: DeploymentConfig): Promise<void> {
  await ensureStorageDirs(paths);
  await writeFile(paths.configFile, stringify(config), 'utf8');
}

export async function ensureConfig(
  paths: StoragePaths,
  defaults: DeploymentConfig = DEFAULT_CONFIG,
): Promise<DeploymentConfig> {
  const config = await loadConfig(paths, defaults);
  await saveConfig(paths, config);
  return config;
}
