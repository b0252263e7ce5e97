import { mkdir } from 'node:fs/promises';
import { homedir } from 'node:os';
import { resolve } from 'node:path';

export interface StoragePaths {
  root: string;
  logs: string;
  configFile: string;
}

export function defaultStorageRoot(): string {
  return process.env.VAULTGOV_HOME ?? resolve(homedir(), '.vaultgov');
}

export function resolveStoragePaths(root: string = defaultStorageRoot()): StoragePaths {
  return {
    root,
    logs: resolve(root, 'logs'),
    configFile: resolve(root, 'config.yaml'),
  };
}

export async function ensureStorageDirs(paths: StoragePaths): Promise<void> {
  await mkdir(paths.root, { recursive: true });
  await mkdir(paths.logs, { recursive: true });
}
