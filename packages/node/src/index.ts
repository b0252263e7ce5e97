export * from './logger.js';
export * from './settings.js';
export * from './system.js';
export * from './seed.js';
export { devAccount, parseArgs, runDeployment, sampleSeedPlan } from './cli.js';
export type { CliArgs, DeploymentRun } from './cli.js';
