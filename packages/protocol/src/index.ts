export * from './governance/index.js';
