export * from './types.js';
export * from './errors.js';
export * from './guards.js';
export * from './environment.js';
export * from './events.js';
export * from './voting.js';
export * from './state.js';
export * from './stake-ledger.js';
export * from './delegation.js';
export * from './treasury.js';
export * from './access.js';
export * from './engine.js';
