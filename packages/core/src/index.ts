export * from './utils/bytes.js';
export * from './crypto/hash.js';
export * from './crypto/jcs.js';
export * from './events/envelope.js';
export * from './events/log.js';
export * from './storage/paths.js';
export * from './storage/config.js';
