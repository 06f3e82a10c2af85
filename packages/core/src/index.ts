export * from './account-id.js';
export * from './amounts.js';
export * from './errors/ledger-errors.js';
export * from './schemas/token-config.js';
export * from './utils/result-utils.js';
