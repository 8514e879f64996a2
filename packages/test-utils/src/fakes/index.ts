export * from './secretVault.js';
export * from './postgres.js';
export * from './instanceDirectory.js';
