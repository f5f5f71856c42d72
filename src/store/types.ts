export * from './contracts/common.js';
export * from './contracts/players.js';
export * from './contracts/matches.js';
export * from './contracts/records.js';
export * from './contracts/store.js';
export * from './errors.js';
