export type * from './ledger.js';
export type * from './results.js';
