export * from './ledger.schemas.js';
