/**
 * @weighbill/shared
 * Shared types, schemas, and constants
 */

// Schemas (Zod)
export * from './schemas/index.js';

// Types
export type * from './types/index.js';

// Constants
export * from './constants/index.js';

// Utils
export * from './utils/index.js';
