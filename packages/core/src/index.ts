/**
 * Shared types and identifier utilities
 */

export * from './types.js';
export * from './ids.js';
