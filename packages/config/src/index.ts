/**
 * Environment loading and typed settings
 */

export * from './env.js';
export * from './settings.js';
