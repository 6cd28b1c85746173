export * from './normalize.js';
export * from './validator.js';
