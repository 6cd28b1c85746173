export * from './errors.js';
export * from './budget.js';
export * from './batching.js';
export * from './http.js';
export * from './invoker.js';
export * from './client.js';
export * from './embeddings.js';
