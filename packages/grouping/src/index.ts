export * from './similarity.js';
export * from './union-find.js';
export * from './clusters.js';
export * from './conflicts.js';
export * from './embedding-index.js';
export * from './deduplicator.js';
