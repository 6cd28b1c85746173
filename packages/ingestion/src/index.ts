export * from './cleaner.js';
export * from './chunker.js';
export * from './html.js';
export * from './loader.js';
