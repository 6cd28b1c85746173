export * from './prompts.js';
export * from './outcome.js';
export * from './summarizer.js';
export * from './extractor.js';
export * from './fallback.js';
export * from './digest.js';
export * from './writer.js';
