/**
 * Environment diagnostics script
 * 
 * Usage: npm run env:diag
 *
 * Prints environment loading diagnostics and the resolved settings without running a digest
 */

import { initEnv, getEnvDiagnostics, loadSettings } from '@digest/config';

// Initialize env first
const { repoRoot, envFilePath, envLocalFilePath, loaded, localLoaded, keysLoaded } = initEnv();

// Human-readable output
console.log('🔍 Environment Diagnostics');
console.log(`   Repo root: ${repoRoot}`);
console.log(`   .env file: ${envFilePath}`);
console.log(`   .env exists: ${loaded ? '✅' : '❌'}`);
console.log(`   .env.local file: ${envLocalFilePath}`);
console.log(`   .env.local exists: ${localLoaded ? '✅' : '❌'}`);
console.log(`   Keys loaded from .env: ${keysLoaded.length}`);

if (keysLoaded.length > 0) {
  console.log(`   Loaded keys: ${keysLoaded.slice(0, 20).join(', ')}${keysLoaded.length > 20 ? '...' : ''}`);
}

// Get detailed diagnostics
const diagnostics = getEnvDiagnostics([
  'LLM_API_KEY',
  'LLM_BASE_URL',
  'LLM_MODEL',
  'EMBEDDING_API_KEY',
  'EMBEDDING_BASE_URL',
  'EMBEDDING_MODEL',
  'SIMILARITY_THRESHOLD',
  'REQUESTS_PER_MINUTE',
  'TOKENS_PER_MINUTE',
  'REQUESTS_PER_DAY',
  'TOKENS_PER_DAY',
  'LOG_LEVEL',
]);

console.log('\n📋 Environment Variables Status:');
for (const key of diagnostics.requiredKeys) {
  const status = key.present ? '✅' : '❌';
  const length = key.length ? ` (length: ${key.length})` : '';
  const masked = key.maskedValue ? ` (${key.maskedValue})` : '';
  const source = key.source ? ` [from ${key.source}]` : '';
  console.log(`   ${status} ${key.key}${length}${masked}${source}`);
}

// Structured JSON output (for machine parsing)
const structuredOutput = {
  event: 'env.diagnostics',
  envFilePath,
  envFileExists: loaded,
  envLocalFilePath,
  envLocalFileExists: localLoaded,
  keysLoadedCount: keysLoaded.length,
  LLM_API_KEY_PRESENT: !!(process.env.LLM_API_KEY && process.env.LLM_API_KEY.trim().length > 0),
  EMBEDDING_API_KEY_PRESENT: !!(process.env.EMBEDDING_API_KEY && process.env.EMBEDDING_API_KEY.trim().length > 0),
  variables: diagnostics.requiredKeys.map(k => ({
    key: k.key,
    present: k.present,
    length: k.length,
    maskedValue: k.maskedValue,
    source: k.source,
  })),
  warnings: diagnostics.warnings,
};

console.log('\n📊 Structured Output (JSON):');
console.log(JSON.stringify(structuredOutput, null, 2));

if (diagnostics.warnings.length > 0) {
  console.log('\n⚠️  Warnings:');
  for (const warning of diagnostics.warnings) {
    console.log(`   - ${warning}`);
  }
}

// Resolved settings, secrets left out
try {
  const { llm, embedding, ...tunables } = loadSettings();
  console.log('\n⚙️  Resolved settings:');
  console.log(
    JSON.stringify(
      {
        llm: { baseUrl: llm.baseUrl, model: llm.model, temperature: llm.temperature, maxTokens: llm.maxTokens },
        embedding: { baseUrl: embedding.baseUrl, model: embedding.model, batchSize: embedding.batchSize },
        ...tunables,
      },
      null,
      2
    )
  );
} catch (error: unknown) {
  console.log(`\n❌ ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
}
