/**
 * Research digest CLI
 *
 * Usage: npm run digest -- --folder ./docs --urls https://example.com/a --output ./output
 */

import { resolve } from 'path';
import { pino } from 'pino';
import { initEnv, loadSettings } from '@digest/config';
import { collectSourceFiles } from '@digest/ingestion';
import { USAGE, parseArgs, type CliArgs } from './args.js';
import { createDigestOrchestrator } from './orchestrator.js';

// Load env (centralized)
initEnv();

const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss Z',
      ignore: 'pid,hostname',
    },
  },
});

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error: unknown) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    console.error(USAGE);
    process.exit(1);
  }

  const outputDir = resolve(args.output);
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn({ event: 'cli.interrupt' }, 'Interrupted; stopping after the current call');
    controller.abort();
  });

  try {
    const settings = loadSettings();
    const paths = args.folder ? await collectSourceFiles(resolve(args.folder)) : [];

    if (paths.length === 0 && args.urls.length === 0) {
      console.error('❌ No sources found. Pass --folder with .txt, .md or .html files, or --urls.');
      console.error(USAGE);
      process.exit(1);
    }

    console.log(`🌱 Building digest from ${paths.length} files and ${args.urls.length} URLs`);
    console.log(`   Output: ${outputDir}`);

    const startTime = Date.now();
    const orchestrator = createDigestOrchestrator(settings, { signal: controller.signal });
    const result = await orchestrator.run({ urls: args.urls, paths, outputDir });
    const duration = Date.now() - startTime;

    const successful = result.sources.filter((source) => source.status === 'success').length;
    const conflicting = result.groups.filter((group) => group.conflicting).length;

    if (result.status !== 'success') {
      console.error(`\n❌ Digest ${result.status === 'aborted' ? 'aborted' : 'failed'}: ${result.error ?? 'unknown error'}`);
      console.log(JSON.stringify({
        event: 'cli.digest.fail',
        status: result.status,
        sources: result.sources.length,
        successfulSources: successful,
        sends: result.sendCount,
        error: result.error,
        durationMs: duration,
      }));
      process.exit(1);
    }

    console.log(`\n✅ Digest complete!`);
    console.log(`   Sources processed: ${successful} of ${result.sources.length}`);
    console.log(`   Grounded claims: ${result.claimCount} (${result.rejectedCount} dropped)`);
    console.log(`   Claim groups: ${result.groups.length} (${conflicting} with several sources)`);
    console.log(`   Digest: ${result.usedFallback ? 'template fallback' : 'model narrative'}`);
    console.log(`   Model calls: ${result.sendCount}`);
    console.log(`   Duration: ${duration}ms`);
    if (result.outputs) {
      console.log(`\n   ${result.outputs.digestPath}`);
      console.log(`   ${result.outputs.sourcesPath}`);
    }

    const failed = result.sources.filter((source) => source.status === 'error');
    for (const source of failed.slice(0, 10)) {
      console.log(`   ⚠️  ${source.location}: ${source.errorMessage ?? 'failed'}`);
    }
    if (failed.length > 10) {
      console.log(`     ... and ${failed.length - 10} more`);
    }

    console.log(JSON.stringify({
      event: 'cli.digest.success',
      sources: result.sources.length,
      successfulSources: successful,
      claims: result.claimCount,
      rejectedClaims: result.rejectedCount,
      groups: result.groups.length,
      conflictingGroups: conflicting,
      usedFallback: result.usedFallback,
      sends: result.sendCount,
      outputDir,
      durationMs: duration,
    }));
  } catch (error: unknown) {
    const err = error instanceof Error ? error : new Error(String(error));
    console.error(`\n❌ Digest failed: ${err.message}`);
    console.error(err.stack);

    console.log(JSON.stringify({
      event: 'cli.digest.fail',
      outputDir,
      error: err.message,
    }));

    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.fatal({ event: 'cli.crash', error: error instanceof Error ? error.message : String(error) }, 'Unhandled failure');
  process.exit(1);
});
