/**
 * Run orchestration: sources -> claims -> groups -> digest files
 *
 * One invoker is shared by every stage. A rate-limit exhaustion or fatal
 * failure in any stage before grouping completes halts the invoker and ends
 * the run without groups.
 */

import { pino } from 'pino';
import type { DigestSettings } from '@digest/config';
import type { Claim, ClaimGroup, SourceDocument } from '@digest/core';
import { validateClaims } from '@digest/grounding';
import { ClaimDeduplicator, EmbeddingSimilarityIndex } from '@digest/grouping';
import { SourceLoader, chunkText, cleanText, type ChunkOptions } from '@digest/ingestion';
import {
  BudgetAwareInvoker,
  InvocationError,
  createEmbeddingClient,
  createGenerationClient,
  type RateBudgetState,
} from '@digest/llm';
import {
  ClaimExtractor,
  DigestSynthesizer,
  Summarizer,
  buildSourcesReport,
  writeDigestOutputs,
  type WrittenOutputs,
} from '@digest/synthesis';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface PipelineInvoker {
  abort(reason: string): void;
  readonly sendCount: number;
  budgetState(): Readonly<RateBudgetState>;
}

export interface PipelineDependencies {
  loader: Pick<SourceLoader, 'loadAll'>;
  summarizer: Pick<Summarizer, 'summarizeChunks'>;
  extractor: Pick<ClaimExtractor, 'extractClaims'>;
  deduplicator: Pick<ClaimDeduplicator, 'deduplicateAndGroup'>;
  synthesizer: Pick<DigestSynthesizer, 'synthesize'>;
  invoker: PipelineInvoker;
  chunking: ChunkOptions;
  writeOutputs?: typeof writeDigestOutputs;
  now?: () => Date;
}

export interface RunInput {
  urls: readonly string[];
  paths: readonly string[];
  outputDir: string;
}

export type RunStatus = 'success' | 'aborted' | 'error';

export interface RunResult {
  status: RunStatus;
  sources: SourceDocument[];
  groups: ClaimGroup[];
  claimCount: number;
  rejectedCount: number;
  usedFallback: boolean;
  sendCount: number;
  outputs?: WrittenOutputs;
  error?: string;
}

export class DigestOrchestrator {
  private readonly writeOutputs: typeof writeDigestOutputs;
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineDependencies) {
    this.writeOutputs = deps.writeOutputs ?? writeDigestOutputs;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run the whole pipeline once
   *
   * @throws anything that is not an InvocationError (programming or I/O faults)
   */
  async run(input: RunInput): Promise<RunResult> {
    const startTime = Date.now();
    const result: RunResult = {
      status: 'error',
      sources: [],
      groups: [],
      claimCount: 0,
      rejectedCount: 0,
      usedFallback: false,
      sendCount: 0,
    };

    if (input.urls.length === 0 && input.paths.length === 0) {
      return this.fail(result, 'No sources provided.');
    }

    result.sources = await this.deps.loader.loadAll(input.urls, input.paths);
    const valid = this.cleanSources(result.sources);
    if (valid.length === 0) {
      return this.fail(result, 'No valid sources to process.');
    }

    try {
      for (const source of valid) {
        const chunks = chunkText(source.cleanedText, this.deps.chunking);
        source.summary = await this.deps.summarizer.summarizeChunks(chunks, source.sourceId);
      }

      const extracted: Claim[] = [];
      for (const source of valid) {
        extracted.push(
          ...(await this.deps.extractor.extractClaims({
            sourceId: source.sourceId,
            cleanedText: source.cleanedText,
            title: source.title,
          }))
        );
      }

      const { grounded, rejected } = validateClaims(
        extracted,
        new Map(valid.map((source) => [source.sourceId, source.cleanedText]))
      );
      result.rejectedCount = rejected.length;
      result.claimCount = grounded.length;
      for (const source of valid) {
        source.claims = grounded.filter((claim) => claim.sourceId === source.sourceId);
      }

      if (grounded.length === 0) {
        return this.fail(result, 'No grounded claims were extracted from the sources.');
      }

      result.groups = await this.deps.deduplicator.deduplicateAndGroup(grounded);
    } catch (error: unknown) {
      if (!(error instanceof InvocationError)) {
        throw error;
      }
      this.deps.invoker.abort(error.message);
      result.status = 'aborted';
      result.groups = [];
      result.error = error.message;
      result.sendCount = this.deps.invoker.sendCount;
      logger.error(
        { event: 'pipeline.run.abort', errorType: error.kind, error: error.message, sends: result.sendCount },
        'Run aborted before grouping completed'
      );
      return result;
    }

    const generatedAt = this.now();
    const digest = await this.deps.synthesizer.synthesize(result.groups, result.sources, generatedAt);
    result.usedFallback = digest.usedFallback;
    result.outputs = await this.writeOutputs(
      input.outputDir,
      digest.markdown,
      buildSourcesReport(result.sources, generatedAt)
    );

    result.status = 'success';
    result.sendCount = this.deps.invoker.sendCount;
    logger.info(
      {
        event: 'pipeline.run.success',
        sources: result.sources.length,
        claims: result.claimCount,
        rejected: result.rejectedCount,
        groups: result.groups.length,
        usedFallback: result.usedFallback,
        sends: result.sendCount,
        budget: this.deps.invoker.budgetState(),
        durationMs: Date.now() - startTime,
      },
      `Digest written with ${result.groups.length} groups`
    );
    return result;
  }

  /**
   * Clean every loaded source in place; returns the ones left with text
   */
  private cleanSources(sources: SourceDocument[]): SourceDocument[] {
    const valid: SourceDocument[] = [];
    for (const source of sources) {
      if (source.status !== 'success') continue;
      source.cleanedText = cleanText(source.rawText);
      if (source.cleanedText.length === 0) {
        source.status = 'empty';
        logger.warn({ event: 'pipeline.source.empty', sourceId: source.sourceId }, `No usable text in ${source.location}`);
        continue;
      }
      valid.push(source);
    }
    return valid;
  }

  private fail(result: RunResult, message: string): RunResult {
    result.status = 'error';
    result.error = message;
    result.sendCount = this.deps.invoker.sendCount;
    logger.error({ event: 'pipeline.run.fail', error: message }, message);
    return result;
  }
}

export interface OrchestratorOptions {
  /** Run-level cancellation, e.g. on SIGINT */
  signal?: AbortSignal;
}

/**
 * Wire the pipeline against the configured services
 *
 * @throws Error when an API key is missing
 */
export function createDigestOrchestrator(settings: DigestSettings, options: OrchestratorOptions = {}): DigestOrchestrator {
  const llmApiKey = settings.llm.apiKey;
  if (!llmApiKey) {
    throw new Error('LLM_API_KEY is required');
  }
  const embeddingApiKey = settings.embedding.apiKey;
  if (!embeddingApiKey) {
    throw new Error('EMBEDDING_API_KEY is required');
  }

  const invoker = new BudgetAwareInvoker({
    limits: settings.limits,
    ...settings.retry,
    signal: options.signal,
  });

  const generation = createGenerationClient({
    baseUrl: settings.llm.baseUrl,
    apiKey: llmApiKey,
    model: settings.llm.model,
    temperature: settings.llm.temperature,
    maxTokens: settings.llm.maxTokens,
  });

  const embeddings = createEmbeddingClient({
    baseUrl: settings.embedding.baseUrl,
    apiKey: embeddingApiKey,
    model: settings.embedding.model,
    batchSize: settings.embedding.batchSize,
  });

  const batching = { maxBatchChars: settings.maxBatchChars };

  return new DigestOrchestrator({
    loader: new SourceLoader({ timeoutMs: settings.fetchTimeoutMs }),
    summarizer: new Summarizer(generation, invoker, batching),
    extractor: new ClaimExtractor(generation, invoker, batching),
    deduplicator: new ClaimDeduplicator(
      new EmbeddingSimilarityIndex(embeddings, { invoker }),
      settings.similarityThreshold
    ),
    synthesizer: new DigestSynthesizer(generation, invoker),
    invoker,
    chunking: settings.chunking,
  });
}
