import { describe, it, expect } from 'vitest';
import { loadSettings } from '@digest/config';
import { cleanText, extractHtml } from '@digest/ingestion';
import {
  BudgetAwareInvoker,
  MalformedResponseError,
  type ChatPrompt,
  type Clock,
  type GenerationClient,
} from '@digest/llm';
import { ClaimExtractor, buildExtractionBatches, parseClaimsResponse } from './extractor.js';

function fakeClient(
  respond: (prompt: ChatPrompt, call: number) => string,
  maxTokens = 100
): GenerationClient & { calls: number } {
  let calls = 0;
  return {
    model: 'test-model',
    maxTokens,
    get calls() {
      return calls;
    },
    async generate(prompt) {
      calls += 1;
      return { value: respond(prompt, calls) };
    },
  };
}

function createInvoker(): BudgetAwareInvoker {
  return new BudgetAwareInvoker({
    limits: { requestsPerMinute: 100, tokensPerMinute: 100000, requestsPerDay: 1000, tokensPerDay: 1000000 },
    callDelayMs: 0,
    transientMaxAttempts: 2,
    clock: { now: () => 0, sleep: async () => undefined },
  });
}

const VALID_ANSWER = JSON.stringify([
  { claim: 'Rates rose by half a point', supporting_quote: 'raised rates by half a point' },
  { claim: 'Markets fell', supporting_quote: 'Markets fell sharply' },
]);

describe('parseClaimsResponse', () => {
  it('reads a bare JSON array', () => {
    expect(parseClaimsResponse(VALID_ANSWER)).toEqual([
      { text: 'Rates rose by half a point', supportingQuote: 'raised rates by half a point' },
      { text: 'Markets fell', supportingQuote: 'Markets fell sharply' },
    ]);
  });

  it('reads an array inside a code fence', () => {
    const fenced = '```json\n[{"claim": "A", "supporting_quote": "a"}]\n```';
    expect(parseClaimsResponse(fenced)).toEqual([{ text: 'A', supportingQuote: 'a' }]);
  });

  it('reads an array embedded in prose', () => {
    const prose = 'Here are the claims:\n[{"claim": " B ", "supporting_quote": " b "}]\nHope this helps.';
    expect(parseClaimsResponse(prose)).toEqual([{ text: 'B', supportingQuote: 'b' }]);
  });

  it('drops items without claim text or quote', () => {
    const answer = '[{"claim": "", "supporting_quote": "q"}, {"claim": "C"}, {"claim": "D", "supporting_quote": "d"}]';
    expect(parseClaimsResponse(answer)).toEqual([{ text: 'D', supportingQuote: 'd' }]);
  });

  it('rejects answers that are not a claim array', () => {
    expect(() => parseClaimsResponse('I could not find claims.')).toThrow(MalformedResponseError);
    expect(() => parseClaimsResponse('{"claim": "x"}')).toThrow(MalformedResponseError);
    expect(() => parseClaimsResponse('[1, 2]')).toThrow(MalformedResponseError);
  });
});

describe('ClaimExtractor', () => {
  const source = {
    sourceId: 'src1',
    title: 'Rate report',
    cleanedText: 'The bank raised rates by half a point.\n\nMarkets fell sharply after the news.',
  };

  it('builds claims with run-unique ids and the source title', async () => {
    const extractor = new ClaimExtractor(fakeClient(() => VALID_ANSWER), createInvoker(), { maxBatchChars: 10000 });

    const claims = await extractor.extractClaims(source);

    expect(claims).toEqual([
      {
        id: 'src1__c0',
        text: 'Rates rose by half a point',
        supportingQuote: 'raised rates by half a point',
        sourceId: 'src1',
        sourceTitle: 'Rate report',
      },
      {
        id: 'src1__c1',
        text: 'Markets fell',
        supportingQuote: 'Markets fell sharply',
        sourceId: 'src1',
        sourceTitle: 'Rate report',
      },
    ]);
  });

  it('re-prompts after a malformed answer', async () => {
    const client = fakeClient((_, call) => (call === 1 ? 'not json at all' : VALID_ANSWER));
    const extractor = new ClaimExtractor(client, createInvoker(), { maxBatchChars: 10000 });

    const claims = await extractor.extractClaims(source);

    expect(claims).toHaveLength(2);
    expect(client.calls).toBe(2);
  });

  it('skips a batch that stays malformed and keeps the others', async () => {
    const client = fakeClient((prompt) =>
      prompt.user.includes('raised rates') ? 'still not json' : '[{"claim": "Markets fell", "supporting_quote": "Markets fell sharply"}]'
    );
    const extractor = new ClaimExtractor(client, createInvoker(), { maxBatchChars: 40 });

    const claims = await extractor.extractClaims(source);

    expect(claims.map((claim) => [claim.id, claim.text])).toEqual([['src1__c0', 'Markets fell']]);
    expect(client.calls).toBe(3);
  });

  it('makes no calls for empty text', async () => {
    const client = fakeClient(() => VALID_ANSWER);
    const extractor = new ClaimExtractor(client, createInvoker(), { maxBatchChars: 10000 });

    expect(await extractor.extractClaims({ sourceId: 'src2', cleanedText: '' })).toEqual([]);
    expect(client.calls).toBe(0);
  });
});

describe('extraction from long single-paragraph pages', () => {
  const html = Array.from(
    { length: 800 },
    (_, i) => `<p>Station ${i} reported that the measured river level stayed within the seasonal range.</p>`
  ).join('');
  const cleanedText = cleanText(extractHtml(html).text);

  it('starts from text with no paragraph breaks', () => {
    expect(cleanedText.length).toBeGreaterThan(60000);
    expect(cleanedText.includes('\n\n')).toBe(false);
  });

  it('splits the text into batches within the character cap', () => {
    const batches = buildExtractionBatches(cleanedText, 30000);

    expect(batches.length).toBeGreaterThanOrEqual(3);
    expect(batches.every((batch) => batch.length <= 30000)).toBe(true);
    expect(batches[0]?.startsWith('Station 0 reported')).toBe(true);
  });

  it('extracts under the default budget without a fatal failure', async () => {
    const settings = loadSettings({});
    let now = 0;
    const clock: Clock = {
      now: () => now,
      sleep: async (ms) => {
        now += ms;
      },
    };
    const invoker = new BudgetAwareInvoker({ limits: settings.limits, ...settings.retry, clock });
    const client = fakeClient(
      () => '[{"claim": "Station 0 level was normal", "supporting_quote": "Station 0 reported"}]',
      settings.llm.maxTokens
    );
    const extractor = new ClaimExtractor(client, invoker, { maxBatchChars: settings.maxBatchChars });

    const claims = await extractor.extractClaims({ sourceId: 'river', cleanedText });

    const batchCount = buildExtractionBatches(cleanedText, settings.maxBatchChars).length;
    expect(client.calls).toBe(batchCount);
    expect(claims).toHaveLength(batchCount);
    expect(invoker.halted).toBe(false);
  });
});
