/**
 * Generation client for OpenAI-compatible chat completion APIs
 */

import { z } from 'zod';
import { estimateTokens } from './batching.js';
import { MalformedResponseError } from './errors.js';
import { createFetch, postJson, type HttpClientConfig } from './http.js';
import type { BudgetAwareInvoker, InvocationOutcome, Metered } from './invoker.js';

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      total_tokens: z.number().optional(),
    })
    .optional(),
});

export interface ChatPrompt {
  system?: string;
  user: string;
}

export interface GenerateOptions {
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface GenerationClientConfig extends HttpClientConfig {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface GenerationClient {
  readonly model: string;
  readonly maxTokens: number;
  generate(prompt: ChatPrompt, options?: GenerateOptions): Promise<Metered<string>>;
}

/**
 * Create generation client
 */
export function createGenerationClient(config: GenerationClientConfig): GenerationClient {
  const {
    model = 'llama-3.3-70b-versatile',
    temperature = 0.1,
    maxTokens = 1024,
  } = config;

  if (!config.apiKey || config.apiKey.trim().length === 0) {
    throw new Error('Generation client requires an API key (LLM_API_KEY)');
  }

  const fetchFn = config.fetch ?? createFetch();

  return {
    model,
    maxTokens,
    async generate(prompt: ChatPrompt, options: GenerateOptions = {}): Promise<Metered<string>> {
      const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
      if (prompt.system) {
        messages.push({ role: 'system', content: prompt.system });
      }
      messages.push({ role: 'user', content: prompt.user });

      const response = await postJson(
        config,
        fetchFn,
        '/chat/completions',
        {
          model,
          messages,
          temperature: options.temperature ?? temperature,
          max_tokens: options.maxTokens ?? maxTokens,
        },
        ChatCompletionSchema,
        options.signal
      );

      const content = response.choices[0]?.message.content?.trim();
      if (!content) {
        throw new MalformedResponseError('Empty completion from model');
      }

      return {
        value: content,
        tokens: response.usage?.total_tokens,
      };
    },
  };
}

/**
 * Worst-case token cost of a completion: the prompt plus the full output allowance
 */
export function estimateGenerationTokens(prompt: ChatPrompt, maxTokens: number): number {
  return estimateTokens(`${prompt.system ?? ''}${prompt.user}`) + maxTokens;
}

export interface GenerationRequest<T> {
  label: string;
  prompt: ChatPrompt;
  maxTokens?: number;
  /** Turn the completion into a value; throw MalformedResponseError to re-prompt */
  parse: (text: string) => T;
}

/**
 * Run one completion under the invoker's budget and retry policy
 */
export function attemptGeneration<T>(
  invoker: BudgetAwareInvoker,
  client: GenerationClient,
  request: GenerationRequest<T>
): Promise<InvocationOutcome<T>> {
  const maxTokens = request.maxTokens ?? client.maxTokens;

  return invoker.attempt(
    {
      label: request.label,
      estimatedTokens: estimateGenerationTokens(request.prompt, maxTokens),
    },
    async (signal) => {
      const completion = await client.generate(request.prompt, { maxTokens, signal });
      return {
        value: request.parse(completion.value),
        tokens: completion.tokens,
      };
    }
  );
}
