/**
 * Embedding client for an OpenAI-compatible /embeddings endpoint (LiteLLM)
 */

import { z } from 'zod';
import { config } from '../../config/index.js';
import { withRetry } from '../../utils/retry.js';
import type { EmbeddingResponse } from '../../types/index.js';

const BATCH_SIZE = 32;

const embeddingResponseSchema = z.object({
  data: z.array(z.object({
    embedding: z.array(z.number()),
    index: z.number().int(),
  })),
  model: z.string().optional(),
  usage: z.object({
    prompt_tokens: z.number(),
    total_tokens: z.number(),
  }).optional(),
});

export class EmbeddingService {
  private apiKey: string;
  private baseUrl: string;
  private model: string;
  private timeout: number;

  constructor() {
    this.apiKey = config.litellm.apiKey;
    this.baseUrl = config.litellm.baseUrl;
    this.model = config.litellm.embeddingModel;
    this.timeout = config.litellm.timeout;
  }

  /**
   * Embed texts, in batches of 32, preserving input order
   */
  async embed(texts: string[], signal?: AbortSignal): Promise<EmbeddingResponse> {
    if (texts.length === 0) {
      return {
        embeddings: [],
        model: this.model,
        usage: { promptTokens: 0, totalTokens: 0 },
      };
    }

    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      batches.push(texts.slice(i, i + BATCH_SIZE));
    }

    const results = await Promise.all(batches.map(batch => this.embedBatch(batch, signal)));

    return {
      embeddings: results.flatMap(r => r.embeddings),
      model: results[0]?.model ?? this.model,
      usage: results.reduce(
        (acc, r) => ({
          promptTokens: acc.promptTokens + r.usage.promptTokens,
          totalTokens: acc.totalTokens + r.usage.totalTokens,
        }),
        { promptTokens: 0, totalTokens: 0 }
      ),
    };
  }

  async embedSingle(text: string, signal?: AbortSignal): Promise<number[]> {
    const response = await this.embed([text], signal);
    const [embedding] = response.embeddings;
    if (!embedding) {
      throw new Error('Embedding API returned empty embeddings array');
    }
    return embedding;
  }

  private async embedBatch(texts: string[], signal?: AbortSignal): Promise<EmbeddingResponse> {
    return withRetry(
      async () => {
        if (signal?.aborted) {
          throw new Error('Embedding request was aborted');
        }

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeout);
        const onAbort = () => controller.abort();
        signal?.addEventListener('abort', onAbort, { once: true });

        try {
          const response = await fetch(`${this.baseUrl}/embeddings`, {
            method: 'POST',
            headers: {
              'Content-Type': 'application/json',
              'Authorization': `Bearer ${this.apiKey}`,
            },
            body: JSON.stringify({
              model: this.model,
              input: texts,
              encoding_format: 'float',
            }),
            signal: controller.signal,
          });

          if (!response.ok) {
            const errorText = await response.text().catch(() => '');
            console.error(`[embedding] API error ${response.status}:`, errorText);
            throw new Error(`Embedding API error (${response.status})`);
          }

          const parsed = embeddingResponseSchema.safeParse(await response.json());
          if (!parsed.success) {
            throw new Error('Embedding API returned an unexpected response shape');
          }
          const data = parsed.data;
          if (data.data.length !== texts.length) {
            throw new Error(`Embedding API returned ${data.data.length} embeddings for ${texts.length} inputs`);
          }

          const embeddings = [...data.data]
            .sort((a, b) => a.index - b.index)
            .map(item => item.embedding);

          return {
            embeddings,
            model: data.model ?? this.model,
            usage: {
              promptTokens: data.usage?.prompt_tokens ?? 0,
              totalTokens: data.usage?.total_tokens ?? 0,
            },
          };
        } finally {
          clearTimeout(timeoutId);
          signal?.removeEventListener('abort', onAbort);
        }
      },
      {
        maxRetries: 3,
        initialDelayMs: 1000,
        maxDelayMs: 10000,
        onRetry: (attempt, error, delayMs) => {
          console.warn(`[embedding] retry ${attempt}/3 after ${delayMs}ms: ${error.message}`);
        },
      }
    );
  }
}

// Singleton instance
let embeddingService: EmbeddingService | null = null;

export function getEmbeddingService(): EmbeddingService {
  if (!embeddingService) {
    embeddingService = new EmbeddingService();
  }
  return embeddingService;
}
