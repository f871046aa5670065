/**
 * Chat completion client for an OpenAI-compatible endpoint (LiteLLM)
 */

import { z } from 'zod';
import { config } from '../../config/index.js';
import { ModelResponseError, ModelUnavailableError } from '../errors.js';
import type { CompletionRequest, TextCompletionModel } from '../../types/index.js';

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

export interface LLMServiceOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

const chatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      role: z.string().optional(),
      content: z.string().nullable().optional(),
    }),
    finish_reason: z.string().nullable().optional(),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
    total_tokens: z.number(),
  }).optional(),
  model: z.string().optional(),
});

/** Statuses worth another attempt later */
function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export class LLMService implements TextCompletionModel {
  private apiKey: string;
  private baseUrl: string;
  private model: string;
  private timeoutMs: number;

  constructor(options: Partial<LLMServiceOptions> = {}) {
    this.apiKey = options.apiKey ?? config.litellm.apiKey;
    this.baseUrl = options.baseUrl ?? config.litellm.baseUrl;
    this.model = options.model ?? config.llm.model;
    this.timeoutMs = options.timeoutMs ?? config.litellm.timeout;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.generate(request);
    return response.content;
  }

  /**
   * Generate a completion. The caller's signal and the client timeout both
   * abort the HTTP request.
   */
  async generate(request: CompletionRequest): Promise<LLMResponse> {
    const { prompt, systemPrompt, temperature, maxTokens, signal } = request;

    const messages: Array<{ role: string; content: string }> = [];
    if (systemPrompt) {
      messages.push({ role: 'system', content: systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          temperature,
          max_tokens: maxTokens,
        }),
        signal: controller.signal,
      });
    } catch (error) {
      if (timedOut) {
        throw new ModelUnavailableError(`LLM API timeout: Request exceeded ${this.timeoutMs}ms`, { timeoutMs: this.timeoutMs }, error);
      }
      if (controller.signal.aborted) {
        throw new ModelUnavailableError('LLM API request was aborted', {}, error);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ModelUnavailableError(`LLM API unreachable: ${message}`, {}, error);
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onCallerAbort);
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      // Full body stays server-side
      console.error(`[llm] API error ${response.status}:`, errorText);
      const message = `LLM API error (${response.status}): Request failed`;
      if (isTransientStatus(response.status)) {
        throw new ModelUnavailableError(message, { status: response.status });
      }
      throw new ModelResponseError(message, { status: response.status });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new ModelResponseError('LLM API returned a body that is not JSON');
    }

    const parsed = chatCompletionSchema.safeParse(body);
    if (!parsed.success) {
      throw new ModelResponseError('LLM API returned an unexpected response shape', {
        issues: parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
      });
    }

    const data = parsed.data;
    const content = data.choices[0]?.message.content ?? '';
    if (content.trim().length === 0) {
      throw new ModelResponseError('LLM API returned an empty completion', {
        finishReason: data.choices[0]?.finish_reason ?? null,
      });
    }

    return {
      content,
      model: data.model ?? this.model,
      usage: data.usage ? {
        promptTokens: data.usage.prompt_tokens,
        completionTokens: data.usage.completion_tokens,
        totalTokens: data.usage.total_tokens,
      } : undefined,
    };
  }
}

// Singleton instance
let llmService: LLMService | null = null;

export function getLLMService(): LLMService {
  if (!llmService) {
    llmService = new LLMService();
  }
  return llmService;
}
