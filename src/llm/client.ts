import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { LlmError, errorMessage } from '../shared/errors.js';
import type { Config } from '../shared/config.js';

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmResponse {
  content: string;
  model: string;
  token_count: number;
}

export interface ChatOptions {
  /** Ask the endpoint for a JSON object rather than free text. */
  json?: boolean;
}

const CompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }) }))
    .min(1),
  usage: z.object({ total_tokens: z.number().optional() }).optional(),
});

const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

export function completionsUrl(baseUrl: string): string {
  return `${(baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, '')}/chat/completions`;
}

/**
 * One request per call against an OpenAI-compatible chat completions
 * endpoint. Batching and concurrency belong to the enrichment processor.
 */
export class LlmClient {
  private readonly url: string;

  constructor(private readonly config: Config['llm']) {
    this.url = completionsUrl(config.base_url);
  }

  get modelName(): string {
    return this.config.model;
  }

  isConfigured(): boolean {
    return this.config.api_key.length > 0;
  }

  async chat(messages: LlmMessage[], options: ChatOptions = {}): Promise<LlmResponse> {
    const { model, max_tokens, temperature } = this.config;
    const response = await this.post({
      model,
      messages,
      max_tokens,
      temperature,
      ...(options.json ? { response_format: { type: 'json_object' } } : {}),
    });

    const envelope = CompletionSchema.safeParse(await this.readJson(response));
    if (!envelope.success) {
      throw new LlmError('LLM response is not a chat completion', {
        url: this.url,
        issues: envelope.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }

    const content = envelope.data.choices[0]?.message.content;
    if (!content) {
      throw new LlmError('LLM returned empty content', { url: this.url });
    }

    const result: LlmResponse = {
      content,
      model: envelope.data.model ?? model,
      token_count: envelope.data.usage?.total_tokens ?? 0,
    };
    logger.debug({ model: result.model, tokens: result.token_count }, 'LLM call completed');
    return result;
  }

  private async post(body: Record<string, unknown>): Promise<Response> {
    const { api_key, timeout_ms } = this.config;
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${api_key}`,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(timeout_ms),
      });
    } catch (err) {
      const timedOut = err instanceof Error && err.name === 'TimeoutError';
      throw new LlmError(
        timedOut ? `LLM request timed out after ${timeout_ms}ms` : `LLM request failed: ${errorMessage(err)}`,
        { url: this.url, model: this.config.model },
      );
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw new LlmError(`LLM API error: ${response.status} ${response.statusText}`, {
        url: this.url,
        status: response.status,
        body: detail.slice(0, 500),
      });
    }
    return response;
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      const data: unknown = await response.json();
      return data;
    } catch {
      throw new LlmError('LLM response is not valid JSON', { url: this.url });
    }
  }
}
