import type { LlmClient } from '../llm/client.js';
import { buildEnrichmentOutputSchema, parseWithRetry } from '../llm/parse.js';
import { buildEnrichmentMessages, PROMPT_VERSIONS } from '../llm/prompts.js';
import { LlmError } from '../shared/errors.js';
import { sentimentLabel } from './types.js';
import type { EnrichmentModel, EnrichmentResult } from './types.js';

/**
 * Enrichment through a chat-completions model: the whole batch goes out as
 * one prompt and comes back as one validated JSON document.
 */
export class LlmModel implements EnrichmentModel {
  readonly name: string;

  constructor(private readonly client: LlmClient) {
    this.name = `llm-${client.modelName}-${PROMPT_VERSIONS.enrich_batch}`;
  }

  async enrich(texts: string[]): Promise<EnrichmentResult[]> {
    if (!this.client.isConfigured()) {
      throw new LlmError('LLM enrichment selected but no api_key is configured');
    }
    if (texts.length === 0) return [];

    const messages = buildEnrichmentMessages(texts);
    const response = await this.client.chat(messages, { json: true });
    const parsed = await parseWithRetry(
      buildEnrichmentOutputSchema(texts.length),
      response.content,
      this.client,
      messages.find((m) => m.role === 'system')?.content ?? '',
    );

    return parsed.results.map((r) => ({
      entities: r.entities,
      sentiment: { score: r.sentiment, label: sentimentLabel(r.sentiment) },
      slang: r.slang,
      summary: r.summary.slice(0, 200),
      model: this.name,
    }));
  }
}
