import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { buildEnrichmentOutputSchema, parseWithRetry, stripCodeFences } from '../parse.js';
import { LlmClient, completionsUrl } from '../client.js';
import { LlmModel } from '../../enrich/llmModel.js';
import { generateDefaultConfig } from '../../shared/config.js';
import { LlmError } from '../../shared/errors.js';

const llmConfig = {
  ...generateDefaultConfig().llm,
  base_url: 'https://llm.example.test/v1',
  api_key: 'test-secret',
  model: 'test-model',
};

const VALID_OUTPUT = JSON.stringify({
  results: [
    {
      entities: [{ text: 'DANE', type: 'institution' }],
      sentiment: 0.6,
      slang: [],
      summary: 'El DANE publicó el IPC.',
    },
    { sentiment: -0.1, summary: 'Sin novedades en Bogotá.' },
  ],
});

function chatResponse(content: string): Response {
  return new Response(
    JSON.stringify({ choices: [{ message: { content } }], usage: { total_tokens: 42 }, model: 'test-model' }),
    { status: 200, headers: { 'Content-Type': 'application/json' } },
  );
}

describe('buildEnrichmentOutputSchema', () => {
  it('accepts exactly one result per text and fills defaults', () => {
    const result = buildEnrichmentOutputSchema(2).safeParse(JSON.parse(VALID_OUTPUT));
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.results[1]).toEqual({
        entities: [],
        sentiment: -0.1,
        slang: [],
        summary: 'Sin novedades en Bogotá.',
      });
    }
  });

  it('rejects a result count mismatch', () => {
    expect(buildEnrichmentOutputSchema(3).safeParse(JSON.parse(VALID_OUTPUT)).success).toBe(false);
  });

  it('rejects sentiment outside [-1, 1]', () => {
    const invalid = { results: [{ sentiment: 1.5, summary: 'x' }] };
    expect(buildEnrichmentOutputSchema(1).safeParse(invalid).success).toBe(false);
  });
});

describe('stripCodeFences', () => {
  it('removes a json fence', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });
});

describe('LLM calls', () => {
  const originalFetch = globalThis.fetch;
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    globalThis.fetch = fetchMock;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  describe('parseWithRetry', () => {
    const client = new LlmClient(llmConfig);
    const schema = buildEnrichmentOutputSchema(2);

    it('parses valid JSON on first attempt', async () => {
      const result = await parseWithRetry(schema, VALID_OUTPUT, client, 'system');
      expect(result.results[0]?.summary).toBe('El DANE publicó el IPC.');
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('repairs invalid output with one more call', async () => {
      fetchMock.mockResolvedValueOnce(chatResponse(VALID_OUTPUT));
      const result = await parseWithRetry(schema, '{ "results": [ invalid }', client, 'system');
      expect(result.results).toHaveLength(2);
      expect(fetchMock).toHaveBeenCalledOnce();
    });

    it('throws LlmError after a failed repair', async () => {
      fetchMock.mockResolvedValueOnce(chatResponse('still invalid }{'));
      await expect(parseWithRetry(schema, 'bad json {', client, 'system')).rejects.toThrow(
        'LLM output invalid after repair attempt',
      );
    });
  });

  describe('LlmClient', () => {
    it('reports model and token usage from the completion', async () => {
      fetchMock.mockResolvedValueOnce(chatResponse('hola'));
      const response = await new LlmClient(llmConfig).chat([{ role: 'user', content: 'hola' }]);
      expect(response).toEqual({ content: 'hola', model: 'test-model', token_count: 42 });
      const body: unknown = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
      expect(body).not.toHaveProperty('response_format');
    });

    it('rejects a body that is not a chat completion', async () => {
      fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ choices: [] }), { status: 200 }));
      await expect(new LlmClient(llmConfig).chat([{ role: 'user', content: 'x' }])).rejects.toThrow(
        'LLM response is not a chat completion',
      );
    });

    it('rejects empty content', async () => {
      fetchMock.mockResolvedValueOnce(chatResponse(''));
      await expect(new LlmClient(llmConfig).chat([{ role: 'user', content: 'x' }])).rejects.toThrow(
        'LLM returned empty content',
      );
    });

    it('builds the completions url with a default base', () => {
      expect(completionsUrl('https://llm.example.test/v1/')).toBe('https://llm.example.test/v1/chat/completions');
      expect(completionsUrl('')).toBe('https://api.openai.com/v1/chat/completions');
    });
  });

  describe('LlmModel', () => {
    it('maps one batched response onto enrichment results', async () => {
      fetchMock.mockResolvedValueOnce(chatResponse(`\`\`\`json\n${VALID_OUTPUT}\n\`\`\``));
      const model = new LlmModel(new LlmClient(llmConfig));

      const results = await model.enrich(['texto uno', 'texto dos']);

      expect(model.name).toBe('llm-test-model-enrich_batch_v1');
      expect(results.map((r) => [r.sentiment.label, r.summary])).toEqual([
        ['positive', 'El DANE publicó el IPC.'],
        ['neutral', 'Sin novedades en Bogotá.'],
      ]);
      expect(results[0]?.entities).toEqual([{ text: 'DANE', type: 'institution' }]);
      expect(fetchMock).toHaveBeenCalledOnce();
      expect(fetchMock.mock.calls[0]?.[0]).toBe('https://llm.example.test/v1/chat/completions');
      const body: unknown = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
      expect(body).toMatchObject({ model: 'test-model', response_format: { type: 'json_object' } });
    });

    it('surfaces HTTP failures as LlmError', async () => {
      fetchMock.mockResolvedValueOnce(new Response('overloaded', { status: 503, statusText: 'Service Unavailable' }));
      const model = new LlmModel(new LlmClient(llmConfig));
      await expect(model.enrich(['texto'])).rejects.toThrow(LlmError);
    });

    it('refuses to run without an api key', async () => {
      const model = new LlmModel(new LlmClient({ ...llmConfig, api_key: '' }));
      await expect(model.enrich(['texto'])).rejects.toThrow('LLM enrichment selected but no api_key is configured');
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});
