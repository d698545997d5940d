import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { LlmError } from '../shared/errors.js';
import type { LlmClient } from './client.js';
import { buildRepairPrompt } from './prompts.js';

export const EnrichmentOutputItemSchema = z.object({
  entities: z.array(z.object({ text: z.string().min(1), type: z.string().min(1) })).default([]),
  sentiment: z.number().min(-1).max(1),
  slang: z.array(z.string()).default([]),
  summary: z.string(),
});

export type EnrichmentOutputItem = z.infer<typeof EnrichmentOutputItemSchema>;

export function buildEnrichmentOutputSchema(count: number) {
  return z.object({
    results: z.array(EnrichmentOutputItemSchema).length(count),
  });
}

/**
 * Strip markdown code fences from LLM output.
 */
export function stripCodeFences(raw: string): string {
  return raw
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```\s*$/, '')
    .trim();
}

/**
 * Parse and validate JSON from LLM output.
 * Returns the parsed data, or a string error message if it fails.
 */
function tryParse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string): T | string {
  try {
    const json = JSON.parse(raw) as unknown;
    const result = schema.safeParse(json);
    if (result.success) return result.data;
    return result.error.message;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

/**
 * Parse LLM JSON output with one repair-retry on parse or validation failure.
 */
export async function parseWithRetry<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  rawOutput: string,
  client: LlmClient,
  systemMessage: string,
): Promise<T> {
  const cleaned = stripCodeFences(rawOutput);

  const firstResult = tryParse(schema, cleaned);
  if (typeof firstResult !== 'string') return firstResult;

  logger.warn({ error: firstResult, raw: cleaned.slice(0, 200) }, 'LLM output invalid, attempting repair');

  const repairPrompt = buildRepairPrompt(firstResult, cleaned);
  let repairResponse;
  try {
    repairResponse = await client.chat([
      { role: 'system', content: systemMessage },
      { role: 'user', content: repairPrompt },
    ]);
  } catch (err) {
    throw new LlmError(`LLM repair call failed: ${err instanceof Error ? err.message : String(err)}`);
  }

  const repairedCleaned = stripCodeFences(repairResponse.content);
  const repairedResult = tryParse(schema, repairedCleaned);
  if (typeof repairedResult !== 'string') return repairedResult;

  throw new LlmError('LLM output invalid after repair attempt', {
    original_error: firstResult,
    repair_error: repairedResult,
    raw: repairedCleaned.slice(0, 500),
  });
}
