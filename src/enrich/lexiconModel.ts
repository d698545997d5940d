import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import { ConfigError } from '../shared/errors.js';
import { normalizeText } from '../shared/text.js';
import { getPackageRoot } from '../shared/utils.js';
import { sentimentLabel } from './types.js';
import type { EnrichmentEntity, EnrichmentModel, EnrichmentResult } from './types.js';

export const LexiconSchema = z.object({
  entities: z.record(z.array(z.string().min(1))),
  sentiment: z.object({
    positive: z.array(z.string().min(1)),
    negative: z.array(z.string().min(1)),
  }),
  slang: z.array(z.string().min(1)),
});

export type Lexicon = z.infer<typeof LexiconSchema>;

const SUMMARY_CHARS = 200;

export function getLexiconPath(): string {
  return path.join(getPackageRoot(), 'data', 'lexicon.json');
}

export function loadLexicon(filePath = getLexiconPath()): Lexicon {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Lexicon not found: ${filePath}`);
  }
  const parsed = LexiconSchema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
  if (!parsed.success) {
    throw new ConfigError('Invalid lexicon file', { errors: parsed.error.flatten().fieldErrors });
  }
  return parsed.data;
}

interface Term {
  text: string;
  pattern: RegExp;
}

function compileTerm(text: string): Term {
  const escaped = normalizeText(text).replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return { text, pattern: new RegExp(`(?<![\\p{L}\\p{N}])${escaped}(?![\\p{L}\\p{N}])`, 'u') };
}

/**
 * Word-list enrichment: entities, sentiment and slang by whole-phrase match
 * on accent-folded lowercase text.
 */
export class LexiconModel implements EnrichmentModel {
  readonly name = 'lexicon';
  private readonly entityTerms: Array<{ type: string; term: Term }>;
  private readonly positive: Term[];
  private readonly negative: Term[];
  private readonly slang: Term[];

  constructor(lexicon: Lexicon = loadLexicon()) {
    this.entityTerms = Object.entries(lexicon.entities).flatMap(([type, names]) =>
      names.map((name) => ({ type, term: compileTerm(name) })),
    );
    this.positive = lexicon.sentiment.positive.map(compileTerm);
    this.negative = lexicon.sentiment.negative.map(compileTerm);
    this.slang = lexicon.slang.map(compileTerm);
  }

  async enrich(texts: string[]): Promise<EnrichmentResult[]> {
    return texts.map((text) => this.analyze(text));
  }

  analyze(text: string): EnrichmentResult {
    const normalized = normalizeText(text);

    const entities: EnrichmentEntity[] = [];
    for (const { type, term } of this.entityTerms) {
      if (term.pattern.test(normalized)) entities.push({ text: term.text, type });
    }

    const pos = this.positive.filter((t) => t.pattern.test(normalized)).length;
    const neg = this.negative.filter((t) => t.pattern.test(normalized)).length;
    const score = pos + neg === 0 ? 0 : Math.round(((pos - neg) / (pos + neg)) * 1000) / 1000;

    const collapsed = text.replace(/\s+/g, ' ').trim();

    return {
      entities,
      sentiment: { score, label: sentimentLabel(score) },
      slang: this.slang.filter((t) => t.pattern.test(normalized)).map((t) => t.text),
      summary: collapsed.slice(0, SUMMARY_CHARS),
      model: this.name,
    };
  }
}
