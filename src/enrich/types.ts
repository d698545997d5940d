export type EnrichmentPriority = 'critical' | 'high' | 'normal' | 'low';

export const PRIORITY_ORDER: readonly EnrichmentPriority[] = ['critical', 'high', 'normal', 'low'];

export interface EnrichmentEntity {
  text: string;
  type: string;
}

export type SentimentLabel = 'positive' | 'negative' | 'neutral';

export interface EnrichmentResult {
  entities: EnrichmentEntity[];
  sentiment: { score: number; label: SentimentLabel };
  slang: string[];
  summary: string;
  model: string;
}

/**
 * Text analysis backend. One call handles a whole batch and returns
 * results in input order.
 */
export interface EnrichmentModel {
  readonly name: string;
  enrich(texts: string[]): Promise<EnrichmentResult[]>;
}

export function sentimentLabel(score: number): SentimentLabel {
  if (score > 0.2) return 'positive';
  if (score < -0.2) return 'negative';
  return 'neutral';
}
