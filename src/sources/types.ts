import type { SourceDefinition } from './registry.js';

export type SourceKind = 'api' | 'scraper';
export type SourcePriority = 'high' | 'medium' | 'low';

/**
 * One unit of fetched content before validation and dedup.
 * API payloads carry `source`/`data`; document payloads carry `title`/`content`.
 */
export interface RawItem {
  source_key: string;
  fetched_at: string;
  payload: Record<string, unknown>;
  /** Set by adapters that know a stable identity for the item. */
  content_hash?: string;
}

/**
 * Source adapter interface. Implement per source kind, or per source key
 * for sources that need their own mapping.
 */
export interface SourceAdapter {
  readonly kind: SourceKind;
  fetch(signal?: AbortSignal): Promise<RawItem[]>;
  testConnection(): Promise<boolean>;
}

export interface AdapterOptions {
  userAgent: string;
  timeoutMs: number;
}

export type AdapterFactory = (source: SourceDefinition, options: AdapterOptions) => SourceAdapter;
