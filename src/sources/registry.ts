import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import { parse as yamlParse } from 'yaml';
import type { Config } from '../shared/config.js';
import { ConfigError, SourceError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot, resolvePath } from '../shared/utils.js';

const SourceEntrySchema = z.object({
  key: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'lowercase letters, digits, _ and - only'),
  name: z.string().min(1),
  kind: z.enum(['api', 'scraper']),
  priority: z.enum(['high', 'medium', 'low']).default('medium'),
  /** Minutes between runs; defaults to the tier interval. */
  interval: z.number().positive().optional(),
  /** Requests per minute. */
  rate_limit: z.number().int().min(3).max(1000).default(60),
  max_retries: z.number().int().min(0).optional(),
  enabled: z.boolean().default(true),
  url: z.string().url(),
  /** Cache family for upstream responses; defaults from `kind`. */
  category: z.enum(['api:gov', 'api:news']).optional(),
  /** Dotted path to the record array in a JSON response. */
  records_path: z.string().optional(),
  timeout_ms: z.number().positive().optional(),
});

const SourcesFileSchema = z.object({
  sources: z.array(SourceEntrySchema),
});

export type SourceEntry = z.infer<typeof SourceEntrySchema>;

export type ResponseCategory = NonNullable<SourceEntry['category']>;

export interface SourceDefinition extends Omit<SourceEntry, 'interval' | 'max_retries' | 'category'> {
  readonly interval: number;
  readonly max_retries: number;
  readonly category: ResponseCategory;
}

/**
 * Immutable source table, loaded once at startup.
 */
export class SourceTable {
  private readonly byKey: ReadonlyMap<string, SourceDefinition>;

  constructor(definitions: readonly SourceDefinition[]) {
    const map = new Map<string, SourceDefinition>();
    for (const def of definitions) {
      if (map.has(def.key)) {
        throw new ConfigError(`Duplicate source key: ${def.key}`, { key: def.key });
      }
      map.set(def.key, Object.freeze({ ...def }));
    }
    this.byKey = map;
  }

  get(key: string): SourceDefinition | undefined {
    return this.byKey.get(key);
  }

  require(key: string): SourceDefinition {
    const def = this.byKey.get(key);
    if (!def) {
      throw new SourceError(`Unknown source: ${key}`, { key });
    }
    return def;
  }

  list(): SourceDefinition[] {
    return [...this.byKey.values()];
  }

  enabled(): SourceDefinition[] {
    return this.list().filter((s) => s.enabled);
  }

  get size(): number {
    return this.byKey.size;
  }
}

/** Fill tier defaults into validated entries. */
export function resolveSources(entries: SourceEntry[], tiers: Config['scheduler']['tiers']): SourceDefinition[] {
  return entries.map((entry) => {
    const tier = tiers[entry.priority];
    return {
      ...entry,
      interval: entry.interval ?? tier.interval_minutes,
      max_retries: entry.max_retries ?? tier.max_retries,
      category: entry.category ?? (entry.kind === 'api' ? 'api:gov' : 'api:news'),
    };
  });
}

export function parseSources(raw: unknown, tiers: Config['scheduler']['tiers']): SourceTable {
  const parsed = SourcesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid sources file', {
      errors: parsed.error.flatten().fieldErrors,
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return new SourceTable(resolveSources(parsed.data.sources, tiers));
}

export function getBundledSourcesPath(): string {
  return path.join(getPackageRoot(), 'config', 'sources.yaml');
}

/**
 * Load the source table from `sources_file`, falling back to the bundled list.
 */
export function loadSources(config: Config): SourceTable {
  let filePath = resolvePath(config.sources_file);
  if (!fs.existsSync(filePath)) {
    logger.debug({ path: filePath }, 'Sources file not found, using bundled list');
    filePath = getBundledSourcesPath();
  }
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Sources file not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = yamlParse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Sources file is not valid YAML: ${filePath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const table = parseSources(raw, config.scheduler.tiers);
  logger.info({ path: filePath, sources: table.size }, 'Sources loaded');
  return table;
}
