import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getTidewatchDir, isRecord } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

const TierSchema = z.object({
  interval_minutes: z.number().positive(),
  max_retries: z.number().int().min(0),
  concurrency: z.number().int().positive(),
});

export type TierConfig = z.infer<typeof TierSchema>;

export const AlertRuleSchema = z.object({
  kind: z.string().min(1),
  field: z.string().min(1),
  comparator: z.enum(['gt', 'gte', 'lt', 'lte']),
  threshold: z.number(),
  severity: z.enum(['low', 'medium', 'high']).default('high'),
  sources: z.array(z.string()).optional(),
});

export type AlertRule = z.infer<typeof AlertRuleSchema>;

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().default(3892),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.tidewatch/tidewatch.db'),
    })
    .default({}),

  sources_file: z.string().default('~/.tidewatch/sources.yaml'),

  fetch: z
    .object({
      timeout_ms: z.number().positive().default(20000),
      user_agent: z.string().default('Tidewatch/0.1'),
      /** Reuse of a fetched upstream response; 0 disables. Keep below the shortest interval. */
      response_cache_seconds: z.number().min(0).default(300),
    })
    .default({}),

  rate_limit: z
    .object({
      window_ms: z.number().positive().default(60000),
      max_wait_ms: z.number().min(0).default(60000),
    })
    .default({}),

  scheduler: z
    .object({
      tiers: z
        .object({
          high: TierSchema.default({ interval_minutes: 15, max_retries: 5, concurrency: 4 }),
          medium: TierSchema.default({ interval_minutes: 30, max_retries: 3, concurrency: 3 }),
          low: TierSchema.default({ interval_minutes: 60, max_retries: 2, concurrency: 2 }),
        })
        .default({}),
      retry: z
        .object({
          base_delay_ms: z.number().positive().default(60000),
          max_delay_ms: z.number().positive().default(3600000),
          jitter_ratio: z.number().min(0).max(1).default(0.1),
        })
        .default({}),
      capacity_delay_ms: z.number().positive().default(30000),
      heartbeat_interval_ms: z.number().positive().default(15000),
      heartbeat_timeout_ms: z.number().positive().default(120000),
      initial_jitter_ms: z.number().min(0).default(60000),
      fatal_recheck_interval_ms: z.number().positive().default(10000),
      maintenance_cron: z.string().default('*/5 * * * *'),
      job_retention_days: z.number().positive().default(30),
    })
    .default({}),

  enrichment: z
    .object({
      model: z.enum(['lexicon', 'llm']).default('lexicon'),
      batch_size: z.number().int().positive().default(32),
      batch_timeout_ms: z.number().min(0).default(2000),
      max_concurrent_batches: z.number().int().positive().default(2),
      cache_ttl_seconds: z.number().positive().default(604800),
    })
    .default({}),

  llm: z
    .object({
      base_url: z.string().default(''),
      api_key: z.string().default(''),
      model: z.string().default('gpt-4.1-mini'),
      max_tokens: z.number().default(2000),
      temperature: z.number().default(0),
      timeout_ms: z.number().default(30000),
    })
    .default({}),

  cache: z
    .object({
      backend: z.enum(['sqlite', 'memory']).default('sqlite'),
      version: z.string().default('v1'),
      purge_cron: z.string().default('*/15 * * * *'),
    })
    .default({}),

  alerts: z
    .object({
      rules: z.array(AlertRuleSchema).default([
        { kind: 'inflation', field: 'variacion_mensual', comparator: 'gt', threshold: 1.0, severity: 'high' },
        { kind: 'unemployment', field: 'tasa_desempleo', comparator: 'gt', threshold: 15.0, severity: 'high' },
        { kind: 'gdp_contraction', field: 'variacion_pib_trimestral', comparator: 'lt', threshold: -2.0, severity: 'high' },
      ]),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? { ...value } : {};
}

/**
 * Load, merge env overrides and validate the config.
 * Called once at startup; the result is passed explicitly to every component.
 */
export async function loadConfig(): Promise<Config> {
  const explorer = cosmiconfig('tidewatch', {
    searchPlaces: [
      'tidewatch.config.yaml',
      'tidewatch.config.yml',
      '.tidewatchrc.yaml',
      '.tidewatchrc.yml',
    ],
  });

  const envConfigPath = process.env['TIDEWATCH_CONFIG'];
  const defaultConfigPath = path.join(getTidewatchDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asRecord(result?.config);
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    rawConfig = asRecord(result?.config);
  } else {
    logger.debug('No config file found, using defaults');
  }

  return parseConfig(applyEnvOverrides(rawConfig, process.env));
}

export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const merged = { ...rawConfig };

  const envApiKey = env['TIDEWATCH_LLM_API_KEY'];
  const envBaseUrl = env['TIDEWATCH_LLM_BASE_URL'];
  const envModel = env['TIDEWATCH_LLM_MODEL'];
  if (envApiKey || envBaseUrl || envModel) {
    const llm = asRecord(merged['llm']);
    if (envApiKey) llm['api_key'] = envApiKey;
    if (envBaseUrl) llm['base_url'] = envBaseUrl;
    if (envModel) llm['model'] = envModel;
    merged['llm'] = llm;
  }

  const envDbPath = env['TIDEWATCH_DB_PATH'];
  if (envDbPath) {
    const db = asRecord(merged['db']);
    db['path'] = envDbPath;
    merged['db'] = db;
  }

  return merged;
}

export function parseConfig(raw: unknown): Config {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}
