import { describe, it, expect } from 'vitest';
import {
  ConfigSchema,
  applyEnvOverrides,
  generateDefaultConfig,
  generateDefaultConfigYaml,
  parseConfig,
} from '../config.js';
import { ConfigError } from '../errors.js';
import { isRecord } from '../utils.js';

describe('ConfigSchema', () => {
  it('produces valid defaults from empty object', () => {
    const result = ConfigSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.server.port).toBe(3892);
      expect(result.data.db.path).toBe('~/.tidewatch/tidewatch.db');
      expect(result.data.enrichment.model).toBe('lexicon');
      expect(result.data.cache.backend).toBe('sqlite');
    }
  });

  it('applies tier defaults', () => {
    const config = generateDefaultConfig();
    expect(config.scheduler.tiers.high).toEqual({ interval_minutes: 15, max_retries: 5, concurrency: 4 });
    expect(config.scheduler.tiers.medium.max_retries).toBe(3);
    expect(config.scheduler.tiers.low.interval_minutes).toBe(60);
  });

  it('keeps defaults beside partial overrides', () => {
    const result = ConfigSchema.safeParse({
      server: { port: 8080 },
      scheduler: { retry: { base_delay_ms: 5000 } },
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.server.port).toBe(8080);
      expect(result.data.server.host).toBe('127.0.0.1');
      expect(result.data.scheduler.retry).toEqual({ base_delay_ms: 5000, max_delay_ms: 3600000, jitter_ratio: 0.1 });
    }
  });

  it('ships the three default alert rules', () => {
    const kinds = generateDefaultConfig().alerts.rules.map((r) => [r.kind, r.field, r.comparator, r.threshold]);
    expect(kinds).toEqual([
      ['inflation', 'variacion_mensual', 'gt', 1.0],
      ['unemployment', 'tasa_desempleo', 'gt', 15.0],
      ['gdp_contraction', 'variacion_pib_trimestral', 'lt', -2.0],
    ]);
  });

  it('rejects invalid types', () => {
    expect(ConfigSchema.safeParse({ server: { port: 'not-a-number' } }).success).toBe(false);
    expect(ConfigSchema.safeParse({ scheduler: { retry: { jitter_ratio: 2 } } }).success).toBe(false);
  });
});

describe('parseConfig', () => {
  it('throws ConfigError with field errors', () => {
    try {
      parseConfig({ enrichment: { model: 'gpt' } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.code).toBe('CONFIG_ERROR');
        const errors = err.details?.['errors'];
        expect(isRecord(errors) ? Object.keys(errors) : []).toEqual(['enrichment']);
      }
    }
  });
});

describe('applyEnvOverrides', () => {
  it('layers env values over the file config', () => {
    const merged = applyEnvOverrides(
      { llm: { model: 'from-file', temperature: 0.5 } },
      { TIDEWATCH_LLM_API_KEY: 'test-secret', TIDEWATCH_DB_PATH: '/tmp/tw.db' },
    );
    expect(merged).toEqual({
      llm: { model: 'from-file', temperature: 0.5, api_key: 'test-secret' },
      db: { path: '/tmp/tw.db' },
    });
  });

  it('leaves the config untouched without env values', () => {
    expect(applyEnvOverrides({ server: { port: 1 } }, {})).toEqual({ server: { port: 1 } });
  });
});

describe('generateDefaultConfigYaml', () => {
  it('returns a YAML string', () => {
    const yaml = generateDefaultConfigYaml();
    expect(yaml).toContain('scheduler:');
    expect(yaml).toContain('port: 3892');
  });
});
