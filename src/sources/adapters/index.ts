import type { SourceDefinition } from '../registry.js';
import type { AdapterFactory, AdapterOptions, SourceAdapter } from '../types.js';
import { ConfigError } from '../../shared/errors.js';
import { JsonApiAdapter } from './jsonApi.js';
import { FeedAdapter } from './feed.js';

/**
 * Resolves the adapter for a source: a factory registered for its key wins,
 * then the generic adapter for its kind.
 */
export class AdapterRegistry {
  private readonly custom = new Map<string, AdapterFactory>();
  private readonly instances = new Map<string, SourceAdapter>();

  constructor(private readonly options: AdapterOptions) {}

  register(sourceKey: string, factory: AdapterFactory): void {
    this.custom.set(sourceKey, factory);
    this.instances.delete(sourceKey);
  }

  resolve(source: SourceDefinition): SourceAdapter {
    const existing = this.instances.get(source.key);
    if (existing) return existing;

    const options = { ...this.options, timeoutMs: source.timeout_ms ?? this.options.timeoutMs };
    const factory = this.custom.get(source.key);
    let adapter: SourceAdapter;
    if (factory) {
      adapter = factory(source, options);
    } else if (source.kind === 'api') {
      adapter = new JsonApiAdapter(source, options);
    } else {
      adapter = new FeedAdapter(source, options);
    }

    if (adapter.kind !== source.kind) {
      throw new ConfigError(`Adapter for ${source.key} produces ${adapter.kind} items, source is ${source.kind}`, {
        key: source.key,
      });
    }
    this.instances.set(source.key, adapter);
    return adapter;
  }
}

export { JsonApiAdapter, selectRows, parseRetryAfter } from './jsonApi.js';
export { FeedAdapter } from './feed.js';
