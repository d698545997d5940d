import Parser from 'rss-parser';
import type { SourceDefinition } from '../registry.js';
import type { AdapterOptions, RawItem, SourceAdapter } from '../types.js';
import { CapacityError, TransientError, ValidationError } from '../../shared/errors.js';
import { logger } from '../../shared/logger.js';
import { stripHtml } from '../../shared/text.js';
import { nowISO } from '../../shared/utils.js';
import { parseRetryAfter } from './jsonApi.js';

interface FeedItemExtras {
  contentEncoded?: string;
}

const parser: Parser<Record<string, unknown>, FeedItemExtras> = new Parser({
  customFields: {
    item: [['content:encoded', 'contentEncoded']],
  },
});

/**
 * RSS/Atom reader. Each entry becomes a document payload
 * `{ title, content, url, published_at, guid }`.
 */
export class FeedAdapter implements SourceAdapter {
  readonly kind = 'scraper' as const;

  constructor(
    private readonly source: SourceDefinition,
    private readonly options: AdapterOptions,
  ) {}

  private async download(signal?: AbortSignal): Promise<string> {
    const { url } = this.source;
    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
        },
        signal,
        redirect: 'follow',
      });
    } catch (err) {
      throw new TransientError(`Feed fetch failed: ${err instanceof Error ? err.message : String(err)}`, { url });
    }

    if (response.status === 429) {
      throw new CapacityError(
        `${this.source.key} is rate limiting requests`,
        { url, status: 429 },
        parseRetryAfter(response.headers.get('retry-after')),
      );
    }
    if (response.status >= 500) {
      throw new TransientError(`Feed fetch failed: ${response.status} from ${url}`, { url, status: response.status });
    }
    if (!response.ok) {
      throw new ValidationError(`Feed fetch failed: ${response.status} from ${url}`, { url, status: response.status });
    }
    return response.text();
  }

  async fetch(signal?: AbortSignal): Promise<RawItem[]> {
    const xml = await this.download(signal);

    let feed: Awaited<ReturnType<typeof parser.parseString>>;
    try {
      feed = await parser.parseString(xml);
    } catch (err) {
      throw new ValidationError(`Feed is not valid RSS/Atom: ${err instanceof Error ? err.message : String(err)}`, {
        url: this.source.url,
      });
    }

    const fetchedAt = nowISO();
    const items: RawItem[] = [];
    for (const entry of feed.items) {
      const html = entry.contentEncoded ?? entry.content ?? entry.contentSnippet ?? entry.summary ?? '';
      items.push({
        source_key: this.source.key,
        fetched_at: fetchedAt,
        payload: {
          title: entry.title?.trim() ?? '',
          content: stripHtml(html),
          url: entry.link?.trim() ?? null,
          published_at: entry.isoDate ?? entry.pubDate ?? null,
          guid: entry.guid ?? null,
        },
      });
    }

    logger.debug({ source: this.source.key, count: items.length }, 'Feed fetched');
    return items;
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.download(AbortSignal.timeout(this.options.timeoutMs));
      return true;
    } catch (err) {
      logger.debug({ source: this.source.key, error: err instanceof Error ? err.message : String(err) }, 'Connection test failed');
      return false;
    }
  }
}
