import type { RawItem, SourceKind } from '../sources/types.js';
import { ValidationError } from '../shared/errors.js';

export interface ValidatedItem {
  kind: SourceKind;
  raw: RawItem;
  title: string | null;
  url: string | null;
  /** Document body; empty for API items. */
  content: string;
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

/**
 * API items need a `source` or `data` field; documents need a non-empty
 * `title` and `content`. Throws ValidationError otherwise.
 */
export function validateItem(item: RawItem, kind: SourceKind): ValidatedItem {
  const { payload } = item;

  if (kind === 'api') {
    const hasSource = payload['source'] !== undefined && payload['source'] !== null;
    const hasData = payload['data'] !== undefined && payload['data'] !== null;
    if (!hasSource && !hasData) {
      throw new ValidationError('API item has neither source nor data', { source_key: item.source_key });
    }
    return {
      kind,
      raw: item,
      title: optionalString(payload['title']),
      url: optionalString(payload['url']),
      content: '',
    };
  }

  const title = optionalString(payload['title']);
  const content = optionalString(payload['content']);
  if (!title || !content) {
    throw new ValidationError(`Document is missing ${title ? 'content' : 'title'}`, { source_key: item.source_key });
  }
  return { kind, raw: item, title, url: optionalString(payload['url']), content };
}
