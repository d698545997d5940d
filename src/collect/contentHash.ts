import { normalizeText } from '../shared/text.js';
import { sha256, stableStringify } from '../shared/utils.js';
import type { ValidatedItem } from './validate.js';

/**
 * Identity of an item within its source. Documents hash their normalized
 * title and body, so re-fetched copies with different markup or spacing
 * collide; API items hash their canonical JSON.
 */
export function contentHash(item: ValidatedItem): string {
  if (item.raw.content_hash) return item.raw.content_hash;
  if (item.kind === 'scraper') {
    return sha256(`${normalizeText(item.title ?? '')}\n${normalizeText(item.content)}`);
  }
  return sha256(stableStringify(item.raw.payload));
}
