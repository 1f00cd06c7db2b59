/**
 * Headline Deduplicator
 *
 * The same story arrives from several providers. Drop repeats before
 * scoring so one event is not counted twice:
 *   - same URL
 *   - same normalized headline (md5 prefix of lower-cased, trimmed text)
 * Headlines of 10 characters or fewer carry no signal and are dropped.
 */

import * as crypto from 'crypto';
import type { RawItem } from './sentiment-types';

const MIN_HEADLINE_LENGTH = 10;

export function headlineKey(headline: string): string {
    const normalized = headline.toLowerCase().trim();
    return crypto.createHash('md5').update(normalized, 'utf8').digest('hex').slice(0, 10);
}

export function dedupeItems(items: RawItem[]): RawItem[] {
    const seenUrls = new Set<string>();
    const seenHeadlines = new Set<string>();
    const unique: RawItem[] = [];

    for (const item of items) {
        if (item.url) {
            if (seenUrls.has(item.url)) continue;
            seenUrls.add(item.url);
        }

        const headline = (item.headline ?? item.text).trim();
        if (headline.length <= MIN_HEADLINE_LENGTH) continue;

        const key = headlineKey(headline);
        if (seenHeadlines.has(key)) continue;
        seenHeadlines.add(key);

        unique.push(item);
    }

    return unique;
}
