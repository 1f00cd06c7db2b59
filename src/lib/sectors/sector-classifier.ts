/**
 * Sector Classifier
 *
 * Assigns a news item to a market sector, in order of precedence:
 * 1. Ticker membership: exact match wins outright (confidence 1.0)
 * 2. Keyword density: min(1, matches / keywordCount * 10), kept above 0.1
 * 3. Regex boosts for sectors that declare a pattern: min(1, hits * 0.3);
 *    seeds a new match or adds half of the boost to an existing one
 * 4. Highest confidence wins; nothing matched → general_market at 0.5
 *
 * Ties resolve to the earlier sector in table order.
 */

import type { SectorTable } from '../reference/reference-loader';

export const GENERAL_MARKET_SECTOR = 'general_market';

export type ClassificationMethod = 'ticker' | 'keyword' | 'pattern' | 'fallback';

export interface SectorClassification {
    sectorId: string;
    confidence: number;
    allMatches: Record<string, number>;
    method: ClassificationMethod;
}

const KEYWORD_SCALE = 10;
const KEYWORD_MIN_CONFIDENCE = 0.1;
const PATTERN_HIT_WEIGHT = 0.3;
const PATTERN_SEED_MIN = 0.2;
const PATTERN_BOOST_SHARE = 0.5;
const FALLBACK_CONFIDENCE = 0.5;

const TICKER_TOKEN_RE = /\b[A-Z]{2,5}\b/g;

export function classifySector(
    headline: string,
    summary: string,
    ticker: string | null | undefined,
    table: SectorTable,
): SectorClassification {
    // ── 1. Ticker membership ────────────────────────────────────────────
    if (ticker) {
        const upper = ticker.trim().toUpperCase();
        for (const profile of table.profiles.values()) {
            if (profile.tickers.has(upper)) {
                return {
                    sectorId: profile.sectorId,
                    confidence: 1.0,
                    allMatches: { [profile.sectorId]: 1.0 },
                    method: 'ticker',
                };
            }
        }
    }

    const content = `${headline} ${summary}`.toLowerCase();
    const scores = new Map<string, number>();
    const origin = new Map<string, 'keyword' | 'pattern'>();

    // ── 2. Keyword density ──────────────────────────────────────────────
    for (const profile of table.profiles.values()) {
        let matches = 0;
        for (const keyword of profile.keywords) {
            if (content.includes(keyword)) matches++;
        }
        if (matches === 0) continue;

        const confidence = Math.min(1.0, (matches / profile.keywords.size) * KEYWORD_SCALE);
        if (confidence > KEYWORD_MIN_CONFIDENCE) {
            scores.set(profile.sectorId, confidence);
            origin.set(profile.sectorId, 'keyword');
        }
    }

    // ── 3. Pattern boosts ───────────────────────────────────────────────
    for (const profile of table.profiles.values()) {
        if (!profile.pattern) continue;

        const hits = content.match(profile.pattern)?.length ?? 0;
        if (hits === 0) continue;

        const boost = Math.min(1.0, hits * PATTERN_HIT_WEIGHT);
        const existing = scores.get(profile.sectorId);
        if (existing === undefined) {
            if (boost > PATTERN_SEED_MIN) {
                scores.set(profile.sectorId, boost);
                origin.set(profile.sectorId, 'pattern');
            }
        } else {
            scores.set(profile.sectorId, Math.min(1.0, existing + boost * PATTERN_BOOST_SHARE));
        }
    }

    // ── 4. Best match ───────────────────────────────────────────────────
    let best: string | null = null;
    let bestConfidence = -1;
    for (const [sectorId, confidence] of scores) {
        if (confidence > bestConfidence) {
            best = sectorId;
            bestConfidence = confidence;
        }
    }

    if (best === null) {
        return {
            sectorId: GENERAL_MARKET_SECTOR,
            confidence: FALLBACK_CONFIDENCE,
            allMatches: {},
            method: 'fallback',
        };
    }

    return {
        sectorId: best,
        confidence: bestConfidence,
        allMatches: Object.fromEntries(scores),
        method: origin.get(best) ?? 'keyword',
    };
}

/**
 * First upper-case 2–5 letter token in the text that is a known ticker.
 */
export function extractKnownTicker(text: string, table: SectorTable): string | null {
    const tokens = text.match(TICKER_TOKEN_RE) ?? [];
    for (const token of tokens) {
        for (const profile of table.profiles.values()) {
            if (profile.tickers.has(token)) return token;
        }
    }
    return null;
}
