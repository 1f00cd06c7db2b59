/**
 * Injected Capabilities
 *
 * The fusion pipeline never talks to a model or a news API directly.
 * Callers hand in implementations of these two contracts; tests hand in stubs.
 */

import type { RawItem } from './sentiment-types';

export type ModelKind = 'finance' | 'general';

export interface ModelReading {
    /** e.g. "positive" / "NEGATIVE" / "neutral", matched case-insensitively */
    label: string;
    /** Probability of the label, 0-1 */
    score: number;
}

/**
 * Text → sentiment label + probability.
 * Expected to be side-effect free. May resolve synchronously.
 */
export interface SentimentCapability {
    classify(text: string, kind: ModelKind): ModelReading | Promise<ModelReading>;
}

export type FetchQuery =
    | { kind: 'market' }
    | { kind: 'ticker'; ticker: string };

/**
 * Source of raw items (news API, forum scraper, ...).
 * Timeouts and connectivity are the implementation's concern; a failure
 * here is surfaced to the pipeline as "no data", never as a zero score.
 */
export interface ItemFetcher {
    fetchItems(query: FetchQuery): Promise<RawItem[]>;
}

export function describeQuery(query: FetchQuery): string {
    return query.kind === 'market' ? 'general market' : query.ticker;
}
