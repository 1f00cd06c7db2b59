/**
 * Sentiment Types
 *
 * Value objects for one analysis run. Nothing here is persisted.
 */

// =============================================================================
// Labels
// =============================================================================

export type SentimentLabel = 'positive' | 'negative' | 'neutral';

/** Five-tier scale used only by the multi-channel fuser */
export type ChannelLabel =
    | 'strong_positive'
    | 'weak_positive'
    | 'neutral'
    | 'weak_negative'
    | 'strong_negative';

export type CategoryName = 'general_market' | 'stock_specific' | 'sector';

export type Channel = 'news' | 'social_forum' | 'microblog';

export const CHANNELS: readonly Channel[] = ['news', 'social_forum', 'microblog'];

// =============================================================================
// Items
// =============================================================================

/** What a fetcher hands over */
export interface RawItem {
    text: string;
    source: string;
    publishedAt: string | number | null;
    headline?: string;
    summary?: string;
    url?: string;
    /** Ticker the provider tagged the item with, if any */
    ticker?: string;
}

export interface Item {
    text: string;
    source: string;
    publishedAt: string | number | null;
    headline?: string;
    summary?: string;
    ticker?: string;

    /** Finance-specialized model reading; null when inference failed */
    externalLabel: string | null;
    externalScore: number | null;

    /** General-purpose model reading; null when inference failed */
    generalLabel: string | null;
    generalScore: number | null;

    isFinancial: boolean;
    classificationConfidence: number;
}

export interface WeightedItem extends Item {
    timeWeight: number;     // [minWeight, 1]
    blendedScore: number;   // [-1, 1]
    contribution: number;   // blendedScore * classificationConfidence
    inferenceFailed: boolean;
}

// =============================================================================
// Aggregates
// =============================================================================

export interface CategoryScore {
    category: CategoryName;
    score: number;           // [-1, 1]
    label: SentimentLabel;
    confidence: number;      // [0, 1]
    itemCount: number;
    financialItemCount: number;
    financialRatio: number;
    avgTimeWeight: number;
    avgClassificationConfidence: number;
    failedItemCount: number;
}

export interface ChannelResult {
    channel: Channel;
    score: number;
    confidence: number;
    itemCount: number;
}

/** One input's share of a fused result, kept for auditability */
export interface FusionComponent {
    source: string;
    score: number;
    confidence: number;
    itemCount: number;
    baseWeight: number;
    weight: number;
}

export interface CombinedSentiment<L extends string = SentimentLabel> {
    analysisId: string;
    tickerOrSector: string;
    score: number;
    label: L;
    confidence: number;
    /** source → weight; sums to 1 */
    weightsUsed: Record<string, number>;
    components: FusionComponent[];
    analyzedAt: string;
}
