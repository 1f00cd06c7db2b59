/**
 * Sector Ranker
 *
 * Aggregates sector-level sentiment, drops sectors with too little
 * evidence, ranks by confidence-weighted score and splits the result
 * into overweight / neutral / underweight tiers.
 *
 * Tiering (k = ⌈n/3⌉, at least 1):
 *   index < k      and score >  0.1 → overweight
 *   index ≥ n - k  and score < -0.1 → underweight
 *   otherwise                       → neutral
 * First match wins, so a sector is never in two tiers.
 */

import type { SectorTable } from '../reference/reference-loader';
import { aggregateCategory, type CategoryAggregatorOptions } from '../sentiment/category-aggregator';
import type { CategoryScore, WeightedItem } from '../sentiment/sentiment-types';
import { GENERAL_MARKET_SECTOR, type SectorClassification } from './sector-classifier';

// =============================================================================
// Types
// =============================================================================

export type RecommendationTier = 'overweight' | 'neutral' | 'underweight';

/** Minimum a caller needs to supply per sector */
export type SectorScoreInput = Pick<CategoryScore, 'score' | 'confidence' | 'itemCount'>;

export interface RankedSector {
    rank: number;
    sectorId: string;
    score: number;
    confidence: number;
    itemCount: number;
    etfTicker: string | null;
    recommendationTier: RecommendationTier;
    recommendation: string;
}

export interface SectorRanking {
    rankings: RankedSector[];
    tiers: Record<RecommendationTier, string[]>;
}

export interface SectorRankerOptions {
    minItemCount: number;
    tierThreshold: number;
    /** Used to attach ETF tickers */
    table?: SectorTable;
}

export interface ClassifiedItem extends WeightedItem {
    sector: SectorClassification;
}

const DEFAULT_OPTIONS: SectorRankerOptions = {
    minItemCount: 2,
    tierThreshold: 0.1,
};

// =============================================================================
// Aggregation
// =============================================================================

/**
 * Group classified items by assigned sector and aggregate each bucket.
 */
export function aggregateSectorSentiment(
    items: ClassifiedItem[],
    options: Partial<CategoryAggregatorOptions> = {},
): Record<string, CategoryScore> {
    const buckets = new Map<string, WeightedItem[]>();
    for (const item of items) {
        const bucket = buckets.get(item.sector.sectorId) ?? [];
        bucket.push(item);
        buckets.set(item.sector.sectorId, bucket);
    }

    const result: Record<string, CategoryScore> = {};
    for (const [sectorId, bucket] of buckets) {
        result[sectorId] = aggregateCategory('sector', bucket, options);
    }
    return result;
}

// =============================================================================
// Ranking
// =============================================================================

/**
 * Human-readable stance for one sector.
 */
export function sectorRecommendation(score: number, confidence: number): string {
    if (confidence < 0.3) return 'HOLD - Low Confidence';
    if (score > 0.2) return 'BUY - Positive Sentiment';
    if (score > 0.05) return 'MODERATE BUY';
    if (score < -0.2) return 'SELL - Negative Sentiment';
    if (score < -0.05) return 'MODERATE SELL';
    return 'HOLD - Neutral';
}

export function rankSectors(
    sectorScores: Record<string, SectorScoreInput>,
    options: Partial<SectorRankerOptions> = {},
): SectorRanking {
    const { minItemCount, tierThreshold, table } = { ...DEFAULT_OPTIONS, ...options };

    const eligible = Object.entries(sectorScores)
        .filter(([sectorId, s]) => sectorId !== GENERAL_MARKET_SECTOR && s.itemCount >= minItemCount)
        .sort(([, a], [, b]) => b.score * b.confidence - a.score * a.confidence);

    const n = eligible.length;
    const k = Math.max(1, Math.ceil(n / 3));

    const rankings: RankedSector[] = eligible.map(([sectorId, s], index) => {
        let tier: RecommendationTier = 'neutral';
        if (index < k && s.score > tierThreshold) {
            tier = 'overweight';
        } else if (index >= n - k && s.score < -tierThreshold) {
            tier = 'underweight';
        }

        return {
            rank: index + 1,
            sectorId,
            score: s.score,
            confidence: s.confidence,
            itemCount: s.itemCount,
            etfTicker: table?.profiles.get(sectorId)?.etfTicker ?? null,
            recommendationTier: tier,
            recommendation: sectorRecommendation(s.score, s.confidence),
        };
    });

    const tiers: Record<RecommendationTier, string[]> = { overweight: [], neutral: [], underweight: [] };
    for (const r of rankings) {
        tiers[r.recommendationTier].push(r.sectorId);
    }

    return { rankings, tiers };
}
