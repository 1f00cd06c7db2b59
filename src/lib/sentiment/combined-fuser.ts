/**
 * Combined Sentiment Fuser
 *
 * Merges category scores (general market + stock specific, or any set of
 * categories) into one sentiment using dynamic weights:
 *
 * 1. Drop categories with no items (no data ≠ zero score)
 * 2. weight_i = base_i * (1 + (avgClassificationConfidence_i - 0.5) * 0.2)
 * 3. weight_i *= 1.1 when financialRatio_i > 0.7
 * 4. Renormalize to sum 1
 * 5. score = Σ w_i * score_i, confidence = Σ w_i * confidence_i
 * 6. Label at ±0.12, tighter than the per-category threshold
 */

import { v4 as uuidv4 } from 'uuid';
import { assertNormalized, normalizeWeights } from '../core/math';
import { unavailable, withReasons, type SignalResult } from '../core/result';
import { labelFromScore } from './category-aggregator';
import type { CategoryScore, CombinedSentiment, FusionComponent } from './sentiment-types';

export interface CategoryInput {
    source: string;
    category: CategoryScore;
    baseWeight: number;
}

export interface CombinedFuserOptions {
    confidenceFactor: number;
    financialRatioBoostAbove: number;
    financialBoost: number;
    labelThreshold: number;
}

export const DEFAULT_COMBINED_OPTIONS: CombinedFuserOptions = {
    confidenceFactor: 0.2,
    financialRatioBoostAbove: 0.7,
    financialBoost: 1.1,
    labelThreshold: 0.12,
};

/**
 * Build a CombinedSentiment, enforcing the weights-sum-to-one invariant.
 */
export function createCombinedSentiment<L extends string>(params: {
    tickerOrSector: string;
    score: number;
    label: L;
    confidence: number;
    components: FusionComponent[];
}): CombinedSentiment<L> {
    const weightsUsed: Record<string, number> = {};
    for (const c of params.components) {
        weightsUsed[c.source] = c.weight;
    }
    assertNormalized(weightsUsed, 'CombinedSentiment');

    return {
        analysisId: uuidv4(),
        tickerOrSector: params.tickerOrSector,
        score: params.score,
        label: params.label,
        confidence: params.confidence,
        weightsUsed,
        components: params.components,
        analyzedAt: new Date().toISOString(),
    };
}

/**
 * Adjusted (pre-normalization) weight for one category.
 */
export function adjustCategoryWeight(
    baseWeight: number,
    category: CategoryScore,
    options: CombinedFuserOptions = DEFAULT_COMBINED_OPTIONS,
): number {
    let weight = baseWeight * (1 + (category.avgClassificationConfidence - 0.5) * options.confidenceFactor);
    if (category.financialRatio > options.financialRatioBoostAbove) {
        weight *= options.financialBoost;
    }
    return weight;
}

export function fuseCategoryScores(
    tickerOrSector: string,
    inputs: CategoryInput[],
    options: Partial<CombinedFuserOptions> = {},
): SignalResult<CombinedSentiment> {
    const opts = { ...DEFAULT_COMBINED_OPTIONS, ...options };
    const reasons: string[] = [];
    const seen = new Set<string>();

    const active = inputs.filter(input => {
        if (seen.has(input.source)) {
            reasons.push(`${input.source}: duplicate input ignored`);
            return false;
        }
        seen.add(input.source);

        if (input.category.itemCount === 0) {
            reasons.push(`${input.source}: no items`);
            return false;
        }
        if (input.category.failedItemCount > 0) {
            reasons.push(`${input.source}: ${input.category.failedItemCount} item(s) failed inference`);
        }
        return true;
    });

    if (active.length === 0) {
        return unavailable(reasons.length > 0 ? reasons : ['no categories supplied']);
    }

    const adjusted: Record<string, number> = {};
    for (const input of active) {
        adjusted[input.source] = adjustCategoryWeight(input.baseWeight, input.category, opts);
    }
    const weights = normalizeWeights(adjusted);

    const components: FusionComponent[] = active.map(input => ({
        source: input.source,
        score: input.category.score,
        confidence: input.category.confidence,
        itemCount: input.category.itemCount,
        baseWeight: input.baseWeight,
        weight: weights[input.source],
    }));

    const score = components.reduce((acc, c) => acc + c.weight * c.score, 0);
    const confidence = components.reduce((acc, c) => acc + c.weight * c.confidence, 0);

    return withReasons(
        createCombinedSentiment({
            tickerOrSector,
            score,
            label: labelFromScore(score, opts.labelThreshold),
            confidence,
            components,
        }),
        reasons,
    );
}

/**
 * The usual two-category case: general market news + ticker news.
 */
export function fuseGeneralAndSpecific(
    ticker: string,
    general: CategoryScore,
    specific: CategoryScore,
    options: Partial<CombinedFuserOptions> & { generalWeight?: number; specificWeight?: number } = {},
): SignalResult<CombinedSentiment> {
    const { generalWeight = 0.4, specificWeight = 0.6, ...fuserOptions } = options;

    return fuseCategoryScores(
        ticker,
        [
            { source: 'general_market', category: general, baseWeight: generalWeight },
            { source: 'stock_specific', category: specific, baseWeight: specificWeight },
        ],
        fuserOptions,
    );
}
