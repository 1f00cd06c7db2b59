/**
 * Category Aggregator
 *
 * Reduces the weighted items of one category ("general market",
 * "stock specific", a sector bucket) to a single score + confidence.
 *
 *   score      = Σ(blendedScore_i * timeWeight_i) / Σ(timeWeight_i)
 *   confidence = min(1, itemCount / 10)
 */

import { mean } from '../core/math';
import type { CategoryName, CategoryScore, SentimentLabel, WeightedItem } from './sentiment-types';

export interface CategoryAggregatorOptions {
    /** |score| above this is positive/negative */
    labelThreshold: number;
    /** Item count at which confidence saturates */
    fullConfidenceCount: number;
}

const DEFAULT_OPTIONS: CategoryAggregatorOptions = {
    labelThreshold: 0.1,
    fullConfidenceCount: 10,
};

export function labelFromScore(score: number, threshold: number): SentimentLabel {
    if (score > threshold) return 'positive';
    if (score < -threshold) return 'negative';
    return 'neutral';
}

export function emptyCategory(category: CategoryName): CategoryScore {
    return {
        category,
        score: 0,
        label: 'neutral',
        confidence: 0,
        itemCount: 0,
        financialItemCount: 0,
        financialRatio: 0,
        avgTimeWeight: 0,
        avgClassificationConfidence: 0,
        failedItemCount: 0,
    };
}

export function aggregateCategory(
    category: CategoryName,
    items: WeightedItem[],
    options: Partial<CategoryAggregatorOptions> = {},
): CategoryScore {
    const { labelThreshold, fullConfidenceCount } = { ...DEFAULT_OPTIONS, ...options };

    if (items.length === 0) return emptyCategory(category);

    let weightedSum = 0;
    let totalWeight = 0;
    for (const item of items) {
        weightedSum += item.blendedScore * item.timeWeight;
        totalWeight += item.timeWeight;
    }

    // Time weights are floored above zero, so this only guards hand-built input
    const score = weightedSum / (totalWeight > 0 ? totalWeight : 1);
    const itemCount = items.length;
    const financialItemCount = items.filter(i => i.isFinancial).length;

    return {
        category,
        score,
        label: labelFromScore(score, labelThreshold),
        confidence: Math.min(1, itemCount / Math.max(1, fullConfidenceCount)),
        itemCount,
        financialItemCount,
        financialRatio: financialItemCount / Math.max(1, itemCount),
        avgTimeWeight: mean(items.map(i => i.timeWeight)),
        avgClassificationConfidence: mean(items.map(i => i.classificationConfidence)),
        failedItemCount: items.filter(i => i.inferenceFailed).length,
    };
}
