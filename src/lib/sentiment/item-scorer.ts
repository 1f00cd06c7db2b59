/**
 * Item Scorer / Adaptive Blender
 *
 * Turns two independent model readings (finance-specialized + general)
 * into one signed per-item score. The finance model is trusted more on
 * financial text; the general model dominates elsewhere.
 *
 *   financial text:      blended = 0.8 * finance + 0.2 * general
 *   non-financial text:  blended = 0.4 * finance + 0.6 * general
 */

import { clamp } from '../core/math';
import type { BlendRatio, RecencyConfig } from '../config/engine-config';
import type { FinancialKeywordTable } from '../reference/reference-loader';
import type { ModelKind, ModelReading, SentimentCapability } from './capabilities';
import { computeTimeWeight } from './recency-weighter';
import { classifyRelevance } from './relevance-classifier';
import type { RawItem, WeightedItem } from './sentiment-types';

export interface BlendRatios {
    financial: BlendRatio;
    nonFinancial: BlendRatio;
}

export const DEFAULT_BLEND_RATIOS: BlendRatios = {
    financial: { finance: 0.8, general: 0.2 },
    nonFinancial: { finance: 0.4, general: 0.6 },
};

// =============================================================================
// Pure scoring
// =============================================================================

/**
 * positive → +p, negative → -p, anything else → 0.
 * A missing reading scores 0.
 */
export function toSignedScore(label: string | null, probability: number | null): number {
    if (label == null || probability == null || !Number.isFinite(probability)) return 0;

    const p = clamp(probability, 0, 1);
    const normalized = label.trim().toLowerCase();
    if (normalized === 'positive') return p;
    if (normalized === 'negative') return -p;
    return 0;
}

export function blendScores(
    financeScore: number,
    generalScore: number,
    isFinancial: boolean,
    ratios: BlendRatios = DEFAULT_BLEND_RATIOS,
): number {
    const ratio = isFinancial ? ratios.financial : ratios.nonFinancial;
    return clamp(ratio.finance * financeScore + ratio.general * generalScore, -1, 1);
}

// =============================================================================
// Blender
// =============================================================================

export interface AdaptiveBlenderOptions {
    keywords: FinancialKeywordTable;
    recency?: Partial<RecencyConfig>;
    ratios?: BlendRatios;
    /** Reference time for recency weighting, epoch ms */
    now?: number;
}

export class AdaptiveBlender {
    private readonly capability: SentimentCapability;
    private readonly options: AdaptiveBlenderOptions;

    constructor(capability: SentimentCapability, options: AdaptiveBlenderOptions) {
        this.capability = capability;
        this.options = options;
    }

    /**
     * Classify, weight and score a single raw item.
     * Inference failures degrade the item to neutral; they never throw.
     */
    async analyze(raw: RawItem): Promise<WeightedItem> {
        const relevance = classifyRelevance(raw.text, this.options.keywords);
        const timeWeight = computeTimeWeight(raw.publishedAt, {
            ...this.options.recency,
            now: this.options.now,
        });

        const [finance, general] = await Promise.all([
            this.readModel(raw.text, 'finance'),
            this.readModel(raw.text, 'general'),
        ]);

        const inferenceFailed = finance === null && general === null;
        const classificationConfidence = inferenceFailed ? 0 : relevance.confidence;
        const blendedScore = inferenceFailed
            ? 0
            : blendScores(
                toSignedScore(finance?.label ?? null, finance?.score ?? null),
                toSignedScore(general?.label ?? null, general?.score ?? null),
                relevance.isFinancial,
                this.options.ratios,
            );

        return {
            text: raw.text,
            source: raw.source,
            publishedAt: raw.publishedAt,
            headline: raw.headline,
            summary: raw.summary,
            ticker: raw.ticker,
            externalLabel: finance?.label ?? null,
            externalScore: finance?.score ?? null,
            generalLabel: general?.label ?? null,
            generalScore: general?.score ?? null,
            isFinancial: relevance.isFinancial,
            classificationConfidence,
            timeWeight,
            blendedScore,
            contribution: blendedScore * classificationConfidence,
            inferenceFailed,
        };
    }

    async analyzeAll(items: RawItem[]): Promise<WeightedItem[]> {
        return Promise.all(items.map(item => this.analyze(item)));
    }

    private async readModel(text: string, kind: ModelKind): Promise<ModelReading | null> {
        try {
            return await this.capability.classify(text, kind);
        } catch (err) {
            console.warn(`[AdaptiveBlender] ${kind} inference failed:`, err instanceof Error ? err.message : 'unknown');
            return null;
        }
    }
}
