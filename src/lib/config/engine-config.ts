/**
 * Engine Config
 *
 * Loads fusion and allocation parameters from env vars with sane defaults.
 * No side effects, just reads process.env at call time.
 *
 * Label thresholds are deliberately separate per fuser: the category,
 * combined and channel fusers each classify on their own scale.
 */

import type { RiskTolerance } from '../portfolio/risk-profiles';

// =============================================================================
// Types
// =============================================================================

export interface RecencyConfig {
    decayHours: number;
    minWeight: number;
}

export interface BlendRatio {
    finance: number;
    general: number;
}

export interface EngineConfig {
    recency: RecencyConfig;
    blend: {
        financial: BlendRatio;
        nonFinancial: BlendRatio;
    };
    category: {
        labelThreshold: number;
        fullConfidenceCount: number;
    };
    combined: {
        generalMarketWeight: number;
        stockSpecificWeight: number;
        confidenceFactor: number;
        financialRatioBoostAbove: number;
        financialBoost: number;
        labelThreshold: number;
    };
    channels: {
        newsWeight: number;
        socialForumWeight: number;
        microblogWeight: number;
        strongThreshold: number;
        weakThreshold: number;
    };
    sectors: {
        minItemCount: number;
        tierThreshold: number;
    };
    portfolio: {
        defaultRiskTolerance: RiskTolerance;
        commissionPerTrade: number;
    };
    referenceData: {
        sectorProfilesPath: string | null;
        financialKeywordsPath: string | null;
    };
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
    recency: { decayHours: 24, minWeight: 0.1 },
    blend: {
        financial: { finance: 0.8, general: 0.2 },
        nonFinancial: { finance: 0.4, general: 0.6 },
    },
    category: { labelThreshold: 0.1, fullConfidenceCount: 10 },
    combined: {
        generalMarketWeight: 0.4,
        stockSpecificWeight: 0.6,
        confidenceFactor: 0.2,
        financialRatioBoostAbove: 0.7,
        financialBoost: 1.1,
        labelThreshold: 0.12,
    },
    channels: {
        newsWeight: 0.4,
        socialForumWeight: 0.3,
        microblogWeight: 0.3,
        strongThreshold: 0.2,
        weakThreshold: 0.05,
    },
    sectors: { minItemCount: 2, tierThreshold: 0.1 },
    portfolio: { defaultRiskTolerance: 'moderate', commissionPerTrade: 10 },
    referenceData: { sectorProfilesPath: null, financialKeywordsPath: null },
};

// =============================================================================
// Getter
// =============================================================================

/**
 * Get engine configuration from environment variables.
 * Falls back to defaults for anything unset or unparsable.
 */
export function getEngineConfig(): EngineConfig {
    const d = DEFAULT_ENGINE_CONFIG;
    const toleranceRaw = (process.env.DEFAULT_RISK_TOLERANCE || '').toLowerCase();
    const defaultRiskTolerance: RiskTolerance =
        toleranceRaw === 'conservative' || toleranceRaw === 'aggressive' || toleranceRaw === 'moderate'
            ? toleranceRaw
            : d.portfolio.defaultRiskTolerance;

    return {
        recency: {
            decayHours: parseEnvNumber('RECENCY_DECAY_HOURS', d.recency.decayHours),
            minWeight: parseEnvNumber('RECENCY_MIN_WEIGHT', d.recency.minWeight),
        },
        blend: d.blend,
        category: {
            ...d.category,
            labelThreshold: parseEnvNumber('CATEGORY_LABEL_THRESHOLD', d.category.labelThreshold),
        },
        combined: {
            ...d.combined,
            generalMarketWeight: parseEnvNumber('GENERAL_MARKET_WEIGHT', d.combined.generalMarketWeight),
            stockSpecificWeight: parseEnvNumber('STOCK_SPECIFIC_WEIGHT', d.combined.stockSpecificWeight),
            labelThreshold: parseEnvNumber('COMBINED_LABEL_THRESHOLD', d.combined.labelThreshold),
        },
        channels: {
            newsWeight: parseEnvNumber('NEWS_CHANNEL_WEIGHT', d.channels.newsWeight),
            socialForumWeight: parseEnvNumber('SOCIAL_FORUM_CHANNEL_WEIGHT', d.channels.socialForumWeight),
            microblogWeight: parseEnvNumber('MICROBLOG_CHANNEL_WEIGHT', d.channels.microblogWeight),
            strongThreshold: parseEnvNumber('CHANNEL_STRONG_THRESHOLD', d.channels.strongThreshold),
            weakThreshold: parseEnvNumber('CHANNEL_WEAK_THRESHOLD', d.channels.weakThreshold),
        },
        sectors: {
            minItemCount: parseEnvNumber('SECTOR_MIN_ITEMS', d.sectors.minItemCount),
            tierThreshold: parseEnvNumber('SECTOR_TIER_THRESHOLD', d.sectors.tierThreshold),
        },
        portfolio: {
            defaultRiskTolerance,
            commissionPerTrade: parseEnvNumber('COMMISSION_PER_TRADE', d.portfolio.commissionPerTrade),
        },
        referenceData: {
            sectorProfilesPath: process.env.SECTOR_PROFILES_PATH || null,
            financialKeywordsPath: process.env.FINANCIAL_KEYWORDS_PATH || null,
        },
    };
}

// =============================================================================
// Helpers
// =============================================================================

function parseEnvNumber(key: string, fallback: number): number {
    const raw = process.env[key];
    if (raw == null || raw === '') return fallback;
    const parsed = parseFloat(raw);
    return isNaN(parsed) ? fallback : parsed;
}
