/**
 * Sentiment Allocation Engine
 *
 * fuseSentiment     – general market + stock-specific categories → CombinedSentiment
 * fuseMultiChannel  – news / social forum / microblog → 5-tier CombinedSentiment
 * rankSectors       – sector scores → ranked, tiered SectorRanking
 * allocatePortfolio – ranking + stock scores + risk tolerance → PortfolioRecommendation
 *
 * SentimentFusionService runs the whole pipeline against injected fetchers
 * and models.
 */

export {
    fuseGeneralAndSpecific as fuseSentiment,
    fuseCategoryScores,
    type CategoryInput,
    type CombinedFuserOptions,
} from './sentiment/combined-fuser';
export {
    fuseChannels as fuseMultiChannel,
    channelFromCategory,
    type ChannelWeights,
    type MultiChannelOptions,
} from './sentiment/multi-channel-fuser';
export { aggregateCategory } from './sentiment/category-aggregator';
export { AdaptiveBlender } from './sentiment/item-scorer';
export { computeTimeWeight } from './sentiment/recency-weighter';
export { classifyRelevance } from './sentiment/relevance-classifier';
export { dedupeItems } from './sentiment/headline-dedup';
export {
    SentimentFusionService,
    type SentimentFusionServiceDeps,
    type SectorAnalysis,
    type PortfolioOptions,
} from './sentiment/sentiment-service';
export type {
    FetchQuery,
    ItemFetcher,
    ModelKind,
    ModelReading,
    SentimentCapability,
} from './sentiment/capabilities';
export type {
    CategoryScore,
    Channel,
    ChannelLabel,
    ChannelResult,
    CombinedSentiment,
    RawItem,
    SentimentLabel,
    WeightedItem,
} from './sentiment/sentiment-types';

export { classifySector } from './sectors/sector-classifier';
export {
    rankSectors,
    aggregateSectorSentiment,
    type RankedSector,
    type SectorRanking,
    type RecommendationTier,
} from './sectors/sector-ranker';

export { allocatePortfolio, computeAllocations, type AllocationRequest } from './portfolio/portfolio-allocator';
export { assessPortfolioRisk } from './portfolio/risk-assessor';
export { RISK_PROFILES, parseRiskTolerance, type RiskTolerance, type RiskProfile } from './portfolio/risk-profiles';
export type {
    PortfolioRecommendation,
    PortfolioRiskAssessment,
    SectorAllocation,
    StockAllocation,
    StockScore,
} from './portfolio/portfolio-types';

export { loadSectorTable, loadFinancialKeywords } from './reference/reference-loader';
export { getEngineConfig, type EngineConfig } from './config/engine-config';
export type { SignalResult } from './core/result';
