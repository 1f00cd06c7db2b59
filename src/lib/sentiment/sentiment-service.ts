/**
 * Sentiment Fusion Service
 *
 * Orchestrates the full pipeline against injected capabilities:
 *   fetch → dedupe → relevance + recency + model blend → category
 *   aggregation → combined fusion / sector ranking → allocation
 *
 * Fetch failures never abort a run. They become empty inputs and are
 * reported as reasons on the returned SignalResult.
 */

import { getEngineConfig, type EngineConfig } from '../config/engine-config';
import { prependReasons, unavailable, withReasons, type SignalResult } from '../core/result';
import { allocatePortfolio, selectSectors } from '../portfolio/portfolio-allocator';
import type { PortfolioRecommendation, StockScore } from '../portfolio/portfolio-types';
import type { RiskTolerance } from '../portfolio/risk-profiles';
import {
    loadFinancialKeywords,
    loadSectorTable,
    type FinancialKeywordTable,
    type SectorTable,
} from '../reference/reference-loader';
import { classifySector, extractKnownTicker } from '../sectors/sector-classifier';
import {
    aggregateSectorSentiment,
    rankSectors,
    type ClassifiedItem,
    type SectorRanking,
} from '../sectors/sector-ranker';
import { describeQuery, type FetchQuery, type ItemFetcher, type SentimentCapability } from './capabilities';
import { aggregateCategory } from './category-aggregator';
import { fuseGeneralAndSpecific } from './combined-fuser';
import { dedupeItems } from './headline-dedup';
import { AdaptiveBlender } from './item-scorer';
import type { CategoryName, CategoryScore, CombinedSentiment, RawItem, WeightedItem } from './sentiment-types';

// =============================================================================
// Types
// =============================================================================

export interface SentimentFusionServiceDeps {
    capability: SentimentCapability;
    fetcher: ItemFetcher;
    config?: EngineConfig;
    sectorProfiles?: SectorTable;
    financialKeywords?: FinancialKeywordTable;
    /** Reference time for recency weighting, epoch ms */
    now?: number;
}

export interface SectorAnalysis {
    sectorScores: Record<string, CategoryScore>;
    ranking: SectorRanking;
    itemCount: number;
}

export interface PortfolioOptions {
    portfolioSize: number;
    riskTolerance?: RiskTolerance;
    maxSectors?: number;
    stocksPerSector?: number;
}

const DEFAULT_MAX_SECTORS = 5;
const DEFAULT_STOCKS_PER_SECTOR = 3;
/** Candidates scored per sector, relative to the number kept */
const CANDIDATE_MULTIPLIER = 2;

// =============================================================================
// Service
// =============================================================================

export class SentimentFusionService {
    private readonly fetcher: ItemFetcher;
    private readonly config: EngineConfig;
    private readonly sectorTable: SectorTable;
    private readonly blender: AdaptiveBlender;

    constructor(deps: SentimentFusionServiceDeps) {
        this.fetcher = deps.fetcher;
        this.config = deps.config ?? getEngineConfig();
        this.sectorTable = deps.sectorProfiles ?? loadSectorTable(this.config.referenceData.sectorProfilesPath);

        const keywords = deps.financialKeywords ?? loadFinancialKeywords(this.config.referenceData.financialKeywordsPath);
        this.blender = new AdaptiveBlender(deps.capability, {
            keywords,
            recency: this.config.recency,
            ratios: this.config.blend,
            now: deps.now,
        });
    }

    /**
     * General market + ticker-specific sentiment for one ticker.
     */
    async fuseSentiment(ticker: string): Promise<SignalResult<CombinedSentiment>> {
        const reasons: string[] = [];
        const general = await this.marketCategory(reasons);
        return prependReasons(await this.fuseWithMarket(ticker, general), reasons);
    }

    /**
     * Classify market news by sector, aggregate each sector and rank.
     */
    async analyzeSectors(): Promise<SignalResult<SectorAnalysis>> {
        const reasons: string[] = [];
        const items = await this.blender.analyzeAll(await this.fetchItems({ kind: 'market' }, reasons));
        return this.rankMarketItems(items, reasons);
    }

    /**
     * Stock scores for a list of tickers. Tickers without any data are skipped.
     */
    async scoreStocks(tickers: string[]): Promise<StockScore[]> {
        // Fetch failures are already logged; callers only get the surviving scores
        const general = await this.marketCategory([]);
        return this.scoreWithMarket(tickers, general);
    }

    /**
     * Rank sectors, score candidate stocks in the sectors that pass the
     * risk filter, then allocate.
     */
    async recommendPortfolio(options: PortfolioOptions): Promise<SignalResult<PortfolioRecommendation>> {
        const riskTolerance = options.riskTolerance ?? this.config.portfolio.defaultRiskTolerance;
        const maxSectors = options.maxSectors ?? DEFAULT_MAX_SECTORS;
        const stocksPerSector = options.stocksPerSector ?? DEFAULT_STOCKS_PER_SECTOR;

        const fetchReasons: string[] = [];
        const marketItems = await this.blender.analyzeAll(await this.fetchItems({ kind: 'market' }, fetchReasons));
        const analysis = this.rankMarketItems(marketItems, fetchReasons);
        if (analysis.status === 'unavailable') {
            return unavailable(analysis.reasons);
        }
        const reasons = analysis.status === 'degraded' ? [...analysis.reasons] : [];
        const { ranking } = analysis.value;

        const selected = selectSectors(ranking.rankings, riskTolerance, maxSectors);
        const general = aggregateCategory('general_market', marketItems, this.config.category);

        const stockScoresBySector: Record<string, StockScore[]> = {};
        for (const sector of selected) {
            const profile = this.sectorTable.profiles.get(sector.sectorId);
            const candidates = profile ? [...profile.tickers].slice(0, stocksPerSector * CANDIDATE_MULTIPLIER) : [];
            stockScoresBySector[sector.sectorId] = await this.scoreWithMarket(candidates, general);
        }

        const recommendation = allocatePortfolio({
            sectorRanking: ranking,
            stockScoresBySector,
            riskTolerance,
            portfolioSize: options.portfolioSize,
            maxSectors,
            stocksPerSector,
            commissionPerTrade: this.config.portfolio.commissionPerTrade,
        });

        for (const sectorId of recommendation.skippedSectors) {
            reasons.push(`${sectorId}: no scored stocks`);
        }
        for (const sectorId of recommendation.unfundedSectors) {
            reasons.push(`${sectorId}: zero weight after flooring`);
        }
        return withReasons(recommendation, reasons);
    }

    // =========================================================================
    // Internals
    // =========================================================================

    private async fetchItems(query: FetchQuery, reasons: string[]): Promise<RawItem[]> {
        try {
            return dedupeItems(await this.fetcher.fetchItems(query));
        } catch (err) {
            const label = describeQuery(query);
            console.warn(`[FusionService] Fetch failed for ${label}:`, err instanceof Error ? err.message : 'unknown');
            reasons.push(`${label}: fetch failed`);
            return [];
        }
    }

    private rankMarketItems(items: WeightedItem[], reasons: string[]): SignalResult<SectorAnalysis> {
        if (items.length === 0) {
            return unavailable([...reasons, 'general market: no items']);
        }

        const classified: ClassifiedItem[] = items.map(item => ({
            ...item,
            sector: classifySector(
                item.headline ?? item.text,
                item.summary ?? '',
                item.ticker ?? extractKnownTicker(item.text, this.sectorTable),
                this.sectorTable,
            ),
        }));

        const sectorScores = aggregateSectorSentiment(classified, this.config.category);
        const ranking = rankSectors(sectorScores, { ...this.config.sectors, table: this.sectorTable });

        console.log(`[FusionService] Ranked ${ranking.rankings.length} sectors from ${classified.length} items`);

        const allReasons = ranking.rankings.length === 0
            ? [...reasons, 'no sector met the minimum item count']
            : reasons;
        return withReasons({ sectorScores, ranking, itemCount: classified.length }, allReasons);
    }

    private async aggregate(category: CategoryName, raw: RawItem[]): Promise<CategoryScore> {
        const items = await this.blender.analyzeAll(raw);
        return aggregateCategory(category, items, this.config.category);
    }

    private async marketCategory(reasons: string[]): Promise<CategoryScore> {
        return this.aggregate('general_market', await this.fetchItems({ kind: 'market' }, reasons));
    }

    private async fuseWithMarket(ticker: string, general: CategoryScore): Promise<SignalResult<CombinedSentiment>> {
        const symbol = ticker.trim().toUpperCase();
        const reasons: string[] = [];
        const specific = await this.aggregate('stock_specific', await this.fetchItems({ kind: 'ticker', ticker: symbol }, reasons));

        const { combined } = this.config;
        const fused = fuseGeneralAndSpecific(symbol, general, specific, {
            generalWeight: combined.generalMarketWeight,
            specificWeight: combined.stockSpecificWeight,
            confidenceFactor: combined.confidenceFactor,
            financialRatioBoostAbove: combined.financialRatioBoostAbove,
            financialBoost: combined.financialBoost,
            labelThreshold: combined.labelThreshold,
        });
        return prependReasons(fused, reasons);
    }

    private async scoreWithMarket(tickers: string[], general: CategoryScore): Promise<StockScore[]> {
        const results = await Promise.all(tickers.map(ticker => this.fuseWithMarket(ticker, general)));

        const scores: StockScore[] = [];
        results.forEach((result, i) => {
            if (result.status === 'unavailable') {
                console.warn(`[FusionService] No sentiment for ${tickers[i]}: ${result.reasons.join('; ')}`);
                return;
            }
            scores.push({
                ticker: result.value.tickerOrSector,
                score: result.value.score,
                confidence: result.value.confidence,
            });
        });
        return scores;
    }
}
