/**
 * Portfolio Allocator
 *
 * Turns ranked sectors + per-stock sentiment into dollar allocations.
 *
 *   baseWeight   = 1 / count
 *   perfAdj      = score * confidence
 *   weight       = baseWeight * equalWeight + perfAdj * performanceWeight / count
 *
 * The same formula is applied to sectors (over selected sectors) and to
 * stocks (over the stocks within a sector). The raw weights do not sum to
 * 1 because perfAdj is not normalized, so both levels are renormalized:
 * stocks sum to their sector, sectors sum to portfolioSize. Negative raw
 * weights are floored at zero first (no short positions), and anything left
 * with zero dollars is dropped from the result.
 */

import { v4 as uuidv4 } from 'uuid';
import { normalizeWeights } from '../core/math';
import type { RankedSector, SectorRanking } from '../sectors/sector-ranker';
import { buildExecutionPlan, buildMonitoringAlerts } from './execution-plan';
import type {
    PortfolioRecommendation,
    SectorAllocation,
    StockAllocation,
    StockScore,
} from './portfolio-types';
import { assessPortfolioRisk } from './risk-assessor';
import { passesRiskFilter, RISK_PROFILES, type RiskProfile, type RiskTolerance } from './risk-profiles';

// =============================================================================
// Types
// =============================================================================

export interface AllocationRequest {
    sectorRanking: SectorRanking | RankedSector[];
    stockScoresBySector: Record<string, StockScore[]>;
    riskTolerance: RiskTolerance;
    portfolioSize: number;
    maxSectors?: number;
    stocksPerSector?: number;
    commissionPerTrade?: number;
}

export interface AllocationResult {
    selectedSectors: string[];
    skippedSectors: string[];
    unfundedSectors: string[];
    allocations: SectorAllocation[];
}

const DEFAULT_MAX_SECTORS = 5;
const DEFAULT_STOCKS_PER_SECTOR = 3;
const DEFAULT_COMMISSION = 10;

// =============================================================================
// Selection
// =============================================================================

/**
 * Top `maxSectors` ranked sectors that pass the tolerance filter, in rank order.
 */
export function selectSectors(
    rankings: RankedSector[],
    riskTolerance: RiskTolerance,
    maxSectors: number,
): RankedSector[] {
    if (maxSectors <= 0) return [];
    const profile = RISK_PROFILES[riskTolerance];
    return rankings.filter(r => passesRiskFilter(r, profile)).slice(0, maxSectors);
}

/**
 * Best `limit` stocks by score * confidence; duplicate tickers keep the best entry.
 * Tickers in `held` (already picked for a higher-ranked sector) are passed over.
 */
export function selectStocks(
    stocks: StockScore[],
    limit: number,
    held: ReadonlySet<string> = new Set<string>(),
): StockScore[] {
    if (limit <= 0) return [];

    const sorted = [...stocks].sort((a, b) => b.score * b.confidence - a.score * a.confidence);
    const seen = new Set<string>();
    const picked: StockScore[] = [];

    for (const stock of sorted) {
        const ticker = stock.ticker.toUpperCase();
        if (seen.has(ticker) || held.has(ticker)) continue;
        seen.add(ticker);
        picked.push({ ...stock, ticker });
        if (picked.length >= limit) break;
    }
    return picked;
}

// =============================================================================
// Weights & labels
// =============================================================================

export function blendedWeight(count: number, score: number, confidence: number, profile: RiskProfile): number {
    const n = Math.max(1, count);
    return (1 / n) * profile.equalWeight + (score * confidence * profile.performanceWeight) / n;
}

export function stockRecommendation(score: number, confidence: number): string {
    if (confidence < 0.3) return 'HOLD - Low Confidence';
    if (score > 0.2) return 'STRONG BUY';
    if (score > 0.05) return 'BUY';
    if (score < -0.2) return 'STRONG SELL';
    if (score < -0.05) return 'SELL';
    return 'HOLD';
}

// =============================================================================
// Allocation
// =============================================================================

export function computeAllocations(request: AllocationRequest): AllocationResult {
    const {
        riskTolerance,
        portfolioSize,
        stockScoresBySector,
        maxSectors = DEFAULT_MAX_SECTORS,
        stocksPerSector = DEFAULT_STOCKS_PER_SECTOR,
    } = request;
    const rankings = Array.isArray(request.sectorRanking) ? request.sectorRanking : request.sectorRanking.rankings;
    const profile = RISK_PROFILES[riskTolerance];

    if (!Number.isFinite(portfolioSize) || portfolioSize <= 0) {
        console.warn(`[PortfolioAllocator] Non-positive portfolio size (${portfolioSize}), nothing to allocate`);
        return { selectedSectors: [], skippedSectors: [], unfundedSectors: [], allocations: [] };
    }

    const candidates = selectSectors(rankings, riskTolerance, maxSectors);
    const skippedSectors: string[] = [];
    const funded: Array<{ sector: RankedSector; stocks: StockScore[] }> = [];
    const held = new Set<string>();

    for (const sector of candidates) {
        const stocks = selectStocks(stockScoresBySector[sector.sectorId] ?? [], stocksPerSector, held);
        if (stocks.length === 0) {
            skippedSectors.push(sector.sectorId);
            continue;
        }
        for (const stock of stocks) held.add(stock.ticker);
        funded.push({ sector, stocks });
    }

    if (skippedSectors.length > 0) {
        console.warn(`[PortfolioAllocator] No scored stocks for: ${skippedSectors.join(', ')}`);
    }

    const rawSectorWeights: Record<string, number> = {};
    for (const { sector } of funded) {
        rawSectorWeights[sector.sectorId] = blendedWeight(funded.length, sector.score, sector.confidence, profile);
    }
    const sectorWeights = normalizeWeights(rawSectorWeights);
    warnOnEqualFallback('sector weights', rawSectorWeights);

    const allocations: SectorAllocation[] = funded.map(({ sector, stocks }) => {
        const sectorAllocation = portfolioSize * sectorWeights[sector.sectorId];

        const rawStockWeights: Record<string, number> = {};
        for (const stock of stocks) {
            rawStockWeights[stock.ticker] = blendedWeight(stocks.length, stock.score, stock.confidence, profile);
        }
        const stockWeights = normalizeWeights(rawStockWeights);
        warnOnEqualFallback(`stock weights in ${sector.sectorId}`, rawStockWeights);

        const stockAllocations: StockAllocation[] = stocks.map(stock => {
            const allocation = sectorAllocation * stockWeights[stock.ticker];
            return {
                ticker: stock.ticker,
                allocation,
                pct: (allocation / portfolioSize) * 100,
                score: stock.score,
                confidence: stock.confidence,
                recommendationLabel: stockRecommendation(stock.score, stock.confidence),
            };
        });

        return {
            sectorId: sector.sectorId,
            sectorAllocation,
            sectorPct: (sectorAllocation / portfolioSize) * 100,
            sectorScore: sector.score,
            sectorConfidence: sector.confidence,
            stocks: stockAllocations.filter(stock => stock.allocation > 0),
        };
    });

    const fundedAllocations = allocations.filter(sector => sector.sectorAllocation > 0);
    const unfundedSectors = allocations.filter(sector => sector.sectorAllocation <= 0).map(sector => sector.sectorId);
    if (unfundedSectors.length > 0) {
        console.warn(`[PortfolioAllocator] Zero weight after flooring, not funded: ${unfundedSectors.join(', ')}`);
    }

    return {
        selectedSectors: fundedAllocations.map(sector => sector.sectorId),
        skippedSectors,
        unfundedSectors,
        allocations: fundedAllocations,
    };
}

function warnOnEqualFallback(label: string, rawWeights: Record<string, number>): void {
    const values = Object.values(rawWeights);
    if (values.length > 1 && values.every(w => w <= 0)) {
        console.warn(`[PortfolioAllocator] All ${label} floored at zero, splitting equally`);
    }
}

/**
 * Full recommendation: allocations, risk assessment, execution plan, alerts.
 * An empty selection is a valid outcome, not an error.
 */
export function allocatePortfolio(request: AllocationRequest): PortfolioRecommendation {
    const result = computeAllocations(request);

    return {
        analysisId: uuidv4(),
        riskTolerance: request.riskTolerance,
        portfolioSize: request.portfolioSize,
        selectedSectors: result.selectedSectors,
        skippedSectors: result.skippedSectors,
        unfundedSectors: result.unfundedSectors,
        allocations: result.allocations,
        riskAssessment: assessPortfolioRisk(result.allocations),
        executionPlan: buildExecutionPlan(result.allocations, request.commissionPerTrade ?? DEFAULT_COMMISSION),
        monitoringAlerts: buildMonitoringAlerts(result.allocations),
        generatedAt: new Date().toISOString(),
    };
}
