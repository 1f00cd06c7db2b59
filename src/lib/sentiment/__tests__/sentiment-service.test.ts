/**
 * SentimentFusionService Tests
 *
 * Runs the full pipeline against an in-memory fetcher and a keyword-driven
 * stub model: any text mentioning "oil" reads negative 0.6, everything else
 * positive 0.8. Both model kinds return the same reading, so every blend
 * ratio yields the reading itself.
 */

import { DEFAULT_ENGINE_CONFIG } from '../../config/engine-config';
import { buildFinancialKeywordTable, buildSectorTable } from '../../reference/reference-loader';
import type { FetchQuery, ItemFetcher, ModelReading, SentimentCapability } from '../capabilities';
import { SentimentFusionService } from '../sentiment-service';
import type { RawItem } from '../sentiment-types';

// =============================================================================
// Fixtures
// =============================================================================

const SECTORS = buildSectorTable({
    version: 'test',
    sectors: [
        { sectorId: 'technology', etfTicker: 'XLK', tickers: ['AAPL', 'MSFT'], keywords: ['software', 'chip', 'cloud'] },
        { sectorId: 'energy', etfTicker: 'XLE', tickers: ['XOM', 'CVX'], keywords: ['oil', 'crude', 'refinery'] },
        { sectorId: 'retail', etfTicker: 'XRT', tickers: ['WMT'], keywords: ['store'] },
    ],
});

const KEYWORDS = buildFinancialKeywordTable({
    version: 'test',
    densityFactor: 0.1,
    keywords: ['earnings', 'revenue', 'profit'],
});

function raw(text: string, ticker?: string): RawItem {
    return { text, source: 'wire', publishedAt: null, ticker };
}

const MARKET_ITEMS: RawItem[] = [
    raw('Apple ships a new chip lineup', 'AAPL'),
    raw('Apple cloud revenue jumps', 'AAPL'),
    raw('Apple software update lands', 'AAPL'),
    raw('Oil majors cut output', 'XOM'),
    raw('Oil refinery outage spreads', 'XOM'),
    raw('Oil demand slows in Asia', 'XOM'),
];

const AAPL_ITEMS: RawItem[] = [raw('Apple earnings beat estimates', 'AAPL')];

const keywordModel: SentimentCapability = {
    classify(text: string): ModelReading {
        return text.toLowerCase().includes('oil')
            ? { label: 'negative', score: 0.6 }
            : { label: 'positive', score: 0.8 };
    },
};

const failingModel: SentimentCapability = {
    classify(): ModelReading {
        throw new Error('model offline');
    },
};

class MapFetcher implements ItemFetcher {
    constructor(private readonly sources: Record<string, RawItem[] | Error>) {}

    async fetchItems(query: FetchQuery): Promise<RawItem[]> {
        const key = query.kind === 'market' ? 'market' : query.ticker;
        const source = this.sources[key] ?? [];
        if (source instanceof Error) throw source;
        return source;
    }
}

function makeService(sources: Record<string, RawItem[] | Error>, capability: SentimentCapability = keywordModel) {
    return new SentimentFusionService({
        capability,
        fetcher: new MapFetcher(sources),
        config: DEFAULT_ENGINE_CONFIG,
        sectorProfiles: SECTORS,
        financialKeywords: KEYWORDS,
    });
}

beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
    jest.restoreAllMocks();
});

// =============================================================================
// fuseSentiment
// =============================================================================

describe('fuseSentiment', () => {
    test('fuses market and ticker news', async () => {
        const result = await makeService({ market: MARKET_ITEMS, AAPL: AAPL_ITEMS }).fuseSentiment('aapl');

        expect(result.status).toBe('ok');
        if (result.status !== 'ok') return;

        const { value } = result;
        expect(value.tickerOrSector).toBe('AAPL');
        // general: 0.1 over 6 items; specific: 0.8 over 1 financial item
        expect(value.weightsUsed.general_market).toBeCloseTo(0.3395998, 6);
        expect(value.weightsUsed.stock_specific).toBeCloseTo(0.6604002, 6);
        expect(value.score).toBeCloseTo(0.5622802, 6);
        expect(value.confidence).toBeCloseTo(0.2697999, 6);
        expect(value.label).toBe('positive');
    });

    test('market fetch failure degrades to ticker news only', async () => {
        const result = await makeService({ market: new Error('feed down'), AAPL: AAPL_ITEMS }).fuseSentiment('AAPL');

        expect(console.warn).toHaveBeenCalledWith('[FusionService] Fetch failed for general market:', 'feed down');
        expect(result.status).toBe('degraded');
        if (result.status !== 'degraded') return;
        expect(result.reasons).toEqual(['general market: fetch failed', 'general_market: no items']);
        expect(result.value.weightsUsed).toEqual({ stock_specific: 1 });
        expect(result.value.score).toBeCloseTo(0.8, 10);
    });

    test('no data at all → unavailable', async () => {
        const result = await makeService({ market: new Error('feed down'), AAPL: new Error('feed down') })
            .fuseSentiment('AAPL');

        expect(result).toEqual({
            status: 'unavailable',
            reasons: [
                'general market: fetch failed',
                'AAPL: fetch failed',
                'general_market: no items',
                'stock_specific: no items',
            ],
        });
    });

    test('model failures are surfaced, not scored', async () => {
        const result = await makeService({ market: MARKET_ITEMS, AAPL: AAPL_ITEMS }, failingModel).fuseSentiment('AAPL');

        expect(result.status).toBe('degraded');
        if (result.status !== 'degraded') return;
        expect(result.reasons).toEqual([
            'general_market: 6 item(s) failed inference',
            'stock_specific: 1 item(s) failed inference',
        ]);
        expect(result.value.score).toBe(0);
    });
});

// =============================================================================
// analyzeSectors
// =============================================================================

describe('analyzeSectors', () => {
    test('classifies, aggregates and ranks market news', async () => {
        const result = await makeService({ market: MARKET_ITEMS }).analyzeSectors();

        expect(result.status).toBe('ok');
        if (result.status !== 'ok') return;

        const { ranking, sectorScores, itemCount } = result.value;
        expect(itemCount).toBe(6);
        expect(sectorScores.technology.score).toBeCloseTo(0.8, 10);
        expect(sectorScores.energy.score).toBeCloseTo(-0.6, 10);
        expect(ranking.rankings.map(r => [r.sectorId, r.etfTicker])).toEqual([
            ['technology', 'XLK'],
            ['energy', 'XLE'],
        ]);
        expect(ranking.tiers).toEqual({ overweight: ['technology'], neutral: [], underweight: ['energy'] });
    });

    test('no market news → unavailable', async () => {
        const result = await makeService({ market: [] }).analyzeSectors();
        expect(result).toEqual({ status: 'unavailable', reasons: ['general market: no items'] });
    });
});

// =============================================================================
// scoreStocks
// =============================================================================

describe('scoreStocks', () => {
    test('tickers without any data are skipped', async () => {
        const scores = await makeService({ market: new Error('feed down'), AAPL: AAPL_ITEMS }).scoreStocks(['AAPL', 'MSFT']);

        expect(scores).toHaveLength(1);
        expect(scores[0].ticker).toBe('AAPL');
        expect(scores[0].score).toBeCloseTo(0.8, 10);
        expect(scores[0].confidence).toBeCloseTo(0.1, 10);
    });
});

// =============================================================================
// recommendPortfolio
// =============================================================================

describe('recommendPortfolio', () => {
    test('allocates across the sectors that pass the risk filter', async () => {
        const result = await makeService({
            market: MARKET_ITEMS,
            AAPL: AAPL_ITEMS,
            MSFT: new Error('rate limited'),
        }).recommendPortfolio({ portfolioSize: 10000, riskTolerance: 'moderate', stocksPerSector: 2 });

        expect(result.status).toBe('ok');
        if (result.status !== 'ok') return;

        const recommendation = result.value;
        expect(recommendation.selectedSectors).toEqual(['technology']);
        expect(recommendation.allocations[0].sectorAllocation).toBeCloseTo(10000, 6);

        const stocks = recommendation.allocations[0].stocks;
        expect(stocks.map(s => s.ticker).sort()).toEqual(['AAPL', 'MSFT']);
        expect(stocks.reduce((acc, s) => acc + s.allocation, 0)).toBeCloseTo(10000, 6);
        expect(recommendation.executionPlan.steps).toHaveLength(2);
    });

    test('no market news → unavailable', async () => {
        const result = await makeService({ market: new Error('feed down') })
            .recommendPortfolio({ portfolioSize: 10000 });

        expect(result).toEqual({
            status: 'unavailable',
            reasons: ['general market: fetch failed', 'general market: no items'],
        });
    });
});
