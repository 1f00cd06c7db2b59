import type { RiskTier, SectorAllocation } from '../portfolio-types';
import { assessPortfolioRisk, riskTierFor } from '../risk-assessor';

function makeSector(sectorId: string, sectorPct: number, scores: number[]): SectorAllocation {
    const sectorAllocation = sectorPct * 1000;
    return {
        sectorId,
        sectorAllocation,
        sectorPct,
        sectorScore: 0.1,
        sectorConfidence: 0.5,
        stocks: scores.map((score, i) => ({
            ticker: `${sectorId.toUpperCase()}${i}`,
            allocation: sectorAllocation / scores.length,
            pct: sectorPct / scores.length,
            score,
            confidence: 0.5,
            recommendationLabel: 'HOLD',
        })),
    };
}

const TIER_ORDER: Record<RiskTier, number> = { Low: 0, Medium: 1, High: 2 };

describe('assessPortfolioRisk', () => {
    test('balanced, consistent portfolio → Low', () => {
        const risk = assessPortfolioRisk([
            makeSector('a', 25, [0.1, 0.1]),
            makeSector('b', 25, [0.1]),
            makeSector('c', 25, [0.1]),
            makeSector('d', 25, [0.1]),
        ]);

        expect(risk.riskTier).toBe('Low');
        expect(risk.totalPositions).toBe(5);
        expect(risk.sectorConcentrationPct).toBe(25);
        expect(risk.diversificationScore).toBeCloseTo(33.333, 3);
        expect(risk.sentimentStdDev).toBeCloseTo(0, 10);
        expect(risk.avgSentiment).toBeCloseTo(0.1, 10);
        expect(risk.sentimentConsistency).toBeCloseTo(1, 10);
        expect(risk.recommendations).toEqual([
            'Set stop-loss orders at 5-10% below entry points',
            'Review and rebalance portfolio monthly',
        ]);
    });

    test('concentration above 40% → High with concentration advice', () => {
        const risk = assessPortfolioRisk([
            makeSector('a', 45, [0.2, 0.2, 0.2]),
            makeSector('b', 30, [0.2, 0.2]),
            makeSector('c', 25, [0.2]),
        ]);

        expect(risk.riskTier).toBe('High');
        expect(risk.recommendations).toEqual([
            'Consider increasing diversification',
            'Reduce sector concentration below 30%',
            'Monitor sector concentration risk',
            'Set stop-loss orders at 5-10% below entry points',
            'Review and rebalance portfolio monthly',
        ]);
    });

    test('fewer than five positions → High', () => {
        const risk = assessPortfolioRisk([makeSector('a', 50, [0.2, 0.3]), makeSector('b', 50, [0.1])]);
        expect(risk.riskTier).toBe('High');
        expect(risk.recommendations).toContain('Consider adding more positions to reduce single-stock risk');
    });

    test('scattered sentiment → Medium', () => {
        const risk = assessPortfolioRisk([
            makeSector('a', 20, [0.5]),
            makeSector('b', 20, [-0.5]),
            makeSector('c', 20, [0.5]),
            makeSector('d', 20, [-0.5]),
            makeSector('e', 20, [0.5]),
        ]);

        // mean 0.1, variance (3 * 0.16 + 2 * 0.36) / 5 = 0.24
        expect(risk.sentimentStdDev).toBeCloseTo(Math.sqrt(0.24), 10);
        expect(risk.riskTier).toBe('Medium');
    });

    test('empty portfolio', () => {
        const risk = assessPortfolioRisk([]);
        expect(risk.riskTier).toBe('High');
        expect(risk.totalPositions).toBe(0);
        expect(risk.diversificationScore).toBe(0);
        expect(risk.avgSentiment).toBe(0);
        expect(risk.sentimentConsistency).toBe(1);
    });

    test('diversification caps at 100', () => {
        const risk = assessPortfolioRisk([makeSector('a', 100, Array.from({ length: 20 }, () => 0))]);
        expect(risk.diversificationScore).toBe(100);
    });
});

describe('riskTierFor', () => {
    test('raising concentration never lowers the tier', () => {
        const concentrations = [10, 20, 25, 26, 30, 40, 41, 60, 90];
        for (const positions of [5, 8, 15]) {
            for (const spread of [0, 0.35]) {
                const tiers = concentrations.map(c => TIER_ORDER[riskTierFor(c, positions, spread)]);
                for (let i = 1; i < tiers.length; i++) {
                    expect(tiers[i]).toBeGreaterThanOrEqual(tiers[i - 1]);
                }
            }
        }
    });

    test('boundaries are exclusive', () => {
        expect(riskTierFor(40, 5, 0)).toBe('Medium');
        expect(riskTierFor(25, 5, 0.3)).toBe('Low');
        expect(riskTierFor(41, 5, 0)).toBe('High');
    });
});
