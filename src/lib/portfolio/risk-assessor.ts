/**
 * Risk Assessor
 *
 * Post-allocation metrics:
 *   concentration         = largest sectorPct
 *   diversificationScore  = min(100, positions / 15 * 100)
 *   sentimentStdDev / avg = population stats over stock scores
 *
 * Tier: High if concentration > 40 or positions < 5,
 *       Medium if concentration > 25 or stdDev > 0.3, else Low.
 */

import { mean, stdDev } from '../core/math';
import type { PortfolioRiskAssessment, RiskTier, SectorAllocation } from './portfolio-types';

const FULL_DIVERSIFICATION_POSITIONS = 15;
const HIGH_CONCENTRATION_PCT = 40;
const MEDIUM_CONCENTRATION_PCT = 25;
const WATCH_CONCENTRATION_PCT = 30;
const MIN_POSITIONS = 5;
const MAX_SENTIMENT_STD_DEV = 0.3;

export function riskTierFor(concentrationPct: number, totalPositions: number, sentimentStdDev: number): RiskTier {
    if (concentrationPct > HIGH_CONCENTRATION_PCT || totalPositions < MIN_POSITIONS) return 'High';
    if (concentrationPct > MEDIUM_CONCENTRATION_PCT || sentimentStdDev > MAX_SENTIMENT_STD_DEV) return 'Medium';
    return 'Low';
}

export function assessPortfolioRisk(allocations: SectorAllocation[]): PortfolioRiskAssessment {
    const scores = allocations.flatMap(a => a.stocks.map(s => s.score));
    const totalPositions = scores.length;
    const concentration = allocations.reduce((max, a) => Math.max(max, a.sectorPct), 0);
    const spread = stdDev(scores);
    const riskTier = riskTierFor(concentration, totalPositions, spread);

    const recommendations: string[] = [];
    if (riskTier === 'High') {
        recommendations.push('Consider increasing diversification');
        if (concentration > HIGH_CONCENTRATION_PCT) {
            recommendations.push('Reduce sector concentration below 30%');
        }
        if (totalPositions < MIN_POSITIONS) {
            recommendations.push('Consider adding more positions to reduce single-stock risk');
        }
    }
    if (concentration > WATCH_CONCENTRATION_PCT) {
        recommendations.push('Monitor sector concentration risk');
    }
    recommendations.push('Set stop-loss orders at 5-10% below entry points');
    recommendations.push('Review and rebalance portfolio monthly');

    return {
        riskTier,
        diversificationScore: Math.min(100, (totalPositions / FULL_DIVERSIFICATION_POSITIONS) * 100),
        sectorConcentrationPct: concentration,
        sentimentStdDev: spread,
        avgSentiment: mean(scores),
        sentimentConsistency: 1 - spread,
        totalPositions,
        recommendations,
    };
}
