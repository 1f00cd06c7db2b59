/**
 * Portfolio Types
 */

import type { RiskTolerance } from './risk-profiles';

export interface StockScore {
    ticker: string;
    score: number;       // [-1, 1]
    confidence: number;  // [0, 1]
}

export interface StockAllocation {
    ticker: string;
    allocation: number;
    /** Share of the whole portfolio, 0-100 */
    pct: number;
    score: number;
    confidence: number;
    recommendationLabel: string;
}

export interface SectorAllocation {
    sectorId: string;
    sectorAllocation: number;
    /** Share of the whole portfolio, 0-100 */
    sectorPct: number;
    sectorScore: number;
    sectorConfidence: number;
    stocks: StockAllocation[];
}

export type RiskTier = 'Low' | 'Medium' | 'High';

export interface PortfolioRiskAssessment {
    riskTier: RiskTier;
    diversificationScore: number;    // 0-100
    sectorConcentrationPct: number;  // largest sector share, 0-100
    sentimentStdDev: number;
    avgSentiment: number;
    sentimentConsistency: number;    // 1 - stdDev
    totalPositions: number;
    recommendations: string[];
}

export type ExecutionPriority = 'High' | 'Medium';

export interface ExecutionStep {
    step: number;
    action: 'BUY';
    ticker: string;
    sectorId: string;
    amount: number;
    pct: number;
    priority: ExecutionPriority;
}

export interface ExecutionPlan {
    steps: ExecutionStep[];
    totalInvestment: number;
    estimatedCommissions: number;
    timeline: string;
}

export type MonitoringAlertType = 'sentiment_change' | 'price_movement' | 'sector_rotation';

export interface MonitoringAlert {
    alertType: MonitoringAlertType;
    /** null for portfolio-level alerts */
    ticker: string | null;
    threshold: string;
    action: string;
}

export interface PortfolioRecommendation {
    analysisId: string;
    riskTolerance: RiskTolerance;
    portfolioSize: number;
    selectedSectors: string[];
    /** Passed the risk filter but had no scored stocks */
    skippedSectors: string[];
    /** Selected, but sentiment pulled the weight to zero */
    unfundedSectors: string[];
    allocations: SectorAllocation[];
    riskAssessment: PortfolioRiskAssessment;
    executionPlan: ExecutionPlan;
    monitoringAlerts: MonitoringAlert[];
    generatedAt: string;
}
