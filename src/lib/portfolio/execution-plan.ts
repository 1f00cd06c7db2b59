/**
 * Execution Plan & Monitoring Alerts
 *
 * Buy-side steps for a fresh allocation, and the standing alerts to watch
 * once the positions are open.
 */

import type {
    ExecutionPlan,
    ExecutionPriority,
    ExecutionStep,
    MonitoringAlert,
    SectorAllocation,
} from './portfolio-types';

const HIGH_PRIORITY_SCORE = 0.1;
const EXECUTION_TIMELINE = '1-2 trading days';

// =============================================================================
// Execution plan
// =============================================================================

export function buildExecutionPlan(allocations: SectorAllocation[], commissionPerTrade: number): ExecutionPlan {
    const unordered: Array<Omit<ExecutionStep, 'step'>> = allocations.flatMap(sector =>
        sector.stocks.map(stock => {
            const priority: ExecutionPriority = stock.score > HIGH_PRIORITY_SCORE ? 'High' : 'Medium';
            return {
                action: 'BUY' as const,
                ticker: stock.ticker,
                sectorId: sector.sectorId,
                amount: stock.allocation,
                pct: stock.pct,
                priority,
            };
        }),
    );

    unordered.sort((a, b) => {
        if (a.priority !== b.priority) return a.priority === 'High' ? -1 : 1;
        return b.amount - a.amount;
    });

    const steps: ExecutionStep[] = unordered.map((s, i) => ({ step: i + 1, ...s }));

    return {
        steps,
        totalInvestment: steps.reduce((acc, s) => acc + s.amount, 0),
        estimatedCommissions: steps.length * commissionPerTrade,
        timeline: EXECUTION_TIMELINE,
    };
}

// =============================================================================
// Monitoring alerts
// =============================================================================

export function buildMonitoringAlerts(allocations: SectorAllocation[]): MonitoringAlert[] {
    const alerts: MonitoringAlert[] = [];

    for (const sector of allocations) {
        for (const stock of sector.stocks) {
            alerts.push({
                alertType: 'sentiment_change',
                ticker: stock.ticker,
                threshold: 'Sentiment drops below -0.2',
                action: 'Review position',
            });
            alerts.push({
                alertType: 'price_movement',
                ticker: stock.ticker,
                threshold: '10% daily move',
                action: 'Check news and fundamentals',
            });
        }
    }

    alerts.push({
        alertType: 'sector_rotation',
        ticker: null,
        threshold: 'Sector ranking changes significantly',
        action: 'Consider rebalancing',
    });

    return alerts;
}
