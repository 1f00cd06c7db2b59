#!/usr/bin/env npx ts-node
/**
 * Portfolio Allocation CLI
 *
 * Ranks pre-computed sector scores and allocates a portfolio across the
 * stocks of the selected sectors.
 *
 * Usage: npm run allocate [-- path/to/input.json]
 *
 * Defaults to data/example-allocation-input.json
 */

import 'dotenv/config';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { getEngineConfig } from '../src/lib/config/engine-config';
import { allocatePortfolio } from '../src/lib/portfolio/portfolio-allocator';
import { RISK_TOLERANCES, isRiskTolerance } from '../src/lib/portfolio/risk-profiles';
import { loadSectorTable } from '../src/lib/reference/reference-loader';
import { rankSectors } from '../src/lib/sectors/sector-ranker';

const DEFAULT_INPUT = 'data/example-allocation-input.json';

const scoreSchema = z.object({
    score: z.number().min(-1).max(1),
    confidence: z.number().min(0).max(1),
});

const inputSchema = z.object({
    riskTolerance: z.string().refine(isRiskTolerance, {
        message: `riskTolerance must be one of ${RISK_TOLERANCES.join(', ')}`,
    }).optional(),
    portfolioSize: z.number(),
    maxSectors: z.number().int().optional(),
    stocksPerSector: z.number().int().optional(),
    sectorScores: z.record(scoreSchema.extend({ itemCount: z.number().int().nonnegative() })),
    stockScores: z.record(z.array(scoreSchema.extend({ ticker: z.string().min(1) }))),
});

function formatUsd(value: number): string {
    return `$${value.toFixed(2)}`;
}

async function main() {
    const inputPath = path.resolve(process.cwd(), process.argv[2] ?? DEFAULT_INPUT);

    console.log('═══════════════════════════════════════════════════════════════');
    console.log('  Sector Ranking & Portfolio Allocation');
    console.log('═══════════════════════════════════════════════════════════════');
    console.log(`Input: ${inputPath}`);
    console.log();

    const parsed = inputSchema.safeParse(JSON.parse(fs.readFileSync(inputPath, 'utf-8')));
    if (!parsed.success) {
        console.error('ERROR: Invalid allocation input');
        for (const issue of parsed.error.issues) {
            console.error(`  ${issue.path.join('.')}: ${issue.message}`);
        }
        process.exit(1);
    }

    const input = parsed.data;
    const config = getEngineConfig();
    const riskTolerance = input.riskTolerance !== undefined && isRiskTolerance(input.riskTolerance)
        ? input.riskTolerance
        : config.portfolio.defaultRiskTolerance;

    const ranking = rankSectors(input.sectorScores, {
        ...config.sectors,
        table: loadSectorTable(config.referenceData.sectorProfilesPath),
    });

    console.log('Sector ranking:');
    for (const r of ranking.rankings) {
        console.log(
            `  #${r.rank} ${r.sectorId.padEnd(24)} score=${r.score.toFixed(3)} conf=${r.confidence.toFixed(2)} ` +
            `${r.recommendationTier.padEnd(11)} ${r.etfTicker ?? '-'}`,
        );
    }
    console.log();

    const recommendation = allocatePortfolio({
        sectorRanking: ranking,
        stockScoresBySector: input.stockScores,
        riskTolerance,
        portfolioSize: input.portfolioSize,
        maxSectors: input.maxSectors,
        stocksPerSector: input.stocksPerSector,
        commissionPerTrade: config.portfolio.commissionPerTrade,
    });

    console.log(`Allocation (${riskTolerance}, ${formatUsd(recommendation.portfolioSize)}):`);
    for (const sector of recommendation.allocations) {
        console.log(`  ${sector.sectorId}: ${formatUsd(sector.sectorAllocation)} (${sector.sectorPct.toFixed(1)}%)`);
        for (const stock of sector.stocks) {
            console.log(`    ${stock.ticker.padEnd(6)} ${formatUsd(stock.allocation).padStart(12)}  ${stock.recommendationLabel}`);
        }
    }
    if (recommendation.skippedSectors.length > 0) {
        console.log(`  Skipped (no stock scores): ${recommendation.skippedSectors.join(', ')}`);
    }
    if (recommendation.unfundedSectors.length > 0) {
        console.log(`  Not funded (zero weight): ${recommendation.unfundedSectors.join(', ')}`);
    }
    console.log();

    const risk = recommendation.riskAssessment;
    console.log(`Risk tier: ${risk.riskTier}`);
    console.log(`  Concentration: ${risk.sectorConcentrationPct.toFixed(1)}%`);
    console.log(`  Diversification: ${risk.diversificationScore.toFixed(0)}/100`);
    console.log(`  Sentiment std dev: ${risk.sentimentStdDev.toFixed(3)}`);
    for (const rec of risk.recommendations) {
        console.log(`  - ${rec}`);
    }
    console.log();

    const plan = recommendation.executionPlan;
    console.log(`Execution: ${plan.steps.length} orders, ${formatUsd(plan.totalInvestment)} + ${formatUsd(plan.estimatedCommissions)} commissions over ${plan.timeline}`);
}

main().catch(error => {
    console.error('Allocation failed:', error);
    process.exit(1);
});
