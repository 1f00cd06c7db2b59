/**
 * Reference Loader
 *
 * Loads the versioned static tables the classifiers run against:
 *   - data/sector-profiles.json    (sector → tickers, ETF, keywords, regex pattern)
 *   - data/financial-keywords.json (relevance keyword set + density factor)
 *
 * Tables are validated once, frozen into read-only sets/maps and cached.
 * Hard fails on a missing or malformed table so a bad deploy never
 * scores against half a table.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

// =============================================================================
// Types
// =============================================================================

export interface SectorProfile {
    sectorId: string;
    etfTicker: string;
    tickers: ReadonlySet<string>;
    keywords: ReadonlySet<string>;
    /** Word-boundary boost pattern (global, case-insensitive), if the sector declares one */
    pattern: RegExp | null;
}

export interface SectorTable {
    version: string;
    profiles: ReadonlyMap<string, SectorProfile>;
}

export interface FinancialKeywordTable {
    version: string;
    densityFactor: number;
    keywords: ReadonlySet<string>;
}

// =============================================================================
// Schemas
// =============================================================================

const sectorProfileSchema = z.object({
    sectorId: z.string().min(1),
    etfTicker: z.string().min(1),
    tickers: z.array(z.string().min(1)),
    keywords: z.array(z.string().min(1)).min(1),
    pattern: z.string().min(1).optional(),
});

const sectorTableSchema = z.object({
    version: z.string().min(1),
    sectors: z.array(sectorProfileSchema).min(1),
});

const financialKeywordSchema = z.object({
    version: z.string().min(1),
    densityFactor: z.number().positive(),
    keywords: z.array(z.string().min(1)).min(1),
});

// =============================================================================
// Builders
// =============================================================================

/**
 * Validate raw sector data and freeze it into a SectorTable.
 * Map iteration order follows file order, which is also the tie-break order.
 */
export function buildSectorTable(raw: unknown): SectorTable {
    const parsed = sectorTableSchema.safeParse(raw);
    if (!parsed.success) {
        throw new Error(`ReferenceLoader: invalid sector table: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }

    const profiles = new Map<string, SectorProfile>();
    for (const sector of parsed.data.sectors) {
        if (profiles.has(sector.sectorId)) {
            throw new Error(`ReferenceLoader: duplicate sector "${sector.sectorId}"`);
        }
        profiles.set(sector.sectorId, {
            sectorId: sector.sectorId,
            etfTicker: sector.etfTicker,
            tickers: new Set(sector.tickers.map(t => t.toUpperCase())),
            keywords: new Set(sector.keywords.map(k => k.toLowerCase())),
            pattern: sector.pattern ? compilePattern(sector.sectorId, sector.pattern) : null,
        });
    }

    return { version: parsed.data.version, profiles };
}

export function buildFinancialKeywordTable(raw: unknown): FinancialKeywordTable {
    const parsed = financialKeywordSchema.safeParse(raw);
    if (!parsed.success) {
        throw new Error(`ReferenceLoader: invalid keyword table: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }

    return {
        version: parsed.data.version,
        densityFactor: parsed.data.densityFactor,
        keywords: new Set(parsed.data.keywords.map(k => k.toLowerCase())),
    };
}

function compilePattern(sectorId: string, source: string): RegExp {
    try {
        return new RegExp(source, 'gi');
    } catch (err) {
        throw new Error(`ReferenceLoader: bad pattern for "${sectorId}": ${err instanceof Error ? err.message : 'unknown'}`);
    }
}

// =============================================================================
// File loading (cached)
// =============================================================================

let sectorCache: { filePath: string; table: SectorTable } | null = null;
let keywordCache: { filePath: string; table: FinancialKeywordTable } | null = null;

function getDefaultDataDir(): string {
    return path.join(process.cwd(), 'data');
}

function readJson(filePath: string): unknown {
    if (!fs.existsSync(filePath)) {
        throw new Error(`ReferenceLoader: file not found: ${filePath}`);
    }
    return JSON.parse(fs.readFileSync(filePath, 'utf8'));
}

/**
 * Load the sector table (defaults to <cwd>/data/sector-profiles.json).
 */
export function loadSectorTable(filePath?: string | null): SectorTable {
    const resolved = filePath || path.join(getDefaultDataDir(), 'sector-profiles.json');

    if (sectorCache && sectorCache.filePath === resolved) {
        console.log('[ReferenceLoader] Sector table cache hit');
        return sectorCache.table;
    }

    const table = buildSectorTable(readJson(resolved));
    console.log(`[ReferenceLoader] Loaded ${table.profiles.size} sector profiles (v${table.version})`);
    sectorCache = { filePath: resolved, table };
    return table;
}

/**
 * Load the financial keyword table (defaults to <cwd>/data/financial-keywords.json).
 */
export function loadFinancialKeywords(filePath?: string | null): FinancialKeywordTable {
    const resolved = filePath || path.join(getDefaultDataDir(), 'financial-keywords.json');

    if (keywordCache && keywordCache.filePath === resolved) {
        console.log('[ReferenceLoader] Keyword table cache hit');
        return keywordCache.table;
    }

    const table = buildFinancialKeywordTable(readJson(resolved));
    console.log(`[ReferenceLoader] Loaded ${table.keywords.size} financial keywords (v${table.version})`);
    keywordCache = { filePath: resolved, table };
    return table;
}

/**
 * Clear cached tables (for testing)
 */
export function clearReferenceCache(): void {
    sectorCache = null;
    keywordCache = null;
}
