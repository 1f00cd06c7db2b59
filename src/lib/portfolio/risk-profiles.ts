/**
 * Risk Profiles
 *
 * Named presets controlling how much capital follows an even split versus
 * sentiment skew, plus the sector eligibility filter for each tolerance.
 * Immutable after module load.
 */

import { assertNormalized } from '../core/math';

export type RiskTolerance = 'conservative' | 'moderate' | 'aggressive';

export const RISK_TOLERANCES: readonly RiskTolerance[] = ['conservative', 'moderate', 'aggressive'];

export interface RiskProfile {
    equalWeight: number;
    performanceWeight: number;
    /** Sector must have at least this confidence */
    minConfidence: number;
    /** Sector must have at least this score; null = no score floor */
    minScore: number | null;
}

export const RISK_PROFILES: Readonly<Record<RiskTolerance, Readonly<RiskProfile>>> = Object.freeze({
    conservative: Object.freeze({ equalWeight: 0.8, performanceWeight: 0.2, minConfidence: 0.5, minScore: 0 }),
    moderate: Object.freeze({ equalWeight: 0.6, performanceWeight: 0.4, minConfidence: 0.3, minScore: -0.1 }),
    aggressive: Object.freeze({ equalWeight: 0.4, performanceWeight: 0.6, minConfidence: 0.2, minScore: null }),
});

for (const tolerance of RISK_TOLERANCES) {
    const { equalWeight, performanceWeight } = RISK_PROFILES[tolerance];
    assertNormalized({ equalWeight, performanceWeight }, `RiskProfile(${tolerance})`);
}

export function isRiskTolerance(value: unknown): value is RiskTolerance {
    return RISK_TOLERANCES.some(t => t === value);
}

/**
 * Lenient parse for user input; unknown values fall back.
 */
export function parseRiskTolerance(raw: string | null | undefined, fallback: RiskTolerance = 'moderate'): RiskTolerance {
    const normalized = (raw || '').trim().toLowerCase();
    return isRiskTolerance(normalized) ? normalized : fallback;
}

export function passesRiskFilter(
    sector: { score: number; confidence: number },
    profile: RiskProfile,
): boolean {
    if (sector.confidence < profile.minConfidence) return false;
    if (profile.minScore !== null && sector.score < profile.minScore) return false;
    return true;
}
