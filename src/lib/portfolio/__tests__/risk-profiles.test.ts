import {
    isRiskTolerance,
    parseRiskTolerance,
    passesRiskFilter,
    RISK_PROFILES,
    RISK_TOLERANCES,
} from '../risk-profiles';

describe('RISK_PROFILES', () => {
    test('equal + performance weights sum to 1 for every preset', () => {
        for (const tolerance of RISK_TOLERANCES) {
            const { equalWeight, performanceWeight } = RISK_PROFILES[tolerance];
            expect(equalWeight + performanceWeight).toBeCloseTo(1, 10);
        }
    });

    test('presets are frozen', () => {
        expect(Object.isFrozen(RISK_PROFILES)).toBe(true);
        expect(Object.isFrozen(RISK_PROFILES.moderate)).toBe(true);
    });

    test('conservative trusts the even split most', () => {
        expect(RISK_PROFILES.conservative.equalWeight).toBe(0.8);
        expect(RISK_PROFILES.aggressive.performanceWeight).toBe(0.6);
    });
});

describe('parseRiskTolerance', () => {
    test('trims and lower-cases', () => {
        expect(parseRiskTolerance(' Aggressive ')).toBe('aggressive');
    });

    test('unknown input falls back', () => {
        expect(parseRiskTolerance('bogus')).toBe('moderate');
        expect(parseRiskTolerance(undefined, 'conservative')).toBe('conservative');
    });

    test('isRiskTolerance', () => {
        expect(isRiskTolerance('moderate')).toBe(true);
        expect(isRiskTolerance('Moderate')).toBe(false);
        expect(isRiskTolerance(3)).toBe(false);
    });
});

describe('passesRiskFilter', () => {
    test('conservative needs a non-negative score and confidence ≥ 0.5', () => {
        expect(passesRiskFilter({ score: 0, confidence: 0.5 }, RISK_PROFILES.conservative)).toBe(true);
        expect(passesRiskFilter({ score: -0.01, confidence: 0.9 }, RISK_PROFILES.conservative)).toBe(false);
        expect(passesRiskFilter({ score: 0.5, confidence: 0.49 }, RISK_PROFILES.conservative)).toBe(false);
    });

    test('moderate tolerates mildly negative sectors', () => {
        expect(passesRiskFilter({ score: -0.1, confidence: 0.3 }, RISK_PROFILES.moderate)).toBe(true);
        expect(passesRiskFilter({ score: -0.11, confidence: 0.3 }, RISK_PROFILES.moderate)).toBe(false);
    });

    test('aggressive has no score floor', () => {
        expect(passesRiskFilter({ score: -0.9, confidence: 0.2 }, RISK_PROFILES.aggressive)).toBe(true);
        expect(passesRiskFilter({ score: 0.9, confidence: 0.19 }, RISK_PROFILES.aggressive)).toBe(false);
    });
});
