import { DEFAULT_ENGINE_CONFIG, getEngineConfig } from '../engine-config';

const ENV_KEYS = [
    'RECENCY_DECAY_HOURS',
    'RECENCY_MIN_WEIGHT',
    'GENERAL_MARKET_WEIGHT',
    'STOCK_SPECIFIC_WEIGHT',
    'NEWS_CHANNEL_WEIGHT',
    'SOCIAL_FORUM_CHANNEL_WEIGHT',
    'MICROBLOG_CHANNEL_WEIGHT',
    'CATEGORY_LABEL_THRESHOLD',
    'COMBINED_LABEL_THRESHOLD',
    'CHANNEL_STRONG_THRESHOLD',
    'CHANNEL_WEAK_THRESHOLD',
    'SECTOR_TIER_THRESHOLD',
    'SECTOR_MIN_ITEMS',
    'COMMISSION_PER_TRADE',
    'DEFAULT_RISK_TOLERANCE',
    'SECTOR_PROFILES_PATH',
    'FINANCIAL_KEYWORDS_PATH',
];

describe('getEngineConfig', () => {
    const saved: Record<string, string | undefined> = {};

    beforeEach(() => {
        for (const key of ENV_KEYS) {
            saved[key] = process.env[key];
            delete process.env[key];
        }
    });

    afterEach(() => {
        for (const key of ENV_KEYS) {
            if (saved[key] === undefined) {
                delete process.env[key];
            } else {
                process.env[key] = saved[key];
            }
        }
    });

    test('no env → defaults', () => {
        expect(getEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
    });

    test('numeric overrides are parsed', () => {
        process.env.RECENCY_DECAY_HOURS = '12';
        process.env.STOCK_SPECIFIC_WEIGHT = '0.7';
        process.env.SECTOR_MIN_ITEMS = '3';
        process.env.COMMISSION_PER_TRADE = '4.95';

        const config = getEngineConfig();
        expect(config.recency.decayHours).toBe(12);
        expect(config.combined.stockSpecificWeight).toBe(0.7);
        expect(config.sectors.minItemCount).toBe(3);
        expect(config.portfolio.commissionPerTrade).toBe(4.95);
    });

    test('unparsable numbers fall back to defaults', () => {
        process.env.NEWS_CHANNEL_WEIGHT = 'abc';
        expect(getEngineConfig().channels.newsWeight).toBe(0.4);
    });

    test('risk tolerance is case-insensitive; unknown values fall back', () => {
        process.env.DEFAULT_RISK_TOLERANCE = 'AGGRESSIVE';
        expect(getEngineConfig().portfolio.defaultRiskTolerance).toBe('aggressive');

        process.env.DEFAULT_RISK_TOLERANCE = 'reckless';
        expect(getEngineConfig().portfolio.defaultRiskTolerance).toBe('moderate');
    });

    test('reference data paths', () => {
        process.env.SECTOR_PROFILES_PATH = '/tmp/sectors.json';
        const config = getEngineConfig();
        expect(config.referenceData.sectorProfilesPath).toBe('/tmp/sectors.json');
        expect(config.referenceData.financialKeywordsPath).toBeNull();
    });
});
