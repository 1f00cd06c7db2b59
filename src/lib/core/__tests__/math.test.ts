import { assertNormalized, clamp, mean, normalizeWeights, stdDev } from '../math';
import { degraded, ok, prependReasons, unavailable, unwrapOr, withReasons } from '../result';

describe('normalizeWeights', () => {
    test('scales weights to sum 1', () => {
        expect(normalizeWeights({ a: 2, b: 6 })).toEqual({ a: 0.25, b: 0.75 });
    });

    test('floors negative weights at zero', () => {
        expect(normalizeWeights({ a: -1, b: 1 })).toEqual({ a: 0, b: 1 });
    });

    test('all-zero map → equal weights', () => {
        expect(normalizeWeights({ a: 0, b: 0 })).toEqual({ a: 0.5, b: 0.5 });
    });

    test('empty map stays empty', () => {
        expect(normalizeWeights({})).toEqual({});
    });
});

describe('assertNormalized', () => {
    test('accepts weights within tolerance', () => {
        expect(() => assertNormalized({ a: 0.3333333, b: 0.6666667 }, 'Test')).not.toThrow();
    });

    test('throws with owner prefix when the sum is off', () => {
        expect(() => assertNormalized({ a: 0.5, b: 0.4 }, 'Fuser'))
            .toThrow('Fuser: weights must sum to 1 (got 0.900000)');
    });
});

describe('stats helpers', () => {
    test('mean and population stdDev', () => {
        expect(mean([1, 3])).toBe(2);
        expect(stdDev([1, 3])).toBe(1);
        expect(mean([])).toBe(0);
        expect(stdDev([])).toBe(0);
    });

    test('clamp', () => {
        expect(clamp(1.5, -1, 1)).toBe(1);
        expect(clamp(-3, -1, 1)).toBe(-1);
    });
});

describe('SignalResult', () => {
    test('withReasons is ok without reasons, degraded with them', () => {
        expect(withReasons(1, [])).toEqual({ status: 'ok', value: 1 });
        expect(withReasons(1, ['x'])).toEqual({ status: 'degraded', value: 1, reasons: ['x'] });
    });

    test('unwrapOr falls back only when unavailable', () => {
        expect(unwrapOr(unavailable<number>(['x']), 5)).toBe(5);
        expect(unwrapOr(degraded(2, ['x']), 5)).toBe(2);
    });

    test('prependReasons keeps upstream reasons first', () => {
        expect(prependReasons(ok(1), [])).toEqual({ status: 'ok', value: 1 });
        expect(prependReasons(ok(1), ['a'])).toEqual({ status: 'degraded', value: 1, reasons: ['a'] });
        expect(prependReasons(degraded(1, ['b']), ['a'])).toEqual({ status: 'degraded', value: 1, reasons: ['a', 'b'] });
        expect(prependReasons(unavailable<number>(['b']), ['a'])).toEqual({ status: 'unavailable', reasons: ['a', 'b'] });
    });
});
