/**
 * Numeric helpers shared by the fusers and the allocator.
 */

export const WEIGHT_TOLERANCE = 1e-6;

export function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

export function sum(values: number[]): number {
    return values.reduce((acc, v) => acc + v, 0);
}

export function mean(values: number[]): number {
    return values.length === 0 ? 0 : sum(values) / values.length;
}

/** Population standard deviation (divides by n). */
export function stdDev(values: number[]): number {
    if (values.length === 0) return 0;
    const avg = mean(values);
    return Math.sqrt(mean(values.map(v => (v - avg) ** 2)));
}

/**
 * Scale a weight map so its values sum to 1.
 * Negative weights are floored at 0; an all-zero map becomes equal weights.
 */
export function normalizeWeights(weights: Record<string, number>): Record<string, number> {
    const entries = Object.entries(weights).map(([key, w]) => [key, Math.max(0, w)] as const);
    const total = sum(entries.map(([, w]) => w));

    const result: Record<string, number> = {};
    for (const [key, w] of entries) {
        result[key] = total > 0 ? w / total : 1 / entries.length;
    }
    return result;
}

/**
 * Throws when a weight map does not sum to 1 within tolerance.
 */
export function assertNormalized(weights: Record<string, number>, owner: string): void {
    const values = Object.values(weights);
    if (values.length === 0) return;

    const total = sum(values);
    if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
        throw new Error(`${owner}: weights must sum to 1 (got ${total.toFixed(6)})`);
    }
}
