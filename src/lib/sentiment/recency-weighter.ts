/**
 * Recency Weighter
 *
 * Exponential time decay toward a floor:
 *
 *   weight = clip(minWeight + (1 - minWeight) * exp(-hoursAgo / decayHours), minWeight, 1)
 *
 * Unknown age is never penalized: an unparsable timestamp or one in the
 * future gets full weight.
 */

import { clamp } from '../core/math';
import type { RecencyConfig } from '../config/engine-config';

export interface RecencyOptions extends RecencyConfig {
    /** Reference time in epoch ms (defaults to Date.now()) */
    now?: number;
}

const DEFAULT_RECENCY: RecencyConfig = { decayHours: 24, minWeight: 0.1 };
const MS_PER_HOUR = 3_600_000;

// Anything below this is epoch seconds, not ms (1e12 ms ≈ Sep 2001)
const EPOCH_MS_CUTOFF = 1e12;

const COMPACT_RE = /^(\d{4})(\d{2})(\d{2})(?:T(\d{2})(\d{2})(\d{2})?)?$/;
const SPACED_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})(?::(\d{2}))?$/;
const NAIVE_ISO_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?$/;

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a provider timestamp into epoch ms.
 *
 * Accepts ISO-8601, "YYYY-MM-DD HH:MM:SS", compact "YYYYMMDDTHHMMSS",
 * epoch seconds/ms and anything Date.parse understands. Timestamps
 * without an offset are read as UTC. Returns null when nothing matches.
 */
export function parseTimestamp(raw: string | number | null | undefined): number | null {
    if (raw == null) return null;

    if (typeof raw === 'number') {
        return fromEpoch(raw);
    }

    const value = raw.trim();
    if (value === '') return null;

    const compact = COMPACT_RE.exec(value);
    if (compact) {
        const [, y, mo, d, h = '0', mi = '0', s = '0'] = compact;
        return utc(y, mo, d, h, mi, s);
    }

    if (/^\d+(\.\d+)?$/.test(value)) {
        return fromEpoch(Number(value));
    }

    const spaced = SPACED_RE.exec(value);
    if (spaced) {
        const [, y, mo, d, h, mi, s = '0'] = spaced;
        return utc(y, mo, d, h, mi, s);
    }

    const parsed = Date.parse(NAIVE_ISO_RE.test(value) ? `${value}Z` : value);
    return isNaN(parsed) ? null : parsed;
}

function fromEpoch(value: number): number | null {
    if (!Number.isFinite(value) || value < 0) return null;
    return value < EPOCH_MS_CUTOFF ? value * 1000 : value;
}

/** Null when any field is out of range (Date.UTC would roll it over). */
function utc(y: string, mo: string, d: string, h: string, mi: string, s: string): number | null {
    const fields = [y, mo, d, h, mi, s].map(Number);
    const [year, month, day, hour, minute, second] = fields;
    const ms = Date.UTC(year, month - 1, day, hour, minute, second);
    const date = new Date(ms);
    const roundTrip = [
        date.getUTCFullYear(),
        date.getUTCMonth() + 1,
        date.getUTCDate(),
        date.getUTCHours(),
        date.getUTCMinutes(),
        date.getUTCSeconds(),
    ];
    return roundTrip.every((value, i) => value === fields[i]) ? ms : null;
}

// =============================================================================
// Weight
// =============================================================================

/**
 * Decay weight for an item published at `publishedAt`.
 */
export function computeTimeWeight(
    publishedAt: string | number | null | undefined,
    options: Partial<RecencyOptions> = {},
): number {
    const decayHours = options.decayHours != null && options.decayHours > 0
        ? options.decayHours
        : DEFAULT_RECENCY.decayHours;
    const minWeight = clamp(options.minWeight ?? DEFAULT_RECENCY.minWeight, 0, 1);
    const now = options.now ?? Date.now();

    const publishedMs = parseTimestamp(publishedAt);
    if (publishedMs === null) return 1.0;

    const hoursAgo = (now - publishedMs) / MS_PER_HOUR;
    if (hoursAgo <= 0) return 1.0;

    const weight = minWeight + (1 - minWeight) * Math.exp(-hoursAgo / decayHours);
    return clamp(weight, minWeight, 1.0);
}
