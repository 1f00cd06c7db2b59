/**
 * Signal Result
 *
 * Status-tagged wrapper for anything computed from external signal.
 * Lets callers tell "computed from real data" apart from "defaulted".
 *
 *   ok          – every input contributed
 *   degraded    – a value exists but some inputs were missing or failed
 *   unavailable – nothing to compute from
 */

export type SignalResult<T> =
    | { status: 'ok'; value: T }
    | { status: 'degraded'; value: T; reasons: string[] }
    | { status: 'unavailable'; reasons: string[] };

export function ok<T>(value: T): SignalResult<T> {
    return { status: 'ok', value };
}

export function degraded<T>(value: T, reasons: string[]): SignalResult<T> {
    return { status: 'degraded', value, reasons };
}

export function unavailable<T>(reasons: string[]): SignalResult<T> {
    return { status: 'unavailable', reasons };
}

/**
 * ok when there is nothing to report, degraded otherwise.
 */
export function withReasons<T>(value: T, reasons: string[]): SignalResult<T> {
    return reasons.length > 0 ? degraded(value, reasons) : ok(value);
}

export function unwrapOr<T>(result: SignalResult<T>, fallback: T): T {
    return result.status === 'unavailable' ? fallback : result.value;
}

/**
 * Prepend upstream reasons (e.g. fetch failures) to a downstream result.
 */
export function prependReasons<T>(result: SignalResult<T>, reasons: string[]): SignalResult<T> {
    if (reasons.length === 0) return result;
    if (result.status === 'unavailable') return unavailable([...reasons, ...result.reasons]);
    const existing = result.status === 'degraded' ? result.reasons : [];
    return degraded(result.value, [...reasons, ...existing]);
}
