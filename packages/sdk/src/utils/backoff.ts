export interface BackoffOptions {
    initialSeconds?: number;
    multiplier?: number;
    maxSeconds?: number;
    /** Fraction of each delay to randomise by, e.g. 0.1 for ±10%. */
    jitter?: number;
}

// Exponential backoff: base-4 gives 1s → 4s → 16s → 60s (capped at maxSeconds).
// attempt is 1-indexed; attempt=1 waits initialSeconds, attempt=2 waits 4x that, etc.
export function calculateBackOff(attempt: number, options: BackoffOptions = {}): number {
    const { initialSeconds = 1, multiplier = 4, maxSeconds = 60, jitter = 0 } = options;
    let delay = initialSeconds * Math.pow(multiplier, attempt - 1);
    delay = Math.min(delay, maxSeconds);
    if (jitter > 0) {
        const spread = delay * jitter;
        delay += Math.random() * spread * 2 - spread;
    }
    return delay;
}

/** Delay list for `retry`, one entry per retry after the first attempt. */
export function backoffSchedule(retries: number, options: BackoffOptions = {}): number[] {
    return Array.from({ length: Math.max(0, retries) }, (_, index) => calculateBackOff(index + 1, options));
}
