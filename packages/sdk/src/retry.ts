import { currentContext } from './context';
import { describeError, RetryExhaustedError } from './errors';
import { Logger } from './logger';

// Longest delay a Node timer can hold (2^31 - 1 ms).
export const MAX_RETRY_DELAY_SECONDS = 2_147_483.647;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
    sleep?: Sleep;
    logger?: Logger;
}

/**
 * Runs `operation`, retrying after each failure with the next delay (in seconds)
 * from `delays`. An empty list means a single attempt. Once the delays run out
 * the last failure is re-thrown.
 */
export async function retry<R>(
    delays: readonly number[],
    operation: () => Promise<R>,
    options: RetryOptions = {},
): Promise<R> {
    for (const delay of delays) {
        if (!Number.isFinite(delay) || delay < 0) {
            throw new RangeError(`Retry delays must be non-negative numbers of seconds, got ${delay}`);
        }
        if (delay > MAX_RETRY_DELAY_SECONDS) {
            throw new RangeError(`Retry delay ${delay}s exceeds the maximum of ${MAX_RETRY_DELAY_SECONDS}s`);
        }
    }

    const logger = options.logger ?? currentContext().logger;
    const wait = options.sleep ?? sleep;
    const backoff = [...delays];
    let attempts = 0;

    for (;;) {
        attempts++;
        try {
            const result = await operation();
            if (attempts > 1) {
                logger.debug(`Successful after ${attempts - 1} retry attempt(s)`);
            }
            return result;
        } catch (err) {
            logger.debug(`Attempt failed: ${describeError(err)}`);
            if (backoff.length === 0) {
                logger.debug('All attempts failed. Not retrying.');
                throw err;
            }
        }

        const delay = backoff.shift();
        if (delay === undefined) {
            throw new RetryExhaustedError(attempts);
        }
        logger.debug(`Retrying in ${delay}s...`);
        await wait(delay * 1000);
    }
}
