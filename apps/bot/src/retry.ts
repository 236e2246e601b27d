// Retry policy for indexer requests
// Only transport-level failures are retried; GraphQL errors come back with 200 and fail at once
import axios from 'axios';
import pino from 'pino';

const logger = pino({ name: 'retry', level: process.env.LOG_LEVEL || 'info' });

export interface RetryPolicy {
    /** Attempts after the first one */
    maxRetries: number;
    baseDelayMs: number;
}

/**
 * Network errors, timeouts, 429 and 5xx
 */
export function isTransientHttpError(error: unknown): boolean {
    if (!axios.isAxiosError(error)) return false;
    const status = error.response?.status;
    return status === undefined || status === 429 || status >= 500;
}

/**
 * Delay before retry number `attempt` (0-based): doubling, plus up to half a base delay of jitter
 */
export function backoffDelay(attempt: number, baseDelayMs: number, random: () => number = Math.random): number {
    return baseDelayMs * 2 ** attempt + Math.floor(random() * (baseDelayMs / 2));
}

/**
 * Run a request, repeating it on transient HTTP failures. Any other error,
 * or the last transient one, is rethrown as is.
 */
export async function retryTransient<T>(label: string, policy: RetryPolicy, request: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
        try {
            return await request();
        } catch (error) {
            if (!isTransientHttpError(error)) throw error;
            if (attempt >= policy.maxRetries) {
                logger.error({ label, attempts: attempt + 1 }, 'Transient failures persisted, giving up');
                throw error;
            }

            const delayMs = backoffDelay(attempt, policy.baseDelayMs);
            logger.warn({
                label,
                attempt: attempt + 1,
                maxRetries: policy.maxRetries,
                delayMs,
                status: axios.isAxiosError(error) ? error.response?.status : undefined,
            }, 'Transient failure, retrying');
            await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
        }
    }
}
