import { logger } from './logger.js';

export interface BackoffOptions {
    maxRetries?: number;
    initialDelay?: number;
    maxDelay?: number;
    isRetryable: (error: unknown) => boolean;
}

/**
 * Retry a call with exponential backoff and jitter while `isRetryable` holds.
 * Rethrows the last error once retries are exhausted.
 */
export async function withBackoff<T>(
    callback: () => Promise<T>,
    { maxRetries = 5, initialDelay = 1000, maxDelay = 30000, isRetryable }: BackoffOptions
): Promise<T> {
    let retries = 0;
    let delay = initialDelay;

    while (true) {
        try {
            return await callback();
        } catch (error: unknown) {
            if (!isRetryable(error) || retries >= maxRetries) {
                throw error;
            }

            delay = Math.min(delay * 2, maxDelay);
            const jitter = Math.random() * (delay / 4);
            const waitTime = delay + jitter;

            logger.debug(
                `Retrying in ${Math.round(waitTime / 100) / 10}s (retry ${retries + 1}/${maxRetries})`,
                { errorMessage: error instanceof Error ? error.message : String(error) }
            );

            await new Promise((resolve) => setTimeout(resolve, waitTime));
            retries++;
        }
    }
}
