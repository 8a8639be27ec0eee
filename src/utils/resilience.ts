/**
 * Resilience Utility
 *
 * Retry with exponential backoff for the top-level caller of the RAG chains.
 * The retrieval pipeline itself never retries; failures reach this layer untouched.
 */

import { ExtractionError, errorMessage } from "./errors.js";

export const RETRY_DEFAULTS = {
    retries: 3,
    factor: 2,
    minTimeout: 1000,
    maxTimeout: 10000,
};

export type RetryOptions = Partial<typeof RETRY_DEFAULTS> & { name?: string };

function sleep(ms: number) {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Wraps an async operation with exponential backoff retry logic.
 *
 * @param operation The async function to retry
 * @param options Retry configuration
 */
export async function withRetry<T>(
    operation: () => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const config = { ...RETRY_DEFAULTS, ...options };
    const name = options.name || 'Operation';

    for (let attempt = 1; ; attempt++) {
        try {
            return await operation();
        } catch (error: unknown) {
            if (!shouldRetry(error) || attempt > config.retries) {
                console.error(`[Resilience] ${name} failed on attempt ${attempt}. Giving up.`);
                throw error;
            }

            const delay = Math.min(
                config.minTimeout * Math.pow(config.factor, attempt - 1),
                config.maxTimeout
            );

            console.warn(`[Resilience] ${name} failed (Attempt ${attempt}/${config.retries}). Retrying in ${delay}ms... Error: ${errorMessage(error)}`);
            await sleep(delay);
        }
    }
}

export function shouldRetry(error: unknown): boolean {
    // Malformed model output repeats on retry; only transport failures (with a cause) are worth another attempt
    if (error instanceof ExtractionError && error.cause === undefined) {
        return false;
    }

    const message = errorMessage(error);

    // Quota and authentication errors
    if (message.includes('Payment Required') || message.includes('402')) {
        return false;
    }
    if (message.includes('Unauthorized') || message.includes('401')) {
        return false;
    }

    // Retry everything else (Network, 5xx, timeouts)
    return true;
}
