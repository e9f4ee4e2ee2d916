import { setTimeout as sleep } from 'timers/promises';
import { logger } from "./logger";
import {
    MAX_RETRY_ATTEMPTS,
    RETRY_INITIAL_DELAY_MS,
    RETRY_MAX_DELAY_MS,
} from "../config/keyphrase-extraction";

export interface RetryOptions {
    maxAttempts?: number;
    initialDelay?: number;
    maxDelay?: number;
    signal?: AbortSignal;
    onRetry?: (attempt: number, error: unknown) => void;
}

export class RetryAbortedError extends Error {
    constructor(readonly attempts: number, readonly lastError: unknown) {
        super(`Retry aborted after ${attempts} attempt(s)`);
        this.name = 'RetryAbortedError';
    }
}

export function backoffDelay(attempt: number, initialDelay: number, maxDelay: number): number {
    // Ensure delay is at least 1ms to prevent negative timeout warnings
    return Math.max(1, Math.min(initialDelay * Math.pow(2, attempt), maxDelay));
}

// Retry helper with exponential backoff
export async function retryWithBackoff<T>(
    fn: (attempt: number) => Promise<T>,
    {
        maxAttempts = MAX_RETRY_ATTEMPTS,
        initialDelay = RETRY_INITIAL_DELAY_MS,
        maxDelay = RETRY_MAX_DELAY_MS,
        signal,
        onRetry,
    }: RetryOptions = {}
): Promise<T> {
    let lastError: Error | unknown;
    for (let attempt = 0; attempt < maxAttempts; attempt++) {
        if (signal?.aborted) {
            throw new RetryAbortedError(attempt, lastError);
        }
        try {
            return await fn(attempt);
        } catch (error) {
            lastError = error;
            if (attempt < maxAttempts - 1) {
                const delay = backoffDelay(attempt, initialDelay, maxDelay);
                logger.debug(`Retry attempt ${attempt + 1}/${maxAttempts} after ${delay}ms`, { error: error instanceof Error ? error.message : String(error) });
                onRetry?.(attempt + 1, error);
                try {
                    await sleep(delay, undefined, { signal });
                } catch {
                    // Only an abort rejects the sleep
                    throw new RetryAbortedError(attempt + 1, lastError);
                }
            }
        }
    }
    throw lastError || new Error("Retry failed");
}
