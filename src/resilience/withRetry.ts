/**
 * RETRY / FALLBACK WRAPPER
 *
 * Runs an async operation, retrying retryable failures with exponential
 * backoff, and falls back to a secondary operation once attempts run out.
 * Non-retryable failures (validation, permission, ...) surface at once.
 */

import {Either, Left, Right} from 'purify-ts';
import {RetryPolicy} from '../types';
import {EffectsError} from '../effects/EffectsError';
import {isRetryable, toError} from './errors';

export type RetrySource = 'primary' | 'fallback';

export type RetryResult<T> = {
    readonly value: T;
    readonly source: RetrySource;
    // invocations of the primary operation
    readonly attempts: number;
};

export type RetryOptions<T> = {
    readonly fallback?: () => Promise<T>;
    readonly isRetryable?: (error: unknown) => boolean;
    readonly signal?: AbortSignal;
    readonly onRetry?: (error: Error, attempt: number, delayMs: number) => void;
    readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 4,
    baseDelayMs: 1000,
    backoffMultiplier: 2,
    maxDelayMs: 30_000,
};

// Tuned per operation: cheap reads retry fast, uploads back off longer
export const RETRY_POLICIES = {
    scheduledMessage: {maxAttempts: 4, baseDelayMs: 1000, backoffMultiplier: 2, maxDelayMs: 30_000},
    mediaUpload: {maxAttempts: 3, baseDelayMs: 2000, backoffMultiplier: 2, maxDelayMs: 30_000},
    profileFetch: {maxAttempts: 3, baseDelayMs: 500, backoffMultiplier: 2, maxDelayMs: 5_000},
    profileUpdate: {maxAttempts: 3, baseDelayMs: 1000, backoffMultiplier: 2, maxDelayMs: 10_000},
    notification: {maxAttempts: 2, baseDelayMs: 1000, backoffMultiplier: 1},
} satisfies Record<string, RetryPolicy>;

export function validateRetryPolicy(policy: RetryPolicy): Either<string, RetryPolicy> {
    if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
        return Left(`maxAttempts must be an integer >= 1, got ${policy.maxAttempts}`);
    }
    if (!(policy.baseDelayMs >= 0)) {
        return Left(`baseDelayMs must be >= 0, got ${policy.baseDelayMs}`);
    }
    if (!(policy.backoffMultiplier >= 1)) {
        return Left(`backoffMultiplier must be >= 1, got ${policy.backoffMultiplier}`);
    }
    if (policy.maxDelayMs !== undefined && !(policy.maxDelayMs >= policy.baseDelayMs)) {
        return Left(`maxDelayMs must be >= baseDelayMs, got ${policy.maxDelayMs}`);
    }
    return Right(policy);
}

/**
 * Delay after the given failed attempt (1-based):
 * baseDelay * multiplier^(attempt-1), capped at maxDelayMs.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
    const delay = policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
    return policy.maxDelayMs === undefined ? delay : Math.min(delay, policy.maxDelayMs);
}

function abortReason(signal: AbortSignal): Error {
    return signal.reason instanceof Error ? signal.reason : new Error('Operation aborted');
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(abortReason(signal));
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(signal ? abortReason(signal) : new Error('Operation aborted'));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, {once: true});
    });
}

export async function runWithRetry<T>(
    primary: () => Promise<T>,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    options: RetryOptions<T> = {}
): Promise<RetryResult<T>> {
    validateRetryPolicy(policy).ifLeft(reason => {
        throw new RangeError(`Invalid retry policy: ${reason}`);
    });

    const retryable = options.isRetryable ?? isRetryable;
    const wait = options.sleep ?? sleep;
    let lastError: Error | undefined;
    let attempts = 0;

    while (attempts < policy.maxAttempts) {
        if (options.signal?.aborted) {
            throw abortReason(options.signal);
        }
        attempts++;
        try {
            return {value: await primary(), source: 'primary', attempts};
        } catch (error) {
            if (!retryable(error)) {
                throw error;
            }
            lastError = toError(error);
            if (attempts < policy.maxAttempts) {
                const delayMs = backoffDelay(policy, attempts);
                options.onRetry?.(lastError, attempts, delayMs);
                await wait(delayMs, options.signal);
            }
        }
    }

    const exhausted = lastError ?? new Error('Retry attempts exhausted');
    if (!options.fallback) {
        throw exhausted;
    }
    try {
        return {value: await options.fallback(), source: 'fallback', attempts};
    } catch (fallbackError) {
        throw new EffectsError([exhausted, toError(fallbackError)]);
    }
}

export async function withRetry<T>(
    primary: () => Promise<T>,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    options: RetryOptions<T> = {}
): Promise<T> {
    const result = await runWithRetry(primary, policy, options);
    return result.value;
}
