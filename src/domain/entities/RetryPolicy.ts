import { TtsError } from './TtsError';

export type BackoffStrategy = 'exponential' | 'fixed';

export interface RetryPolicy {
    /** Total attempts including the first one, always >= 1 */
    readonly maxAttempts: number;
    /** Timeout applied to each individual attempt */
    readonly timeoutMs: number;
    readonly baseDelayMs: number;
    readonly maxDelayMs: number;
    readonly backoff: BackoffStrategy;
    /** Multiply each delay by a random factor in [0.8, 1.2] */
    readonly jitter: boolean;
}

/** Largest delay Node timers honour; anything above fires after 1 ms */
export const MAX_TIMER_MS = 2147483647;

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
    maxAttempts: 10,
    timeoutMs: 30000,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    backoff: 'exponential',
    jitter: true,
});

/**
 * Builds a validated, frozen retry policy from defaults plus overrides.
 * @throws TtsError (InvalidInput) when a value is out of range
 */
export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
    const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...overrides };

    if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
        throw new TtsError('InvalidInput', 'gateway', `maxAttempts must be an integer >= 1, got ${policy.maxAttempts}`);
    }
    if (!(policy.timeoutMs > 0)) {
        throw new TtsError('InvalidInput', 'gateway', `timeoutMs must be positive, got ${policy.timeoutMs}`);
    }
    if (policy.timeoutMs > MAX_TIMER_MS) {
        throw new TtsError('InvalidInput', 'gateway', `timeoutMs must be at most ${MAX_TIMER_MS}, got ${policy.timeoutMs}`);
    }
    if (!(policy.baseDelayMs >= 0) || !(policy.maxDelayMs >= 0)) {
        throw new TtsError('InvalidInput', 'gateway', 'Retry delays must be non-negative');
    }
    if (policy.maxDelayMs > MAX_TIMER_MS) {
        throw new TtsError('InvalidInput', 'gateway', `maxDelayMs must be at most ${MAX_TIMER_MS}, got ${policy.maxDelayMs}`);
    }
    if (policy.maxDelayMs < policy.baseDelayMs) {
        throw new TtsError(
            'InvalidInput',
            'gateway',
            `maxDelayMs (${policy.maxDelayMs}) must not be below baseDelayMs (${policy.baseDelayMs})`
        );
    }

    return Object.freeze(policy);
}
