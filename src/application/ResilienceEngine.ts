import { ProviderName } from '../domain/entities/Capability';
import { DEFAULT_RETRY_POLICY, RetryPolicy } from '../domain/entities/RetryPolicy';
import { cancelledError, TtsError } from '../domain/entities/TtsError';
import { IMetricsPort, METRICS, NoOpMetricsAdapter } from '../domain/ports/IMetricsPort';
import { AdapterCallContext } from '../domain/ports/ITtsProviderAdapter';
import { ErrorNormalizer, retryDisposition } from './ErrorNormalizer';

/**
 * A single adapter call, described so the engine can attribute attempts.
 */
export interface ProviderCall<T> {
    provider: ProviderName;
    operation: string;
    run(ctx: AdapterCallContext): Promise<T>;
}

export interface AttemptRecord {
    provider: ProviderName;
    operation: string;
    attempt: number;
    durationMs: number;
    outcome: 'success' | 'failure';
    error?: TtsError;
    /** Set when another attempt follows */
    nextDelayMs?: number;
}

export interface ExecuteOptions {
    /** Overrides the engine's default policy for this call */
    policy?: RetryPolicy;
    /** Aborting stops the call immediately; the result is a cancelled Internal error */
    signal?: AbortSignal;
    onAttempt?: (record: AttemptRecord) => void;
}

export type ExecutionOutcome<T> =
    | { ok: true; value: T; attempts: number }
    | { ok: false; error: TtsError; attempts: number };

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ResilienceEngineOptions {
    policy?: RetryPolicy;
    normalizer?: ErrorNormalizer;
    metrics?: IMetricsPort;
    sleep?: SleepFn;
    /** Source of randomness for jitter, returns [0, 1) */
    random?: () => number;
}

/**
 * Sleep that resolves early when the signal aborts.
 */
export const abortableSleep: SleepFn = (ms, signal) =>
    new Promise<void>(resolve => {
        if (signal?.aborted || ms <= 0) {
            resolve();
            return;
        }
        const done = () => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        };
        const timer = setTimeout(done, ms);
        signal?.addEventListener('abort', done, { once: true });
    });

/**
 * Delay before the attempt following `attempt` (1-based).
 * Exponential: base * 2^(attempt-1). Jitter scales by [0.8, 1.2].
 * A provider Retry-After is honored, and the cap always applies.
 */
export function computeBackoffDelay(
    attempt: number,
    policy: RetryPolicy,
    random: () => number = Math.random,
    retryAfterMs?: number
): number {
    let delay = policy.backoff === 'fixed'
        ? policy.baseDelayMs
        : policy.baseDelayMs * Math.pow(2, attempt - 1);

    if (policy.jitter) {
        delay = delay * (0.8 + random() * 0.4);
    }
    if (retryAfterMs !== undefined) {
        delay = Math.max(delay, retryAfterMs);
    }
    return Math.round(Math.min(delay, policy.maxDelayMs));
}

/**
 * Wraps every adapter call with a per-attempt timeout, bounded retry and error normalization.
 * Holds no state between calls: each run starts a fresh attempt counter.
 */
export class ResilienceEngine {
    private readonly policy: RetryPolicy;
    private readonly normalizer: ErrorNormalizer;
    private readonly metrics: IMetricsPort;
    private readonly sleep: SleepFn;
    private readonly random: () => number;

    constructor(options: ResilienceEngineOptions = {}) {
        this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
        this.normalizer = options.normalizer ?? new ErrorNormalizer();
        this.metrics = options.metrics ?? new NoOpMetricsAdapter();
        this.sleep = options.sleep ?? abortableSleep;
        this.random = options.random ?? Math.random;
    }

    get defaultPolicy(): RetryPolicy {
        return this.policy;
    }

    /**
     * Runs the call and rejects with the final TtsError (attempts set) on failure.
     */
    async execute<T>(call: ProviderCall<T>, options: ExecuteOptions = {}): Promise<T> {
        const outcome = await this.run(call, options);
        if (outcome.ok) {
            return outcome.value;
        }
        throw outcome.error;
    }

    /**
     * Runs the call and reports the outcome as a value. Never rejects.
     */
    async run<T>(call: ProviderCall<T>, options: ExecuteOptions = {}): Promise<ExecutionOutcome<T>> {
        const policy = options.policy ?? this.policy;
        const tags = { provider: call.provider, operation: call.operation };
        let internalRetried = false;

        for (let attempt = 1; ; attempt++) {
            if (options.signal?.aborted) {
                return this.cancelled(call, attempt - 1);
            }

            const startedAt = Date.now();
            this.metrics.incrementCounter(METRICS.ATTEMPTS_TOTAL, tags);

            try {
                const value = await this.attemptOnce(call, attempt, policy.timeoutMs, options.signal);
                const durationMs = Date.now() - startedAt;
                this.metrics.recordDuration(METRICS.ATTEMPT_DURATION, durationMs, { ...tags, outcome: 'success' });
                options.onAttempt?.({ ...tags, attempt, durationMs, outcome: 'success' });
                if (attempt > 1) {
                    console.log(`[Resilience] ${call.provider}.${call.operation} succeeded on attempt ${attempt}`);
                }
                return { ok: true, value, attempts: attempt };
            } catch (raw) {
                const durationMs = Date.now() - startedAt;
                const error = this.normalizer.normalize(call.provider, raw);
                this.metrics.recordDuration(METRICS.ATTEMPT_DURATION, durationMs, { ...tags, outcome: 'failure' });

                if (options.signal?.aborted || error.isCancellation) {
                    options.onAttempt?.({ ...tags, attempt, durationMs, outcome: 'failure', error });
                    return this.cancelled(call, attempt);
                }

                const disposition = retryDisposition(error);
                const retryable = disposition === 'always' || (disposition === 'once' && !internalRetried);

                if (!retryable || attempt >= policy.maxAttempts) {
                    options.onAttempt?.({ ...tags, attempt, durationMs, outcome: 'failure', error });
                    this.metrics.incrementCounter(METRICS.FAILURES_TOTAL, { ...tags, kind: error.kind });
                    console.error(
                        `[Resilience] ${call.provider}.${call.operation} failed after ${attempt} attempt(s): ${error.kind} - ${error.message}`
                    );
                    return { ok: false, error: error.withAttempts(attempt), attempts: attempt };
                }

                if (error.kind === 'Internal') {
                    internalRetried = true;
                }

                const nextDelayMs = computeBackoffDelay(attempt, policy, this.random, error.retryAfterMs);
                options.onAttempt?.({ ...tags, attempt, durationMs, outcome: 'failure', error, nextDelayMs });
                this.metrics.incrementCounter(METRICS.RETRIES_TOTAL, { ...tags, kind: error.kind });
                console.warn(
                    `[Resilience] ${call.provider}.${call.operation} attempt ${attempt}/${policy.maxAttempts} failed (${error.kind}): ${error.message}. Retrying in ${nextDelayMs}ms`
                );

                await this.sleep(nextDelayMs, options.signal);
            }
        }
    }

    /**
     * One attempt under the per-attempt timeout. The adapter sees an AbortSignal that fires on
     * timeout or on external cancellation; the attempt settles at once in either case.
     */
    private attemptOnce<T>(
        call: ProviderCall<T>,
        attempt: number,
        timeoutMs: number,
        external?: AbortSignal
    ): Promise<T> {
        const controller = new AbortController();

        return new Promise<T>((resolve, reject) => {
            let settled = false;

            const settle = (finish: () => void) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                external?.removeEventListener('abort', onExternalAbort);
                finish();
            };

            const onExternalAbort = () => {
                controller.abort();
                settle(() => reject(cancelledError(call.provider, call.operation)));
            };

            const timer = setTimeout(() => {
                controller.abort();
                settle(() => reject(new TtsError(
                    'Timeout',
                    call.provider,
                    `${call.operation} timed out after ${timeoutMs}ms`,
                    { code: 'attempt_timeout' }
                )));
            }, timeoutMs);

            external?.addEventListener('abort', onExternalAbort, { once: true });

            Promise.resolve()
                .then(() => call.run({ signal: controller.signal, attempt }))
                .then(
                    value => settle(() => resolve(value)),
                    error => settle(() => reject(error))
                );
        });
    }

    private cancelled<T>(call: ProviderCall<T>, attempts: number): ExecutionOutcome<T> {
        console.warn(`[Resilience] ${call.provider}.${call.operation} cancelled after ${attempts} attempt(s)`);
        return { ok: false, error: cancelledError(call.provider, call.operation).withAttempts(attempts), attempts };
    }
}
