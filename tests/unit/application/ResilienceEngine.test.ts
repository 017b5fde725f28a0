import { AttemptRecord, computeBackoffDelay, ResilienceEngine } from '../../../src/application/ResilienceEngine';
import { ProviderFailure } from '../../../src/domain/entities/ProviderFailure';
import { createRetryPolicy } from '../../../src/domain/entities/RetryPolicy';
import { TtsError } from '../../../src/domain/entities/TtsError';
import { AdapterCallContext } from '../../../src/domain/ports/ITtsProviderAdapter';
import { RecordingMetrics, testPolicy } from '../../helpers/FakeTtsAdapter';

function callOf<T>(run: (ctx: AdapterCallContext) => Promise<T>) {
    return { provider: 'polly' as const, operation: 'synthesize', run };
}

describe('ResilienceEngine', () => {
    let sleep: jest.Mock<Promise<void>, [number, AbortSignal | undefined]>;
    let metrics: RecordingMetrics;
    let engine: ResilienceEngine;

    beforeEach(() => {
        sleep = jest.fn<Promise<void>, [number, AbortSignal | undefined]>(async () => undefined);
        metrics = new RecordingMetrics();
        engine = new ResilienceEngine({ policy: testPolicy({ maxAttempts: 3 }), sleep, metrics });
    });

    it('should succeed after N-1 retryable failures in exactly N attempts', async () => {
        const run = jest.fn<Promise<string>, [AdapterCallContext]>()
            .mockRejectedValueOnce(new ProviderFailure('down', { status: 503 }))
            .mockRejectedValueOnce(new ProviderFailure('throttled', { status: 429 }))
            .mockResolvedValueOnce('audio');

        const outcome = await engine.run(callOf(run));

        expect(outcome).toEqual({ ok: true, value: 'audio', attempts: 3 });
        expect(run).toHaveBeenCalledTimes(3);
        expect(run.mock.calls.map(([ctx]) => ctx.attempt)).toEqual([1, 2, 3]);
        expect(sleep).toHaveBeenCalledTimes(2);
        expect(metrics.count('tts.attempts_total')).toBe(3);
        expect(metrics.count('tts.retries_total')).toBe(2);
    });

    it('should surface the normalized error after exactly N attempts when always retryable', async () => {
        const run = jest.fn<Promise<string>, [AdapterCallContext]>()
            .mockRejectedValue(new ProviderFailure('throttled', { status: 429 }));

        await expect(engine.execute(callOf(run))).rejects.toMatchObject({
            kind: 'RateLimited',
            provider: 'polly',
            attempts: 3,
        });
        expect(run).toHaveBeenCalledTimes(3);
        expect(metrics.count('tts.failures_total')).toBe(1);
    });

    it.each([
        [401, 'Unauthorized'],
        [400, 'InvalidInput'],
        [501, 'UnsupportedOperation'],
    ])('should not retry status %i (%s)', async (status, kind) => {
        const run = jest.fn<Promise<string>, [AdapterCallContext]>()
            .mockRejectedValue(new ProviderFailure('rejected', { status }));

        const outcome = await engine.run(callOf(run));

        expect(outcome.ok).toBe(false);
        expect(outcome.attempts).toBe(1);
        expect(run).toHaveBeenCalledTimes(1);
        expect(sleep).not.toHaveBeenCalled();
        if (!outcome.ok) {
            expect(outcome.error.kind).toBe(kind);
            expect(outcome.error.attempts).toBe(1);
        }
    });

    it('should retry Internal exactly once', async () => {
        engine = new ResilienceEngine({ policy: testPolicy({ maxAttempts: 5 }), sleep });
        const run = jest.fn<Promise<string>, [AdapterCallContext]>().mockRejectedValue(new Error('unexpected'));

        await expect(engine.execute(callOf(run))).rejects.toMatchObject({ kind: 'Internal', attempts: 2 });
        expect(run).toHaveBeenCalledTimes(2);
    });

    it('should keep retrying transient failures after the single Internal retry', async () => {
        engine = new ResilienceEngine({ policy: testPolicy({ maxAttempts: 5 }), sleep });
        const run = jest.fn<Promise<string>, [AdapterCallContext]>()
            .mockRejectedValueOnce(new Error('unexpected'))
            .mockRejectedValueOnce(new ProviderFailure('down', { status: 503 }))
            .mockRejectedValueOnce(new Error('unexpected again'));

        const outcome = await engine.run(callOf(run));

        expect(outcome.ok).toBe(false);
        expect(outcome.attempts).toBe(3);
    });

    it('should time out a hanging attempt and abort its signal', async () => {
        engine = new ResilienceEngine({ policy: testPolicy({ maxAttempts: 2, timeoutMs: 20 }), sleep });
        const signals: AbortSignal[] = [];
        const run = jest.fn((ctx: AdapterCallContext) => {
            signals.push(ctx.signal);
            return new Promise<string>(() => undefined);
        });

        const outcome = await engine.run(callOf(run));

        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.error.kind).toBe('Timeout');
            expect(outcome.error.code).toBe('attempt_timeout');
            expect(outcome.error.attempts).toBe(2);
        }
        expect(signals).toHaveLength(2);
        expect(signals.every(signal => signal.aborted)).toBe(true);
    });

    it('should stop immediately when the caller aborts mid-attempt', async () => {
        const controller = new AbortController();
        const run = jest.fn((_ctx: AdapterCallContext) => {
            controller.abort();
            return new Promise<string>(() => undefined);
        });

        const outcome = await engine.run(callOf(run), { signal: controller.signal });

        expect(outcome.ok).toBe(false);
        expect(outcome.attempts).toBe(1);
        if (!outcome.ok) {
            expect(outcome.error.isCancellation).toBe(true);
            expect(outcome.error.kind).toBe('Internal');
        }
        expect(sleep).not.toHaveBeenCalled();
    });

    it('should not call the adapter when already aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const run = jest.fn<Promise<string>, [AdapterCallContext]>();

        const outcome = await engine.run(callOf(run), { signal: controller.signal });

        expect(outcome.ok).toBe(false);
        expect(outcome.attempts).toBe(0);
        expect(run).not.toHaveBeenCalled();
    });

    it('should wait at least the provider Retry-After', async () => {
        engine = new ResilienceEngine({
            policy: createRetryPolicy({ maxAttempts: 2, baseDelayMs: 100, maxDelayMs: 30000, jitter: false }),
            sleep,
        });
        const run = jest.fn<Promise<string>, [AdapterCallContext]>()
            .mockRejectedValueOnce(new ProviderFailure('throttled', { status: 429, retryAfterMs: 5000 }))
            .mockResolvedValueOnce('audio');

        await expect(engine.execute(callOf(run))).resolves.toBe('audio');
        expect(sleep).toHaveBeenCalledWith(5000, undefined);
    });

    it('should report each attempt', async () => {
        engine = new ResilienceEngine({
            policy: createRetryPolicy({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitter: false }),
            sleep,
        });
        const records: AttemptRecord[] = [];
        const run = jest.fn<Promise<string>, [AdapterCallContext]>()
            .mockRejectedValueOnce(new ProviderFailure('down', { status: 502 }))
            .mockResolvedValueOnce('audio');

        await engine.execute(callOf(run), { onAttempt: record => records.push(record) });

        expect(records).toHaveLength(2);
        expect(records[0]).toMatchObject({ attempt: 1, outcome: 'failure', nextDelayMs: 100 });
        expect(records[0].error?.kind).toBe('ProviderUnavailable');
        expect(records[1]).toMatchObject({ attempt: 2, outcome: 'success' });
    });

    it('should let a per-call policy override the default', async () => {
        const run = jest.fn<Promise<string>, [AdapterCallContext]>()
            .mockRejectedValue(new ProviderFailure('down', { status: 503 }));

        const outcome = await engine.run(callOf(run), { policy: testPolicy({ maxAttempts: 1 }) });

        expect(outcome.attempts).toBe(1);
    });

    it('should start every call with a fresh attempt counter', async () => {
        const run = jest.fn<Promise<string>, [AdapterCallContext]>()
            .mockRejectedValueOnce(new ProviderFailure('down', { status: 503 }))
            .mockResolvedValue('audio');

        await engine.execute(callOf(run));
        const second = await engine.run(callOf(run));

        expect(second).toEqual({ ok: true, value: 'audio', attempts: 1 });
    });

    it('should pass through a TtsError thrown by the adapter', async () => {
        const thrown = new TtsError('InvalidInput', 'polly', 'Lexicon name is invalid');
        const run = jest.fn<Promise<string>, [AdapterCallContext]>().mockRejectedValue(thrown);

        await expect(engine.execute(callOf(run))).rejects.toMatchObject({
            kind: 'InvalidInput',
            message: 'Lexicon name is invalid',
            attempts: 1,
        });
    });

    it('should treat a synchronous throw like a rejection', async () => {
        const run = jest.fn((_ctx: AdapterCallContext): Promise<string> => {
            throw new ProviderFailure('bad key', { status: 401 });
        });

        await expect(engine.execute(callOf(run))).rejects.toMatchObject({ kind: 'Unauthorized', attempts: 1 });
    });
});

describe('computeBackoffDelay', () => {
    const policy = createRetryPolicy({ baseDelayMs: 1000, maxDelayMs: 30000, jitter: false });

    it('should double the delay per attempt up to the cap', () => {
        expect(computeBackoffDelay(1, policy)).toBe(1000);
        expect(computeBackoffDelay(2, policy)).toBe(2000);
        expect(computeBackoffDelay(3, policy)).toBe(4000);
        expect(computeBackoffDelay(5, policy)).toBe(16000);
        expect(computeBackoffDelay(6, policy)).toBe(30000);
    });

    it('should keep a fixed delay with fixed backoff', () => {
        const fixed = createRetryPolicy({ baseDelayMs: 500, backoff: 'fixed', jitter: false });

        expect(computeBackoffDelay(1, fixed)).toBe(500);
        expect(computeBackoffDelay(7, fixed)).toBe(500);
    });

    it('should keep jitter within 20% either way', () => {
        const jittered = createRetryPolicy({ baseDelayMs: 1000, maxDelayMs: 30000, jitter: true });

        expect(computeBackoffDelay(1, jittered, () => 0)).toBe(800);
        expect(computeBackoffDelay(1, jittered, () => 0.5)).toBe(1000);
        expect(computeBackoffDelay(1, jittered, () => 0.999999)).toBe(1200);
        for (let i = 0; i < 50; i++) {
            const delay = computeBackoffDelay(2, jittered);
            expect(delay).toBeGreaterThanOrEqual(1600);
            expect(delay).toBeLessThanOrEqual(2400);
        }
    });

    it('should honor Retry-After but never exceed the cap', () => {
        expect(computeBackoffDelay(1, policy, Math.random, 5000)).toBe(5000);
        expect(computeBackoffDelay(3, policy, Math.random, 10)).toBe(4000);
        expect(computeBackoffDelay(1, policy, Math.random, 60000)).toBe(30000);
    });
});
