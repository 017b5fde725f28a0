import { ProviderName } from '../../src/domain/entities/Capability';
import { AudioProfile, LexiconEntry, LexiconInfo } from '../../src/domain/entities/Lexicon';
import { createRetryPolicy, RetryPolicy } from '../../src/domain/entities/RetryPolicy';
import { StreamOptions } from '../../src/domain/entities/StreamingSession';
import { SynthesisRequest, SynthesisResult, TimingMark } from '../../src/domain/entities/Synthesis';
import { VoiceDescriptor, VoiceFilter, VoiceSample } from '../../src/domain/entities/Voice';
import { IMetricsPort, MetricTags } from '../../src/domain/ports/IMetricsPort';
import { AdapterCallContext, ITtsProviderAdapter, ProviderLimits } from '../../src/domain/ports/ITtsProviderAdapter';

/**
 * Adapter double whose every operation is a jest.fn with a harmless default.
 */
export class FakeTtsAdapter implements ITtsProviderAdapter {
    readonly limits: ProviderLimits;

    listVoices = jest.fn<Promise<VoiceDescriptor[]>, [VoiceFilter | undefined, AdapterCallContext]>(async () => []);
    searchVoices = jest.fn<Promise<VoiceDescriptor[]>, [string, VoiceFilter | undefined, AdapterCallContext]>(
        async () => []
    );
    synthesize = jest.fn<Promise<SynthesisResult>, [SynthesisRequest, AdapterCallContext]>(async request => ({
        audio: Buffer.from(`audio:${request.text}`),
        format: request.audioConfig.format,
    }));
    synthesizeBatchItem = jest.fn<Promise<SynthesisResult>, [SynthesisRequest, AdapterCallContext]>(async request => ({
        audio: Buffer.from(`audio:${request.text}`),
        format: request.audioConfig.format,
    }));
    startStream = jest.fn<Promise<string>, [StreamOptions, AdapterCallContext]>(async () => 'vendor-stream-1');
    pushText = jest.fn<Promise<Buffer>, [string, string, AdapterCallContext]>(async (_id, text) => Buffer.from(text));
    finishStream = jest.fn<Promise<Buffer>, [string, AdapterCallContext]>(async () => Buffer.from('|end'));

    abortStream?: jest.Mock<Promise<void>, [string]> = jest.fn<Promise<void>, [string]>(async () => undefined);
    getTimingMarks?: jest.Mock<Promise<TimingMark[]>, [SynthesisRequest, AdapterCallContext]> = jest.fn<
        Promise<TimingMark[]>,
        [SynthesisRequest, AdapterCallContext]
    >(
        async () => [{ timeMs: 0, type: 'word' as const, text: 'hello' }]
    );
    createVoiceClone?: jest.Mock<
        Promise<VoiceDescriptor>,
        [string, VoiceSample[], string | undefined, AdapterCallContext]
    > = jest.fn<Promise<VoiceDescriptor>, [string, VoiceSample[], string | undefined, AdapterCallContext]>(async name => fakeVoice('clone-1', { name, provider: this.provider, tags: ['cloned'] }));
    createLexicon?: jest.Mock<Promise<LexiconInfo>, [string, string, LexiconEntry[], AdapterCallContext]> = jest.fn<
        Promise<LexiconInfo>,
        [string, string, LexiconEntry[], AdapterCallContext]
    >(
        async (name, language, entries) => ({ name, language, entryCount: entries.length, stub: true as const })
    );
    generateSoundEffect?: jest.Mock<Promise<SynthesisResult>, [string, number | undefined, AdapterCallContext]> =
        jest.fn<Promise<SynthesisResult>, [string, number | undefined, AdapterCallContext]>(async () => ({ audio: Buffer.alloc(0), format: 'mp3' as const, stub: true as const }));
    listAudioProfiles?: jest.Mock<Promise<AudioProfile[]>, [AdapterCallContext]> = jest.fn<
        Promise<AudioProfile[]>,
        [AdapterCallContext]
    >(async () => [
        { id: 'handset-class-device', description: 'Smartphones', stub: true as const },
    ]);

    constructor(readonly provider: ProviderName = 'deepgram', maxCharacters = 100) {
        this.limits = { maxCharacters };
    }
}

export function fakeVoice(id: string, overrides: Partial<VoiceDescriptor> = {}): VoiceDescriptor {
    return {
        id,
        name: id,
        provider: 'deepgram',
        languages: ['en-US'],
        gender: 'female',
        tags: [],
        qualityTier: 'neural',
        ...overrides,
    };
}

/**
 * Small, immediate policy for tests: no real waiting between attempts.
 */
export function testPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
    return createRetryPolicy({
        maxAttempts: 3,
        timeoutMs: 1000,
        baseDelayMs: 0,
        maxDelayMs: 0,
        jitter: false,
        ...overrides,
    });
}

export const noSleep = jest.fn(async (_ms: number, _signal?: AbortSignal): Promise<void> => undefined);

export interface RecordedMetric {
    type: 'counter' | 'duration' | 'gauge' | 'histogram';
    name: string;
    value: number;
    tags?: MetricTags;
}

/**
 * Metrics double that keeps every observation in memory.
 */
export class RecordingMetrics implements IMetricsPort {
    readonly records: RecordedMetric[] = [];

    incrementCounter(name: string, tags?: MetricTags, value: number = 1): void {
        this.records.push({ type: 'counter', name, value, tags });
    }

    recordDuration(name: string, durationMs: number, tags?: MetricTags): void {
        this.records.push({ type: 'duration', name, value: durationMs, tags });
    }

    recordGauge(name: string, value: number, tags?: MetricTags): void {
        this.records.push({ type: 'gauge', name, value, tags });
    }

    recordHistogram(name: string, value: number, tags?: MetricTags): void {
        this.records.push({ type: 'histogram', name, value, tags });
    }

    count(name: string): number {
        return this.records
            .filter(record => record.type === 'counter' && record.name === name)
            .reduce((sum, record) => sum + record.value, 0);
    }
}

/**
 * Context for calling an adapter directly, outside the resilience engine.
 */
export function callContext(signal: AbortSignal = new AbortController().signal): AdapterCallContext {
    return { signal, attempt: 1 };
}
