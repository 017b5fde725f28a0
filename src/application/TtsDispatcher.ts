import { CapabilityMatrix, ProviderName } from '../domain/entities/Capability';
import { AudioProfile, LexiconEntry, LexiconInfo } from '../domain/entities/Lexicon';
import { StreamOptions, StreamSessionStatus } from '../domain/entities/StreamingSession';
import { StreamResult, SynthesisRequest, SynthesisResult, TimingMark } from '../domain/entities/Synthesis';
import { TtsError } from '../domain/entities/TtsError';
import { matchesVoiceFilter, VoiceDescriptor, VoiceFilter, VoiceSample } from '../domain/entities/Voice';
import { ICachePort, VOICE_CACHE_TTL_SECONDS, voiceCacheKey } from '../domain/ports/ICachePort';
import { IMetricsPort, METRICS, NoOpMetricsAdapter } from '../domain/ports/IMetricsPort';
import { ITtsProviderAdapter } from '../domain/ports/ITtsProviderAdapter';
import { validateSynthesisInput, ValidationResult } from '../domain/services/InputValidator';
import { BatchItemResult, BatchOptions, BatchOrchestrator } from './BatchOrchestrator';
import { CapabilityRegistry } from './CapabilityRegistry';
import { ResilienceEngine } from './ResilienceEngine';
import { StreamingSessionManager } from './StreamingSessionManager';

export interface TtsDispatcherDeps {
    adapter: ITtsProviderAdapter;
    registry: CapabilityRegistry;
    engine: ResilienceEngine;
    sessions: StreamingSessionManager;
    batch: BatchOrchestrator;
    /** Voice list cache. Omit to disable caching. */
    voiceCache?: ICachePort<VoiceDescriptor[]>;
    voiceCacheTtlSeconds?: number;
    metrics?: IMetricsPort;
}

export type BatchRequestOptions = Omit<BatchOptions, 'guard'>;

/**
 * Single entry point of the gateway, bound to the provider chosen at startup.
 *
 * Every vendor call goes through the resilience engine; optional features are checked
 * against the capability registry before the adapter is touched.
 */
export class TtsDispatcher {
    private readonly adapter: ITtsProviderAdapter;
    private readonly registry: CapabilityRegistry;
    private readonly engine: ResilienceEngine;
    private readonly sessions: StreamingSessionManager;
    private readonly batch: BatchOrchestrator;
    private readonly voiceCache?: ICachePort<VoiceDescriptor[]>;
    private readonly voiceCacheTtlSeconds: number;
    private readonly metrics: IMetricsPort;

    constructor(deps: TtsDispatcherDeps) {
        this.adapter = deps.adapter;
        this.registry = deps.registry;
        this.engine = deps.engine;
        this.sessions = deps.sessions;
        this.batch = deps.batch;
        this.voiceCache = deps.voiceCache;
        this.voiceCacheTtlSeconds = deps.voiceCacheTtlSeconds ?? VOICE_CACHE_TTL_SECONDS;
        this.metrics = deps.metrics ?? new NoOpMetricsAdapter();
    }

    get provider(): ProviderName {
        return this.adapter.provider;
    }

    getCapabilities(provider: ProviderName = this.adapter.provider): CapabilityMatrix {
        return this.registry.getMatrix(provider);
    }

    // ============================================
    // Voices
    // ============================================

    async listVoices(filter?: VoiceFilter): Promise<VoiceDescriptor[]> {
        const key = voiceCacheKey(this.provider, filter);

        if (this.voiceCache) {
            const cached = await this.voiceCache.get(key);
            if (cached) {
                this.metrics.incrementCounter(METRICS.VOICE_CACHE_HITS, { provider: this.provider });
                return [...cached];
            }
            this.metrics.incrementCounter(METRICS.VOICE_CACHE_MISSES, { provider: this.provider });
        }

        const adapter = this.adapter;
        const voices = await this.engine.execute({
            provider: adapter.provider,
            operation: 'listVoices',
            run: ctx => adapter.listVoices(filter, ctx),
        });
        const filtered = voices.filter(voice => matchesVoiceFilter(voice, filter));

        if (this.voiceCache && this.voiceCacheTtlSeconds > 0) {
            // Callers own the returned array; the cache keeps its own
            await this.voiceCache.set(key, [...filtered], this.voiceCacheTtlSeconds);
        }
        return filtered;
    }

    async searchVoices(query: string, filter?: VoiceFilter): Promise<VoiceDescriptor[]> {
        const adapter = this.adapter;
        return this.engine.execute({
            provider: adapter.provider,
            operation: 'searchVoices',
            run: ctx => adapter.searchVoices(query, filter, ctx),
        });
    }

    /**
     * @throws TtsError (InvalidInput) when the provider has no voice with this id
     */
    async getVoice(voiceId: string): Promise<VoiceDescriptor> {
        const voices = await this.listVoices();
        const voice = voices.find(candidate => candidate.id === voiceId);
        if (!voice) {
            throw new TtsError('InvalidInput', this.provider, `Voice not found: ${voiceId}`, { code: 'voice_not_found' });
        }
        return voice;
    }

    /**
     * Languages offered by at least one voice, sorted.
     */
    async listLanguages(): Promise<string[]> {
        const voices = await this.listVoices();
        const languages = new Set<string>();
        for (const voice of voices) {
            voice.languages.forEach(language => languages.add(language));
        }
        return [...languages].sort();
    }

    // ============================================
    // Synthesis
    // ============================================

    validateInput(request: SynthesisRequest): ValidationResult {
        return validateSynthesisInput(request, this.adapter.limits);
    }

    async synthesize(request: SynthesisRequest): Promise<SynthesisResult> {
        this.checkRequest(request, 'synthesize');

        const adapter = this.adapter;
        const result = await this.engine.execute({
            provider: adapter.provider,
            operation: 'synthesize',
            run: ctx => adapter.synthesize(request, ctx),
        });
        this.metrics.recordHistogram(METRICS.AUDIO_BYTES, result.audio.length, { provider: adapter.provider });
        return result;
    }

    /**
     * Per-item outcomes in input order. Items the provider cannot take (SSML without SSML
     * support, invalid text) fail individually without an adapter call.
     */
    async synthesizeBatch(
        requests: readonly SynthesisRequest[],
        options: BatchRequestOptions = {}
    ): Promise<BatchItemResult[]> {
        return this.batch.synthesizeBatch(this.adapter, requests, {
            ...options,
            guard: request => this.rejectionFor(request, 'synthesizeBatch'),
        });
    }

    async getTimingMarks(request: SynthesisRequest): Promise<TimingMark[]> {
        this.registry.requireFeature(this.provider, 'speechMarks', 'getTimingMarks');
        this.checkRequest(request, 'getTimingMarks');

        const getTimingMarks = this.adapter.getTimingMarks?.bind(this.adapter);
        if (!getTimingMarks) {
            throw this.missingOperation('getTimingMarks');
        }
        return this.engine.execute({
            provider: this.provider,
            operation: 'getTimingMarks',
            run: ctx => getTimingMarks(request, ctx),
        });
    }

    // ============================================
    // Streaming
    // ============================================

    async startStream(options: StreamOptions): Promise<string> {
        return this.sessions.open(this.adapter, options);
    }

    async pushText(handle: string, text: string): Promise<void> {
        return this.sessions.pushText(handle, text);
    }

    async finishStream(handle: string): Promise<StreamResult> {
        return this.sessions.finish(handle);
    }

    async cancelStream(handle: string): Promise<StreamResult> {
        return this.sessions.cancel(handle);
    }

    getStreamStatus(handle: string): StreamSessionStatus {
        return this.sessions.status(handle);
    }

    readStreamAudio(handle: string): Buffer {
        return this.sessions.readAudio(handle);
    }

    // ============================================
    // Optional features
    // ============================================

    async createVoiceClone(name: string, samples: VoiceSample[], description?: string): Promise<VoiceDescriptor> {
        this.registry.requireFeature(this.provider, 'voiceCloning', 'createVoiceClone');

        const createVoiceClone = this.adapter.createVoiceClone?.bind(this.adapter);
        if (!createVoiceClone) {
            throw this.missingOperation('createVoiceClone');
        }
        const voice = await this.engine.execute({
            provider: this.provider,
            operation: 'createVoiceClone',
            run: ctx => createVoiceClone(name, samples, description, ctx),
        });

        await this.voiceCache?.clear();
        console.log(`[TtsDispatcher] Voice ${voice.id} created on ${this.provider}; voice cache cleared`);
        return voice;
    }

    async createLexicon(name: string, language: string, entries: LexiconEntry[] = []): Promise<LexiconInfo> {
        this.registry.requireFeature(this.provider, 'lexicons', 'createLexicon');

        const createLexicon = this.adapter.createLexicon?.bind(this.adapter);
        if (!createLexicon) {
            throw this.missingOperation('createLexicon');
        }
        return this.engine.execute({
            provider: this.provider,
            operation: 'createLexicon',
            run: ctx => createLexicon(name, language, entries, ctx),
        });
    }

    async generateSoundEffect(description: string, durationSeconds?: number): Promise<SynthesisResult> {
        this.registry.requireFeature(this.provider, 'soundEffects', 'generateSoundEffect');

        const generateSoundEffect = this.adapter.generateSoundEffect?.bind(this.adapter);
        if (!generateSoundEffect) {
            throw this.missingOperation('generateSoundEffect');
        }
        return this.engine.execute({
            provider: this.provider,
            operation: 'generateSoundEffect',
            run: ctx => generateSoundEffect(description, durationSeconds, ctx),
        });
    }

    async listAudioProfiles(): Promise<AudioProfile[]> {
        this.registry.requireFeature(this.provider, 'audioProfiles', 'listAudioProfiles');

        const listAudioProfiles = this.adapter.listAudioProfiles?.bind(this.adapter);
        if (!listAudioProfiles) {
            throw this.missingOperation('listAudioProfiles');
        }
        return this.engine.execute({
            provider: this.provider,
            operation: 'listAudioProfiles',
            run: ctx => listAudioProfiles(ctx),
        });
    }

    // ============================================
    // Helpers
    // ============================================

    private checkRequest(request: SynthesisRequest, operation: string): void {
        const rejection = this.rejectionFor(request, operation);
        if (rejection) {
            throw rejection;
        }
    }

    private rejectionFor(request: SynthesisRequest, operation: string): TtsError | undefined {
        if (request.textType === 'ssml' && this.registry.supports(this.provider, 'ssml') === 'unsupported') {
            return new TtsError('UnsupportedOperation', this.provider, `${operation} with SSML input is not supported by ${this.provider}`, {
                code: 'unsupported_feature',
            });
        }

        const validation = this.validateInput(request);
        if (!validation.valid) {
            return new TtsError('InvalidInput', 'gateway', validation.errors.join('; '), { code: 'invalid_input' });
        }
        return undefined;
    }

    private missingOperation(operation: string): TtsError {
        return new TtsError('Internal', this.provider, `${this.provider} adapter does not implement ${operation}`, {
            code: 'missing_operation',
        });
    }
}
