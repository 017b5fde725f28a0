import { ProviderName } from '../entities/Capability';
import { AudioProfile, LexiconEntry, LexiconInfo } from '../entities/Lexicon';
import { StreamOptions } from '../entities/StreamingSession';
import { SynthesisRequest, SynthesisResult, TimingMark } from '../entities/Synthesis';
import { VoiceDescriptor, VoiceFilter, VoiceSample } from '../entities/Voice';

/**
 * Passed to every adapter call by the resilience engine.
 */
export interface AdapterCallContext {
    /** Aborted when the attempt times out or the owning session is cancelled */
    signal: AbortSignal;
    /** 1-based attempt number */
    attempt: number;
}

export interface ProviderLimits {
    maxCharacters: number;
}

/**
 * ITtsProviderAdapter - Port for a single vendor back end.
 * Implementations: ElevenLabsAdapter, PollyAdapter, GoogleTtsAdapter, DeepgramAdapter
 *
 * Adapters perform exactly one vendor call per invocation. They never retry and never
 * normalize errors: failures are thrown as ProviderFailure (or TtsError when the adapter
 * already knows the canonical kind).
 */
export interface ITtsProviderAdapter {
    readonly provider: ProviderName;
    readonly limits: ProviderLimits;

    listVoices(filter: VoiceFilter | undefined, ctx: AdapterCallContext): Promise<VoiceDescriptor[]>;

    searchVoices(query: string, filter: VoiceFilter | undefined, ctx: AdapterCallContext): Promise<VoiceDescriptor[]>;

    synthesize(request: SynthesisRequest, ctx: AdapterCallContext): Promise<SynthesisResult>;

    /**
     * One item of a batch. Most adapters delegate to synthesize.
     */
    synthesizeBatchItem(request: SynthesisRequest, ctx: AdapterCallContext): Promise<SynthesisResult>;

    /**
     * Opens a vendor stream.
     * @returns Provider-side stream id
     */
    startStream(options: StreamOptions, ctx: AdapterCallContext): Promise<string>;

    /**
     * Delivers one text chunk. Resolves once the vendor acknowledged it,
     * with any audio received since the previous call.
     */
    pushText(streamId: string, text: string, ctx: AdapterCallContext): Promise<Buffer>;

    /**
     * Signals end of input and resolves with the remaining audio.
     */
    finishStream(streamId: string, ctx: AdapterCallContext): Promise<Buffer>;

    abortStream?(streamId: string): Promise<void>;

    getTimingMarks?(request: SynthesisRequest, ctx: AdapterCallContext): Promise<TimingMark[]>;

    createVoiceClone?(
        name: string,
        samples: VoiceSample[],
        description: string | undefined,
        ctx: AdapterCallContext
    ): Promise<VoiceDescriptor>;

    createLexicon?(
        name: string,
        language: string,
        entries: LexiconEntry[],
        ctx: AdapterCallContext
    ): Promise<LexiconInfo>;

    generateSoundEffect?(
        description: string,
        durationSeconds: number | undefined,
        ctx: AdapterCallContext
    ): Promise<SynthesisResult>;

    listAudioProfiles?(ctx: AdapterCallContext): Promise<AudioProfile[]>;
}
