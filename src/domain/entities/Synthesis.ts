import { TtsError } from './TtsError';

export const AUDIO_FORMATS = ['mp3', 'wav', 'pcm', 'ogg_opus', 'flac', 'aac', 'mulaw', 'alaw'] as const;

export type AudioFormat = typeof AUDIO_FORMATS[number];

export type TextType = 'plain' | 'ssml';

/**
 * Optional voice tuning. Providers ignore the fields they have no equivalent for.
 */
export interface VoiceSettings {
    /** Speaking rate multiplier, 0.25 - 4.0 */
    speed?: number;
    /** Semitones, -20 - 20 */
    pitch?: number;
    /** Gain in dB, -96 - 16 */
    volume?: number;
    /** 0 - 1 */
    stability?: number;
    /** 0 - 1 */
    similarity?: number;
}

export interface AudioConfig {
    format: AudioFormat;
    sampleRate?: number;
    channels?: number;
}

export interface SynthesisRequest {
    readonly text: string;
    readonly textType: TextType;
    /** BCP-47 language tag */
    readonly language: string;
    readonly voiceId: string;
    readonly voiceSettings?: Readonly<VoiceSettings>;
    readonly audioConfig: Readonly<AudioConfig>;
}

export interface SynthesisRequestInput {
    text: string;
    voiceId: string;
    textType?: TextType;
    language?: string;
    voiceSettings?: VoiceSettings;
    audioConfig?: Partial<AudioConfig>;
}

export interface TimingMark {
    timeMs: number;
    type: 'word' | 'sentence' | 'ssml' | 'viseme';
    text: string;
    startOffset?: number;
    endOffset?: number;
}

export interface SynthesisMetadata {
    characterCount: number;
    wordCount: number;
    audioSizeBytes: number;
    durationSeconds?: number;
    requestId?: string;
    charactersBilled?: number;
    providerInfo?: Record<string, string>;
}

export interface SynthesisResult {
    audio: Buffer;
    format: AudioFormat;
    marks?: TimingMark[];
    metadata?: SynthesisMetadata;
    /** Set when a planned-stub operation produced a placeholder */
    stub?: true;
}

/**
 * Result of a finished or aborted streaming session.
 */
export interface StreamResult extends SynthesisResult {
    complete: boolean;
    chunksDelivered: number;
    terminalError?: TtsError;
}

interface Bound {
    min: number;
    max: number;
}

export const VOICE_SETTING_BOUNDS: Readonly<Record<keyof VoiceSettings, Bound>> = {
    speed: { min: 0.25, max: 4.0 },
    pitch: { min: -20, max: 20 },
    volume: { min: -96, max: 16 },
    stability: { min: 0, max: 1 },
    similarity: { min: 0, max: 1 },
};

const SETTING_KEYS: ReadonlyArray<keyof VoiceSettings> = ['speed', 'pitch', 'volume', 'stability', 'similarity'];

export function isAudioFormat(value: string): value is AudioFormat {
    return AUDIO_FORMATS.some(format => format === value);
}

/**
 * Builds a validated, frozen synthesis request.
 * @throws TtsError (InvalidInput) when a bounded setting is out of range or required fields are empty
 */
export function createSynthesisRequest(input: SynthesisRequestInput): SynthesisRequest {
    if (!input.voiceId || !input.voiceId.trim()) {
        throw new TtsError('InvalidInput', 'gateway', 'voiceId is required');
    }

    let voiceSettings: Readonly<VoiceSettings> | undefined;
    if (input.voiceSettings) {
        for (const key of SETTING_KEYS) {
            const value = input.voiceSettings[key];
            if (value === undefined) continue;
            const bound = VOICE_SETTING_BOUNDS[key];
            if (!Number.isFinite(value) || value < bound.min || value > bound.max) {
                throw new TtsError(
                    'InvalidInput',
                    'gateway',
                    `voiceSettings.${key} must be between ${bound.min} and ${bound.max}, got ${value}`
                );
            }
        }
        voiceSettings = Object.freeze({ ...input.voiceSettings });
    }

    const format = input.audioConfig?.format ?? 'mp3';
    const sampleRate = input.audioConfig?.sampleRate;
    if (sampleRate !== undefined && (!Number.isInteger(sampleRate) || sampleRate <= 0)) {
        throw new TtsError('InvalidInput', 'gateway', `audioConfig.sampleRate must be a positive integer, got ${sampleRate}`);
    }
    const channels = input.audioConfig?.channels;
    if (channels !== undefined && channels !== 1 && channels !== 2) {
        throw new TtsError('InvalidInput', 'gateway', `audioConfig.channels must be 1 or 2, got ${channels}`);
    }

    return Object.freeze({
        text: input.text,
        textType: input.textType ?? 'plain',
        language: input.language ?? 'en-US',
        voiceId: input.voiceId,
        voiceSettings,
        audioConfig: Object.freeze({ format, sampleRate, channels }),
    });
}

export function countWords(text: string): number {
    const trimmed = text.trim();
    return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Builds result metadata from the text that was spoken and the audio that came back.
 */
export function describeSynthesis(
    text: string,
    audio: Buffer,
    extra: Partial<SynthesisMetadata> = {}
): SynthesisMetadata {
    return {
        characterCount: text.length,
        wordCount: countWords(text),
        audioSizeBytes: audio.length,
        ...extra,
    };
}
