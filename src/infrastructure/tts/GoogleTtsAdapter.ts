import axios from 'axios';
import { AudioProfile } from '../../domain/entities/Lexicon';
import { StreamOptions } from '../../domain/entities/StreamingSession';
import { AudioFormat, describeSynthesis, SynthesisRequest, SynthesisResult } from '../../domain/entities/Synthesis';
import { TtsError } from '../../domain/entities/TtsError';
import {
    matchesVoiceFilter,
    matchesVoiceQuery,
    QualityTier,
    toGender,
    VoiceDescriptor,
    VoiceFilter,
} from '../../domain/entities/Voice';
import { AdapterCallContext, ITtsProviderAdapter, ProviderLimits } from '../../domain/ports/ITtsProviderAdapter';
import { GoogleAuthClient } from './auth/GoogleAuthClient';
import { ErrorCodeExtractor, readArray, readNumber, readRecord, readString, toProviderFailure } from './http';

export interface GoogleTtsAdapterOptions {
    auth: GoogleAuthClient;
    baseUrl?: string;
}

interface GoogleEncoding {
    audioEncoding: 'MP3' | 'LINEAR16' | 'OGG_OPUS' | 'MULAW' | 'ALAW';
    format: AudioFormat;
}

/**
 * Device profiles Google can tune output for.
 */
const EFFECTS_PROFILES: ReadonlyArray<{ id: string; description: string }> = [
    { id: 'wearable-class-device', description: 'Smart watches and other wearables' },
    { id: 'handset-class-device', description: 'Smartphones' },
    { id: 'headphone-class-device', description: 'Earbuds or headphones' },
    { id: 'small-bluetooth-speaker-class-device', description: 'Small home speakers' },
    { id: 'medium-bluetooth-speaker-class-device', description: 'Smart home speakers' },
    { id: 'large-home-entertainment-class-device', description: 'Home entertainment systems or smart TVs' },
    { id: 'large-automotive-class-device', description: 'Car speakers' },
    { id: 'telephony-class-application', description: 'Interactive voice response systems' },
];

export function toGoogleEncoding(format: AudioFormat): GoogleEncoding {
    switch (format) {
        case 'wav':
            return { audioEncoding: 'LINEAR16', format: 'wav' };
        case 'pcm':
            return { audioEncoding: 'LINEAR16', format: 'pcm' };
        case 'ogg_opus':
            return { audioEncoding: 'OGG_OPUS', format: 'ogg_opus' };
        case 'mulaw':
            return { audioEncoding: 'MULAW', format: 'mulaw' };
        case 'alaw':
            return { audioEncoding: 'ALAW', format: 'alaw' };
        default:
            return { audioEncoding: 'MP3', format: 'mp3' };
    }
}

/**
 * Voice names carry the model family, e.g. en-US-Neural2-A, en-US-Standard-B.
 */
export function googleQualityTier(voiceName: string): QualityTier {
    if (/-(Studio|Journey|Chirp)/i.test(voiceName)) return 'premium';
    if (/-(Neural2|Wavenet|News|Polyglot)/i.test(voiceName)) return 'neural';
    return 'standard';
}

/**
 * Google errors look like `{ error: { code, message, status: 'INVALID_ARGUMENT' } }`.
 */
export const extractGoogleErrorCode: ErrorCodeExtractor = body =>
    readString(readRecord(body, 'error'), 'status');

/**
 * Google Cloud Text-to-Speech adapter (REST v1).
 */
export class GoogleTtsAdapter implements ITtsProviderAdapter {
    readonly provider = 'google' as const;
    readonly limits: ProviderLimits = { maxCharacters: 5000 };

    private readonly auth: GoogleAuthClient;
    private readonly baseUrl: string;

    constructor(options: GoogleTtsAdapterOptions) {
        this.auth = options.auth;
        this.baseUrl = (options.baseUrl || 'https://texttospeech.googleapis.com').replace(/\/$/, '');
    }

    async listVoices(filter: VoiceFilter | undefined, ctx: AdapterCallContext): Promise<VoiceDescriptor[]> {
        const headers = await this.headers(ctx);

        try {
            const response = await axios.get<unknown>(`${this.baseUrl}/v1/voices`, {
                params: filter?.language ? { languageCode: filter.language } : undefined,
                headers,
                signal: ctx.signal,
            });

            return readArray(response.data, 'voices')
                .map(voice => this.toDescriptor(voice))
                .filter((voice): voice is VoiceDescriptor => voice !== undefined)
                .filter(voice => matchesVoiceFilter(voice, filter));
        } catch (error) {
            throw toProviderFailure(error, 'Google listVoices', extractGoogleErrorCode);
        }
    }

    async searchVoices(query: string, filter: VoiceFilter | undefined, ctx: AdapterCallContext): Promise<VoiceDescriptor[]> {
        const voices = await this.listVoices(filter, ctx);
        return voices.filter(voice => matchesVoiceQuery(voice, query));
    }

    async synthesize(request: SynthesisRequest, ctx: AdapterCallContext): Promise<SynthesisResult> {
        const encoding = toGoogleEncoding(request.audioConfig.format);
        const settings = request.voiceSettings;

        const audioConfig: Record<string, unknown> = { audioEncoding: encoding.audioEncoding };
        if (request.audioConfig.sampleRate) audioConfig.sampleRateHertz = request.audioConfig.sampleRate;
        if (settings?.speed !== undefined) audioConfig.speakingRate = settings.speed;
        if (settings?.pitch !== undefined) audioConfig.pitch = settings.pitch;
        if (settings?.volume !== undefined) audioConfig.volumeGainDb = settings.volume;

        const body = {
            input: request.textType === 'ssml' ? { ssml: request.text } : { text: request.text },
            voice: { languageCode: request.language, name: request.voiceId },
            audioConfig,
        };

        const headers = await this.headers(ctx);
        try {
            const response = await axios.post<unknown>(`${this.baseUrl}/v1/text:synthesize`, body, {
                headers: { ...headers, 'Content-Type': 'application/json' },
                signal: ctx.signal,
            });

            const audioContent = readString(response.data, 'audioContent');
            if (audioContent === undefined) {
                throw new TtsError('Internal', this.provider, 'Google response contained no audioContent');
            }
            const audio = Buffer.from(audioContent, 'base64');
            return {
                audio,
                format: encoding.format,
                metadata: describeSynthesis(request.text, audio, {
                    charactersBilled: request.text.length,
                    providerInfo: { audioEncoding: encoding.audioEncoding },
                }),
            };
        } catch (error) {
            throw toProviderFailure(error, 'Google synthesize', extractGoogleErrorCode);
        }
    }

    async synthesizeBatchItem(request: SynthesisRequest, ctx: AdapterCallContext): Promise<SynthesisResult> {
        return this.synthesize(request, ctx);
    }

    async startStream(_options: StreamOptions, _ctx: AdapterCallContext): Promise<string> {
        throw this.streamingUnsupported();
    }

    async pushText(_streamId: string, _text: string, _ctx: AdapterCallContext): Promise<Buffer> {
        throw this.streamingUnsupported();
    }

    async finishStream(_streamId: string, _ctx: AdapterCallContext): Promise<Buffer> {
        throw this.streamingUnsupported();
    }

    /**
     * Fixed list of effects profiles; not yet applied to synthesis requests.
     */
    async listAudioProfiles(_ctx: AdapterCallContext): Promise<AudioProfile[]> {
        return EFFECTS_PROFILES.map(profile => ({ ...profile, stub: true }));
    }

    private async headers(ctx: AdapterCallContext): Promise<Record<string, string>> {
        const token = await this.auth.getAccessToken(ctx.signal);
        return { Authorization: `Bearer ${token}` };
    }

    private toDescriptor(raw: unknown): VoiceDescriptor | undefined {
        const name = readString(raw, 'name');
        if (!name) return undefined;

        const languages = readArray(raw, 'languageCodes').filter(
            (code): code is string => typeof code === 'string'
        );
        const tier = googleQualityTier(name);

        return {
            id: name,
            name,
            provider: this.provider,
            languages,
            gender: toGender(readString(raw, 'ssmlGender')),
            tags: [tier],
            qualityTier: tier,
            sampleRate: readNumber(raw, 'naturalSampleRateHertz'),
        };
    }

    private streamingUnsupported(): TtsError {
        return new TtsError('UnsupportedOperation', this.provider, 'Google streaming is not supported');
    }
}
