import axios from 'axios';
import FormData from 'form-data';
import { AudioFormat, describeSynthesis, SynthesisRequest, SynthesisResult } from '../../domain/entities/Synthesis';
import { TtsError } from '../../domain/entities/TtsError';
import {
    matchesVoiceFilter,
    matchesVoiceQuery,
    toGender,
    VoiceDescriptor,
    VoiceFilter,
    VoiceSample,
} from '../../domain/entities/Voice';
import { StreamOptions } from '../../domain/entities/StreamingSession';
import { AdapterCallContext, ITtsProviderAdapter, ProviderLimits } from '../../domain/ports/ITtsProviderAdapter';
import { ErrorCodeExtractor, readArray, readRecord, readString, toBuffer, toProviderFailure } from './http';

export interface ElevenLabsAdapterOptions {
    apiKey: string;
    baseUrl?: string;
    modelId?: string;
}

const MIN_SAMPLE_BYTES = 1024;
const MAX_CLONE_SAMPLES = 25;

interface OutputFormat {
    name: string;
    format: AudioFormat;
    mimeType: string;
}

const MP3_OUTPUT: OutputFormat = { name: 'mp3_44100_128', format: 'mp3', mimeType: 'audio/mpeg' };
const PCM_OUTPUT: OutputFormat = { name: 'pcm_44100', format: 'pcm', mimeType: 'audio/pcm' };
const ULAW_OUTPUT: OutputFormat = { name: 'ulaw_8000', format: 'mulaw', mimeType: 'audio/basic' };

/**
 * Formats without a native ElevenLabs equivalent fall back to MP3.
 */
export function toElevenLabsOutput(format: AudioFormat): OutputFormat {
    switch (format) {
        case 'pcm':
        case 'wav':
            return PCM_OUTPUT;
        case 'mulaw':
            return ULAW_OUTPUT;
        default:
            return MP3_OUTPUT;
    }
}

/**
 * ElevenLabs sends `{ detail: { status, message } }` on most failures.
 */
export const extractElevenLabsErrorCode: ErrorCodeExtractor = body =>
    readString(readRecord(body, 'detail'), 'status');

/**
 * ElevenLabs adapter: voice listing, synthesis and instant voice cloning.
 */
export class ElevenLabsAdapter implements ITtsProviderAdapter {
    readonly provider = 'elevenlabs' as const;
    readonly limits: ProviderLimits = { maxCharacters: 5000 };

    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly modelId: string;

    constructor(options: ElevenLabsAdapterOptions) {
        if (!options.apiKey) {
            throw new Error('ElevenLabs API key is required');
        }
        this.apiKey = options.apiKey;
        this.baseUrl = (options.baseUrl || 'https://api.elevenlabs.io').replace(/\/$/, '');
        this.modelId = options.modelId || 'eleven_multilingual_v2';
    }

    async listVoices(filter: VoiceFilter | undefined, ctx: AdapterCallContext): Promise<VoiceDescriptor[]> {
        try {
            const response = await axios.get<unknown>(`${this.baseUrl}/v1/voices`, {
                headers: { 'xi-api-key': this.apiKey },
                signal: ctx.signal,
            });

            return readArray(response.data, 'voices')
                .map(voice => this.toDescriptor(voice))
                .filter((voice): voice is VoiceDescriptor => voice !== undefined)
                .filter(voice => matchesVoiceFilter(voice, filter));
        } catch (error) {
            throw toProviderFailure(error, 'ElevenLabs listVoices', extractElevenLabsErrorCode);
        }
    }

    async searchVoices(query: string, filter: VoiceFilter | undefined, ctx: AdapterCallContext): Promise<VoiceDescriptor[]> {
        const voices = await this.listVoices(filter, ctx);
        return voices.filter(voice => matchesVoiceQuery(voice, query));
    }

    async synthesize(request: SynthesisRequest, ctx: AdapterCallContext): Promise<SynthesisResult> {
        const output = toElevenLabsOutput(request.audioConfig.format);
        const settings = request.voiceSettings;

        const body: Record<string, unknown> = {
            text: request.text,
            model_id: this.modelId,
        };
        if (settings) {
            body.voice_settings = {
                stability: settings.stability ?? 0.5,
                similarity_boost: settings.similarity ?? 0.75,
                ...(settings.speed !== undefined ? { speed: settings.speed } : {}),
            };
        }

        try {
            const response = await axios.post<ArrayBuffer>(
                `${this.baseUrl}/v1/text-to-speech/${encodeURIComponent(request.voiceId)}`,
                body,
                {
                    params: { output_format: output.name },
                    headers: {
                        'xi-api-key': this.apiKey,
                        'Content-Type': 'application/json',
                        Accept: output.mimeType,
                    },
                    responseType: 'arraybuffer',
                    signal: ctx.signal,
                }
            );

            const audio = toBuffer(response.data);
            const requestId = response.headers['request-id'];
            return {
                audio,
                format: output.format,
                metadata: describeSynthesis(request.text, audio, {
                    requestId: typeof requestId === 'string' ? requestId : undefined,
                    charactersBilled: request.text.length,
                    providerInfo: { model: this.modelId, outputFormat: output.name },
                }),
            };
        } catch (error) {
            throw toProviderFailure(error, 'ElevenLabs synthesize', extractElevenLabsErrorCode);
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
     * Instant voice clone from 1-25 samples of at least 1 KiB each.
     */
    async createVoiceClone(
        name: string,
        samples: VoiceSample[],
        description: string | undefined,
        ctx: AdapterCallContext
    ): Promise<VoiceDescriptor> {
        this.validateSamples(name, samples);

        const formData = new FormData();
        formData.append('name', name);
        if (description) {
            formData.append('description', description);
        }
        samples.forEach(sample => {
            formData.append('files', sample.data, {
                filename: sample.fileName,
                contentType: sample.contentType || 'audio/mpeg',
            });
        });

        try {
            const response = await axios.post<unknown>(`${this.baseUrl}/v1/voices/add`, formData, {
                headers: {
                    ...formData.getHeaders(),
                    'xi-api-key': this.apiKey,
                },
                signal: ctx.signal,
            });

            const voiceId = readString(response.data, 'voice_id');
            if (!voiceId) {
                throw new TtsError('Internal', this.provider, 'ElevenLabs returned no voice_id for the clone');
            }
            console.log(`[ElevenLabs] Created voice clone ${voiceId} from ${samples.length} sample(s)`);

            return {
                id: voiceId,
                name,
                provider: this.provider,
                languages: ['en'],
                gender: 'neutral',
                tags: ['cloned'],
                qualityTier: 'premium',
                description,
                sampleRate: 44100,
            };
        } catch (error) {
            throw toProviderFailure(error, 'ElevenLabs createVoiceClone', extractElevenLabsErrorCode);
        }
    }

    /**
     * Not offered by the API yet. Returns an empty MP3 placeholder.
     */
    async generateSoundEffect(
        description: string,
        durationSeconds: number | undefined,
        _ctx: AdapterCallContext
    ): Promise<SynthesisResult> {
        const audio = Buffer.alloc(0);
        return {
            audio,
            format: 'mp3',
            stub: true,
            metadata: describeSynthesis(description, audio, {
                durationSeconds: durationSeconds ?? 0,
                providerInfo: { note: 'sound effects are not available yet' },
            }),
        };
    }

    private validateSamples(name: string, samples: VoiceSample[]): void {
        if (!name.trim()) {
            throw new TtsError('InvalidInput', this.provider, 'Voice clone name is required');
        }
        if (samples.length === 0) {
            throw new TtsError('InvalidInput', this.provider, 'At least one audio sample is required for voice cloning');
        }
        if (samples.length > MAX_CLONE_SAMPLES) {
            throw new TtsError('InvalidInput', this.provider, `At most ${MAX_CLONE_SAMPLES} audio samples are allowed`);
        }
        samples.forEach((sample, index) => {
            if (sample.data.length < MIN_SAMPLE_BYTES) {
                throw new TtsError(
                    'InvalidInput',
                    this.provider,
                    `Audio sample ${index} is too small (${sample.data.length} bytes, minimum ${MIN_SAMPLE_BYTES})`
                );
            }
        });
    }

    private toDescriptor(raw: unknown): VoiceDescriptor | undefined {
        const id = readString(raw, 'voice_id');
        const name = readString(raw, 'name');
        if (!id || !name) return undefined;

        const labels = readRecord(raw, 'labels');
        const category = readString(raw, 'category');
        const useCase = readString(labels, 'use_case');
        const accent = readString(labels, 'accent');
        const language = readString(labels, 'language');

        const tags = [category, useCase, accent].filter((tag): tag is string => Boolean(tag));

        return {
            id,
            name,
            provider: this.provider,
            languages: [language || 'en'],
            gender: toGender(readString(labels, 'gender')),
            tags,
            qualityTier: category === 'professional' ? 'premium' : 'neural',
            description: readString(raw, 'description') ?? readString(labels, 'description'),
            previewUrl: readString(raw, 'preview_url'),
            sampleRate: 44100,
        };
    }

    private streamingUnsupported(): TtsError {
        return new TtsError('UnsupportedOperation', this.provider, 'ElevenLabs streaming is not supported');
    }
}
