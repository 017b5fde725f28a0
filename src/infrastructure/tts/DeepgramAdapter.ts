import axios from 'axios';
import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import WebSocket from 'ws';
import { ProviderFailure } from '../../domain/entities/ProviderFailure';
import { StreamOptions } from '../../domain/entities/StreamingSession';
import { AudioFormat, describeSynthesis, SynthesisRequest, SynthesisResult } from '../../domain/entities/Synthesis';
import { TtsError } from '../../domain/entities/TtsError';
import { matchesVoiceFilter, matchesVoiceQuery, VoiceDescriptor, VoiceFilter } from '../../domain/entities/Voice';
import { AdapterCallContext, ITtsProviderAdapter, ProviderLimits } from '../../domain/ports/ITtsProviderAdapter';
import { ErrorCodeExtractor, isRecord, parseJson, readNumber, readString, toBuffer, toProviderFailure } from './http';
import deepgramVoices from './data/deepgram-voices.json';

/**
 * Minimal socket surface the adapter needs. `ws` WebSocket satisfies it.
 */
export interface SpeakSocket extends EventEmitter {
    send(data: string, cb?: (err?: Error) => void): void;
    close(): void;
}

export type SpeakSocketFactory = (url: string, headers: Record<string, string>) => SpeakSocket;

export interface DeepgramAdapterOptions {
    apiKey: string;
    baseUrl?: string;
    socketFactory?: SpeakSocketFactory;
}

export const SUPPORTED_SAMPLE_RATES: readonly number[] = [8000, 16000, 24000, 32000, 48000];

/**
 * Query parameters for /v1/speak per output format.
 */
export function toDeepgramParams(format: AudioFormat, sampleRate?: number): Record<string, string> {
    const rate = (fallback: number): string =>
        String(sampleRate !== undefined && SUPPORTED_SAMPLE_RATES.includes(sampleRate) ? sampleRate : fallback);

    switch (format) {
        case 'mp3':
            return { encoding: 'mp3', bit_rate: '48000' };
        case 'wav':
            return { encoding: 'linear16', container: 'wav', sample_rate: rate(24000) };
        case 'pcm':
            return { encoding: 'linear16', container: 'none', sample_rate: rate(24000) };
        case 'ogg_opus':
            return { encoding: 'opus', container: 'ogg', bit_rate: '12000' };
        case 'aac':
            return { encoding: 'aac', bit_rate: '48000' };
        case 'flac':
            return { encoding: 'flac', sample_rate: rate(48000) };
        case 'mulaw':
            return { encoding: 'mulaw', container: 'wav', sample_rate: '8000' };
        case 'alaw':
            return { encoding: 'alaw', container: 'wav', sample_rate: '8000' };
    }
}

export const extractDeepgramErrorCode: ErrorCodeExtractor = body => readString(body, 'err_code');

const defaultSocketFactory: SpeakSocketFactory = (url, headers) => new WebSocket(url, { headers });

interface FlushWaiter {
    resolve: () => void;
    reject: (error: Error) => void;
}

interface LiveStream {
    socket: SpeakSocket;
    audio: Buffer[];
    flushWaiters: FlushWaiter[];
    failure?: Error;
    closed: boolean;
}

/**
 * Deepgram Aura adapter: REST synthesis plus WebSocket streaming.
 */
export class DeepgramAdapter implements ITtsProviderAdapter {
    readonly provider = 'deepgram' as const;
    readonly limits: ProviderLimits = { maxCharacters: 2000 };

    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly socketFactory: SpeakSocketFactory;
    private readonly voices: VoiceDescriptor[];
    private readonly streams = new Map<string, LiveStream>();

    constructor(options: DeepgramAdapterOptions) {
        if (!options.apiKey) {
            throw new Error('Deepgram API key is required');
        }
        this.apiKey = options.apiKey;
        this.baseUrl = (options.baseUrl || 'https://api.deepgram.com').replace(/\/$/, '');
        this.socketFactory = options.socketFactory ?? defaultSocketFactory;
        this.voices = deepgramVoices.map(voice => ({
            id: voice.id,
            name: voice.name,
            provider: this.provider,
            languages: voice.languages,
            gender: voice.gender === 'male' ? 'male' : 'female',
            tags: [voice.accent, voice.age, ...voice.characteristics, ...voice.useCases],
            qualityTier: 'neural',
            description: `${voice.accent} ${voice.gender}, ${voice.characteristics.join(', ')}`,
            sampleRate: 24000,
        }));
    }

    /**
     * The Aura catalogue is fixed, so this never calls the network.
     */
    async listVoices(filter: VoiceFilter | undefined, _ctx: AdapterCallContext): Promise<VoiceDescriptor[]> {
        return this.voices.filter(voice => matchesVoiceFilter(voice, filter));
    }

    async searchVoices(query: string, filter: VoiceFilter | undefined, ctx: AdapterCallContext): Promise<VoiceDescriptor[]> {
        const voices = await this.listVoices(filter, ctx);
        return voices.filter(voice => matchesVoiceQuery(voice, query));
    }

    async synthesize(request: SynthesisRequest, ctx: AdapterCallContext): Promise<SynthesisResult> {
        const params: Record<string, string> = {
            model: request.voiceId,
            ...toDeepgramParams(request.audioConfig.format, request.audioConfig.sampleRate),
        };

        try {
            const response = await axios.post<ArrayBuffer>(
                `${this.baseUrl}/v1/speak`,
                { text: request.text },
                {
                    params,
                    headers: {
                        Authorization: `Token ${this.apiKey}`,
                        'Content-Type': 'application/json',
                    },
                    responseType: 'arraybuffer',
                    signal: ctx.signal,
                }
            );

            const audio = toBuffer(response.data);
            const requestId = response.headers['dg-request-id'];
            const charCount = response.headers['dg-char-count'];
            return {
                audio,
                format: request.audioConfig.format,
                metadata: describeSynthesis(request.text, audio, {
                    requestId: typeof requestId === 'string' ? requestId : undefined,
                    charactersBilled: typeof charCount === 'string' ? parseInt(charCount, 10) : undefined,
                    providerInfo: { model: request.voiceId, encoding: params.encoding },
                }),
            };
        } catch (error) {
            throw toProviderFailure(error, 'Deepgram synthesize', extractDeepgramErrorCode);
        }
    }

    async synthesizeBatchItem(request: SynthesisRequest, ctx: AdapterCallContext): Promise<SynthesisResult> {
        return this.synthesize(request, ctx);
    }

    /**
     * Opens a speak WebSocket and resolves once it is connected.
     */
    async startStream(options: StreamOptions, ctx: AdapterCallContext): Promise<string> {
        const format = options.audioConfig?.format ?? 'pcm';
        const query = new URLSearchParams({
            model: options.voiceId,
            ...this.streamingParams(format, options.audioConfig?.sampleRate),
        });
        const url = `${this.baseUrl.replace(/^http/, 'ws')}/v1/speak?${query.toString()}`;

        const socket = this.socketFactory(url, { Authorization: `Token ${this.apiKey}` });
        const streamId = `dg_${uuidv4()}`;
        const stream: LiveStream = { socket, audio: [], flushWaiters: [], closed: false };

        await new Promise<void>((resolve, reject) => {
            const onOpen = () => {
                detach();
                resolve();
            };
            const onAbort = () => {
                abandon(new ProviderFailure('Deepgram stream connection aborted', { networkCode: 'ECONNABORTED' }));
            };
            const onUnexpectedResponse = (_request: unknown, response: unknown) => {
                const status = readNumber(response, 'statusCode');
                abandon(new ProviderFailure(`Deepgram stream rejected with status ${status ?? 'unknown'}`, { status }));
            };
            const onError = (error: Error) => {
                abandon(new ProviderFailure(`Deepgram stream connection failed: ${error.message}`, {
                    networkCode: this.networkCode(error),
                    cause: error,
                }));
            };
            const detach = () => {
                ctx.signal.removeEventListener('abort', onAbort);
                socket.off('open', onOpen);
                socket.off('unexpected-response', onUnexpectedResponse);
                socket.off('error', onError);
            };
            // ws aborts the handshake on close() and reports that as one more error
            const abandon = (failure: ProviderFailure) => {
                detach();
                socket.on('error', (error: Error) => {
                    console.warn(`[Deepgram] Abandoned connection for ${streamId}: ${error.message}`);
                });
                socket.close();
                reject(failure);
            };

            ctx.signal.addEventListener('abort', onAbort, { once: true });
            socket.once('open', onOpen);
            socket.once('unexpected-response', onUnexpectedResponse);
            socket.once('error', onError);
        });

        this.attach(streamId, stream);
        this.streams.set(streamId, stream);
        console.log(`[Deepgram] Stream ${streamId} connected (${options.voiceId})`);
        return streamId;
    }

    /**
     * Sends a Speak message. Acknowledged once the frame is written; resolves with the audio
     * that arrived since the previous call.
     */
    async pushText(streamId: string, text: string, _ctx: AdapterCallContext): Promise<Buffer> {
        const stream = this.requireStream(streamId);
        await this.send(stream, { type: 'Speak', text });
        return this.drain(stream);
    }

    /**
     * Flushes, waits for the Flushed confirmation, then closes the socket.
     */
    async finishStream(streamId: string, ctx: AdapterCallContext): Promise<Buffer> {
        const stream = this.requireStream(streamId);

        // Registered before the send so a Flushed reply can never arrive unobserved
        const flush = this.waitForFlush(stream, ctx.signal);
        try {
            await Promise.all([this.send(stream, { type: 'Flush' }), flush.done]);
        } catch (error) {
            flush.cancel();
            throw error;
        }

        const audio = this.drain(stream);
        await this.send(stream, { type: 'Close' });
        stream.socket.close();
        this.streams.delete(streamId);
        console.log(`[Deepgram] Stream ${streamId} finished`);
        return audio;
    }

    async abortStream(streamId: string): Promise<void> {
        const stream = this.streams.get(streamId);
        if (!stream) return;

        this.streams.delete(streamId);
        if (!stream.closed) {
            stream.socket.close();
        }
        this.rejectWaiters(stream, new ProviderFailure('Deepgram stream aborted', { networkCode: 'ECONNABORTED' }));
    }

    openStreams(): number {
        return this.streams.size;
    }

    private streamingParams(format: AudioFormat, sampleRate?: number): Record<string, string> {
        // The speak socket only carries raw audio
        const rate = sampleRate !== undefined && SUPPORTED_SAMPLE_RATES.includes(sampleRate) ? sampleRate : 24000;
        switch (format) {
            case 'mulaw':
                return { encoding: 'mulaw', sample_rate: '8000' };
            case 'alaw':
                return { encoding: 'alaw', sample_rate: '8000' };
            default:
                return { encoding: 'linear16', sample_rate: String(rate) };
        }
    }

    private attach(streamId: string, stream: LiveStream): void {
        stream.socket.on('message', (data: unknown, isBinary: unknown) => {
            if (isBinary === true) {
                stream.audio.push(this.frameToBuffer(data));
                return;
            }
            this.handleControlMessage(streamId, stream, parseJson(this.frameToBuffer(data).toString('utf8')));
        });

        stream.socket.on('error', (error: Error) => {
            stream.failure = new ProviderFailure(`Deepgram stream error: ${error.message}`, {
                networkCode: this.networkCode(error) ?? 'ECONNRESET',
                cause: error,
            });
            console.error(`[Deepgram] Stream ${streamId} error:`, error.message);
        });

        stream.socket.on('close', (code: unknown) => {
            stream.closed = true;
            const failure = stream.failure ?? new ProviderFailure(`Deepgram stream closed (code ${String(code)})`, {
                networkCode: 'ECONNRESET',
            });
            this.rejectWaiters(stream, failure);
        });
    }

    private handleControlMessage(streamId: string, stream: LiveStream, message: unknown): void {
        if (!isRecord(message)) return;

        switch (message.type) {
            case 'Flushed': {
                const waiter = stream.flushWaiters.shift();
                waiter?.resolve();
                break;
            }
            case 'Warning':
                console.warn(`[Deepgram] Stream ${streamId} warning: ${readString(message, 'description') ?? 'unknown'}`);
                break;
            case 'Error': {
                const failure = new ProviderFailure(
                    `Deepgram stream error: ${readString(message, 'description') ?? readString(message, 'err_msg') ?? 'unknown'}`,
                    { code: readString(message, 'err_code') ?? readString(message, 'code') }
                );
                stream.failure = failure;
                this.rejectWaiters(stream, failure);
                break;
            }
            default:
                break;
        }
    }

    private send(stream: LiveStream, message: Record<string, string>): Promise<void> {
        if (stream.failure) {
            return Promise.reject(stream.failure);
        }
        if (stream.closed) {
            return Promise.reject(new ProviderFailure('Deepgram stream is closed', { networkCode: 'ECONNRESET' }));
        }

        return new Promise<void>((resolve, reject) => {
            stream.socket.send(JSON.stringify(message), error => {
                if (error) {
                    reject(new ProviderFailure(`Deepgram send failed: ${error.message}`, {
                        networkCode: this.networkCode(error) ?? 'EPIPE',
                        cause: error,
                    }));
                } else {
                    resolve();
                }
            });
        });
    }

    /**
     * `done` settles on the next Flushed, a stream failure or an abort. `cancel` withdraws
     * the waiter so later failures have nothing left to reject.
     */
    private waitForFlush(stream: LiveStream, signal: AbortSignal): { done: Promise<void>; cancel: () => void } {
        let cancel: () => void = () => undefined;
        const done = new Promise<void>((resolve, reject) => {
            const waiter: FlushWaiter = {
                resolve: () => {
                    cancel();
                    resolve();
                },
                reject: error => {
                    cancel();
                    reject(error);
                },
            };
            const onAbort = () => waiter.reject(new ProviderFailure('Deepgram flush aborted', { networkCode: 'ECONNABORTED' }));
            cancel = () => {
                signal.removeEventListener('abort', onAbort);
                const index = stream.flushWaiters.indexOf(waiter);
                if (index >= 0) {
                    stream.flushWaiters.splice(index, 1);
                }
            };

            signal.addEventListener('abort', onAbort, { once: true });
            stream.flushWaiters.push(waiter);
        });
        return { done, cancel };
    }

    private drain(stream: LiveStream): Buffer {
        const audio = Buffer.concat(stream.audio);
        stream.audio = [];
        return audio;
    }

    private rejectWaiters(stream: LiveStream, error: Error): void {
        const waiters = stream.flushWaiters.splice(0);
        waiters.forEach(waiter => waiter.reject(error));
    }

    private requireStream(streamId: string): LiveStream {
        const stream = this.streams.get(streamId);
        if (!stream) {
            throw new TtsError('Internal', this.provider, `Unknown Deepgram stream: ${streamId}`, { code: 'unknown_stream' });
        }
        return stream;
    }

    private frameToBuffer(data: unknown): Buffer {
        if (Array.isArray(data)) {
            return Buffer.concat(data.filter((part): part is Buffer => Buffer.isBuffer(part)));
        }
        return toBuffer(data);
    }

    private networkCode(error: Error): string | undefined {
        return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    }
}
