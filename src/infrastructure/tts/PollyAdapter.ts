import axios from 'axios';
import { LexiconEntry, LexiconInfo } from '../../domain/entities/Lexicon';
import { StreamOptions } from '../../domain/entities/StreamingSession';
import {
    AudioFormat,
    describeSynthesis,
    SynthesisRequest,
    SynthesisResult,
    TimingMark,
} from '../../domain/entities/Synthesis';
import { TtsError } from '../../domain/entities/TtsError';
import {
    matchesVoiceFilter,
    matchesVoiceQuery,
    toGender,
    VoiceDescriptor,
    VoiceFilter,
} from '../../domain/entities/Voice';
import { AdapterCallContext, ITtsProviderAdapter, ProviderLimits } from '../../domain/ports/ITtsProviderAdapter';
import { AwsCredentials, SigV4Signer } from './auth/SigV4Signer';
import {
    ErrorCodeExtractor,
    isRecord,
    parseJson,
    readArray,
    readNumber,
    readString,
    toBuffer,
    toProviderFailure,
} from './http';

export interface PollyAdapterOptions {
    credentials: AwsCredentials;
    region?: string;
    /** Override for tests and VPC endpoints */
    endpoint?: string;
    signer?: SigV4Signer;
}

interface PollyOutput {
    outputFormat: 'mp3' | 'pcm';
    format: AudioFormat;
    sampleRate: string;
}

const LEXICON_NAME_PATTERN = /^[0-9A-Za-z]{1,20}$/;

/**
 * Raw pcm for pcm/wav, mp3 for everything else.
 */
export function toPollyOutput(format: AudioFormat, sampleRate?: number): PollyOutput {
    switch (format) {
        case 'pcm':
        case 'wav':
            return { outputFormat: 'pcm', format: 'pcm', sampleRate: String(sampleRate === 8000 ? 8000 : 16000) };
        default:
            return { outputFormat: 'mp3', format: 'mp3', sampleRate: String(sampleRate ?? 24000) };
    }
}

/**
 * Polly reports `__type` in the body (e.g. `com.amazonaws.polly#ThrottlingException`)
 * or `x-amzn-ErrorType` (e.g. `ThrottlingException:http://...`).
 */
export const extractPollyErrorCode: ErrorCodeExtractor = (body, header) => {
    const raw = readString(body, '__type') ?? readString(body, 'code');
    const fromHeader = header('x-amzn-errortype');
    const value = raw ?? (typeof fromHeader === 'string' ? fromHeader : undefined);
    if (!value) return undefined;

    const withoutUrl = value.split(':')[0];
    const hashIndex = withoutUrl.lastIndexOf('#');
    return hashIndex >= 0 ? withoutUrl.slice(hashIndex + 1) : withoutUrl;
};

/**
 * Parses Polly speech marks: one JSON object per line.
 */
export function parseSpeechMarks(body: string): TimingMark[] {
    const marks: TimingMark[] = [];
    for (const line of body.split('\n')) {
        if (!line.trim()) continue;
        const mark = parseJson(line);
        const time = readNumber(mark, 'time');
        const type = readString(mark, 'type');
        const value = readString(mark, 'value');
        if (time === undefined || value === undefined) continue;
        if (type !== 'word' && type !== 'sentence' && type !== 'ssml' && type !== 'viseme') continue;

        marks.push({
            timeMs: time,
            type,
            text: value,
            startOffset: readNumber(mark, 'start'),
            endOffset: readNumber(mark, 'end'),
        });
    }
    return marks;
}

/**
 * Amazon Polly adapter over the REST API, signed with SigV4.
 */
export class PollyAdapter implements ITtsProviderAdapter {
    readonly provider = 'polly' as const;
    readonly limits: ProviderLimits = { maxCharacters: 3000 };

    private readonly endpoint: string;
    private readonly signer: SigV4Signer;

    constructor(options: PollyAdapterOptions) {
        const region = options.region || 'us-east-1';
        this.endpoint = (options.endpoint || `https://polly.${region}.amazonaws.com`).replace(/\/$/, '');
        this.signer = options.signer ?? new SigV4Signer(options.credentials, region, 'polly');
    }

    async listVoices(filter: VoiceFilter | undefined, ctx: AdapterCallContext): Promise<VoiceDescriptor[]> {
        const query = new URLSearchParams({ Engine: 'neural' });
        if (filter?.language && filter.language.includes('-')) {
            query.set('LanguageCode', filter.language);
        }
        const url = `${this.endpoint}/v1/voices?${query.toString()}`;

        try {
            const response = await axios.get<unknown>(url, {
                headers: this.signer.sign({ method: 'GET', url }),
                signal: ctx.signal,
            });

            return readArray(response.data, 'Voices')
                .map(voice => this.toDescriptor(voice))
                .filter((voice): voice is VoiceDescriptor => voice !== undefined)
                .filter(voice => matchesVoiceFilter(voice, filter));
        } catch (error) {
            throw toProviderFailure(error, 'Polly listVoices', extractPollyErrorCode);
        }
    }

    async searchVoices(query: string, filter: VoiceFilter | undefined, ctx: AdapterCallContext): Promise<VoiceDescriptor[]> {
        const voices = await this.listVoices(filter, ctx);
        return voices.filter(voice => matchesVoiceQuery(voice, query));
    }

    async synthesize(request: SynthesisRequest, ctx: AdapterCallContext): Promise<SynthesisResult> {
        const output = toPollyOutput(request.audioConfig.format, request.audioConfig.sampleRate);
        const response = await this.speech(
            {
                Text: request.text,
                TextType: request.textType === 'ssml' ? 'ssml' : 'text',
                OutputFormat: output.outputFormat,
                SampleRate: output.sampleRate,
                VoiceId: request.voiceId,
                LanguageCode: request.language,
                Engine: 'neural',
            },
            'synthesize',
            ctx
        );

        const audio = toBuffer(response.data);
        const requestId = response.headers['x-amzn-requestid'];
        const billed = response.headers['x-amzn-requestcharacters'];
        return {
            audio,
            format: output.format,
            metadata: describeSynthesis(request.text, audio, {
                requestId: typeof requestId === 'string' ? requestId : undefined,
                charactersBilled: typeof billed === 'string' ? parseInt(billed, 10) : undefined,
                providerInfo: { engine: 'neural', outputFormat: output.outputFormat },
            }),
        };
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
     * Word and sentence speech marks for the request text.
     */
    async getTimingMarks(request: SynthesisRequest, ctx: AdapterCallContext): Promise<TimingMark[]> {
        const response = await this.speech(
            {
                Text: request.text,
                TextType: request.textType === 'ssml' ? 'ssml' : 'text',
                OutputFormat: 'json',
                SpeechMarkTypes: ['word', 'sentence'],
                VoiceId: request.voiceId,
                LanguageCode: request.language,
                Engine: 'neural',
            },
            'getTimingMarks',
            ctx
        );
        return parseSpeechMarks(toBuffer(response.data).toString('utf8'));
    }

    /**
     * Lexicon upload is not wired to PutLexicon yet. Validates the input and returns a placeholder.
     */
    async createLexicon(
        name: string,
        language: string,
        entries: LexiconEntry[],
        _ctx: AdapterCallContext
    ): Promise<LexiconInfo> {
        if (!LEXICON_NAME_PATTERN.test(name)) {
            throw new TtsError('InvalidInput', this.provider, 'Lexicon name must be 1-20 alphanumeric characters');
        }
        const invalid = entries.find(entry => !entry.grapheme.trim() || (!entry.phoneme && !entry.alias));
        if (invalid) {
            throw new TtsError('InvalidInput', this.provider, `Lexicon entry "${invalid.grapheme}" needs a phoneme or an alias`);
        }
        return { name, language, entryCount: entries.length, stub: true };
    }

    private async speech(body: Record<string, unknown>, operation: string, ctx: AdapterCallContext) {
        const url = `${this.endpoint}/v1/speech`;
        const payload = JSON.stringify(body);

        try {
            return await axios.post<ArrayBuffer>(url, payload, {
                headers: this.signer.sign({
                    method: 'POST',
                    url,
                    headers: { 'content-type': 'application/json' },
                    body: payload,
                }),
                responseType: 'arraybuffer',
                signal: ctx.signal,
            });
        } catch (error) {
            throw toProviderFailure(error, `Polly ${operation}`, extractPollyErrorCode);
        }
    }

    private toDescriptor(raw: unknown): VoiceDescriptor | undefined {
        if (!isRecord(raw)) return undefined;
        const id = readString(raw, 'Id');
        const languageCode = readString(raw, 'LanguageCode');
        if (!id || !languageCode) return undefined;

        const additional = readArray(raw, 'AdditionalLanguageCodes').filter(
            (code): code is string => typeof code === 'string'
        );
        const engines = readArray(raw, 'SupportedEngines').filter(
            (engine): engine is string => typeof engine === 'string'
        );

        return {
            id,
            name: readString(raw, 'Name') ?? id,
            provider: this.provider,
            languages: [languageCode, ...additional],
            gender: toGender(readString(raw, 'Gender')),
            tags: engines,
            qualityTier: engines.includes('neural') || engines.includes('generative') ? 'neural' : 'standard',
            description: readString(raw, 'LanguageName'),
            sampleRate: 24000,
        };
    }

    private streamingUnsupported(): TtsError {
        return new TtsError('UnsupportedOperation', this.provider, 'Polly streaming is not supported');
    }
}
