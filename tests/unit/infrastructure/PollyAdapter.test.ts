import nock from 'nock';
import { createSynthesisRequest } from '../../../src/domain/entities/Synthesis';
import {
    extractPollyErrorCode,
    parseSpeechMarks,
    PollyAdapter,
    toPollyOutput,
} from '../../../src/infrastructure/tts/PollyAdapter';
import { callContext } from '../../helpers/FakeTtsAdapter';

const SPEECH_MARKS = [
    '{"time":0,"type":"sentence","start":0,"end":11,"value":"Hello world"}',
    '{"time":6,"type":"word","start":0,"end":5,"value":"Hello"}',
    '{"time":300,"type":"word","start":6,"end":11,"value":"world"}',
    '',
].join('\n');

describe('PollyAdapter', () => {
    const baseUrl = 'https://polly.us-east-1.amazonaws.com';
    let adapter: PollyAdapter;

    beforeEach(() => {
        nock.cleanAll();
        adapter = new PollyAdapter({
            credentials: { accessKeyId: 'test-key-id', secretAccessKey: 'test-secret' },
            region: 'us-east-1',
        });
    });

    afterEach(() => {
        nock.cleanAll();
    });

    describe('listVoices()', () => {
        const voices = {
            Voices: [
                {
                    Id: 'Joanna',
                    Name: 'Joanna',
                    Gender: 'Female',
                    LanguageCode: 'en-US',
                    LanguageName: 'US English',
                    SupportedEngines: ['neural', 'standard'],
                },
                {
                    Id: 'Hans',
                    Gender: 'Male',
                    LanguageCode: 'de-DE',
                    AdditionalLanguageCodes: ['en-US'],
                    SupportedEngines: ['standard'],
                },
            ],
        };

        it('should send a signed request and map voices', async () => {
            nock(baseUrl)
                .matchHeader('authorization', /^AWS4-HMAC-SHA256 Credential=test-key-id\/\d{8}\/us-east-1\/polly\/aws4_request/)
                .matchHeader('x-amz-date', /^\d{8}T\d{6}Z$/)
                .get('/v1/voices')
                .query({ Engine: 'neural' })
                .reply(200, voices);

            const result = await adapter.listVoices(undefined, callContext());

            expect(result).toEqual([
                {
                    id: 'Joanna',
                    name: 'Joanna',
                    provider: 'polly',
                    languages: ['en-US'],
                    gender: 'female',
                    tags: ['neural', 'standard'],
                    qualityTier: 'neural',
                    description: 'US English',
                    sampleRate: 24000,
                },
                {
                    id: 'Hans',
                    name: 'Hans',
                    provider: 'polly',
                    languages: ['de-DE', 'en-US'],
                    gender: 'male',
                    tags: ['standard'],
                    qualityTier: 'standard',
                    description: undefined,
                    sampleRate: 24000,
                },
            ]);
        });

        it('should pass a full language code to the API', async () => {
            nock(baseUrl)
                .get('/v1/voices')
                .query({ Engine: 'neural', LanguageCode: 'en-US' })
                .reply(200, voices);

            const result = await adapter.listVoices({ language: 'en-US', gender: 'female' }, callContext());

            expect(result.map(voice => voice.id)).toEqual(['Joanna']);
        });
    });

    describe('synthesize()', () => {
        it('should request neural mp3 and return metadata from the response headers', async () => {
            nock(baseUrl)
                .post('/v1/speech', {
                    Text: 'Hello',
                    TextType: 'text',
                    OutputFormat: 'mp3',
                    SampleRate: '24000',
                    VoiceId: 'Joanna',
                    LanguageCode: 'en-US',
                    Engine: 'neural',
                })
                .reply(200, Buffer.from('mp3-audio'), {
                    'x-amzn-RequestId': 'req-9',
                    'x-amzn-RequestCharacters': '5',
                });

            const result = await adapter.synthesize(
                createSynthesisRequest({ text: 'Hello', voiceId: 'Joanna' }),
                callContext()
            );

            expect(result.audio.toString()).toBe('mp3-audio');
            expect(result.format).toBe('mp3');
            expect(result.metadata).toEqual({
                characterCount: 5,
                wordCount: 1,
                audioSizeBytes: 9,
                requestId: 'req-9',
                charactersBilled: 5,
                providerInfo: { engine: 'neural', outputFormat: 'mp3' },
            });
        });

        it('should send SSML and raw pcm when asked', async () => {
            nock(baseUrl)
                .post('/v1/speech', body => body.TextType === 'ssml' && body.OutputFormat === 'pcm' && body.SampleRate === '8000')
                .reply(200, Buffer.from('pcm'));

            const result = await adapter.synthesize(
                createSynthesisRequest({
                    text: '<speak>Hi</speak>',
                    textType: 'ssml',
                    voiceId: 'Joanna',
                    audioConfig: { format: 'wav', sampleRate: 8000 },
                }),
                callContext()
            );

            expect(result.format).toBe('pcm');
        });

        it('should read the error type from the body', async () => {
            nock(baseUrl)
                .post('/v1/speech')
                .reply(400, { __type: 'com.amazonaws.polly#ThrottlingException', message: 'Rate exceeded' });

            await expect(
                adapter.synthesize(createSynthesisRequest({ text: 'Hi', voiceId: 'Joanna' }), callContext())
            ).rejects.toMatchObject({
                name: 'ProviderFailure',
                status: 400,
                code: 'ThrottlingException',
                message: 'Polly synthesize request failed with status 400: Rate exceeded',
            });
        });

        it('should read the error type from the header when the body is empty', async () => {
            nock(baseUrl)
                .post('/v1/speech')
                .reply(403, '', {
                    'x-amzn-ErrorType': 'InvalidSignatureException:http://internal.example.com/',
                });

            await expect(
                adapter.synthesize(createSynthesisRequest({ text: 'Hi', voiceId: 'Joanna' }), callContext())
            ).rejects.toMatchObject({
                status: 403,
                code: 'InvalidSignatureException',
                message: 'Polly synthesize request failed with status 403',
            });
        });
    });

    describe('getTimingMarks()', () => {
        it('should request word and sentence marks and parse them', async () => {
            nock(baseUrl)
                .post('/v1/speech', body => body.OutputFormat === 'json' && body.SpeechMarkTypes.join(',') === 'word,sentence')
                .reply(200, SPEECH_MARKS);

            const marks = await adapter.getTimingMarks(
                createSynthesisRequest({ text: 'Hello world', voiceId: 'Joanna' }),
                callContext()
            );

            expect(marks).toEqual([
                { timeMs: 0, type: 'sentence', text: 'Hello world', startOffset: 0, endOffset: 11 },
                { timeMs: 6, type: 'word', text: 'Hello', startOffset: 0, endOffset: 5 },
                { timeMs: 300, type: 'word', text: 'world', startOffset: 6, endOffset: 11 },
            ]);
        });
    });

    describe('createLexicon()', () => {
        it('should return a marked placeholder for a valid lexicon', async () => {
            const info = await adapter.createLexicon(
                'brands',
                'en-US',
                [{ grapheme: 'W3C', alias: 'World Wide Web Consortium' }],
                callContext()
            );

            expect(info).toEqual({ name: 'brands', language: 'en-US', entryCount: 1, stub: true });
        });

        it('should validate the name and entries', async () => {
            await expect(adapter.createLexicon('my-brands', 'en-US', [], callContext())).rejects.toMatchObject({
                kind: 'InvalidInput',
                message: 'Lexicon name must be 1-20 alphanumeric characters',
            });
            await expect(
                adapter.createLexicon('brands', 'en-US', [{ grapheme: 'NASA' }], callContext())
            ).rejects.toMatchObject({ message: 'Lexicon entry "NASA" needs a phoneme or an alias' });
        });
    });

    it('should reject streaming calls', async () => {
        await expect(adapter.finishStream('any', callContext())).rejects.toMatchObject({
            kind: 'UnsupportedOperation',
            provider: 'polly',
        });
    });
});

describe('parseSpeechMarks()', () => {
    it('should skip blank, malformed and unknown lines', () => {
        const marks = parseSpeechMarks(
            ['not json', '{"time":1,"type":"emoji","value":"x"}', '{"type":"word","value":"x"}', '{"time":5,"type":"viseme","value":"p"}'].join('\n')
        );

        expect(marks).toEqual([{ timeMs: 5, type: 'viseme', text: 'p', startOffset: undefined, endOffset: undefined }]);
    });
});

describe('extractPollyErrorCode()', () => {
    const noHeader = () => undefined;

    it('should strip the namespace from __type', () => {
        expect(extractPollyErrorCode({ __type: 'com.amazonaws.polly#TextLengthExceededException' }, noHeader)).toBe(
            'TextLengthExceededException'
        );
    });

    it('should accept a plain code', () => {
        expect(extractPollyErrorCode({ code: 'ServiceFailureException' }, noHeader)).toBe('ServiceFailureException');
    });

    it('should return undefined when nothing identifies the error', () => {
        expect(extractPollyErrorCode('oops', noHeader)).toBeUndefined();
    });
});

describe('toPollyOutput()', () => {
    it('should map formats to what Polly can produce', () => {
        expect(toPollyOutput('pcm')).toEqual({ outputFormat: 'pcm', format: 'pcm', sampleRate: '16000' });
        expect(toPollyOutput('ogg_opus', 22050)).toEqual({ outputFormat: 'mp3', format: 'mp3', sampleRate: '22050' });
    });
});
