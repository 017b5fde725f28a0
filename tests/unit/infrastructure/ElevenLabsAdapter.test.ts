import nock from 'nock';
import { createSynthesisRequest } from '../../../src/domain/entities/Synthesis';
import { ElevenLabsAdapter, toElevenLabsOutput } from '../../../src/infrastructure/tts/ElevenLabsAdapter';
import { callContext } from '../../helpers/FakeTtsAdapter';

describe('ElevenLabsAdapter', () => {
    const apiKey = 'test-secret';
    const baseUrl = 'https://api.elevenlabs.io';
    let adapter: ElevenLabsAdapter;

    beforeEach(() => {
        nock.cleanAll();
        adapter = new ElevenLabsAdapter({ apiKey });
    });

    afterEach(() => {
        nock.cleanAll();
    });

    describe('Constructor validation', () => {
        it('should throw error when API key is missing', () => {
            expect(() => new ElevenLabsAdapter({ apiKey: '' })).toThrow('ElevenLabs API key is required');
        });
    });

    describe('listVoices()', () => {
        beforeEach(() => {
            nock(baseUrl)
                .matchHeader('xi-api-key', apiKey)
                .get('/v1/voices')
                .reply(200, {
                    voices: [
                        {
                            voice_id: 'v1',
                            name: 'Rachel',
                            category: 'premade',
                            labels: { gender: 'female', accent: 'american', use_case: 'narration' },
                            preview_url: 'https://example.com/rachel.mp3',
                        },
                        {
                            voice_id: 'v2',
                            name: 'Klaus',
                            category: 'professional',
                            labels: { gender: 'male', language: 'de' },
                        },
                        { name: 'no id' },
                    ],
                });
        });

        it('should map voices to descriptors and skip malformed entries', async () => {
            const voices = await adapter.listVoices(undefined, callContext());

            expect(voices).toHaveLength(2);
            expect(voices[0]).toEqual({
                id: 'v1',
                name: 'Rachel',
                provider: 'elevenlabs',
                languages: ['en'],
                gender: 'female',
                tags: ['premade', 'narration', 'american'],
                qualityTier: 'neural',
                description: undefined,
                previewUrl: 'https://example.com/rachel.mp3',
                sampleRate: 44100,
            });
            expect(voices[1]).toMatchObject({ id: 'v2', languages: ['de'], gender: 'male', qualityTier: 'premium' });
        });

        it('should apply the filter', async () => {
            const voices = await adapter.listVoices({ gender: 'male' }, callContext());

            expect(voices.map(voice => voice.id)).toEqual(['v2']);
        });

        it('should search by name and tag', async () => {
            const voices = await adapter.searchVoices('narration', undefined, callContext());

            expect(voices.map(voice => voice.id)).toEqual(['v1']);
        });
    });

    describe('synthesize()', () => {
        it('should post the text and return the audio with metadata', async () => {
            nock(baseUrl)
                .matchHeader('xi-api-key', apiKey)
                .post('/v1/text-to-speech/v1', body => body.text === 'Hello world' && body.model_id === 'eleven_multilingual_v2')
                .query({ output_format: 'mp3_44100_128' })
                .reply(200, Buffer.from('mp3-bytes'), { 'request-id': 'req-1' });

            const result = await adapter.synthesize(
                createSynthesisRequest({ text: 'Hello world', voiceId: 'v1' }),
                callContext()
            );

            expect(result.audio.toString()).toBe('mp3-bytes');
            expect(result.format).toBe('mp3');
            expect(result.metadata).toEqual({
                characterCount: 11,
                wordCount: 2,
                audioSizeBytes: 9,
                requestId: 'req-1',
                charactersBilled: 11,
                providerInfo: { model: 'eleven_multilingual_v2', outputFormat: 'mp3_44100_128' },
            });
        });

        it('should send voice settings when given', async () => {
            nock(baseUrl)
                .post(
                    '/v1/text-to-speech/v1',
                    body => body.voice_settings.stability === 0.3 && body.voice_settings.similarity_boost === 0.75
                )
                .query(true)
                .reply(200, Buffer.from('x'));

            await expect(
                adapter.synthesize(
                    createSynthesisRequest({ text: 'Hi', voiceId: 'v1', voiceSettings: { stability: 0.3 } }),
                    callContext()
                )
            ).resolves.toMatchObject({ format: 'mp3' });
        });

        it('should report the format actually delivered', async () => {
            nock(baseUrl)
                .post('/v1/text-to-speech/v1')
                .query({ output_format: 'pcm_44100' })
                .reply(200, Buffer.from('pcm'));

            const result = await adapter.synthesize(
                createSynthesisRequest({ text: 'Hi', voiceId: 'v1', audioConfig: { format: 'wav' } }),
                callContext()
            );

            expect(result.format).toBe('pcm');
        });

        it('should surface the vendor status and error code', async () => {
            nock(baseUrl)
                .post('/v1/text-to-speech/v1')
                .query(true)
                .reply(401, { detail: { status: 'invalid_api_key', message: 'Invalid API key' } });

            await expect(
                adapter.synthesize(createSynthesisRequest({ text: 'Hi', voiceId: 'v1' }), callContext())
            ).rejects.toMatchObject({
                name: 'ProviderFailure',
                status: 401,
                code: 'invalid_api_key',
                message: 'ElevenLabs synthesize request failed with status 401: Invalid API key',
            });
        });

        it('should read Retry-After on throttling', async () => {
            nock(baseUrl)
                .post('/v1/text-to-speech/v1')
                .query(true)
                .reply(429, { detail: { status: 'too_many_concurrent_requests', message: 'Slow down' } }, {
                    'retry-after': '3',
                });

            await expect(
                adapter.synthesize(createSynthesisRequest({ text: 'Hi', voiceId: 'v1' }), callContext())
            ).rejects.toMatchObject({ status: 429, retryAfterMs: 3000 });
        });

        it('should keep the network code when no response arrives', async () => {
            nock(baseUrl)
                .post('/v1/text-to-speech/v1')
                .query(true)
                .replyWithError({ code: 'ECONNRESET', message: 'socket hang up' });

            await expect(
                adapter.synthesize(createSynthesisRequest({ text: 'Hi', voiceId: 'v1' }), callContext())
            ).rejects.toMatchObject({ name: 'ProviderFailure', networkCode: 'ECONNRESET' });
        });
    });

    describe('createVoiceClone()', () => {
        const sample = { fileName: 'sample.mp3', data: Buffer.alloc(2048) };

        it('should upload samples and return the new voice', async () => {
            nock(baseUrl)
                .matchHeader('xi-api-key', apiKey)
                .matchHeader('content-type', /^multipart\/form-data; boundary=/)
                .post('/v1/voices/add')
                .reply(200, { voice_id: 'cloned-1' });

            const voice = await adapter.createVoiceClone('Narrator', [sample], 'Warm narrator', callContext());

            expect(voice).toMatchObject({
                id: 'cloned-1',
                name: 'Narrator',
                provider: 'elevenlabs',
                tags: ['cloned'],
                description: 'Warm narrator',
            });
        });

        it('should reject invalid samples before calling the API', async () => {
            await expect(adapter.createVoiceClone('Narrator', [], undefined, callContext())).rejects.toMatchObject({
                kind: 'InvalidInput',
                message: 'At least one audio sample is required for voice cloning',
            });
            await expect(
                adapter.createVoiceClone('Narrator', [{ fileName: 'tiny.mp3', data: Buffer.alloc(10) }], undefined, callContext())
            ).rejects.toMatchObject({
                message: 'Audio sample 0 is too small (10 bytes, minimum 1024)',
            });
            await expect(adapter.createVoiceClone(' ', [sample], undefined, callContext())).rejects.toMatchObject({
                message: 'Voice clone name is required',
            });
        });

        it('should fail when the response has no voice id', async () => {
            nock(baseUrl).post('/v1/voices/add').reply(200, {});

            await expect(adapter.createVoiceClone('Narrator', [sample], undefined, callContext())).rejects.toMatchObject({
                kind: 'Internal',
                message: 'ElevenLabs returned no voice_id for the clone',
            });
        });
    });

    describe('unsupported and planned operations', () => {
        it('should return a marked placeholder for sound effects', async () => {
            const result = await adapter.generateSoundEffect('thunder', 2, callContext());

            expect(result.stub).toBe(true);
            expect(result.audio.length).toBe(0);
            expect(result.metadata?.durationSeconds).toBe(2);
        });

        it('should reject streaming calls', async () => {
            await expect(adapter.startStream({ voiceId: 'v1' }, callContext())).rejects.toMatchObject({
                kind: 'UnsupportedOperation',
            });
        });
    });

    describe('toElevenLabsOutput()', () => {
        it('should fall back to MP3 for formats without a native equivalent', () => {
            expect(toElevenLabsOutput('ogg_opus').name).toBe('mp3_44100_128');
            expect(toElevenLabsOutput('mulaw')).toMatchObject({ name: 'ulaw_8000', format: 'mulaw' });
        });
    });
});
