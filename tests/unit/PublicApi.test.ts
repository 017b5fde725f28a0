import * as gateway from '../../src';

describe('public API', () => {
    it('should expose the factory, dispatcher and adapters', () => {
        expect(typeof gateway.createTtsGateway).toBe('function');
        expect(typeof gateway.TtsDispatcher).toBe('function');
        expect(typeof gateway.createProviderAdapter).toBe('function');
        expect(typeof gateway.DeepgramAdapter).toBe('function');
        expect(gateway.METRICS.AUDIO_BYTES).toBe('tts.audio_bytes');
    });

    it('should expose the request helpers', () => {
        const request = gateway.createSynthesisRequest({ text: 'Hi', voiceId: 'aura-asteria-en' });

        expect(request.text).toBe('Hi');
        expect(gateway.isProviderName('polly')).toBe(true);
        expect(gateway.isProviderName('acme')).toBe(false);
    });
});
