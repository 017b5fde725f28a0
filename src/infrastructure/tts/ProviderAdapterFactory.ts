import { Config } from '../../config';
import { ITtsProviderAdapter } from '../../domain/ports/ITtsProviderAdapter';
import { GoogleAuthClient } from './auth/GoogleAuthClient';
import { DeepgramAdapter } from './DeepgramAdapter';
import { ElevenLabsAdapter } from './ElevenLabsAdapter';
import { GoogleTtsAdapter } from './GoogleTtsAdapter';
import { PollyAdapter } from './PollyAdapter';

/**
 * Builds the adapter for the configured provider. Chosen once at startup.
 */
export function createProviderAdapter(config: Config): ITtsProviderAdapter {
    switch (config.provider) {
        case 'elevenlabs':
            return new ElevenLabsAdapter({
                apiKey: config.elevenLabsApiKey,
                baseUrl: config.elevenLabsBaseUrl,
                modelId: config.elevenLabsModelId,
            });
        case 'polly':
            return new PollyAdapter({
                credentials: {
                    accessKeyId: config.awsAccessKeyId,
                    secretAccessKey: config.awsSecretAccessKey,
                    sessionToken: config.awsSessionToken,
                },
                region: config.awsRegion,
            });
        case 'google':
            return new GoogleTtsAdapter({
                auth: new GoogleAuthClient({
                    accessToken: config.googleAccessToken || undefined,
                    serviceAccountJson: config.googleServiceAccountJson || undefined,
                }),
            });
        case 'deepgram':
            return new DeepgramAdapter({
                apiKey: config.deepgramApiKey,
                baseUrl: config.deepgramBaseUrl,
            });
    }
}
