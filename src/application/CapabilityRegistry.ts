import {
    CapabilityMatrix,
    CapabilityStatus,
    Feature,
    FEATURES,
    PROVIDERS,
    ProviderName,
} from '../domain/entities/Capability';
import { TtsError } from '../domain/entities/TtsError';

export type CapabilityTable = Readonly<Record<ProviderName, CapabilityMatrix>>;

/**
 * Which optional features each provider offers.
 */
export const DEFAULT_CAPABILITIES: CapabilityTable = {
    elevenlabs: {
        streaming: 'unsupported',
        voiceCloning: 'supported',
        lexicons: 'unsupported',
        ssml: 'unsupported',
        soundEffects: 'planned-stub',
        speechMarks: 'unsupported',
        audioProfiles: 'unsupported',
    },
    polly: {
        streaming: 'unsupported',
        voiceCloning: 'unsupported',
        lexicons: 'planned-stub',
        ssml: 'supported',
        soundEffects: 'unsupported',
        speechMarks: 'supported',
        audioProfiles: 'unsupported',
    },
    google: {
        streaming: 'unsupported',
        voiceCloning: 'unsupported',
        lexicons: 'unsupported',
        ssml: 'supported',
        soundEffects: 'unsupported',
        speechMarks: 'unsupported',
        audioProfiles: 'planned-stub',
    },
    deepgram: {
        streaming: 'supported',
        voiceCloning: 'unsupported',
        lexicons: 'unsupported',
        ssml: 'unsupported',
        soundEffects: 'unsupported',
        speechMarks: 'unsupported',
        audioProfiles: 'unsupported',
    },
};

/**
 * Static answer to "what can this provider do". Built once, read-only afterwards.
 */
export class CapabilityRegistry {
    private readonly table: CapabilityTable;

    constructor(table: CapabilityTable = DEFAULT_CAPABILITIES) {
        this.table = Object.freeze({
            elevenlabs: Object.freeze({ ...table.elevenlabs }),
            polly: Object.freeze({ ...table.polly }),
            google: Object.freeze({ ...table.google }),
            deepgram: Object.freeze({ ...table.deepgram }),
        });
    }

    supports(provider: ProviderName, feature: Feature): CapabilityStatus {
        return this.table[provider][feature];
    }

    getMatrix(provider: ProviderName): CapabilityMatrix {
        return this.table[provider];
    }

    providers(): ProviderName[] {
        return [...PROVIDERS];
    }

    /**
     * Features a provider offers, stubs included.
     */
    availableFeatures(provider: ProviderName): Feature[] {
        return FEATURES.filter(feature => this.table[provider][feature] !== 'unsupported');
    }

    /**
     * @throws TtsError (UnsupportedOperation) when the feature is unsupported
     */
    requireFeature(provider: ProviderName, feature: Feature, operation: string): CapabilityStatus {
        const status = this.supports(provider, feature);
        if (status === 'unsupported') {
            throw new TtsError(
                'UnsupportedOperation',
                provider,
                `${operation} requires ${feature}, which ${provider} does not support`,
                { code: 'unsupported_feature' }
            );
        }
        return status;
    }
}
