/**
 * TTS Gateway Factory
 *
 * Wires configuration, metrics, the resilience engine and the provider adapter
 * into a ready-to-use TtsDispatcher.
 */

import { BatchOrchestrator } from './application/BatchOrchestrator';
import { CapabilityRegistry, CapabilityTable } from './application/CapabilityRegistry';
import { ErrorNormalizer } from './application/ErrorNormalizer';
import { ResilienceEngine, SleepFn } from './application/ResilienceEngine';
import { StreamingSessionManager } from './application/StreamingSessionManager';
import { TtsDispatcher } from './application/TtsDispatcher';
import { Config, getConfig, toRetryPolicy, validateConfig } from './config';
import { VoiceDescriptor } from './domain/entities/Voice';
import { ICachePort } from './domain/ports/ICachePort';
import { IMetricsPort } from './domain/ports/IMetricsPort';
import { ITtsProviderAdapter } from './domain/ports/ITtsProviderAdapter';
import { InMemoryCacheAdapter } from './infrastructure/cache/InMemoryCacheAdapter';
import { createMetricsAdapter } from './infrastructure/metrics/createMetricsAdapter';
import { createProviderAdapter } from './infrastructure/tts/ProviderAdapterFactory';

export interface TtsGatewayOverrides {
    /** Use this adapter instead of the one selected by TTS_PROVIDER */
    adapter?: ITtsProviderAdapter;
    metrics?: IMetricsPort;
    capabilities?: CapabilityTable;
    voiceCache?: ICachePort<VoiceDescriptor[]>;
    sleep?: SleepFn;
    random?: () => number;
}

/**
 * Creates a gateway bound to one provider.
 *
 * @example
 * ```typescript
 * const gateway = createTtsGateway();
 * const result = await gateway.synthesize(createSynthesisRequest({
 *     text: 'Hello there',
 *     voiceId: 'aura-asteria-en',
 * }));
 * ```
 *
 * @throws Error listing every configuration problem when the config is invalid
 */
export function createTtsGateway(config: Config = getConfig(), overrides: TtsGatewayOverrides = {}): TtsDispatcher {
    // An injected adapter brings its own credentials
    const errors = validateConfig(config).filter(error => !overrides.adapter || !isCredentialError(error));
    if (errors.length > 0) {
        errors.forEach(error => console.error(`[TtsGateway] ${error}`));
        throw new Error(`Invalid TTS gateway configuration:\n  - ${errors.join('\n  - ')}`);
    }

    const metrics = overrides.metrics ?? createMetricsAdapter(config.metrics);
    const adapter = overrides.adapter ?? createProviderAdapter(config);
    const registry = new CapabilityRegistry(overrides.capabilities);

    const engine = new ResilienceEngine({
        policy: toRetryPolicy(config),
        normalizer: new ErrorNormalizer(),
        metrics,
        sleep: overrides.sleep,
        random: overrides.random,
    });

    const dispatcher = new TtsDispatcher({
        adapter,
        registry,
        engine,
        sessions: new StreamingSessionManager(engine, registry, { metrics }),
        batch: new BatchOrchestrator(engine, { concurrency: config.batchConcurrency, metrics }),
        voiceCache: overrides.voiceCache ?? new InMemoryCacheAdapter<VoiceDescriptor[]>(),
        voiceCacheTtlSeconds: config.voiceCacheTtlSeconds,
        metrics,
    });

    console.log(
        `[TtsGateway] Ready: provider=${adapter.provider}, maxAttempts=${config.maxAttempts}, timeout=${config.timeoutSeconds}s, batchConcurrency=${config.batchConcurrency}`
    );
    return dispatcher;
}

function isCredentialError(error: string): boolean {
    return error.includes('is required when TTS_PROVIDER');
}
