export { createTtsGateway, TtsGatewayOverrides } from './TtsGatewayFactory';
export { TtsDispatcher, TtsDispatcherDeps, BatchRequestOptions } from './application/TtsDispatcher';
export { CapabilityRegistry, CapabilityTable, DEFAULT_CAPABILITIES } from './application/CapabilityRegistry';
export { ErrorNormalizer, DEFAULT_VENDOR_CODES, kindFromStatus, retryDisposition } from './application/ErrorNormalizer';
export {
    ResilienceEngine,
    ResilienceEngineOptions,
    ProviderCall,
    AttemptRecord,
    ExecuteOptions,
    ExecutionOutcome,
    computeBackoffDelay,
} from './application/ResilienceEngine';
export { StreamingSessionManager } from './application/StreamingSessionManager';
export { BatchOrchestrator, BatchItemResult, BatchOptions } from './application/BatchOrchestrator';
export { Config, loadConfig, validateConfig, getConfig, resetConfig, toRetryPolicy } from './config';

export * from './domain/entities/Capability';
export * from './domain/entities/Lexicon';
export * from './domain/entities/ProviderFailure';
export * from './domain/entities/RetryPolicy';
export * from './domain/entities/StreamingSession';
export * from './domain/entities/Synthesis';
export * from './domain/entities/TtsError';
export * from './domain/entities/Voice';
export { validateSynthesisInput, ValidationResult } from './domain/services/InputValidator';
export { ITtsProviderAdapter, AdapterCallContext, ProviderLimits } from './domain/ports/ITtsProviderAdapter';
export { ICachePort } from './domain/ports/ICachePort';
export { IMetricsPort, MetricTags, METRICS, NoOpMetricsAdapter } from './domain/ports/IMetricsPort';

export { ElevenLabsAdapter } from './infrastructure/tts/ElevenLabsAdapter';
export { PollyAdapter } from './infrastructure/tts/PollyAdapter';
export { GoogleTtsAdapter } from './infrastructure/tts/GoogleTtsAdapter';
export { GoogleAuthClient } from './infrastructure/tts/auth/GoogleAuthClient';
export { DeepgramAdapter, SpeakSocket, SpeakSocketFactory } from './infrastructure/tts/DeepgramAdapter';
export { createProviderAdapter } from './infrastructure/tts/ProviderAdapterFactory';
export { InMemoryCacheAdapter } from './infrastructure/cache/InMemoryCacheAdapter';
export { ConsoleMetricsAdapter } from './infrastructure/metrics/ConsoleMetricsAdapter';
export { PrometheusMetricsAdapter } from './infrastructure/metrics/PrometheusMetricsAdapter';
export { createMetricsAdapter, MetricsBackend } from './infrastructure/metrics/createMetricsAdapter';
