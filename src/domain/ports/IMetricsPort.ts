export type MetricTags = Record<string, string | number | boolean>;

/**
 * Sink for gateway observations. Backends: console, Prometheus, none.
 */
export interface IMetricsPort {
    incrementCounter(name: string, tags?: MetricTags, value?: number): void;

    /** Milliseconds. */
    recordDuration(name: string, durationMs: number, tags?: MetricTags): void;

    recordGauge(name: string, value: number, tags?: MetricTags): void;

    recordHistogram(name: string, value: number, tags?: MetricTags): void;
}

/** Default sink when no backend is configured. */
export class NoOpMetricsAdapter implements IMetricsPort {
    incrementCounter(): void { }
    recordDuration(): void { }
    recordGauge(): void { }
    recordHistogram(): void { }
}

export const METRICS = {
    ATTEMPTS_TOTAL: 'tts.attempts_total',
    RETRIES_TOTAL: 'tts.retries_total',
    FAILURES_TOTAL: 'tts.failures_total',
    VOICE_CACHE_HITS: 'tts.voice_cache_hits',
    VOICE_CACHE_MISSES: 'tts.voice_cache_misses',
    BATCH_FAILURES: 'tts.batch_failures',
    STREAMS_OPENED: 'tts.streams_opened',
    STREAMS_CLOSED: 'tts.streams_closed',

    ATTEMPT_DURATION: 'tts.attempt_duration_ms',
    BATCH_DURATION: 'tts.batch_duration_ms',

    ACTIVE_STREAMS: 'tts.active_streams',
    BATCH_SIZE: 'tts.batch_size',

    AUDIO_BYTES: 'tts.audio_bytes',
} as const;

export type MetricName = typeof METRICS[keyof typeof METRICS];

export const METRIC_HELP: Record<MetricName, string> = {
    'tts.attempts_total': 'Vendor calls made, including retries',
    'tts.retries_total': 'Vendor calls repeated after a retryable failure',
    'tts.failures_total': 'Operations that failed after their last attempt',
    'tts.voice_cache_hits': 'Voice lists served from the cache',
    'tts.voice_cache_misses': 'Voice lists fetched from the vendor',
    'tts.batch_failures': 'Batch items that ended in an error',
    'tts.streams_opened': 'Streaming sessions opened',
    'tts.streams_closed': 'Streaming sessions finished or cancelled',
    'tts.attempt_duration_ms': 'Duration of a single vendor call in milliseconds',
    'tts.batch_duration_ms': 'Duration of a whole batch in milliseconds',
    'tts.active_streams': 'Streaming sessions currently open',
    'tts.batch_size': 'Items in the most recent batch',
    'tts.audio_bytes': 'Size of synthesized audio in bytes',
};

export function isMetricName(name: string): name is MetricName {
    return Object.prototype.hasOwnProperty.call(METRIC_HELP, name);
}
