import dotenv from 'dotenv';
import { isProviderName, ProviderName } from '../domain/entities/Capability';
import { BackoffStrategy, createRetryPolicy, MAX_TIMER_MS, RetryPolicy } from '../domain/entities/RetryPolicy';
import { MetricsBackend } from '../infrastructure/metrics/createMetricsAdapter';

// Load environment variables
dotenv.config();

/**
 * Gateway configuration loaded from environment variables.
 */
export interface Config {
    provider: ProviderName;

    // Resilience
    timeoutSeconds: number;
    maxAttempts: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
    retryBackoff: BackoffStrategy;
    retryJitter: boolean;

    // Batch, cache, metrics
    batchConcurrency: number;
    voiceCacheTtlSeconds: number;
    metrics: MetricsBackend;

    // ElevenLabs
    elevenLabsApiKey: string;
    elevenLabsBaseUrl: string;
    elevenLabsModelId: string;

    // Polly
    awsAccessKeyId: string;
    awsSecretAccessKey: string;
    awsSessionToken?: string;
    awsRegion: string;

    // Google
    googleAccessToken: string;
    googleServiceAccountJson: string;

    // Deepgram
    deepgramApiKey: string;
    deepgramBaseUrl: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = getEnvVar(key, defaultValue?.toString());
    return value.toLowerCase() === 'true';
}

function getEnvVarChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
    const value = getEnvVar(key, defaultValue).toLowerCase();
    const match = choices.find(choice => choice === value);
    if (!match) {
        throw new Error(`Environment variable ${key} must be one of ${choices.join(', ')}, got: ${value}`);
    }
    return match;
}

function getProvider(): ProviderName {
    const value = getEnvVar('TTS_PROVIDER', 'elevenlabs').toLowerCase();
    if (!isProviderName(value)) {
        throw new Error(`TTS_PROVIDER must be one of elevenlabs, polly, google, deepgram, got: ${value}`);
    }
    return value;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        provider: getProvider(),

        // Resilience
        timeoutSeconds: getEnvVarNumber('TTS_TIMEOUT_SECONDS', 30),
        maxAttempts: getEnvVarNumber('TTS_MAX_ATTEMPTS', 10),
        retryBaseDelayMs: getEnvVarNumber('TTS_RETRY_BASE_DELAY_MS', 1000),
        retryMaxDelayMs: getEnvVarNumber('TTS_RETRY_MAX_DELAY_MS', 30000),
        retryBackoff: getEnvVarChoice('TTS_RETRY_BACKOFF', ['exponential', 'fixed'], 'exponential'),
        retryJitter: getEnvVarBoolean('TTS_RETRY_JITTER', true),

        // Batch, cache, metrics
        batchConcurrency: getEnvVarNumber('TTS_BATCH_CONCURRENCY', 1),
        voiceCacheTtlSeconds: getEnvVarNumber('TTS_VOICE_CACHE_TTL_SECONDS', 300),
        metrics: getEnvVarChoice('TTS_METRICS', ['console', 'prometheus', 'none'], 'console'),

        // ElevenLabs
        elevenLabsApiKey: getEnvVar('ELEVENLABS_API_KEY', ''),
        elevenLabsBaseUrl: getEnvVar('ELEVENLABS_BASE_URL', 'https://api.elevenlabs.io'),
        elevenLabsModelId: getEnvVar('ELEVENLABS_MODEL_ID', 'eleven_multilingual_v2'),

        // Polly
        awsAccessKeyId: getEnvVar('AWS_ACCESS_KEY_ID', ''),
        awsSecretAccessKey: getEnvVar('AWS_SECRET_ACCESS_KEY', ''),
        awsSessionToken: process.env.AWS_SESSION_TOKEN ? getEnvVar('AWS_SESSION_TOKEN') : undefined,
        awsRegion: getEnvVar('AWS_REGION', 'us-east-1'),

        // Google
        googleAccessToken: getEnvVar('GOOGLE_ACCESS_TOKEN', ''),
        googleServiceAccountJson: getEnvVar('GOOGLE_SERVICE_ACCOUNT_JSON', ''),

        // Deepgram
        deepgramApiKey: getEnvVar('DEEPGRAM_API_KEY', ''),
        deepgramBaseUrl: getEnvVar('DEEPGRAM_BASE_URL', 'https://api.deepgram.com'),
    };
}

/**
 * Validates that the selected provider has its credentials and that resilience settings are sane.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    switch (config.provider) {
        case 'elevenlabs':
            if (!config.elevenLabsApiKey) {
                errors.push('ELEVENLABS_API_KEY is required when TTS_PROVIDER is "elevenlabs"');
            }
            break;
        case 'polly':
            if (!config.awsAccessKeyId || !config.awsSecretAccessKey) {
                errors.push('AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY are required when TTS_PROVIDER is "polly"');
            }
            break;
        case 'google':
            if (!config.googleAccessToken && !config.googleServiceAccountJson) {
                errors.push('GOOGLE_ACCESS_TOKEN or GOOGLE_SERVICE_ACCOUNT_JSON is required when TTS_PROVIDER is "google"');
            }
            break;
        case 'deepgram':
            if (!config.deepgramApiKey) {
                errors.push('DEEPGRAM_API_KEY is required when TTS_PROVIDER is "deepgram"');
            }
            break;
    }

    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
        errors.push('TTS_MAX_ATTEMPTS must be an integer >= 1');
    }
    if (config.timeoutSeconds <= 0) {
        errors.push('TTS_TIMEOUT_SECONDS must be positive');
    } else if (config.timeoutSeconds * 1000 > MAX_TIMER_MS) {
        errors.push(`TTS_TIMEOUT_SECONDS must be at most ${Math.floor(MAX_TIMER_MS / 1000)}`);
    }
    if (config.retryMaxDelayMs < config.retryBaseDelayMs) {
        errors.push('TTS_RETRY_MAX_DELAY_MS must not be below TTS_RETRY_BASE_DELAY_MS');
    }
    if (!Number.isInteger(config.batchConcurrency) || config.batchConcurrency < 1) {
        errors.push('TTS_BATCH_CONCURRENCY must be an integer >= 1');
    }

    return errors;
}

/**
 * Builds the default retry policy from configuration.
 */
export function toRetryPolicy(config: Config): RetryPolicy {
    return createRetryPolicy({
        maxAttempts: config.maxAttempts,
        timeoutMs: config.timeoutSeconds * 1000,
        baseDelayMs: config.retryBaseDelayMs,
        maxDelayMs: config.retryMaxDelayMs,
        backoff: config.retryBackoff,
        jitter: config.retryJitter,
    });
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
