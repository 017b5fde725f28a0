import { ProviderName } from './Capability';

export const TTS_ERROR_KINDS = [
    'Unauthorized',
    'RateLimited',
    'InvalidInput',
    'UnsupportedOperation',
    'ProviderUnavailable',
    'Timeout',
    'Internal',
] as const;

export type TtsErrorKind = typeof TTS_ERROR_KINDS[number];

/** Where an error originated. `gateway` means no provider was involved yet. */
export type ErrorOrigin = ProviderName | 'gateway';

/**
 * How the resilience engine treats each kind.
 * `once` means a single retry per call.
 */
export type RetryDisposition = 'always' | 'once' | 'never';

export const RETRY_DISPOSITION: Readonly<Record<TtsErrorKind, RetryDisposition>> = {
    Unauthorized: 'never',
    RateLimited: 'always',
    InvalidInput: 'never',
    UnsupportedOperation: 'never',
    ProviderUnavailable: 'always',
    Timeout: 'always',
    Internal: 'once',
};

/** Code carried by errors raised because the caller cancelled the operation. */
export const CANCELLED_CODE = 'cancelled';

export interface TtsErrorDetails {
    statusCode?: number;
    /** Vendor error code, or a gateway code such as `cancelled` */
    code?: string;
    retryAfterMs?: number;
    attempts?: number;
    cause?: unknown;
}

/**
 * The single error type surfaced to callers of the gateway.
 */
export class TtsError extends Error {
    readonly kind: TtsErrorKind;
    readonly provider: ErrorOrigin;
    readonly statusCode?: number;
    readonly code?: string;
    readonly retryAfterMs?: number;
    readonly attempts?: number;

    constructor(kind: TtsErrorKind, provider: ErrorOrigin, message: string, details: TtsErrorDetails = {}) {
        super(message, details.cause === undefined ? undefined : { cause: details.cause });
        this.name = 'TtsError';
        this.kind = kind;
        this.provider = provider;
        this.statusCode = details.statusCode;
        this.code = details.code;
        this.retryAfterMs = details.retryAfterMs;
        this.attempts = details.attempts;
    }

    /**
     * Returns a copy stamped with the number of attempts made.
     */
    withAttempts(attempts: number): TtsError {
        return new TtsError(this.kind, this.provider, this.message, {
            statusCode: this.statusCode,
            code: this.code,
            retryAfterMs: this.retryAfterMs,
            attempts,
            cause: this.cause,
        });
    }

    get isCancellation(): boolean {
        return this.code === CANCELLED_CODE;
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            kind: this.kind,
            provider: this.provider,
            message: this.message,
            statusCode: this.statusCode,
            code: this.code,
            retryAfterMs: this.retryAfterMs,
            attempts: this.attempts,
        };
    }
}

export function isTtsError(value: unknown): value is TtsError {
    return value instanceof TtsError;
}

export function cancelledError(provider: ErrorOrigin, operation: string): TtsError {
    return new TtsError('Internal', provider, `${operation} was cancelled`, { code: CANCELLED_CODE });
}
