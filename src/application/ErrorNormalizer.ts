import axios from 'axios';
import { ProviderName } from '../domain/entities/Capability';
import { parseRetryAfterMs, ProviderFailure } from '../domain/entities/ProviderFailure';
import { RETRY_DISPOSITION, RetryDisposition, TtsError, TtsErrorKind } from '../domain/entities/TtsError';

export type VendorCodeTable = Readonly<Record<string, TtsErrorKind>>;

export type VendorCodeTables = Readonly<Record<ProviderName, VendorCodeTable>>;

/**
 * Vendor error codes that say more than the HTTP status alone.
 */
export const DEFAULT_VENDOR_CODES: VendorCodeTables = {
    elevenlabs: {
        invalid_api_key: 'Unauthorized',
        missing_permissions: 'Unauthorized',
        quota_exceeded: 'RateLimited',
        too_many_concurrent_requests: 'RateLimited',
        system_busy: 'ProviderUnavailable',
        voice_not_found: 'InvalidInput',
        max_character_limit_exceeded: 'InvalidInput',
        invalid_voice_settings: 'InvalidInput',
        voice_limit_reached: 'RateLimited',
    },
    polly: {
        UnrecognizedClientException: 'Unauthorized',
        InvalidSignatureException: 'Unauthorized',
        AccessDeniedException: 'Unauthorized',
        ExpiredTokenException: 'Unauthorized',
        ThrottlingException: 'RateLimited',
        ServiceFailureException: 'ProviderUnavailable',
        ServiceUnavailableException: 'ProviderUnavailable',
        TextLengthExceededException: 'InvalidInput',
        InvalidSsmlException: 'InvalidInput',
        InvalidSampleRateException: 'InvalidInput',
        LexiconNotFoundException: 'InvalidInput',
        LanguageNotSupportedException: 'InvalidInput',
        EngineNotSupportedException: 'UnsupportedOperation',
        MarksNotSupportedForFormatException: 'InvalidInput',
        SsmlMarksNotSupportedForTextTypeException: 'InvalidInput',
    },
    google: {
        UNAUTHENTICATED: 'Unauthorized',
        PERMISSION_DENIED: 'Unauthorized',
        RESOURCE_EXHAUSTED: 'RateLimited',
        UNAVAILABLE: 'ProviderUnavailable',
        DEADLINE_EXCEEDED: 'Timeout',
        INVALID_ARGUMENT: 'InvalidInput',
        NOT_FOUND: 'InvalidInput',
        FAILED_PRECONDITION: 'InvalidInput',
        OUT_OF_RANGE: 'InvalidInput',
        UNIMPLEMENTED: 'UnsupportedOperation',
        INTERNAL: 'Internal',
        invalid_grant: 'Unauthorized',
        invalid_client: 'Unauthorized',
        unauthorized_client: 'Unauthorized',
    },
    deepgram: {
        INVALID_AUTH: 'Unauthorized',
        INSUFFICIENT_PERMISSIONS: 'Unauthorized',
        TOO_MANY_REQUESTS: 'RateLimited',
        RATE_LIMIT_EXCEEDED: 'RateLimited',
        INVALID_QUERY_PARAMETER: 'InvalidInput',
        UNSUPPORTED_MODEL: 'InvalidInput',
        INVALID_TEXT: 'InvalidInput',
        TEXT_TOO_LONG: 'InvalidInput',
        SERVICE_UNAVAILABLE: 'ProviderUnavailable',
    },
};

const TIMEOUT_NETWORK_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);

const UNAVAILABLE_NETWORK_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EPIPE',
    'EHOSTUNREACH',
    'ERR_NETWORK',
]);

/**
 * Maps an HTTP status to its canonical kind.
 */
export function kindFromStatus(status: number): TtsErrorKind {
    switch (status) {
        case 400:
        case 404:
        case 409:
        case 413:
        case 422:
            return 'InvalidInput';
        case 401:
        case 403:
            return 'Unauthorized';
        case 408:
            return 'Timeout';
        case 429:
            return 'RateLimited';
        case 501:
            return 'UnsupportedOperation';
        case 502:
        case 503:
        case 504:
            return 'ProviderUnavailable';
        default:
            return status >= 400 && status < 500 ? 'InvalidInput' : 'Internal';
    }
}

export function kindFromNetworkCode(code: string | undefined): TtsErrorKind | undefined {
    if (!code) return undefined;
    if (TIMEOUT_NETWORK_CODES.has(code)) return 'Timeout';
    if (UNAVAILABLE_NETWORK_CODES.has(code)) return 'ProviderUnavailable';
    return undefined;
}

export function retryDisposition(error: TtsError): RetryDisposition {
    if (error.isCancellation) return 'never';
    return RETRY_DISPOSITION[error.kind];
}

interface RawFailure {
    message: string;
    status?: number;
    code?: string;
    networkCode?: string;
    retryAfterMs?: number;
}

/**
 * Converts anything an adapter throws into a TtsError.
 *
 * Resolution order: vendor code table, HTTP status class, transport error code, Internal.
 */
export class ErrorNormalizer {
    private readonly tables: VendorCodeTables;

    constructor(tables: VendorCodeTables = DEFAULT_VENDOR_CODES) {
        this.tables = tables;
    }

    normalize(provider: ProviderName, raw: unknown): TtsError {
        if (raw instanceof TtsError) {
            return raw;
        }

        const failure = this.describe(raw);
        const kind = this.classify(provider, failure);

        return new TtsError(kind, provider, failure.message, {
            statusCode: failure.status,
            code: failure.code ?? failure.networkCode,
            retryAfterMs: failure.retryAfterMs,
            cause: raw,
        });
    }

    private classify(provider: ProviderName, failure: RawFailure): TtsErrorKind {
        const table = this.tables[provider];
        if (failure.code && Object.hasOwn(table, failure.code)) {
            return table[failure.code];
        }
        if (failure.status !== undefined) {
            return kindFromStatus(failure.status);
        }
        return kindFromNetworkCode(failure.networkCode) ?? 'Internal';
    }

    private describe(raw: unknown): RawFailure {
        if (raw instanceof ProviderFailure) {
            return {
                message: raw.message,
                status: raw.status,
                code: raw.code,
                networkCode: raw.networkCode,
                retryAfterMs: raw.retryAfterMs,
            };
        }

        if (axios.isAxiosError(raw)) {
            return {
                message: raw.message,
                status: raw.response?.status,
                networkCode: raw.code,
                retryAfterMs: parseRetryAfterMs(raw.response?.headers?.['retry-after']),
            };
        }

        if (raw instanceof Error) {
            const networkCode = 'code' in raw && typeof raw.code === 'string' ? raw.code : undefined;
            return { message: raw.message, networkCode };
        }

        return { message: typeof raw === 'string' ? raw : 'Unknown provider error' };
    }
}
