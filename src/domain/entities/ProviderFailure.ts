/**
 * Raw failure reported by a provider adapter, before normalization.
 * Carries whatever the vendor told us: HTTP status, vendor error code, Retry-After.
 */
export interface ProviderFailureDetails {
    status?: number;
    /** Vendor-specific error code (e.g. `ThrottlingException`, `RESOURCE_EXHAUSTED`) */
    code?: string;
    /** Transport-level error code (e.g. `ECONNRESET`) when no response arrived */
    networkCode?: string;
    retryAfterMs?: number;
    cause?: unknown;
}

export class ProviderFailure extends Error {
    readonly status?: number;
    readonly code?: string;
    readonly networkCode?: string;
    readonly retryAfterMs?: number;

    constructor(message: string, details: ProviderFailureDetails = {}) {
        super(message, details.cause === undefined ? undefined : { cause: details.cause });
        this.name = 'ProviderFailure';
        this.status = details.status;
        this.code = details.code;
        this.networkCode = details.networkCode;
        this.retryAfterMs = details.retryAfterMs;
    }
}

/**
 * Parses a Retry-After header value (delta-seconds or HTTP-date) into milliseconds.
 */
export function parseRetryAfterMs(value: unknown, now: number = Date.now()): number | undefined {
    if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
        return value * 1000;
    }
    if (typeof value !== 'string' || !value.trim()) {
        return undefined;
    }
    const trimmed = value.trim();
    if (/^\d+(\.\d+)?$/.test(trimmed)) {
        return Math.round(parseFloat(trimmed) * 1000);
    }
    const date = Date.parse(trimmed);
    if (isNaN(date)) {
        return undefined;
    }
    return Math.max(0, date - now);
}
