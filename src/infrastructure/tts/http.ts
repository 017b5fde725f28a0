import axios from 'axios';
import { ProviderFailure, parseRetryAfterMs } from '../../domain/entities/ProviderFailure';
import { TtsError } from '../../domain/entities/TtsError';

/**
 * Pulls the vendor error code out of an error response.
 */
export type ErrorCodeExtractor = (body: unknown, header: (name: string) => unknown) => string | undefined;

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(source: unknown, key: string): string | undefined {
    if (!isRecord(source)) return undefined;
    const value = source[key];
    return typeof value === 'string' ? value : undefined;
}

export function readNumber(source: unknown, key: string): number | undefined {
    if (!isRecord(source)) return undefined;
    const value = source[key];
    return typeof value === 'number' ? value : undefined;
}

export function readRecord(source: unknown, key: string): Record<string, unknown> | undefined {
    if (!isRecord(source)) return undefined;
    const value = source[key];
    return isRecord(value) ? value : undefined;
}

export function readArray(source: unknown, key: string): unknown[] {
    if (!isRecord(source)) return [];
    const value = source[key];
    return Array.isArray(value) ? value : [];
}

export function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return text;
    }
}

/**
 * Error bodies arrive as Buffers when the request asked for binary audio.
 */
export function decodeBody(data: unknown): unknown {
    if (Buffer.isBuffer(data)) {
        return parseJson(data.toString('utf8'));
    }
    if (data instanceof ArrayBuffer) {
        return parseJson(Buffer.from(data).toString('utf8'));
    }
    if (typeof data === 'string') {
        return parseJson(data);
    }
    return data;
}

export function toBuffer(data: unknown): Buffer {
    if (Buffer.isBuffer(data)) return data;
    if (data instanceof ArrayBuffer) return Buffer.from(data);
    if (typeof data === 'string') return Buffer.from(data, 'binary');
    return Buffer.alloc(0);
}

function describeBody(body: unknown): string | undefined {
    if (typeof body === 'string') return body.slice(0, 200) || undefined;
    if (!isRecord(body)) return undefined;

    const message = readString(body, 'message') ?? readString(body, 'err_msg');
    if (message) return message;

    const detail = body.detail;
    if (typeof detail === 'string') return detail;
    const detailMessage = readString(detail, 'message');
    if (detailMessage) return detailMessage;

    return readString(readRecord(body, 'error'), 'message');
}

/**
 * Converts whatever an HTTP call threw into a ProviderFailure with the vendor's own
 * status and error code. Errors that are already canonical pass through.
 */
export function toProviderFailure(error: unknown, label: string, extractCode: ErrorCodeExtractor): Error {
    if (error instanceof TtsError || error instanceof ProviderFailure) {
        return error;
    }

    if (axios.isAxiosError(error)) {
        const response = error.response;
        if (response) {
            const headers = response.headers;
            const header = (name: string): unknown => headers[name];
            const body = decodeBody(response.data);
            const detail = describeBody(body);
            return new ProviderFailure(
                `${label} request failed with status ${response.status}${detail ? `: ${detail}` : ''}`,
                {
                    status: response.status,
                    code: extractCode(body, header),
                    retryAfterMs: parseRetryAfterMs(header('retry-after')),
                    cause: error,
                }
            );
        }
        return new ProviderFailure(`${label} request failed: ${error.message}`, {
            networkCode: error.code,
            cause: error,
        });
    }

    if (error instanceof Error) {
        return error;
    }
    return new ProviderFailure(`${label} request failed: ${String(error)}`);
}
