import crypto from 'crypto';

export interface AwsCredentials {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
}

export interface SignableRequest {
    method: string;
    url: string;
    headers?: Record<string, string>;
    body?: string;
}

/**
 * AWS Signature Version 4 request signing.
 */
export class SigV4Signer {
    constructor(
        private readonly credentials: AwsCredentials,
        private readonly region: string,
        private readonly service: string,
        private readonly now: () => Date = () => new Date()
    ) {
        if (!credentials.accessKeyId || !credentials.secretAccessKey) {
            throw new Error('AWS access key id and secret access key are required');
        }
    }

    /**
     * Returns the request headers plus x-amz-date, x-amz-content-sha256, the session token
     * (when present) and Authorization.
     */
    sign(request: SignableRequest): Record<string, string> {
        const url = new URL(request.url);
        const body = request.body ?? '';
        const amzDate = toAmzDate(this.now());
        const dateStamp = amzDate.slice(0, 8);
        const payloadHash = sha256Hex(body);

        const headers: Record<string, string> = {
            ...request.headers,
            host: url.host,
            'x-amz-date': amzDate,
            'x-amz-content-sha256': payloadHash,
        };
        if (this.credentials.sessionToken) {
            headers['x-amz-security-token'] = this.credentials.sessionToken;
        }

        const normalized = Object.entries(headers)
            .map(([name, value]): [string, string] => [name.toLowerCase(), value.trim().replace(/\s+/g, ' ')])
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        const canonicalHeaders = normalized.map(([name, value]) => `${name}:${value}\n`).join('');
        const signedHeaders = normalized.map(([name]) => name).join(';');

        const canonicalRequest = [
            request.method.toUpperCase(),
            canonicalPath(url.pathname),
            canonicalQuery(url.searchParams),
            canonicalHeaders,
            signedHeaders,
            payloadHash,
        ].join('\n');

        const scope = `${dateStamp}/${this.region}/${this.service}/aws4_request`;
        const stringToSign = ['AWS4-HMAC-SHA256', amzDate, scope, sha256Hex(canonicalRequest)].join('\n');

        const kDate = hmac(`AWS4${this.credentials.secretAccessKey}`, dateStamp);
        const kRegion = hmac(kDate, this.region);
        const kService = hmac(kRegion, this.service);
        const kSigning = hmac(kService, 'aws4_request');
        const signature = crypto.createHmac('sha256', kSigning).update(stringToSign, 'utf8').digest('hex');

        return {
            ...headers,
            Authorization: `AWS4-HMAC-SHA256 Credential=${this.credentials.accessKeyId}/${scope}, SignedHeaders=${signedHeaders}, Signature=${signature}`,
        };
    }
}

/**
 * 2024-03-05T10:20:30.123Z -> 20240305T102030Z
 */
export function toAmzDate(date: Date): string {
    return date.toISOString().replace(/[:-]|\.\d{3}/g, '');
}

function sha256Hex(value: string): string {
    return crypto.createHash('sha256').update(value, 'utf8').digest('hex');
}

function hmac(key: string | Buffer, value: string): Buffer {
    return crypto.createHmac('sha256', key).update(value, 'utf8').digest();
}

function rfc3986(value: string): string {
    return encodeURIComponent(value).replace(/[!'()*]/g, c => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

function canonicalPath(pathname: string): string {
    if (!pathname) return '/';
    return pathname
        .split('/')
        .map(segment => rfc3986(decodeURIComponent(segment)))
        .join('/');
}

function canonicalQuery(params: URLSearchParams): string {
    return [...params.entries()]
        .map(([key, value]) => [rfc3986(key), rfc3986(value)])
        .sort(([ak, av], [bk, bv]) => (ak === bk ? (av < bv ? -1 : av > bv ? 1 : 0) : ak < bk ? -1 : 1))
        .map(([key, value]) => `${key}=${value}`)
        .join('&');
}
