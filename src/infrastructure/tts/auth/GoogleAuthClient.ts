import axios from 'axios';
import { importPKCS8, SignJWT } from 'jose';
import { TtsError } from '../../../domain/entities/TtsError';
import { parseJson, readNumber, readString, toProviderFailure } from '../http';

const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';
const JWT_BEARER_GRANT = 'urn:ietf:params:oauth:grant-type:jwt-bearer';
const DEFAULT_TOKEN_URI = 'https://oauth2.googleapis.com/token';

/** Refresh this long before the token actually expires. */
const EXPIRY_MARGIN_MS = 60_000;

export interface ServiceAccountKey {
    clientEmail: string;
    privateKey: string;
    tokenUri: string;
}

export interface GoogleAuthOptions {
    /** Pre-issued OAuth access token, used as is */
    accessToken?: string;
    /** Service account key file contents */
    serviceAccountJson?: string;
    now?: () => number;
}

/**
 * Parses a service account key file.
 * @throws Error when required fields are missing
 */
export function parseServiceAccountKey(json: string): ServiceAccountKey {
    const raw = parseJson(json);
    const clientEmail = readString(raw, 'client_email');
    const privateKey = readString(raw, 'private_key');
    if (!clientEmail || !privateKey) {
        throw new Error('Google service account JSON must contain client_email and private_key');
    }
    return {
        clientEmail,
        privateKey,
        tokenUri: readString(raw, 'token_uri') || DEFAULT_TOKEN_URI,
    };
}

/**
 * Supplies bearer tokens for Google Cloud: either a static token or a service-account JWT
 * exchanged for an access token and cached until shortly before it expires.
 */
export class GoogleAuthClient {
    private readonly staticToken?: string;
    private readonly serviceAccount?: ServiceAccountKey;
    private readonly now: () => number;
    private cached: { token: string; expiresAt: number } | null = null;

    constructor(options: GoogleAuthOptions) {
        this.now = options.now ?? Date.now;
        if (options.accessToken) {
            this.staticToken = options.accessToken;
        } else if (options.serviceAccountJson) {
            this.serviceAccount = parseServiceAccountKey(options.serviceAccountJson);
        } else {
            throw new Error('Google access token or service account JSON is required');
        }
    }

    async getAccessToken(signal?: AbortSignal): Promise<string> {
        if (this.staticToken) {
            return this.staticToken;
        }
        if (this.cached && this.now() < this.cached.expiresAt - EXPIRY_MARGIN_MS) {
            return this.cached.token;
        }
        if (!this.serviceAccount) {
            throw new TtsError('Unauthorized', 'google', 'No Google credentials configured');
        }

        const assertion = await this.createAssertion(this.serviceAccount);
        const body = new URLSearchParams({ grant_type: JWT_BEARER_GRANT, assertion });

        try {
            const response = await axios.post<unknown>(this.serviceAccount.tokenUri, body.toString(), {
                headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
                signal,
            });

            const token = readString(response.data, 'access_token');
            if (!token) {
                throw new TtsError('Unauthorized', 'google', 'Token endpoint returned no access_token');
            }
            const expiresIn = readNumber(response.data, 'expires_in') ?? 3600;
            this.cached = { token, expiresAt: this.now() + expiresIn * 1000 };
            console.log(`[Google] Obtained access token for ${this.serviceAccount.clientEmail}`);
            return token;
        } catch (error) {
            // OAuth errors look like { error: 'invalid_grant', error_description }
            throw toProviderFailure(error, 'Google token exchange', payload => readString(payload, 'error'));
        }
    }

    /** Drops the cached token so the next call exchanges a new one. */
    invalidate(): void {
        this.cached = null;
    }

    private async createAssertion(account: ServiceAccountKey): Promise<string> {
        const issuedAt = Math.floor(this.now() / 1000);
        let key: Awaited<ReturnType<typeof importPKCS8>>;
        try {
            key = await importPKCS8(account.privateKey, 'RS256');
        } catch (error) {
            throw new TtsError('Unauthorized', 'google', 'Service account private key is not a valid PKCS#8 RSA key', {
                code: 'invalid_private_key',
                cause: error,
            });
        }

        return new SignJWT({ scope: CLOUD_PLATFORM_SCOPE })
            .setProtectedHeader({ alg: 'RS256', typ: 'JWT' })
            .setIssuer(account.clientEmail)
            .setAudience(account.tokenUri)
            .setIssuedAt(issuedAt)
            .setExpirationTime(issuedAt + 3600)
            .sign(key);
    }
}
