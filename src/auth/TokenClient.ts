/**
 * Token Client
 * Intuit token endpoint: form-encoded POST with HTTP Basic client credentials
 */

import { z } from 'zod';
import type { TokenResult } from './TokenState.js';
import { QboAuthError, cancelledError, errorMessage, isAbortError } from '../utils/errors.js';
import { TOKEN_ENDPOINT } from '../utils/config.js';

const tokenResponseSchema = z.object({
    access_token: z.string().min(1),
    expires_in: z.number().positive(),
    refresh_token: z.string().min(1).optional(),
    token_type: z.string().optional(),
    x_refresh_token_expires_in: z.number().optional(),
});

export interface TokenClientConfig {
    clientId: string;
    clientSecret: string;
    tokenEndpoint?: string;
}

export interface TokenEndpointResponse {
    status: number;
    ok: boolean;
    body: string;
}

export class TokenClient {
    private readonly config: TokenClientConfig;
    private readonly tokenEndpoint: string;

    constructor(config: TokenClientConfig) {
        this.config = config;
        this.tokenEndpoint = config.tokenEndpoint || TOKEN_ENDPOINT;
    }

    get basicAuthorization(): string {
        const credentials = Buffer.from(`${this.config.clientId}:${this.config.clientSecret}`).toString('base64');
        return `Basic ${credentials}`;
    }

    /**
     * POST a grant to the token endpoint. Network failures surface as
     * `transient`, an aborted signal as `cancelled`; HTTP status is left
     * to the caller.
     */
    async post(form: Record<string, string>, signal?: AbortSignal): Promise<TokenEndpointResponse> {
        try {
            const response = await fetch(this.tokenEndpoint, {
                method: 'POST',
                headers: {
                    'Accept': 'application/json',
                    'Content-Type': 'application/x-www-form-urlencoded',
                    'Authorization': this.basicAuthorization,
                },
                body: new URLSearchParams(form).toString(),
                signal,
            });

            return {
                status: response.status,
                ok: response.ok,
                body: await response.text(),
            };
        } catch (error) {
            if (signal?.aborted || isAbortError(error)) {
                throw cancelledError('Token request', error);
            }
            throw new QboAuthError('transient', `Token endpoint request failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    /**
     * Parse a 2xx body. A missing refresh_token falls back to
     * `previousRefreshToken` (providers may skip rotation).
     */
    parseTokenResponse(body: string, previousRefreshToken?: string): TokenResult {
        let json: unknown;
        try {
            json = JSON.parse(body);
        } catch (error) {
            throw new QboAuthError('protocol', 'Invalid JSON response from token endpoint', { body, cause: error });
        }

        const parsed = tokenResponseSchema.safeParse(json);
        if (!parsed.success) {
            const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)');
            throw new QboAuthError('protocol', `Invalid token response: missing or invalid ${[...new Set(fields)].join(', ')}`, {
                body,
            });
        }

        const refreshToken = parsed.data.refresh_token ?? previousRefreshToken;
        if (!refreshToken) {
            throw new QboAuthError('protocol', 'Invalid token response: missing or invalid refresh_token', { body });
        }

        return {
            accessToken: parsed.data.access_token,
            refreshToken,
            expiresIn: parsed.data.expires_in,
            refreshTokenExpiresIn: parsed.data.x_refresh_token_expires_in ?? 0,
        };
    }

    /**
     * Exchange an authorization code for tokens. Not retried: a failed
     * exchange needs a fresh authorization.
     */
    async exchangeCode(code: string, redirectUri: string, signal?: AbortSignal): Promise<TokenResult> {
        if (!code.trim()) {
            throw new QboAuthError('protocol', 'Authorization code cannot be empty');
        }

        const response = await this.post(
            {
                grant_type: 'authorization_code',
                code,
                redirect_uri: redirectUri,
            },
            signal
        );

        if (!response.ok) {
            throw new QboAuthError(
                response.status === 400 ? 'reauthorization-required' : 'transient',
                `Intuit token exchange failed (${response.status})`,
                { status: response.status, body: response.body }
            );
        }

        return this.parseTokenResponse(response.body);
    }
}
