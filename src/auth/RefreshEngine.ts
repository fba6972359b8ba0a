/**
 * Refresh Engine
 * Refresh-token grant with bounded retries and exponential backoff
 */

import type { TokenClient } from './TokenClient.js';
import type { TokenResult } from './TokenState.js';
import { QboAuthError, errorMessage, isAuthError } from '../utils/errors.js';
import { delay, SECOND_MS } from '../utils/dates.js';
import { log } from '../utils/logger.js';

export const MAX_REFRESH_ATTEMPTS = 3;

/** Wait before the attempt after `attempt`: 2s, 4s, ... */
export function backoffMs(attempt: number): number {
    return Math.pow(2, attempt) * SECOND_MS;
}

export class RefreshEngine {
    constructor(
        private readonly client: TokenClient,
        private readonly maxAttempts: number = MAX_REFRESH_ATTEMPTS
    ) { }

    /**
     * HTTP 400 fails at once with `reauthorization-required`. Other
     * failures (non-2xx, network, malformed body) are retried; once the
     * attempts run out the last one is attached as `cause`.
     *
     * Not safe for concurrent use with the same refresh token; callers
     * serialize.
     */
    async refresh(refreshToken: string, signal?: AbortSignal): Promise<TokenResult> {
        let lastError: QboAuthError | undefined;

        for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
            try {
                const response = await this.client.post(
                    { grant_type: 'refresh_token', refresh_token: refreshToken },
                    signal
                );

                if (response.status === 400) {
                    throw new QboAuthError('reauthorization-required', 'Refresh token is invalid or expired', {
                        status: response.status,
                        body: response.body,
                    });
                }

                if (!response.ok) {
                    throw new QboAuthError('transient', `Intuit token refresh failed (${response.status})`, {
                        status: response.status,
                        body: response.body,
                    });
                }

                const result = this.client.parseTokenResponse(response.body, refreshToken);
                log.debug(`Token refresh succeeded on attempt ${attempt}`);
                return result;
            } catch (error) {
                if (isAuthError(error, 'reauthorization-required') || isAuthError(error, 'cancelled')) {
                    throw error;
                }

                lastError = isAuthError(error)
                    ? error
                    : new QboAuthError('transient', errorMessage(error), { cause: error });
                log.warn(`Token refresh attempt ${attempt}/${this.maxAttempts} failed: ${lastError.message}`);
            }

            if (attempt < this.maxAttempts) {
                const waitMs = backoffMs(attempt);
                log.info(`Retrying token refresh in ${waitMs / SECOND_MS}s`);
                await delay(waitMs, signal, 'Token refresh');
            }
        }

        throw new QboAuthError(lastError?.kind ?? 'transient', `Token refresh failed after ${this.maxAttempts} attempts`, {
            status: lastError?.status,
            cause: lastError,
        });
    }
}
