/**
 * Token State
 * Access token, refresh token and expiry instant of the current connection
 */

import type { ConnectionSettings } from './SecretStore.js';

/** Tokens are renewed this long before they actually expire */
export const EXPIRY_MARGIN_MS = 60 * 1000;

export interface TokenResult {
    accessToken: string;
    refreshToken: string;
    /** Seconds */
    expiresIn: number;
    /** Seconds, 0 when the provider did not say */
    refreshTokenExpiresIn: number;
}

export class TokenState {
    accessToken = '';
    refreshToken = '';
    /** Epoch ms; null = never obtained */
    expiresAt: number | null = null;

    static fromSettings(settings: ConnectionSettings): TokenState {
        const state = new TokenState();
        state.accessToken = settings.accessToken;
        state.refreshToken = settings.refreshToken;
        state.expiresAt = settings.tokenExpiry;
        return state;
    }

    /**
     * Usable for a request: access token present and more than
     * EXPIRY_MARGIN_MS of lifetime left.
     */
    isValid(now: number = Date.now()): boolean {
        if (!this.accessToken) return false;
        if (this.expiresAt === null) return false;
        return this.expiresAt > now + EXPIRY_MARGIN_MS;
    }

    hasTokens(): boolean {
        return this.accessToken.length > 0 && this.refreshToken.length > 0;
    }

    hasRefreshToken(): boolean {
        return this.refreshToken.trim().length > 0;
    }

    /**
     * Plain expiry check with no renewal margin, used for status reporting.
     */
    isExpired(now: number = Date.now()): boolean {
        return this.expiresAt !== null && this.expiresAt <= now;
    }

    apply(result: TokenResult, now: number = Date.now()): void {
        this.accessToken = result.accessToken;
        this.refreshToken = result.refreshToken;
        this.expiresAt = now + result.expiresIn * 1000;
    }

    clear(): void {
        this.accessToken = '';
        this.refreshToken = '';
        this.expiresAt = null;
    }

    writeTo(settings: ConnectionSettings): void {
        settings.accessToken = this.accessToken;
        settings.refreshToken = this.refreshToken;
        settings.tokenExpiry = this.expiresAt;
    }
}
