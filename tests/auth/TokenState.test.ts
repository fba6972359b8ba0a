/**
 * Tests for TokenState
 */
import { describe, it, expect } from 'vitest';
import { TokenState, EXPIRY_MARGIN_MS } from '../../src/auth/TokenState.js';
import { MemorySettingsStore } from '../fakes.js';

const NOW = 1_700_000_000_000;

function stateWith(accessToken: string, refreshToken: string, expiresAt: number | null): TokenState {
    const state = new TokenState();
    state.accessToken = accessToken;
    state.refreshToken = refreshToken;
    state.expiresAt = expiresAt;
    return state;
}

describe('TokenState', () => {
    describe('isValid', () => {
        it('should be valid with more than the margin left', () => {
            expect(stateWith('a', 'r', NOW + 120_000).isValid(NOW)).toBe(true);
        });

        it('should be invalid inside the margin', () => {
            expect(stateWith('a', 'r', NOW + 30_000).isValid(NOW)).toBe(false);
            expect(stateWith('a', 'r', NOW + EXPIRY_MARGIN_MS).isValid(NOW)).toBe(false);
        });

        it('should be invalid without an access token or expiry', () => {
            expect(stateWith('', 'r', NOW + 120_000).isValid(NOW)).toBe(false);
            expect(stateWith('a', 'r', null).isValid(NOW)).toBe(false);
        });
    });

    describe('isExpired', () => {
        it('should compare with no margin', () => {
            expect(stateWith('a', 'r', NOW + 30_000).isExpired(NOW)).toBe(false);
            expect(stateWith('a', 'r', NOW).isExpired(NOW)).toBe(true);
            expect(stateWith('a', 'r', null).isExpired(NOW)).toBe(false);
        });
    });

    it('should report tokens only when both are present', () => {
        expect(stateWith('a', 'r', null).hasTokens()).toBe(true);
        expect(stateWith('a', '', null).hasTokens()).toBe(false);
        expect(stateWith('a', '  ', null).hasRefreshToken()).toBe(false);
    });

    it('should apply a token result relative to now', () => {
        const state = new TokenState();
        state.apply({ accessToken: 'a2', refreshToken: 'r2', expiresIn: 3600, refreshTokenExpiresIn: 0 }, NOW);

        expect(state.accessToken).toBe('a2');
        expect(state.refreshToken).toBe('r2');
        expect(state.expiresAt).toBe(NOW + 3_600_000);
    });

    it('should round-trip through settings and clear', () => {
        const settings = new MemorySettingsStore({ accessToken: 'a', refreshToken: 'r', tokenExpiry: NOW });
        const state = TokenState.fromSettings(settings.current);
        expect(state.expiresAt).toBe(NOW);

        state.clear();
        state.writeTo(settings.current);
        expect(settings.current).toEqual({ accessToken: '', refreshToken: '', tokenExpiry: null });
    });
});
