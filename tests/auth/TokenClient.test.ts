/**
 * Tests for TokenClient
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { TokenClient } from '../../src/auth/TokenClient.js';
import { TOKEN_ENDPOINT } from '../../src/utils/config.js';
import { isAuthError } from '../../src/utils/errors.js';
import { jsonResponse, tokenBody } from '../fakes.js';

function thrown(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('expected an error');
}

const client = new TokenClient({ clientId: 'test-client-id', clientSecret: 'test-secret' });

describe('TokenClient', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('parseTokenResponse', () => {
        it('should map a complete response', () => {
            const result = client.parseTokenResponse(JSON.stringify(tokenBody()));

            expect(result).toEqual({
                accessToken: 'test-access',
                refreshToken: 'test-refresh-next',
                expiresIn: 3600,
                refreshTokenExpiresIn: 8726400,
            });
        });

        it('should keep the previous refresh token when none is returned', () => {
            const body = JSON.stringify(tokenBody({ refresh_token: undefined }));
            expect(client.parseTokenResponse(body, 'test-refresh').refreshToken).toBe('test-refresh');
        });

        it('should default the refresh token lifetime to 0', () => {
            const body = JSON.stringify(tokenBody({ x_refresh_token_expires_in: undefined }));
            expect(client.parseTokenResponse(body).refreshTokenExpiresIn).toBe(0);
        });

        it('should reject invalid JSON as a protocol error', () => {
            const error = thrown(() => client.parseTokenResponse('<html>'));
            expect(isAuthError(error, 'protocol')).toBe(true);
            expect(error).toHaveProperty('message', 'Invalid JSON response from token endpoint');
        });

        it('should name the missing fields', () => {
            expect(() => client.parseTokenResponse('{"token_type":"bearer"}')).toThrow(
                'Invalid token response: missing or invalid access_token, expires_in'
            );
        });

        it('should reject a non-positive lifetime', () => {
            const body = JSON.stringify(tokenBody({ expires_in: 0 }));
            expect(() => client.parseTokenResponse(body)).toThrow('missing or invalid expires_in');
        });

        it('should reject a response with no refresh token to fall back on', () => {
            const body = JSON.stringify(tokenBody({ refresh_token: undefined }));
            expect(() => client.parseTokenResponse(body)).toThrow('missing or invalid refresh_token');
        });
    });

    describe('post', () => {
        it('should send a form-encoded request with basic credentials', async () => {
            const fetchMock = vi.fn(async () => jsonResponse(200, tokenBody()));
            vi.stubGlobal('fetch', fetchMock);

            const response = await client.post({ grant_type: 'refresh_token', refresh_token: 'test-refresh' });

            expect(response.status).toBe(200);
            expect(fetchMock).toHaveBeenCalledWith(TOKEN_ENDPOINT, expect.objectContaining({
                method: 'POST',
                body: 'grant_type=refresh_token&refresh_token=test-refresh',
                headers: expect.objectContaining({
                    'Content-Type': 'application/x-www-form-urlencoded',
                    'Authorization': `Basic ${Buffer.from('test-client-id:test-secret').toString('base64')}`,
                }),
            }));
        });

        it('should report network failures as transient', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => { throw new TypeError('fetch failed'); }));

            await expect(client.post({ grant_type: 'refresh_token' })).rejects.toMatchObject({
                kind: 'transient',
                message: 'Token endpoint request failed: fetch failed',
            });
        });

        it('should report an aborted request as cancelled', async () => {
            const controller = new AbortController();
            controller.abort();
            const abort = new Error('This operation was aborted');
            abort.name = 'AbortError';
            vi.stubGlobal('fetch', vi.fn(async () => { throw abort; }));

            await expect(client.post({ grant_type: 'refresh_token' }, controller.signal)).rejects.toMatchObject({
                kind: 'cancelled',
                message: 'Token request was cancelled',
            });
        });
    });

    describe('exchangeCode', () => {
        it('should exchange a code for tokens', async () => {
            const fetchMock = vi.fn(async () => jsonResponse(200, tokenBody()));
            vi.stubGlobal('fetch', fetchMock);

            const result = await client.exchangeCode('test-code', 'http://localhost:8080/callback');

            expect(result.accessToken).toBe('test-access');
            expect(fetchMock).toHaveBeenCalledWith(TOKEN_ENDPOINT, expect.objectContaining({
                body: 'grant_type=authorization_code&code=test-code&redirect_uri=http%3A%2F%2Flocalhost%3A8080%2Fcallback',
            }));
        });

        it('should classify a 400 as requiring reauthorization', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => jsonResponse(400, '{"error":"invalid_grant"}')));

            await expect(client.exchangeCode('test-code', 'http://localhost:8080/callback')).rejects.toMatchObject({
                kind: 'reauthorization-required',
                status: 400,
                message: 'Intuit token exchange failed (400)',
            });
        });

        it('should reject an empty code without a request', async () => {
            const fetchMock = vi.fn();
            vi.stubGlobal('fetch', fetchMock);

            await expect(client.exchangeCode('  ', 'http://localhost:8080/callback')).rejects.toMatchObject({
                kind: 'protocol',
            });
            expect(fetchMock).not.toHaveBeenCalled();
        });
    });
});
