/**
 * Tests for error utilities
 */
import { describe, it, expect } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import {
    QboAuthError,
    cancelledError,
    errorMessage,
    isAbortError,
    isAuthError,
    redactSecrets,
} from '../../src/utils/errors.js';

describe('redactSecrets', () => {
    it('should mask token values in JSON', () => {
        const body = '{"access_token":"test-access","refresh_token":"test-refresh","expires_in":3600}';
        expect(redactSecrets(body)).toBe(
            '{"access_token":"[redacted]","refresh_token":"[redacted]","expires_in":3600}'
        );
    });

    it('should mask token values in form text', () => {
        expect(redactSecrets('grant_type=refresh_token&refresh_token=test-refresh&x=1')).toBe(
            'grant_type=refresh_token&refresh_token=[redacted]&x=1'
        );
    });

    it('should leave other text alone', () => {
        expect(redactSecrets('{"error":"invalid_grant"}')).toBe('{"error":"invalid_grant"}');
    });
});

describe('QboAuthError', () => {
    it('should carry kind, status and a redacted body', () => {
        const error = new QboAuthError('transient', 'failed', {
            status: 503,
            body: '{"access_token":"test-access"}',
        });

        expect(error.kind).toBe('transient');
        expect(error.status).toBe(503);
        expect(error.body).toBe('{"access_token":"[redacted]"}');
        expect(error.name).toBe('QboAuthError');
    });

    it('should be matched by kind', () => {
        const error = new QboAuthError('protocol', 'bad body');
        expect(isAuthError(error)).toBe(true);
        expect(isAuthError(error, 'protocol')).toBe(true);
        expect(isAuthError(error, 'transient')).toBe(false);
        expect(isAuthError(new Error('plain'))).toBe(false);
    });

    it('should build cancelled errors', () => {
        const error = cancelledError('Token refresh');
        expect(error.kind).toBe('cancelled');
        expect(error.message).toBe('Token refresh was cancelled');
    });
});

describe('isAbortError', () => {
    it('should recognise abort rejections', () => {
        const abort = new Error('aborted');
        abort.name = 'AbortError';

        expect(isAbortError(abort)).toBe(true);
        expect(isAbortError(cancelledError('Wait'))).toBe(true);
        expect(isAbortError(new Error('other'))).toBe(false);
    });
});

describe('errorMessage', () => {
    it('should return the message of an Error', () => {
        expect(errorMessage(new Error('Something went wrong'))).toBe('Something went wrong');
    });

    it('should stringify non-Error values', () => {
        expect(errorMessage('plain string')).toBe('plain string');
        expect(errorMessage(42)).toBe('42');
    });

    it('should prefer the message in an axios response body', () => {
        const error = new AxiosError('Request failed', 'ERR_BAD_REQUEST', undefined, undefined, {
            status: 401,
            statusText: 'Unauthorized',
            headers: {},
            config: { headers: new AxiosHeaders() },
            data: { message: 'Token expired' },
        });

        expect(errorMessage(error)).toBe('Token expired');
    });
});
