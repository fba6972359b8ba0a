/**
 * Error utilities
 * Tagged auth errors plus shared formatting for CLI error handling
 */

import { AxiosError } from 'axios';

/**
 * Failure classes of the credential lifecycle. Callers branch on `kind`
 * instead of matching error subclasses.
 */
export type AuthErrorKind =
    | 'configuration'
    | 'reauthorization-required'
    | 'transient'
    | 'protocol'
    | 'cancelled'
    | 'authorization-failed';

export interface AuthErrorDetails {
    status?: number;
    body?: string;
    cause?: unknown;
}

export class QboAuthError extends Error {
    readonly kind: AuthErrorKind;
    readonly status?: number;
    /** Response body with token values masked */
    readonly body?: string;

    constructor(kind: AuthErrorKind, message: string, details: AuthErrorDetails = {}) {
        super(message, details.cause === undefined ? undefined : { cause: details.cause });
        this.name = 'QboAuthError';
        this.kind = kind;
        this.status = details.status;
        this.body = details.body === undefined ? undefined : redactSecrets(details.body);
    }
}

export function isAuthError(error: unknown, kind?: AuthErrorKind): error is QboAuthError {
    return error instanceof QboAuthError && (kind === undefined || error.kind === kind);
}

export function cancelledError(what: string, cause?: unknown): QboAuthError {
    return new QboAuthError('cancelled', `${what} was cancelled`, { cause });
}

/**
 * True for the rejection an aborted fetch, timer or axios request produces.
 */
export function isAbortError(error: unknown): boolean {
    if (isAuthError(error, 'cancelled')) return true;
    if (error instanceof AxiosError && error.code === AxiosError.ERR_CANCELED) return true;
    return error instanceof Error && (error.name === 'AbortError' || error.name === 'CanceledError');
}

const SECRET_FIELDS = ['access_token', 'refresh_token', 'id_token', 'client_secret'];

/**
 * Masks token values in JSON or form-encoded text.
 */
export function redactSecrets(text: string): string {
    let result = text;
    for (const field of SECRET_FIELDS) {
        result = result
            .replace(new RegExp(`("${field}"\\s*:\\s*)"[^"]*"`, 'g'), '$1"[redacted]"')
            .replace(new RegExp(`(\\b${field}=)[^&\\s]*`, 'g'), '$1[redacted]');
    }
    return result;
}

/**
 * Extracts a human-readable message from an unknown error value.
 * For AxiosErrors, prefers the API response body (which often contains
 * a more descriptive message than the generic HTTP status).
 */
export function errorMessage(error: unknown): string {
    if (error instanceof AxiosError && error.response) {
        const data: unknown = error.response.data;
        if (typeof data === 'string' && data.length > 0) return redactSecrets(data);
        if (data && typeof data === 'object' && 'message' in data) return String(data.message);
        return `HTTP ${error.response.status || 'unknown'}`;
    }
    return error instanceof Error ? error.message : String(error);
}
