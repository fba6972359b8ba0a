/**
 * Date utilities
 * Timer helpers shared by the refresh, callback and tunnel waits
 */

import { cancelledError } from './errors.js';

export const SECOND_MS = 1000;
export const MINUTE_MS = 60 * SECOND_MS;

/**
 * Resolves after `ms`, or rejects with a `cancelled` error when the signal aborts.
 */
export function delay(ms: number, signal?: AbortSignal, what = 'Wait'): Promise<void> {
    if (signal?.aborted) {
        return Promise.reject(cancelledError(what, signal.reason));
    }

    return new Promise((resolve, reject) => {
        const onAbort = () => {
            clearTimeout(timer);
            reject(cancelledError(what, signal?.reason));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Throws a `cancelled` error if the signal has already aborted.
 */
export function throwIfAborted(signal: AbortSignal | undefined, what: string): void {
    if (signal?.aborted) {
        throw cancelledError(what, signal.reason);
    }
}

/**
 * Format a timestamp (ms) for status output
 */
export function formatInstant(ms: number): string {
    return new Date(ms).toLocaleString('en-US', {
        month: 'short',
        day: 'numeric',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
    });
}
