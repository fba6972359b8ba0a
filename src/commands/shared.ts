/**
 * Shared command utilities
 * Common helpers used across all CLI command modules
 */

import { QuickBooksClient } from '../client/QuickBooksClient.js';
import { FileSecretStore } from '../auth/FileSecretStore.js';
import { FileSettingsStore } from '../auth/FileSettingsStore.js';
import { errorMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';

/**
 * Creates a QuickBooksClient over the files in ~/.qbo-connect.
 * Used by all CLI commands that need credentials or tokens.
 */
export function createClient(): QuickBooksClient {
    return new QuickBooksClient({
        settings: new FileSettingsStore(),
        secretStore: new FileSecretStore(),
    });
}

/**
 * AbortSignal fired by Ctrl+C while a command runs
 */
export function interruptSignal(): AbortSignal {
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());
    return controller.signal;
}

/**
 * Logs and exits. `process.exit` skips pending `finally` blocks, so the
 * client (and any tunnel it started) is disposed here first.
 */
export function fail(prefix: string, error: unknown, client?: Pick<QuickBooksClient, 'dispose'>): never {
    client?.dispose();
    log.error(`${prefix}: ${errorMessage(error)}`);
    process.exit(1);
}
