/**
 * Config utility
 *
 * Every credential is resolved through the secret store first and the
 * environment second (see SecretResolver). A project-local .env is loaded
 * beneath the real environment.
 *
 * Secrets live at ~/.qbo-connect/secrets.enc
 * Tokens live at ~/.qbo-connect/settings.json
 */

import { config as dotenvConfig } from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';

// ── Config Dir ──────────────────────────────────────

const CONFIG_DIR_NAME = '.qbo-connect';

/**
 * Get config directory path (~/.qbo-connect/)
 */
export function getConfigDir(): string {
    const dir = path.join(
        process.env.HOME || process.env.USERPROFILE || '/tmp',
        CONFIG_DIR_NAME
    );
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    return dir;
}

let dotenvLoaded = false;

/**
 * Load ./.env once; values already in the environment win.
 */
export function loadDotenv(): void {
    if (dotenvLoaded) return;
    dotenvLoaded = true;

    const envPath = path.resolve(process.cwd(), '.env');
    if (fs.existsSync(envPath)) {
        dotenvConfig({ path: envPath, override: false });
    }
}

// ── Intuit endpoints ────────────────────────────────

export const AUTHORIZATION_ENDPOINT = 'https://appcenter.intuit.com/connect/oauth2';
export const TOKEN_ENDPOINT = 'https://oauth.platform.intuit.com/oauth2/v1/tokens/bearer';

export const DATA_API_BASE_URLS = {
    sandbox: 'https://sandbox-quickbooks.api.intuit.com',
    production: 'https://quickbooks.api.intuit.com',
} as const;

export type QboEnvironment = keyof typeof DATA_API_BASE_URLS;

export const DEFAULT_SCOPES: readonly string[] = ['com.intuit.quickbooks.accounting'];

// ── Defaults ────────────────────────────────────────

export const DEFAULT_REDIRECT_URI = 'http://localhost:8080/callback';
export const FALLBACK_LISTENER_PREFIX = 'http://localhost:8080/';
export const DEFAULT_TUNNEL_EXECUTABLE = 'cloudflared';
export const DEFAULT_WEBHOOKS_PORT = 7207;

// ── Secret names ────────────────────────────────────

/**
 * Candidate secret names per credential, highest priority first. The
 * environment variable is derived from each name (QBO-CLIENT-ID -> QBO_CLIENT_ID).
 */
export const SECRET_NAMES = {
    clientId: ['QBO-CLIENT-ID', 'QuickBooks-ClientId'],
    clientSecret: ['QBO-CLIENT-SECRET', 'QuickBooks-ClientSecret'],
    realmId: ['QBO-REALM-ID', 'QuickBooks-RealmId'],
    redirectUri: ['QBO-REDIRECT-URI'],
    environment: ['QBO-ENVIRONMENT'],
    preLoginUrl: ['QBO-PRELOGIN-URL'],
    tunnelExecutable: ['CLOUDFLARED-EXE'],
    tunnelArgs: ['CLOUDFLARED-ARGS'],
    webhooksPort: ['WEBHOOKS-PORT'],
} as const;

export type SecretKey = keyof typeof SECRET_NAMES;

/**
 * Keys accepted by `qbc config set`
 */
export const CONFIGURABLE_KEYS = [
    'clientId',
    'clientSecret',
    'realmId',
    'redirectUri',
    'environment',
    'preLoginUrl',
] as const satisfies readonly SecretKey[];

export type ConfigurableKey = (typeof CONFIGURABLE_KEYS)[number];

export function isConfigurableKey(key: string): key is ConfigurableKey {
    return CONFIGURABLE_KEYS.some((candidate) => candidate === key);
}

export function normalizeEnvironment(value: string | undefined): QboEnvironment {
    switch (value?.trim().toLowerCase()) {
        case 'production':
        case 'prod':
            return 'production';
        default:
            return 'sandbox';
    }
}

export function parsePort(value: string | undefined, fallback: number): number {
    if (!value) return fallback;
    const port = parseInt(value, 10);
    return Number.isInteger(port) && port > 0 && port < 65536 ? port : fallback;
}

/**
 * Shortened client id for logs
 */
export function maskClientId(clientId: string): string {
    return `${clientId.slice(0, Math.min(8, clientId.length))}...`;
}

export function maskSecret(value: string): string {
    return '••••••' + value.slice(-4);
}
