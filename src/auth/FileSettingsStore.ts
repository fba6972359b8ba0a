/**
 * File Settings Store
 * Connection settings (tokens included) at ~/.qbo-connect/settings.json
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ConnectionSettings, SettingsStore } from './SecretStore.js';
import { getConfigDir } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';

const SETTINGS_FILE_NAME = 'settings.json';

export function emptySettings(): ConnectionSettings {
    return { accessToken: '', refreshToken: '', tokenExpiry: null };
}

function parseSettings(raw: unknown): ConnectionSettings {
    const settings = emptySettings();
    if (typeof raw !== 'object' || raw === null) return settings;

    if ('accessToken' in raw && typeof raw.accessToken === 'string') {
        settings.accessToken = raw.accessToken;
    }
    if ('refreshToken' in raw && typeof raw.refreshToken === 'string') {
        settings.refreshToken = raw.refreshToken;
    }
    if ('tokenExpiry' in raw && typeof raw.tokenExpiry === 'number' && Number.isFinite(raw.tokenExpiry)) {
        settings.tokenExpiry = raw.tokenExpiry;
    }
    if ('redirectUri' in raw && typeof raw.redirectUri === 'string' && raw.redirectUri) {
        settings.redirectUri = raw.redirectUri;
    }
    return settings;
}

export class FileSettingsStore implements SettingsStore {
    private readonly filePath: string;
    private settings: ConnectionSettings | null = null;

    constructor(filePath?: string) {
        this.filePath = filePath ?? path.join(getConfigDir(), SETTINGS_FILE_NAME);
    }

    get path(): string {
        return this.filePath;
    }

    get current(): ConnectionSettings {
        if (!this.settings) {
            this.settings = this.load();
        }
        return this.settings;
    }

    // TODO: encrypt token fields at rest the way FileSecretStore does
    save(): void {
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
        fs.writeFileSync(
            this.filePath,
            JSON.stringify(this.current, null, 2) + '\n',
            { mode: 0o600 }
        );
    }

    private load(): ConnectionSettings {
        if (!fs.existsSync(this.filePath)) {
            return emptySettings();
        }

        try {
            return parseSettings(JSON.parse(fs.readFileSync(this.filePath, 'utf8')));
        } catch (error) {
            log.warn(`Ignoring unreadable settings file ${this.filePath}: ${errorMessage(error)}`);
            return emptySettings();
        }
    }
}
