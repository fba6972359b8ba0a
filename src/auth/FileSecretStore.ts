/**
 * File Secret Store
 * AES-256-GCM encrypted secret map at ~/.qbo-connect/secrets.enc
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as crypto from 'crypto';
import type { SecretStore } from './SecretStore.js';
import { getConfigDir } from '../utils/config.js';

const ENCRYPTION_ALGORITHM = 'aes-256-gcm';
const SECRETS_FILE_NAME = 'secrets.enc';

interface EncryptedPayload {
    iv: string;
    authTag: string;
    data: string;
}

function isEncryptedPayload(value: unknown): value is EncryptedPayload {
    return (
        typeof value === 'object' &&
        value !== null &&
        'iv' in value && typeof value.iv === 'string' &&
        'authTag' in value && typeof value.authTag === 'string' &&
        'data' in value && typeof value.data === 'string'
    );
}

function isSecretMap(value: unknown): value is Record<string, string> {
    return (
        typeof value === 'object' &&
        value !== null &&
        !Array.isArray(value) &&
        Object.values(value).every((v) => typeof v === 'string')
    );
}

export class FileSecretStore implements SecretStore {
    private readonly filePath: string;
    private readonly encryptionKey: Buffer;

    constructor(filePath?: string) {
        this.filePath = filePath ?? path.join(getConfigDir(), SECRETS_FILE_NAME);

        // Derive key from machine-specific data
        const machineId = `${os.hostname()}-${os.userInfo().username}-qbo-connect`;
        this.encryptionKey = crypto.scryptSync(machineId, 'qbc-salt-v1', 32);
    }

    get path(): string {
        return this.filePath;
    }

    async get(name: string): Promise<string | undefined> {
        const secrets = this.readAll();
        return secrets[name];
    }

    async set(name: string, value: string): Promise<void> {
        const secrets = this.readAll();
        secrets[name] = value;
        this.writeAll(secrets);
    }

    async delete(name: string): Promise<void> {
        const secrets = this.readAll();
        if (!(name in secrets)) return;
        delete secrets[name];
        this.writeAll(secrets);
    }

    async list(): Promise<string[]> {
        return Object.keys(this.readAll()).sort();
    }

    async exists(): Promise<boolean> {
        return fs.existsSync(this.filePath);
    }

    /**
     * A file that cannot be decrypted is reported as an error rather than
     * discarded, so a hostname change does not silently wipe credentials.
     */
    private readAll(): Record<string, string> {
        if (!fs.existsSync(this.filePath)) {
            return {};
        }

        const content = fs.readFileSync(this.filePath, 'utf8');
        const payload: unknown = JSON.parse(content);
        if (!isEncryptedPayload(payload)) {
            throw new Error(`Secret file ${this.filePath} is not in the expected format`);
        }

        const decipher = crypto.createDecipheriv(
            ENCRYPTION_ALGORITHM,
            this.encryptionKey,
            Buffer.from(payload.iv, 'hex')
        );
        decipher.setAuthTag(Buffer.from(payload.authTag, 'hex'));

        let decrypted = decipher.update(payload.data, 'hex', 'utf8');
        decrypted += decipher.final('utf8');

        const secrets: unknown = JSON.parse(decrypted);
        if (!isSecretMap(secrets)) {
            throw new Error(`Secret file ${this.filePath} does not contain a secret map`);
        }
        return secrets;
    }

    private writeAll(secrets: Record<string, string>): void {
        const iv = crypto.randomBytes(16);
        const cipher = crypto.createCipheriv(ENCRYPTION_ALGORITHM, this.encryptionKey, iv);

        let encrypted = cipher.update(JSON.stringify(secrets), 'utf8', 'hex');
        encrypted += cipher.final('hex');

        const payload: EncryptedPayload = {
            iv: iv.toString('hex'),
            authTag: cipher.getAuthTag().toString('hex'),
            data: encrypted,
        };

        fs.mkdirSync(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
        fs.writeFileSync(this.filePath, JSON.stringify(payload), { mode: 0o600 });
    }
}
