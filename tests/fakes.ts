/**
 * In-process stand-ins shared by the tests
 */
import type { ConnectionSettings, SecretStore, SettingsStore } from '../src/auth/SecretStore.js';

export class MemorySecretStore implements SecretStore {
    readonly values = new Map<string, string>();
    reads = 0;

    constructor(initial: Record<string, string> = {}) {
        for (const [name, value] of Object.entries(initial)) {
            this.values.set(name, value);
        }
    }

    async get(name: string): Promise<string | undefined> {
        this.reads++;
        return this.values.get(name);
    }

    async set(name: string, value: string): Promise<void> {
        this.values.set(name, value);
    }
}

export class MemorySettingsStore implements SettingsStore {
    readonly current: ConnectionSettings;
    saves = 0;
    /** Copy of `current` at the last save() */
    saved: ConnectionSettings | undefined;

    constructor(initial: Partial<ConnectionSettings> = {}) {
        this.current = { accessToken: '', refreshToken: '', tokenExpiry: null, ...initial };
    }

    save(): void {
        this.saves++;
        this.saved = { ...this.current };
    }
}

export interface FakeResponse {
    status: number;
    ok: boolean;
    text: () => Promise<string>;
}

export function jsonResponse(status: number, body: unknown): FakeResponse {
    const text = typeof body === 'string' ? body : JSON.stringify(body);
    return { status, ok: status >= 200 && status < 300, text: async () => text };
}

export function tokenBody(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        access_token: 'test-access',
        refresh_token: 'test-refresh-next',
        expires_in: 3600,
        token_type: 'bearer',
        x_refresh_token_expires_in: 8726400,
        ...overrides,
    };
}
