/**
 * Secret and settings storage interfaces
 */

export interface SecretStore {
    get(name: string): Promise<string | undefined>;
    set(name: string, value: string): Promise<void>;
}

/**
 * Persisted connection settings. `tokenExpiry` is an epoch-ms instant,
 * `null` meaning a token was never obtained.
 */
export interface ConnectionSettings {
    accessToken: string;
    refreshToken: string;
    tokenExpiry: number | null;
    redirectUri?: string;
}

export interface SettingsStore {
    readonly current: ConnectionSettings;
    /** Durable once it returns */
    save(): void;
}
