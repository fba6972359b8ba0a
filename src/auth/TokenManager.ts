/**
 * Token Manager
 * Manages the credential lifecycle: one-time secret resolution, token
 * validity, refresh and interactive authorization
 */

import { SecretResolver } from './SecretResolver.js';
import type { SecretStore, SettingsStore } from './SecretStore.js';
import { TokenState, type TokenResult } from './TokenState.js';
import { TokenClient } from './TokenClient.js';
import { RefreshEngine } from './RefreshEngine.js';
import {
    OAuthFlow,
    type AuthorizationGrant,
    type AuthorizationPhase,
    type AuthorizationOutcome,
    type OAuthFlowDeps,
} from './OAuthFlow.js';
import { TunnelSupervisor, splitArgs, type TunnelConfig } from '../tunnel/TunnelSupervisor.js';
import {
    DEFAULT_REDIRECT_URI,
    DEFAULT_SCOPES,
    DEFAULT_TUNNEL_EXECUTABLE,
    DEFAULT_WEBHOOKS_PORT,
    SECRET_NAMES,
    maskClientId,
    normalizeEnvironment,
    parsePort,
    type QboEnvironment,
} from '../utils/config.js';
import { Gate } from '../utils/Gate.js';
import { throwIfAborted } from '../utils/dates.js';
import { QboAuthError, errorMessage, isAuthError } from '../utils/errors.js';
import { log } from '../utils/logger.js';

export interface Credentials {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    environment: QboEnvironment;
    realmId?: string;
    preLoginUrl?: string;
}

export interface TokenManagerConfig {
    settings: SettingsStore;
    secretStore?: SecretStore;
    resolver?: SecretResolver;
    /** A supervisor to reuse, or false to skip the tunnel step */
    tunnel?: TunnelSupervisor | false;
    scopes?: readonly string[];
    authorizationEndpoint?: string;
    tokenEndpoint?: string;
    fallbackPrefix?: string;
    callbackTimeoutMs?: number;
    /** Passed through to every OAuthFlow (browser launcher, state generator, ...) */
    flowDeps?: Omit<OAuthFlowDeps, 'tunnel' | 'tokenClient'>;
    /** Clock for validity checks */
    now?: () => number;
}

export interface AuthStatus {
    hasTokens: boolean;
    isValid: boolean;
    isExpired: boolean;
    canRefresh: boolean;
    expiresAt?: Date;
    companyId?: string;
    environment?: QboEnvironment;
}

export class TokenManager {
    private readonly config: TokenManagerConfig;
    private readonly settings: SettingsStore;
    private readonly resolver: SecretResolver;
    private readonly secretStore?: SecretStore;
    private readonly initGate = new Gate();
    private readonly now: () => number;
    private readonly state: TokenState;

    private initialized = false;
    private initError: QboAuthError | undefined;
    private credentials: Credentials | undefined;
    private companyId: string | undefined;
    private tokenClient: TokenClient | undefined;
    private refreshEngine: RefreshEngine | undefined;
    private tunnel: TunnelSupervisor | undefined;

    constructor(config: TokenManagerConfig) {
        this.config = config;
        this.settings = config.settings;
        this.secretStore = config.secretStore;
        this.resolver = config.resolver ?? new SecretResolver(config.secretStore);
        this.now = config.now ?? Date.now;
        this.state = TokenState.fromSettings(config.settings.current);
        if (config.tunnel) {
            this.tunnel = config.tunnel;
        }
    }

    get tokens(): Readonly<TokenState> {
        return this.state;
    }

    get tunnelSupervisor(): TunnelSupervisor | undefined {
        return this.tunnel;
    }

    /**
     * Resolves credentials exactly once per instance. Concurrent callers
     * wait behind the same gate; a missing client id fails every later
     * call the same way.
     */
    async ensureInitialized(): Promise<void> {
        if (this.initialized) return;
        if (this.initError) throw this.initError;

        await this.initGate.run(async () => {
            if (this.initialized) return;
            if (this.initError) throw this.initError;

            try {
                await this.initialize();
                this.initialized = true;
            } catch (error) {
                this.initError = isAuthError(error)
                    ? error
                    : new QboAuthError('configuration', errorMessage(error), { cause: error });
                throw this.initError;
            }
        });
    }

    getCredentials(): Credentials | undefined {
        return this.credentials;
    }

    getCompanyId(): string | undefined {
        return this.companyId;
    }

    getEnvironment(): QboEnvironment | undefined {
        return this.credentials?.environment;
    }

    isTokenValid(): boolean {
        return this.state.isValid(this.now());
    }

    /**
     * Access token as stored, without refreshing
     */
    peekAccessToken(): string | undefined {
        return this.state.accessToken || undefined;
    }

    getStatus(): AuthStatus {
        const now = this.now();
        return {
            hasTokens: this.state.hasTokens(),
            isValid: this.state.isValid(now),
            isExpired: this.state.isExpired(now),
            canRefresh: this.state.hasRefreshToken(),
            expiresAt: this.state.expiresAt === null ? undefined : new Date(this.state.expiresAt),
            companyId: this.companyId,
            environment: this.credentials?.environment,
        };
    }

    /**
     * No-op while the access token is valid. Without a refresh token the
     * interactive flow runs; otherwise the refresh token is exchanged.
     */
    async ensureTokenValid(signal?: AbortSignal): Promise<void> {
        await this.ensureInitialized();
        throwIfAborted(signal, 'Token validation');
        if (this.isTokenValid()) return;

        if (!this.state.hasRefreshToken()) {
            const outcome = await this.authorize(signal);
            if (outcome.status === 'cancelled') {
                throw new QboAuthError('cancelled', 'QuickBooks authorization was cancelled');
            }
            if (outcome.status !== 'succeeded') {
                throw new QboAuthError('authorization-failed', 'QuickBooks authorization was not completed.');
            }
            return;
        }

        await this.refresh(signal);
    }

    /**
     * Valid access token, refreshing or authorizing first if needed
     */
    async getAccessToken(signal?: AbortSignal): Promise<string> {
        await this.ensureTokenValid(signal);
        return this.state.accessToken;
    }

    async refresh(signal?: AbortSignal): Promise<TokenResult> {
        await this.ensureInitialized();
        const engine = this.requireRefreshEngine();

        if (!this.state.hasRefreshToken()) {
            throw new QboAuthError('reauthorization-required', 'No refresh token available');
        }

        try {
            const result = await engine.refresh(this.state.refreshToken, signal);
            this.commitTokens(result);
            log.info(`QuickBooks token refreshed (expires ${new Date(this.state.expiresAt ?? 0).toISOString()}).`);
            return result;
        } catch (error) {
            if (isAuthError(error, 'cancelled')) throw error;

            // Retries are exhausted or the grant is dead; the stored pair is unusable
            log.error(`Failed to refresh QuickBooks access token: ${errorMessage(error)}`);
            this.clearTokens();
            throw new QboAuthError(
                'reauthorization-required',
                'QuickBooks token refresh failed. Please re-authorize the application.',
                { status: error instanceof QboAuthError ? error.status : undefined, cause: error }
            );
        }
    }

    /**
     * Full browser-based authorization. Tokens are committed and persisted
     * before the browser sees the success page.
     */
    async authorize(
        signal?: AbortSignal,
        onPhase?: (phase: AuthorizationPhase) => void
    ): Promise<AuthorizationOutcome> {
        await this.ensureInitialized();
        const credentials = this.requireCredentials();

        const flow = new OAuthFlow(
            {
                clientId: credentials.clientId,
                clientSecret: credentials.clientSecret,
                redirectUri: credentials.redirectUri,
                scopes: this.config.scopes ?? DEFAULT_SCOPES,
                preLoginUrl: credentials.preLoginUrl,
                companyId: this.companyId,
                authorizationEndpoint: this.config.authorizationEndpoint,
                fallbackPrefix: this.config.fallbackPrefix,
                callbackTimeoutMs: this.config.callbackTimeoutMs,
            },
            {
                ...this.config.flowDeps,
                tokenClient: this.tokenClient,
                tunnel: this.tunnel,
            }
        );

        if (onPhase) flow.onPhase(onPhase);
        return flow.run((grant) => this.commitGrant(grant), signal);
    }

    /**
     * Clears tokens and the cached company id. Tokens are not revoked
     * with Intuit.
     */
    async disconnect(): Promise<void> {
        this.clearTokens();
        this.companyId = undefined;
        log.info('Disconnected from QuickBooks');
    }

    dispose(): void {
        this.tunnel?.dispose();
    }

    private async initialize(): Promise<void> {
        log.debug('Initializing QuickBooks credentials...');

        const clientId = await this.resolver.resolve(...SECRET_NAMES.clientId);
        if (!clientId) {
            throw new QboAuthError(
                'configuration',
                'QBO_CLIENT_ID not found in the secret store or environment variables.\n\n' +
                'Run this first:\n' +
                '  qbc config set clientId <id>\n\n' +
                'Or set environment variables:\n' +
                '  export QBO_CLIENT_ID=...\n' +
                '  export QBO_CLIENT_SECRET=...\n'
            );
        }

        const clientSecret = (await this.resolver.resolve(...SECRET_NAMES.clientSecret)) ?? '';
        const realmId = await this.resolver.resolve(...SECRET_NAMES.realmId);
        const redirectUri =
            (await this.resolver.resolve(...SECRET_NAMES.redirectUri)) ??
            this.settings.current.redirectUri ??
            DEFAULT_REDIRECT_URI;
        const environment = normalizeEnvironment(await this.resolver.resolve(...SECRET_NAMES.environment));
        const preLoginUrl = await this.resolver.resolve(...SECRET_NAMES.preLoginUrl);

        this.credentials = { clientId, clientSecret, redirectUri, environment, realmId, preLoginUrl };
        this.companyId = realmId;
        this.tokenClient = new TokenClient({
            clientId,
            clientSecret,
            tokenEndpoint: this.config.tokenEndpoint,
        });
        this.refreshEngine = new RefreshEngine(this.tokenClient);

        if (this.config.tunnel === undefined) {
            this.tunnel = new TunnelSupervisor(await this.resolveTunnelConfig());
        }

        log.debug(
            `QuickBooks credentials initialized - client ${maskClientId(clientId)}, ` +
            `company ${realmId ?? '(none)'}, environment ${environment}`
        );
    }

    private async resolveTunnelConfig(): Promise<TunnelConfig> {
        const executable = await this.resolver.resolve(...SECRET_NAMES.tunnelExecutable);
        const extraArgs = await this.resolver.resolve(...SECRET_NAMES.tunnelArgs);
        const port = await this.resolver.resolve(...SECRET_NAMES.webhooksPort);
        return {
            executable: executable ?? DEFAULT_TUNNEL_EXECUTABLE,
            extraArgs: splitArgs(extraArgs),
            targetPort: parsePort(port, DEFAULT_WEBHOOKS_PORT),
        };
    }

    private async commitGrant(grant: AuthorizationGrant): Promise<void> {
        this.commitTokens(grant.tokens);
        log.info(`QuickBooks tokens acquired interactively (expires ${new Date(this.state.expiresAt ?? 0).toISOString()}).`);

        if (grant.companyId) {
            this.companyId = grant.companyId;
            await this.rememberCompanyId(grant.companyId);
        }
    }

    private async rememberCompanyId(companyId: string): Promise<boolean> {
        if (!this.secretStore) return false;
        try {
            await this.secretStore.set(SECRET_NAMES.realmId[0], companyId);
            return true;
        } catch (error) {
            log.warn(`Failed to persist company id: ${errorMessage(error)}`);
            return false;
        }
    }

    private commitTokens(result: TokenResult): void {
        this.state.apply(result, this.now());
        this.persist();
    }

    private clearTokens(): void {
        this.state.clear();
        this.persist();
    }

    private persist(): void {
        this.state.writeTo(this.settings.current);
        this.settings.save();
    }

    private requireCredentials(): Credentials {
        if (!this.credentials) {
            throw new QboAuthError('configuration', 'QuickBooks credentials are not initialized');
        }
        return this.credentials;
    }

    private requireRefreshEngine(): RefreshEngine {
        if (!this.refreshEngine) {
            throw new QboAuthError('configuration', 'QuickBooks credentials are not initialized');
        }
        return this.refreshEngine;
    }
}
