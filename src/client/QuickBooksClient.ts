/**
 * QuickBooks Client
 * Facade over the credential lifecycle: connect, disconnect and status
 */

import { TokenManager, type AuthStatus, type TokenManagerConfig } from '../auth/TokenManager.js';
import type { AuthorizationOutcome, AuthorizationPhase } from '../auth/OAuthFlow.js';
import { HttpClient } from './HttpClient.js';
import { CompanyApi, type RemoteDataApi } from '../api/CompanyApi.js';
import { DATA_API_BASE_URLS } from '../utils/config.js';
import { throwIfAborted } from '../utils/dates.js';
import { errorMessage, isAuthError } from '../utils/errors.js';
import { log } from '../utils/logger.js';

export interface QuickBooksClientConfig extends TokenManagerConfig {
    /** Replaces the company-info probe */
    dataApi?: RemoteDataApi;
}

export type ConnectionState = 'no-tokens' | 'expired' | 'connected' | 'connection-test-failed';

export interface ConnectionStatus {
    state: ConnectionState;
    isConnected: boolean;
    message: string;
    companyId?: string;
}

export class QuickBooksClient {
    readonly tokenManager: TokenManager;
    private readonly injectedDataApi?: RemoteDataApi;
    private companyApi: CompanyApi | undefined;

    constructor(config: QuickBooksClientConfig) {
        this.tokenManager = new TokenManager(config);
        this.injectedDataApi = config.dataApi;
    }

    // ── Auth ──────────────────────────────────────────

    async ensureInitialized(): Promise<void> {
        await this.tokenManager.ensureInitialized();
    }

    async ensureTokenValid(signal?: AbortSignal): Promise<void> {
        await this.tokenManager.ensureTokenValid(signal);
    }

    async authorize(
        signal?: AbortSignal,
        onPhase?: (phase: AuthorizationPhase) => void
    ): Promise<AuthorizationOutcome> {
        return this.tokenManager.authorize(signal, onPhase);
    }

    async refreshToken(signal?: AbortSignal): Promise<void> {
        await this.tokenManager.refresh(signal);
    }

    getAuthStatus(): AuthStatus {
        return this.tokenManager.getStatus();
    }

    // ── Connection ────────────────────────────────────

    /**
     * Initialize, make sure the token is usable, then probe the data API.
     * Only cancellation is thrown; every other failure is `false`.
     */
    async connect(signal?: AbortSignal): Promise<boolean> {
        try {
            await this.tokenManager.ensureInitialized();
            throwIfAborted(signal, 'Connect');

            await this.tokenManager.ensureTokenValid(signal);
            throwIfAborted(signal, 'Connect');

            const connected = await this.dataApi().testConnectivity({ signal });
            throwIfAborted(signal, 'Connect');

            if (connected) {
                log.success('Successfully connected to QuickBooks');
            } else {
                log.warn('Connection test failed');
            }
            return connected;
        } catch (error) {
            if (isAuthError(error, 'cancelled')) {
                log.info('QuickBooks connection was cancelled');
                throw error;
            }
            log.error(`Failed to connect to QuickBooks: ${errorMessage(error)}`);
            return false;
        }
    }

    async disconnect(): Promise<void> {
        await this.tokenManager.disconnect();
    }

    /**
     * Reports the connection without refreshing or persisting anything.
     * Expiry is compared to the current instant with no renewal margin.
     */
    async status(signal?: AbortSignal): Promise<ConnectionStatus> {
        try {
            throwIfAborted(signal, 'Connection status check');
            const auth = this.tokenManager.getStatus();

            if (!auth.hasTokens) {
                return { state: 'no-tokens', isConnected: false, message: 'Not connected - no tokens available' };
            }

            if (auth.isExpired) {
                return { state: 'expired', isConnected: false, message: 'Not connected - tokens expired' };
            }

            await this.tokenManager.ensureInitialized();
            const connected = await this.dataApi().testConnectivity({
                signal,
                accessToken: this.tokenManager.peekAccessToken(),
            });
            throwIfAborted(signal, 'Connection status check');

            if (connected) {
                return {
                    state: 'connected',
                    isConnected: true,
                    message: 'Connected and ready',
                    companyId: this.tokenManager.getCompanyId(),
                };
            }
            return { state: 'connection-test-failed', isConnected: false, message: 'Connection test failed' };
        } catch (error) {
            if (isAuthError(error, 'cancelled')) {
                log.info('Connection status check was cancelled');
                throw error;
            }
            log.error(`Failed to get connection status: ${errorMessage(error)}`);
            return { state: 'connection-test-failed', isConnected: false, message: `Error: ${errorMessage(error)}` };
        }
    }

    dispose(): void {
        this.tokenManager.dispose();
    }

    private dataApi(): RemoteDataApi {
        if (this.injectedDataApi) return this.injectedDataApi;

        if (!this.companyApi) {
            const environment = this.tokenManager.getEnvironment() ?? 'sandbox';
            const http = new HttpClient({
                baseUrl: DATA_API_BASE_URLS[environment],
                getAccessToken: (signal) => this.tokenManager.getAccessToken(signal),
            });
            this.companyApi = new CompanyApi(http, () => this.tokenManager.getCompanyId());
        }
        return this.companyApi;
    }
}
