/**
 * QBO Connect: Library Barrel Export
 */

// Client
export {
    QuickBooksClient,
    type QuickBooksClientConfig,
    type ConnectionStatus,
    type ConnectionState,
} from './client/QuickBooksClient.js';

// Auth
export { TokenManager, type TokenManagerConfig, type AuthStatus, type Credentials } from './auth/TokenManager.js';
export { OAuthFlow, type OAuthConfig, type AuthorizationOutcome } from './auth/OAuthFlow.js';
export { TokenState, EXPIRY_MARGIN_MS, type TokenResult } from './auth/TokenState.js';
export { RefreshEngine, MAX_REFRESH_ATTEMPTS } from './auth/RefreshEngine.js';
export { SecretResolver } from './auth/SecretResolver.js';
export { FileSecretStore } from './auth/FileSecretStore.js';
export { FileSettingsStore } from './auth/FileSettingsStore.js';
export type { SecretStore, SettingsStore, ConnectionSettings } from './auth/SecretStore.js';

// Tunnel
export { TunnelSupervisor, type TunnelConfig } from './tunnel/TunnelSupervisor.js';

// APIs
export { CompanyApi, type CompanyInfo, type RemoteDataApi } from './api/CompanyApi.js';

// Utils
export { HttpClient, type HttpClientConfig } from './client/HttpClient.js';
export { QboAuthError, isAuthError, type AuthErrorKind } from './utils/errors.js';
