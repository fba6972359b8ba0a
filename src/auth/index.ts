export { OAuthFlow, type OAuthConfig, type AuthorizationOutcome, type AuthorizationGrant } from './OAuthFlow.js';
export { TokenManager, type TokenManagerConfig, type AuthStatus, type Credentials } from './TokenManager.js';
export { TokenState, type TokenResult } from './TokenState.js';
export { TokenClient } from './TokenClient.js';
export { RefreshEngine } from './RefreshEngine.js';
export { SecretResolver } from './SecretResolver.js';
export { CallbackServer } from './CallbackServer.js';
export { FileSecretStore } from './FileSecretStore.js';
export { FileSettingsStore } from './FileSettingsStore.js';
export type { SecretStore, SettingsStore, ConnectionSettings } from './SecretStore.js';
