/**
 * OAuth Flow
 * Browser-based OAuth2 authorization code flow for QuickBooks Online
 */

import * as crypto from 'crypto';
import open from 'open';
import { CallbackServer, parseListenerPrefix, type CallbackRequest, type ListenerPrefix } from './CallbackServer.js';
import {
    checkListenerPermission,
    listenerRemediation,
    normalizePrefix,
    tryGrantListenerPermission,
    type ListenerPermissionCheck,
} from './ListenerPermission.js';
import { TokenClient } from './TokenClient.js';
import type { TokenResult } from './TokenState.js';
import {
    AUTHORIZATION_ENDPOINT,
    DEFAULT_SCOPES,
    FALLBACK_LISTENER_PREFIX,
} from '../utils/config.js';
import { MINUTE_MS, SECOND_MS } from '../utils/dates.js';
import { errorMessage, isAuthError } from '../utils/errors.js';
import { log } from '../utils/logger.js';

export const CALLBACK_TIMEOUT_MS = 5 * MINUTE_MS;
export const TUNNEL_BUDGET_MS = 30 * SECOND_MS;

export type AuthorizationPhase =
    | 'idle'
    | 'preparing'
    | 'listener-bound'
    | 'browser-launched'
    | 'awaiting-callback'
    | 'succeeded'
    | 'failed'
    | 'timed-out';

export type AuthorizationOutcome =
    | { status: 'succeeded'; companyId?: string }
    | { status: 'failed'; reason: string; remediation?: string }
    | { status: 'timed-out' }
    | { status: 'error'; reason: string }
    | { status: 'cancelled' };

/** One interactive attempt; never persisted */
export interface AuthorizationAttempt {
    state: string;
    authorizeUrl: string;
    deadline: number;
}

export interface AuthorizationGrant {
    tokens: TokenResult;
    /** Set when the callback (or the pre-login hint) named a company */
    companyId?: string;
}

export interface OAuthConfig {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    scopes?: readonly string[];
    preLoginUrl?: string;
    /** Company already known before the flow starts */
    companyId?: string;
    authorizationEndpoint?: string;
    tokenEndpoint?: string;
    fallbackPrefix?: string;
    callbackTimeoutMs?: number;
}

export interface TunnelStarter {
    ensureTunnel(options: { timeoutMs?: number; signal?: AbortSignal }): Promise<boolean>;
    readonly publicUrl: string | undefined;
}

export interface ListenerPermissionHelper {
    check(prefix: string): Promise<ListenerPermissionCheck>;
    grant(prefix: string): Promise<boolean>;
}

export interface OAuthFlowDeps {
    tokenClient?: TokenClient;
    openBrowser?: (url: string) => Promise<void>;
    tunnel?: TunnelStarter;
    listenerPermission?: ListenerPermissionHelper;
    generateState?: () => string;
}

const defaultListenerPermission: ListenerPermissionHelper = {
    check: (prefix) => checkListenerPermission(prefix),
    grant: (prefix) => tryGrantListenerPermission(prefix),
};

async function openInBrowser(url: string): Promise<void> {
    await open(url);
}

/**
 * Build the authorization URL. Every value is percent-encoded; scopes are
 * joined with spaces first, so a space is sent as %20.
 */
export function buildAuthorizeUrl(
    endpoint: string,
    params: { clientId: string; redirectUri: string; scopes: readonly string[]; state: string }
): string {
    const query = [
        `client_id=${encodeURIComponent(params.clientId)}`,
        'response_type=code',
        `scope=${encodeURIComponent(params.scopes.join(' '))}`,
        `redirect_uri=${encodeURIComponent(params.redirectUri)}`,
        `state=${encodeURIComponent(params.state)}`,
    ];
    return `${endpoint}?${query.join('&')}`;
}

/**
 * `account_id_hint` from a pre-login URL, if it carries one.
 */
export function accountHintFromPreLoginUrl(preLoginUrl: string): string | undefined {
    try {
        const hint = new URL(preLoginUrl).searchParams.get('account_id_hint');
        return hint?.trim() ? hint.trim() : undefined;
    } catch (error) {
        log.debug(`Failed to parse account_id_hint from pre-login URL: ${errorMessage(error)}`);
        return undefined;
    }
}

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

export function renderCallbackPage(message: string): string {
    return `<html>
  <head><meta charset="utf-8"><title>QuickBooks Connect</title></head>
  <body style="font-family: system-ui; padding: 40px; text-align: center;">
    <h2>QuickBooks Connect</h2>
    <p>${escapeHtml(message)}</p>
  </body>
</html>
`;
}

export const CALLBACK_MESSAGES = {
    failed: 'Authorization failed. You can close this window and return to the application.',
    succeeded: 'Authorization complete. You may close this tab and return to the application.',
    error: 'Authorization encountered an error. Check application logs for details.',
} as const;

export class OAuthFlow {
    private readonly config: OAuthConfig;
    private readonly tokenClient: TokenClient;
    private readonly openBrowser: (url: string) => Promise<void>;
    private readonly tunnel?: TunnelStarter;
    private readonly listenerPermission: ListenerPermissionHelper;
    private readonly generateState: () => string;
    private readonly phaseListeners: Array<(phase: AuthorizationPhase) => void> = [];
    private currentPhase: AuthorizationPhase = 'idle';

    constructor(config: OAuthConfig, deps: OAuthFlowDeps = {}) {
        this.config = config;
        this.tokenClient = deps.tokenClient ?? new TokenClient({
            clientId: config.clientId,
            clientSecret: config.clientSecret,
            tokenEndpoint: config.tokenEndpoint,
        });
        this.openBrowser = deps.openBrowser ?? openInBrowser;
        this.tunnel = deps.tunnel;
        this.listenerPermission = deps.listenerPermission ?? defaultListenerPermission;
        this.generateState = deps.generateState ?? (() => crypto.randomBytes(16).toString('hex'));
    }

    get phase(): AuthorizationPhase {
        return this.currentPhase;
    }

    onPhase(listener: (phase: AuthorizationPhase) => void): void {
        this.phaseListeners.push(listener);
    }

    getAuthorizeUrl(state: string): string {
        return buildAuthorizeUrl(this.config.authorizationEndpoint || AUTHORIZATION_ENDPOINT, {
            clientId: this.config.clientId,
            redirectUri: this.config.redirectUri,
            scopes: this.config.scopes ?? DEFAULT_SCOPES,
            state,
        });
    }

    /**
     * Redirect-derived prefix plus the fixed fallback, without duplicates.
     */
    listenerPrefixes(): string[] {
        const candidates = [
            normalizePrefix(this.config.fallbackPrefix || FALLBACK_LISTENER_PREFIX),
            normalizePrefix(this.config.redirectUri),
        ];
        const seen = new Set<string>();
        return candidates.filter((prefix) => {
            const key = prefix.toLowerCase();
            if (seen.has(key)) return false;
            seen.add(key);
            return true;
        });
    }

    /**
     * Run one interactive authorization. `commit` stores the grant; the
     * browser is told about success only after it resolves.
     */
    async run(
        commit: (grant: AuthorizationGrant) => Promise<void>,
        signal?: AbortSignal
    ): Promise<AuthorizationOutcome> {
        if (!this.isIdle()) {
            return { status: 'failed', reason: 'An authorization is already in progress' };
        }

        this.setPhase('preparing');
        const state = this.generateState();
        const timeoutMs = this.config.callbackTimeoutMs ?? CALLBACK_TIMEOUT_MS;
        const authorizeUrl = this.getAuthorizeUrl(state);
        const attempt: AuthorizationAttempt = { state, authorizeUrl, deadline: Date.now() + timeoutMs };

        let outcome: AuthorizationOutcome;
        try {
            outcome = await this.runAttempt(attempt, commit, signal);
        } catch (error) {
            log.error(`QuickBooks OAuth flow failed: ${errorMessage(error)}`);
            outcome = { status: 'error', reason: errorMessage(error) };
        }

        switch (outcome.status) {
            case 'succeeded':
                this.setPhase('succeeded');
                break;
            case 'timed-out':
                this.setPhase('timed-out');
                break;
            default:
                this.setPhase('failed');
                break;
        }
        return outcome;
    }

    private async runAttempt(
        attempt: AuthorizationAttempt,
        commit: (grant: AuthorizationGrant) => Promise<void>,
        signal?: AbortSignal
    ): Promise<AuthorizationOutcome> {
        const redirectPrefix = normalizePrefix(this.config.redirectUri);
        const bindable: ListenerPrefix[] = [];
        for (const prefix of this.listenerPrefixes()) {
            const parsed = parseListenerPrefix(prefix);
            if (parsed) {
                bindable.push(parsed);
            } else {
                log.warn(`Cannot listen on ${prefix}; only http loopback prefixes can be bound locally`);
            }
        }

        if (bindable.length === 0) {
            return { status: 'failed', reason: 'No local callback prefix can be bound' };
        }

        if (parseListenerPrefix(redirectPrefix)) {
            await this.ensureListenerPermission(redirectPrefix);
        }

        const server = new CallbackServer(bindable);
        const started = await server.start();
        if (!started.ok) {
            const command = listenerRemediation(started.prefix);
            log.error(
                `Failed to start OAuth callback listener on ${started.prefix} (${started.code ?? started.message}). ` +
                `Run '${command}' or restart with elevated privileges.`
            );
            return {
                status: 'failed',
                reason: `Failed to start OAuth callback listener on ${started.prefix}: ${started.message}`,
                remediation: command,
            };
        }

        try {
            this.setPhase('listener-bound');
            if (signal?.aborted) return { status: 'cancelled' };

            await this.prepareTunnel(signal);

            log.warn(`Launching QuickBooks OAuth flow. Complete sign-in for company ${this.config.companyId ?? '(not yet known)'}.`);
            if (this.config.preLoginUrl) {
                await this.tryOpen(this.config.preLoginUrl, 'Intuit pre-login URL');
            }
            if (!(await this.tryOpen(attempt.authorizeUrl, 'OAuth authorization URL'))) {
                log.error(`Failed to launch browser for QuickBooks OAuth flow. Navigate manually to ${attempt.authorizeUrl}`);
            }
            this.setPhase('browser-launched');

            this.setPhase('awaiting-callback');
            let request: CallbackRequest | null;
            try {
                request = await server.waitForRequest(Math.max(0, attempt.deadline - Date.now()), signal);
            } catch (error) {
                if (isAuthError(error, 'cancelled')) return { status: 'cancelled' };
                log.error(`Failed while awaiting QuickBooks OAuth callback: ${errorMessage(error)}`);
                return { status: 'error', reason: errorMessage(error) };
            }

            if (!request) {
                log.warn('OAuth callback listener timed out waiting for Intuit redirect.');
                return { status: 'timed-out' };
            }

            return await this.completeCallback(request, attempt.state, commit, signal);
        } finally {
            await server.close();
        }
    }

    private async completeCallback(
        request: CallbackRequest,
        expectedState: string,
        commit: (grant: AuthorizationGrant) => Promise<void>,
        signal?: AbortSignal
    ): Promise<AuthorizationOutcome> {
        const code = request.params.get('code');
        const returnedState = request.params.get('state');
        const realmId = request.params.get('realmId');
        const error = request.params.get('error');

        let reason: string | undefined;
        if (error) {
            log.warn(`QuickBooks OAuth returned error ${error}`);
            reason = `Intuit returned error: ${error}`;
        } else if (!code?.trim()) {
            reason = 'Callback did not include an authorization code';
        } else if (returnedState !== expectedState) {
            reason = 'Callback state did not match the authorization request';
        }

        if (reason || !code) {
            await request.respond(400, renderCallbackPage(CALLBACK_MESSAGES.failed));
            return { status: 'failed', reason: reason ?? 'Callback did not include an authorization code' };
        }

        try {
            const tokens = await this.tokenClient.exchangeCode(code, this.config.redirectUri, signal);
            const companyId = this.captureCompanyId(realmId);
            await commit({ tokens, companyId });

            await request.respond(200, renderCallbackPage(CALLBACK_MESSAGES.succeeded));
            return { status: 'succeeded', companyId };
        } catch (exchangeError) {
            await request.respond(500, renderCallbackPage(CALLBACK_MESSAGES.error));
            if (isAuthError(exchangeError, 'cancelled')) return { status: 'cancelled' };

            log.error(`Failed to exchange authorization code for tokens: ${errorMessage(exchangeError)}`);
            return { status: 'failed', reason: errorMessage(exchangeError) };
        }
    }

    private captureCompanyId(realmId: string | null): string | undefined {
        if (realmId?.trim()) {
            return realmId.trim();
        }

        if (!this.config.companyId && this.config.preLoginUrl) {
            const hint = accountHintFromPreLoginUrl(this.config.preLoginUrl);
            if (hint) {
                log.info(`Captured company id from account_id_hint: ${hint}`);
                return hint;
            }
        }
        return undefined;
    }

    private async ensureListenerPermission(prefix: string): Promise<boolean> {
        try {
            const check = await this.listenerPermission.check(prefix);
            if (check.isReady) return true;

            const granted = await this.listenerPermission.grant(prefix);
            log.info(`Listener permission attempted for ${prefix} (success=${granted}).`);
            return granted;
        } catch (error) {
            log.debug(`Listener permission step failed; proceeding to start listener: ${errorMessage(error)}`);
            return false;
        }
    }

    private async prepareTunnel(signal?: AbortSignal): Promise<boolean> {
        if (!this.tunnel) return false;

        try {
            const ready = await this.tunnel.ensureTunnel({ timeoutMs: TUNNEL_BUDGET_MS, signal });
            if (ready) {
                const url = this.tunnel.publicUrl;
                log.info(`Cloudflare tunnel ready${url ? ` at ${url}` : ''}.`);
            }
            return ready;
        } catch (error) {
            log.debug(`Tunnel step is optional and failed; continuing with local OAuth callback: ${errorMessage(error)}`);
            return false;
        }
    }

    private async tryOpen(url: string, what: string): Promise<boolean> {
        try {
            await this.openBrowser(url);
            return true;
        } catch (error) {
            log.warn(`Failed to open ${what}: ${errorMessage(error)}`);
            return false;
        }
    }

    private isIdle(): boolean {
        return ['idle', 'succeeded', 'failed', 'timed-out'].includes(this.currentPhase);
    }

    private setPhase(phase: AuthorizationPhase): void {
        this.currentPhase = phase;
        for (const listener of this.phaseListeners) {
            listener(phase);
        }
    }
}
