/**
 * Auth CLI Commands
 * qbc auth login | logout | status | refresh
 */

import { Command } from 'commander';
import ora from 'ora';
import { log } from '../utils/logger.js';
import type { AuthorizationPhase } from '../auth/OAuthFlow.js';
import { formatInstant } from '../utils/dates.js';
import { createClient, fail, interruptSignal } from './shared.js';

const PHASE_TEXT: Partial<Record<AuthorizationPhase, string>> = {
    preparing: 'Preparing authorization...',
    'listener-bound': 'Callback listener ready...',
    'browser-launched': 'Browser opened...',
    'awaiting-callback': 'Waiting for QuickBooks authorization in the browser...',
};

export function createAuthCommand(): Command {
    const auth = new Command('auth').description('Manage QuickBooks Online authorization');

    auth.command('login')
        .description('Authorize with QuickBooks Online in the browser')
        .action(async () => {
            const client = createClient();
            const spinner = ora('Starting authorization...');
            try {
                await client.ensureInitialized();
                spinner.start();

                const outcome = await client.authorize(interruptSignal(), (phase) => {
                    const text = PHASE_TEXT[phase];
                    if (text) spinner.text = text;
                });
                spinner.stop();

                switch (outcome.status) {
                    case 'succeeded':
                        log.success('Authorized with QuickBooks Online');
                        if (outcome.companyId) log.kv('Company ID', outcome.companyId);
                        break;
                    case 'failed':
                        log.error(`Authorization failed: ${outcome.reason}`);
                        if (outcome.remediation) log.dim(`  ${outcome.remediation}`);
                        process.exitCode = 1;
                        break;
                    case 'timed-out':
                        log.error('Timed out waiting for the authorization callback');
                        process.exitCode = 1;
                        break;
                    case 'error':
                        log.error(`Authorization error: ${outcome.reason}`);
                        process.exitCode = 1;
                        break;
                    case 'cancelled':
                        log.warn('Authorization cancelled');
                        process.exitCode = 130;
                        break;
                }
            } catch (error) {
                spinner.stop();
                fail('Authorization failed', error, client);
            } finally {
                client.dispose();
            }
        });

    auth.command('logout')
        .description('Clear stored tokens')
        .action(async () => {
            try {
                await createClient().disconnect();
                log.success('Logged out successfully');
            } catch (error) {
                fail('Logout failed', error);
            }
        });

    auth.command('status')
        .description('Show current token and connection status')
        .action(async () => {
            const client = createClient();
            try {
                const status = await client.status(interruptSignal());
                const tokens = client.getAuthStatus();

                if (status.isConnected) {
                    log.success(status.message);
                } else {
                    log.warn(status.message);
                }

                if (tokens.expiresAt) {
                    log.kv('Token Expires', formatInstant(tokens.expiresAt.getTime()));
                    log.kv('Expired', tokens.isExpired ? 'Yes' : 'No');
                    log.kv('Can Refresh', tokens.canRefresh ? 'Yes' : 'No');
                }
                if (status.companyId) log.kv('Company ID', status.companyId);
                if (tokens.environment) log.kv('Environment', tokens.environment);

                if (!tokens.hasTokens) {
                    log.dim('  Run: qbc auth login');
                }
            } catch (error) {
                fail('Status check failed', error, client);
            } finally {
                client.dispose();
            }
        });

    auth.command('refresh')
        .description('Exchange the refresh token for a new access token')
        .action(async () => {
            const client = createClient();
            const spinner = ora('Refreshing access token...').start();
            try {
                await client.refreshToken(interruptSignal());
                spinner.succeed('Access token refreshed');
                const expiresAt = client.getAuthStatus().expiresAt;
                if (expiresAt) log.kv('Token Expires', formatInstant(expiresAt.getTime()));
            } catch (error) {
                spinner.stop();
                fail('Refresh failed', error, client);
            } finally {
                client.dispose();
            }
        });

    return auth;
}
