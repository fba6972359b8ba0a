/**
 * Tunnel CLI Commands
 * qbc tunnel start [--timeout <s>]
 */

import { Command } from 'commander';
import ora from 'ora';
import { log } from '../utils/logger.js';
import { SECOND_MS } from '../utils/dates.js';
import { TUNNEL_READY_CEILING_MS } from '../tunnel/TunnelSupervisor.js';
import { createClient, fail } from './shared.js';

export function createTunnelCommand(): Command {
    const tunnel = new Command('tunnel').description('Manage the cloudflared webhook tunnel');

    tunnel.command('start')
        .description('Start a quick tunnel and keep it open until Ctrl+C')
        .option('-t, --timeout <seconds>', 'Readiness timeout in seconds', String(TUNNEL_READY_CEILING_MS / SECOND_MS))
        .action(async (opts: { timeout: string }) => {
            const client = createClient();
            try {
                const seconds = Number(opts.timeout);
                if (!Number.isFinite(seconds) || seconds <= 0) {
                    log.error(`Invalid timeout "${opts.timeout}"`);
                    process.exit(1);
                }

                await client.ensureInitialized();
                const supervisor = client.tokenManager.tunnelSupervisor;
                if (!supervisor) {
                    log.error('No tunnel is configured');
                    process.exit(1);
                }

                const spinner = ora(`Starting cloudflared for ${supervisor.targetUrl}...`).start();
                const ready = await supervisor.ensureTunnel({ timeoutMs: seconds * SECOND_MS });
                spinner.stop();

                if (!ready) {
                    log.error('Tunnel did not become ready');
                    client.dispose();
                    process.exitCode = 1;
                    return;
                }

                log.success('Tunnel is up');
                log.kv('Public URL', supervisor.publicUrl ?? '(pending)');
                log.kv('Target', supervisor.targetUrl);
                log.dim('  Press Ctrl+C to stop');

                await new Promise<void>((resolve) => process.once('SIGINT', () => resolve()));
                client.dispose();
                log.info('Tunnel stopped');
            } catch (error) {
                fail('Tunnel failed', error, client);
            }
        });

    return tunnel;
}
