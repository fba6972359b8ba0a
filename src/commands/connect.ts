/**
 * Connect CLI Command
 * qbc connect
 */

import { Command } from 'commander';
import ora from 'ora';
import { log } from '../utils/logger.js';
import { createClient, fail, interruptSignal } from './shared.js';

export function createConnectCommand(): Command {
    return new Command('connect')
        .description('Make sure a usable token exists and test the connection')
        .action(async () => {
            const client = createClient();
            const spinner = ora('Connecting to QuickBooks Online...').start();
            try {
                const connected = await client.connect(interruptSignal());
                spinner.stop();

                if (!connected) {
                    log.error('Could not connect to QuickBooks Online');
                    process.exitCode = 1;
                    return;
                }

                const companyId = client.tokenManager.getCompanyId();
                if (companyId) log.kv('Company ID', companyId);
            } catch (error) {
                spinner.stop();
                fail('Connect failed', error, client);
            } finally {
                client.dispose();
            }
        });
}
