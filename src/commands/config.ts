/**
 * Config CLI Commands
 * qbc config show | set <key> <value> | path
 */

import { Command } from 'commander';
import { log } from '../utils/logger.js';
import { FileSecretStore } from '../auth/FileSecretStore.js';
import { FileSettingsStore } from '../auth/FileSettingsStore.js';
import { SecretResolver } from '../auth/SecretResolver.js';
import {
    CONFIGURABLE_KEYS,
    DEFAULT_REDIRECT_URI,
    SECRET_NAMES,
    getConfigDir,
    isConfigurableKey,
    maskClientId,
    maskSecret,
    normalizeEnvironment,
    type ConfigurableKey,
} from '../utils/config.js';
import { fail } from './shared.js';

const LABELS: Record<ConfigurableKey, string> = {
    clientId: 'Client ID',
    clientSecret: 'Client Secret',
    realmId: 'Company ID',
    redirectUri: 'Redirect URI',
    environment: 'Environment',
    preLoginUrl: 'Pre-login URL',
};

function display(key: ConfigurableKey, value: string): string {
    switch (key) {
        case 'clientId':
            return maskClientId(value);
        case 'clientSecret':
            return maskSecret(value);
        default:
            return value;
    }
}

export function createConfigCommand(): Command {
    const config = new Command('config').description('Manage QuickBooks connection settings');

    // ── config show ──────────────────────────────────
    config
        .command('show')
        .description('Display resolved configuration (secrets masked)')
        .action(async () => {
            try {
                const store = new FileSecretStore();
                const settings = new FileSettingsStore();
                const resolver = new SecretResolver(store);

                log.header('QBO Connect Configuration');
                log.kv('Secrets File', store.path);
                log.kv('Settings File', settings.path);
                console.log();

                for (const key of CONFIGURABLE_KEYS) {
                    const value = await resolver.resolve(...SECRET_NAMES[key]);
                    if (key === 'environment') {
                        log.kv(LABELS[key], normalizeEnvironment(value));
                    } else if (key === 'redirectUri') {
                        log.kv(LABELS[key], value ?? settings.current.redirectUri ?? `${DEFAULT_REDIRECT_URI} (default)`);
                    } else {
                        log.kv(LABELS[key], value ? display(key, value) : '(not set)');
                    }
                }
            } catch (error) {
                fail('Failed to read configuration', error);
            }
        });

    // ── config set ───────────────────────────────────
    config
        .command('set')
        .description('Store a single value in the encrypted secret store')
        .argument('<key>', `Config key: ${CONFIGURABLE_KEYS.join(', ')}`)
        .argument('<value>', 'Value to set')
        .action(async (key: string, value: string) => {
            if (!isConfigurableKey(key)) {
                log.error(`Invalid key "${key}". Valid keys: ${CONFIGURABLE_KEYS.join(', ')}`);
                process.exit(1);
            }

            try {
                await new FileSecretStore().set(SECRET_NAMES[key][0], value.trim());
                log.success(`Set ${key} = ${display(key, value.trim())}`);
            } catch (error) {
                fail(`Failed to set ${key}`, error);
            }
        });

    // ── config path ──────────────────────────────────
    config
        .command('path')
        .description('Print the config directory path')
        .action(() => {
            console.log(getConfigDir());
        });

    return config;
}
