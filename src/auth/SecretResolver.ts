/**
 * Secret Resolver
 * Looks a credential up in the secret store, then in the environment
 */

import type { SecretStore } from './SecretStore.js';
import { errorMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';

/**
 * Environment variable for a secret name: QBO-CLIENT-ID -> QBO_CLIENT_ID
 */
export function envNameFor(secretName: string): string {
    return secretName.replace(/[^A-Za-z0-9]+/g, '_').toUpperCase();
}

function present(value: string | undefined): value is string {
    return value !== undefined && value.trim().length > 0;
}

export class SecretResolver {
    private resolveCount = 0;

    constructor(
        private readonly store?: SecretStore,
        private readonly env: NodeJS.ProcessEnv = process.env
    ) { }

    /** Number of resolve() calls made so far */
    get resolutions(): number {
        return this.resolveCount;
    }

    /**
     * Returns the first non-blank value among the candidate names, or
     * undefined. Store failures count as absence.
     */
    async resolve(...names: readonly string[]): Promise<string | undefined> {
        this.resolveCount++;

        for (const name of names) {
            const value = await this.fromStore(name);
            if (present(value)) {
                log.debug(`Loaded ${name} from secret store`);
                return value;
            }
        }

        for (const name of names) {
            const envName = envNameFor(name);
            const value = this.env[envName];
            if (present(value)) {
                log.debug(`Loaded ${name} from environment variable ${envName}`);
                return value;
            }
        }

        log.debug(`${names.join(' / ')} not found in secret store or environment`);
        return undefined;
    }

    private async fromStore(name: string): Promise<string | undefined> {
        if (!this.store) return undefined;

        try {
            return await this.store.get(name);
        } catch (error) {
            log.warn(`Failed to load ${name} from secret store: ${errorMessage(error)}`);
            return undefined;
        }
    }
}
