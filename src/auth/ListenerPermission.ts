/**
 * Listener Permission
 * Best-effort check and grant of the OS permission a callback listener needs.
 * Windows reserves HTTP prefixes through `netsh http ... urlacl`; elsewhere
 * only ports below 1024 need extra rights.
 */

import { execFile } from 'child_process';
import { errorMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

export type CommandRunner = (file: string, args: string[]) => Promise<CommandResult>;

export interface ListenerPermissionCheck {
    isReady: boolean;
    prefix: string;
    owner?: string;
    guidance: string;
    rawOutput?: string;
}

export interface ListenerPermissionOptions {
    platform?: NodeJS.Platform;
    runCommand?: CommandRunner;
    isPrivileged?: boolean;
}

export const runCommand: CommandRunner = (file, args) =>
    new Promise((resolve, reject) => {
        execFile(file, args, { windowsHide: true }, (error, stdout, stderr) => {
            if (error && typeof error.code !== 'number') {
                reject(error);
                return;
            }
            resolve({
                exitCode: error && typeof error.code === 'number' ? error.code : 0,
                stdout,
                stderr,
            });
        });
    });

export function normalizePrefix(uri: string): string {
    return uri.endsWith('/') ? uri : `${uri}/`;
}

function privilegedByDefault(): boolean {
    return typeof process.getuid === 'function' && process.getuid() === 0;
}

/**
 * The command a user runs to let this process listen on `prefix`.
 */
export function listenerRemediation(prefix: string, platform: NodeJS.Platform = process.platform): string {
    const normalized = normalizePrefix(prefix);
    if (platform === 'win32') {
        return `netsh http add urlacl url=${normalized} user=%USERNAME%`;
    }
    return `sudo setcap 'cap_net_bind_service=+ep' "$(command -v node)"`;
}

function parseOwner(output: string, prefix: string): string | undefined {
    const index = output.toLowerCase().indexOf(prefix.toLowerCase());
    if (index < 0) return undefined;

    const tail = output.substring(index, Math.min(output.length, index + 500));
    const match = tail.match(/^\s*(?:User|Owner)\s*:\s*(.+)$/im);
    return match ? match[1].trim() : undefined;
}

export async function checkListenerPermission(
    prefixOrUri: string,
    options: ListenerPermissionOptions = {}
): Promise<ListenerPermissionCheck> {
    const platform = options.platform ?? process.platform;
    const run = options.runCommand ?? runCommand;
    const prefix = normalizePrefix(prefixOrUri);

    let url: URL;
    try {
        url = new URL(prefix);
    } catch {
        return { isReady: false, prefix, guidance: 'Invalid redirect URI format' };
    }

    if (url.protocol !== 'http:') {
        return {
            isReady: false,
            prefix,
            guidance: 'The redirect URI is not using HTTP. For a local callback listener use http://localhost:PORT/',
        };
    }

    const remediation = listenerRemediation(prefix, platform);

    if (platform !== 'win32') {
        const port = url.port ? parseInt(url.port, 10) : 80;
        const privileged = options.isPrivileged ?? privilegedByDefault();
        if (port < 1024 && !privileged) {
            return {
                isReady: false,
                prefix,
                guidance: `Port ${port} needs elevated rights. Run: ${remediation}`,
            };
        }
        return { isReady: true, prefix, guidance: 'No listener reservation needed' };
    }

    try {
        const result = await run('netsh', ['http', 'show', 'urlacl']);
        const isPresent = result.stdout.toLowerCase().includes(prefix.toLowerCase());
        return {
            isReady: isPresent,
            prefix,
            owner: isPresent ? parseOwner(result.stdout, prefix) : undefined,
            rawOutput: result.stdout,
            guidance: isPresent
                ? 'URL ACL is configured. You should be able to complete OAuth sign-in.'
                : `URL ACL not found. Run as admin: ${remediation}`,
        };
    } catch (error) {
        log.warn(`Failed to check URL ACL via netsh: ${errorMessage(error)}`);
        return {
            isReady: false,
            prefix,
            guidance: `Couldn't verify URL ACL automatically. Try running as admin: ${remediation}`,
        };
    }
}

/**
 * Attempts the reservation. Returns false instead of throwing.
 */
export async function tryGrantListenerPermission(
    prefixOrUri: string,
    options: ListenerPermissionOptions = {}
): Promise<boolean> {
    const platform = options.platform ?? process.platform;
    const run = options.runCommand ?? runCommand;
    const prefix = normalizePrefix(prefixOrUri);

    if (!prefix.toLowerCase().startsWith('http://')) return false;
    if (platform !== 'win32') {
        log.debug(`Cannot grant listener permission for ${prefix} on ${platform}`);
        return false;
    }

    try {
        const result = await run('netsh', ['http', 'add', 'urlacl', `url=${prefix}`, `user=${process.env.USERNAME ?? ''}`]);
        const success = result.exitCode === 0 || result.stdout.toLowerCase().includes('exists');
        if (!success) {
            log.debug(`netsh add urlacl failed (code ${result.exitCode}): ${result.stderr || result.stdout}`);
        }
        return success;
    } catch (error) {
        log.debug(`Unable to run netsh add urlacl; may require elevation: ${errorMessage(error)}`);
        return false;
    }
}
