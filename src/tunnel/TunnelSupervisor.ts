/**
 * Tunnel Supervisor
 * Runs a single cloudflared quick tunnel that exposes the local webhook
 * listener under a public trycloudflare.com URL
 */

import { spawn } from 'child_process';
import * as readline from 'readline';
import type { Readable } from 'stream';
import { Gate } from '../utils/Gate.js';
import { SECOND_MS } from '../utils/dates.js';
import { errorMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import { DEFAULT_TUNNEL_EXECUTABLE, DEFAULT_WEBHOOKS_PORT } from '../utils/config.js';

export const TUNNEL_READY_CEILING_MS = 25 * SECOND_MS;
export const TUNNEL_URL_PATTERN = /https?:\/\/[\w.-]+\.trycloudflare\.com/i;

export interface TunnelConfig {
    executable: string;
    extraArgs: string[];
    /** Local HTTPS port of the webhook listener */
    targetPort: number;
}

/** The parts of a ChildProcess the supervisor relies on */
export interface TunnelProcess {
    readonly stdout: Readable | null;
    readonly stderr: Readable | null;
    readonly exitCode: number | null;
    readonly signalCode: NodeJS.Signals | null;
    readonly killed: boolean;
    kill(signal?: NodeJS.Signals): boolean;
    once(event: 'exit' | 'error', listener: (arg: unknown) => void): unknown;
}

export type SpawnTunnel = (command: string, args: string[]) => TunnelProcess;

export interface EnsureTunnelOptions {
    timeoutMs?: number;
    signal?: AbortSignal;
}

type Readiness =
    | { status: 'ready'; url: string }
    | { status: 'error'; line: string }
    | { status: 'exited' }
    | { status: 'spawn-failed'; message: string };

type WaitResult = Readiness | { status: 'timeout' } | { status: 'cancelled' };

export const defaultTunnelConfig: TunnelConfig = {
    executable: DEFAULT_TUNNEL_EXECUTABLE,
    extraArgs: [],
    targetPort: DEFAULT_WEBHOOKS_PORT,
};

export function splitArgs(value: string | undefined): string[] {
    const trimmed = value?.trim();
    return trimmed ? trimmed.split(/\s+/) : [];
}

export function tunnelArgs(config: TunnelConfig): string[] {
    return [
        'tunnel',
        '--no-autoupdate',
        '--loglevel',
        'info',
        '--url',
        `https://localhost:${config.targetPort}`,
        ...config.extraArgs,
    ];
}

export function isErrorLine(line: string): boolean {
    return /error/i.test(line) || /\bERR\b/.test(line);
}

const spawnCloudflared: SpawnTunnel = (command, args) =>
    spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true });

export class TunnelSupervisor {
    private readonly config: TunnelConfig;
    private readonly spawnTunnel: SpawnTunnel;
    private readonly gate = new Gate();
    private child: TunnelProcess | undefined;
    private url: string | undefined;
    private spawnCount = 0;

    constructor(config: Partial<TunnelConfig> = {}, spawnTunnel: SpawnTunnel = spawnCloudflared) {
        this.config = { ...defaultTunnelConfig, ...config };
        this.spawnTunnel = spawnTunnel;
    }

    get publicUrl(): string | undefined {
        return this.url;
    }

    get targetUrl(): string {
        return `https://localhost:${this.config.targetPort}`;
    }

    /** Processes started over this supervisor's lifetime */
    get spawned(): number {
        return this.spawnCount;
    }

    get isRunning(): boolean {
        const child = this.child;
        return !!child && child.exitCode === null && child.signalCode === null && !child.killed;
    }

    /**
     * True once a tunnel process is up. Never throws: a missing executable,
     * an error line or a timeout all come back as false.
     */
    async ensureTunnel(options: EnsureTunnelOptions = {}): Promise<boolean> {
        if (this.isRunning) return true;

        try {
            return await this.gate.run(async () => {
                if (this.isRunning) return true;
                return this.start(options);
            });
        } catch (error) {
            log.debug(`cloudflared start failed: ${errorMessage(error)}`);
            return false;
        }
    }

    dispose(): void {
        const child = this.child;
        this.child = undefined;
        this.url = undefined;
        if (child && child.exitCode === null && !child.killed) {
            try {
                child.kill();
            } catch (error) {
                log.debug(`Failed to stop cloudflared: ${errorMessage(error)}`);
            }
        }
    }

    private async start(options: EnsureTunnelOptions): Promise<boolean> {
        const args = tunnelArgs(this.config);
        let child: TunnelProcess;
        try {
            child = this.spawnTunnel(this.config.executable, args);
            this.spawnCount++;
        } catch (error) {
            log.warn(`Failed to start cloudflared process (${this.config.executable}): ${errorMessage(error)}`);
            return false;
        }

        this.child = child;
        this.url = undefined;
        const readiness = this.watch(child);

        const waitMs = Math.min(options.timeoutMs ?? TUNNEL_READY_CEILING_MS, TUNNEL_READY_CEILING_MS);
        const result = await this.waitFor(readiness, waitMs, options.signal);

        switch (result.status) {
            case 'ready':
                this.url = result.url;
                log.info(`cloudflared tunnel established for webhooks: ${result.url} -> ${this.targetUrl}`);
                return true;
            case 'error':
                log.warn(`cloudflared error: ${result.line}`);
                this.terminate(child);
                return false;
            case 'exited':
                log.warn('cloudflared exited before the tunnel was ready.');
                this.terminate(child);
                return false;
            case 'spawn-failed':
                log.debug(`cloudflared start failed (${result.message}). Is it installed and on PATH?`);
                this.terminate(child);
                return false;
            case 'timeout':
            case 'cancelled':
                log.warn(
                    result.status === 'timeout'
                        ? 'Timed out waiting for cloudflared tunnel readiness.'
                        : 'Stopped waiting for cloudflared tunnel readiness.'
                );
                // Left running for reuse unless it reports an error later
                void readiness.then((late) => {
                    if (late.status === 'ready') {
                        if (this.child === child) this.url = late.url;
                    } else {
                        this.terminate(child);
                    }
                });
                return false;
        }
    }

    /**
     * Consumes stdout and stderr line by line; the first URL or error line
     * settles the returned promise. Lines keep draining afterwards so the
     * process never blocks on a full pipe.
     */
    private watch(child: TunnelProcess): Promise<Readiness> {
        return new Promise<Readiness>((resolve) => {
            let settled = false;
            const settle = (readiness: Readiness) => {
                if (settled) return;
                settled = true;
                resolve(readiness);
            };

            const onLine = (line: string) => {
                log.debug(`[cloudflared] ${line}`);
                const match = line.match(TUNNEL_URL_PATTERN);
                if (match) {
                    settle({ status: 'ready', url: match[0] });
                } else if (isErrorLine(line)) {
                    settle({ status: 'error', line });
                }
            };

            for (const stream of [child.stdout, child.stderr]) {
                if (stream) {
                    readline.createInterface({ input: stream, crlfDelay: Infinity }).on('line', onLine);
                }
            }

            child.once('error', (error) => settle({ status: 'spawn-failed', message: errorMessage(error) }));
            child.once('exit', () => {
                if (this.child === child) {
                    this.child = undefined;
                    this.url = undefined;
                }
                settle({ status: 'exited' });
            });
        });
    }

    private waitFor(readiness: Promise<Readiness>, waitMs: number, signal?: AbortSignal): Promise<WaitResult> {
        if (signal?.aborted) return Promise.resolve({ status: 'cancelled' });

        return new Promise<WaitResult>((resolve) => {
            const finish = (result: WaitResult) => {
                clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
                resolve(result);
            };
            const onAbort = () => finish({ status: 'cancelled' });
            const timer = setTimeout(() => finish({ status: 'timeout' }), waitMs);

            signal?.addEventListener('abort', onAbort, { once: true });
            void readiness.then(finish);
        });
    }

    private terminate(child: TunnelProcess): void {
        if (this.child === child) {
            this.child = undefined;
            this.url = undefined;
        }
        if (child.exitCode === null && !child.killed) {
            try {
                child.kill();
            } catch (error) {
                log.debug(`Failed to stop cloudflared: ${errorMessage(error)}`);
            }
        }
    }
}
