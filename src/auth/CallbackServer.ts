/**
 * Callback Server
 * Loopback HTTP listener that hands the first request under one of its
 * prefixes to the waiting authorization flow
 */

import * as http from 'http';
import { cancelledError } from '../utils/errors.js';

export interface ListenerPrefix {
    prefix: string;
    host: string;
    port: number;
    path: string;
}

export interface CallbackRequest {
    url: URL;
    params: URLSearchParams;
    respond(status: number, html: string): Promise<void>;
}

export type ListenerStartResult =
    | { ok: true; prefixes: string[] }
    | { ok: false; prefix: string; code?: string; message: string };

const LOOPBACK_HOSTS: Record<string, string> = {
    'localhost': '127.0.0.1',
    '127.0.0.1': '127.0.0.1',
    '[::1]': '::1',
};

/**
 * Splits an `http://<loopback>:<port>/<path>/` prefix; null for anything
 * that cannot be bound locally.
 */
export function parseListenerPrefix(prefix: string): ListenerPrefix | null {
    let url: URL;
    try {
        url = new URL(prefix);
    } catch {
        return null;
    }

    const host = LOOPBACK_HOSTS[url.hostname.toLowerCase()];
    if (url.protocol !== 'http:' || !host) return null;

    const path = url.pathname.endsWith('/') ? url.pathname : `${url.pathname}/`;
    return {
        prefix,
        host,
        port: url.port ? parseInt(url.port, 10) : 80,
        path: path.toLowerCase(),
    };
}

function errnoCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

export class CallbackServer {
    private readonly groups = new Map<string, ListenerPrefix[]>();
    private readonly servers: http.Server[] = [];
    private readonly queue: CallbackRequest[] = [];
    private waiter: ((request: CallbackRequest) => void) | undefined;

    constructor(prefixes: readonly ListenerPrefix[]) {
        for (const prefix of prefixes) {
            const key = `${prefix.host}:${prefix.port}`;
            const group = this.groups.get(key) ?? [];
            group.push(prefix);
            this.groups.set(key, group);
        }
    }

    get isListening(): boolean {
        return this.servers.some((server) => server.listening);
    }

    /**
     * Binds every port. On the first failure the servers already bound are
     * closed again.
     */
    async start(): Promise<ListenerStartResult> {
        for (const group of this.groups.values()) {
            const { host, port } = group[0];
            const server = http.createServer((req, res) => this.handle(group, req, res));

            try {
                await new Promise<void>((resolve, reject) => {
                    server.once('error', reject);
                    server.listen(port, host, () => {
                        server.off('error', reject);
                        resolve();
                    });
                });
            } catch (error) {
                await this.close();
                return {
                    ok: false,
                    prefix: group[0].prefix,
                    code: errnoCode(error),
                    message: error instanceof Error ? error.message : String(error),
                };
            }

            this.servers.push(server);
        }

        return { ok: true, prefixes: [...this.groups.values()].flat().map((p) => p.prefix) };
    }

    /**
     * Next accepted request, or null once `timeoutMs` passes.
     */
    waitForRequest(timeoutMs: number, signal?: AbortSignal): Promise<CallbackRequest | null> {
        const queued = this.queue.shift();
        if (queued) return Promise.resolve(queued);

        if (signal?.aborted) {
            return Promise.reject(cancelledError('Waiting for the OAuth callback', signal.reason));
        }

        return new Promise((resolve, reject) => {
            const cleanup = () => {
                clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
                this.waiter = undefined;
            };
            const onAbort = () => {
                cleanup();
                reject(cancelledError('Waiting for the OAuth callback', signal?.reason));
            };
            const timer = setTimeout(() => {
                cleanup();
                resolve(null);
            }, timeoutMs);

            signal?.addEventListener('abort', onAbort, { once: true });
            this.waiter = (request) => {
                cleanup();
                resolve(request);
            };
        });
    }

    async close(): Promise<void> {
        const servers = this.servers.splice(0);
        await Promise.all(
            servers.map(
                (server) =>
                    new Promise<void>((resolve) => {
                        server.close(() => resolve());
                        server.closeAllConnections();
                    })
            )
        );
    }

    private handle(group: ListenerPrefix[], req: http.IncomingMessage, res: http.ServerResponse): void {
        const url = new URL(req.url || '/', `http://${req.headers.host || 'localhost'}`);
        const pathname = url.pathname.toLowerCase();
        const matches = group.some((p) => `${pathname}/`.startsWith(p.path) || pathname.startsWith(p.path));

        if (!matches || pathname === '/favicon.ico') {
            res.writeHead(404, { 'Content-Type': 'text/plain' });
            res.end('Not found');
            return;
        }

        const request: CallbackRequest = {
            url,
            params: url.searchParams,
            respond: (status, html) =>
                new Promise<void>((resolve) => {
                    // A client that hung up never sees `finish`
                    if (res.destroyed || req.socket.destroyed) {
                        resolve();
                        return;
                    }
                    res.once('close', () => resolve());
                    res.writeHead(status, { 'Content-Type': 'text/html; charset=utf-8' });
                    res.end(html, () => resolve());
                }),
        };

        if (this.waiter) {
            this.waiter(request);
        } else {
            this.queue.push(request);
        }
    }
}
