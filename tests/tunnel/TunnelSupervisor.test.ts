/**
 * Tests for TunnelSupervisor
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import {
    TunnelSupervisor,
    isErrorLine,
    splitArgs,
    tunnelArgs,
    type SpawnTunnel,
} from '../../src/tunnel/TunnelSupervisor.js';

class FakeTunnelProcess extends EventEmitter {
    readonly stdout = new PassThrough();
    readonly stderr = new PassThrough();
    exitCode: number | null = null;
    signalCode: NodeJS.Signals | null = null;
    killed = false;

    kill(): boolean {
        this.killed = true;
        this.signalCode = 'SIGTERM';
        this.emit('exit', null, 'SIGTERM');
        return true;
    }

    print(line: string, stream: 'stdout' | 'stderr' = 'stderr'): void {
        this[stream].write(`${line}\n`);
    }

    exit(code: number): void {
        this.exitCode = code;
        this.emit('exit', code, null);
    }
}

function fakeSpawner() {
    const processes: FakeTunnelProcess[] = [];
    const calls: Array<{ command: string; args: string[] }> = [];
    const spawnTunnel: SpawnTunnel = (command, args) => {
        const child = new FakeTunnelProcess();
        processes.push(child);
        calls.push({ command, args });
        return child;
    };
    return { processes, calls, spawnTunnel };
}

async function nextSpawn(processes: FakeTunnelProcess[], index = 0): Promise<FakeTunnelProcess> {
    await vi.waitFor(() => {
        if (!processes[index]) throw new Error('not spawned yet');
    });
    return processes[index];
}

const URL_LINE = '2024-01-01T00:00:00Z INF |  https://quiet-lake-test.trycloudflare.com  |';

describe('helpers', () => {
    it('should build the cloudflared command line', () => {
        expect(tunnelArgs({ executable: 'cloudflared', extraArgs: ['--protocol', 'http2'], targetPort: 7207 })).toEqual([
            'tunnel', '--no-autoupdate', '--loglevel', 'info', '--url', 'https://localhost:7207', '--protocol', 'http2',
        ]);
    });

    it('should split extra arguments on whitespace', () => {
        expect(splitArgs('  --a  b ')).toEqual(['--a', 'b']);
        expect(splitArgs(undefined)).toEqual([]);
    });

    it('should recognise error lines', () => {
        expect(isErrorLine('2024-01-01T00:00:00Z ERR failed to connect')).toBe(true);
        expect(isErrorLine('Error: something')).toBe(true);
        expect(isErrorLine('INF Registered tunnel connection')).toBe(false);
    });
});

describe('TunnelSupervisor', () => {
    let supervisor: TunnelSupervisor | undefined;

    afterEach(() => {
        supervisor?.dispose();
        supervisor = undefined;
        vi.useRealTimers();
    });

    it('should become ready when a public URL is printed', async () => {
        const { processes, calls, spawnTunnel } = fakeSpawner();
        supervisor = new TunnelSupervisor({ executable: 'cloudflared-test', targetPort: 7300 }, spawnTunnel);

        const ready = supervisor.ensureTunnel();
        const child = await nextSpawn(processes);
        child.print(URL_LINE);

        expect(await ready).toBe(true);
        expect(supervisor.publicUrl).toBe('https://quiet-lake-test.trycloudflare.com');
        expect(supervisor.targetUrl).toBe('https://localhost:7300');
        expect(calls[0].command).toBe('cloudflared-test');
    });

    it('should read the URL from stdout as well', async () => {
        const { processes, spawnTunnel } = fakeSpawner();
        supervisor = new TunnelSupervisor({}, spawnTunnel);

        const ready = supervisor.ensureTunnel();
        (await nextSpawn(processes)).print(URL_LINE, 'stdout');

        expect(await ready).toBe(true);
    });

    it('should spawn once for concurrent callers', async () => {
        const { processes, spawnTunnel } = fakeSpawner();
        supervisor = new TunnelSupervisor({}, spawnTunnel);

        const first = supervisor.ensureTunnel();
        const second = supervisor.ensureTunnel();
        (await nextSpawn(processes)).print(URL_LINE);

        expect(await Promise.all([first, second])).toEqual([true, true]);
        expect(supervisor.spawned).toBe(1);
    });

    it('should reuse a live process', async () => {
        const { processes, spawnTunnel } = fakeSpawner();
        supervisor = new TunnelSupervisor({}, spawnTunnel);

        const ready = supervisor.ensureTunnel();
        (await nextSpawn(processes)).print(URL_LINE);
        await ready;

        expect(await supervisor.ensureTunnel()).toBe(true);
        expect(supervisor.spawned).toBe(1);
    });

    it('should stop the process on an error line', async () => {
        const { processes, spawnTunnel } = fakeSpawner();
        supervisor = new TunnelSupervisor({}, spawnTunnel);

        const ready = supervisor.ensureTunnel();
        const child = await nextSpawn(processes);
        child.print('2024-01-01T00:00:00Z ERR Failed to create new quick tunnel');

        expect(await ready).toBe(false);
        expect(child.killed).toBe(true);
        expect(supervisor.isRunning).toBe(false);
    });

    it('should report an early exit', async () => {
        const { processes, spawnTunnel } = fakeSpawner();
        supervisor = new TunnelSupervisor({}, spawnTunnel);

        const ready = supervisor.ensureTunnel();
        (await nextSpawn(processes)).exit(1);

        expect(await ready).toBe(false);
        expect(supervisor.isRunning).toBe(false);
    });

    it('should return false when the executable cannot be started', async () => {
        supervisor = new TunnelSupervisor({}, () => {
            throw new Error('spawn cloudflared ENOENT');
        });

        expect(await supervisor.ensureTunnel()).toBe(false);
        expect(supervisor.spawned).toBe(0);
    });

    it('should return false on an asynchronous spawn error', async () => {
        const { processes, spawnTunnel } = fakeSpawner();
        supervisor = new TunnelSupervisor({}, spawnTunnel);

        const ready = supervisor.ensureTunnel();
        (await nextSpawn(processes)).emit('error', new Error('spawn cloudflared ENOENT'));

        expect(await ready).toBe(false);
    });

    it('should leave the process running after a timeout and adopt a late URL', async () => {
        vi.useFakeTimers();
        const { processes, spawnTunnel } = fakeSpawner();
        supervisor = new TunnelSupervisor({}, spawnTunnel);

        const ready = supervisor.ensureTunnel({ timeoutMs: 1000 });
        await vi.advanceTimersByTimeAsync(1000);

        expect(await ready).toBe(false);
        const child = processes[0];
        expect(child.killed).toBe(false);
        expect(supervisor.isRunning).toBe(true);

        child.print(URL_LINE);
        await vi.waitFor(() => expect(supervisor?.publicUrl).toBe('https://quiet-lake-test.trycloudflare.com'));
        expect(await supervisor.ensureTunnel()).toBe(true);
        expect(supervisor.spawned).toBe(1);
    });

    it('should cap the wait at 25 seconds', async () => {
        vi.useFakeTimers();
        const { spawnTunnel } = fakeSpawner();
        supervisor = new TunnelSupervisor({}, spawnTunnel);

        let settled: boolean | undefined;
        void supervisor.ensureTunnel({ timeoutMs: 60_000 }).then((value) => { settled = value; });

        await vi.advanceTimersByTimeAsync(24_999);
        expect(settled).toBeUndefined();
        await vi.advanceTimersByTimeAsync(1);
        expect(settled).toBe(false);
    });

    it('should kill the process on dispose', async () => {
        const { processes, spawnTunnel } = fakeSpawner();
        supervisor = new TunnelSupervisor({}, spawnTunnel);

        const ready = supervisor.ensureTunnel();
        const child = await nextSpawn(processes);
        child.print(URL_LINE);
        await ready;

        supervisor.dispose();
        expect(child.killed).toBe(true);
        expect(supervisor.publicUrl).toBeUndefined();
        expect(supervisor.isRunning).toBe(false);
    });
});
