/**
 * Tests for FileSecretStore (encrypted secret storage)
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileSecretStore } from '../../src/auth/FileSecretStore.js';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

describe('FileSecretStore', () => {
    const originalHome = process.env.HOME;
    let tmpHome: string;

    beforeEach(() => {
        tmpHome = path.join(os.tmpdir(), `qbc-test-home-${Date.now()}-${Math.random().toString(16).slice(2)}`);
        fs.mkdirSync(tmpHome, { recursive: true });
        process.env.HOME = tmpHome;
    });

    afterEach(() => {
        process.env.HOME = originalHome;
        fs.rmSync(tmpHome, { recursive: true, force: true });
    });

    it('should store and read secrets', async () => {
        const store = new FileSecretStore();
        await store.set('QBO-CLIENT-ID', 'test-client-id');
        await store.set('QBO-CLIENT-SECRET', 'test-secret');

        const reopened = new FileSecretStore();
        expect(await reopened.get('QBO-CLIENT-ID')).toBe('test-client-id');
        expect(await reopened.get('QBO-CLIENT-SECRET')).toBe('test-secret');
        expect(await reopened.list()).toEqual(['QBO-CLIENT-ID', 'QBO-CLIENT-SECRET']);
    });

    it('should live under ~/.qbo-connect', () => {
        expect(new FileSecretStore().path).toBe(path.join(tmpHome, '.qbo-connect', 'secrets.enc'));
    });

    it('should return undefined when nothing is stored', async () => {
        const store = new FileSecretStore();
        expect(await store.exists()).toBe(false);
        expect(await store.get('QBO-CLIENT-ID')).toBeUndefined();
    });

    it('should not store secrets in plain text', async () => {
        const store = new FileSecretStore();
        await store.set('QBO-CLIENT-SECRET', 'test-secret');

        const raw = fs.readFileSync(store.path, 'utf8');
        expect(raw).not.toContain('test-secret');
        expect(Object.keys(JSON.parse(raw))).toEqual(['iv', 'authTag', 'data']);
    });

    it('should write the file with mode 0600', async () => {
        const store = new FileSecretStore();
        await store.set('QBO-CLIENT-ID', 'test-client-id');

        if (process.platform !== 'win32') {
            expect(fs.statSync(store.path).mode & 0o777).toBe(0o600);
        }
    });

    it('should delete a secret', async () => {
        const store = new FileSecretStore();
        await store.set('QBO-CLIENT-ID', 'test-client-id');
        await store.set('QBO-REALM-ID', '4620');

        await store.delete('QBO-CLIENT-ID');

        expect(await store.get('QBO-CLIENT-ID')).toBeUndefined();
        expect(await store.list()).toEqual(['QBO-REALM-ID']);
    });

    it('should fail on a file it cannot read', async () => {
        const store = new FileSecretStore(path.join(tmpHome, 'broken.enc'));
        fs.writeFileSync(store.path, '{"unexpected":true}');

        await expect(store.get('QBO-CLIENT-ID')).rejects.toThrow('is not in the expected format');
    });
});
