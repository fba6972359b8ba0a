/**
 * Tests for config helpers
 */
import { describe, it, expect } from 'vitest';
import {
    CONFIGURABLE_KEYS,
    SECRET_NAMES,
    isConfigurableKey,
    maskClientId,
    maskSecret,
    normalizeEnvironment,
    parsePort,
} from '../../src/utils/config.js';

describe('normalizeEnvironment', () => {
    it('should map production aliases', () => {
        expect(normalizeEnvironment('production')).toBe('production');
        expect(normalizeEnvironment(' PROD ')).toBe('production');
    });

    it('should default to sandbox', () => {
        expect(normalizeEnvironment(undefined)).toBe('sandbox');
        expect(normalizeEnvironment('staging')).toBe('sandbox');
    });
});

describe('parsePort', () => {
    it('should accept valid ports', () => {
        expect(parsePort('7207', 1)).toBe(7207);
    });

    it('should fall back on missing or invalid values', () => {
        expect(parsePort(undefined, 7207)).toBe(7207);
        expect(parsePort('abc', 7207)).toBe(7207);
        expect(parsePort('70000', 7207)).toBe(7207);
    });
});

describe('masking', () => {
    it('should truncate client ids to 8 characters', () => {
        expect(maskClientId('test-client-id')).toBe('test-cli...');
        expect(maskClientId('abc')).toBe('abc...');
    });

    it('should keep only the last 4 characters of secrets', () => {
        expect(maskSecret('test-secret')).toBe('••••••cret');
    });
});

describe('configurable keys', () => {
    it('should know every key it lists', () => {
        for (const key of CONFIGURABLE_KEYS) {
            expect(isConfigurableKey(key)).toBe(true);
            expect(SECRET_NAMES[key].length).toBeGreaterThan(0);
        }
        expect(isConfigurableKey('tokenEndpoint')).toBe(false);
    });

    it('should list the primary name before its alias', () => {
        expect(SECRET_NAMES.clientId).toEqual(['QBO-CLIENT-ID', 'QuickBooks-ClientId']);
    });
});
