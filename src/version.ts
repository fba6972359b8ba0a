/**
 * Package version
 * Read from the nearest package.json above this module (src/ or dist/src/)
 */

import * as fs from 'fs';

function readVersion(): string {
    for (const relative of ['../package.json', '../../package.json']) {
        const file = new URL(relative, import.meta.url);
        if (!fs.existsSync(file)) continue;

        const pkg: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
        if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
            return pkg.version;
        }
    }
    return '0.0.0';
}

export const VERSION = readVersion();
