/**
 * Environment Variable Loader
 *
 * Simple .env file parser in place of the dotenv package.
 * Loads KEY=VALUE pairs from .env files into process.env.
 *
 * Features:
 * - Supports comments (#) and empty lines
 * - Supports quoted values (single and double)
 * - Supports inline comments after unquoted values
 * - Supports an optional leading `export `
 * - Does not override existing environment variables unless asked to
 */

import { readFileSync, existsSync } from 'fs';
import { logger } from '@src/lib/logger.js';

export interface LoadEnvOptions {
    /** Path to .env file (default: '.env') */
    path?: string;
    /** Log each assignment, secrets masked (default: false) */
    debug?: boolean;
    /** Override existing env vars (default: false) */
    override?: boolean;
    /** Target environment (default: process.env) */
    env?: NodeJS.ProcessEnv;
}

export interface LoadEnvResult {
    loaded: number;
    skipped: number;
    found: boolean;
}

const SECRET_HINTS = ['token', 'secret', 'password', 'key'];

/**
 * Parse a single line from a .env file
 * Returns [key, value] tuple or null if line should be skipped
 */
export function parseLine(line: string): [string, string] | null {
    let trimmed = line.trim();

    if (!trimmed || trimmed.startsWith('#')) {
        return null;
    }

    if (trimmed.startsWith('export ')) {
        trimmed = trimmed.slice('export '.length).trim();
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
        return null;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    if (!key) {
        return null;
    }

    const quote = value[0];
    if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
        value = value.slice(1, -1);
    } else {
        // Inline comments only count for unquoted values
        const hashIndex = value.indexOf(' #');
        if (hashIndex !== -1) {
            value = value.slice(0, hashIndex).trim();
        }
    }

    return [key, value];
}

/**
 * Parse whole .env file content into a plain record (later keys win)
 */
export function parseEnv(content: string): Record<string, string> {
    const result: Record<string, string> = {};
    for (const line of content.split(/\r?\n/)) {
        const parsed = parseLine(line);
        if (parsed) {
            result[parsed[0]] = parsed[1];
        }
    }
    return result;
}

function maskValue(key: string, value: string): string {
    const lower = key.toLowerCase();
    return SECRET_HINTS.some((hint) => lower.includes(hint)) ? '***' : value;
}

/**
 * Load environment variables from a .env file
 */
export function loadEnv(options: LoadEnvOptions = {}): LoadEnvResult {
    const { path = '.env', debug = false, override = false, env = process.env } = options;

    if (!existsSync(path)) {
        if (debug) {
            logger.debug('[env] File not found', { path });
        }
        return { loaded: 0, skipped: 0, found: false };
    }

    const values = parseEnv(readFileSync(path, 'utf-8'));
    let loaded = 0;
    let skipped = 0;

    for (const [key, value] of Object.entries(values)) {
        if (env[key] !== undefined && !override) {
            skipped++;
            if (debug) {
                logger.debug('[env] Skipping (already set)', { key });
            }
            continue;
        }

        env[key] = value;
        loaded++;

        if (debug) {
            logger.debug('[env] Set', { key, value: maskValue(key, value) });
        }
    }

    if (debug) {
        logger.debug('[env] Loaded variables', { path, loaded, skipped });
    }

    return { loaded, skipped, found: true };
}
