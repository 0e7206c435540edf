/**
 * Bot configuration
 *
 * Reads the process environment once at startup and validates it. A missing
 * bot credential or a malformed value aborts startup with a ConfigError.
 */

import { ConfigError } from '@src/lib/errors/bot-errors.js';

export type TransportMode = 'webhook' | 'polling';

export interface MetricsConfig {
    serverUrl: string;
    apiKey: string;
    botName: string;
}

export interface BotConfig {
    botToken: string;
    transport: TransportMode;
    /** Print page base URL; no Print button when absent */
    printPageUrl?: string;
    /** Public base URL the platform pushes updates to */
    webhookUrl?: string;
    webhookPath: string;
    port?: number;
    sessionTtlMs: number;
    encoderConcurrency: number;
    metrics?: MetricsConfig;
}

export const DEFAULT_WEBHOOK_PATH = '/telegram/webhook';
export const DEFAULT_SESSION_TTL_MS = 60 * 60 * 1000;
export const DEFAULT_ENCODER_CONCURRENCY = 2;
export const DEFAULT_METRICS_BOT_NAME = 'serial-label-bot';

/**
 * Webhook delivery needs both a public URL and a port to listen on
 */
export function selectTransport(webhookUrl?: string, port?: number): TransportMode {
    return webhookUrl && port ? 'webhook' : 'polling';
}

function read(env: NodeJS.ProcessEnv, key: string): string | undefined {
    const value = env[key]?.trim();
    return value ? value : undefined;
}

function readPositiveInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
    const raw = read(env, key);
    if (raw === undefined) {
        return undefined;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigError(`${key} must be a positive integer, got "${raw}"`, key);
    }
    return value;
}

function readUrl(env: NodeJS.ProcessEnv, key: string, protocols: string[]): string | undefined {
    const raw = read(env, key);
    if (raw === undefined) {
        return undefined;
    }
    let url: URL;
    try {
        url = new URL(raw);
    } catch {
        throw new ConfigError(`${key} is not a valid URL: "${raw}"`, key);
    }
    if (!protocols.includes(url.protocol)) {
        throw new ConfigError(`${key} must use ${protocols.join(' or ')}, got "${url.protocol}"`, key);
    }
    return raw.replace(/\/+$/, '');
}

function readWebhookPath(env: NodeJS.ProcessEnv): string {
    const path = read(env, 'WEBHOOK_PATH') ?? DEFAULT_WEBHOOK_PATH;
    if (!path.startsWith('/')) {
        throw new ConfigError(`WEBHOOK_PATH must start with "/", got "${path}"`, 'WEBHOOK_PATH');
    }
    return path;
}

export function parseConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
    const botToken = read(env, 'BOT_TOKEN');
    if (!botToken) {
        throw new ConfigError('BOT_TOKEN is not set. Create a .env file with BOT_TOKEN=...', 'BOT_TOKEN');
    }

    const webhookUrl = readUrl(env, 'WEBHOOK_URL', ['https:']);
    const port = readPositiveInt(env, 'PORT');
    const transport = selectTransport(webhookUrl, port);

    // The bot serves its own print page in webhook mode, so the public URL doubles as its base
    const printPageUrl =
        readUrl(env, 'WEBAPP_URL', ['https:']) ??
        (transport === 'webhook' && webhookUrl ? `${webhookUrl}/print` : undefined);

    const metricsUrl = readUrl(env, 'METRICS_URL', ['http:', 'https:']);
    const metricsKey = read(env, 'METRICS_API_KEY');
    const metrics =
        metricsUrl && metricsKey
            ? {
                  serverUrl: metricsUrl,
                  apiKey: metricsKey,
                  botName: read(env, 'METRICS_BOT_NAME') ?? DEFAULT_METRICS_BOT_NAME,
              }
            : undefined;

    return {
        botToken,
        transport,
        printPageUrl,
        webhookUrl,
        webhookPath: readWebhookPath(env),
        port,
        sessionTtlMs: readPositiveInt(env, 'SESSION_TTL_MS') ?? DEFAULT_SESSION_TTL_MS,
        encoderConcurrency: readPositiveInt(env, 'ENCODER_CONCURRENCY') ?? DEFAULT_ENCODER_CONCURRENCY,
        metrics,
    };
}
