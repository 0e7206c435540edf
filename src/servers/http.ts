/**
 * HTTP Server
 *
 * Hono app serving the Telegram webhook (webhook mode only), the static label
 * print page with its script, and a health check. Runs on Node through @hono/node-server.
 */

import { createHash } from 'crypto';
import { serve, type ServerType } from '@hono/node-server';
import { Hono } from 'hono';
import { webhookCallback } from 'grammy';

import { createErrorResponse } from '@src/lib/api-helpers.js';
import type { LabelBot } from '@src/lib/bot/create-bot.js';
import { logger as rootLogger, type Logger } from '@src/lib/logger.js';

import HealthGet from '@src/routes/health/GET.js';
import PrintGet from '@src/routes/print/GET.js';
import PrintScriptGet from '@src/routes/print.js/GET.js';

export interface WebhookRoute {
    bot: LabelBot;
    path: string;
    secretToken: string;
}

export interface HttpAppOptions {
    webhook?: WebhookRoute;
    logger?: Logger;
}

/**
 * Secret for Telegram's X-Telegram-Bot-Api-Secret-Token header, derived from
 * the bot token so it survives restarts without extra configuration
 */
export function webhookSecret(botToken: string): string {
    return createHash('sha256').update(botToken).digest('hex');
}

/**
 * Create and configure the Hono HTTP app
 */
export function createHttpApp(options: HttpAppOptions = {}): Hono {
    const log = (options.logger ?? rootLogger).child('http');
    const app = new Hono();

    // Request logging middleware (path only: the query carries user serials)
    app.use('*', async (c, next) => {
        const start = Date.now();
        await next();
        log.info('Request completed', {
            method: c.req.method,
            path: c.req.path,
            status: c.res.status,
            duration: Date.now() - start,
        });
    });

    // Health check endpoint (public, no authentication required)
    app.get('/health', HealthGet);

    // Label print page (opened as a Telegram web app) and its script
    app.get('/print', PrintGet);
    app.get('/print.js', PrintScriptGet);

    if (options.webhook) {
        const { bot, path, secretToken } = options.webhook;
        app.post(path, webhookCallback(bot, 'hono', { secretToken }));
    }

    app.onError((err, c) => createErrorResponse(c, err));

    app.notFound((c) => {
        return c.json(
            {
                success: false,
                error: 'Not found',
                error_code: 'NOT_FOUND',
            },
            404
        );
    });

    return app;
}

export interface HttpServerHandle {
    app: Hono;
    server: ServerType;
    /** Bound port (the OS picks one when asked for port 0) */
    port: number;
    stop: () => Promise<void>;
}

/**
 * Start the HTTP server; resolves once it is listening
 */
export async function startHttpServer(
    app: Hono,
    port: number,
    log: Logger = rootLogger.child('http')
): Promise<HttpServerHandle> {
    const { server, boundPort } = await new Promise<{ server: ServerType; boundPort: number }>((resolve, reject) => {
        const server = serve({ fetch: app.fetch, port }, (info) => {
            server.off('error', reject);
            resolve({ server, boundPort: info.port });
        });
        server.once('error', reject);
    });
    log.info('HTTP server running', { port: boundPort, url: `http://localhost:${boundPort}` });

    return {
        app,
        server,
        port: boundPort,
        stop: () =>
            new Promise<void>((resolve, reject) => {
                server.close((error?: Error) => {
                    if (error) {
                        reject(error);
                        return;
                    }
                    log.info('HTTP server stopped');
                    resolve();
                });
            }),
    };
}
