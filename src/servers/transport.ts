/**
 * Transport
 *
 * Webhook delivery when a public URL and a port are configured, long polling
 * otherwise. No business logic lives here: updates go straight to the bot.
 */

import type { BotConfig, TransportMode } from '@src/lib/config.js';
import type { LabelBot } from '@src/lib/bot/create-bot.js';
import { ConfigError } from '@src/lib/errors/bot-errors.js';
import { logger as rootLogger, type Logger } from '@src/lib/logger.js';
import { createHttpApp, startHttpServer, webhookSecret, type HttpServerHandle } from '@src/servers/http.js';

export interface TransportHandle {
    mode: TransportMode;
    http?: HttpServerHandle;
    /** Settles when update delivery ends; rejects if polling fails */
    closed: Promise<void>;
    stop: () => Promise<void>;
}

export async function startTransport(
    bot: LabelBot,
    config: BotConfig,
    log: Logger = rootLogger.child('transport')
): Promise<TransportHandle> {
    return config.transport === 'webhook' ? startWebhook(bot, config, log) : startPolling(bot, config, log);
}

async function startWebhook(bot: LabelBot, config: BotConfig, log: Logger): Promise<TransportHandle> {
    const { webhookUrl, port } = config;
    if (!webhookUrl || port === undefined) {
        throw new ConfigError('Webhook mode needs both WEBHOOK_URL and PORT', webhookUrl ? 'PORT' : 'WEBHOOK_URL');
    }

    const secretToken = webhookSecret(config.botToken);
    const app = createHttpApp({ webhook: { bot, path: config.webhookPath, secretToken } });
    const http = await startHttpServer(app, port);

    const url = `${webhookUrl}${config.webhookPath}`;
    try {
        await bot.api.setWebhook(url, { secret_token: secretToken });
    } catch (error) {
        // Nothing will ever post to this server
        await http.stop();
        throw error;
    }
    log.info('Running in webhook mode', { url, port: http.port });

    let markClosed: () => void = () => {};
    const closed = new Promise<void>((resolve) => {
        markClosed = resolve;
    });

    return {
        mode: 'webhook',
        http,
        closed,
        stop: async () => {
            await http.stop();
            markClosed();
        },
    };
}

async function startPolling(bot: LabelBot, config: BotConfig, log: Logger): Promise<TransportHandle> {
    // Without a public URL the server still serves the print page and health check
    const http = config.port === undefined ? undefined : await startHttpServer(createHttpApp(), config.port);

    log.info('Running in polling mode');
    const closed = bot.start({
        onStart: (me) => log.info('Long polling started', { username: me.username }),
    });

    return {
        mode: 'polling',
        http,
        closed,
        stop: async () => {
            await bot.stop();
            await http?.stop();
        },
    };
}
