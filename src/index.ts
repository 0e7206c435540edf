/**
 * Serial Label Bot - Main Entry Point
 *
 * Orchestrates startup:
 * - Environment loading and validation
 * - Label renderer and optional metrics client
 * - Bot assembly and transport selection (webhook or long polling)
 * - Graceful shutdown coordination
 */

import { MemorySessionStorage } from 'grammy';
import sharp from 'sharp';

import { loadEnv } from '@src/lib/env/load-env.js';
import { parseConfig } from '@src/lib/config.js';
import { createBot } from '@src/lib/bot/create-bot.js';
import type { SerialSession } from '@src/lib/bot/context.js';
import { SessionSweeper } from '@src/lib/bot/session-sweeper.js';
import { PooledLabelRenderer, RenderPool } from '@src/lib/encoder/index.js';
import { describeError, logger } from '@src/lib/logger.js';
import { MetricsClient } from '@src/lib/metrics/metrics-client.js';
import { startTransport } from '@src/servers/transport.js';

// Environment-specific .env file first, then the shared one; neither overrides the shell
const debugEnv = process.env.NODE_ENV !== 'production';
if (process.env.NODE_ENV) {
    loadEnv({ path: `.env.${process.env.NODE_ENV}`, debug: debugEnv });
}
loadEnv({ path: '.env', debug: debugEnv });

// Missing BOT_TOKEN or malformed values stop the process here
const config = parseConfig();

logger.info('Starting serial label bot', {
    transport: config.transport,
    port: config.port,
    printPage: config.printPageUrl ?? null,
    sessionTtlMs: config.sessionTtlMs,
    encoderConcurrency: config.encoderConcurrency,
    metrics: config.metrics ? config.metrics.serverUrl : null,
});

// libvips worker threads do the rasterising; match them to the render pool
sharp.concurrency(config.encoderConcurrency);
const renderer = new PooledLabelRenderer(new RenderPool(config.encoderConcurrency));

const metrics = config.metrics
    ? new MetricsClient({
          serverUrl: config.metrics.serverUrl,
          apiKey: config.metrics.apiKey,
          botName: config.metrics.botName,
      }).start()
    : undefined;

// Sessions expire after sessionTtlMs; the sweeper evicts the ones nobody reads again
const sessions = new MemorySessionStorage<SerialSession>(config.sessionTtlMs);
const sweeper = new SessionSweeper(sessions, config.sessionTtlMs).start();

const bot = createBot(config, { renderer, metrics, storage: sessions });
await bot.init();
logger.info('Bot authorized', { username: bot.botInfo.username });

const transport = await startTransport(bot, config);

// Graceful shutdown
let shuttingDown = false;
const gracefulShutdown = async (exitCode = 0) => {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;
    logger.info('Shutting down gracefully', { transport: transport.mode });
    sweeper.stop();

    try {
        await transport.stop();
    } catch (error) {
        logger.error('Transport did not stop cleanly', describeError(error));
        exitCode = 1;
    }
    await metrics?.stop();

    process.exit(exitCode);
};

transport.closed.catch(async (error: unknown) => {
    logger.error('Update delivery failed', describeError(error));
    await gracefulShutdown(1);
});

process.on('SIGINT', () => void gracefulShutdown());
process.on('SIGTERM', () => void gracefulShutdown());
