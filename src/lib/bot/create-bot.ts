/**
 * Bot assembly
 *
 * session (keyed store with expiry) -> error boundary -> metrics -> handlers
 */

import { Bot, MemorySessionStorage, session, type BotError, type StorageAdapter } from 'grammy';
import type { BotConfig } from '@src/lib/config.js';
import type { LabelRenderer } from '@src/lib/encoder/index.js';
import { describeError, logger as rootLogger, type Logger } from '@src/lib/logger.js';
import type { RequestTracker } from '@src/lib/metrics/metrics-client.js';
import { metricsMiddleware } from '@src/lib/metrics/middleware.js';
import { sessionKey, type BotContext, type SerialSession } from '@src/lib/bot/context.js';
import { labelHandlers } from '@src/lib/bot/labels.js';

export type LabelBotConfig = Pick<BotConfig, 'botToken' | 'printPageUrl' | 'sessionTtlMs'>;

export interface BotDependencies {
    renderer: LabelRenderer;
    metrics?: RequestTracker;
    logger?: Logger;
    /** Session store; defaults to in-memory storage expiring after sessionTtlMs */
    storage?: StorageAdapter<SerialSession>;
}

export type LabelBot = Bot<BotContext>;

/**
 * Failed interactions are logged and dropped: no retry, no custom reply
 */
export function logHandlerError(log: Logger) {
    return (err: BotError<BotContext>): void => {
        log.error('Update handling failed', {
            updateId: err.ctx.update.update_id,
            session: sessionKey(err.ctx),
            ...describeError(err.error),
        });
    };
}

export function createBot(config: LabelBotConfig, deps: BotDependencies): LabelBot {
    const log = (deps.logger ?? rootLogger).child('bot');
    const bot = new Bot<BotContext>(config.botToken);

    bot.use(
        session({
            initial: (): SerialSession => ({}),
            storage: deps.storage ?? new MemorySessionStorage<SerialSession>(config.sessionTtlMs),
            getSessionKey: sessionKey,
        })
    );

    const guarded = bot.errorBoundary(logHandlerError(log));
    if (deps.metrics) {
        guarded.use(metricsMiddleware<BotContext>(deps.metrics));
    }
    guarded.use(
        labelHandlers({
            renderer: deps.renderer,
            printPageUrl: config.printPageUrl,
            logger: log,
        })
    );

    // Anything escaping the boundary (session middleware, polling internals)
    bot.catch(logHandlerError(log));

    return bot;
}
