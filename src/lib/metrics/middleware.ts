/**
 * Update Tracking Middleware
 *
 * Times every update that reaches the bot's handlers and reports it to the
 * metrics tracker. Handler failures are tracked and rethrown so the error
 * boundary still sees them.
 */

import type { Context, MiddlewareFn } from 'grammy';
import type { RequestTracker } from '@src/lib/metrics/metrics-client.js';

/**
 * Name an update the way the metrics server groups them:
 * "/start" for commands, the callback data for button presses, "text" otherwise
 */
export function commandName(ctx: Context): string {
    const text = ctx.message?.text;
    if (text?.startsWith('/')) {
        return text.split(/[\s@]/, 1)[0];
    }
    if (ctx.callbackQuery?.data) {
        return ctx.callbackQuery.data;
    }
    if (text !== undefined) {
        return 'text';
    }
    return 'update';
}

export function metricsMiddleware<C extends Context>(tracker: RequestTracker): MiddlewareFn<C> {
    return async (ctx, next) => {
        const command = commandName(ctx);
        const userId = ctx.from ? String(ctx.from.id) : 'anonymous';
        const started = performance.now();

        try {
            await next();
            tracker.trackRequest(command, performance.now() - started, userId, true);
        } catch (error) {
            tracker.trackRequest(command, performance.now() - started, userId, false);
            tracker.trackError(error, command);
            throw error;
        }
    };
}
