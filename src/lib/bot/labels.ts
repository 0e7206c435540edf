/**
 * Label handlers
 *
 * - text: remember the serial, echo it with the reply buttons
 * - labels:send: render QR + barcode concurrently, upload both as one group
 * - labels:print: hand out a web-app button for the print page
 */

import { Composer, InputFile, InputMediaBuilder } from 'grammy';
import { serialFileName, normalizeSerial, type LabelRenderer } from '@src/lib/encoder/index.js';
import { ConfigError, SessionExpiredError } from '@src/lib/errors/bot-errors.js';
import type { Logger } from '@src/lib/logger.js';
import { sessionKey, type BotContext } from '@src/lib/bot/context.js';
import {
    CALLBACK_PRINT,
    CALLBACK_SEND,
    labelKeyboard,
    printKeyboard,
    printPageLink,
} from '@src/lib/bot/keyboards.js';

export const START_TEXT =
    'Hi! Send me a serial number and I will make a QR code and a barcode for it.\n' +
    'Use "Send to chat" to get the images, or "Print" to open the label page.';

export interface LabelHandlerOptions {
    renderer: LabelRenderer;
    printPageUrl?: string;
    logger: Logger;
}

/**
 * Read the stored serial or fail the interaction
 */
export function readSerial(ctx: BotContext): string {
    const serial = ctx.session.serial;
    if (!serial) {
        throw new SessionExpiredError(sessionKey(ctx));
    }
    return serial;
}

export function labelHandlers(options: LabelHandlerOptions): Composer<BotContext> {
    const { renderer, printPageUrl, logger } = options;
    const composer = new Composer<BotContext>();

    composer.command('start', async (ctx) => {
        await ctx.reply(START_TEXT);
    });

    // Unknown commands are not serials
    composer.on('message:text').drop(
        (ctx) => ctx.msg.text.startsWith('/'),
        async (ctx) => {
            const serial = normalizeSerial(ctx.msg.text);
            ctx.session.serial = serial;
            logger.debug('Serial stored', { session: sessionKey(ctx), serial });

            await ctx.reply(serial, { reply_markup: labelKeyboard(printPageUrl) });
        }
    );

    composer.callbackQuery(CALLBACK_SEND, async (ctx) => {
        const serial = readSerial(ctx);
        const started = process.hrtime.bigint();

        const labels = await renderer.render(serial);
        logger.time('Labels rendered', started, { serial });

        await ctx.answerCallbackQuery();
        await ctx.replyWithMediaGroup([
            InputMediaBuilder.document(new InputFile(labels.qr, serialFileName(serial, 'qr'))),
            InputMediaBuilder.document(new InputFile(labels.barcode, serialFileName(serial, 'barcode'))),
        ]);
    });

    composer.callbackQuery(CALLBACK_PRINT, async (ctx) => {
        if (!printPageUrl) {
            throw new ConfigError('Print page URL is not configured', 'WEBAPP_URL');
        }
        const serial = readSerial(ctx);

        await ctx.answerCallbackQuery();
        await ctx.reply('Print:', { reply_markup: printKeyboard(printPageLink(printPageUrl, serial)) });
    });

    return composer;
}
