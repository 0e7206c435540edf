import type { Context } from 'hono';
import { printPageHtml } from '@src/lib/print-page/bundle.js';

/**
 * GET /print?data=<serial> - Label print page
 *
 * Static HTML opened from the bot's "Print" web-app button. The serial never
 * reaches the server side of the page: the script reads it from the query
 * string and draws the symbols in the browser.
 */
export default async function (context: Context) {
    context.header('Cache-Control', 'no-cache');
    return context.html(await printPageHtml());
}
