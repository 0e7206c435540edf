import type { Context } from 'hono';
import { printPageScript } from '@src/lib/print-page/bundle.js';

/**
 * GET /print.js - Print page script (client.ts bundled for the browser)
 */
export default async function (context: Context) {
    context.header('Content-Type', 'text/javascript; charset=utf-8');
    context.header('Cache-Control', 'no-cache');
    return context.body(await printPageScript());
}
