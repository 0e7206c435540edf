/**
 * Print page assets
 *
 * The page itself is static HTML (src/public/print.html); its script is
 * client.ts bundled for the browser with esbuild. Both are built once per
 * process and served by the bot, or written out for static hosting by
 * scripts/build-print-page.ts.
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { build } from 'esbuild';

export const PRINT_PAGE_HTML = fileURLToPath(new URL('../../public/print.html', import.meta.url));
export const PRINT_PAGE_ENTRY = fileURLToPath(new URL('./boot.ts', import.meta.url));
const TSCONFIG = fileURLToPath(new URL('../../../tsconfig.json', import.meta.url));

/** Name the page loads its script by, relative to the page URL */
export const PRINT_SCRIPT_NAME = 'print.js';

/**
 * Load once per process; a failed load is retried on the next call
 */
function memoize(load: () => Promise<string>): () => Promise<string> {
    let cached: Promise<string> | undefined;
    return () => {
        if (!cached) {
            cached = load().catch((error: unknown) => {
                cached = undefined;
                throw error;
            });
        }
        return cached;
    };
}

export const printPageHtml = memoize(() => readFile(PRINT_PAGE_HTML, 'utf8'));
export const printPageScript = memoize(bundlePrintScript);

/**
 * Bundle the browser entry (with the qr and bwip-js browser builds) into one IIFE
 */
export async function bundlePrintScript(): Promise<string> {
    const result = await build({
        entryPoints: [PRINT_PAGE_ENTRY],
        tsconfig: TSCONFIG,
        bundle: true,
        write: false,
        format: 'iife',
        platform: 'browser',
        target: 'es2020',
        minify: true,
        legalComments: 'none',
        logLevel: 'silent',
    });

    const [output] = result.outputFiles ?? [];
    if (!output) {
        throw new Error(`esbuild produced no output for ${PRINT_PAGE_ENTRY}`);
    }
    return output.text;
}
