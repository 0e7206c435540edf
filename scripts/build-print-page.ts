#!/usr/bin/env tsx
/**
 * Print Page Build Script
 *
 * Writes the static print page and its bundled script to a directory, for
 * hosting the page somewhere other than the bot (point WEBAPP_URL at it).
 *
 * Usage:
 *   npm run print-page:build -- [out-dir]
 *   tsx scripts/build-print-page.ts [out-dir]
 *
 * Example:
 *   tsx scripts/build-print-page.ts dist/print-page
 *   # upload print.html and print.js side by side, then
 *   # WEBAPP_URL=https://labels.example.com/print.html
 */

import { mkdir, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { PRINT_SCRIPT_NAME, printPageHtml, printPageScript } from '@src/lib/print-page/bundle.js';

// Colors for output
const colors = {
    red: '\x1b[31m',
    green: '\x1b[32m',
    blue: '\x1b[34m',
    reset: '\x1b[0m',
} as const;

function printStep(message: string): void {
    console.log(`${colors.blue}→ ${message}${colors.reset}`);
}

function printSuccess(message: string): void {
    console.log(`${colors.green}✓ ${message}${colors.reset}`);
}

function printError(message: string): void {
    console.error(`${colors.red}✗ ${message}${colors.reset}`);
}

async function main(): Promise<void> {
    const outDir = resolve(process.argv[2] ?? 'dist/print-page');

    printStep('Bundling print page script');
    const script = await printPageScript();

    await mkdir(outDir, { recursive: true });
    await writeFile(join(outDir, 'print.html'), await printPageHtml());
    await writeFile(join(outDir, PRINT_SCRIPT_NAME), script);

    printSuccess(`Print page written to ${outDir} (script ${Math.round(script.length / 1024)} KiB)`);
}

main().catch((error: unknown) => {
    printError(error instanceof Error ? error.message : String(error));
    process.exit(1);
});
