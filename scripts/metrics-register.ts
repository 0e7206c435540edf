#!/usr/bin/env tsx
/**
 * Metrics Registration Script
 *
 * Registers this bot with a metrics server and prints the issued API key.
 *
 * Usage:
 *   npm run metrics:register -- <server-url> <bot-name> [description]
 *   tsx scripts/metrics-register.ts <server-url> <bot-name> [description]
 *
 * Example:
 *   tsx scripts/metrics-register.ts http://localhost:8000 label-bot "Warehouse labels"
 *
 * Put the printed key into .env as METRICS_API_KEY (with METRICS_URL).
 */

import { MetricsClient } from '@src/lib/metrics/metrics-client.js';

// Colors for output
const colors = {
    red: '\x1b[31m',
    green: '\x1b[32m',
    blue: '\x1b[34m',
    bold: '\x1b[1m',
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
    const [serverUrl, name, description = ''] = process.argv.slice(2);

    if (!serverUrl || !name) {
        printError('Usage: tsx scripts/metrics-register.ts <server-url> <bot-name> [description]');
        process.exit(1);
    }

    printStep(`Registering "${name}" at ${serverUrl}`);
    const client = await MetricsClient.register(serverUrl, name, description);

    printSuccess('Registered');
    console.log(`${colors.bold}METRICS_URL=${client.serverUrl}${colors.reset}`);
    console.log(`${colors.bold}METRICS_API_KEY=${client.apiKey}${colors.reset}`);
}

main().catch((error: unknown) => {
    printError(error instanceof Error ? error.message : String(error));
    process.exit(1);
});
