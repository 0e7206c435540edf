import { afterEach, describe, it, expect, vi } from 'vitest';
import { createBot } from '@src/lib/bot/create-bot.js';
import { parseConfig, type BotConfig } from '@src/lib/config.js';
import { ConfigError } from '@src/lib/errors/bot-errors.js';
import { Logger } from '@src/lib/logger.js';
import { webhookSecret } from '@src/servers/http.js';
import { startTransport, type TransportHandle } from '@src/servers/transport.js';
import { CHAT_ID, TEST_BOT_TOKEN, installFakeApi, sent, textUpdate } from '@spec/helpers/bot-harness.js';

const WEBHOOK_URL = 'https://bot.example.com';

function testBot() {
    const renderer = { render: vi.fn(async () => ({ qr: Buffer.from('q'), barcode: Buffer.from('b') })) };
    const bot = createBot({ botToken: TEST_BOT_TOKEN, sessionTtlMs: 60_000 }, { renderer });
    const calls = installFakeApi(bot);
    return { bot, calls };
}

describe('startTransport', () => {
    it('should refuse webhook mode without a port', async () => {
        const { bot, calls } = testBot();
        const config: BotConfig = {
            ...parseConfig({ BOT_TOKEN: TEST_BOT_TOKEN, WEBHOOK_URL: 'https://bot.example.com' }),
            transport: 'webhook',
        };

        const starting = startTransport(bot, config);

        await expect(starting).rejects.toBeInstanceOf(ConfigError);
        await expect(starting).rejects.toMatchObject({ variable: 'PORT' });
        expect(sent(calls)).toEqual([]);
    });

    it('should refuse webhook mode without a public URL', async () => {
        const { bot } = testBot();
        const config: BotConfig = {
            ...parseConfig({ BOT_TOKEN: TEST_BOT_TOKEN, PORT: '8080' }),
            transport: 'webhook',
        };

        await expect(startTransport(bot, config)).rejects.toMatchObject({ variable: 'WEBHOOK_URL' });
    });

    describe('webhook mode', () => {
        let transport: TransportHandle | undefined;

        afterEach(async () => {
            vi.restoreAllMocks();
            await transport?.stop();
            transport = undefined;
        });

        async function startWebhook() {
            const { bot, calls } = testBot();
            await bot.init();
            const config: BotConfig = {
                ...parseConfig({ BOT_TOKEN: TEST_BOT_TOKEN, WEBHOOK_URL, PORT: '8443' }),
                port: 0,
            };
            transport = await startTransport(bot, config);
            return { calls, transport };
        }

        it('should register the public webhook URL with the derived secret', async () => {
            const { calls, transport } = await startWebhook();

            expect(transport.mode).toBe('webhook');
            expect(sent(calls)).toEqual([
                {
                    method: 'setWebhook',
                    payload: {
                        url: 'https://bot.example.com/telegram/webhook',
                        secret_token: webhookSecret(TEST_BOT_TOKEN),
                    },
                },
            ]);
        });

        it('should take updates posted to the webhook over HTTP', async () => {
            const { calls, transport } = await startWebhook();
            const port = transport.http?.port;
            expect(port).toBeGreaterThan(0);

            const response = await fetch(`http://127.0.0.1:${port}/telegram/webhook`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'X-Telegram-Bot-Api-Secret-Token': webhookSecret(TEST_BOT_TOKEN),
                },
                body: JSON.stringify(textUpdate('SN-42')),
            });

            expect(response.status).toBe(200);
            await response.text();
            expect(sent(calls).map((call) => call.method)).toEqual(['setWebhook', 'sendMessage']);
            expect(sent(calls)[1]).toMatchObject({ payload: { chat_id: CHAT_ID, text: 'SN-42' } });
        });

        it('should close the server and settle closed on stop', async () => {
            const started = await startWebhook();
            const server = started.transport.http?.server;
            expect(server?.listening).toBe(true);

            await started.transport.stop();
            transport = undefined;

            await expect(started.transport.closed).resolves.toBeUndefined();
            expect(server?.listening).toBe(false);
        });

        it('should close the server when the webhook cannot be registered', async () => {
            const logInfo = vi.spyOn(Logger.prototype, 'info');
            const { bot } = testBot();
            bot.api.config.use(async (prev, method, payload, signal) => {
                if (method === 'setWebhook') {
                    throw new Error('bad webhook url');
                }
                return prev(method, payload, signal);
            });
            const config: BotConfig = {
                ...parseConfig({ BOT_TOKEN: TEST_BOT_TOKEN, WEBHOOK_URL, PORT: '8443' }),
                port: 0,
            };

            await expect(startTransport(bot, config)).rejects.toThrow('bad webhook url');
            expect(logInfo).toHaveBeenCalledWith('HTTP server stopped');
            expect(logInfo).not.toHaveBeenCalledWith('Running in webhook mode', expect.anything());
        });
    });

    describe('polling mode', () => {
        it('should poll until stopped', async () => {
            const { bot, calls } = testBot();
            const transport = await startTransport(bot, parseConfig({ BOT_TOKEN: TEST_BOT_TOKEN }));

            expect(transport.mode).toBe('polling');
            expect(transport.http).toBeUndefined();
            await vi.waitFor(() => expect(calls.some((call) => call.method === 'getUpdates')).toBe(true));
            expect(bot.isRunning()).toBe(true);
            expect(calls.map((call) => call.method)).toContain('deleteWebhook');

            await transport.stop();

            await expect(transport.closed).resolves.toBeUndefined();
            expect(bot.isRunning()).toBe(false);
        });

        it('should serve the print page and health check when a port is set', async () => {
            const { bot, calls } = testBot();
            const config: BotConfig = { ...parseConfig({ BOT_TOKEN: TEST_BOT_TOKEN }), port: 0 };
            await bot.init();
            const transport = await startTransport(bot, config);

            try {
                expect(transport.mode).toBe('polling');
                const base = `http://127.0.0.1:${transport.http?.port}`;

                const health = await fetch(`${base}/health`);
                expect(health.status).toBe(200);
                expect(await health.json()).toMatchObject({ success: true, data: { status: 'healthy' } });

                const page = await fetch(`${base}/print?data=ABC123`);
                expect(page.status).toBe(200);
                expect(page.headers.get('content-type')).toContain('text/html');
                await page.text();

                const webhook = await fetch(`${base}/telegram/webhook`, { method: 'POST', body: '{}' });
                expect(webhook.status).toBe(404);
                await webhook.text();
                expect(calls.map((call) => call.method)).toContain('deleteWebhook');
            } finally {
                await transport.stop();
            }

            await expect(transport.closed).resolves.toBeUndefined();
            expect(transport.http?.server.listening).toBe(false);
        });
    });
});
