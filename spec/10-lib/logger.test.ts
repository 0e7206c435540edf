import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { ConfigError, EncodeError } from '@src/lib/errors/bot-errors.js';
import { Logger, describeError } from '@src/lib/logger.js';

describe('Logger', () => {
    const saved = { level: process.env.LOG_LEVEL, env: process.env.NODE_ENV };

    beforeEach(() => {
        process.env.LOG_LEVEL = 'debug';
        process.env.NODE_ENV = 'test';
    });

    afterEach(() => {
        process.env.LOG_LEVEL = saved.level;
        process.env.NODE_ENV = saved.env;
        vi.restoreAllMocks();
    });

    it('should print a scoped single line in development', () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => {});

        new Logger().child('bot').info('Serial stored', { serial: 'SN-1' });

        expect(info).toHaveBeenCalledWith('INFO [bot] Serial stored {"serial":"SN-1"}');
    });

    it('should join nested scopes', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

        new Logger('app').child('http').warn('Slow');

        expect(warn).toHaveBeenCalledWith('WARN [app:http] Slow');
    });

    it('should print JSON in production', () => {
        process.env.NODE_ENV = 'production';
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});

        new Logger('bot').error('Update handling failed', { updateId: 5 });

        const line = error.mock.calls[0][0];
        expect(typeof line).toBe('string');
        const record = JSON.parse(String(line));
        expect(record).toMatchObject({
            level: 'ERROR',
            scope: 'bot',
            message: 'Update handling failed',
            updateId: 5,
        });
        expect(typeof record.timestamp).toBe('string');
    });

    it('should respect the level threshold', () => {
        process.env.LOG_LEVEL = 'warn';
        const info = vi.spyOn(console, 'info').mockImplementation(() => {});
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

        const log = new Logger();
        log.info('hidden');
        log.warn('shown');

        expect(info).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it('should print nothing when silent', () => {
        process.env.LOG_LEVEL = 'silent';
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});

        new Logger().error('hidden');

        expect(error).not.toHaveBeenCalled();
    });

    it('should add durationMs in time()', () => {
        const log = new Logger();
        const info = vi.spyOn(log, 'info').mockImplementation(() => {});

        log.time('Labels rendered', process.hrtime.bigint(), { serial: 'SN-1' });

        expect(info).toHaveBeenCalledWith('Labels rendered', { serial: 'SN-1', durationMs: expect.any(Number) });
    });
});

describe('describeError', () => {
    it('should include the error code of domain errors', () => {
        expect(describeError(new ConfigError('BOT_TOKEN is not set', 'BOT_TOKEN'))).toEqual({
            error: 'BOT_TOKEN is not set',
            errorName: 'ConfigError',
            errorCode: 'CONFIG_ERROR',
        });
    });

    it('should include the cause message', () => {
        const meta = describeError(new EncodeError('qr', new Error('Capacity overflow')));

        expect(meta).toEqual({
            error: 'Cannot encode serial as qr: Capacity overflow',
            errorName: 'EncodeError',
            errorCode: 'ENCODE_FAILED',
            cause: 'Capacity overflow',
        });
    });

    it('should stringify non-errors', () => {
        expect(describeError('boom')).toEqual({ error: 'boom' });
    });
});
