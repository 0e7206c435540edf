/**
 * Session sweeper
 *
 * MemorySessionStorage only drops an expired entry when that key is read
 * again, so users who never come back would stay in memory forever. The
 * sweeper reads every key on an interval, which lets the storage evict the
 * expired ones.
 */

import type { MemorySessionStorage } from 'grammy';
import { logger as rootLogger, type Logger } from '@src/lib/logger.js';

export class SessionSweeper<T> {
    private timer?: NodeJS.Timeout;
    private readonly log: Logger;

    constructor(
        private readonly storage: MemorySessionStorage<T>,
        public readonly intervalMs: number,
        logger: Logger = rootLogger
    ) {
        if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
            throw new RangeError(`SessionSweeper interval must be positive, got ${intervalMs}`);
        }
        this.log = logger.child('sessions');
    }

    get running(): boolean {
        return this.timer !== undefined;
    }

    /**
     * Evict expired sessions now. Returns how many were removed.
     */
    sweep(): number {
        let evicted = 0;
        for (const key of this.storage.readAllKeys()) {
            // read() deletes the entry when it has expired
            if (this.storage.read(key) === undefined) {
                evicted++;
            }
        }
        if (evicted > 0) {
            this.log.debug('Expired sessions evicted', { evicted, remaining: this.storage.readAllKeys().length });
        }
        return evicted;
    }

    start(): this {
        if (!this.timer) {
            this.timer = setInterval(() => this.sweep(), this.intervalMs);
            // Never keeps the process alive on its own
            this.timer.unref();
        }
        return this;
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
    }
}
