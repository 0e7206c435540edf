/**
 * MetricsClient - non-blocking reporter for a bot metrics server
 *
 * Request logs are batched and flushed on an interval (or early once the batch
 * is full); errors, custom metrics and heartbeats are posted as they happen.
 * Delivery failures are logged and never reach the caller.
 *
 * Usage:
 *   // First-time registration (prints the issued key)
 *   const client = await MetricsClient.register('https://metrics.example.com', 'label-bot');
 *
 *   // Normal usage
 *   const metrics = new MetricsClient({ serverUrl, apiKey, botName }).start();
 *   metrics.trackRequest('/start', 45, '12345');
 *   metrics.trackError(error, 'labels:send');
 *   metrics.trackMetric('queue_depth', 3);
 *   await metrics.stop();
 */

import { MetricsError } from '@src/lib/errors/bot-errors.js';
import { describeError, logger, type Logger } from '@src/lib/logger.js';

export const HEARTBEAT_INTERVAL_MS = 30_000;
export const BATCH_INTERVAL_MS = 5_000;
export const MAX_BATCH_SIZE = 50;
export const DEFAULT_TIMEOUT_MS = 5_000;

export const METRICS_PATHS = {
    register: '/api/v1/bots/register/',
    heartbeat: '/api/v1/bots/heartbeat/',
    requestBatch: '/api/v1/metrics/request/batch/',
    error: '/api/v1/metrics/error/',
    custom: '/api/v1/metrics/custom/',
} as const;

export type FetchFn = typeof fetch;

export interface MetricsClientOptions {
    serverUrl: string;
    apiKey: string;
    botName?: string;
    timeoutMs?: number;
    heartbeatIntervalMs?: number;
    batchIntervalMs?: number;
    maxBatchSize?: number;
    fetch?: FetchFn;
    logger?: Logger;
}

export interface RequestLog {
    command: string;
    user_id: string;
    response_time_ms: number;
    success: boolean;
}

export interface HeartbeatPayload {
    uptime_seconds: number;
    cpu_percent: number;
    memory_mb: number;
}

/**
 * What the update middleware needs; MetricsClient is the real implementation
 */
export interface RequestTracker {
    trackRequest(command: string, responseTimeMs: number, userId?: string, success?: boolean): void;
    trackError(error: unknown, command?: string): void;
}

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

export class MetricsClient implements RequestTracker {
    readonly serverUrl: string;
    readonly apiKey: string;
    readonly botName: string;

    private readonly timeoutMs: number;
    private readonly heartbeatIntervalMs: number;
    private readonly batchIntervalMs: number;
    private readonly maxBatchSize: number;
    private readonly fetchFn: FetchFn;
    private readonly log: Logger;

    private batch: RequestLog[] = [];
    private heartbeatTimer?: NodeJS.Timeout;
    private flushTimer?: NodeJS.Timeout;
    private lastCpu = process.cpuUsage();
    private lastCpuAt = process.hrtime.bigint();

    constructor(options: MetricsClientOptions) {
        this.serverUrl = options.serverUrl.replace(/\/+$/, '');
        this.apiKey = options.apiKey;
        this.botName = options.botName ?? 'unnamed-bot';
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS;
        this.batchIntervalMs = options.batchIntervalMs ?? BATCH_INTERVAL_MS;
        this.maxBatchSize = options.maxBatchSize ?? MAX_BATCH_SIZE;
        this.fetchFn = options.fetch ?? fetch;
        this.log = options.logger ?? logger.child('metrics');
    }

    get running(): boolean {
        return this.flushTimer !== undefined;
    }

    get pendingRequests(): number {
        return this.batch.length;
    }

    // === Lifecycle ===

    /**
     * Start heartbeat + batch-flush timers. Returns this; safe to call twice.
     */
    start(): this {
        if (this.running) {
            return this;
        }

        this.sendHeartbeat();
        this.heartbeatTimer = setInterval(() => this.sendHeartbeat(), this.heartbeatIntervalMs);
        this.flushTimer = setInterval(() => this.dispatch(this.flushBatch()), this.batchIntervalMs);
        this.heartbeatTimer.unref();
        this.flushTimer.unref();

        this.log.info('MetricsClient started', { bot: this.botName });
        return this;
    }

    /**
     * Stop timers, then flush whatever is still batched
     */
    async stop(): Promise<void> {
        clearInterval(this.heartbeatTimer);
        clearInterval(this.flushTimer);
        this.heartbeatTimer = undefined;
        this.flushTimer = undefined;

        await this.flushBatch().catch((error: unknown) => {
            this.log.warn('Final metrics flush failed', describeError(error));
        });
        this.log.info('MetricsClient stopped', { bot: this.botName });
    }

    // === Tracking API ===

    trackRequest(command: string, responseTimeMs: number, userId = 'anonymous', success = true): void {
        this.batch.push({
            command,
            user_id: String(userId),
            response_time_ms: Math.max(0, Math.trunc(responseTimeMs)),
            success,
        });

        if (this.batch.length >= this.maxBatchSize) {
            this.dispatch(this.flushBatch());
        }
    }

    trackError(error: unknown, command = ''): void {
        const payload = {
            error_type: error instanceof Error ? error.name : typeof error,
            message: error instanceof Error ? error.message : String(error),
            traceback: error instanceof Error ? (error.stack ?? '') : '',
            command,
        };
        this.dispatch(this.post(METRICS_PATHS.error, payload));
    }

    trackMetric(key: string, value: number): void {
        this.dispatch(this.post(METRICS_PATHS.custom, { key, value }));
    }

    /**
     * Send the pending request logs in one call
     */
    async flushBatch(): Promise<void> {
        if (this.batch.length === 0) {
            return;
        }
        const logs = this.batch;
        this.batch = [];
        await this.post(METRICS_PATHS.requestBatch, { logs });
    }

    // === Registration ===

    /**
     * Register a new bot and return a configured client carrying the issued key
     */
    static async register(
        serverUrl: string,
        name: string,
        description = '',
        options: Omit<MetricsClientOptions, 'serverUrl' | 'apiKey' | 'botName'> = {}
    ): Promise<MetricsClient> {
        const fetchFn = options.fetch ?? fetch;
        const url = serverUrl.replace(/\/+$/, '') + METRICS_PATHS.register;

        const response = await fetchFn(url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({ name, description }),
            signal: AbortSignal.timeout(options.timeoutMs ?? 10_000),
        });

        if (!response.ok) {
            throw new MetricsError(`Bot registration failed with HTTP ${response.status}`, response.status);
        }

        const data: unknown = await response.json();
        if (typeof data !== 'object' || data === null || !('api_key' in data) || typeof data.api_key !== 'string') {
            throw new MetricsError('Bot registration response has no api_key');
        }

        return new MetricsClient({ ...options, serverUrl, apiKey: data.api_key, botName: name });
    }

    // === Internal helpers ===

    heartbeatPayload(): HeartbeatPayload {
        const now = process.hrtime.bigint();
        const cpu = process.cpuUsage(this.lastCpu);
        const elapsedUs = Number(now - this.lastCpuAt) / 1000;
        this.lastCpu = process.cpuUsage();
        this.lastCpuAt = now;

        const cpuPercent = elapsedUs > 0 ? ((cpu.user + cpu.system) / elapsedUs) * 100 : 0;

        return {
            uptime_seconds: Math.floor(process.uptime()),
            cpu_percent: round2(cpuPercent),
            memory_mb: round2(process.memoryUsage().rss / (1024 * 1024)),
        };
    }

    private sendHeartbeat(): void {
        this.dispatch(this.post(METRICS_PATHS.heartbeat, this.heartbeatPayload()));
    }

    private dispatch(delivery: Promise<void>): void {
        delivery.catch((error: unknown) => {
            this.log.warn('Metrics delivery failed', describeError(error));
        });
    }

    private async post(path: string, payload: unknown): Promise<void> {
        const response = await this.fetchFn(this.serverUrl + path, {
            method: 'POST',
            headers: { 'X-API-Key': this.apiKey, 'Content-Type': 'application/json' },
            body: JSON.stringify(payload),
            signal: AbortSignal.timeout(this.timeoutMs),
        });

        if (!response.ok) {
            this.log.warn('Metrics server rejected request', { path, status: response.status });
        }
    }
}
