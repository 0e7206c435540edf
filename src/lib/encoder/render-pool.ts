/**
 * RenderPool - bounded concurrency for label rendering
 *
 * At most `concurrency` tasks run at once; the rest wait in FIFO order.
 * Rasterisation happens on libvips worker threads (see sharp.concurrency in
 * the entry point). Symbol encoding does not: the QR matrix (`qr`) and the
 * Code128 SVG (`bwip-js`) are built synchronously on the event loop before
 * the task reaches sharp. Serial-sized input keeps that step short, but while
 * it runs no other update is handled; the pool bounds how many labels are in
 * flight, not how long one of them holds the loop.
 */
export class RenderPool {
    private active = 0;
    private readonly waiting: Array<() => void> = [];

    constructor(public readonly concurrency: number) {
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new RangeError(`RenderPool concurrency must be a positive integer, got ${concurrency}`);
        }
    }

    get running(): number {
        return this.active;
    }

    get pending(): number {
        return this.waiting.length;
    }

    /**
     * Run a task once a slot is free. The slot is released whether the task
     * resolves or rejects.
     */
    async run<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await task();
        } finally {
            this.release();
        }
    }

    private acquire(): Promise<void> {
        if (this.active < this.concurrency) {
            this.active++;
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            this.waiting.push(() => {
                this.active++;
                resolve();
            });
        });
    }

    private release(): void {
        this.active--;
        this.waiting.shift()?.();
    }
}
