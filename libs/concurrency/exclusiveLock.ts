/**
 * Exclusive Lock
 *
 * FIFO async mutex built on a promise chain. Holders run strictly one at a
 * time, in acquisition order; a failing holder releases the lock for the next.
 */
export class ExclusiveLock {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    /**
     * Run `fn` while holding the lock and resolve with its result.
     */
    public async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
        const previous = this.tail;
        let release: () => void = () => undefined;
        this.tail = new Promise<void>(resolve => {
            release = resolve;
        });
        this.pending++;

        try {
            await previous;
            return await fn();
        } finally {
            this.pending--;
            release();
        }
    }

    /**
     * Number of holders running or waiting.
     */
    public get queueLength(): number {
        return this.pending;
    }
}
