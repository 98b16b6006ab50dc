/**
 * Single-consumer FIFO with a fixed capacity. The item most recently handed to the
 * consumer keeps counting against capacity until the consumer asks for the next one,
 * so a slow consumer fills the channel and producers see isFull.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
    private items: T[] = [];
    private inFlight = 0;
    private closed = false;
    private waiter: ((result: IteratorResult<T>) => void) | null = null;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error(`BoundedChannel capacity must be a positive integer, got ${capacity}`);
        }
    }

    get size(): number {
        return this.items.length + this.inFlight;
    }

    get isFull(): boolean {
        return this.size >= this.capacity;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Returns false when the channel is full or closed.
     */
    tryPush(item: T): boolean {
        if (this.closed || this.isFull) {
            return false;
        }
        if (this.waiter) {
            const waiter = this.waiter;
            this.waiter = null;
            this.inFlight = 1;
            waiter({ value: item, done: false });
            return true;
        }
        this.items.push(item);
        return true;
    }

    /**
     * No more pushes; the consumer still receives what is buffered.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        if (this.waiter && this.items.length === 0) {
            const waiter = this.waiter;
            this.waiter = null;
            waiter({ value: undefined, done: true });
        }
    }

    [Symbol.asyncIterator](): AsyncIterator<T> {
        return {
            next: () => this.next(),
        };
    }

    private next(): Promise<IteratorResult<T>> {
        this.inFlight = 0;
        const item = this.items.shift();
        if (item !== undefined) {
            this.inFlight = 1;
            return Promise.resolve({ value: item, done: false });
        }
        if (this.closed) {
            return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
            this.waiter = resolve;
        });
    }
}
