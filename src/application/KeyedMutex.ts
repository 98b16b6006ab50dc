/**
 * Per-key exclusive lock. Callers for the same key run one after another in
 * arrival order; different keys never wait on each other.
 */
export class KeyedMutex {
    private tails: Map<string, Promise<void>> = new Map();

    async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let unlock: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            unlock = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await fn();
        } finally {
            unlock();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    isLocked(key: string): boolean {
        return this.tails.has(key);
    }
}
