export interface WorkerPoolStats {
    limit: number;
    active: number;
    waiting: number;
}

interface Waiter {
    grant: (release: () => void) => void;
    reject: (reason: Error) => void;
    signal?: AbortSignal;
    onAbort?: () => void;
}

/**
 * Bounded pool of execution slots shared by every avatar. Each engine invocation
 * holds one slot; avatars compete for slots in arrival order.
 */
export class WorkerPool {
    private active = 0;
    private waiting: Waiter[] = [];

    constructor(private readonly limit: number) {
        if (!Number.isInteger(limit) || limit < 1) {
            throw new Error(`WorkerPool limit must be a positive integer, got ${limit}`);
        }
    }

    /**
     * Resolves with a release function once a slot is free. Aborting the signal
     * while waiting rejects and gives up the place in line.
     */
    acquire(signal?: AbortSignal): Promise<() => void> {
        if (signal?.aborted) {
            return Promise.reject(abortReason(signal));
        }

        if (this.active < this.limit) {
            this.active++;
            return Promise.resolve(this.createRelease());
        }

        return new Promise((resolve, reject) => {
            const waiter: Waiter = { grant: resolve, reject, signal };
            if (signal) {
                waiter.onAbort = () => {
                    this.waiting = this.waiting.filter((w) => w !== waiter);
                    reject(abortReason(signal));
                };
                signal.addEventListener('abort', waiter.onAbort, { once: true });
            }
            this.waiting.push(waiter);
        });
    }

    get stats(): WorkerPoolStats {
        return { limit: this.limit, active: this.active, waiting: this.waiting.length };
    }

    private createRelease(): () => void {
        let released = false;
        return () => {
            if (released) return;
            released = true;
            this.handOver();
        };
    }

    private handOver(): void {
        const next = this.waiting.shift();
        if (!next) {
            this.active--;
            return;
        }
        // The slot passes straight to the next waiter; active stays the same
        if (next.signal && next.onAbort) {
            next.signal.removeEventListener('abort', next.onAbort);
        }
        next.grant(this.createRelease());
    }
}

function abortReason(signal: AbortSignal): Error {
    return signal.reason instanceof Error ? signal.reason : new Error('Slot acquisition aborted');
}
