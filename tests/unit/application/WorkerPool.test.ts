import { WorkerPool } from '../../../src/application/WorkerPool';

const tick = () => new Promise((resolve) => setImmediate(resolve));

describe('WorkerPool', () => {
    it('should grant slots up to the limit', async () => {
        const pool = new WorkerPool(2);
        await pool.acquire();
        await pool.acquire();

        let third = false;
        void pool.acquire().then(() => {
            third = true;
        });
        await tick();

        expect(third).toBe(false);
        expect(pool.stats).toEqual({ limit: 2, active: 2, waiting: 1 });
    });

    it('should hand a released slot to the oldest waiter', async () => {
        const pool = new WorkerPool(1);
        const release = await pool.acquire();
        const order: string[] = [];

        const first = pool.acquire().then((r) => {
            order.push('first');
            return r;
        });
        const second = pool.acquire().then((r) => {
            order.push('second');
            return r;
        });

        release();
        (await first)();
        (await second)();

        expect(order).toEqual(['first', 'second']);
        expect(pool.stats).toEqual({ limit: 1, active: 0, waiting: 0 });
    });

    it('should ignore a second release call', async () => {
        const pool = new WorkerPool(1);
        const release = await pool.acquire();
        release();
        release();

        expect(pool.stats.active).toBe(0);
    });

    it('should drop an aborted waiter from the line', async () => {
        const pool = new WorkerPool(1);
        const release = await pool.acquire();
        const controller = new AbortController();

        const waiting = pool.acquire(controller.signal);
        controller.abort(new Error('gave up'));

        await expect(waiting).rejects.toThrow('gave up');
        expect(pool.stats.waiting).toBe(0);
        release();
        expect(pool.stats.active).toBe(0);
    });

    it('should reject a non-positive limit', () => {
        expect(() => new WorkerPool(0)).toThrow('WorkerPool limit must be a positive integer, got 0');
    });
});
