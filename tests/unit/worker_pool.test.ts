// tests/unit/worker_pool.test.ts

import { WorkerPool } from '../../src/core/concurrency/WorkerPool';
import { ValidationError, WorkerPoolError } from '../../src/core/errors';
import { delay } from '../fixtures/trackedSteps';

describe('WorkerPool', () => {
    it('returns the value of a submitted task', async () => {
        await WorkerPool.withPool('values', 2, async pool => {
            await expect(pool.submit(() => 21 * 2)).resolves.toBe(42);
            await expect(pool.submit(async () => 'async')).resolves.toBe('async');
        });
    });

    it('does not run the task in the caller stack frame', async () => {
        await WorkerPool.withPool('deferred', 1, async pool => {
            let ran = false;
            const result = pool.submit(() => {
                ran = true;
            });
            expect(ran).toBe(false);
            await result;
            expect(ran).toBe(true);
        });
    });

    it('propagates a task rejection to the submitter', async () => {
        await WorkerPool.withPool('rejects', 1, async pool => {
            await expect(pool.submit(() => {
                throw new Error('task exploded');
            })).rejects.toThrow('task exploded');
            await expect(pool.submit(() => 'still usable')).resolves.toBe('still usable');
        });
    });

    it('runs no more than size tasks at once and queues the rest in order', async () => {
        const order: string[] = [];
        let running = 0;
        let peak = 0;

        await WorkerPool.withPool('bounded', 2, async pool => {
            const task = (name: string) => async () => {
                running++;
                peak = Math.max(peak, running);
                order.push(name);
                await delay(10);
                running--;
            };
            await Promise.all(['a', 'b', 'c', 'd'].map(name => pool.submit(task(name))));
        });

        expect(peak).toBe(2);
        expect(order).toEqual(['a', 'b', 'c', 'd']);
    });

    it('reports active and pending counts', async () => {
        const pool = new WorkerPool('counts', 1);
        const first = pool.submit(() => delay(10));
        const second = pool.submit(() => delay(10));

        expect(pool.pending).toBe(2);
        await delay(1);
        expect(pool.active).toBe(1);

        await Promise.all([first, second]);
        await pool.shutdown();
        expect(pool.pending).toBe(0);
        expect(pool.active).toBe(0);
    });

    it('drains in-flight tasks on shutdown and rejects later submissions', async () => {
        const pool = new WorkerPool('draining', 1);
        let finished = 0;
        const tasks = [1, 2, 3].map(() => pool.submit(async () => {
            await delay(5);
            finished++;
        }));

        await pool.shutdown();

        expect(finished).toBe(3);
        expect(pool.isShutdown).toBe(true);
        await Promise.all(tasks);
        await expect(pool.submit(() => 'late')).rejects.toThrow(WorkerPoolError);
    });

    it('treats a second shutdown as a no-op', async () => {
        const pool = new WorkerPool('twice', 1);
        await pool.shutdown();
        await expect(pool.shutdown()).resolves.toBeUndefined();
    });

    it('shuts down after withPool even when the block throws', async () => {
        const seen: { pool?: WorkerPool } = {};
        await expect(WorkerPool.withPool('throws', 1, async pool => {
            seen.pool = pool;
            throw new Error('block failed');
        })).rejects.toThrow('block failed');

        expect(seen.pool?.isShutdown).toBe(true);
    });

    it.each([0, -1, 1.5, Number.NaN])('rejects size %p', size => {
        expect(() => new WorkerPool('invalid', size)).toThrow(ValidationError);
    });
});
