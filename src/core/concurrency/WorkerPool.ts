// src/core/concurrency/WorkerPool.ts

import { Semaphore } from 'async-mutex';
import { ErrorFactory } from '../errors';
import { Logger } from '../logging/Logger';
import { validatePoolSize } from '../validation/stepValidator';

export type Task<T> = () => T | Promise<T>;

/**
 * WorkerPool
 * Runs at most `size` tasks at a time; the rest wait in FIFO order.
 * Owned by exactly one coordinator and torn down with `shutdown()`.
 */
export class WorkerPool {
    private readonly semaphore: Semaphore;
    private readonly inFlight = new Set<Promise<void>>();
    private closed: boolean = false;
    private running: number = 0;

    constructor(public readonly name: string, public readonly size: number) {
        validatePoolSize(size);
        this.semaphore = new Semaphore(size);
    }

    /**
     * Queues a task. The task never runs in the caller's stack frame, even when a slot is free.
     * Rejects with WorkerPoolError once the pool is shut down.
     */
    public submit<T>(task: Task<T>): Promise<T> {
        if (this.closed) {
            return Promise.reject(ErrorFactory.workerPool(`Worker pool [${this.name}] is shut down`, {
                operation: 'submit',
                retryable: false,
                suggestion: 'Create a new coordinator; a shut-down pool cannot be reused.',
            }));
        }

        const result = this.semaphore.runExclusive(async () => {
            this.running++;
            try {
                return await task();
            } finally {
                this.running--;
            }
        });

        const settled: Promise<void> = result.then(
            () => undefined,
            () => undefined
        ).then(() => {
            this.inFlight.delete(settled);
        });
        this.inFlight.add(settled);

        return result;
    }

    /**
     * Stops accepting tasks and waits for queued and running ones to settle.
     */
    public async shutdown(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        const pending = [...this.inFlight];
        if (pending.length > 0) {
            Logger.debug('WorkerPool', `Pool [${this.name}] draining ${pending.length} task(s)`);
        }
        await Promise.all(pending);
        Logger.debug('WorkerPool', `Pool [${this.name}] shut down`);
    }

    /**
     * Creates a pool for the duration of `fn` and shuts it down on every exit path.
     */
    public static async withPool<T>(name: string, size: number, fn: (pool: WorkerPool) => Promise<T>): Promise<T> {
        const pool = new WorkerPool(name, size);
        try {
            return await fn(pool);
        } finally {
            await pool.shutdown();
        }
    }

    public get isShutdown(): boolean {
        return this.closed;
    }

    /** Tasks currently holding a slot. */
    public get active(): number {
        return this.running;
    }

    /** Tasks submitted and not yet settled, running or queued. */
    public get pending(): number {
        return this.inFlight.size;
    }
}
