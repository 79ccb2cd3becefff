// src/core/saga/ConcurrentSagaCoordinator.ts

import { CompensationMode, CONFIG } from '../../config/config';
import { WorkerPool } from '../concurrency/WorkerPool';
import { Logger } from '../logging/Logger';
import { BaseSagaCoordinator, SagaCoordinatorOptions } from './BaseSagaCoordinator';
import { ExecutionLedger, LedgerEntry } from './ExecutionLedger';
import { aggregateOutcome, describeError } from './outcomes';
import { compensateAsyncStep, executeAsyncStep } from './stepInvoker';
import { AsyncSagaStep, CompensationFailure, SagaOutcome, SagaRunOptions, StepFailure } from './types';

export interface ConcurrentSagaCoordinatorOptions extends SagaCoordinatorOptions {
    /** Concurrent tasks allowed on the coordinator's pool. */
    poolSize?: number;
    /**
     * 'concurrent' fans every compensation out at once; 'sequential' runs them
     * last-succeeded first, one after another.
     */
    compensationMode?: CompensationMode;
}

/**
 * ConcurrentSagaCoordinator
 *
 * Forward steps form a dependent chain: step i+1 is handed to the worker pool only
 * after step i's outcome is known. On failure, compensations for the whole ledger are
 * submitted together and the outcome is produced once all of them have settled.
 *
 * The pool is created here and torn down by the caller through `shutdown()` or `scoped()`.
 */
export class ConcurrentSagaCoordinator extends BaseSagaCoordinator<AsyncSagaStep<unknown>> {
    protected readonly kind = 'concurrent';
    protected readonly logModule = 'ConcurrentSagaCoordinator';

    private readonly pool: WorkerPool;
    private readonly compensationMode: CompensationMode;

    constructor(options: ConcurrentSagaCoordinatorOptions = {}) {
        super(options);
        this.pool = new WorkerPool(`saga-${this.sagaId}`, options.poolSize ?? CONFIG.SAGA.WORKER_POOL_SIZE);
        this.compensationMode = options.compensationMode ?? CONFIG.SAGA.COMPENSATION_MODE;
    }

    /**
     * Creates a coordinator, hands it to `fn`, and shuts its pool down on every exit path.
     */
    public static async scoped<T>(
        options: ConcurrentSagaCoordinatorOptions,
        fn: (coordinator: ConcurrentSagaCoordinator) => Promise<T>
    ): Promise<T> {
        const coordinator = new ConcurrentSagaCoordinator(options);
        try {
            return await fn(coordinator);
        } finally {
            await coordinator.shutdown();
        }
    }

    public getCompensationMode(): CompensationMode {
        return this.compensationMode;
    }

    public getPoolSize(): number {
        return this.pool.size;
    }

    public async shutdown(): Promise<void> {
        await this.pool.shutdown();
    }

    /**
     * Resolves with the terminal outcome. Rejects only for protocol misuse or when the
     * worker pool can no longer run tasks (WorkerPoolError).
     *
     * A WorkerPoolError leaves the run unfinished: `getPhase()` stays at the phase it
     * failed in (RUNNING or COMPENSATING), no report is built or archived, and
     * `getReport()` keeps throwing. The executed steps are named in the error log.
     */
    public async run(options: SagaRunOptions = {}): Promise<SagaOutcome> {
        this.beginRun();
        const { signal } = options;
        const ledger = new ExecutionLedger<AsyncSagaStep<unknown>>(this.sagaId);
        let failure: StepFailure | undefined;

        for (const [index, step] of this.steps.entries()) {
            failure = this.abortedBefore(step, index, signal);
            if (failure) break;

            const context = this.contextFor(index, signal);
            const outcome = await this.dispatch(ledger, () => {
                this.stepStarted(step, index);
                return executeAsyncStep(step, context);
            });
            if (outcome.status === 'FAILED') {
                failure = this.stepFailed(step, index, outcome);
                break;
            }
            ledger.record(index, step, outcome.value);
            this.stepSucceeded(step, index);
        }

        const compensated: string[] = [];
        const failedCompensations: CompensationFailure[] = [];

        if (failure) {
            this.startCompensating(failure, ledger.size);
            const compensate = (entry: LedgerEntry<AsyncSagaStep<unknown>>) => async (): Promise<void> => {
                this.compensationStarted(entry);
                const outcome = await compensateAsyncStep(entry.step, entry.state, this.contextFor(entry.index, signal));
                this.compensationSettled(entry, outcome, compensated, failedCompensations);
            };

            if (this.compensationMode === 'sequential') {
                for (const entry of ledger.reversed()) {
                    await this.dispatch(ledger, compensate(entry));
                }
            } else {
                await this.fanOut(ledger, ledger.reversed().map(compensate));
            }
        }

        return this.finish(aggregateOutcome({
            sagaId: this.sagaId,
            sagaName: this.sagaName,
            executed: ledger.names(),
            failure,
            compensated,
            failedCompensations,
        }));
    }

    private async dispatch<T>(ledger: ExecutionLedger<AsyncSagaStep<unknown>>, task: () => Promise<T>): Promise<T> {
        try {
            return await this.pool.submit(task);
        } catch (error) {
            throw this.fatal(ledger, error);
        }
    }

    /**
     * Submits every task at once and waits for all of them, even when one is rejected by the pool.
     */
    private async fanOut(ledger: ExecutionLedger<AsyncSagaStep<unknown>>, tasks: Array<() => Promise<void>>): Promise<void> {
        const results = await Promise.allSettled(tasks.map(task => this.pool.submit(task)));
        const rejected = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
        if (rejected) {
            throw this.fatal(ledger, rejected.reason);
        }
    }

    private fatal(ledger: ExecutionLedger<AsyncSagaStep<unknown>>, error: unknown): unknown {
        Logger.error(
            this.logModule,
            `Saga '${this.sagaName}' aborted by infrastructure failure (${describeError(error)}); ` +
                `executed steps may need manual compensation: ${ledger.names().join(', ') || 'none'}`,
            error
        );
        return error;
    }
}
