// src/core/saga/SagaCoordinator.ts

import { BaseSagaCoordinator } from './BaseSagaCoordinator';
import { ExecutionLedger } from './ExecutionLedger';
import { aggregateOutcome } from './outcomes';
import { compensateStep, executeStep } from './stepInvoker';
import { CompensationFailure, SagaOutcome, SagaRunOptions, SagaStep, StepFailure } from './types';

/**
 * SagaCoordinator
 * Runs steps strictly in order in the caller's call stack. When a step fails,
 * compensates every step that succeeded, last-succeeded first, and keeps sweeping
 * past failed compensations.
 */
export class SagaCoordinator extends BaseSagaCoordinator<SagaStep<unknown>> {
    protected readonly kind = 'synchronous';
    protected readonly logModule = 'SagaCoordinator';

    public run(options: SagaRunOptions = {}): SagaOutcome {
        this.beginRun();
        const { signal } = options;
        const ledger = new ExecutionLedger<SagaStep<unknown>>(this.sagaId);
        let failure: StepFailure | undefined;

        for (const [index, step] of this.steps.entries()) {
            failure = this.abortedBefore(step, index, signal);
            if (failure) break;

            this.stepStarted(step, index);
            const outcome = executeStep(step, this.contextFor(index, signal));
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
            for (const entry of ledger.reversed()) {
                this.compensationStarted(entry);
                const outcome = compensateStep(entry.step, entry.state, this.contextFor(entry.index, signal));
                this.compensationSettled(entry, outcome, compensated, failedCompensations);
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
}
