// src/core/saga/stepInvoker.ts

import { ErrorFactory } from '../errors';
import { Logger } from '../logging/Logger';
import { describeError, failed, isStepOutcome, isThenable } from './outcomes';
import { AsyncSagaStep, SagaStep, StepContext, StepFailed, StepOutcome } from './types';

type Operation = 'execute' | 'compensate';

/**
 * Turns whatever a step threw into a FAILED outcome. Non-Error values are wrapped
 * so that `cause` always carries a stack.
 */
function failureFromThrown(operation: Operation, stepName: string, error: unknown): StepFailed {
    const reason = describeError(error);
    if (error instanceof Error) {
        return failed(reason, error);
    }
    const context = { operation, details: error };
    const cause = operation === 'execute'
        ? ErrorFactory.stepExecution(`Step '${stepName}' threw: ${reason}`, context)
        : ErrorFactory.stepCompensation(`Compensation of '${stepName}' threw: ${reason}`, context);
    return failed(reason, cause);
}

function checkOutcome(operation: Operation, stepName: string, raw: unknown): StepOutcome<unknown> {
    if (isStepOutcome(raw)) {
        return raw;
    }
    return failed(`Step '${stepName}' returned an invalid outcome from ${operation}`);
}

function invokeSync(operation: Operation, stepName: string, call: () => unknown): StepOutcome<unknown> {
    let raw: unknown;
    try {
        raw = call();
    } catch (error) {
        return failureFromThrown(operation, stepName, error);
    }

    if (isThenable(raw)) {
        // Keep a late rejection from surfacing as an unhandled rejection.
        void Promise.resolve(raw).catch((error: unknown) => {
            Logger.warn('StepInvoker', `Ignored late rejection from '${stepName}' ${operation}`, { reason: describeError(error) });
        });
        return failed(
            `Step '${stepName}' returned a promise from ${operation}; run asynchronous steps with ConcurrentSagaCoordinator`
        );
    }

    return checkOutcome(operation, stepName, raw);
}

async function invokeAsync(operation: Operation, stepName: string, call: () => unknown): Promise<StepOutcome<unknown>> {
    try {
        const raw: unknown = await call();
        return checkOutcome(operation, stepName, raw);
    } catch (error) {
        return failureFromThrown(operation, stepName, error);
    }
}

export function executeStep(step: SagaStep<unknown>, context: StepContext): StepOutcome<unknown> {
    return invokeSync('execute', step.name, () => step.execute(context));
}

export function compensateStep(step: SagaStep<unknown>, state: unknown, context: StepContext): StepOutcome<unknown> {
    return invokeSync('compensate', step.name, () => step.compensate(state, context));
}

export function executeAsyncStep(step: AsyncSagaStep<unknown>, context: StepContext): Promise<StepOutcome<unknown>> {
    return invokeAsync('execute', step.name, () => step.execute(context));
}

export function compensateAsyncStep(step: AsyncSagaStep<unknown>, state: unknown, context: StepContext): Promise<StepOutcome<unknown>> {
    return invokeAsync('compensate', step.name, () => step.compensate(state, context));
}
