// src/core/saga/outcomes.ts

import {
    CompensationFailure,
    SagaOutcome,
    StepFailed,
    StepFailure,
    StepOutcome,
    StepSucceeded,
} from './types';

export function succeeded(): StepSucceeded<void>;
export function succeeded<T>(value: T): StepSucceeded<T>;
export function succeeded(value?: unknown): StepSucceeded<unknown> {
    return { status: 'SUCCEEDED', value };
}

export function failed(reason: string, cause?: unknown): StepFailed {
    return cause === undefined ? { status: 'FAILED', reason } : { status: 'FAILED', reason, cause };
}

export function isSucceeded<T>(outcome: StepOutcome<T>): outcome is StepSucceeded<T> {
    return outcome.status === 'SUCCEEDED';
}

/**
 * Runtime check for values coming back from step implementations.
 */
export function isStepOutcome(value: unknown): value is StepOutcome<unknown> {
    if (typeof value !== 'object' || value === null || !('status' in value)) {
        return false;
    }
    if (value.status === 'SUCCEEDED') {
        return 'value' in value;
    }
    return value.status === 'FAILED' && 'reason' in value && typeof value.reason === 'string';
}

export function isThenable(value: unknown): value is PromiseLike<unknown> {
    return (
        (typeof value === 'object' || typeof value === 'function') &&
        value !== null &&
        'then' in value &&
        typeof value.then === 'function'
    );
}

/**
 * Human-readable reason for anything a step may throw.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message || error.name;
    }
    if (typeof error === 'string') {
        return error;
    }
    try {
        return JSON.stringify(error) ?? String(error);
    } catch (e) {
        return String(error);
    }
}

interface OutcomeParts {
    sagaId: string;
    sagaName: string;
    executed: readonly string[];
    failure?: StepFailure;
    compensated: readonly string[];
    failedCompensations: readonly CompensationFailure[];
}

/**
 * Shared by both coordinators: COMMITTED without a failure, otherwise
 * ROLLED_BACK when every compensation succeeded and PARTIALLY_ROLLED_BACK when any failed.
 */
export function aggregateOutcome(parts: OutcomeParts): SagaOutcome {
    const { sagaId, sagaName, executed, failure, compensated, failedCompensations } = parts;

    if (!failure) {
        return { status: 'COMMITTED', sagaId, sagaName, executed: [...executed] };
    }

    if (failedCompensations.length === 0) {
        return {
            status: 'ROLLED_BACK',
            sagaId,
            sagaName,
            executed: [...executed],
            failure,
            compensated: [...compensated],
        };
    }

    return {
        status: 'PARTIALLY_ROLLED_BACK',
        sagaId,
        sagaName,
        executed: [...executed],
        failure,
        compensated: [...compensated],
        failedCompensations: [...failedCompensations],
    };
}
