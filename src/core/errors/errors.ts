// src/core/errors/errors.ts

import { SagaError } from './SagaError';
import { ErrorContext } from './ErrorContext';

/**
 * Thrown when a coordinator is driven out of protocol:
 * `run` twice, `addStep` after `run`, or reading a report too early.
 */
export class ProtocolMisuseError extends SagaError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'PROTOCOL_MISUSE',
            component: 'CORE_COORDINATOR',
            retryable: false,
            ...context
        });
        this.name = 'ProtocolMisuseError';
    }
}

/**
 * Thrown when input validation fails.
 */
export class ValidationError extends SagaError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'VALIDATION_ERROR',
            component: 'CORE_VALIDATION',
            ...context
        });
        this.name = 'ValidationError';
    }
}

/**
 * Thrown when the worker pool cannot accept or run a task.
 */
export class WorkerPoolError extends SagaError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'WORKER_POOL_ERROR',
            component: 'CORE_CONCURRENCY',
            ...context
        });
        this.name = 'WorkerPoolError';
    }
}

/**
 * Thrown when the execution ledger stops being a prefix of the step sequence.
 */
export class SagaInvariantError extends SagaError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'INVARIANT_VIOLATION',
            component: 'CORE_LEDGER',
            retryable: false,
            ...context
        });
        this.name = 'SagaInvariantError';
    }
}

/**
 * Cause attached to a failed outcome when `execute` threw something that is not an Error.
 */
export class StepExecutionError extends SagaError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'STEP_EXECUTION_FAILED',
            component: 'SAGA_STEP',
            ...context
        });
        this.name = 'StepExecutionError';
    }
}

/**
 * Cause attached to a failed outcome when `compensate` threw something that is not an Error.
 */
export class StepCompensationError extends SagaError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'STEP_COMPENSATION_FAILED',
            component: 'SAGA_STEP',
            suggestion: 'The effect of this step is still applied and needs manual reversal.',
            ...context
        });
        this.name = 'StepCompensationError';
    }
}
