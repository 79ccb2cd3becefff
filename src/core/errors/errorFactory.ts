// src/core/errors/errorFactory.ts

import * as Errors from './errors';
import { ErrorContext } from './ErrorContext';

/**
 * Factory class to create consistent error instances across the library.
 */
export class ErrorFactory {
    static protocolMisuse(message: string, context?: ErrorContext) {
        return new Errors.ProtocolMisuseError(message, context);
    }

    static validation(message: string, context?: ErrorContext) {
        return new Errors.ValidationError(message, context);
    }

    static workerPool(message: string, context?: ErrorContext) {
        return new Errors.WorkerPoolError(message, context);
    }

    static invariant(message: string, context?: ErrorContext) {
        return new Errors.SagaInvariantError(message, context);
    }

    static stepExecution(message: string, context?: ErrorContext) {
        return new Errors.StepExecutionError(message, context);
    }

    static stepCompensation(message: string, context?: ErrorContext) {
        return new Errors.StepCompensationError(message, context);
    }
}
