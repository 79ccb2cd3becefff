// src/core/saga/defineStep.ts

import { succeeded } from './outcomes';
import { AsyncSagaStep, SagaStep, StepContext, StepOutcome } from './types';

export interface StepDefinition<TState> {
    name: string;
    execute: (context: StepContext) => StepOutcome<TState>;
    // Omitted for steps with nothing to undo (e.g. a read-only validation)
    compensate?: (state: TState, context: StepContext) => StepOutcome;
}

export interface AsyncStepDefinition<TState> {
    name: string;
    execute: (context: StepContext) => StepOutcome<TState> | Promise<StepOutcome<TState>>;
    compensate?: (state: TState, context: StepContext) => StepOutcome | Promise<StepOutcome>;
}

/**
 * Builds a synchronous step from plain functions.
 */
export function defineStep<TState = void>(definition: StepDefinition<TState>): SagaStep<TState> {
    const { name, execute, compensate } = definition;
    return {
        name,
        execute: context => execute(context),
        compensate: (state, context) => (compensate ? compensate(state, context) : succeeded()),
    };
}

export function defineAsyncStep<TState = void>(definition: AsyncStepDefinition<TState>): AsyncSagaStep<TState> {
    const { name, execute, compensate } = definition;
    return {
        name,
        execute: context => execute(context),
        compensate: (state, context) => (compensate ? compensate(state, context) : succeeded()),
    };
}
