// src/core/saga/types.ts

/**
 * Result of a step's forward or compensating operation.
 */
export type StepOutcome<T = void> = StepSucceeded<T> | StepFailed;

export interface StepSucceeded<T> {
    readonly status: 'SUCCEEDED';
    readonly value: T;
}

export interface StepFailed {
    readonly status: 'FAILED';
    readonly reason: string;
    readonly cause?: unknown;
}

/**
 * Passed to every `execute` / `compensate` call.
 * `signal` is the caller's cancellation token; the step decides whether to observe it.
 */
export interface StepContext {
    readonly sagaId: string;
    readonly sagaName: string;
    readonly stepIndex: number;
    readonly signal?: AbortSignal;
}

/**
 * A unit of work run by the synchronous coordinator.
 * Whatever `execute` returns as its value is handed back to `compensate`.
 */
export interface SagaStep<TState = void> {
    readonly name: string;
    execute(context: StepContext): StepOutcome<TState>;
    compensate(state: TState, context: StepContext): StepOutcome;
}

/**
 * A unit of work run by the concurrent coordinator. Every `SagaStep` is also an `AsyncSagaStep`.
 */
export interface AsyncSagaStep<TState = void> {
    readonly name: string;
    execute(context: StepContext): StepOutcome<TState> | Promise<StepOutcome<TState>>;
    compensate(state: TState, context: StepContext): StepOutcome | Promise<StepOutcome>;
}

/**
 * The step that triggered rollback.
 */
export interface StepFailure {
    readonly step: string;
    readonly index: number;
    readonly reason: string;
    readonly cause?: unknown;
}

/**
 * A compensation that reported FAILED (or threw).
 */
export interface CompensationFailure {
    readonly step: string;
    readonly index: number;
    readonly reason: string;
    readonly cause?: unknown;
}

export type SagaStatus = 'COMMITTED' | 'ROLLED_BACK' | 'PARTIALLY_ROLLED_BACK';

interface SagaOutcomeBase {
    readonly sagaId: string;
    readonly sagaName: string;
    /** Names of the steps whose `execute` succeeded, in execution order. */
    readonly executed: readonly string[];
}

export interface SagaCommitted extends SagaOutcomeBase {
    readonly status: 'COMMITTED';
}

export interface SagaRolledBack extends SagaOutcomeBase {
    readonly status: 'ROLLED_BACK';
    readonly failure: StepFailure;
    /** Names of the compensated steps, in the order their compensations settled. */
    readonly compensated: readonly string[];
}

/**
 * Terminal but inconsistent: effects of `failedCompensations` are still applied.
 */
export interface SagaPartiallyRolledBack extends SagaOutcomeBase {
    readonly status: 'PARTIALLY_ROLLED_BACK';
    readonly failure: StepFailure;
    readonly compensated: readonly string[];
    readonly failedCompensations: readonly CompensationFailure[];
}

export type SagaOutcome = SagaCommitted | SagaRolledBack | SagaPartiallyRolledBack;

export enum SagaPhase {
    NOT_STARTED = 'NOT_STARTED',
    RUNNING = 'RUNNING',
    COMPENSATING = 'COMPENSATING',
    COMMITTED = 'COMMITTED',
    ROLLED_BACK = 'ROLLED_BACK',
    PARTIALLY_ROLLED_BACK = 'PARTIALLY_ROLLED_BACK',
}

export type SagaEventType =
    | 'SAGA_STARTED'
    | 'STEP_STARTED'
    | 'STEP_SUCCEEDED'
    | 'STEP_FAILED'
    | 'COMPENSATION_STARTED'
    | 'COMPENSATION_SUCCEEDED'
    | 'COMPENSATION_FAILED'
    | 'SAGA_FINISHED';

export interface SagaEvent {
    readonly type: SagaEventType;
    readonly sagaId: string;
    readonly timestamp: number;
    readonly step?: string;
    readonly index?: number;
    readonly reason?: string;
    readonly status?: SagaStatus;
}

/**
 * Called synchronously for every event. A returned promise is not awaited;
 * a throw or rejection is logged and the run continues.
 */
export type SagaEventListener = (event: SagaEvent) => void;

export type CoordinatorKind = 'synchronous' | 'concurrent';

/**
 * Archived record of a finished run.
 */
export interface SagaReport {
    readonly sagaId: string;
    readonly sagaName: string;
    readonly coordinator: CoordinatorKind;
    readonly outcome: SagaOutcome;
    readonly events: readonly SagaEvent[];
    readonly startedAt: Date;
    readonly finishedAt: Date;
    readonly durationMs: number;
}

export interface SagaRunOptions {
    signal?: AbortSignal;
}
