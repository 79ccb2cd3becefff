// src/core/saga/BaseSagaCoordinator.ts

import { v4 as uuidv4 } from 'uuid';
import { CONFIG } from '../../config/config';
import { SagaArchive } from '../../infrastructure/archive/SagaArchive';
import { ErrorFactory } from '../errors';
import { Logger } from '../logging/Logger';
import { assertUniqueStepName, validateStepName } from '../validation/stepValidator';
import { LedgerEntry } from './ExecutionLedger';
import { describeError, isThenable } from './outcomes';
import {
    CompensationFailure,
    CoordinatorKind,
    SagaEvent,
    SagaEventListener,
    SagaOutcome,
    SagaPhase,
    SagaReport,
    StepContext,
    StepFailed,
    StepFailure,
    StepOutcome,
} from './types';

export interface SagaCoordinatorOptions {
    /** Used in logs, outcomes and reports. */
    name?: string;
    /** Defaults to a random UUID. */
    sagaId?: string;
    /** Where the report goes once the run is over; without one it is discarded. */
    archive?: SagaArchive;
    onEvent?: SagaEventListener;
}

type NamedStep = { readonly name: string };

/**
 * Build-phase rules, run lifecycle, events and reporting shared by both coordinators.
 * Subclasses own the forward and compensation phases.
 */
export abstract class BaseSagaCoordinator<TStep extends NamedStep> {
    protected abstract readonly kind: CoordinatorKind;
    protected abstract readonly logModule: string;

    protected readonly steps: TStep[] = [];
    protected readonly sagaId: string;
    protected readonly sagaName: string;
    private readonly archive?: SagaArchive;
    private readonly onEvent?: SagaEventListener;

    private phase: SagaPhase = SagaPhase.NOT_STARTED;
    private readonly events: SagaEvent[] = [];
    private startedAt?: Date;
    private report?: SagaReport;

    constructor(options: SagaCoordinatorOptions = {}) {
        this.sagaId = options.sagaId ?? uuidv4();
        this.sagaName = options.name ?? CONFIG.SAGA.DEFAULT_NAME;
        this.archive = options.archive;
        this.onEvent = options.onEvent;
    }

    /**
     * Appends a step. Only valid before `run`.
     */
    public addStep(step: TStep): this {
        if (this.phase !== SagaPhase.NOT_STARTED) {
            throw ErrorFactory.protocolMisuse(
                `Cannot add step '${step.name}' to saga '${this.sagaName}': run already started`,
                { operation: 'addStep', sagaId: this.sagaId, suggestion: 'Build a new saga for each run.' }
            );
        }
        validateStepName(step.name);
        assertUniqueStepName(step.name, this.getStepNames());
        if (this.steps.length >= CONFIG.VALIDATION.MAX_STEPS) {
            throw ErrorFactory.validation(`Saga '${this.sagaName}' exceeds ${CONFIG.VALIDATION.MAX_STEPS} steps`, {
                operation: 'addStep',
                sagaId: this.sagaId,
            });
        }
        this.steps.push(step);
        return this;
    }

    public getPhase(): SagaPhase {
        return this.phase;
    }

    public getSagaId(): string {
        return this.sagaId;
    }

    public getSagaName(): string {
        return this.sagaName;
    }

    public getStepNames(): string[] {
        return this.steps.map(step => step.name);
    }

    /**
     * Report of the finished run, including its event history.
     */
    public getReport(): SagaReport {
        if (!this.report) {
            throw ErrorFactory.protocolMisuse(`Saga '${this.sagaName}' has not finished (phase ${this.phase})`, {
                operation: 'getReport',
                sagaId: this.sagaId,
            });
        }
        return this.report;
    }

    protected beginRun(): void {
        if (this.phase !== SagaPhase.NOT_STARTED) {
            throw ErrorFactory.protocolMisuse(`Saga '${this.sagaName}' can only be run once (phase ${this.phase})`, {
                operation: 'run',
                sagaId: this.sagaId,
                suggestion: 'Build a new saga for each run.',
            });
        }
        this.phase = SagaPhase.RUNNING;
        this.startedAt = new Date();
        this.emit({ type: 'SAGA_STARTED' });
        Logger.info(this.logModule, `Starting saga '${this.sagaName}' with ${this.steps.length} step(s)`, {
            sagaId: this.sagaId,
        });
    }

    protected contextFor(stepIndex: number, signal?: AbortSignal): StepContext {
        return { sagaId: this.sagaId, sagaName: this.sagaName, stepIndex, signal };
    }

    /**
     * A forward step is never dispatched once the caller's signal has fired;
     * the failure is attributed to the step that would have run.
     */
    protected abortedBefore(step: TStep, index: number, signal?: AbortSignal): StepFailure | undefined {
        if (!signal?.aborted) {
            return undefined;
        }
        const reason = signal.reason === undefined ? 'Saga aborted' : `Saga aborted: ${describeError(signal.reason)}`;
        return this.stepFailed(step, index, { status: 'FAILED', reason, cause: signal.reason });
    }

    protected stepStarted(step: TStep, index: number): void {
        Logger.debug(this.logModule, `Executing step: ${step.name}`, { sagaId: this.sagaId, index });
        this.emit({ type: 'STEP_STARTED', step: step.name, index });
    }

    protected stepSucceeded(step: TStep, index: number): void {
        Logger.debug(this.logModule, `Step completed: ${step.name}`, { sagaId: this.sagaId, index });
        this.emit({ type: 'STEP_SUCCEEDED', step: step.name, index });
    }

    protected stepFailed(step: TStep, index: number, outcome: StepFailed): StepFailure {
        Logger.warn(this.logModule, `Step failed: ${step.name}`, { sagaId: this.sagaId, index, reason: outcome.reason });
        this.emit({ type: 'STEP_FAILED', step: step.name, index, reason: outcome.reason });
        return outcome.cause === undefined
            ? { step: step.name, index, reason: outcome.reason }
            : { step: step.name, index, reason: outcome.reason, cause: outcome.cause };
    }

    protected startCompensating(failure: StepFailure, ledgerSize: number): void {
        this.phase = SagaPhase.COMPENSATING;
        Logger.info(this.logModule, `Compensating ${ledgerSize} step(s) after '${failure.step}' failed`, {
            sagaId: this.sagaId,
        });
    }

    protected compensationStarted(entry: LedgerEntry<TStep>): void {
        Logger.debug(this.logModule, `Compensating step: ${entry.step.name}`, { sagaId: this.sagaId, index: entry.index });
        this.emit({ type: 'COMPENSATION_STARTED', step: entry.step.name, index: entry.index });
    }

    /**
     * Records one compensation result into the run's running totals.
     */
    protected compensationSettled(
        entry: LedgerEntry<TStep>,
        outcome: StepOutcome<unknown>,
        compensated: string[],
        failedCompensations: CompensationFailure[]
    ): void {
        const { step, index } = entry;
        if (outcome.status === 'SUCCEEDED') {
            compensated.push(step.name);
            Logger.debug(this.logModule, `Compensation successful: ${step.name}`, { sagaId: this.sagaId, index });
            this.emit({ type: 'COMPENSATION_SUCCEEDED', step: step.name, index });
            return;
        }

        failedCompensations.push(
            outcome.cause === undefined
                ? { step: step.name, index, reason: outcome.reason }
                : { step: step.name, index, reason: outcome.reason, cause: outcome.cause }
        );
        Logger.error(this.logModule, `Compensation failed: ${step.name} (${outcome.reason})`, outcome.cause);
        this.emit({ type: 'COMPENSATION_FAILED', step: step.name, index, reason: outcome.reason });
    }

    protected finish(outcome: SagaOutcome): SagaOutcome {
        this.phase = SagaPhase[outcome.status];
        this.emit({ type: 'SAGA_FINISHED', status: outcome.status });

        const finishedAt = new Date();
        const startedAt = this.startedAt ?? finishedAt;
        this.report = {
            sagaId: this.sagaId,
            sagaName: this.sagaName,
            coordinator: this.kind,
            outcome,
            events: [...this.events],
            startedAt,
            finishedAt,
            durationMs: finishedAt.getTime() - startedAt.getTime(),
        };
        this.archive?.record(this.report);

        if (outcome.status === 'PARTIALLY_ROLLED_BACK') {
            Logger.error(
                this.logModule,
                `Saga '${this.sagaName}' PARTIALLY_ROLLED_BACK: manual intervention required for ` +
                    outcome.failedCompensations.map(f => f.step).join(', '),
                { sagaId: this.sagaId }
            );
        } else {
            Logger.info(this.logModule, `Saga '${this.sagaName}' finished: ${outcome.status}`, { sagaId: this.sagaId });
        }
        return outcome;
    }

    private emit(event: Omit<SagaEvent, 'sagaId' | 'timestamp'>): void {
        const recorded: SagaEvent = { ...event, sagaId: this.sagaId, timestamp: Date.now() };
        this.events.push(recorded);
        if (!this.onEvent) {
            return;
        }
        let result: unknown;
        try {
            result = this.onEvent(recorded);
        } catch (error) {
            Logger.warn(this.logModule, `Event listener threw on ${recorded.type}`, { reason: describeError(error) });
            return;
        }
        // Async listeners are not awaited; their rejections are logged here.
        if (isThenable(result)) {
            void Promise.resolve(result).catch((error: unknown) => {
                Logger.warn(this.logModule, `Event listener rejected on ${recorded.type}`, { reason: describeError(error) });
            });
        }
    }
}
