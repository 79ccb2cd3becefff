// src/core/saga/ExecutionLedger.ts

import { ErrorFactory } from '../errors';

export interface LedgerEntry<TStep> {
    readonly index: number;
    readonly step: TStep;
    /** Value returned by the step's successful `execute`, threaded into `compensate`. */
    readonly state: unknown;
}

/**
 * ExecutionLedger
 * Records the steps whose `execute` succeeded during one run.
 * The entries always form a prefix of the saga's step sequence.
 */
export class ExecutionLedger<TStep extends { readonly name: string }> {
    private readonly entries: LedgerEntry<TStep>[] = [];

    constructor(private readonly sagaId: string) { }

    public record(index: number, step: TStep, state: unknown): void {
        if (index !== this.entries.length) {
            throw ErrorFactory.invariant(
                `Ledger out of order: expected step #${this.entries.length}, got #${index} (${step.name})`,
                { sagaId: this.sagaId, operation: 'record' }
            );
        }
        this.entries.push({ index, step, state });
    }

    public get size(): number {
        return this.entries.length;
    }

    public names(): string[] {
        return this.entries.map(entry => entry.step.name);
    }

    /**
     * Entries in compensation order: last succeeded first.
     */
    public reversed(): LedgerEntry<TStep>[] {
        return [...this.entries].reverse();
    }
}
