// tests/unit/execution_ledger.test.ts

import { ExecutionLedger } from '../../src/core/saga/ExecutionLedger';
import { SagaInvariantError } from '../../src/core/errors';

describe('ExecutionLedger', () => {
    const step = (name: string) => ({ name });

    it('should keep entries in execution order and reverse them for compensation', () => {
        const ledger = new ExecutionLedger<{ name: string }>('saga-1');
        ledger.record(0, step('A'), 'a-state');
        ledger.record(1, step('B'), 'b-state');
        ledger.record(2, step('C'), undefined);

        expect(ledger.size).toBe(3);
        expect(ledger.names()).toEqual(['A', 'B', 'C']);
        expect(ledger.reversed().map(e => [e.index, e.step.name, e.state])).toEqual([
            [2, 'C', undefined],
            [1, 'B', 'b-state'],
            [0, 'A', 'a-state'],
        ]);
        expect(ledger.names()).toEqual(['A', 'B', 'C']);
    });

    it('should refuse an entry that breaks the prefix', () => {
        const ledger = new ExecutionLedger<{ name: string }>('saga-2');
        ledger.record(0, step('A'), null);

        expect(() => ledger.record(2, step('C'), null)).toThrow(SagaInvariantError);
        expect(() => ledger.record(0, step('A'), null)).toThrow('expected step #1, got #0 (A)');
        expect(ledger.size).toBe(1);
    });
});
