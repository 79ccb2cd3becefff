// tests/unit/saga_archive.test.ts

import { SagaArchive } from '../../src/infrastructure/archive/SagaArchive';
import { SagaCoordinator } from '../../src/core/saga/SagaCoordinator';
import { CallLog, trackedStep } from '../fixtures/trackedSteps';

describe('SagaArchive', () => {
    function runInto(archive: SagaArchive, sagaId: string, mode: 'commit' | 'rollback' | 'partial') {
        const log = new CallLog();
        const saga = new SagaCoordinator({ sagaId, name: `saga ${sagaId}`, archive });
        saga.addStep(trackedStep('A', log, { failCompensate: mode === 'partial' }));
        saga.addStep(trackedStep('B', log, { failExecute: mode !== 'commit' }));
        return saga.run();
    }

    it('should store the report of every finished run', () => {
        const archive = new SagaArchive({ max: 10 });
        const outcome = runInto(archive, 'run-1', 'rollback');

        expect(archive.size).toBe(1);
        expect(archive.has('run-1')).toBe(true);
        const report = archive.get('run-1');
        expect(report?.outcome).toBe(outcome);
        expect(report?.sagaName).toBe('saga run-1');
    });

    it('should list partial rollbacks as needing attention', () => {
        const archive = new SagaArchive({ max: 10 });
        runInto(archive, 'ok', 'commit');
        runInto(archive, 'undone', 'rollback');
        runInto(archive, 'stuck', 'partial');

        expect(archive.list().map(r => r.sagaId).sort()).toEqual(['ok', 'stuck', 'undone']);
        expect(archive.needingAttention().map(r => r.sagaId)).toEqual(['stuck']);
    });

    it('should evict the least recently used report beyond max', () => {
        const archive = new SagaArchive({ max: 2 });
        runInto(archive, 'first', 'commit');
        runInto(archive, 'second', 'commit');
        archive.get('first');
        runInto(archive, 'third', 'commit');

        expect(archive.has('second')).toBe(false);
        expect(archive.list().map(r => r.sagaId)).toEqual(['third', 'first']);
    });

    it('should delete and clear reports', () => {
        const archive = new SagaArchive({ max: 10 });
        runInto(archive, 'a', 'commit');
        runInto(archive, 'b', 'commit');

        archive.delete('a');
        expect(archive.has('a')).toBe(false);
        archive.clear();
        expect(archive.size).toBe(0);
    });

    it('should fall back to the configured bounds', () => {
        const archive = new SagaArchive();
        runInto(archive, 'defaults', 'commit');
        expect(archive.get('defaults')?.outcome.status).toBe('COMMITTED');
    });
});
