import { LRUCache } from 'lru-cache';
import { CONFIG } from '../../config/config';
import { SagaReport } from '../../core/saga/types';

interface ArchiveOptions {
    max?: number;
    ttl?: number;
}

/**
 * SagaArchive
 * Keeps reports of finished runs in memory, bounded by count and age.
 * Not a durability layer: a process restart loses every report.
 */
export class SagaArchive {
    private readonly cache: LRUCache<string, SagaReport>;

    constructor(options?: ArchiveOptions) {
        this.cache = new LRUCache<string, SagaReport>({
            max: options?.max ?? CONFIG.ARCHIVE.MAX_REPORTS,
            ttl: options?.ttl ?? CONFIG.ARCHIVE.TTL_MS,
        });
    }

    public record(report: SagaReport): void {
        this.cache.set(report.sagaId, report);
    }

    public get(sagaId: string): SagaReport | undefined {
        return this.cache.get(sagaId);
    }

    public has(sagaId: string): boolean {
        return this.cache.has(sagaId);
    }

    /**
     * Most recently recorded (or read) first.
     */
    public list(): SagaReport[] {
        return [...this.cache.values()];
    }

    /**
     * Runs that ended PARTIALLY_ROLLED_BACK: their effects exist but could not be reversed.
     */
    public needingAttention(): SagaReport[] {
        return this.list().filter(report => report.outcome.status === 'PARTIALLY_ROLLED_BACK');
    }

    public get size(): number {
        return this.cache.size;
    }

    public delete(sagaId: string): void {
        this.cache.delete(sagaId);
    }

    public clear(): void {
        this.cache.clear();
    }
}
