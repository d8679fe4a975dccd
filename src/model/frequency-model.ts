import { FrequencyTable, type FrequencyView, type FrequencyWriter } from './frequency-table.js';
import { ReadWriteLock } from '../utils/rw-lock.js';

/**
 * Concurrency-safe frequency statistics.
 *
 * One lock guards both maps of the table together. Each computation runs
 * inside a single `read` or `write` call, so it never observes a partially
 * applied training event. Do not split the lock per map.
 */
export class FrequencyModel {
    private readonly table: FrequencyTable;
    private readonly lock = new ReadWriteLock();

    constructor(options?: { minTokenWeight?: number }) {
        this.table = new FrequencyTable(options?.minTokenWeight);
    }

    /**
     * Run `fn` under a shared hold. Readers may overlap each other.
     */
    read<T>(fn: (view: FrequencyView) => T | Promise<T>): Promise<T> {
        return this.lock.withRead(() => fn(this.table));
    }

    /**
     * Run `fn` under an exclusive hold.
     */
    write<T>(fn: (writer: FrequencyWriter) => T | Promise<T>): Promise<T> {
        return this.lock.withWrite(() => fn(this.table));
    }
}
