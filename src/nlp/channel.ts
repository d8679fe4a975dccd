import { InvalidOptionError } from '../classifier/errors.js';

interface PendingWrite<T> {
    value: T;
    resolve: () => void;
    reject: (error: Error) => void;
}

interface PendingRead<T> {
    resolve: (result: IteratorResult<T, undefined>) => void;
    reject: (error: Error) => void;
}

/**
 * Bounded FIFO queue linking two pipeline stages.
 *
 * `send` suspends while the buffer is full and `receive` suspends while it is
 * empty. A plain `close()` lets readers drain what is buffered; `close(error)`
 * discards the buffer and fails every pending and future call with `error`.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
    private readonly buffer: Array<{ value: T }> = [];
    private readonly pendingWrites: PendingWrite<T>[] = [];
    private readonly pendingReads: PendingRead<T>[] = [];
    private closed = false;
    private failure: Error | null = null;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new InvalidOptionError('capacity', `expected a positive integer, got ${capacity}`);
        }
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /** Number of values waiting to be read */
    get length(): number {
        return this.buffer.length + this.pendingWrites.length;
    }

    send(value: T): Promise<void> {
        if (this.failure) return Promise.reject(this.failure);
        if (this.closed) return Promise.reject(new Error('Cannot send on a closed channel'));

        const reader = this.pendingReads.shift();
        if (reader) {
            reader.resolve({ value, done: false });
            return Promise.resolve();
        }

        if (this.buffer.length < this.capacity) {
            this.buffer.push({ value });
            return Promise.resolve();
        }

        return new Promise((resolve, reject) => {
            this.pendingWrites.push({ value, resolve, reject });
        });
    }

    receive(): Promise<IteratorResult<T, undefined>> {
        if (this.failure) return Promise.reject(this.failure);

        const slot = this.buffer.shift();
        if (slot) {
            // A slot just freed up: admit the oldest blocked writer
            const writer = this.pendingWrites.shift();
            if (writer) {
                this.buffer.push({ value: writer.value });
                writer.resolve();
            }
            return Promise.resolve({ value: slot.value, done: false });
        }

        if (this.closed) return Promise.resolve({ value: undefined, done: true });

        return new Promise((resolve, reject) => {
            this.pendingReads.push({ resolve, reject });
        });
    }

    close(error?: Error): void {
        if (error) {
            if (this.failure) return;
            this.failure = error;
            this.closed = true;
            this.buffer.length = 0;
            for (const writer of this.pendingWrites.splice(0)) writer.reject(error);
            for (const reader of this.pendingReads.splice(0)) reader.reject(error);
            return;
        }

        if (this.closed) return;
        this.closed = true;
        // Readers only wait on an empty buffer, so they are done now
        for (const reader of this.pendingReads.splice(0)) {
            reader.resolve({ value: undefined, done: true });
        }
    }

    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return { next: () => this.receive() };
    }
}
