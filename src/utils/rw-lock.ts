type LockMode = 'read' | 'write';

interface Waiter {
    mode: LockMode;
    grant: () => void;
}

/**
 * Async reader-writer lock.
 * Any number of readers may hold it together; a writer holds it alone.
 * Waiters are served in arrival order, so a queued writer holds back
 * readers that arrive after it.
 */
export class ReadWriteLock {
    private activeReaders = 0;
    private writerActive = false;
    private readonly queue: Waiter[] = [];

    get readers(): number {
        return this.activeReaders;
    }

    get writing(): boolean {
        return this.writerActive;
    }

    get waiting(): number {
        return this.queue.length;
    }

    async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
        await this.acquire('read');
        try {
            return await fn();
        } finally {
            this.release('read');
        }
    }

    async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
        await this.acquire('write');
        try {
            return await fn();
        } finally {
            this.release('write');
        }
    }

    private acquire(mode: LockMode): Promise<void> {
        if (this.queue.length === 0 && this.canGrant(mode)) {
            this.take(mode);
            return Promise.resolve();
        }

        return new Promise((resolve) => {
            this.queue.push({
                mode,
                grant: () => {
                    this.take(mode);
                    resolve();
                },
            });
        });
    }

    private canGrant(mode: LockMode): boolean {
        if (this.writerActive) return false;
        return mode === 'read' || this.activeReaders === 0;
    }

    private take(mode: LockMode): void {
        if (mode === 'read') {
            this.activeReaders++;
        } else {
            this.writerActive = true;
        }
    }

    private release(mode: LockMode): void {
        if (mode === 'read') {
            this.activeReaders--;
        } else {
            this.writerActive = false;
        }

        let next = this.queue[0];
        while (next && this.canGrant(next.mode)) {
            this.queue.shift();
            next.grant();
            next = this.queue[0];
        }
    }
}
