/**
 * Exclusive-access primitives for the kernel's serialization points.
 *
 * `Mutex` is a FIFO promise-chain lock: callers queue in arrival order and
 * each critical section starts only after the previous one settled.
 * `KeyedMutex` gives one such lock per key so that distinct keys never
 * block each other.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    public get locked(): boolean {
        return this.pending > 0;
    }

    public async runExclusive<T>(section: () => Promise<T> | T): Promise<T> {
        let release: () => void = () => { };
        const next = new Promise<void>(resolve => { release = resolve; });
        const previous = this.tail;
        this.tail = previous.then(() => next);
        this.pending++;

        await previous;
        try {
            return await section();
        } finally {
            this.pending--;
            release();
        }
    }
}

export class KeyedMutex {
    private locks: Map<string, Mutex> = new Map();

    public async runExclusive<T>(key: string, section: () => Promise<T> | T): Promise<T> {
        let lock = this.locks.get(key);
        if (!lock) {
            lock = new Mutex();
            this.locks.set(key, lock);
        }
        try {
            return await lock.runExclusive(section);
        } finally {
            if (!lock.locked) this.locks.delete(key);
        }
    }

    public isLocked(key: string): boolean {
        return this.locks.get(key)?.locked ?? false;
    }
}
