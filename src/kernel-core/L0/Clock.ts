/**
 * Environment Port: System Clock
 * Normalizes time for the Kernel (epoch milliseconds).
 */
export interface ISystemClock {
    now(): number;
}

export class SystemClock implements ISystemClock {
    public now(): number {
        return Date.now();
    }
}

/**
 * Deterministic clock for rehearsals and tests. Never moves backwards.
 */
export class ManualClock implements ISystemClock {
    constructor(private current: number = 0) { }

    public now(): number {
        return this.current;
    }

    public advance(ms: number): number {
        if (ms < 0) throw new Error("Time Violation: ManualClock cannot move backwards");
        this.current += ms;
        return this.current;
    }

    public set(at: number): void {
        if (at < this.current) throw new Error("Time Violation: ManualClock cannot move backwards");
        this.current = at;
    }
}
