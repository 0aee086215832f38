import { ManualClock } from '../L0/Clock.js';
import type { LedgerEntry } from '../L0/Ontology.js';
import type { KernelPolicyInput } from '../L0/Policy.js';
import { ConstraintKernel } from '../Kernel.js';
import type { KernelOptions } from '../Kernel.js';
import { MemoryLedgerStore } from '../L5/Ledger.js';

export interface Harness {
    kernel: ConstraintKernel;
    clock: ManualClock;
}

/**
 * Kernel on a manual clock with two principals already registered:
 * `op` (OPERATOR, sequence 1) and `auditor` (AUDITOR, sequence 2).
 */
export async function openKernel(policy: KernelPolicyInput = {}, options: Omit<KernelOptions, 'policy' | 'clock'> = {}): Promise<Harness> {
    const clock = new ManualClock(0);
    const kernel = await ConstraintKernel.open({
        ...options,
        clock,
        policy: { ...policy, ledger: { retryBackoffMs: 0, ...policy.ledger } },
    });
    await kernel.registerPrincipal('op', 'op', 'OPERATOR');
    await kernel.registerPrincipal('op', 'auditor', 'AUDITOR');
    return { kernel, clock };
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
    let resolve: (value: T) => void = () => { };
    const promise = new Promise<T>(r => { resolve = r; });
    return { promise, resolve };
}

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export interface Gate {
    reached: Promise<void>;
    release: () => void;
}

/**
 * Memory store that can park the next append of one entry kind, with the
 * ledger lock held, until the test releases it.
 */
export class GatedStore extends MemoryLedgerStore {
    private gate: { kind: string; reached: () => void; open: Promise<void> } | null = null;

    public hold(kind: string): Gate {
        const reached = deferred<void>();
        const open = deferred<void>();
        this.gate = { kind, reached: () => reached.resolve(), open: open.promise };
        return { reached: reached.promise, release: () => open.resolve() };
    }

    async append(entry: LedgerEntry, expectedTail: number): Promise<void> {
        const gate = this.gate;
        if (gate && entry.actionKind === gate.kind) {
            this.gate = null;
            gate.reached();
            await gate.open;
        }
        return super.append(entry, expectedTail);
    }
}
