// src/kernel-core/L5/Ledger.ts
import { GENESIS_HASH, canonicalize, digest, hash } from '../L0/Crypto.js';
import { Mutex } from '../L0/Mutex.js';
import { SystemClock } from '../L0/Clock.js';
import type { ISystemClock } from '../L0/Clock.js';
import type { EntryDraft, EntryOutcome, LedgerEntry, Payload, PrincipalID } from '../L0/Ontology.js';
import { ErrorCode, KernelError, isKernelError } from '../Errors.js';

/**
 * Persistence Port: Ledger Store
 * Append-only sequence of entries keyed by sequence number. `append` is a
 * compare-and-set against the tail: it must fail with
 * CONCURRENT_APPEND_CONFLICT when the stored tail is not `expectedTail`.
 */
export interface ILedgerStore {
    append(entry: LedgerEntry, expectedTail: number): Promise<void>;
    getTail(): Promise<LedgerEntry | null>;
    getEntry(sequence: number): Promise<LedgerEntry | null>;
    getRange(from: number, to: number): Promise<LedgerEntry[]>;
}

export function appendConflict(expectedTail: number, actualTail: number): KernelError {
    return new KernelError(
        ErrorCode.CONCURRENT_APPEND_CONFLICT,
        `Ledger tail advanced: expected ${expectedTail}, found ${actualTail}`,
        { expectedTail, actualTail }
    );
}

export class MemoryLedgerStore implements ILedgerStore {
    protected entries: LedgerEntry[] = [];

    async append(entry: LedgerEntry, expectedTail: number): Promise<void> {
        if (this.entries.length !== expectedTail || entry.sequence !== expectedTail + 1) {
            throw appendConflict(expectedTail, this.entries.length);
        }
        this.entries.push(entry);
    }

    async getTail(): Promise<LedgerEntry | null> {
        return this.entries[this.entries.length - 1] ?? null;
    }

    async getEntry(sequence: number): Promise<LedgerEntry | null> {
        return this.entries[sequence - 1] ?? null;
    }

    async getRange(from: number, to: number): Promise<LedgerEntry[]> {
        const start = Math.max(1, from);
        if (to < start) return [];
        return this.entries.slice(start - 1, to);
    }
}

export interface ChainVerification {
    valid: boolean;
    checked: number;
    from: number;
    to: number;
    breakAt?: number;
    reason?: string;
}

export interface LedgerOptions {
    maxAppendRetries: number;
    retryBackoffMs: number;
}

const DEFAULT_OPTIONS: LedgerOptions = { maxAppendRetries: 5, retryBackoffMs: 5 };

/**
 * Hash over the canonical tuple
 * [sequence, actor, actionKind, payloadDigest, timestamp, prevHash, outcome].
 */
export function computeEntryHash(e: Omit<LedgerEntry, 'hash' | 'payload'>): string {
    return hash(canonicalize([e.sequence, e.actor, e.actionKind, e.payloadDigest, e.timestamp, e.prevHash, e.outcome]));
}

export type DraftSource = EntryDraft | ((tailSequence: number) => EntryDraft);

export interface Decision<V> {
    draft: EntryDraft;
    verdict: V;
}

function resolveDraft(draft: DraftSource, tailSequence: number): EntryDraft {
    return typeof draft === 'function' ? draft(tailSequence) : draft;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class Ledger {
    private readonly mutex = new Mutex();
    private readonly options: LedgerOptions;

    constructor(
        private readonly store: ILedgerStore = new MemoryLedgerStore(),
        private readonly clock: ISystemClock = new SystemClock(),
        options: Partial<LedgerOptions> = {}
    ) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    public get Clock(): ISystemClock { return this.clock; }

    public async getTail(): Promise<LedgerEntry | null> {
        return this.store.getTail();
    }

    public async getEntry(sequence: number): Promise<LedgerEntry> {
        const entry = await this.store.getEntry(sequence);
        if (!entry) throw new KernelError(ErrorCode.ENTRY_NOT_FOUND, `No ledger entry at sequence ${sequence}`);
        return entry;
    }

    public async getRange(from: number = 1, to?: number): Promise<LedgerEntry[]> {
        const end = to ?? (await this.tailSequence());
        return this.store.getRange(from, end);
    }

    /**
     * Single-attempt append. When `expectedTail` is given it must match the
     * current tail sequence, otherwise the caller has to refresh and retry.
     */
    public async append(draft: EntryDraft, expectedTail?: number): Promise<LedgerEntry> {
        return this.mutex.runExclusive(async () => {
            const tail = await this.store.getTail();
            const tailSeq = tail?.sequence ?? 0;
            if (expectedTail !== undefined && expectedTail !== tailSeq) {
                throw appendConflict(expectedTail, tailSeq);
            }
            const entry = this.seal(draft, tail);
            await this.store.append(entry, tailSeq);
            return entry;
        });
    }

    /**
     * The kernel's choke point: appends the entry (retrying tail conflicts with
     * bounded backoff) and applies the mutation before the ledger lock is
     * released. `apply` must be synchronous and must not throw; validation
     * belongs before the call. A draft given as a function is built under the
     * lock against the tail sequence it will follow, and may throw to decline.
     */
    public async record<T>(draft: DraftSource, apply: (entry: LedgerEntry) => T): Promise<{ entry: LedgerEntry, result: T }> {
        const { entry, result } = await this.decide(
            tailSequence => ({ draft: resolveDraft(draft, tailSequence), verdict: null }),
            apply
        );
        return { entry, result };
    }

    /**
     * Like `record`, but the entry is chosen under the ledger lock. Checks
     * made inside `decide` see the state every earlier entry produced, and
     * no other entry can land between the check and the append.
     */
    public async decide<V, T>(
        decide: (tailSequence: number) => Decision<V>,
        apply: (entry: LedgerEntry) => T
    ): Promise<{ entry: LedgerEntry, verdict: V, result: T }> {
        return this.mutex.runExclusive(async () => {
            for (let attempt = 0; ; attempt++) {
                const tail = await this.store.getTail();
                const { draft, verdict } = decide(tail?.sequence ?? 0);
                const entry = this.seal(draft, tail);
                if (!(await this.tryAppend(entry, tail?.sequence ?? 0, attempt))) continue;
                return { entry, verdict, result: apply(entry) };
            }
        });
    }

    /**
     * Like `record`, but `apply` also receives the full history including the
     * new entry, read before the lock is released. Used to rebuild state.
     */
    public async recordWithHistory<T>(
        draft: EntryDraft,
        apply: (entry: LedgerEntry, history: LedgerEntry[]) => T
    ): Promise<{ entry: LedgerEntry, result: T }> {
        return this.mutex.runExclusive(async () => {
            const tail = await this.store.getTail();
            const entry = this.seal(draft, tail);
            await this.store.append(entry, tail?.sequence ?? 0);
            const history = await this.store.getRange(1, entry.sequence);
            return { entry, result: apply(entry, history) };
        });
    }

    public async verifyChain(from: number = 1, to?: number): Promise<ChainVerification> {
        const start = Math.max(1, from);
        const tailSequence = await this.tailSequence();
        const end = Math.min(to ?? tailSequence, tailSequence);
        const entries = await this.store.getRange(start, end);

        let prevHash = GENESIS_HASH;
        if (start > 1) {
            const before = await this.store.getEntry(start - 1);
            if (!before) {
                return { valid: false, checked: 0, from: start, to: end, breakAt: start - 1, reason: 'Missing predecessor entry' };
            }
            prevHash = before.hash;
        }

        let expectedSeq = start;
        let checked = 0;
        for (const entry of entries) {
            const fail = (reason: string): ChainVerification =>
                ({ valid: false, checked, from: start, to: end, breakAt: expectedSeq, reason });

            if (entry.sequence !== expectedSeq) return fail(`Sequence gap: expected ${expectedSeq}, found ${entry.sequence}`);
            if (entry.prevHash !== prevHash) return fail('Chain link mismatch');
            if (digest(entry.payload) !== entry.payloadDigest) return fail('Payload digest mismatch');
            if (computeEntryHash(entry) !== entry.hash) return fail('Entry hash mismatch');

            prevHash = entry.hash;
            expectedSeq++;
            checked++;
        }

        if (checked < end - start + 1) {
            return { valid: false, checked, from: start, to: end, breakAt: expectedSeq, reason: 'Missing entries' };
        }
        return { valid: true, checked, from: start, to: end };
    }

    /**
     * Auditor entry point: chain breaks are surfaced, never healed.
     */
    public async assertChain(from?: number, to?: number): Promise<ChainVerification> {
        const result = await this.verifyChain(from, to);
        if (!result.valid) {
            console.error(`[Ledger] Chain verification failed at ${result.breakAt}: ${result.reason}`);
            throw new KernelError(
                ErrorCode.CHAIN_VERIFICATION_FAILURE,
                `Chain break at sequence ${result.breakAt}: ${result.reason}`,
                { breakAt: result.breakAt }
            );
        }
        return result;
    }

    private async tailSequence(): Promise<number> {
        return (await this.store.getTail())?.sequence ?? 0;
    }

    private async tryAppend(entry: LedgerEntry, expectedTail: number, attempt: number): Promise<boolean> {
        try {
            await this.store.append(entry, expectedTail);
            return true;
        } catch (e: unknown) {
            if (isKernelError(e, ErrorCode.CONCURRENT_APPEND_CONFLICT) && attempt < this.options.maxAppendRetries) {
                console.warn(`[Ledger] Append conflict on attempt ${attempt + 1}: ${e.reason}. Retrying.`);
                await sleep(this.options.retryBackoffMs * 2 ** attempt);
                return false;
            }
            throw e;
        }
    }

    private seal(draft: EntryDraft, tail: LedgerEntry | null): LedgerEntry {
        // Causal order: the tail acts as a logical clock, time never runs backwards.
        const timestamp = Math.max(this.clock.now(), tail?.timestamp ?? 0);
        const payload = freezeDeep(structuredClone(draft.payload));
        const unsigned = {
            sequence: (tail?.sequence ?? 0) + 1,
            prevHash: tail?.hash ?? GENESIS_HASH,
            actor: draft.actor,
            actionKind: draft.actionKind,
            payloadDigest: digest(payload),
            timestamp,
            outcome: draft.outcome ?? 'COMMITTED',
        };
        return Object.freeze({ ...unsigned, payload, hash: computeEntryHash(unsigned) });
    }
}

function freezeDeep<T>(value: T): T {
    if (value !== null && typeof value === 'object') {
        for (const member of Object.values(value)) freezeDeep(member);
        Object.freeze(value);
    }
    return value;
}

export function draft(actor: PrincipalID, actionKind: string, payload: Payload, outcome: EntryOutcome = 'COMMITTED'): EntryDraft {
    return { actor, actionKind, payload, outcome };
}

/**
 * What the kernel hands to callers outside it: reads and verification, no
 * way to append.
 */
export type LedgerReader = Pick<Ledger, 'getTail' | 'getEntry' | 'getRange' | 'verifyChain'>;

export function readOnly(ledger: Ledger): LedgerReader {
    return Object.freeze({
        getTail: () => ledger.getTail(),
        getEntry: (sequence: number) => ledger.getEntry(sequence),
        getRange: (from?: number, to?: number) => ledger.getRange(from, to),
        verifyChain: (from?: number, to?: number) => ledger.verifyChain(from, to),
    });
}
