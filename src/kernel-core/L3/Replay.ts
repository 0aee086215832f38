import { ActionKinds } from '../L0/Ontology.js';
import type { LedgerEntry } from '../L0/Ontology.js';
import { EntryPayloads } from '../L2/Entries.js';
import { genesisState, transition } from '../L2/State.js';
import type { KernelState, StateOptions } from '../L2/State.js';
import { ErrorCode, KernelError } from '../Errors.js';

/**
 * A span of history forked away by a rollback: entries with
 * `after < sequence < before` no longer count, except sticky ones.
 */
export interface ExcludedRange {
    after: number;
    before: number;
    checkpointId: string;
}

/**
 * Entry kinds that survive a rollback. Registrations, lifecycle decisions
 * and the Guardian's own records are facts about the world, not state the
 * rollback is meant to undo.
 */
export const STICKY_KINDS: ReadonlySet<string> = new Set([
    ActionKinds.AGENT_REGISTER,
    ActionKinds.PRINCIPAL_REGISTER,
    ActionKinds.CONFLICT_RESOLVED,
    ActionKinds.GUARDIAN_BLOCKED,
    ActionKinds.QUARANTINE,
    ActionKinds.RELEASE,
    ActionKinds.TERMINATE,
    ActionKinds.REVIEW_FLAGGED,
    ActionKinds.REVIEW_CLEARED,
    ActionKinds.REVIEW_ESCALATED,
    ActionKinds.CHECKPOINT,
    ActionKinds.ROLLBACK,
]);

export function excludedRanges(history: readonly LedgerEntry[]): ExcludedRange[] {
    const ranges: ExcludedRange[] = [];
    for (const entry of history) {
        if (entry.actionKind !== ActionKinds.ROLLBACK) continue;
        const parsed = EntryPayloads[ActionKinds.ROLLBACK].safeParse(entry.payload);
        if (!parsed.success) {
            throw new KernelError(ErrorCode.REPLAY_FAILURE, `Malformed rollback at sequence ${entry.sequence}`, { ledgerRef: entry.sequence });
        }
        ranges.push({ after: parsed.data.sequence, before: entry.sequence, checkpointId: parsed.data.checkpointId });
    }
    return ranges;
}

export function isExcluded(sequence: number, ranges: readonly ExcludedRange[]): boolean {
    return ranges.some(r => sequence > r.after && sequence < r.before);
}

export class ReplayEngine {
    constructor(private readonly options: StateOptions) { }

    /**
     * Folds the ledger into kernel state with the same transition function
     * the live kernel uses. History must start at sequence 1.
     */
    public rebuild(history: readonly LedgerEntry[]): KernelState {
        const ranges = excludedRanges(history);
        let state = genesisState(this.options.initialMode);
        let skipped = 0;

        for (const entry of history) {
            if (entry.sequence !== state.lastSequence + 1 + skipped) {
                throw new KernelError(
                    ErrorCode.REPLAY_FAILURE,
                    `Replay gap: expected sequence ${state.lastSequence + 1 + skipped}, found ${entry.sequence}`,
                    { ledgerRef: entry.sequence }
                );
            }
            if (!STICKY_KINDS.has(entry.actionKind) && isExcluded(entry.sequence, ranges)) {
                skipped++;
                continue;
            }
            state = transition(state, entry, this.options);
            skipped = 0;
        }

        const last = history[history.length - 1];
        if (last && last.sequence !== state.lastSequence) {
            state = { ...state, lastSequence: last.sequence };
        }
        if (history.length > 0) {
            console.log(`[ReplayEngine] Rebuilt state from ${history.length} entries (${ranges.length} rollback(s)).`);
        }
        return state;
    }
}
