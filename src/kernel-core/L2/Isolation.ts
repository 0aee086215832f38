import { LifecycleGuard } from '../L0/Guards.js';
import type { AgentID, EntryDraft, LedgerEntry } from '../L0/Ontology.js';
import { ActionKinds } from '../L0/Ontology.js';
import { ErrorCode, KernelError } from '../Errors.js';
import type { Rejection } from '../Errors.js';
import type { Ledger } from '../L5/Ledger.js';
import { EntryPayloads, entry } from './Entries.js';
import type { StateModel } from './State.js';

/**
 * Early isolation check for agent-facing operations. Quarantined and
 * terminated agents are stopped here, before any cost or mode logic runs;
 * the blocked attempt itself is recorded so it stays visible. Operations
 * that commit agent effects repeat the check inside their ledger decision
 * through `blockedDraft`.
 */
export async function checkIsolation(
    ledger: Ledger,
    state: StateModel,
    agentId: AgentID,
    operation: string
): Promise<Rejection | null> {
    const unknown = unknownAgent(state, agentId);
    if (unknown) return unknown;
    const blocked = blockedDraft(state, agentId, operation);
    if (blocked === null) return null;

    const { entry: recorded } = await ledger.record(blocked, e => state.applyTrusted(e));
    return blockedRejection(recorded);
}

/**
 * Unknown callers have no agent record to attach an attempt to. Agent
 * registrations survive rollback, so this answer never goes stale.
 */
export function unknownAgent(state: StateModel, agentId: AgentID): Rejection | null {
    if (state.getAgent(agentId)) return null;
    const result = LifecycleGuard({ agentId, agent: undefined });
    return result.ok ? null : { code: result.code, reason: result.violation };
}

/**
 * Draft recording a blocked attempt, or null when the agent may proceed.
 * Only meaningful inside a ledger decision, where state cannot move.
 */
export function blockedDraft(state: StateModel, agentId: AgentID, operation: string): EntryDraft | null {
    const result = LifecycleGuard({ agentId, agent: state.getAgent(agentId) });
    if (result.ok) return null;
    return entry(agentId, 'guardian.blocked', { agentId, operation, code: result.code, reason: result.violation }, 'FAILED');
}

export function blockedRejection(recorded: LedgerEntry): Rejection {
    const parsed = EntryPayloads[ActionKinds.GUARDIAN_BLOCKED].safeParse(recorded.payload);
    if (!parsed.success) {
        throw new KernelError(ErrorCode.REPLAY_FAILURE, `Malformed blocked entry at sequence ${recorded.sequence}`, { ledgerRef: recorded.sequence });
    }
    return { code: parsed.data.code, reason: parsed.data.reason, ledgerRef: recorded.sequence };
}
