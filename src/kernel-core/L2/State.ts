import { produce } from 'immer';
import { z } from 'zod';
import type { Draft } from 'immer';
import type {
    Agent, AgentID, BudgetAccount, Checkpoint, LedgerEntry, ModeChangeRequest, ModeState,
    Mode, Principal, PrincipalID, PrincipalRole, QuarantineRecord, ReviewFlag
} from '../L0/Ontology.js';
import { ActionKinds } from '../L0/Ontology.js';
import { EntryPayloads, isEntryKind } from './Entries.js';
import type { EntryKind } from './Entries.js';
import { ErrorCode, KernelError } from '../Errors.js';

export interface ConflictRecord {
    conflictType: string;
    agents: AgentID[];
    resolution: string;
    resolvedBy: PrincipalID;
    ledgerRef: number;
}

export interface OpenIntent {
    actor: PrincipalID;
    actionKind: string;
    ledgerRef: number;
}

export interface KernelState {
    principals: Record<PrincipalID, Principal>;
    agents: Record<AgentID, Agent>;
    accounts: Record<AgentID, BudgetAccount>;
    mode: ModeState;
    requests: ModeChangeRequest[];
    quarantines: Record<AgentID, QuarantineRecord>;
    checkpoints: Record<string, Checkpoint>;
    activeCheckpoint: string | null;
    reviews: Record<string, ReviewFlag>;
    conflicts: ConflictRecord[];
    intents: Record<number, OpenIntent>;
    lastSequence: number;
}

export interface StateOptions {
    initialMode: Mode;
    thrashWindowMs: number;
    roleCapabilities: Partial<Record<PrincipalRole, string[]>>;
}

export function genesisState(initialMode: Mode = 'OBSERVE'): KernelState {
    return {
        principals: {},
        agents: {},
        accounts: {},
        mode: { mode: initialMode, enteredAt: 0, transitions: [] },
        requests: [],
        quarantines: {},
        checkpoints: {},
        activeCheckpoint: null,
        reviews: {},
        conflicts: [],
        intents: {},
        lastSequence: 0,
    };
}

function read<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, entry: LedgerEntry): T {
    const parsed = schema.safeParse(entry.payload);
    if (!parsed.success) {
        throw new KernelError(
            ErrorCode.REPLAY_FAILURE,
            `Malformed ${entry.actionKind} payload at sequence ${entry.sequence}: ${parsed.error.message}`,
            { ledgerRef: entry.sequence }
        );
    }
    return parsed.data;
}

/**
 * The kernel's state transition function. Every change to budgets, mode,
 * agent status, quarantines and checkpoints is the image of one ledger entry
 * under this function; nothing else writes KernelState.
 */
export function transition(state: KernelState, entry: LedgerEntry, options: StateOptions): KernelState {
    return produce(state, draft => {
        draft.lastSequence = entry.sequence;
        if (!isEntryKind(entry.actionKind)) return;
        applyEntry(draft, entry.actionKind, entry, options);
    });
}

function applyEntry(draft: Draft<KernelState>, kind: EntryKind, entry: LedgerEntry, options: StateOptions): void {
    const committed = entry.outcome === 'COMMITTED';

    switch (kind) {
        case ActionKinds.PRINCIPAL_REGISTER: {
            const p = read(EntryPayloads[kind], entry);
            draft.principals[p.principalId] = {
                id: p.principalId,
                role: p.role,
                capabilities: [...(options.roleCapabilities[p.role] ?? []), ...p.capabilities],
            };
            return;
        }
        case ActionKinds.AGENT_REGISTER: {
            const p = read(EntryPayloads[kind], entry);
            draft.principals[p.agentId] = { id: p.agentId, role: 'AGENT', capabilities: [...(options.roleCapabilities.AGENT ?? [])] };
            draft.agents[p.agentId] = { id: p.agentId, type: p.type, status: 'ACTIVE', registeredAt: entry.timestamp };
            draft.accounts[p.agentId] = { agentId: p.agentId, allocated: 0, consumed: 0, byKind: {} };
            return;
        }
        case ActionKinds.BUDGET_ALLOCATE: {
            const p = read(EntryPayloads[kind], entry);
            const account = draft.accounts[p.agentId];
            if (committed && account) account.allocated += p.amount;
            return;
        }
        case ActionKinds.BUDGET_DEBIT: {
            const p = read(EntryPayloads[kind], entry);
            const account = draft.accounts[p.agentId];
            if (!committed || !account) return;
            account.consumed += p.amount;
            const kindKey = p.actionKind ?? 'unspecified';
            account.byKind[kindKey] = (account.byKind[kindKey] ?? 0) + p.amount;
            return;
        }
        case ActionKinds.ACTION_INTENT: {
            const p = read(EntryPayloads[kind], entry);
            draft.intents[entry.sequence] = { actor: entry.actor, actionKind: p.actionKind, ledgerRef: entry.sequence };
            return;
        }
        case ActionKinds.ACTION_OUTCOME: {
            const p = read(EntryPayloads[kind], entry);
            delete draft.intents[p.intentRef];
            return;
        }
        case ActionKinds.MODE_TRANSITION: {
            const p = read(EntryPayloads[kind], entry);
            const horizon = entry.timestamp - options.thrashWindowMs;
            draft.mode.transitions = draft.mode.transitions.filter(t => t > horizon);
            draft.mode.transitions.push(entry.timestamp);
            draft.mode.mode = p.targetMode;
            draft.mode.enteredAt = entry.timestamp;
            draft.requests.push({ ...p, ledgerRef: entry.sequence });
            return;
        }
        case ActionKinds.MODE_DENIED: {
            const p = read(EntryPayloads[kind], entry);
            draft.requests.push({ ...p, ledgerRef: entry.sequence });
            return;
        }
        case ActionKinds.CONFLICT_RESOLVED: {
            const p = read(EntryPayloads[kind], entry);
            draft.conflicts.push({ ...p, resolvedBy: entry.actor, ledgerRef: entry.sequence });
            return;
        }
        case ActionKinds.GUARDIAN_BLOCKED:
            return;
        case ActionKinds.QUARANTINE: {
            const p = read(EntryPayloads[kind], entry);
            const agent = draft.agents[p.agentId];
            if (!agent || agent.status === 'TERMINATED') return;
            agent.status = 'QUARANTINED';
            draft.quarantines[p.agentId] = {
                agentId: p.agentId,
                rule: p.rule,
                reason: p.reason,
                createdAt: entry.timestamp,
                status: 'ACTIVE',
                ledgerRef: entry.sequence,
            };
            return;
        }
        case ActionKinds.RELEASE: {
            const p = read(EntryPayloads[kind], entry);
            const agent = draft.agents[p.agentId];
            const record = draft.quarantines[p.agentId];
            if (!agent || agent.status !== 'QUARANTINED') return;
            agent.status = 'ACTIVE';
            if (record) {
                record.status = 'RELEASED';
                record.releasedBy = entry.actor;
                record.releasedAt = entry.timestamp;
            }
            return;
        }
        case ActionKinds.TERMINATE: {
            const p = read(EntryPayloads[kind], entry);
            const agent = draft.agents[p.agentId];
            if (!agent) return;
            agent.status = 'TERMINATED';
            const record = draft.quarantines[p.agentId];
            if (record && record.status === 'ACTIVE') record.status = 'ESCALATED';
            return;
        }
        case ActionKinds.REVIEW_FLAGGED: {
            const p = read(EntryPayloads[kind], entry);
            draft.reviews[p.reviewId] = {
                id: p.reviewId,
                agentId: p.agentId,
                ruleId: p.ruleId,
                actionKind: p.actionKind,
                flaggedAt: entry.timestamp,
                deadline: p.deadline,
                status: 'OPEN',
                ledgerRef: entry.sequence,
            };
            return;
        }
        case ActionKinds.REVIEW_CLEARED: {
            const p = read(EntryPayloads[kind], entry);
            const review = draft.reviews[p.reviewId];
            if (review && review.status === 'OPEN') review.status = 'CLEARED';
            return;
        }
        case ActionKinds.REVIEW_ESCALATED: {
            const p = read(EntryPayloads[kind], entry);
            const review = draft.reviews[p.reviewId];
            if (review && review.status === 'OPEN') review.status = 'ESCALATED';
            return;
        }
        case ActionKinds.CHECKPOINT: {
            const p = read(EntryPayloads[kind], entry);
            draft.checkpoints[p.checkpointId] = {
                id: p.checkpointId,
                sequence: p.sequence,
                createdBy: entry.actor,
                createdAt: entry.timestamp,
                description: p.description,
            };
            return;
        }
        case ActionKinds.ROLLBACK: {
            const p = read(EntryPayloads[kind], entry);
            draft.activeCheckpoint = p.checkpointId;
            return;
        }
    }
}

/**
 * Owner of the live KernelState. `applyTrusted` is the only writer and it
 * requires the ledger entry that justifies the change.
 */
export class StateModel {
    private current: KernelState;

    constructor(private readonly options: StateOptions) {
        this.current = genesisState(options.initialMode);
    }

    public get snapshot(): KernelState {
        return this.current;
    }

    public get Options(): StateOptions {
        return this.options;
    }

    public applyTrusted(entry: LedgerEntry): KernelState {
        if (entry.sequence <= this.current.lastSequence) {
            throw new KernelError(
                ErrorCode.REPLAY_FAILURE,
                `Out-of-order entry ${entry.sequence}; state already at ${this.current.lastSequence}`,
                { ledgerRef: entry.sequence }
            );
        }
        this.current = transition(this.current, entry, this.options);
        return this.current;
    }

    /**
     * Swaps in a state rebuilt by replay (boot or rollback).
     */
    public restore(state: KernelState): void {
        this.current = state;
    }

    public getAgent(id: AgentID): Agent | undefined {
        return this.current.agents[id];
    }

    public getPrincipal(id: PrincipalID): Principal | undefined {
        return this.current.principals[id];
    }

    public getAccount(id: AgentID): BudgetAccount | undefined {
        return this.current.accounts[id];
    }
}
