/**
 * KERNEL ONTOLOGY
 * The single source of truth for the primitives shared by the Ledger,
 * Budget Register, Arbiter and Guardian.
 */

// --- 1. Principals & Agents ---
export type PrincipalID = string;
export type AgentID = PrincipalID;

export const AGENT_TYPES = ['PERCEPTION', 'TASK', 'REFLEX', 'ADAPTATION'] as const;
export type AgentType = typeof AGENT_TYPES[number];

export type AgentStatus = 'ACTIVE' | 'QUARANTINED' | 'TERMINATED';

export const PRINCIPAL_ROLES = ['AGENT', 'OPERATOR', 'AUDITOR'] as const;
export type PrincipalRole = typeof PRINCIPAL_ROLES[number];

export interface Principal {
    id: PrincipalID;
    role: PrincipalRole;
    capabilities: string[];
}

export interface Agent {
    id: AgentID;
    type: AgentType;
    status: AgentStatus;
    registeredAt: number;
}

// --- 2. Ledger ---
export type EntryOutcome = 'INTENT' | 'COMMITTED' | 'FAILED';

export type Payload = Record<string, unknown>;

export interface LedgerEntry {
    sequence: number;
    hash: string;
    prevHash: string;
    actor: PrincipalID;
    actionKind: string;
    payload: Payload;
    payloadDigest: string;
    timestamp: number; // epoch ms
    outcome: EntryOutcome;
}

export interface EntryDraft {
    actor: PrincipalID;
    actionKind: string;
    payload: Payload;
    outcome?: EntryOutcome;
}

// --- 3. Budget ---
export interface BudgetAccount {
    agentId: AgentID;
    allocated: number;
    consumed: number;
    byKind: Record<string, number>;
}

// --- 4. Mode ---
export const MODES = ['OBSERVE', 'ALERT', 'ACT', 'DEFEND'] as const;
export type Mode = typeof MODES[number];

export interface ModeState {
    mode: Mode;
    enteredAt: number;
    transitions: number[]; // timestamps of approved transitions
}

export type Resolution = 'PENDING' | 'APPROVED' | 'DENIED';

export interface ModeChangeRequest {
    id: string;
    requester: PrincipalID;
    fromMode: Mode;
    targetMode: Mode;
    justification: string;
    submittedAt: number;
    resolution: Resolution;
    resolver: PrincipalID;
    reason?: string;
    code?: string;
    ledgerRef?: number;
}

// --- 5. Guardian ---
export type QuarantineStatus = 'ACTIVE' | 'RELEASED' | 'ESCALATED';

export interface QuarantineRecord {
    agentId: AgentID;
    rule: string;
    reason: string;
    createdAt: number;
    status: QuarantineStatus;
    releasedBy?: PrincipalID;
    releasedAt?: number;
    ledgerRef: number;
}

export interface Checkpoint {
    id: string;
    sequence: number;
    createdBy: PrincipalID;
    createdAt: number;
    description: string;
}

export type SignalKind =
    | 'VELOCITY_ANOMALY'
    | 'MODE_DENIED'
    | 'MODE_APPROVED'
    | 'ACTION_FAILED'
    | 'ACTION_SUCCEEDED'
    | 'REVIEW_EXPIRED';

export interface Signal {
    kind: SignalKind;
    source: 'BUDGET' | 'ARBITER' | 'RUNTIME' | 'GUARDIAN';
    detail: string;
    at: number;
    ledgerRef?: number;
}

export type ReviewStatus = 'OPEN' | 'CLEARED' | 'ESCALATED';

export interface ReviewFlag {
    id: string;
    agentId: AgentID;
    ruleId: string;
    actionKind: string;
    flaggedAt: number;
    deadline: number;
    status: ReviewStatus;
    ledgerRef: number;
}

// --- 6. Ledger action kinds ---
export const ActionKinds = {
    AGENT_REGISTER: 'agent.register',
    PRINCIPAL_REGISTER: 'principal.register',
    ACTION_INTENT: 'action.intent',
    ACTION_OUTCOME: 'action.outcome',
    BUDGET_ALLOCATE: 'budget.allocate',
    BUDGET_DEBIT: 'budget.debit',
    MODE_REQUEST: 'mode.request',
    MODE_TRANSITION: 'mode.transition',
    MODE_DENIED: 'mode.denied',
    CONFLICT_RESOLVED: 'arbiter.conflict',
    GUARDIAN_BLOCKED: 'guardian.blocked',
    QUARANTINE: 'guardian.quarantine',
    RELEASE: 'guardian.release',
    TERMINATE: 'guardian.terminate',
    REVIEW_FLAGGED: 'guardian.review.flagged',
    REVIEW_CLEARED: 'guardian.review.cleared',
    REVIEW_ESCALATED: 'guardian.review.escalated',
    CHECKPOINT: 'guardian.checkpoint',
    ROLLBACK: 'guardian.rollback',
} as const;

export type KernelActionKind = typeof ActionKinds[keyof typeof ActionKinds];
