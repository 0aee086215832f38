import { z } from 'zod';
import { AGENT_TYPES, ActionKinds, MODES, PRINCIPAL_ROLES } from '../L0/Ontology.js';
import type { EntryDraft, EntryOutcome, PrincipalID } from '../L0/Ontology.js';
import { ErrorCode } from '../Errors.js';

/**
 * Payload shapes of the ledger entries that change kernel state. The state
 * transition function only ever reads payloads through these schemas, so a
 * malformed stored entry fails replay instead of corrupting state.
 */
const agentRef = { agentId: z.string().min(1) };

export const ModeChangeRequestSchema = z.object({
    id: z.string(),
    requester: z.string(),
    fromMode: z.enum(MODES),
    targetMode: z.enum(MODES),
    justification: z.string(),
    submittedAt: z.number(),
    resolution: z.enum(['PENDING', 'APPROVED', 'DENIED']),
    resolver: z.string(),
    reason: z.string().optional(),
    code: z.string().optional(),
});

export const EntryPayloads = {
    [ActionKinds.PRINCIPAL_REGISTER]: z.object({
        principalId: z.string().min(1),
        role: z.enum(PRINCIPAL_ROLES),
        capabilities: z.array(z.string()).default([]),
    }),
    [ActionKinds.AGENT_REGISTER]: z.object({ ...agentRef, type: z.enum(AGENT_TYPES) }),
    [ActionKinds.BUDGET_ALLOCATE]: z.object({ ...agentRef, amount: z.number().finite().positive() }),
    [ActionKinds.BUDGET_DEBIT]: z.object({
        ...agentRef,
        amount: z.number().finite().positive(),
        actionKind: z.string().optional(),
        remaining: z.number(),
        reason: z.string().optional(),
    }),
    [ActionKinds.ACTION_INTENT]: z.object({
        actionKind: z.string().min(1),
        payload: z.record(z.unknown()),
    }),
    [ActionKinds.ACTION_OUTCOME]: z.object({
        intentRef: z.number().int().positive(),
        status: z.enum(['SUCCEEDED', 'FAILED']),
        result: z.record(z.unknown()).default({}),
    }),
    [ActionKinds.MODE_TRANSITION]: ModeChangeRequestSchema,
    [ActionKinds.MODE_DENIED]: ModeChangeRequestSchema,
    [ActionKinds.CONFLICT_RESOLVED]: z.object({
        conflictType: z.string().min(1),
        agents: z.array(z.string()),
        resolution: z.string().min(1),
    }),
    [ActionKinds.GUARDIAN_BLOCKED]: z.object({
        ...agentRef,
        operation: z.string(),
        code: z.nativeEnum(ErrorCode),
        reason: z.string(),
    }),
    [ActionKinds.QUARANTINE]: z.object({ ...agentRef, rule: z.string(), reason: z.string() }),
    [ActionKinds.RELEASE]: z.object({ ...agentRef, reason: z.string().default('manual release') }),
    [ActionKinds.TERMINATE]: z.object({ ...agentRef, reason: z.string() }),
    [ActionKinds.REVIEW_FLAGGED]: z.object({
        ...agentRef,
        reviewId: z.string(),
        ruleId: z.string(),
        actionKind: z.string(),
        deadline: z.number(),
    }),
    [ActionKinds.REVIEW_CLEARED]: z.object({ ...agentRef, reviewId: z.string() }),
    [ActionKinds.REVIEW_ESCALATED]: z.object({ ...agentRef, reviewId: z.string(), reason: z.string() }),
    [ActionKinds.CHECKPOINT]: z.object({
        checkpointId: z.string(),
        sequence: z.number().int().nonnegative(),
        description: z.string(),
    }),
    [ActionKinds.ROLLBACK]: z.object({
        checkpointId: z.string(),
        sequence: z.number().int().nonnegative(),
        reason: z.string().default(''),
    }),
} as const;

export type EntryKind = keyof typeof EntryPayloads;
export type EntryPayload<K extends EntryKind> = z.infer<typeof EntryPayloads[K]>;
export type EntryPayloadInput<K extends EntryKind> = z.input<typeof EntryPayloads[K]>;

export function isEntryKind(kind: string): kind is EntryKind {
    return Object.prototype.hasOwnProperty.call(EntryPayloads, kind);
}

/**
 * Typed draft constructor: payloads are validated before they reach the ledger.
 */
export function entry<K extends EntryKind>(
    actor: PrincipalID,
    kind: K,
    payload: EntryPayloadInput<K>,
    outcome: EntryOutcome = 'COMMITTED'
): EntryDraft {
    const parsed: Record<string, unknown> = EntryPayloads[kind].parse(payload);
    return { actor, actionKind: kind, payload: parsed, outcome };
}
