import { z } from 'zod';
import { MODES, PRINCIPAL_ROLES } from './Ontology.js';

/**
 * Capability strings checked by the kernel's privileged operations.
 * Capability sets use prefix semantics: holding `MODE` covers `MODE.DEFEND`.
 */
export const Privileges = {
    PRINCIPAL_REGISTER: 'PRINCIPAL.REGISTER',
    AGENT_REGISTER: 'AGENT.REGISTER',
    AGENT_QUARANTINE: 'AGENT.QUARANTINE',
    AGENT_RELEASE: 'AGENT.RELEASE',
    AGENT_TERMINATE: 'AGENT.TERMINATE',
    BUDGET_ALLOCATE: 'BUDGET.ALLOCATE',
    MODE_ESCALATE: 'MODE.ESCALATE',
    MODE_DEFEND: 'MODE.DEFEND',
    MODE_RECOVER: 'MODE.RECOVER',
    CHECKPOINT_CREATE: 'CHECKPOINT.CREATE',
    CHECKPOINT_ROLLBACK: 'CHECKPOINT.ROLLBACK',
    ARBITER_RESOLVE: 'ARBITER.RESOLVE',
    LEDGER_READ: 'LEDGER.READ',
    LEDGER_VERIFY: 'LEDGER.VERIFY',
} as const;

export type Privilege = typeof Privileges[keyof typeof Privileges];

const SignalKindSchema = z.enum(['VELOCITY_ANOMALY', 'MODE_DENIED', 'ACTION_FAILED', 'REVIEW_EXPIRED']);

export const GuardianRuleSchema = z.object({
    id: z.string().min(1),
    signal: SignalKindSchema,
    threshold: z.number().int().positive(),
    action: z.enum(['QUARANTINE', 'TERMINATE']).default('QUARANTINE'),
});

const privilegeOrNone = z.string().min(1).nullable();

export const KernelPolicySchema = z.object({
    initialMode: z.enum(MODES).default('OBSERVE'),
    costTable: z.record(z.string().min(1), z.number().finite().nonnegative()).default({
        'sensor.read': 1,
        'task.execute': 5,
        'reflex.trigger': 2,
        'model.adapt': 10,
        'mode.request': 0,
    }),
    velocity: z.object({
        windowMs: z.number().int().positive().default(3000),
        maxDebits: z.number().int().positive().default(4),
    }).default({}),
    thrash: z.object({
        windowMs: z.number().int().positive().default(60_000),
        maxTransitions: z.number().int().positive().default(3),
    }).default({}),
    modePrivileges: z.object({
        OBSERVE: privilegeOrNone.default(null),
        ALERT: privilegeOrNone.default(null),
        ACT: privilegeOrNone.default(Privileges.MODE_ESCALATE),
        DEFEND: privilegeOrNone.default(Privileges.MODE_DEFEND),
    }).default({}),
    recoveryPrivilege: z.string().min(1).default(Privileges.MODE_RECOVER),
    roles: z.record(z.enum(PRINCIPAL_ROLES), z.array(z.string().min(1))).default({
        AGENT: [],
        OPERATOR: ['PRINCIPAL', 'AGENT', 'BUDGET', 'MODE', 'CHECKPOINT', 'ARBITER', 'LEDGER'],
        AUDITOR: ['LEDGER'],
    }),
    guardian: z.object({
        evaluationBudgetMs: z.number().int().positive().default(50),
        reviewDeadlineMs: z.number().int().positive().default(30_000),
        sweepIntervalMs: z.number().int().positive().default(1000),
        rules: z.array(GuardianRuleSchema).default([
            { id: 'velocity-anomaly', signal: 'VELOCITY_ANOMALY', threshold: 1, action: 'QUARANTINE' },
            { id: 'repeated-mode-denials', signal: 'MODE_DENIED', threshold: 3, action: 'QUARANTINE' },
            { id: 'repeated-action-failures', signal: 'ACTION_FAILED', threshold: 3, action: 'QUARANTINE' },
            { id: 'review-expired', signal: 'REVIEW_EXPIRED', threshold: 1, action: 'QUARANTINE' },
        ]),
    }).default({}),
    ledger: z.object({
        maxAppendRetries: z.number().int().nonnegative().default(5),
        retryBackoffMs: z.number().int().nonnegative().default(5),
    }).default({}),
});

export type KernelPolicy = z.infer<typeof KernelPolicySchema>;
export type KernelPolicyInput = z.input<typeof KernelPolicySchema>;
export type GuardianRule = z.infer<typeof GuardianRuleSchema>;

export function definePolicy(input: KernelPolicyInput = {}): KernelPolicy {
    return KernelPolicySchema.parse(input);
}
