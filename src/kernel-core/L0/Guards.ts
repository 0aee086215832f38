// src/kernel-core/L0/Guards.ts
import type { Agent, BudgetAccount, Mode, Principal } from './Ontology.js';
import { ErrorCode } from '../Errors.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: ErrorCode; violation: string };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, violation: string): GuardResult => ({ ok: false, code, violation });

/**
 * Runs guards in order and returns the first failure.
 */
export function firstFailure(...results: Array<() => GuardResult>): GuardResult {
    for (const check of results) {
        const result = check();
        if (!result.ok) return result;
    }
    return OK;
}

// --- Capabilities ---
export class CapabilitySet {
    constructor(public readonly all: readonly string[] = []) { }

    public has(cap: string): boolean {
        if (this.all.includes('*')) return true;
        return this.all.includes(cap) || this.all.some(c => cap.startsWith(c + '.'));
    }
}

// --- Concrete Guards ---

// 1. Lifecycle (structural isolation: runs before any cost or mode logic)
export const LifecycleGuard: Guard<{ agentId: string, agent: Agent | undefined }> = ({ agentId, agent }) => {
    if (!agent) return FAIL(ErrorCode.UNKNOWN_AGENT, `Agent ${agentId} is not registered`);
    if (agent.status === 'TERMINATED') return FAIL(ErrorCode.AGENT_TERMINATED, `Agent ${agentId} has been terminated`);
    if (agent.status === 'QUARANTINED') return FAIL(ErrorCode.AGENT_QUARANTINED, `Agent ${agentId} is quarantined`);
    return OK;
};

// 2. Privilege (the single "does this caller hold it" check)
export const PrivilegeGuard: Guard<{ principalId: string, principal: Principal | undefined, privilege: string | null }> = ({ principalId, principal, privilege }) => {
    if (privilege === null) return OK;
    if (!principal) return FAIL(ErrorCode.UNKNOWN_PRINCIPAL, `Principal ${principalId} is not registered`);
    if (!new CapabilitySet(principal.capabilities).has(privilege)) {
        return FAIL(ErrorCode.PRIVILEGE_REQUIRED, `Principal ${principalId} lacks privilege ${privilege}`);
    }
    return OK;
};

// 3. Amount (finite, strictly positive)
export const AmountGuard: Guard<{ amount: number }> = ({ amount }) => {
    if (typeof amount !== 'number' || !Number.isFinite(amount) || amount <= 0) {
        return FAIL(ErrorCode.INVALID_AMOUNT, `Amount must be a finite positive number, got ${String(amount)}`);
    }
    return OK;
};

// 4. Budget (Fiscal Law)
export const BudgetGuard: Guard<{ account: BudgetAccount, amount: number }> = ({ account, amount }) => {
    const remaining = account.allocated - account.consumed;
    if (remaining < amount) {
        return FAIL(ErrorCode.INSUFFICIENT_BUDGET, `Agent ${account.agentId} has ${remaining} remaining, ${amount} required`);
    }
    return OK;
};

// 5. Transition table
export const TRANSITIONS: Readonly<Record<Mode, readonly Mode[]>> = {
    OBSERVE: ['ALERT', 'DEFEND'],
    ALERT: ['OBSERVE', 'ACT', 'DEFEND'],
    ACT: ['OBSERVE', 'DEFEND'],
    DEFEND: ['OBSERVE'],
};

export const TransitionGuard: Guard<{ from: Mode, to: Mode }> = ({ from, to }) => {
    if (!TRANSITIONS[from].includes(to)) {
        return FAIL(ErrorCode.INVALID_TRANSITION, `Cannot transition from ${from} to ${to}`);
    }
    return OK;
};

// 6. Anti-thrash window (Defend is always reachable)
export const ThrashGuard: Guard<{ to: Mode, transitionsInWindow: number, maxTransitions: number, windowMs: number }> = ({ to, transitionsInWindow, maxTransitions, windowMs }) => {
    if (to !== 'DEFEND' && transitionsInWindow + 1 > maxTransitions) {
        return FAIL(
            ErrorCode.ARBITRATION_DENIED,
            `Anti-thrash: ${transitionsInWindow} transitions within ${windowMs}ms (limit ${maxTransitions}); only DEFEND may be requested until the window clears`
        );
    }
    return OK;
};
