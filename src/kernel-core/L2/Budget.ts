import { AmountGuard, BudgetGuard } from '../L0/Guards.js';
import { KeyedMutex } from '../L0/Mutex.js';
import type { AgentID, BudgetAccount, PrincipalID, Signal } from '../L0/Ontology.js';
import type { KernelPolicy } from '../L0/Policy.js';
import { Privileges } from '../L0/Policy.js';
import type { AuthorityEngine } from '../L1/Authority.js';
import type { Decision, Ledger } from '../L5/Ledger.js';
import { ErrorCode, KernelError } from '../Errors.js';
import type { Rejection } from '../Errors.js';
import { entry } from './Entries.js';
import { blockedDraft, blockedRejection, unknownAgent } from './Isolation.js';
import type { StateModel } from './State.js';

export type DebitResult =
    | { accepted: true; remaining: number; ledgerRef: number }
    | { accepted: false; remaining: number; rejection: Rejection };

export interface BudgetSummary {
    agentId: AgentID;
    allocated: number;
    consumed: number;
    remaining: number;
    byKind: Record<string, number>;
}

export type SignalListener = (agentId: AgentID, signal: Signal) => void | Promise<void>;

type DebitVerdict =
    | { kind: 'blocked' }
    | { kind: 'refused'; code: ErrorCode; reason: string }
    | { kind: 'committed' };

function remainingIn(account: BudgetAccount | undefined): number {
    return account ? account.allocated - account.consumed : 0;
}

type BudgetPolicy = Pick<KernelPolicy, 'costTable' | 'velocity'>;

/**
 * Budget Register: no action executes unless it is paid for.
 *
 * Debits are serialized per agent (distinct agents never wait on each other)
 * and each accepted debit is applied in the same ledger step that records it.
 */
export class BudgetRegister {
    private readonly locks = new KeyedMutex();
    private readonly attempts: Map<AgentID, number[]> = new Map();
    private readonly listeners: SignalListener[] = [];

    constructor(
        private readonly ledger: Ledger,
        private readonly state: StateModel,
        private readonly authority: AuthorityEngine,
        private readonly policy: BudgetPolicy
    ) { }

    public onSignal(listener: SignalListener): void {
        this.listeners.push(listener);
    }

    public quote(actionKind: string): number {
        const cost = Object.prototype.hasOwnProperty.call(this.policy.costTable, actionKind)
            ? this.policy.costTable[actionKind]
            : undefined;
        if (cost === undefined) {
            throw new KernelError(ErrorCode.UNKNOWN_ACTION_KIND, `No cost configured for action kind '${actionKind}'`, { actionKind });
        }
        return cost;
    }

    public async debit(agentId: AgentID, amount: number, actionKind?: string): Promise<DebitResult> {
        const amountCheck = AmountGuard({ amount });
        if (!amountCheck.ok) {
            return { accepted: false, remaining: this.remaining(agentId), rejection: { code: amountCheck.code, reason: amountCheck.violation } };
        }

        const unknown = unknownAgent(this.state, agentId);
        if (unknown) return { accepted: false, remaining: 0, rejection: unknown };

        const { result, metered } = await this.locks.runExclusive(agentId, async (): Promise<{ result: DebitResult, metered: boolean }> => {
            const { entry: recorded, verdict, result: after } = await this.ledger.decide(
                () => this.assess(agentId, amount, actionKind),
                e => this.state.applyTrusted(e)
            );
            const remaining = remainingIn(after.accounts[agentId]);
            switch (verdict.kind) {
                case 'blocked':
                    return { result: { accepted: false, remaining, rejection: blockedRejection(recorded) }, metered: false };
                case 'refused':
                    return {
                        result: { accepted: false, remaining, rejection: { code: verdict.code, reason: verdict.reason, ledgerRef: recorded.sequence } },
                        metered: true,
                    };
                case 'committed':
                    return { result: { accepted: true, remaining, ledgerRef: recorded.sequence }, metered: true };
            }
        });

        if (metered) {
            await this.trackVelocity(agentId, result.accepted ? result.ledgerRef : result.rejection.ledgerRef);
        }
        return result;
    }

    public async allocate(authorizer: PrincipalID, agentId: AgentID, amount: number): Promise<BudgetSummary> {
        this.authority.require(authorizer, Privileges.BUDGET_ALLOCATE);
        const amountCheck = AmountGuard({ amount });
        if (!amountCheck.ok) throw new KernelError(amountCheck.code, amountCheck.violation);

        return this.locks.runExclusive(agentId, async () => {
            await this.ledger.record(
                () => {
                    const agent = this.state.getAgent(agentId);
                    if (!agent) throw new KernelError(ErrorCode.UNKNOWN_AGENT, `Agent ${agentId} is not registered`);
                    if (agent.status === 'TERMINATED') {
                        throw new KernelError(ErrorCode.AGENT_TERMINATED, `Agent ${agentId} has been terminated`);
                    }
                    return entry(authorizer, 'budget.allocate', { agentId, amount });
                },
                e => this.state.applyTrusted(e)
            );
            return this.summary(agentId);
        });
    }

    public summary(agentId: AgentID): BudgetSummary {
        const account = this.state.getAccount(agentId);
        if (!account) throw new KernelError(ErrorCode.UNKNOWN_AGENT, `No budget account for ${agentId}`);
        return {
            agentId,
            allocated: account.allocated,
            consumed: account.consumed,
            remaining: account.allocated - account.consumed,
            byKind: { ...account.byKind },
        };
    }

    public summaries(): BudgetSummary[] {
        return Object.keys(this.state.snapshot.accounts).sort().map(id => this.summary(id));
    }

    public resetVelocity(agentId: AgentID): void {
        this.attempts.delete(agentId);
    }

    /**
     * Runs inside the ledger decision, so the lifecycle and balance checks
     * see exactly the state the debit entry will follow.
     */
    private assess(agentId: AgentID, amount: number, actionKind: string | undefined): Decision<DebitVerdict> {
        const blocked = blockedDraft(this.state, agentId, 'budget.debit');
        if (blocked) return { draft: blocked, verdict: { kind: 'blocked' } };

        const account = this.state.getAccount(agentId) ?? { agentId, allocated: 0, consumed: 0, byKind: {} };
        const remaining = remainingIn(account);
        const check = BudgetGuard({ account, amount });
        if (!check.ok) {
            return {
                draft: entry(agentId, 'budget.debit', { agentId, amount, actionKind, remaining, reason: check.violation }, 'FAILED'),
                verdict: { kind: 'refused', code: check.code, reason: check.violation },
            };
        }
        return {
            draft: entry(agentId, 'budget.debit', { agentId, amount, actionKind, remaining: remaining - amount }),
            verdict: { kind: 'committed' },
        };
    }

    private remaining(agentId: AgentID): number {
        return remainingIn(this.state.getAccount(agentId));
    }

    /**
     * Advisory velocity check over the trailing window. Never rejects.
     */
    private async trackVelocity(agentId: AgentID, ledgerRef: number | undefined): Promise<void> {
        const now = this.ledger.Clock.now();
        const horizon = now - this.policy.velocity.windowMs;
        const recent = (this.attempts.get(agentId) ?? []).filter(t => t > horizon);
        recent.push(now);
        this.attempts.set(agentId, recent);

        if (recent.length <= this.policy.velocity.maxDebits) return;

        const signal: Signal = {
            kind: 'VELOCITY_ANOMALY',
            source: 'BUDGET',
            detail: `${recent.length} debit attempts within ${this.policy.velocity.windowMs}ms (limit ${this.policy.velocity.maxDebits})`,
            at: now,
            ...(ledgerRef === undefined ? {} : { ledgerRef }),
        };
        console.warn(`[BudgetRegister] Velocity anomaly for ${agentId}: ${signal.detail}`);
        for (const listener of this.listeners) {
            await listener(agentId, signal);
        }
    }
}
