import { SystemClock } from './L0/Clock.js';
import type { ISystemClock } from './L0/Clock.js';
import type {
    Agent, AgentID, AgentType, Checkpoint, LedgerEntry, Mode, ModeChangeRequest, ModeState, Payload,
    Principal, PrincipalID, PrincipalRole, QuarantineRecord, ReviewFlag
} from './L0/Ontology.js';
import { KernelPolicySchema, Privileges } from './L0/Policy.js';
import type { KernelPolicy, KernelPolicyInput } from './L0/Policy.js';
import { AuthorityEngine } from './L1/Authority.js';
import { BudgetRegister } from './L2/Budget.js';
import type { BudgetSummary, DebitResult } from './L2/Budget.js';
import { entry } from './L2/Entries.js';
import { blockedDraft, blockedRejection, checkIsolation } from './L2/Isolation.js';
import { StateModel } from './L2/State.js';
import type { ConflictRecord, KernelState } from './L2/State.js';
import { ReplayEngine } from './L3/Replay.js';
import { Arbiter } from './L4/Arbiter.js';
import { Guardian } from './L5/Guardian.js';
import type { RollbackResult, ScreeningRule } from './L5/Guardian.js';
import { Ledger, MemoryLedgerStore, readOnly } from './L5/Ledger.js';
import type { ChainVerification, ILedgerStore, LedgerReader } from './L5/Ledger.js';
import { ErrorCode, KernelError, isKernelError, rejectionToError } from './Errors.js';
import type { Rejection } from './Errors.js';

export interface KernelOptions {
    store?: ILedgerStore;
    clock?: ISystemClock;
    policy?: KernelPolicyInput;
    screeningRules?: ScreeningRule[];
}

export type IntentReceipt =
    | { accepted: true; intentRef: number; cost: number; provisional: boolean; reviews: string[] }
    | { accepted: false; rejection: Rejection };

export type OutcomeStatus = 'SUCCEEDED' | 'FAILED';

export interface OutcomeReceipt {
    intentRef: number;
    ledgerRef: number;
    status: OutcomeStatus;
}

export interface ActionResult<T extends Payload> {
    intentRef: number;
    debitRef: number | null;
    outcomeRef: number;
    remaining: number;
    provisional: boolean;
    result: T;
}

/**
 * Constraint kernel facade: the agent runtime contract
 * (intent -> debit -> effect -> outcome) and the operator / auditor
 * contract over the Ledger, Budget Register, Arbiter and Guardian.
 */
export class ConstraintKernel {
    private readonly reader: LedgerReader;

    private constructor(
        private readonly policy: KernelPolicy,
        private readonly ledger: Ledger,
        private readonly state: StateModel,
        private readonly authority: AuthorityEngine,
        private readonly budget: BudgetRegister,
        private readonly arbiter: Arbiter,
        private readonly guardian: Guardian
    ) {
        this.reader = readOnly(ledger);
        this.budget.onSignal(async (agentId, signal) => {
            await this.guardian.evaluate(agentId, signal);
        });
        this.arbiter.onSignal(async (requester, signal) => {
            await this.guardian.evaluate(requester, signal);
        });
    }

    /**
     * Opens a kernel over a ledger store. Existing history is verified and
     * folded back into state before the kernel accepts calls.
     */
    public static async open(options: KernelOptions = {}): Promise<ConstraintKernel> {
        const parsed = KernelPolicySchema.safeParse(options.policy ?? {});
        if (!parsed.success) {
            throw new KernelError(ErrorCode.CONFIG_INVALID, `Invalid kernel policy: ${parsed.error.message}`);
        }
        const policy = parsed.data;
        const stateOptions = {
            initialMode: policy.initialMode,
            thrashWindowMs: policy.thrash.windowMs,
            roleCapabilities: policy.roles,
        };

        const ledger = new Ledger(options.store ?? new MemoryLedgerStore(), options.clock ?? new SystemClock(), policy.ledger);
        const state = new StateModel(stateOptions);
        const replay = new ReplayEngine(stateOptions);
        const authority = new AuthorityEngine(state);
        const budget = new BudgetRegister(ledger, state, authority, policy);
        const arbiter = new Arbiter(ledger, state, authority, policy);
        const guardian = new Guardian(ledger, state, authority, arbiter, budget, replay, policy, options.screeningRules);

        const history = await ledger.getRange();
        if (history.length > 0) {
            console.log(`[Kernel] Replaying ${history.length} ledger entries...`);
            await ledger.assertChain();
            state.restore(replay.rebuild(history));
        }
        console.log(`[Kernel] Active in mode ${state.snapshot.mode.mode} at sequence ${state.snapshot.lastSequence}.`);

        return new ConstraintKernel(policy, ledger, state, authority, budget, arbiter, guardian);
    }

    public get Ledger(): LedgerReader { return this.reader; }
    public get Budget(): BudgetRegister { return this.budget; }
    public get Arbiter(): Arbiter { return this.arbiter; }
    public get Guardian(): Guardian { return this.guardian; }
    public get Policy(): KernelPolicy { return this.policy; }
    public get State(): KernelState { return this.state.snapshot; }

    // --- Registration ---

    /**
     * Registers a human or service principal. The very first principal on an
     * empty kernel must be an OPERATOR and needs no authorizer.
     */
    public async registerPrincipal(
        authorizer: PrincipalID,
        principalId: PrincipalID,
        role: Exclude<PrincipalRole, 'AGENT'>,
        capabilities: string[] = []
    ): Promise<Principal> {
        const genesis = Object.keys(this.state.snapshot.principals).length === 0;
        if (genesis) {
            if (role !== 'OPERATOR') {
                throw new KernelError(ErrorCode.PRIVILEGE_REQUIRED, 'The first principal must be an OPERATOR');
            }
            console.log(`[Kernel] Genesis operator ${principalId}`);
        } else {
            this.authority.require(authorizer, Privileges.PRINCIPAL_REGISTER);
        }
        if (this.state.getPrincipal(principalId)) {
            throw new KernelError(ErrorCode.DUPLICATE_AGENT, `Principal ${principalId} is already registered`);
        }

        await this.ledger.record(
            entry(genesis ? principalId : authorizer, 'principal.register', { principalId, role, capabilities }),
            e => this.state.applyTrusted(e)
        );
        return this.principal(principalId);
    }

    public async registerAgent(authorizer: PrincipalID, agentId: AgentID, type: AgentType): Promise<Agent> {
        this.authority.require(authorizer, Privileges.AGENT_REGISTER);
        if (this.state.getPrincipal(agentId) || this.state.getAgent(agentId)) {
            throw new KernelError(ErrorCode.DUPLICATE_AGENT, `Agent ${agentId} is already registered`);
        }
        await this.ledger.record(
            entry(authorizer, 'agent.register', { agentId, type }),
            e => this.state.applyTrusted(e)
        );
        return this.guardian.assertActive(agentId);
    }

    // --- Agent runtime contract ---

    public async submitIntent(actor: AgentID, actionKind: string, payload: Payload = {}): Promise<IntentReceipt> {
        const blocked = await checkIsolation(this.ledger, this.state, actor, 'action.intent');
        if (blocked) return { accepted: false, rejection: blocked };

        let cost: number;
        try {
            cost = this.budget.quote(actionKind);
        } catch (e: unknown) {
            if (isKernelError(e, ErrorCode.UNKNOWN_ACTION_KIND)) {
                return { accepted: false, rejection: { code: e.code, reason: e.reason } };
            }
            throw e;
        }

        const { entry: intent, verdict: intentBlocked } = await this.ledger.decide(
            () => {
                const draft = blockedDraft(this.state, actor, 'action.intent');
                return draft
                    ? { draft, verdict: true }
                    : { draft: entry(actor, 'action.intent', { actionKind, payload }, 'INTENT'), verdict: false };
            },
            e => this.state.applyTrusted(e)
        );
        if (intentBlocked) return { accepted: false, rejection: blockedRejection(intent) };

        const verdict = await this.guardian.screen(actor, { actionKind, payload, ledgerRef: intent.sequence });
        if (!verdict.allowed) {
            await this.ledger.record(
                entry(actor, 'action.outcome', { intentRef: intent.sequence, status: 'FAILED', result: { reason: verdict.rejection.reason } }, 'FAILED'),
                e => this.state.applyTrusted(e)
            );
            return { accepted: false, rejection: verdict.rejection };
        }
        return { accepted: true, intentRef: intent.sequence, cost, provisional: verdict.provisional, reviews: verdict.reviews };
    }

    public async debit(actor: AgentID, amount: number, actionKind?: string): Promise<DebitResult> {
        return this.budget.debit(actor, amount, actionKind);
    }

    public async submitOutcome(
        actor: AgentID,
        intentRef: number,
        status: OutcomeStatus,
        result: Payload = {}
    ): Promise<OutcomeReceipt> {
        const intent = this.state.snapshot.intents[intentRef];
        if (!intent || intent.actor !== actor) {
            throw new KernelError(ErrorCode.INTENT_NOT_FOUND, `No open intent ${intentRef} for ${actor}`);
        }

        const { entry: recorded } = await this.ledger.record(
            entry(actor, 'action.outcome', { intentRef, status, result }, status === 'SUCCEEDED' ? 'COMMITTED' : 'FAILED'),
            e => this.state.applyTrusted(e)
        );

        await this.guardian.evaluate(actor, {
            kind: status === 'SUCCEEDED' ? 'ACTION_SUCCEEDED' : 'ACTION_FAILED',
            source: 'RUNTIME',
            detail: `${intent.actionKind} ${status.toLowerCase()}`,
            at: recorded.timestamp,
            ledgerRef: recorded.sequence,
        });
        return { intentRef, ledgerRef: recorded.sequence, status };
    }

    /**
     * Runs the whole runtime sequence around `effect`. Any rejection is
     * thrown as a KernelError carrying the ledger reference of the attempt.
     */
    public async executeAction<T extends Payload>(
        actor: AgentID,
        actionKind: string,
        payload: Payload,
        effect: () => T | Promise<T>
    ): Promise<ActionResult<T>> {
        const receipt = await this.submitIntent(actor, actionKind, payload);
        if (!receipt.accepted) throw rejectionToError(receipt.rejection);

        let debitRef: number | null = null;
        if (receipt.cost > 0) {
            const debit = await this.budget.debit(actor, receipt.cost, actionKind);
            if (!debit.accepted) {
                await this.submitOutcome(actor, receipt.intentRef, 'FAILED', { code: debit.rejection.code, reason: debit.rejection.reason });
                throw rejectionToError(debit.rejection);
            }
            debitRef = debit.ledgerRef;
        }

        let result: T;
        try {
            result = await effect();
        } catch (e: unknown) {
            const reason = e instanceof Error ? e.message : String(e);
            await this.submitOutcome(actor, receipt.intentRef, 'FAILED', { error: reason });
            throw e;
        }

        const outcome = await this.submitOutcome(actor, receipt.intentRef, 'SUCCEEDED', result);
        return {
            intentRef: receipt.intentRef,
            debitRef,
            outcomeRef: outcome.ledgerRef,
            remaining: this.budget.summary(actor).remaining,
            provisional: receipt.provisional,
            result,
        };
    }

    // --- Operator contract ---

    public async allocate(authorizer: PrincipalID, agentId: AgentID, amount: number): Promise<BudgetSummary> {
        return this.budget.allocate(authorizer, agentId, amount);
    }

    public async requestModeChange(requester: PrincipalID, targetMode: Mode, justification: string): Promise<ModeChangeRequest> {
        return this.arbiter.requestModeChange(requester, targetMode, justification);
    }

    public async resolveConflict(resolver: PrincipalID, conflictType: string, agents: AgentID[], resolution: string): Promise<ConflictRecord> {
        return this.arbiter.resolveConflict(resolver, conflictType, agents, resolution);
    }

    public async createCheckpoint(actor: PrincipalID, description: string): Promise<Checkpoint> {
        return this.guardian.createCheckpoint(actor, description);
    }

    public async rollback(actor: PrincipalID, checkpointId: string, reason?: string): Promise<RollbackResult> {
        return this.guardian.rollback(actor, checkpointId, reason);
    }

    public async quarantine(actor: PrincipalID, agentId: AgentID, reason: string): Promise<QuarantineRecord> {
        return this.guardian.quarantine(actor, agentId, reason);
    }

    public async release(actor: PrincipalID, agentId: AgentID, reason?: string): Promise<QuarantineRecord> {
        return this.guardian.release(actor, agentId, reason);
    }

    public async terminate(actor: PrincipalID, agentId: AgentID, reason: string): Promise<Agent> {
        return this.guardian.terminate(actor, agentId, reason);
    }

    public async sweepReviews(): Promise<ReviewFlag[]> {
        return this.guardian.sweepReviews();
    }

    /**
     * Escalates expired review flags on a timer until stopped.
     */
    public startReviewSweeper(): void {
        this.guardian.startSweeper(this.policy.guardian.sweepIntervalMs);
    }

    public stopReviewSweeper(): void {
        this.guardian.stopSweeper();
    }

    // --- Read-only ---

    public async verifyChain(auditor: PrincipalID, from?: number, to?: number): Promise<ChainVerification> {
        this.authority.require(auditor, Privileges.LEDGER_VERIFY);
        return this.ledger.verifyChain(from, to);
    }

    public async assertChain(auditor: PrincipalID, from?: number, to?: number): Promise<ChainVerification> {
        this.authority.require(auditor, Privileges.LEDGER_VERIFY);
        return this.ledger.assertChain(from, to);
    }

    public async getLedgerRange(reader: PrincipalID, from?: number, to?: number): Promise<LedgerEntry[]> {
        this.authority.require(reader, Privileges.LEDGER_READ);
        return this.ledger.getRange(from, to);
    }

    /**
     * Agents may read their own budget; anyone else needs ledger read access.
     */
    public getBudgetSummary(reader: PrincipalID, agentId: AgentID): BudgetSummary {
        if (reader !== agentId) this.authority.require(reader, Privileges.LEDGER_READ);
        return this.budget.summary(agentId);
    }

    public getMode(): ModeState {
        return this.arbiter.current();
    }

    public getAgent(agentId: AgentID): Agent | undefined {
        return this.state.getAgent(agentId);
    }

    private principal(id: PrincipalID): Principal {
        const principal = this.state.getPrincipal(id);
        if (!principal) throw new KernelError(ErrorCode.UNKNOWN_PRINCIPAL, `Principal ${id} is not registered`);
        return principal;
    }
}
