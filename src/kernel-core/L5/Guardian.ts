import { LifecycleGuard } from '../L0/Guards.js';
import { randomId } from '../L0/Crypto.js';
import { KeyedMutex } from '../L0/Mutex.js';
import type {
    Agent, AgentID, Checkpoint, Payload, PrincipalID, QuarantineRecord, ReviewFlag, Signal, SignalKind
} from '../L0/Ontology.js';
import type { GuardianRule, KernelPolicy } from '../L0/Policy.js';
import { Privileges } from '../L0/Policy.js';
import type { AuthorityEngine } from '../L1/Authority.js';
import type { BudgetRegister } from '../L2/Budget.js';
import { entry } from '../L2/Entries.js';
import type { StateModel } from '../L2/State.js';
import { excludedRanges, isExcluded } from '../L3/Replay.js';
import type { ReplayEngine } from '../L3/Replay.js';
import type { Arbiter } from '../L4/Arbiter.js';
import type { Ledger } from './Ledger.js';
import { ErrorCode, KernelError } from '../Errors.js';
import type { Rejection } from '../Errors.js';

export const GUARDIAN_ACTOR: PrincipalID = 'guardian';

export interface ScreenedIntent {
    actionKind: string;
    payload: Payload;
    ledgerRef: number;
}

/**
 * Async predicate over an action intent. Resolving `true` means the intent
 * is hostile and the agent must be isolated.
 */
export interface ScreeningRule {
    id: string;
    test(agentId: AgentID, intent: ScreenedIntent): boolean | Promise<boolean>;
}

export type ScreenVerdict =
    | { allowed: true; provisional: boolean; reviews: string[] }
    | { allowed: false; rejection: Rejection };

export interface GuardianAction {
    ruleId: string;
    action: GuardianRule['action'];
    ledgerRef: number;
}

export interface RollbackResult {
    checkpoint: Checkpoint;
    ledgerRef: number;
    excluded: number;
}

type GuardianPolicy = Pick<KernelPolicy, 'guardian'>;

const RESETS: Partial<Record<SignalKind, SignalKind>> = {
    MODE_APPROVED: 'MODE_DENIED',
    ACTION_SUCCEEDED: 'ACTION_FAILED',
};

const TIMED_OUT = Symbol('timed-out');

type Outcome = boolean | Error;

function settle(rule: ScreeningRule, agentId: AgentID, intent: ScreenedIntent): Promise<Outcome> {
    try {
        return Promise.resolve(rule.test(agentId, intent)).then(
            fired => fired,
            (e: unknown) => (e instanceof Error ? e : new Error(String(e)))
        );
    } catch (e: unknown) {
        return Promise.resolve(e instanceof Error ? e : new Error(String(e)));
    }
}

/**
 * Guardian: isolates misbehaving agents and owns the rollback lever.
 *
 * Signals from the other services are folded into per-agent streaks; a
 * configured rule fires when its streak reaches the threshold. Screening
 * rules run against every intent within a fixed time budget; a rule that
 * overruns lets the action through on a review flag that the late result
 * (or the sweep) settles.
 */
export class Guardian {
    private readonly locks = new KeyedMutex();
    private readonly streaks: Map<AgentID, Map<SignalKind, number>> = new Map();
    private readonly pending: Set<Promise<void>> = new Set();
    private sweeper: NodeJS.Timeout | null = null;
    private sweeping = false;

    constructor(
        private readonly ledger: Ledger,
        private readonly state: StateModel,
        private readonly authority: AuthorityEngine,
        private readonly arbiter: Arbiter,
        private readonly budget: BudgetRegister,
        private readonly replay: ReplayEngine,
        private readonly policy: GuardianPolicy,
        private readonly screeningRules: readonly ScreeningRule[] = []
    ) { }

    public streak(agentId: AgentID, kind: SignalKind): number {
        return this.streaks.get(agentId)?.get(kind) ?? 0;
    }

    public async evaluate(agentId: AgentID, signal: Signal): Promise<GuardianAction | null> {
        const agent = this.state.getAgent(agentId);
        if (!agent) return null;

        const counters = this.streaks.get(agentId) ?? new Map<SignalKind, number>();
        this.streaks.set(agentId, counters);

        const counterpart = RESETS[signal.kind];
        if (counterpart) {
            counters.delete(counterpart);
            return null;
        }

        const count = (counters.get(signal.kind) ?? 0) + 1;
        counters.set(signal.kind, count);

        const rule = this.policy.guardian.rules.find(r => r.signal === signal.kind && count >= r.threshold);
        if (!rule) return null;

        counters.delete(signal.kind);
        const reason = `${rule.id}: ${count} x ${signal.kind} (${signal.detail})`;
        console.warn(`[Guardian] Rule '${rule.id}' fired for ${agentId}`);

        return this.locks.runExclusive(agentId, async () => {
            const current = this.state.getAgent(agentId);
            if (!current || current.status === 'TERMINATED') return null;
            if (rule.action === 'TERMINATE') {
                const { entry: recorded } = await this.ledger.record(
                    entry(GUARDIAN_ACTOR, 'guardian.terminate', { agentId, reason }),
                    e => this.state.applyTrusted(e)
                );
                return { ruleId: rule.id, action: rule.action, ledgerRef: recorded.sequence };
            }
            if (current.status === 'QUARANTINED') return null;
            const { entry: recorded } = await this.ledger.record(
                entry(GUARDIAN_ACTOR, 'guardian.quarantine', { agentId, rule: rule.id, reason }),
                e => this.state.applyTrusted(e)
            );
            return { ruleId: rule.id, action: rule.action, ledgerRef: recorded.sequence };
        });
    }

    public async screen(agentId: AgentID, intent: ScreenedIntent): Promise<ScreenVerdict> {
        const budgetMs = this.policy.guardian.evaluationBudgetMs;
        const reviews: string[] = [];

        for (const rule of this.screeningRules) {
            const outcome = settle(rule, agentId, intent);
            let timer: NodeJS.Timeout | undefined;
            const timeout = new Promise<typeof TIMED_OUT>(resolve => { timer = setTimeout(() => resolve(TIMED_OUT), budgetMs); });
            const first = await Promise.race([outcome, timeout]);
            clearTimeout(timer);

            if (first === TIMED_OUT) {
                const review = await this.flag(agentId, rule, intent);
                reviews.push(review.id);
                this.track(this.settleReview(review, rule, outcome));
                continue;
            }

            if (first !== false) {
                const reason = first === true
                    ? `screening rule ${rule.id} rejected ${intent.actionKind}`
                    : `screening rule ${rule.id} failed: ${first.message}`;
                const ledgerRef = await this.isolate(agentId, rule.id, reason);
                return {
                    allowed: false,
                    rejection: { code: ErrorCode.AGENT_QUARANTINED, reason, ...(ledgerRef === null ? {} : { ledgerRef }) },
                };
            }
        }
        return { allowed: true, provisional: reviews.length > 0, reviews };
    }

    /**
     * Escalates every open review flag whose deadline has passed.
     */
    public async sweepReviews(): Promise<ReviewFlag[]> {
        const now = this.ledger.Clock.now();
        const expired = Object.values(this.state.snapshot.reviews)
            .filter(r => r.status === 'OPEN' && r.deadline <= now)
            .sort((a, b) => a.ledgerRef - b.ledgerRef);

        const escalated: ReviewFlag[] = [];
        for (const review of expired) {
            const recorded = await this.escalate(review.id, `review deadline passed at ${review.deadline}`);
            if (!recorded) continue;
            escalated.push(recorded);
            await this.evaluate(review.agentId, {
                kind: 'REVIEW_EXPIRED',
                source: 'GUARDIAN',
                detail: `review ${review.id} for ${review.actionKind} unresolved`,
                at: now,
                ledgerRef: recorded.ledgerRef,
            });
        }
        return escalated;
    }

    /**
     * Runs `sweepReviews` every `intervalMs` until `stopSweeper`. Sweeps never
     * overlap and the timer does not hold the process open.
     */
    public startSweeper(intervalMs: number): void {
        if (this.sweeper) return;
        this.sweeper = setInterval(() => {
            if (this.sweeping) return;
            this.sweeping = true;
            void this.sweepReviews()
                .catch((e: unknown) => {
                    console.error(`[Guardian] Review sweep failed:`, e);
                })
                .finally(() => {
                    this.sweeping = false;
                });
        }, intervalMs);
        this.sweeper.unref();
    }

    public stopSweeper(): void {
        if (!this.sweeper) return;
        clearInterval(this.sweeper);
        this.sweeper = null;
    }

    /**
     * Waits for every late screening result still in flight.
     */
    public async drainReviews(): Promise<void> {
        while (this.pending.size > 0) {
            await Promise.all([...this.pending]);
        }
    }

    public assertActive(agentId: AgentID): Agent {
        const agent = this.state.getAgent(agentId);
        const result = LifecycleGuard({ agentId, agent });
        if (!result.ok || !agent) {
            const code = result.ok ? ErrorCode.UNKNOWN_AGENT : result.code;
            const reason = result.ok ? `Agent ${agentId} is not registered` : result.violation;
            throw new KernelError(code, reason, { agentId });
        }
        return agent;
    }

    public async quarantine(actor: PrincipalID, agentId: AgentID, reason: string): Promise<QuarantineRecord> {
        this.authority.require(actor, Privileges.AGENT_QUARANTINE);
        return this.locks.runExclusive(agentId, async () => {
            const agent = this.known(agentId);
            if (agent.status === 'TERMINATED') {
                throw new KernelError(ErrorCode.AGENT_TERMINATED, `Agent ${agentId} has been terminated`);
            }
            const existing = this.state.snapshot.quarantines[agentId];
            if (agent.status === 'QUARANTINED' && existing) return existing;

            await this.ledger.record(
                entry(actor, 'guardian.quarantine', { agentId, rule: 'manual', reason }),
                e => this.state.applyTrusted(e)
            );
            return this.record(agentId);
        });
    }

    public async release(actor: PrincipalID, agentId: AgentID, reason?: string): Promise<QuarantineRecord> {
        this.authority.require(actor, Privileges.AGENT_RELEASE);
        return this.locks.runExclusive(agentId, async () => {
            const agent = this.known(agentId);
            if (agent.status === 'TERMINATED') {
                throw new KernelError(ErrorCode.AGENT_TERMINATED, `Agent ${agentId} has been terminated`);
            }
            if (agent.status !== 'QUARANTINED') {
                throw new KernelError(ErrorCode.NOT_QUARANTINED, `Agent ${agentId} is not quarantined`);
            }
            await this.ledger.record(
                entry(actor, 'guardian.release', reason === undefined ? { agentId } : { agentId, reason }),
                e => this.state.applyTrusted(e)
            );
            this.streaks.delete(agentId);
            this.budget.resetVelocity(agentId);
            console.log(`[Guardian] ${agentId} released by ${actor}`);
            return this.record(agentId);
        });
    }

    public async terminate(actor: PrincipalID, agentId: AgentID, reason: string): Promise<Agent> {
        this.authority.require(actor, Privileges.AGENT_TERMINATE);
        return this.locks.runExclusive(agentId, async () => {
            const agent = this.known(agentId);
            if (agent.status === 'TERMINATED') {
                throw new KernelError(ErrorCode.AGENT_TERMINATED, `Agent ${agentId} has already been terminated`);
            }
            await this.ledger.record(
                entry(actor, 'guardian.terminate', { agentId, reason }),
                e => this.state.applyTrusted(e)
            );
            this.streaks.delete(agentId);
            console.warn(`[Guardian] ${agentId} terminated by ${actor}: ${reason}`);
            return this.known(agentId);
        });
    }

    public async createCheckpoint(actor: PrincipalID, description: string): Promise<Checkpoint> {
        this.authority.require(actor, Privileges.CHECKPOINT_CREATE);
        return this.arbiter.GlobalLock.runExclusive(async () => {
            const checkpointId = randomId('ckpt');
            const { result } = await this.ledger.record(
                sequence => entry(actor, 'guardian.checkpoint', { checkpointId, sequence, description }),
                e => this.state.applyTrusted(e)
            );
            const checkpoint = result.checkpoints[checkpointId];
            if (!checkpoint) throw new KernelError(ErrorCode.CHECKPOINT_NOT_FOUND, `Checkpoint ${checkpointId} was not recorded`);
            return checkpoint;
        });
    }

    /**
     * Forks history back to a checkpoint: the rollback entry is appended and
     * state is rebuilt from the ledger with the abandoned range excluded.
     */
    public async rollback(actor: PrincipalID, checkpointId: string, reason: string = ''): Promise<RollbackResult> {
        this.authority.require(actor, Privileges.CHECKPOINT_ROLLBACK);
        return this.arbiter.GlobalLock.runExclusive(async () => {
            const checkpoint = this.state.snapshot.checkpoints[checkpointId];
            if (!checkpoint) {
                throw new KernelError(ErrorCode.CHECKPOINT_NOT_FOUND, `Unknown checkpoint ${checkpointId}`);
            }
            const ranges = excludedRanges(await this.ledger.getRange());
            if (isExcluded(checkpoint.sequence, ranges)) {
                throw new KernelError(
                    ErrorCode.INVALID_CHECKPOINT,
                    `Checkpoint ${checkpointId} lies on a history that was already rolled back`
                );
            }

            const { entry: recorded } = await this.ledger.recordWithHistory(
                entry(actor, 'guardian.rollback', { checkpointId, sequence: checkpoint.sequence, reason }),
                (_e, history) => this.state.restore(this.replay.rebuild(history))
            );
            const excluded = recorded.sequence - checkpoint.sequence - 1;
            console.warn(`[Guardian] Rolled back to ${checkpointId} (sequence ${checkpoint.sequence}) by ${actor}`);
            return { checkpoint, ledgerRef: recorded.sequence, excluded };
        });
    }

    private known(agentId: AgentID): Agent {
        const agent = this.state.getAgent(agentId);
        if (!agent) throw new KernelError(ErrorCode.UNKNOWN_AGENT, `Agent ${agentId} is not registered`);
        return agent;
    }

    private record(agentId: AgentID): QuarantineRecord {
        const record = this.state.snapshot.quarantines[agentId];
        if (!record) throw new KernelError(ErrorCode.NOT_QUARANTINED, `No quarantine record for ${agentId}`);
        return record;
    }

    private async isolate(agentId: AgentID, ruleId: string, reason: string): Promise<number | null> {
        return this.locks.runExclusive(agentId, async () => {
            const agent = this.state.getAgent(agentId);
            if (!agent || agent.status !== 'ACTIVE') return null;
            const { entry: recorded } = await this.ledger.record(
                entry(GUARDIAN_ACTOR, 'guardian.quarantine', { agentId, rule: ruleId, reason }),
                e => this.state.applyTrusted(e)
            );
            console.warn(`[Guardian] ${agentId} quarantined: ${reason}`);
            return recorded.sequence;
        });
    }

    private async flag(agentId: AgentID, rule: ScreeningRule, intent: ScreenedIntent): Promise<ReviewFlag> {
        const reviewId = randomId('rev');
        const deadline = this.ledger.Clock.now() + this.policy.guardian.reviewDeadlineMs;
        const { result } = await this.ledger.record(
            entry(GUARDIAN_ACTOR, 'guardian.review.flagged', { agentId, reviewId, ruleId: rule.id, actionKind: intent.actionKind, deadline }),
            e => this.state.applyTrusted(e)
        );
        console.warn(`[Guardian] Screening rule '${rule.id}' overran ${this.policy.guardian.evaluationBudgetMs}ms; ${intent.actionKind} proceeds under review ${reviewId}`);
        const review = result.reviews[reviewId];
        if (!review) throw new KernelError(ErrorCode.REPLAY_FAILURE, `Review ${reviewId} was not recorded`);
        return review;
    }

    private async settleReview(review: ReviewFlag, rule: ScreeningRule, outcome: Promise<Outcome>): Promise<void> {
        const result = await outcome;
        if (result === false) {
            await this.locks.runExclusive(review.agentId, async () => {
                if (this.state.snapshot.reviews[review.id]?.status !== 'OPEN') return;
                await this.ledger.record(
                    entry(GUARDIAN_ACTOR, 'guardian.review.cleared', { agentId: review.agentId, reviewId: review.id }),
                    e => this.state.applyTrusted(e)
                );
            });
            return;
        }
        const reason = result === true
            ? `late screening verdict from ${rule.id}`
            : `screening rule ${rule.id} failed: ${result.message}`;
        if (await this.escalate(review.id, reason)) {
            await this.isolate(review.agentId, rule.id, reason);
        }
    }

    private async escalate(reviewId: string, reason: string): Promise<ReviewFlag | null> {
        const review = this.state.snapshot.reviews[reviewId];
        if (!review) return null;
        return this.locks.runExclusive(review.agentId, async () => {
            if (this.state.snapshot.reviews[reviewId]?.status !== 'OPEN') return null;
            const { result } = await this.ledger.record(
                entry(GUARDIAN_ACTOR, 'guardian.review.escalated', { agentId: review.agentId, reviewId, reason }),
                e => this.state.applyTrusted(e)
            );
            return result.reviews[reviewId] ?? null;
        });
    }

    private track(work: Promise<void>): void {
        const tracked = work
            .catch((e: unknown) => {
                console.error(`[Guardian] Late review settlement failed:`, e);
            })
            .finally(() => {
                this.pending.delete(tracked);
            });
        this.pending.add(tracked);
    }
}
