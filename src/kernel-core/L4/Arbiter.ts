import { CapabilitySet, TransitionGuard, ThrashGuard } from '../L0/Guards.js';
import type { GuardResult } from '../L0/Guards.js';
import { randomId } from '../L0/Crypto.js';
import { Mutex } from '../L0/Mutex.js';
import type { AgentID, Mode, ModeChangeRequest, ModeState, PrincipalID, Signal } from '../L0/Ontology.js';
import type { KernelPolicy } from '../L0/Policy.js';
import { Privileges } from '../L0/Policy.js';
import type { AuthorityEngine } from '../L1/Authority.js';
import { entry } from '../L2/Entries.js';
import { blockedDraft, blockedRejection } from '../L2/Isolation.js';
import type { ConflictRecord, StateModel } from '../L2/State.js';
import type { Decision, Ledger } from '../L5/Ledger.js';
import { ErrorCode, KernelError } from '../Errors.js';

type ArbiterPolicy = Pick<KernelPolicy, 'thrash' | 'modePrivileges' | 'recoveryPrivilege'>;

export interface ModeDecisionInput {
    from: Mode;
    to: Mode;
    privileges: readonly string[];
    transitionsInWindow: number;
    policy: ArbiterPolicy;
}

/**
 * The Arbiter's decision, as a pure function of its inputs. Same inputs,
 * same answer: transition table first, then the anti-thrash window (which
 * no privilege overrides), then the privilege the target mode demands.
 */
export function decideModeChange({ from, to, privileges, transitionsInWindow, policy }: ModeDecisionInput): GuardResult {
    const table = TransitionGuard({ from, to });
    if (!table.ok) return table;

    const thrash = ThrashGuard({
        to,
        transitionsInWindow,
        maxTransitions: policy.thrash.maxTransitions,
        windowMs: policy.thrash.windowMs,
    });
    if (!thrash.ok) return thrash;

    const held = new CapabilitySet(privileges);
    const required = [policy.modePrivileges[to], from === 'DEFEND' ? policy.recoveryPrivilege : null];
    for (const privilege of required) {
        if (privilege !== null && !held.has(privilege)) {
            return {
                ok: false,
                code: ErrorCode.ARBITRATION_DENIED,
                violation: `Transition ${from} -> ${to} requires privilege ${privilege}`,
            };
        }
    }
    return { ok: true };
}

type PendingRequest = Pick<ModeChangeRequest, 'id' | 'requester' | 'targetMode' | 'justification' | 'submittedAt' | 'resolver'>;

interface ModeVerdict {
    blocked: boolean;
    request: ModeChangeRequest;
}

export type ModeListener = (requester: PrincipalID, signal: Signal) => void | Promise<void>;

/**
 * Arbiter: sole owner of the operating mode. Requests are decided and
 * recorded one at a time under the global lock, which rollback shares.
 */
export class Arbiter {
    private readonly globalLock = new Mutex();
    private readonly listeners: ModeListener[] = [];

    constructor(
        private readonly ledger: Ledger,
        private readonly state: StateModel,
        private readonly authority: AuthorityEngine,
        private readonly policy: ArbiterPolicy
    ) { }

    public get GlobalLock(): Mutex {
        return this.globalLock;
    }

    public onSignal(listener: ModeListener): void {
        this.listeners.push(listener);
    }

    public current(): ModeState {
        return this.state.snapshot.mode;
    }

    public history(): readonly ModeChangeRequest[] {
        return this.state.snapshot.requests;
    }

    public async requestModeChange(requester: PrincipalID, targetMode: Mode, justification: string): Promise<ModeChangeRequest> {
        const principal = this.state.getPrincipal(requester);
        if (!principal) {
            throw new KernelError(ErrorCode.UNKNOWN_PRINCIPAL, `Principal ${requester} is not registered`);
        }

        const now = this.ledger.Clock.now();
        const base: PendingRequest = {
            id: randomId('mcr'),
            requester,
            targetMode,
            justification,
            submittedAt: now,
            resolver: 'arbiter',
        };

        const isAgent = principal.role === 'AGENT';
        const { request, blocked } = await this.globalLock.runExclusive(async () => {
            const { entry: recorded, verdict } = await this.ledger.decide(
                () => this.assess(requester, isAgent, principal.capabilities, targetMode, base),
                e => this.state.applyTrusted(e)
            );
            if (verdict.blocked) {
                const rejection = blockedRejection(recorded);
                const request: ModeChangeRequest = {
                    ...verdict.request,
                    reason: rejection.reason,
                    code: rejection.code,
                    ledgerRef: recorded.sequence,
                };
                return { request, blocked: true };
            }
            if (verdict.request.resolution === 'APPROVED') {
                console.log(`[Arbiter] ${verdict.request.fromMode} -> ${targetMode} approved for ${requester}`);
            } else {
                console.warn(`[Arbiter] ${verdict.request.fromMode} -> ${targetMode} denied for ${requester}: ${verdict.request.reason ?? ''}`);
            }
            return { request: { ...verdict.request, ledgerRef: recorded.sequence }, blocked: false };
        });
        if (blocked) return request;

        await this.emit(requester, {
            kind: request.resolution === 'APPROVED' ? 'MODE_APPROVED' : 'MODE_DENIED',
            source: 'ARBITER',
            detail: request.reason ?? `${request.fromMode} -> ${request.targetMode}`,
            at: request.submittedAt,
            ...(request.ledgerRef === undefined ? {} : { ledgerRef: request.ledgerRef }),
        });
        return request;
    }

    /**
     * Decided under the ledger lock: the requester's lifecycle, the current
     * mode and the thrash window are all read from the state the entry follows.
     */
    private assess(
        requester: PrincipalID,
        isAgent: boolean,
        privileges: readonly string[],
        targetMode: Mode,
        base: PendingRequest
    ): Decision<ModeVerdict> {
        const mode = this.current();
        const blocked = isAgent ? blockedDraft(this.state, requester, 'mode.request') : null;
        if (blocked) {
            return { draft: blocked, verdict: { blocked: true, request: { ...base, fromMode: mode.mode, resolution: 'DENIED' } } };
        }

        const horizon = this.ledger.Clock.now() - this.policy.thrash.windowMs;
        const decision = decideModeChange({
            from: mode.mode,
            to: targetMode,
            privileges,
            transitionsInWindow: mode.transitions.filter(t => t > horizon).length,
            policy: this.policy,
        });
        if (decision.ok) {
            const approved: ModeChangeRequest = { ...base, fromMode: mode.mode, resolution: 'APPROVED' };
            return { draft: entry(requester, 'mode.transition', approved), verdict: { blocked: false, request: approved } };
        }
        const denied: ModeChangeRequest = {
            ...base,
            fromMode: mode.mode,
            resolution: 'DENIED',
            reason: decision.violation,
            code: decision.code,
        };
        return { draft: entry(requester, 'mode.denied', denied, 'FAILED'), verdict: { blocked: false, request: denied } };
    }

    /**
     * Provenance record for a resource or priority conflict settled by an
     * operator. The kernel does not pick winners itself.
     */
    public async resolveConflict(
        resolver: PrincipalID,
        conflictType: string,
        agents: AgentID[],
        resolution: string
    ): Promise<ConflictRecord> {
        this.authority.require(resolver, Privileges.ARBITER_RESOLVE);
        for (const agentId of agents) {
            if (!this.state.getAgent(agentId)) {
                throw new KernelError(ErrorCode.UNKNOWN_AGENT, `Agent ${agentId} is not registered`);
            }
        }
        const { entry: recorded } = await this.ledger.record(
            entry(resolver, 'arbiter.conflict', { conflictType, agents, resolution }),
            e => this.state.applyTrusted(e)
        );
        return { conflictType, agents, resolution, resolvedBy: resolver, ledgerRef: recorded.sequence };
    }

    private async emit(requester: PrincipalID, signal: Signal): Promise<void> {
        for (const listener of this.listeners) {
            await listener(requester, signal);
        }
    }
}
