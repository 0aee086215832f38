import { describe, test, expect, beforeEach } from '@jest/globals';
import fc from 'fast-check';
import { ManualClock } from '../../L0/Clock.js';
import type { AgentID, LedgerEntry, Signal } from '../../L0/Ontology.js';
import { definePolicy } from '../../L0/Policy.js';
import type { KernelPolicyInput } from '../../L0/Policy.js';
import { AuthorityEngine } from '../../L1/Authority.js';
import { Ledger, MemoryLedgerStore } from '../../L5/Ledger.js';
import { BudgetRegister } from '../Budget.js';
import { entry } from '../Entries.js';
import { StateModel } from '../State.js';
import { ErrorCode } from '../../Errors.js';

async function setup(input: KernelPolicyInput = {}) {
    const policy = definePolicy(input);
    const clock = new ManualClock(0);
    const ledger = new Ledger(new MemoryLedgerStore(), clock, { retryBackoffMs: 0 });
    const state = new StateModel({ initialMode: 'OBSERVE', thrashWindowMs: policy.thrash.windowMs, roleCapabilities: policy.roles });
    const budget = new BudgetRegister(ledger, state, new AuthorityEngine(state), policy);
    const apply = (e: LedgerEntry) => state.applyTrusted(e);

    await ledger.record(entry('op', 'principal.register', { principalId: 'op', role: 'OPERATOR' }), apply);
    await ledger.record(entry('op', 'agent.register', { agentId: 'a1', type: 'TASK' }), apply);
    await ledger.record(entry('op', 'agent.register', { agentId: 'a2', type: 'REFLEX' }), apply);

    const signals: Array<{ agentId: AgentID, signal: Signal }> = [];
    budget.onSignal((agentId, signal) => { signals.push({ agentId, signal }); });
    return { budget, ledger, state, clock, signals };
}

describe('Budget Register', () => {
    let ctx: Awaited<ReturnType<typeof setup>>;

    beforeEach(async () => {
        ctx = await setup();
    });

    test('quotes from the cost table', () => {
        expect(ctx.budget.quote('task.execute')).toBe(5);
        expect(ctx.budget.quote('mode.request')).toBe(0);
        expect(() => ctx.budget.quote('teleport')).toThrow("[Kernel:UNKNOWN_ACTION_KIND] No cost configured for action kind 'teleport'");
        expect(() => ctx.budget.quote('toString')).toThrow('UNKNOWN_ACTION_KIND');
    });

    test('allocation is privileged and recorded with its authorizer', async () => {
        const summary = await ctx.budget.allocate('op', 'a1', 100);
        expect(summary).toEqual({ agentId: 'a1', allocated: 100, consumed: 0, remaining: 100, byKind: {} });

        const tail = await ctx.ledger.getTail();
        expect(tail).toMatchObject({ sequence: 4, actor: 'op', actionKind: 'budget.allocate', payload: { agentId: 'a1', amount: 100 } });

        await expect(ctx.budget.allocate('a1', 'a1', 100)).rejects.toMatchObject({ code: ErrorCode.PRIVILEGE_REQUIRED });
        await expect(ctx.budget.allocate('op', 'a1', -5)).rejects.toMatchObject({ code: ErrorCode.INVALID_AMOUNT });
        await expect(ctx.budget.allocate('op', 'ghost', 5)).rejects.toMatchObject({ code: ErrorCode.UNKNOWN_AGENT });
    });

    test('accepted and rejected debits', async () => {
        await ctx.budget.allocate('op', 'a1', 100);

        const first = await ctx.budget.debit('a1', 40, 'task.execute');
        expect(first).toEqual({ accepted: true, remaining: 60, ledgerRef: 5 });

        const second = await ctx.budget.debit('a1', 70, 'task.execute');
        expect(second).toEqual({
            accepted: false,
            remaining: 60,
            rejection: { code: ErrorCode.INSUFFICIENT_BUDGET, reason: 'Agent a1 has 60 remaining, 70 required', ledgerRef: 6 },
        });

        expect(await ctx.ledger.getEntry(6)).toMatchObject({ actionKind: 'budget.debit', outcome: 'FAILED', payload: { amount: 70, remaining: 60 } });
        expect(ctx.budget.summary('a1')).toEqual({ agentId: 'a1', allocated: 100, consumed: 40, remaining: 60, byKind: { 'task.execute': 40 } });
    });

    test('malformed amounts never reach the ledger', async () => {
        await ctx.budget.allocate('op', 'a1', 10);
        const result = await ctx.budget.debit('a1', 0);
        expect(result).toMatchObject({ accepted: false, remaining: 10, rejection: { code: ErrorCode.INVALID_AMOUNT } });
        expect((await ctx.ledger.getTail())?.sequence).toBe(4);
    });

    test('unknown agents are rejected without an entry', async () => {
        const result = await ctx.budget.debit('ghost', 1);
        expect(result).toEqual({
            accepted: false, remaining: 0, rejection: { code: ErrorCode.UNKNOWN_AGENT, reason: 'Agent ghost is not registered' },
        });
        expect((await ctx.ledger.getTail())?.sequence).toBe(3);
    });

    test('velocity anomaly fires once the window holds more than maxDebits attempts', async () => {
        await ctx.budget.allocate('op', 'a1', 100);
        for (const at of [0, 200, 400, 800]) {
            ctx.clock.set(at);
            await ctx.budget.debit('a1', 1);
        }
        expect(ctx.signals).toEqual([]);

        ctx.clock.set(1200);
        const fifth = await ctx.budget.debit('a1', 1);
        expect(fifth).toMatchObject({ accepted: true, remaining: 95 });
        expect(ctx.signals).toHaveLength(1);
        expect(ctx.signals[0]).toMatchObject({
            agentId: 'a1',
            signal: { kind: 'VELOCITY_ANOMALY', source: 'BUDGET', at: 1200, detail: '5 debit attempts within 3000ms (limit 4)' },
        });
    });

    test('rejected attempts count toward velocity and the window slides', async () => {
        await ctx.budget.allocate('op', 'a1', 2);
        for (const at of [0, 10, 20, 30, 40]) {
            ctx.clock.set(at);
            const result = await ctx.budget.debit('a1', 5);
            expect(result.accepted).toBe(false);
        }
        expect(ctx.signals).toHaveLength(1);

        ctx.clock.set(3100);
        await ctx.budget.debit('a1', 5);
        expect(ctx.signals).toHaveLength(1);
    });

    test('summaries list every account', async () => {
        await ctx.budget.allocate('op', 'a2', 7);
        expect(ctx.budget.summaries().map(s => [s.agentId, s.remaining])).toEqual([['a1', 0], ['a2', 7]]);
    });

    test('concurrent debits never overdraw', async () => {
        await fc.assert(
            fc.asyncProperty(
                fc.integer({ min: 1, max: 100 }),
                fc.array(fc.integer({ min: 1, max: 30 }), { minLength: 1, maxLength: 25 }),
                async (allocation, amounts) => {
                    const local = await setup({ velocity: { maxDebits: 1000 } });
                    await local.budget.allocate('op', 'a1', allocation);

                    const results = await Promise.all(amounts.map(amount => local.budget.debit('a1', amount)));
                    const accepted = amounts.filter((_, i) => results[i]?.accepted).reduce((sum, a) => sum + a, 0);
                    const summary = local.budget.summary('a1');

                    expect(summary.remaining).toBeGreaterThanOrEqual(0);
                    expect(accepted).toBe(allocation - summary.remaining);
                }
            ),
            { numRuns: 40 }
        );
    });
});
