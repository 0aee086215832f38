import { describe, test, expect } from '@jest/globals';
import fc from 'fast-check';
import { ManualClock } from '../L0/Clock.js';
import { ReplayEngine } from '../L3/Replay.js';
import { MemoryLedgerStore } from '../L5/Ledger.js';
import { ConstraintKernel } from '../Kernel.js';
import { ErrorCode, isKernelError } from '../Errors.js';
import { GatedStore, openKernel, sleep } from './fixtures.js';

function replayOf(kernel: ConstraintKernel) {
    return new ReplayEngine({
        initialMode: kernel.Policy.initialMode,
        thrashWindowMs: kernel.Policy.thrash.windowMs,
        roleCapabilities: kernel.Policy.roles,
    });
}

describe('ConstraintKernel: registration', () => {
    test('the first principal must be an operator', async () => {
        const kernel = await ConstraintKernel.open({ clock: new ManualClock(0) });
        await expect(kernel.registerPrincipal('x', 'x', 'AUDITOR')).rejects.toMatchObject({ code: ErrorCode.PRIVILEGE_REQUIRED });
        expect(await kernel.registerPrincipal('x', 'root', 'OPERATOR')).toMatchObject({ id: 'root', role: 'OPERATOR' });
    });

    test('later principals need an authorizer and unique ids', async () => {
        const { kernel } = await openKernel();
        await expect(kernel.registerPrincipal('auditor', 'eve', 'OPERATOR')).rejects.toMatchObject({ code: ErrorCode.PRIVILEGE_REQUIRED });
        await expect(kernel.registerPrincipal('op', 'auditor', 'AUDITOR')).rejects.toMatchObject({ code: ErrorCode.DUPLICATE_AGENT });

        expect(await kernel.registerPrincipal('op', 'ops2', 'OPERATOR', ['EXTRA'])).toMatchObject({
            capabilities: ['PRINCIPAL', 'AGENT', 'BUDGET', 'MODE', 'CHECKPOINT', 'ARBITER', 'LEDGER', 'EXTRA'],
        });
    });

    test('agents register once', async () => {
        const { kernel } = await openKernel();
        expect(await kernel.registerAgent('op', 'a1', 'PERCEPTION')).toMatchObject({ id: 'a1', type: 'PERCEPTION', status: 'ACTIVE' });
        await expect(kernel.registerAgent('op', 'a1', 'TASK')).rejects.toMatchObject({ code: ErrorCode.DUPLICATE_AGENT });
        await expect(kernel.registerAgent('auditor', 'a2', 'TASK')).rejects.toMatchObject({ code: ErrorCode.PRIVILEGE_REQUIRED });
    });

    test('an invalid policy refuses to open', async () => {
        await expect(ConstraintKernel.open({ policy: { velocity: { maxDebits: 0 } } })).rejects.toMatchObject({ code: ErrorCode.CONFIG_INVALID });
    });
});

describe('ConstraintKernel: runaway agent scenario', () => {
    test('overdraft is refused, a burst is flagged and the agent is isolated', async () => {
        const { kernel, clock } = await openKernel();
        await kernel.registerAgent('op', 'a1', 'TASK');
        await kernel.allocate('op', 'a1', 100);

        expect(await kernel.debit('a1', 40)).toEqual({ accepted: true, remaining: 60, ledgerRef: 5 });

        clock.set(200);
        expect(await kernel.debit('a1', 70)).toMatchObject({
            accepted: false, remaining: 60, rejection: { code: ErrorCode.INSUFFICIENT_BUDGET, ledgerRef: 6 },
        });

        for (const at of [400, 800]) {
            clock.set(at);
            expect(await kernel.debit('a1', 1)).toMatchObject({ accepted: true });
        }
        expect(kernel.getAgent('a1')?.status).toBe('ACTIVE');

        clock.set(1200);
        expect(await kernel.debit('a1', 1)).toEqual({ accepted: true, remaining: 57, ledgerRef: 9 });
        expect(kernel.getAgent('a1')?.status).toBe('QUARANTINED');
        expect(await kernel.Ledger.getEntry(10)).toMatchObject({
            actor: 'guardian', actionKind: 'guardian.quarantine', payload: { agentId: 'a1', rule: 'velocity-anomaly' },
        });

        expect(await kernel.debit('a1', 1)).toEqual({
            accepted: false,
            remaining: 57,
            rejection: { code: ErrorCode.AGENT_QUARANTINED, reason: 'Agent a1 is quarantined', ledgerRef: 11 },
        });
        expect(kernel.getBudgetSummary('a1', 'a1')).toMatchObject({ allocated: 100, consumed: 43, remaining: 57 });
    });
});

describe('ConstraintKernel: runtime contract', () => {
    test('executeAction records intent, debit and outcome in order', async () => {
        const { kernel } = await openKernel();
        await kernel.registerAgent('op', 'a1', 'TASK');
        await kernel.allocate('op', 'a1', 100);

        const done = await kernel.executeAction('a1', 'task.execute', { job: 7 }, () => ({ done: true }));
        expect(done).toEqual({ intentRef: 5, debitRef: 6, outcomeRef: 7, remaining: 95, provisional: false, result: { done: true } });

        const tail = await kernel.getLedgerRange('auditor', 5, 7);
        expect(tail.map(e => [e.actionKind, e.outcome])).toEqual([
            ['action.intent', 'INTENT'],
            ['budget.debit', 'COMMITTED'],
            ['action.outcome', 'COMMITTED'],
        ]);
        expect(kernel.State.intents).toEqual({});
    });

    test('zero-cost actions skip the debit', async () => {
        const { kernel } = await openKernel();
        await kernel.registerAgent('op', 'a1', 'TASK');
        const done = await kernel.executeAction('a1', 'mode.request', {}, () => ({}));
        expect(done).toMatchObject({ debitRef: null, remaining: 0 });
    });

    test('unknown action kinds are rejected before anything is recorded', async () => {
        const { kernel } = await openKernel();
        await kernel.registerAgent('op', 'a1', 'TASK');
        await expect(kernel.executeAction('a1', 'teleport', {}, () => ({}))).rejects.toMatchObject({ code: ErrorCode.UNKNOWN_ACTION_KIND });
        expect((await kernel.Ledger.getTail())?.sequence).toBe(3);
    });

    test('an unaffordable action fails its intent', async () => {
        const { kernel } = await openKernel();
        await kernel.registerAgent('op', 'a1', 'TASK');
        await kernel.allocate('op', 'a1', 3);

        await expect(kernel.executeAction('a1', 'task.execute', {}, () => ({}))).rejects.toMatchObject({
            code: ErrorCode.INSUFFICIENT_BUDGET, metadata: { ledgerRef: 6 },
        });
        expect(await kernel.Ledger.getEntry(7)).toMatchObject({ actionKind: 'action.outcome', outcome: 'FAILED', payload: { intentRef: 5 } });
    });

    test('repeated failed effects isolate the agent', async () => {
        const { kernel } = await openKernel();
        await kernel.registerAgent('op', 'a1', 'TASK');
        await kernel.allocate('op', 'a1', 100);
        const explode = () => { throw new Error('actuator jammed'); };

        for (let i = 0; i < 3; i++) {
            await expect(kernel.executeAction('a1', 'sensor.read', {}, explode)).rejects.toThrow('actuator jammed');
        }
        expect(kernel.State.quarantines['a1']).toMatchObject({ rule: 'repeated-action-failures' });
        await expect(kernel.executeAction('a1', 'sensor.read', {}, () => ({}))).rejects.toMatchObject({ code: ErrorCode.AGENT_QUARANTINED });
    });

    test('outcomes must match an open intent of the same agent', async () => {
        const { kernel } = await openKernel();
        await kernel.registerAgent('op', 'a1', 'TASK');
        await kernel.registerAgent('op', 'a2', 'TASK');

        const receipt = await kernel.submitIntent('a1', 'mode.request');
        if (!receipt.accepted) throw new Error('expected acceptance');

        await expect(kernel.submitOutcome('a2', receipt.intentRef, 'SUCCEEDED')).rejects.toMatchObject({ code: ErrorCode.INTENT_NOT_FOUND });
        await expect(kernel.submitOutcome('a1', 999, 'SUCCEEDED')).rejects.toMatchObject({ code: ErrorCode.INTENT_NOT_FOUND });

        expect(await kernel.submitOutcome('a1', receipt.intentRef, 'SUCCEEDED', { ok: true })).toMatchObject({ status: 'SUCCEEDED' });
        await expect(kernel.submitOutcome('a1', receipt.intentRef, 'SUCCEEDED')).rejects.toMatchObject({ code: ErrorCode.INTENT_NOT_FOUND });
    });
});

describe('ConstraintKernel: auditor contract', () => {
    test('ledger reads are privileged', async () => {
        const { kernel } = await openKernel();
        await kernel.registerAgent('op', 'a1', 'TASK');
        await kernel.registerAgent('op', 'a2', 'TASK');

        expect(await kernel.verifyChain('auditor')).toEqual({ valid: true, checked: 4, from: 1, to: 4 });
        expect(await kernel.assertChain('auditor', 2, 3)).toMatchObject({ valid: true, checked: 2 });
        await expect(kernel.verifyChain('a1')).rejects.toMatchObject({ code: ErrorCode.PRIVILEGE_REQUIRED });
        await expect(kernel.getLedgerRange('a1')).rejects.toMatchObject({ code: ErrorCode.PRIVILEGE_REQUIRED });
        expect(() => kernel.getBudgetSummary('a2', 'a1')).toThrow('PRIVILEGE_REQUIRED');
    });
});

describe('ConstraintKernel: decisions race other writers', () => {
    test('a debit queued behind a rollback is judged against the rolled-back balance', async () => {
        const store = new GatedStore();
        const { kernel } = await openKernel({}, { store });
        await kernel.registerAgent('op', 'a1', 'TASK');
        const checkpoint = await kernel.createCheckpoint('op', 'before funding');
        await kernel.allocate('op', 'a1', 10);

        const gate = store.hold('guardian.rollback');
        const rollback = kernel.rollback('op', checkpoint.id);
        await gate.reached;
        const debit = kernel.debit('a1', 10);
        await sleep(5);
        gate.release();

        expect(await rollback).toMatchObject({ ledgerRef: 6, excluded: 2 });
        expect(await debit).toMatchObject({
            accepted: false, remaining: 0, rejection: { code: ErrorCode.INSUFFICIENT_BUDGET, ledgerRef: 7 },
        });
        expect(kernel.getBudgetSummary('op', 'a1')).toMatchObject({ allocated: 0, consumed: 0, remaining: 0 });
    });

    test('a debit queued behind a quarantine is blocked', async () => {
        const store = new GatedStore();
        const { kernel } = await openKernel({}, { store });
        await kernel.registerAgent('op', 'a1', 'TASK');
        await kernel.allocate('op', 'a1', 10);

        const gate = store.hold('guardian.quarantine');
        const quarantine = kernel.quarantine('op', 'a1', 'audit');
        await gate.reached;
        const debit = kernel.debit('a1', 1);
        await sleep(5);
        gate.release();

        expect(await quarantine).toMatchObject({ ledgerRef: 5 });
        expect(await debit).toEqual({
            accepted: false,
            remaining: 10,
            rejection: { code: ErrorCode.AGENT_QUARANTINED, reason: 'Agent a1 is quarantined', ledgerRef: 6 },
        });
        expect(kernel.getBudgetSummary('op', 'a1').consumed).toBe(0);
    });

    test('a mode request queued behind a quarantine is blocked', async () => {
        const store = new GatedStore();
        const { kernel } = await openKernel({}, { store });
        await kernel.registerAgent('op', 'a1', 'REFLEX');

        const gate = store.hold('guardian.quarantine');
        const quarantine = kernel.quarantine('op', 'a1', 'audit');
        await gate.reached;
        const request = kernel.requestModeChange('a1', 'ALERT', 'reflex tripped');
        await sleep(5);
        gate.release();

        await quarantine;
        expect(await request).toMatchObject({ resolution: 'DENIED', code: ErrorCode.AGENT_QUARANTINED, ledgerRef: 5 });
        expect(kernel.getMode().mode).toBe('OBSERVE');
    });

    test('an intent queued behind a quarantine is blocked', async () => {
        const store = new GatedStore();
        const { kernel } = await openKernel({}, { store });
        await kernel.registerAgent('op', 'a1', 'TASK');

        const gate = store.hold('guardian.quarantine');
        const quarantine = kernel.quarantine('op', 'a1', 'audit');
        await gate.reached;
        const intent = kernel.submitIntent('a1', 'sensor.read');
        await sleep(5);
        gate.release();

        await quarantine;
        expect(await intent).toEqual({
            accepted: false,
            rejection: { code: ErrorCode.AGENT_QUARANTINED, reason: 'Agent a1 is quarantined', ledgerRef: 5 },
        });
        expect(kernel.State.intents).toEqual({});
    });
});

describe('ConstraintKernel: no unlogged mutation', () => {
    test('the facade exposes the ledger read-only', async () => {
        const { kernel } = await openKernel();
        expect('append' in kernel.Ledger).toBe(false);
        expect('record' in kernel.Ledger).toBe(false);
        expect(await kernel.Ledger.getRange()).toHaveLength(2);
    });


    test('reopening over the same store rebuilds identical state', async () => {
        const store = new MemoryLedgerStore();
        const clock = new ManualClock(0);
        const { kernel } = await openKernel({}, { store });
        await kernel.registerAgent('op', 'a1', 'TASK');
        await kernel.allocate('op', 'a1', 20);
        await kernel.debit('a1', 5, 'sensor.read');
        await kernel.requestModeChange('op', 'ALERT', 'drill');
        const checkpoint = await kernel.createCheckpoint('op', 'drill');
        await kernel.debit('a1', 5);
        await kernel.rollback('op', checkpoint.id);
        await kernel.quarantine('op', 'a1', 'audit');

        const reopened = await ConstraintKernel.open({ store, clock });
        expect(reopened.State).toEqual(kernel.State);
    });

    test('live state always equals the replay of the ledger', async () => {
        type Op =
            | { kind: 'debit'; agent: 'a1' | 'a2'; amount: number }
            | { kind: 'allocate'; agent: 'a1' | 'a2'; amount: number }
            | { kind: 'mode'; target: 'OBSERVE' | 'ALERT' | 'ACT' | 'DEFEND' }
            | { kind: 'quarantine' | 'release'; agent: 'a1' | 'a2' }
            | { kind: 'tick'; ms: number };

        const agent = fc.constantFrom<'a1' | 'a2'>('a1', 'a2');
        const op: fc.Arbitrary<Op> = fc.oneof(
            fc.record({ kind: fc.constant('debit' as const), agent, amount: fc.integer({ min: 1, max: 20 }) }),
            fc.record({ kind: fc.constant('allocate' as const), agent, amount: fc.integer({ min: 1, max: 50 }) }),
            fc.record({ kind: fc.constant('mode' as const), target: fc.constantFrom<'OBSERVE' | 'ALERT' | 'ACT' | 'DEFEND'>('OBSERVE', 'ALERT', 'ACT', 'DEFEND') }),
            fc.record({ kind: fc.constantFrom<'quarantine' | 'release'>('quarantine', 'release'), agent }),
            fc.record({ kind: fc.constant('tick' as const), ms: fc.integer({ min: 1, max: 5000 }) })
        );

        await fc.assert(
            fc.asyncProperty(fc.array(op, { maxLength: 30 }), async (ops) => {
                const { kernel, clock } = await openKernel();
                await kernel.registerAgent('op', 'a1', 'TASK');
                await kernel.registerAgent('op', 'a2', 'REFLEX');

                for (const step of ops) {
                    try {
                        switch (step.kind) {
                            case 'debit': await kernel.debit(step.agent, step.amount); break;
                            case 'allocate': await kernel.allocate('op', step.agent, step.amount); break;
                            case 'mode': await kernel.requestModeChange('op', step.target, 'fuzz'); break;
                            case 'quarantine': await kernel.quarantine('op', step.agent, 'fuzz'); break;
                            case 'release': await kernel.release('op', step.agent); break;
                            case 'tick': clock.advance(step.ms); break;
                        }
                    } catch (e: unknown) {
                        if (!isKernelError(e)) throw e;
                    }
                }

                expect(replayOf(kernel).rebuild(await kernel.Ledger.getRange())).toEqual(kernel.State);
            }),
            { numRuns: 30 }
        );
    });
});
