import express from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { NextFunction, Request, Response } from 'express';
import type { Server as HttpServer } from 'http';
import { z } from 'zod';
import type { ConstraintKernel } from '../kernel-core/Kernel.js';
import { AGENT_TYPES, MODES } from '../kernel-core/L0/Ontology.js';
import { ErrorCode, KernelError, isKernelError } from '../kernel-core/Errors.js';
import type { Rejection } from '../kernel-core/Errors.js';

export const PRINCIPAL_HEADER = 'x-principal-id';

const STATUS: Partial<Record<ErrorCode, number>> = {
    [ErrorCode.INSUFFICIENT_BUDGET]: 403,
    [ErrorCode.ARBITRATION_DENIED]: 403,
    [ErrorCode.AGENT_QUARANTINED]: 403,
    [ErrorCode.AGENT_TERMINATED]: 403,
    [ErrorCode.PRIVILEGE_REQUIRED]: 403,
    [ErrorCode.UNKNOWN_PRINCIPAL]: 403,
    [ErrorCode.UNKNOWN_AGENT]: 404,
    [ErrorCode.UNKNOWN_ACTION_KIND]: 404,
    [ErrorCode.ENTRY_NOT_FOUND]: 404,
    [ErrorCode.CHECKPOINT_NOT_FOUND]: 404,
    [ErrorCode.INTENT_NOT_FOUND]: 404,
    [ErrorCode.CONCURRENT_APPEND_CONFLICT]: 409,
    [ErrorCode.DUPLICATE_AGENT]: 409,
    [ErrorCode.NOT_QUARANTINED]: 409,
    [ErrorCode.INVALID_TRANSITION]: 409,
    [ErrorCode.INVALID_CHECKPOINT]: 409,
    [ErrorCode.INVALID_AMOUNT]: 422,
    [ErrorCode.INVALID_REQUEST]: 422,
    [ErrorCode.CONFIG_INVALID]: 422,
};

export function statusFor(code: ErrorCode): number {
    return STATUS[code] ?? 500;
}

const RegisterPrincipalBody = z.object({
    principalId: z.string().min(1),
    role: z.enum(['OPERATOR', 'AUDITOR']),
    capabilities: z.array(z.string()).default([]),
});
const RegisterAgentBody = z.object({ agentId: z.string().min(1), type: z.enum(AGENT_TYPES) });
const AmountBody = z.object({ amount: z.number() });
const ReasonBody = z.object({ reason: z.string().default('') });
const IntentBody = z.object({ actionKind: z.string().min(1), payload: z.record(z.unknown()).default({}) });
const DebitBody = z.object({ amount: z.number(), actionKind: z.string().optional() });
const OutcomeBody = z.object({ status: z.enum(['SUCCEEDED', 'FAILED']), result: z.record(z.unknown()).default({}) });
const ModeBody = z.object({ targetMode: z.enum(MODES), justification: z.string().default('') });
const ConflictBody = z.object({ conflictType: z.string().min(1), agents: z.array(z.string()), resolution: z.string().min(1) });
const CheckpointBody = z.object({ description: z.string().default('') });
const RangeQuery = z.object({
    from: z.coerce.number().int().positive().optional(),
    to: z.coerce.number().int().positive().optional(),
});
const SequenceParam = z.coerce.number().int().positive();

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        const detail = parsed.error.issues.map(i => `${i.path.join('.') || '(body)'}: ${i.message}`).join('; ');
        throw new KernelError(ErrorCode.INVALID_REQUEST, detail);
    }
    return parsed.data;
}

function principalOf(req: Request): string {
    const id = req.header(PRINCIPAL_HEADER);
    if (!id) throw new KernelError(ErrorCode.INVALID_REQUEST, `Missing ${PRINCIPAL_HEADER} header`);
    return id;
}

function param(req: Request, name: string): string {
    const value = req.params[name];
    if (!value) throw new KernelError(ErrorCode.INVALID_REQUEST, `Missing path parameter ${name}`);
    return value;
}

function rejected(res: Response, rejection: Rejection): void {
    res.status(statusFor(rejection.code)).json({ error: rejection });
}

type Handler = (req: Request, res: Response) => Promise<void> | void;

const handle = (fn: Handler) => (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve()
        .then(() => fn(req, res))
        .catch(next);
};

export interface KernelServerOptions {
    corsOrigins?: string | string[];
}

/**
 * HTTP adapter over the kernel's runtime and operator contracts. The caller
 * is named by the x-principal-id header; authenticating it is the
 * deployment's job.
 */
export class KernelServer {
    private app: express.Express;
    private server: HttpServer | null = null;

    constructor(private readonly kernel: ConstraintKernel, options: KernelServerOptions = {}) {
        this.app = express();
        this.app.use(cors({ origin: options.corsOrigins ?? '*' }));
        this.app.use(bodyParser.json());
        this.setupRoutes();
        this.app.use(this.errorHandler);
    }

    public get App(): express.Express {
        return this.app;
    }

    public async start(port: number): Promise<number> {
        const server = await new Promise<HttpServer>((resolve, reject) => {
            const listening = this.app.listen(port, () => resolve(listening));
            listening.once('error', reject);
        });
        this.server = server;
        this.kernel.startReviewSweeper();
        const address = server.address();
        const bound = typeof address === 'object' && address !== null ? address.port : port;
        console.log(`[KernelServer] Listening on port ${bound}`);
        return bound;
    }

    public async close(): Promise<void> {
        const server = this.server;
        if (!server) return;
        this.server = null;
        this.kernel.stopReviewSweeper();
        await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    }

    private setupRoutes() {
        const k = this.kernel;

        this.app.get('/health', (_req, res) => {
            res.json({ status: 'ok', mode: k.getMode().mode });
        });

        // --- Registration ---
        this.app.post('/principals', handle(async (req, res) => {
            const body = parse(RegisterPrincipalBody, req.body);
            res.status(201).json(await k.registerPrincipal(principalOf(req), body.principalId, body.role, body.capabilities));
        }));

        this.app.post('/agents', handle(async (req, res) => {
            const body = parse(RegisterAgentBody, req.body);
            res.status(201).json(await k.registerAgent(principalOf(req), body.agentId, body.type));
        }));

        this.app.post('/agents/:agentId/allocate', handle(async (req, res) => {
            const body = parse(AmountBody, req.body);
            res.json(await k.allocate(principalOf(req), param(req, 'agentId'), body.amount));
        }));

        this.app.get('/agents/:agentId/budget', handle((req, res) => {
            res.json(k.getBudgetSummary(principalOf(req), param(req, 'agentId')));
        }));

        this.app.post('/agents/:agentId/quarantine', handle(async (req, res) => {
            const body = parse(ReasonBody, req.body);
            res.json(await k.quarantine(principalOf(req), param(req, 'agentId'), body.reason));
        }));

        this.app.post('/agents/:agentId/release', handle(async (req, res) => {
            const body = parse(ReasonBody, req.body);
            res.json(await k.release(principalOf(req), param(req, 'agentId'), body.reason || undefined));
        }));

        this.app.post('/agents/:agentId/terminate', handle(async (req, res) => {
            const body = parse(ReasonBody, req.body);
            res.json(await k.terminate(principalOf(req), param(req, 'agentId'), body.reason));
        }));

        // --- Agent runtime ---
        this.app.post('/intents', handle(async (req, res) => {
            const body = parse(IntentBody, req.body);
            const receipt = await k.submitIntent(principalOf(req), body.actionKind, body.payload);
            if (!receipt.accepted) return rejected(res, receipt.rejection);
            res.status(201).json(receipt);
        }));

        this.app.post('/debits', handle(async (req, res) => {
            const body = parse(DebitBody, req.body);
            const result = await k.debit(principalOf(req), body.amount, body.actionKind);
            if (!result.accepted) return rejected(res, result.rejection);
            res.json(result);
        }));

        this.app.post('/intents/:intentRef/outcome', handle(async (req, res) => {
            const body = parse(OutcomeBody, req.body);
            const intentRef = parse(SequenceParam, param(req, 'intentRef'));
            res.json(await k.submitOutcome(principalOf(req), intentRef, body.status, body.result));
        }));

        // --- Mode & arbitration ---
        this.app.get('/mode', (_req, res) => {
            res.json(k.getMode());
        });

        this.app.post('/mode', handle(async (req, res) => {
            const body = parse(ModeBody, req.body);
            const request = await k.requestModeChange(principalOf(req), body.targetMode, body.justification);
            res.status(request.resolution === 'APPROVED' ? 200 : statusFor(ErrorCode.ARBITRATION_DENIED)).json(request);
        }));

        this.app.post('/conflicts', handle(async (req, res) => {
            const body = parse(ConflictBody, req.body);
            res.status(201).json(await k.resolveConflict(principalOf(req), body.conflictType, body.agents, body.resolution));
        }));

        // --- Checkpoints & reviews ---
        this.app.post('/checkpoints', handle(async (req, res) => {
            const body = parse(CheckpointBody, req.body);
            res.status(201).json(await k.createCheckpoint(principalOf(req), body.description));
        }));

        this.app.post('/checkpoints/:checkpointId/rollback', handle(async (req, res) => {
            const body = parse(ReasonBody, req.body);
            res.json(await k.rollback(principalOf(req), param(req, 'checkpointId'), body.reason));
        }));

        this.app.post('/reviews/sweep', handle(async (_req, res) => {
            res.json(await k.sweepReviews());
        }));

        // --- Ledger ---
        this.app.get('/ledger', handle(async (req, res) => {
            const range = parse(RangeQuery, req.query);
            res.json(await k.getLedgerRange(principalOf(req), range.from, range.to));
        }));

        this.app.get('/ledger/verify', handle(async (req, res) => {
            const range = parse(RangeQuery, req.query);
            res.json(await k.verifyChain(principalOf(req), range.from, range.to));
        }));
    }

    private errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
        if (isKernelError(err)) {
            const status = statusFor(err.code);
            if (status >= 500) console.error(`[KernelServer] ${req.method} ${req.path} failed:`, err.message);
            res.status(status).json({
                error: { code: err.code, reason: err.reason, ...(err.ledgerRef === undefined ? {} : { ledgerRef: err.ledgerRef }) },
            });
            return;
        }
        if (err instanceof SyntaxError) {
            res.status(422).json({ error: { code: ErrorCode.INVALID_REQUEST, reason: 'Malformed JSON body' } });
            return;
        }
        console.error(`[KernelServer] ${req.method} ${req.path} failed:`, err);
        res.status(500).json({ error: { code: 'INTERNAL', reason: err instanceof Error ? err.message : String(err) } });
    };
}
