/**
 * Service configuration: environment variables for the process, a JSON
 * policy file for the kernel. Both are validated with zod; anything
 * invalid fails startup with CONFIG_INVALID.
 */
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { KernelPolicySchema } from '../kernel-core/L0/Policy.js';
import type { KernelPolicy } from '../kernel-core/L0/Policy.js';
import { ErrorCode, KernelError } from '../kernel-core/Errors.js';

export const ENV_VARS = {
    PORT: 'PORT',
    LEDGER_PATH: 'LEDGER_PATH',
    POLICY_PATH: 'POLICY_PATH',
    CORS_ORIGINS: 'CORS_ORIGINS',
} as const;

export const DEFAULT_POLICY_PATH = 'config/policy.json';

const ServiceConfigSchema = z.object({
    port: z.coerce.number().int().min(0).max(65535).default(3000),
    ledgerPath: z.string().min(1).default('ledger.db'),
    policyPath: z.string().min(1).default(DEFAULT_POLICY_PATH),
    corsOrigins: z.string().optional().transform(value =>
        value === undefined || value.trim() === '*'
            ? '*'
            : value.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0)
    ),
});

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;

function formatIssues(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
    const parsed = ServiceConfigSchema.safeParse({
        port: env[ENV_VARS.PORT],
        ledgerPath: env[ENV_VARS.LEDGER_PATH],
        policyPath: env[ENV_VARS.POLICY_PATH],
        corsOrigins: env[ENV_VARS.CORS_ORIGINS],
    });
    if (!parsed.success) {
        throw new KernelError(ErrorCode.CONFIG_INVALID, `Invalid environment: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

export function parsePolicy(raw: unknown): KernelPolicy {
    const parsed = KernelPolicySchema.safeParse(raw);
    if (!parsed.success) {
        throw new KernelError(ErrorCode.CONFIG_INVALID, `Invalid policy: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

/**
 * Reads the policy file. A missing file means the built-in defaults.
 */
export async function loadPolicy(path: string = DEFAULT_POLICY_PATH): Promise<KernelPolicy> {
    let content: string;
    try {
        content = await readFile(path, 'utf-8');
    } catch (err: unknown) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
            console.warn(`[Config] No policy file at ${path}; using defaults.`);
            return parsePolicy({});
        }
        throw err;
    }

    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (err: unknown) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new KernelError(ErrorCode.CONFIG_INVALID, `Policy file ${path} is not valid JSON: ${detail}`);
    }
    return parsePolicy(raw);
}
