/**
 * Kernel Error Taxonomy
 * Centralized error codes for formal rejections and terminal failures.
 */

export enum ErrorCode {
    // I. Ledger (retryable contention, fatal integrity)
    CONCURRENT_APPEND_CONFLICT = 'CONCURRENT_APPEND_CONFLICT',
    CHAIN_VERIFICATION_FAILURE = 'CHAIN_VERIFICATION_FAILURE',
    ENTRY_NOT_FOUND = 'ENTRY_NOT_FOUND',

    // II. Fiscal
    INSUFFICIENT_BUDGET = 'INSUFFICIENT_BUDGET',
    UNKNOWN_ACTION_KIND = 'UNKNOWN_ACTION_KIND',
    INVALID_AMOUNT = 'INVALID_AMOUNT',

    // III. Arbitration
    INVALID_TRANSITION = 'INVALID_TRANSITION',
    ARBITRATION_DENIED = 'ARBITRATION_DENIED',

    // IV. Guardian / Agent lifecycle
    AGENT_QUARANTINED = 'AGENT_QUARANTINED',
    AGENT_TERMINATED = 'AGENT_TERMINATED',
    UNKNOWN_AGENT = 'UNKNOWN_AGENT',
    DUPLICATE_AGENT = 'DUPLICATE_AGENT',
    NOT_QUARANTINED = 'NOT_QUARANTINED',
    CHECKPOINT_NOT_FOUND = 'CHECKPOINT_NOT_FOUND',
    INVALID_CHECKPOINT = 'INVALID_CHECKPOINT',

    // V. Authority
    PRIVILEGE_REQUIRED = 'PRIVILEGE_REQUIRED',
    UNKNOWN_PRINCIPAL = 'UNKNOWN_PRINCIPAL',

    // VI. Contract & Internal
    INTENT_NOT_FOUND = 'INTENT_NOT_FOUND',
    INVALID_REQUEST = 'INVALID_REQUEST',
    CONFIG_INVALID = 'CONFIG_INVALID',
    REPLAY_FAILURE = 'REPLAY_FAILURE',
}

/**
 * Codes a caller may retry without operator intervention.
 */
export const RETRYABLE_CODES: ReadonlySet<ErrorCode> = new Set([ErrorCode.CONCURRENT_APPEND_CONFLICT]);

export interface KernelErrorMetadata {
    ledgerRef?: number;
    [key: string]: unknown;
}

export class KernelError extends Error {
    constructor(
        public readonly code: ErrorCode,
        public readonly reason: string,
        public readonly metadata: KernelErrorMetadata = {}
    ) {
        super(`[Kernel:${code}] ${reason}`);
        this.name = 'KernelError';
    }

    public get ledgerRef(): number | undefined {
        return this.metadata.ledgerRef;
    }

    public get retryable(): boolean {
        return RETRYABLE_CODES.has(this.code);
    }
}

export function isKernelError(e: unknown, code?: ErrorCode): e is KernelError {
    return e instanceof KernelError && (code === undefined || e.code === code);
}

/**
 * Formal rejection returned (not thrown) for policy decisions.
 */
export interface Rejection {
    code: ErrorCode;
    reason: string;
    ledgerRef?: number;
}

export function rejectionToError(rejection: Rejection): KernelError {
    return new KernelError(
        rejection.code,
        rejection.reason,
        rejection.ledgerRef === undefined ? {} : { ledgerRef: rejection.ledgerRef }
    );
}
