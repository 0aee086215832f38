export { ConstraintKernel } from './kernel-core/Kernel.js';
export type { ActionResult, IntentReceipt, KernelOptions, OutcomeReceipt, OutcomeStatus } from './kernel-core/Kernel.js';
export { ErrorCode, KernelError, isKernelError, rejectionToError } from './kernel-core/Errors.js';
export type { Rejection } from './kernel-core/Errors.js';
export * from './kernel-core/L0/Ontology.js';
export { ManualClock, SystemClock } from './kernel-core/L0/Clock.js';
export type { ISystemClock } from './kernel-core/L0/Clock.js';
export { KernelPolicySchema, Privileges, definePolicy } from './kernel-core/L0/Policy.js';
export type { GuardianRule, KernelPolicy, KernelPolicyInput } from './kernel-core/L0/Policy.js';
export { TRANSITIONS } from './kernel-core/L0/Guards.js';
export type { BudgetSummary, DebitResult } from './kernel-core/L2/Budget.js';
export { decideModeChange } from './kernel-core/L4/Arbiter.js';
export type { ScreeningRule, ScreenedIntent, RollbackResult } from './kernel-core/L5/Guardian.js';
export { Ledger, MemoryLedgerStore, computeEntryHash } from './kernel-core/L5/Ledger.js';
export type { ChainVerification, ILedgerStore } from './kernel-core/L5/Ledger.js';
export { SQLiteLedgerStore } from './infrastructure/persistence/SQLiteLedgerStore.js';
export { KernelServer } from './server/Server.js';
export { loadConfig, loadPolicy, parsePolicy } from './config/Config.js';
