import type { Address } from "@solana/kit";
import type { ErrorCode, ProgramError } from "./errors.js";

/**
 * An account as supplied to one simulated call.
 *
 * Passive data holder: the account layer never trusts any of these fields
 * until a capability constructor has checked them.
 *
 * `exists: false` models an address with no backing data (zero-length,
 * system-owned). This is the "fresh" account used in most exploits.
 */
export interface RawAccount {
    readonly address: Address;
    owner: Address;
    data: Uint8Array;
    lamports: bigint;
    isSigner: boolean;
    isWritable: boolean;
    exists: boolean;
}

/**
 * Phases of one simulated call.
 *
 * `Resolving → Validating → Executing → Completed | Rejected`
 */
export enum ProcessorPhase {
    Resolving = "resolving",
    Validating = "validating",
    Executing = "executing",
    Completed = "completed",
    Rejected = "rejected",
}

/**
 * Result of a successful call. `accounts` are the caller's accounts, holding
 * the final committed state.
 */
export interface SuccessOutcome {
    status: "success";
    accounts: readonly RawAccount[];
    logs: readonly string[];
}

/**
 * Result of a rejected call. The caller's accounts are left untouched.
 */
export interface RejectedOutcome {
    status: "rejected";
    code: ErrorCode;
    /** Phase in which the call stopped */
    phase: ProcessorPhase.Resolving | ProcessorPhase.Validating | ProcessorPhase.Executing;
    error: ProgramError;
    logs: readonly string[];
}

export type Outcome = SuccessOutcome | RejectedOutcome;
