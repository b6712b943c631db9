/**
 * Closed set of rejection codes produced by the account layer and the
 * instruction processor.
 *
 * Test scenarios assert on these exact values, so members are never renamed
 * or removed.
 */
export enum ErrorCode {
    /** A writable slot was filled with a read-only account */
    AccountNotWritable = "AccountNotWritable",
    /** A stored relation field does not equal the related account's address */
    HasOneMismatch = "HasOneMismatch",
    /** Required signature absent */
    NotSigner = "NotSigner",
    /** Account owner does not match the declaring program */
    WrongOwner = "WrongOwner",
    /** Supplied address does not equal the canonical derivation */
    PdaMismatch = "PdaMismatch",
    /** Seeds are out of bounds, or no bump yields an off-curve address */
    InvalidSeeds = "InvalidSeeds",
    /** Type tag absent or does not match the declared schema */
    DiscriminatorMismatch = "DiscriminatorMismatch",
    /** Buffer too short for the declared schema body */
    AccountDidNotDeserialize = "AccountDidNotDeserialize",
    /** A required account slot was not supplied */
    MissingAccount = "MissingAccount",
    /** An `init` slot was filled with an account that already exists */
    AccountAlreadyInUse = "AccountAlreadyInUse",
    /** Init-guard flag already set */
    AlreadyInitialized = "AlreadyInitialized",
    ArithmeticOverflow = "ArithmeticOverflow",
    ArithmeticUnderflow = "ArithmeticUnderflow",
    DivideByZero = "DivideByZero",
    /** Instruction data has the wrong discriminator or cannot be decoded */
    InstructionDidNotDeserialize = "InstructionDidNotDeserialize",
    /** Handler-declared domain error; the rule name is in `details.rule` */
    BusinessRuleViolation = "BusinessRuleViolation",
}

/**
 * Stable numeric code for every {@link ErrorCode}.
 */
export const ERROR_CODE_NUMBERS: Readonly<Record<ErrorCode, number>> = {
    [ErrorCode.AccountNotWritable]: 2000,
    [ErrorCode.HasOneMismatch]: 2001,
    [ErrorCode.NotSigner]: 2002,
    [ErrorCode.WrongOwner]: 2004,
    [ErrorCode.PdaMismatch]: 2006,
    [ErrorCode.InvalidSeeds]: 2007,
    [ErrorCode.DiscriminatorMismatch]: 3002,
    [ErrorCode.AccountDidNotDeserialize]: 3003,
    [ErrorCode.MissingAccount]: 3005,
    [ErrorCode.AccountAlreadyInUse]: 3006,
    [ErrorCode.AlreadyInitialized]: 6000,
    [ErrorCode.ArithmeticOverflow]: 6001,
    [ErrorCode.ArithmeticUnderflow]: 6002,
    [ErrorCode.DivideByZero]: 6003,
    [ErrorCode.InstructionDidNotDeserialize]: 6004,
    [ErrorCode.BusinessRuleViolation]: 6100,
};

/**
 * Error thrown when an account check, a derivation check or a checked
 * operation fails.
 *
 * The instruction processor turns it into a `Rejected` outcome carrying the
 * same code. Optionally includes structured details for programmatic handling.
 *
 * @example
 * ```typescript
 * import { ProgramError, ErrorCode } from "solana-account-guard";
 *
 * try {
 *     asSigner(account);
 * } catch (error) {
 *     if (error instanceof ProgramError && error.code === ErrorCode.NotSigner) {
 *         console.error(error.message);
 *         // "Account 4Nd1mB... did not sign"
 *     }
 * }
 * ```
 */
export class ProgramError extends Error {
    public readonly code: ErrorCode;

    /** Optional structured details about the failure */
    public readonly details?: Record<string, unknown>;

    constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = "ProgramError";
        this.code = code;
        this.details = details;
    }

    /** Stable numeric form of {@link code} */
    get number(): number {
        return ERROR_CODE_NUMBERS[this.code];
    }
}

/**
 * Raise a handler-declared domain error such as `InsufficientFunds`.
 *
 * @example
 * ```typescript
 * if (vault.balance < amount) {
 *     throw businessError("InsufficientFunds", "Insufficient funds in vault");
 * }
 * ```
 */
export function businessError(
    rule: string,
    message: string,
    details?: Record<string, unknown>,
): ProgramError {
    return new ProgramError(ErrorCode.BusinessRuleViolation, message, { ...details, rule });
}

export function isProgramError(error: unknown, code?: ErrorCode): error is ProgramError {
    if (!(error instanceof ProgramError)) return false;
    return code === undefined || error.code === code;
}
