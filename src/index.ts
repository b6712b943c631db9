// ============================================================================
// Types
// ============================================================================

export {
    ProcessorPhase,
    type RawAccount,
    type Outcome,
    type SuccessOutcome,
    type RejectedOutcome,
} from "./types.js";

// ============================================================================
// Errors
// ============================================================================

export {
    ErrorCode,
    ERROR_CODE_NUMBERS,
    ProgramError,
    businessError,
    isProgramError,
} from "./errors.js";

// ============================================================================
// Logging
// ============================================================================

export { createLogger, resolveLogLevel, logger, type Logger } from "./logging.js";

// ============================================================================
// Primitives
// ============================================================================

export {
    checkedAdd,
    checkedSub,
    checkedMul,
    checkedDiv,
    U8,
    U16,
    U32,
    U64,
    U128,
    I8,
    I16,
    I32,
    I64,
    I128,
    type IntegerWidth,
} from "./arithmetic.js";
export {
    DISCRIMINATOR_SIZE,
    accountDiscriminator,
    instructionDiscriminator,
    verifyDiscriminator,
    type Discriminator,
} from "./discriminator.js";
export {
    MAX_SEEDS,
    MAX_SEED_LENGTH,
    MAX_BUMP,
    isOnCurve,
    tryCreateProgramAddress,
    createProgramAddress,
    deriveProgramAddress,
    verifyCanonicalAddress,
    type Seed,
    type ProgramDerivedAddress,
} from "./pda.js";
export { bytesEqual, startsWith, concatBytes, hexPreview } from "./bytes.js";

// ============================================================================
// Accounts
// ============================================================================

export {
    defineAccountSchema,
    encodeAccountData,
    allocateAccountData,
    type AccountSchema,
} from "./schema.js";
export {
    asUnchecked,
    asSigner,
    asOwned,
    asTyped,
    type AccountView,
    type CapabilityKind,
    type UncheckedAccount,
    type SignerAccount,
    type OwnedAccount,
    type TypedAccount,
} from "./capabilities.js";

// ============================================================================
// Constraints
// ============================================================================

export {
    requireSigner,
    requireOwned,
    hasOne,
    seeds,
    initGuard,
    readPath,
    evaluateConstraints,
    type Constraint,
    type SeedSource,
    type SignerConstraint,
    type OwnerConstraint,
    type HasOneConstraint,
    type SeedsConstraint,
    type InitGuardConstraint,
} from "./constraints.js";

// ============================================================================
// Instructions
// ============================================================================

export {
    slot,
    defineInstruction,
    encodeInstructionData,
    type AccountSlot,
    type UncheckedSlot,
    type SignerSlot,
    type OwnedSlot,
    type TypedSlot,
    type InitSlot,
    type SlotMap,
    type ViewOf,
    type AccountBundle,
    type InstructionContext,
    type InstructionHandler,
    type InstructionConfig,
    type InstructionDefinition,
} from "./instruction.js";

// ============================================================================
// Processor
// ============================================================================

export {
    createInstructionProcessor,
    processInstruction,
    type ProcessorConfig,
    type InstructionProcessor,
} from "./processor.js";

// ============================================================================
// Fixtures
// ============================================================================

export {
    mockAddress,
    freshAccount,
    walletAccount,
    dataAccount,
    programAccount,
    withSigner,
    validBumps,
    nonCanonicalAddress,
    type AccountOptions,
} from "./fixtures.js";
