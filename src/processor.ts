import { SYSTEM_PROGRAM_ADDRESS } from "@solana-program/system";
import type { Address, ReadonlyUint8Array } from "@solana/kit";
import {
    asOwned,
    asSigner,
    asTyped,
    asUnchecked,
    rawAccountOf,
    type AccountView,
} from "./capabilities.js";
import { checkedAdd, checkedSub } from "./arithmetic.js";
import { evaluateConstraints } from "./constraints.js";
import { businessError, ErrorCode, isProgramError, ProgramError } from "./errors.js";
import { startsWith } from "./bytes.js";
import type {
    AccountBundle,
    AccountSlot,
    InstructionContext,
    InstructionDefinition,
    SlotMap,
} from "./instruction.js";
import { logger as defaultLogger, type Logger } from "./logging.js";
import { allocateAccountData } from "./schema.js";
import { ProcessorPhase, type Outcome, type RawAccount, type RejectedOutcome } from "./types.js";

/**
 * Configuration for creating an instruction processor.
 */
export interface ProcessorConfig {
    /**
     * Logger for phase transitions, rejections and handler messages.
     * @default module logger (level from `LOG_LEVEL`, else "warn")
     */
    logger?: Logger;

    /**
     * Collect handler messages into `Outcome.logs`.
     * @default true
     */
    captureLogs?: boolean;
}

/**
 * Runs one instruction against a set of accounts.
 *
 * `args` is either the structured argument value or full instruction data
 * (discriminator followed by the encoded arguments). Instructions without
 * arguments take `undefined`.
 */
export interface InstructionProcessor {
    process<TSlots extends SlotMap, TArgsInput, TArgs extends TArgsInput>(
        definition: InstructionDefinition<TSlots, TArgsInput, TArgs>,
        accounts: readonly RawAccount[],
        args: NoInfer<TArgsInput> | ReadonlyUint8Array,
    ): Outcome;
}

type Stage = RejectedOutcome["phase"];

class Rejection extends Error {
    constructor(
        readonly phase: Stage,
        readonly error: ProgramError,
    ) {
        super(error.message);
    }
}

function isBytes(value: unknown): value is ReadonlyUint8Array {
    return value instanceof Uint8Array;
}

function cloneAccount(account: RawAccount): RawAccount {
    return { ...account, data: new Uint8Array(account.data) };
}

function commit(target: RawAccount, source: RawAccount): void {
    target.owner = source.owner;
    target.data = new Uint8Array(source.data);
    target.lamports = source.lamports;
    target.exists = source.exists;
}

/**
 * Run `stage`, tagging any `ProgramError` it throws with the phase it came
 * from. Other errors are defects and propagate unchanged.
 */
function inPhase<T>(phase: Stage, stage: () => T): T {
    try {
        return stage();
    } catch (error) {
        if (isProgramError(error)) throw new Rejection(phase, error);
        throw error;
    }
}

function decodeArgs<TSlots extends SlotMap, TArgsInput, TArgs extends TArgsInput>(
    definition: InstructionDefinition<TSlots, TArgsInput, TArgs>,
    input: NoInfer<TArgsInput> | ReadonlyUint8Array,
): TArgs {
    if (isBytes(input)) {
        if (!startsWith(input, definition.discriminator)) {
            throw new ProgramError(
                ErrorCode.InstructionDidNotDeserialize,
                `${definition.name}: instruction discriminator mismatch`,
                { instruction: definition.name },
            );
        }
        return decodeOrReject(definition.name, () =>
            definition.args.decode(input, definition.discriminator.length),
        );
    }

    // round-trip structured input so range checks apply the same way as for bytes
    return decodeOrReject(definition.name, () =>
        definition.args.decode(definition.args.encode(input)),
    );
}

function decodeOrReject<TArgs>(instruction: string, decode: () => TArgs): TArgs {
    try {
        return decode();
    } catch (cause) {
        throw new ProgramError(
            ErrorCode.InstructionDidNotDeserialize,
            `${instruction}: could not decode instruction arguments`,
            { instruction, cause },
        );
    }
}

function resolveView(slot: AccountSlot, raw: RawAccount, programAddress: Address): AccountView {
    switch (slot.kind) {
        case "unchecked":
            return asUnchecked(raw);
        case "signer":
            return asSigner(raw);
        case "owned":
            return asOwned(raw, slot.program ?? programAddress);
        case "typed":
            return asTyped(raw, slot.schema, slot.program ?? programAddress);
        case "init":
            if (raw.exists) {
                throw new ProgramError(
                    ErrorCode.AccountAlreadyInUse,
                    `Account ${raw.address} already in use`,
                    { address: raw.address },
                );
            }
            raw.owner = programAddress;
            raw.data = allocateAccountData(slot.schema);
            raw.exists = true;
            return asTyped(raw, slot.schema, programAddress);
        default:
            slot satisfies never;
            throw new Error("Unknown slot kind");
    }
}

function assertSlotWritable(name: string, slot: AccountSlot, raw: RawAccount): void {
    if (slot.writable && !raw.isWritable) {
        throw new ProgramError(
            ErrorCode.AccountNotWritable,
            `${name}: account ${raw.address} must be writable`,
            { field: name, address: raw.address },
        );
    }
}

/**
 * Build the handler bundle. Each slot's view was produced by the
 * constructor matching its declared kind, so keys and kinds line up with
 * `AccountBundle<TSlots>`.
 */
function bundleViews<TSlots extends SlotMap>(
    slotNames: readonly Extract<keyof TSlots, string>[],
    views: ReadonlyMap<string, AccountView>,
): AccountBundle<TSlots>;
function bundleViews(
    slotNames: readonly string[],
    views: ReadonlyMap<string, AccountView>,
): Record<string, AccountView> {
    const bundle: Record<string, AccountView> = {};
    for (const name of slotNames) {
        const view = views.get(name);
        if (view) bundle[name] = view;
    }
    return Object.freeze(bundle);
}

/**
 * Move `amount` lamports from `from` to `to`. Only the account's owner may
 * debit it: `debitor` is the program on whose behalf the debit happens.
 * A move from an account to itself is checked like any other and changes
 * nothing.
 */
function moveLamports(debitor: Address, from: AccountView, to: AccountView, amount: bigint): void {
    const source = rawAccountOf(from);
    const destination = rawAccountOf(to);

    if (source.owner !== debitor) {
        throw new ProgramError(
            ErrorCode.WrongOwner,
            `Only ${source.owner} may debit ${source.address}`,
            { address: source.address, owner: source.owner, debitor },
        );
    }
    for (const account of [source, destination]) {
        if (!account.isWritable) {
            throw new ProgramError(
                ErrorCode.AccountNotWritable,
                `Account ${account.address} is not writable`,
                { address: account.address },
            );
        }
    }
    if (source.lamports < amount) {
        throw businessError(
            "InsufficientLamports",
            `Account ${source.address} holds ${source.lamports} lamports, ${amount} requested`,
            { address: source.address, lamports: source.lamports, amount },
        );
    }

    if (source === destination) return;

    const debited = checkedSub(source.lamports, amount);
    const credited = checkedAdd(destination.lamports, amount);
    source.lamports = debited;
    destination.lamports = credited;
}

interface ProcessorEnvironment {
    logger: Logger;
    captureLogs: boolean;
}

function runInstruction<TSlots extends SlotMap, TArgsInput, TArgs extends TArgsInput>(
    env: ProcessorEnvironment,
    definition: InstructionDefinition<TSlots, TArgsInput, TArgs>,
    accounts: readonly RawAccount[],
    args: NoInfer<TArgsInput> | ReadonlyUint8Array,
): Outcome {
    const log = env.logger.child({ instruction: definition.name });
    const logs: string[] = [];
    const transition = (phase: ProcessorPhase) => log.debug({ phase }, `-> ${phase}`);

    // one working copy per address, whichever slots and records carry it
    const working = new Map<Address, RawAccount>();
    const workingCopy = (account: RawAccount): RawAccount => {
        const copy = working.get(account.address);
        if (!copy) {
            const fresh = cloneAccount(account);
            working.set(account.address, fresh);
            return fresh;
        }
        copy.isSigner ||= account.isSigner;
        copy.isWritable ||= account.isWritable;
        return copy;
    };

    try {
        transition(ProcessorPhase.Resolving);
        const { decoded, assigned } = inPhase(ProcessorPhase.Resolving, () => {
            const decoded = decodeArgs(definition, args);
            for (const account of accounts) workingCopy(account);
            const assigned = new Map<Extract<keyof TSlots, string>, RawAccount>();
            for (const [index, name] of definition.slotNames.entries()) {
                const account = accounts[index];
                if (!account) {
                    throw new ProgramError(
                        ErrorCode.MissingAccount,
                        `${definition.name}: missing account "${name}" at position ${index}`,
                        { field: name, index },
                    );
                }
                assigned.set(name, workingCopy(account));
            }
            return { decoded, assigned };
        });

        transition(ProcessorPhase.Validating);
        const views = inPhase(ProcessorPhase.Validating, () => {
            const views = new Map<string, AccountView>();
            for (const [name, raw] of assigned) {
                const slot: AccountSlot = definition.accounts[name];
                assertSlotWritable(name, slot, raw);
                views.set(name, resolveView(slot, raw, definition.programAddress));
            }
            evaluateConstraints(definition.constraints, views, definition.programAddress);
            return views;
        });

        transition(ProcessorPhase.Executing);
        const ctx: InstructionContext<TSlots> = {
            programAddress: definition.programAddress,
            accounts: bundleViews<TSlots>(definition.slotNames, views),
            msg(message) {
                if (env.captureLogs) logs.push(message);
                log.info(message);
            },
            transferLamports(from, to, amount) {
                moveLamports(definition.programAddress, from, to, amount);
            },
            systemTransfer(from, to, amount) {
                moveLamports(SYSTEM_PROGRAM_ADDRESS, from, to, amount);
            },
        };
        inPhase(ProcessorPhase.Executing, () => definition.handler(ctx, decoded));
    } catch (error) {
        if (!(error instanceof Rejection)) throw error;

        transition(ProcessorPhase.Rejected);
        log.debug(
            { code: error.error.code, phase: error.phase, details: error.error.details },
            error.error.message,
        );
        return {
            status: "rejected",
            code: error.error.code,
            phase: error.phase,
            error: error.error,
            logs,
        };
    }

    for (const account of accounts) {
        const copy = working.get(account.address);
        if (copy) commit(account, copy);
    }
    transition(ProcessorPhase.Completed);
    return { status: "success", accounts, logs };
}

/**
 * Creates an instruction processor.
 *
 * Each call walks `Resolving → Validating → Executing → Completed`, stopping
 * in `Rejected` at the first failure:
 * 1. Resolving: decode arguments, match accounts to slots by position
 * 2. Validating: per slot in order, writability then capability; then the
 *    explicit constraints in order
 * 3. Executing: run the handler with the typed bundle
 *
 * The call works on one copy per address: the first record supplied for an
 * address provides its state, and signer and writable flags are merged
 * across every record for it. The final state is written back to every
 * record for that address, and only when the call completes.
 *
 * @example
 * ```typescript
 * const processor = createInstructionProcessor({ logger: pino({ level: "debug" }) });
 *
 * const outcome = processor.process(withdrawSecure, [vault, authority, recipient], { amount: 100n });
 * if (outcome.status === "rejected") {
 *     console.error(outcome.code); // "NotSigner"
 * }
 * ```
 */
export function createInstructionProcessor(config: ProcessorConfig = {}): InstructionProcessor {
    const env: ProcessorEnvironment = {
        logger: config.logger ?? defaultLogger,
        captureLogs: config.captureLogs ?? true,
    };

    return {
        process: (definition, accounts, args) => runInstruction(env, definition, accounts, args),
    };
}

const defaultProcessor = createInstructionProcessor();

/**
 * Run one instruction with the default processor configuration.
 */
export function processInstruction<TSlots extends SlotMap, TArgsInput, TArgs extends TArgsInput>(
    definition: InstructionDefinition<TSlots, TArgsInput, TArgs>,
    accounts: readonly RawAccount[],
    args: NoInfer<TArgsInput> | ReadonlyUint8Array,
): Outcome {
    return defaultProcessor.process(definition, accounts, args);
}
