import type { Address, Codec, ReadonlyUint8Array } from "@solana/kit";
import type {
    AccountView,
    OwnedAccount,
    SignerAccount,
    TypedAccount,
    UncheckedAccount,
} from "./capabilities.js";
import type { Constraint } from "./constraints.js";
import { instructionDiscriminator, type Discriminator } from "./discriminator.js";
import { logger as defaultLogger, type Logger } from "./logging.js";
import type { AccountSchema } from "./schema.js";

// ============================================================================
// Account slots
// ============================================================================

export interface UncheckedSlot {
    kind: "unchecked";
    writable: boolean;
}

export interface SignerSlot {
    kind: "signer";
    writable: boolean;
}

export interface OwnedSlot {
    kind: "owned";
    writable: boolean;
    /** @default the instruction's program */
    program?: Address;
}

export interface TypedSlot<TData extends object = object> {
    kind: "typed";
    writable: boolean;
    schema: AccountSchema<TData>;
    /** @default the instruction's program */
    program?: Address;
}

/**
 * An account the instruction creates: it must not exist yet. The processor
 * allocates it (owner = program, discriminator written, body zeroed) before
 * the handler runs. Always writable.
 */
export interface InitSlot<TData extends object = object> {
    kind: "init";
    writable: true;
    schema: AccountSchema<TData>;
}

export type AccountSlot = UncheckedSlot | SignerSlot | OwnedSlot | TypedSlot | InitSlot;

/**
 * Named slots. Accounts are matched by position, in key order.
 */
export type SlotMap = Record<string, AccountSlot>;

interface SlotOptions {
    /** @default false */
    writable?: boolean;
}

interface ProgramSlotOptions extends SlotOptions {
    /** @default the instruction's program */
    program?: Address;
}

/**
 * Slot declarations.
 *
 * @example
 * ```typescript
 * accounts: {
 *     vault: slot.typed(VaultSchema, { writable: true }),
 *     authority: slot.signer(),
 *     recipient: slot.unchecked({ writable: true }),
 * }
 * ```
 */
export const slot = {
    unchecked: (options: SlotOptions = {}): UncheckedSlot => ({
        kind: "unchecked",
        writable: options.writable ?? false,
    }),
    signer: (options: SlotOptions = {}): SignerSlot => ({
        kind: "signer",
        writable: options.writable ?? false,
    }),
    owned: (options: ProgramSlotOptions = {}): OwnedSlot => ({
        kind: "owned",
        writable: options.writable ?? false,
        program: options.program,
    }),
    typed: <TData extends object>(
        schema: AccountSchema<TData>,
        options: ProgramSlotOptions = {},
    ): TypedSlot<TData> => ({
        kind: "typed",
        writable: options.writable ?? false,
        schema,
        program: options.program,
    }),
    init: <TData extends object>(schema: AccountSchema<TData>): InitSlot<TData> => ({
        kind: "init",
        writable: true,
        schema,
    }),
};

/**
 * The view a handler receives for a slot.
 */
export type ViewOf<TSlot extends AccountSlot> = TSlot extends TypedSlot<infer TData>
    ? TypedAccount<TData>
    : TSlot extends InitSlot<infer TData>
      ? TypedAccount<TData>
      : TSlot extends OwnedSlot
        ? OwnedAccount
        : TSlot extends SignerSlot
          ? SignerAccount
          : UncheckedAccount;

export type AccountBundle<TSlots extends SlotMap> = {
    readonly [K in keyof TSlots]: ViewOf<TSlots[K]>;
};

// ============================================================================
// Definitions
// ============================================================================

/**
 * What a handler can touch during one call.
 */
export interface InstructionContext<TSlots extends SlotMap> {
    readonly programAddress: Address;
    readonly accounts: AccountBundle<TSlots>;
    /** Append a program log line */
    msg(message: string): void;
    /**
     * Move lamports. `from` must be writable and owned by the executing
     * program; `to` must be writable.
     *
     * @throws {ProgramError} `AccountNotWritable`, `WrongOwner`, or a business
     * error with rule `"InsufficientLamports"`
     */
    transferLamports(from: OwnedAccount | TypedAccount, to: AccountView, amount: bigint): void;
    /**
     * Move lamports out of a system-owned wallet that signed, the way a
     * transfer through the system program would. Both sides must be writable.
     *
     * @throws {ProgramError} `AccountNotWritable`, `WrongOwner`, or a business
     * error with rule `"InsufficientLamports"`
     */
    systemTransfer(from: SignerAccount, to: AccountView, amount: bigint): void;
}

/**
 * Handler logic. Runs only after every slot and constraint check passed.
 * Signal domain failures by throwing a `ProgramError`; compute every checked
 * quantity before writing any of them.
 */
export type InstructionHandler<TSlots extends SlotMap, TArgs> = (
    ctx: InstructionContext<TSlots>,
    args: TArgs,
) => void;

export interface InstructionConfig<TSlots extends SlotMap, TArgsInput, TArgs extends TArgsInput> {
    name: string;
    programAddress: Address;
    accounts: TSlots;
    /**
     * Explicit constraints, evaluated in order after every slot resolved.
     * @default []
     */
    constraints?: readonly Constraint<Extract<keyof TSlots, string>>[];
    /** Codec for the arguments that follow the instruction discriminator */
    args: Codec<TArgsInput, TArgs>;
    handler: InstructionHandler<TSlots, TArgs>;
    /** @default module logger */
    logger?: Logger;
}

export interface InstructionDefinition<
    TSlots extends SlotMap = SlotMap,
    TArgsInput = unknown,
    TArgs extends TArgsInput = TArgsInput,
> {
    readonly name: string;
    readonly programAddress: Address;
    readonly discriminator: Discriminator;
    readonly accounts: TSlots;
    /** Slot names in positional order */
    readonly slotNames: readonly Extract<keyof TSlots, string>[];
    readonly constraints: readonly Constraint<Extract<keyof TSlots, string>>[];
    readonly args: Codec<TArgsInput, TArgs>;
    handler(ctx: InstructionContext<TSlots>, args: TArgs): void;
}

function slotKeys<TSlots extends SlotMap>(slots: TSlots): Extract<keyof TSlots, string>[] {
    const keys: Extract<keyof TSlots, string>[] = [];
    for (const key in slots) {
        if (Object.hasOwn(slots, key)) keys.push(key);
    }
    return keys;
}

function assertKnown(slots: SlotMap, field: string, where: string): AccountSlot {
    const found = slots[field];
    if (!found) {
        throw new Error(`${where}: unknown account "${field}"`);
    }
    return found;
}

function assertTyped(slots: SlotMap, field: string, where: string): void {
    const found = assertKnown(slots, field, where);
    if (found.kind !== "typed") {
        throw new Error(`${where}: account "${field}" must be a typed slot, got ${found.kind}`);
    }
}

function checkConstraints(
    name: string,
    slots: SlotMap,
    constraints: readonly Constraint[],
    log: Logger,
): void {
    for (const constraint of constraints) {
        const where = `${name}: ${constraint.kind}`;
        assertKnown(slots, constraint.field, where);

        switch (constraint.kind) {
            case "signer":
            case "owner":
                break;
            case "hasOne": {
                assertTyped(slots, constraint.field, where);
                const target = assertKnown(slots, constraint.target, where);
                const signerPaired =
                    target.kind === "signer" ||
                    constraints.some((c) => c.kind === "signer" && c.field === constraint.target);
                if (!signerPaired) {
                    log.warn(
                        { instruction: name, field: constraint.field, target: constraint.target },
                        `hasOne target "${constraint.target}" is not required to sign`,
                    );
                }
                break;
            }
            case "seeds":
                for (const source of constraint.seeds) {
                    if (typeof source === "object" && "account" in source) {
                        assertKnown(slots, source.account, where);
                    }
                }
                if (constraint.bump !== undefined) {
                    assertTyped(slots, constraint.field, where);
                }
                break;
            case "initGuard":
                assertTyped(slots, constraint.field, where);
                break;
            default:
                constraint satisfies never;
        }
    }
}

/**
 * Declare an instruction: its account slots, its constraints, its argument
 * codec and its handler.
 *
 * Resolution order on every call: each slot in key order (writability, then
 * its capability), then the explicit constraints in array order.
 *
 * @throws {Error} when a constraint references an unknown slot or needs a
 * typed slot it does not have
 *
 * @example
 * ```typescript
 * const withdraw = defineInstruction({
 *     name: "withdraw",
 *     programAddress: PROGRAM_ID,
 *     accounts: {
 *         vault: slot.typed(VaultSchema, { writable: true }),
 *         authority: slot.signer(),
 *         recipient: slot.unchecked({ writable: true }),
 *     },
 *     constraints: [hasOne("vault", "authority")],
 *     args: getStructCodec([["amount", getU64Codec()]]),
 *     handler(ctx, { amount }) {
 *         // ...
 *     },
 * });
 * ```
 */
export function defineInstruction<TSlots extends SlotMap, TArgsInput, TArgs extends TArgsInput>(
    config: InstructionConfig<TSlots, TArgsInput, TArgs>,
): InstructionDefinition<TSlots, TArgsInput, TArgs> {
    const constraints = config.constraints ?? [];
    checkConstraints(config.name, config.accounts, constraints, config.logger ?? defaultLogger);

    return {
        name: config.name,
        programAddress: config.programAddress,
        discriminator: instructionDiscriminator(config.name),
        accounts: config.accounts,
        slotNames: slotKeys(config.accounts),
        constraints,
        args: config.args,
        handler: config.handler,
    };
}

/**
 * Instruction data: discriminator followed by the encoded arguments.
 */
export function encodeInstructionData<
    TSlots extends SlotMap,
    TArgsInput,
    TArgs extends TArgsInput,
>(
    definition: InstructionDefinition<TSlots, TArgsInput, TArgs>,
    args: NoInfer<TArgsInput>,
): Uint8Array {
    const body: ReadonlyUint8Array = definition.args.encode(args);
    const data = new Uint8Array(definition.discriminator.length + body.length);
    data.set(definition.discriminator, 0);
    data.set(body, definition.discriminator.length);
    return data;
}
