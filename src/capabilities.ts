import type { Address, ReadonlyUint8Array } from "@solana/kit";
import { ErrorCode, ProgramError } from "./errors.js";
import { verifyDiscriminator } from "./discriminator.js";
import type { AccountSchema } from "./schema.js";
import type { RawAccount } from "./types.js";

declare const capability: unique symbol;

/**
 * Fields shared by every capability view. The `capability` brand cannot be
 * named outside this module, so views only come from the `as*` constructors.
 */
interface CapabilityBase {
    readonly [capability]: true;
    readonly address: Address;
    readonly isWritable: boolean;
    readonly lamports: bigint;
}

/**
 * No proof at all. Models the vulnerable path: raw bytes, read only.
 */
export interface UncheckedAccount extends CapabilityBase {
    readonly kind: "unchecked";
    readonly data: ReadonlyUint8Array;
}

/**
 * Proof that the account signed. Identity only; no data access.
 */
export interface SignerAccount extends CapabilityBase {
    readonly kind: "signer";
}

/**
 * Proof that the account exists and is owned by the expected program.
 */
export interface OwnedAccount extends CapabilityBase {
    readonly kind: "owned";
    readonly owner: Address;
    readonly isSigner: boolean;
    readonly data: ReadonlyUint8Array;
    /** @throws {ProgramError} `AccountNotWritable` */
    writeBytes(offset: number, bytes: ReadonlyUint8Array): void;
}

/**
 * Owned account whose discriminator matched `schema`. Reads decode the
 * current buffer; writes encode back into it at the schema's offsets.
 */
export interface TypedAccount<TData extends object = object> extends CapabilityBase {
    readonly kind: "typed";
    readonly owner: Address;
    readonly isSigner: boolean;
    readonly schema: AccountSchema<TData>;
    readonly data: TData;
    /** @throws {ProgramError} `AccountNotWritable` */
    write(value: TData): void;
    /**
     * Write the given fields, keeping the rest. Fields set to `undefined`
     * keep their stored value.
     *
     * @throws {ProgramError} `AccountNotWritable`
     */
    update(patch: Partial<TData>): void;
}

export type AccountView = UncheckedAccount | SignerAccount | OwnedAccount | TypedAccount;

export type CapabilityKind = AccountView["kind"];

const backing = new WeakMap<object, RawAccount>();

function register<TView extends AccountView>(view: Omit<TView, typeof capability>, raw: RawAccount): TView;
function register(view: object, raw: RawAccount): object {
    backing.set(view, raw);
    return view;
}

/**
 * The account behind a view. Throws for objects that were not produced by
 * this module.
 *
 * @internal
 */
export function rawAccountOf(view: AccountView): RawAccount {
    const raw = backing.get(view);
    if (!raw) {
        throw new Error("Object is not a capability view created by this module");
    }
    return raw;
}

function assertWritable(raw: RawAccount): void {
    if (!raw.isWritable) {
        throw new ProgramError(
            ErrorCode.AccountNotWritable,
            `Account ${raw.address} is not writable`,
            { address: raw.address },
        );
    }
}

/**
 * Wrap without any check. Always succeeds.
 */
export function asUnchecked(raw: RawAccount): UncheckedAccount {
    return register<UncheckedAccount>(
        {
            kind: "unchecked",
            address: raw.address,
            get isWritable() {
                return raw.isWritable;
            },
            get lamports() {
                return raw.lamports;
            },
            get data() {
                return raw.data;
            },
        },
        raw,
    );
}

/**
 * @throws {ProgramError} `NotSigner` unless the account signed
 */
export function asSigner(raw: RawAccount): SignerAccount {
    if (!raw.isSigner) {
        throw new ProgramError(ErrorCode.NotSigner, `Account ${raw.address} did not sign`, {
            address: raw.address,
        });
    }

    return register<SignerAccount>(
        {
            kind: "signer",
            address: raw.address,
            get isWritable() {
                return raw.isWritable;
            },
            get lamports() {
                return raw.lamports;
            },
        },
        raw,
    );
}

function assertOwner(raw: RawAccount, expectedOwner: Address): void {
    if (!raw.exists) {
        throw new ProgramError(
            ErrorCode.WrongOwner,
            `Account ${raw.address} does not exist (expected owner ${expectedOwner})`,
            { address: raw.address, expectedOwner },
        );
    }
    if (raw.owner !== expectedOwner) {
        throw new ProgramError(
            ErrorCode.WrongOwner,
            `Account ${raw.address} is owned by ${raw.owner}, expected ${expectedOwner}`,
            { address: raw.address, owner: raw.owner, expectedOwner },
        );
    }
}

/**
 * @throws {ProgramError} `WrongOwner` unless the account exists and is owned
 * by `expectedOwner`
 */
export function asOwned(raw: RawAccount, expectedOwner: Address): OwnedAccount {
    assertOwner(raw, expectedOwner);

    return register<OwnedAccount>(
        {
            kind: "owned",
            address: raw.address,
            owner: raw.owner,
            isSigner: raw.isSigner,
            get isWritable() {
                return raw.isWritable;
            },
            get lamports() {
                return raw.lamports;
            },
            get data() {
                return raw.data;
            },
            writeBytes(offset, bytes) {
                assertWritable(raw);
                if (offset < 0 || offset + bytes.length > raw.data.length) {
                    throw new RangeError(
                        `Write of ${bytes.length} bytes at ${offset} exceeds account size ${raw.data.length}`,
                    );
                }
                raw.data.set(bytes, offset);
            },
        },
        raw,
    );
}

/**
 * Owner check, then discriminator check, then body decode. An account with
 * the right owner but the wrong type fails with `DiscriminatorMismatch`; an
 * account with the wrong owner fails with `WrongOwner` whatever its bytes.
 *
 * @throws {ProgramError} `WrongOwner`, `DiscriminatorMismatch` or
 * `AccountDidNotDeserialize`
 */
export function asTyped<TData extends object>(
    raw: RawAccount,
    schema: AccountSchema<TData>,
    expectedOwner: Address,
): TypedAccount<TData> {
    assertOwner(raw, expectedOwner);
    verifyDiscriminator(raw.data, schema.name);

    if (raw.data.length < schema.space) {
        throw new ProgramError(
            ErrorCode.AccountDidNotDeserialize,
            `${schema.name}: account ${raw.address} holds ${raw.data.length} bytes, expected at least ${schema.space}`,
            { address: raw.address, length: raw.data.length, space: schema.space },
        );
    }

    return register<TypedAccount<TData>>(
        {
            kind: "typed",
            address: raw.address,
            owner: raw.owner,
            isSigner: raw.isSigner,
            schema,
            get isWritable() {
                return raw.isWritable;
            },
            get lamports() {
                return raw.lamports;
            },
            get data() {
                return schema.decodeBody(raw.data);
            },
            write(value) {
                assertWritable(raw);
                schema.writeBody(value, raw.data);
            },
            update(patch) {
                assertWritable(raw);
                const next = schema.decodeBody(raw.data);
                for (const key in patch) {
                    const value = patch[key];
                    if (value !== undefined) next[key] = value;
                }
                schema.writeBody(next, raw.data);
            },
        },
        raw,
    );
}
