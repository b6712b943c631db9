import { SYSTEM_PROGRAM_ADDRESS } from "@solana-program/system";
import { getAddressDecoder, type Address } from "@solana/kit";
import { deriveProgramAddress, tryCreateProgramAddress, type Seed } from "./pda.js";
import { encodeAccountData, type AccountSchema } from "./schema.js";
import type { RawAccount } from "./types.js";

/**
 * Builders for the account states exploit / secure / sanity scenarios need:
 * signed or not, right or wrong owner, right or foreign discriminator,
 * canonical or non-canonical address, fresh or initialized.
 */

export interface AccountOptions {
    owner?: Address;
    lamports?: bigint;
    /** @default false */
    isSigner?: boolean;
    /** @default true */
    isWritable?: boolean;
}

/**
 * Deterministic address whose 32 bytes all equal `index` (0-255).
 */
export function mockAddress(index: number): Address {
    return getAddressDecoder().decode(new Uint8Array(32).fill(index));
}

/**
 * An address with no backing data: system-owned, empty, zero lamports.
 */
export function freshAccount(address: Address, options: AccountOptions = {}): RawAccount {
    return {
        address,
        owner: SYSTEM_PROGRAM_ADDRESS,
        data: new Uint8Array(0),
        lamports: options.lamports ?? 0n,
        isSigner: options.isSigner ?? false,
        isWritable: options.isWritable ?? true,
        exists: false,
    };
}

/**
 * A system-owned wallet. Signs unless told otherwise.
 */
export function walletAccount(address: Address, options: AccountOptions = {}): RawAccount {
    return {
        address,
        owner: options.owner ?? SYSTEM_PROGRAM_ADDRESS,
        data: new Uint8Array(0),
        lamports: options.lamports ?? 1_000_000_000n,
        isSigner: options.isSigner ?? true,
        isWritable: options.isWritable ?? true,
        exists: true,
    };
}

/**
 * An existing account holding `data` verbatim.
 */
export function dataAccount(
    address: Address,
    owner: Address,
    data: Uint8Array,
    options: Omit<AccountOptions, "owner"> = {},
): RawAccount {
    return {
        address,
        owner,
        data,
        lamports: options.lamports ?? 1_000_000n,
        isSigner: options.isSigner ?? false,
        isWritable: options.isWritable ?? true,
        exists: true,
    };
}

/**
 * An existing account of type `schema` holding `value`.
 */
export function programAccount<TData extends object>(
    address: Address,
    owner: Address,
    schema: AccountSchema<TData>,
    value: TData,
    options: Omit<AccountOptions, "owner"> = {},
): RawAccount {
    return dataAccount(address, owner, encodeAccountData(schema, value), options);
}

/**
 * The same account seen by a signing or non-signing caller.
 */
export function withSigner(account: RawAccount, isSigner: boolean): RawAccount {
    return { ...account, data: new Uint8Array(account.data), isSigner };
}

/**
 * Off-curve bumps for `seeds`, highest first. The first is the canonical one.
 */
export function validBumps(seeds: readonly Seed[], programAddress: Address): number[] {
    const bumps: number[] = [];
    for (let bump = 255; bump >= 0; bump--) {
        if (tryCreateProgramAddress([...seeds, new Uint8Array([bump])], programAddress) !== null) {
            bumps.push(bump);
        }
    }
    return bumps;
}

/**
 * Highest off-curve bump below the canonical one, with its address: a
 * "valid" derivation that canonical verification must still reject.
 *
 * @throws {Error} if the seeds have a single valid bump
 */
export function nonCanonicalAddress(
    seeds: readonly Seed[],
    programAddress: Address,
): readonly [address: Address, bump: number] {
    const [, canonicalBump] = deriveProgramAddress(seeds, programAddress);
    for (let bump = canonicalBump - 1; bump >= 0; bump--) {
        const address = tryCreateProgramAddress([...seeds, new Uint8Array([bump])], programAddress);
        if (address !== null) return [address, bump];
    }
    throw new Error("No non-canonical bump exists for these seeds");
}
