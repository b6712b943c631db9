import { ed25519 } from "@noble/curves/ed25519";
import { sha256 } from "@noble/hashes/sha256";
import {
    getAddressDecoder,
    getAddressEncoder,
    getUtf8Encoder,
    type Address,
    type ReadonlyUint8Array,
} from "@solana/kit";
import { ErrorCode, ProgramError } from "./errors.js";
import { concatBytes } from "./bytes.js";

export const MAX_SEEDS = 16;
export const MAX_SEED_LENGTH = 32;
export const MAX_BUMP = 255;

const PDA_MARKER = getUtf8Encoder().encode("ProgramDerivedAddress");

/**
 * A seed: raw bytes, or a string encoded as utf-8.
 */
export type Seed = string | ReadonlyUint8Array;

export type ProgramDerivedAddress = readonly [address: Address, bump: number];

function seedBytes(seed: Seed): ReadonlyUint8Array {
    return typeof seed === "string" ? getUtf8Encoder().encode(seed) : seed;
}

function assertSeeds(seeds: readonly ReadonlyUint8Array[], maxSeeds: number): void {
    if (seeds.length > maxSeeds) {
        throw new ProgramError(
            ErrorCode.InvalidSeeds,
            `Too many seeds: ${seeds.length} > ${maxSeeds}`,
            { count: seeds.length, max: maxSeeds },
        );
    }
    for (const [index, seed] of seeds.entries()) {
        if (seed.length > MAX_SEED_LENGTH) {
            throw new ProgramError(
                ErrorCode.InvalidSeeds,
                `Seed ${index} is ${seed.length} bytes, max ${MAX_SEED_LENGTH}`,
                { index, length: seed.length },
            );
        }
    }
}

/**
 * Whether 32 bytes decode to a point on the ed25519 curve, i.e. whether a
 * private key could exist for them.
 */
export function isOnCurve(bytes: ReadonlyUint8Array): boolean {
    try {
        ed25519.ExtendedPoint.fromHex(new Uint8Array(bytes));
        return true;
    } catch {
        return false;
    }
}

function hashToAddressBytes(
    seeds: readonly ReadonlyUint8Array[],
    programAddress: Address,
): Uint8Array {
    return sha256(concatBytes([...seeds, getAddressEncoder().encode(programAddress), PDA_MARKER]));
}

/**
 * Address for `seeds` (which already include any bump) under
 * `programAddress`, or `null` when the hash lands on the curve.
 */
export function tryCreateProgramAddress(
    seeds: readonly Seed[],
    programAddress: Address,
): Address | null {
    const bytes = seeds.map(seedBytes);
    assertSeeds(bytes, MAX_SEEDS);

    const candidate = hashToAddressBytes(bytes, programAddress);
    if (isOnCurve(candidate)) return null;
    return getAddressDecoder().decode(candidate);
}

/**
 * Address for `seeds` (which already include any bump) under
 * `programAddress`.
 *
 * Builds an address for a known bump. Whether that bump is the canonical one
 * is a separate question; authorization checks use
 * {@link verifyCanonicalAddress} instead.
 *
 * @throws {ProgramError} `InvalidSeeds` when the seeds are out of bounds or
 * the result lies on the curve
 */
export function createProgramAddress(seeds: readonly Seed[], programAddress: Address): Address {
    const address = tryCreateProgramAddress(seeds, programAddress);
    if (address === null) {
        throw new ProgramError(
            ErrorCode.InvalidSeeds,
            `Seeds produce an on-curve address for program ${programAddress}`,
            { programAddress },
        );
    }
    return address;
}

/**
 * Canonical program-derived address: bumps are tried from 255 down to 0 and
 * the first off-curve result wins.
 *
 * @throws {ProgramError} `InvalidSeeds` when the seeds are out of bounds or no
 * bump yields an off-curve address
 *
 * @example
 * ```typescript
 * const [vault, bump] = deriveProgramAddress(["vault", getAddressEncoder().encode(authority)], programId);
 * ```
 */
export function deriveProgramAddress(
    seeds: readonly Seed[],
    programAddress: Address,
): ProgramDerivedAddress {
    const bytes = seeds.map(seedBytes);
    // the bump takes the last seed slot
    assertSeeds(bytes, MAX_SEEDS - 1);

    for (let bump = MAX_BUMP; bump >= 0; bump--) {
        const candidate = hashToAddressBytes([...bytes, new Uint8Array([bump])], programAddress);
        if (!isOnCurve(candidate)) {
            return [getAddressDecoder().decode(candidate), bump];
        }
    }

    throw new ProgramError(
        ErrorCode.InvalidSeeds,
        `No bump in [0, ${MAX_BUMP}] yields an off-curve address for program ${programAddress}`,
        { programAddress },
    );
}

/**
 * Accept `candidate` only if it is the canonical derivation of `seeds`.
 * There is deliberately no variant taking a bump.
 *
 * @returns The canonical bump, for storage
 * @throws {ProgramError} `PdaMismatch` when `candidate` differs
 */
export function verifyCanonicalAddress(
    candidate: Address,
    seeds: readonly Seed[],
    programAddress: Address,
): number {
    const [expected, bump] = deriveProgramAddress(seeds, programAddress);
    if (candidate !== expected) {
        throw new ProgramError(
            ErrorCode.PdaMismatch,
            `Address ${candidate} is not the canonical derivation ${expected} (bump ${bump})`,
            { candidate, expected, bump },
        );
    }
    return bump;
}
