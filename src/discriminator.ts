import { sha256 } from "@noble/hashes/sha256";
import { getUtf8Encoder, type ReadonlyUint8Array } from "@solana/kit";
import { ErrorCode, ProgramError } from "./errors.js";
import { bytesEqual, hexPreview } from "./bytes.js";

export const DISCRIMINATOR_SIZE = 8;

/** 8-byte leading type tag */
export type Discriminator = ReadonlyUint8Array;

function digestPrefix(preimage: string): Discriminator {
    const digest = sha256(new Uint8Array(getUtf8Encoder().encode(preimage)));
    return digest.slice(0, DISCRIMINATOR_SIZE);
}

/**
 * Discriminator of an account type: the first 8 bytes of
 * `sha256("account:" + typeName)`.
 *
 * Pure; nothing is registered or cached, so two callers computing the tag
 * for the same name always agree.
 *
 * @example
 * ```typescript
 * accountDiscriminator("Vault"); // Uint8Array(8) [211, 8, 232, 43, 2, 152, 117, 119]
 * ```
 */
export function accountDiscriminator(typeName: string): Discriminator {
    return digestPrefix(`account:${typeName}`);
}

/**
 * Discriminator of an instruction: the first 8 bytes of
 * `sha256("global:" + instructionName)`.
 */
export function instructionDiscriminator(instructionName: string): Discriminator {
    return digestPrefix(`global:${instructionName}`);
}

/**
 * Check that `data` starts with the discriminator of `typeName`.
 *
 * This is the only gate in front of typed decoding.
 *
 * @throws {ProgramError} `DiscriminatorMismatch` when the buffer is shorter
 * than 8 bytes or its leading tag differs
 */
export function verifyDiscriminator(data: ReadonlyUint8Array, typeName: string): void {
    if (data.length < DISCRIMINATOR_SIZE) {
        throw new ProgramError(
            ErrorCode.DiscriminatorMismatch,
            `${typeName}: discriminator not found (buffer is ${data.length} bytes)`,
            { typeName, length: data.length },
        );
    }

    const expected = accountDiscriminator(typeName);
    const actual = data.slice(0, DISCRIMINATOR_SIZE);
    if (!bytesEqual(actual, expected)) {
        throw new ProgramError(
            ErrorCode.DiscriminatorMismatch,
            `${typeName}: discriminator ${hexPreview(actual)} does not match expected ${hexPreview(expected)}`,
            { typeName },
        );
    }
}
