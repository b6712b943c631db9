import type { FixedSizeCodec, ReadonlyUint8Array } from "@solana/kit";
import { accountDiscriminator, DISCRIMINATOR_SIZE, type Discriminator } from "./discriminator.js";

/**
 * Fixed layout of an account type: a name (source of its discriminator) and
 * a fixed-size body that follows the discriminator.
 *
 * `decodeBody` and `writeBody` do not look at the discriminator; typed reads
 * go through the capability layer, which verifies it first.
 *
 * @template TData - The decoded body type
 */
export interface AccountSchema<TData extends object = object> {
    readonly name: string;
    readonly discriminator: Discriminator;
    /** Body size in bytes */
    readonly bodySize: number;
    /** Discriminator plus body, in bytes */
    readonly space: number;
    decodeBody(data: ReadonlyUint8Array): TData;
    writeBody(value: TData, data: Uint8Array): void;
}

/**
 * Declare an account type.
 *
 * @example
 * ```typescript
 * const VaultSchema = defineAccountSchema(
 *     "Vault",
 *     getStructCodec([
 *         ["authority", getAddressCodec()],
 *         ["balance", getU64Codec()],
 *     ]),
 * );
 * VaultSchema.space; // 48
 * ```
 */
export function defineAccountSchema<TInput extends object, TData extends TInput>(
    name: string,
    codec: FixedSizeCodec<TInput, TData>,
): AccountSchema<TData> {
    return {
        name,
        discriminator: accountDiscriminator(name),
        bodySize: codec.fixedSize,
        space: DISCRIMINATOR_SIZE + codec.fixedSize,
        decodeBody(data) {
            return codec.read(data, DISCRIMINATOR_SIZE)[0];
        },
        writeBody(value, data) {
            codec.write(value, data, DISCRIMINATOR_SIZE);
        },
    };
}

/**
 * Full account buffer for `value`: discriminator followed by the encoded body.
 */
export function encodeAccountData<TData extends object>(
    schema: AccountSchema<TData>,
    value: TData,
): Uint8Array {
    const data = allocateAccountData(schema);
    schema.writeBody(value, data);
    return data;
}

/**
 * Zero-filled account buffer carrying only the discriminator.
 */
export function allocateAccountData(schema: AccountSchema): Uint8Array {
    const data = new Uint8Array(schema.space);
    data.set(schema.discriminator, 0);
    return data;
}
