import {
    address,
    getAddressCodec,
    getAddressDecoder,
    getStructCodec,
    getU64Codec,
    getU64Encoder,
    type Address,
} from "@solana/kit";
import { businessError } from "../errors.js";
import { defineInstruction, slot } from "../instruction.js";
import { defineAccountSchema } from "../schema.js";

export const TYPE_COSPLAY_PROGRAM_ADDRESS = address("AdminFee11111111111111111111111111111111111");

export const AdminConfigSchema = defineAccountSchema(
    "AdminConfig",
    getStructCodec([
        ["admin", getAddressCodec()],
        ["feeBasisPoints", getU64Codec()],
    ]),
);

/** Same byte layout as {@link AdminConfigSchema}: only the discriminator differs. */
export const UserDataSchema = defineAccountSchema(
    "UserData",
    getStructCodec([
        ["authority", getAddressCodec()],
        ["balance", getU64Codec()],
    ]),
);

const ADMIN_OFFSET = 8;
const FEE_OFFSET = 40;

const newFeeArgs = getStructCodec([["newFee", getU64Codec()]]);

function unauthorized(admin: Address, signer: Address): never {
    throw businessError("Unauthorized", "Unauthorized: signer is not admin", { admin, signer });
}

/**
 * Owner-checked but untyped: the admin is read at a fixed offset, so a
 * `UserData` account whose authority is the caller passes as a config.
 */
export const updateFeeVulnerable = defineInstruction({
    name: "update_fee_vulnerable",
    programAddress: TYPE_COSPLAY_PROGRAM_ADDRESS,
    accounts: {
        config: slot.owned({ writable: true }),
        authority: slot.signer(),
    },
    args: newFeeArgs,
    handler(ctx, { newFee }) {
        const { config, authority } = ctx.accounts;
        if (config.data.length < FEE_OFFSET + 8) {
            throw businessError("DeserializationFailed", "Failed to deserialize account data", {
                length: config.data.length,
            });
        }

        const admin = getAddressDecoder().decode(config.data, ADMIN_OFFSET);
        if (admin !== authority.address) unauthorized(admin, authority.address);

        config.writeBytes(FEE_OFFSET, getU64Encoder().encode(newFee));
        ctx.msg(`Fee updated to ${newFee} (no discriminator check)`);
    },
});

export const updateFeeSecure = defineInstruction({
    name: "update_fee_secure",
    programAddress: TYPE_COSPLAY_PROGRAM_ADDRESS,
    accounts: {
        config: slot.typed(AdminConfigSchema, { writable: true }),
        authority: slot.signer(),
    },
    args: newFeeArgs,
    handler(ctx, { newFee }) {
        const { config, authority } = ctx.accounts;
        const { admin } = config.data;
        if (admin !== authority.address) unauthorized(admin, authority.address);

        config.update({ feeBasisPoints: newFee });
        ctx.msg(`Fee updated to ${newFee} (discriminator verified)`);
    },
});
