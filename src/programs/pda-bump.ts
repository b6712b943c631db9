import {
    address,
    getAddressCodec,
    getAddressEncoder,
    getStructCodec,
    getU64Codec,
    getU8Codec,
    type Address,
} from "@solana/kit";
import { hasOne, seeds } from "../constraints.js";
import { ErrorCode, ProgramError } from "../errors.js";
import { defineInstruction, slot } from "../instruction.js";
import { createProgramAddress, deriveProgramAddress } from "../pda.js";
import { defineAccountSchema } from "../schema.js";

export const PDA_BUMP_PROGRAM_ADDRESS = address("PdaBump111111111111111111111111111111111111");

/** Seed prefix of data accounts: `["data", user]` */
export const DATA_SEED = "data";

export const DataAccountSchema = defineAccountSchema(
    "DataAccount",
    getStructCodec([
        ["user", getAddressCodec()],
        ["value", getU64Codec()],
        ["bump", getU8Codec()],
    ]),
);

export const dataAccountSeeds = (user: Address) => [DATA_SEED, getAddressEncoder().encode(user)];

/**
 * Rebuilds the address from a caller-chosen bump. Any off-curve bump for the
 * seeds passes, so one user can hold several "valid" data accounts.
 */
export const setValueVulnerable = defineInstruction({
    name: "set_value_vulnerable",
    programAddress: PDA_BUMP_PROGRAM_ADDRESS,
    accounts: {
        dataAccount: slot.typed(DataAccountSchema, { writable: true }),
        user: slot.signer(),
    },
    args: getStructCodec([
        ["bump", getU8Codec()],
        ["value", getU64Codec()],
    ]),
    handler(ctx, { bump, value }) {
        const { dataAccount, user } = ctx.accounts;
        const pda = createProgramAddress(
            [...dataAccountSeeds(user.address), new Uint8Array([bump])],
            ctx.programAddress,
        );
        if (pda !== dataAccount.address) {
            throw new ProgramError(
                ErrorCode.PdaMismatch,
                `Seeds with bump ${bump} derive ${pda}, not ${dataAccount.address}`,
                { expected: pda, actual: dataAccount.address, bump },
            );
        }

        dataAccount.write({ user: user.address, value, bump });
        ctx.msg(`Set value=${value} at bump=${bump} (caller-supplied bump)`);
    },
});

/**
 * Accepts only the canonical address and records the canonical bump.
 */
export const setValueSecure = defineInstruction({
    name: "set_value_secure",
    programAddress: PDA_BUMP_PROGRAM_ADDRESS,
    accounts: {
        dataAccount: slot.typed(DataAccountSchema, { writable: true }),
        user: slot.signer(),
    },
    constraints: [seeds<"dataAccount" | "user">("dataAccount", [DATA_SEED, { account: "user" }])],
    args: getStructCodec([["value", getU64Codec()]]),
    handler(ctx, { value }) {
        const { dataAccount, user } = ctx.accounts;
        const [, bump] = deriveProgramAddress(dataAccountSeeds(user.address), ctx.programAddress);

        dataAccount.write({ user: user.address, value, bump });
        ctx.msg(`Set value=${value} at canonical bump=${bump}`);
    },
});

/**
 * Later updates: the address must be canonical and the stored bump must be
 * the canonical one, and the stored user must sign.
 */
export const updateValue = defineInstruction({
    name: "update_value",
    programAddress: PDA_BUMP_PROGRAM_ADDRESS,
    accounts: {
        dataAccount: slot.typed(DataAccountSchema, { writable: true }),
        user: slot.signer(),
    },
    constraints: [
        seeds<"dataAccount" | "user">("dataAccount", [DATA_SEED, { account: "user" }], { bump: "bump" }),
        hasOne("dataAccount", "user"),
    ],
    args: getStructCodec([["value", getU64Codec()]]),
    handler(ctx, { value }) {
        const { dataAccount } = ctx.accounts;
        dataAccount.update({ value });
        ctx.msg(`Updated value=${value}`);
    },
});
