import {
    address,
    getAddressCodec,
    getBooleanCodec,
    getStructCodec,
    getU64Codec,
    getUnitCodec,
} from "@solana/kit";
import { initGuard } from "../constraints.js";
import { defineInstruction, slot } from "../instruction.js";
import { defineAccountSchema } from "../schema.js";

export const REINITIALIZATION_PROGRAM_ADDRESS = address("Reinit1111111111111111111111111111111111111");

export const ConfigSchema = defineAccountSchema(
    "Config",
    getStructCodec([
        ["authority", getAddressCodec()],
        ["isInitialized", getBooleanCodec()],
        ["vaultBalance", getU64Codec()],
    ]),
);

/**
 * Sets the authority of an existing config whatever its state. A second
 * call hands the config to a new authority.
 */
export const initVulnerable = defineInstruction({
    name: "init_vulnerable",
    programAddress: REINITIALIZATION_PROGRAM_ADDRESS,
    accounts: {
        config: slot.typed(ConfigSchema, { writable: true }),
        authority: slot.signer(),
    },
    args: getUnitCodec(),
    handler(ctx) {
        const { config, authority } = ctx.accounts;
        config.write({ authority: authority.address, isInitialized: true, vaultBalance: 0n });
        ctx.msg(`Init: authority set to ${authority.address} (no re-init guard)`);
    },
});

/**
 * Same write, gated on `isInitialized` being unset.
 */
export const initSecure = defineInstruction({
    name: "init_secure",
    programAddress: REINITIALIZATION_PROGRAM_ADDRESS,
    accounts: {
        config: slot.typed(ConfigSchema, { writable: true }),
        authority: slot.signer(),
    },
    constraints: [initGuard("config", "isInitialized")],
    args: getUnitCodec(),
    handler(ctx) {
        const { config, authority } = ctx.accounts;
        config.write({ authority: authority.address, isInitialized: true, vaultBalance: 0n });
        ctx.msg(`Init: authority set to ${authority.address} (one-time only)`);
    },
});

/**
 * Creates the config: the `init` slot rejects any account that already exists.
 */
export const initNative = defineInstruction({
    name: "init_native",
    programAddress: REINITIALIZATION_PROGRAM_ADDRESS,
    accounts: {
        config: slot.init(ConfigSchema),
        authority: slot.signer({ writable: true }),
    },
    args: getUnitCodec(),
    handler(ctx) {
        const { config, authority } = ctx.accounts;
        config.write({ authority: authority.address, isInitialized: true, vaultBalance: 0n });
        ctx.msg(`Init: authority set to ${authority.address} (account created)`);
    },
});
