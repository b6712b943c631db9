import {
    address,
    getAddressCodec,
    getAddressDecoder,
    getBooleanCodec,
    getStructCodec,
    getU64Codec,
    getU64Decoder,
    getUnitCodec,
} from "@solana/kit";
import { hasOne } from "../constraints.js";
import { businessError } from "../errors.js";
import { defineInstruction, slot } from "../instruction.js";
import { defineAccountSchema } from "../schema.js";

export const MISSING_OWNER_PROGRAM_ADDRESS = address("Treasury11111111111111111111111111111111111");

export const TreasurySchema = defineAccountSchema(
    "Treasury",
    getStructCodec([
        ["authority", getAddressCodec()],
        ["balance", getU64Codec()],
        ["isActive", getBooleanCodec()],
    ]),
);

// Treasury body offsets, discriminator included
const AUTHORITY_OFFSET = 8;
const BALANCE_OFFSET = 40;
const IS_ACTIVE_OFFSET = 48;

function inactive(address: string): never {
    throw businessError("TreasuryInactive", "Treasury is not active", { treasury: address });
}

export const initializeTreasury = defineInstruction({
    name: "initialize",
    programAddress: MISSING_OWNER_PROGRAM_ADDRESS,
    accounts: {
        treasury: slot.init(TreasurySchema),
        authority: slot.signer({ writable: true }),
    },
    args: getStructCodec([["amount", getU64Codec()]]),
    handler(ctx, { amount }) {
        const { treasury, authority } = ctx.accounts;
        treasury.write({ authority: authority.address, balance: amount, isActive: true });
        ctx.msg(`Treasury initialized: authority=${authority.address}, balance=${amount}`);
    },
});

/**
 * Reads the treasury straight from its bytes at fixed offsets. Nothing checks
 * who owns the account, so any program can forge one.
 */
export const processVulnerable = defineInstruction({
    name: "process_vulnerable",
    programAddress: MISSING_OWNER_PROGRAM_ADDRESS,
    accounts: {
        treasury: slot.unchecked(),
        authority: slot.signer(),
    },
    args: getUnitCodec(),
    handler(ctx) {
        const { data, address: treasury } = ctx.accounts.treasury;
        if (data.length <= IS_ACTIVE_OFFSET) {
            throw businessError("InvalidData", "Invalid account data", { length: data.length });
        }

        const authority = getAddressDecoder().decode(data, AUTHORITY_OFFSET);
        const balance = getU64Decoder().decode(data, BALANCE_OFFSET);
        if (data[IS_ACTIVE_OFFSET] === 0) inactive(treasury);

        ctx.msg(`Processed treasury: authority=${authority}, balance=${balance} (owner unverified)`);
    },
});

/**
 * Typed treasury: owner and discriminator are checked before the handler
 * runs, and the stored authority must be the signer.
 */
export const processSecure = defineInstruction({
    name: "process_secure",
    programAddress: MISSING_OWNER_PROGRAM_ADDRESS,
    accounts: {
        treasury: slot.typed(TreasurySchema),
        authority: slot.signer(),
    },
    constraints: [hasOne("treasury", "authority")],
    args: getUnitCodec(),
    handler(ctx) {
        const { treasury } = ctx.accounts;
        const { authority, balance, isActive } = treasury.data;
        if (!isActive) inactive(treasury.address);

        ctx.msg(`Processed treasury: authority=${authority}, balance=${balance} (owner verified)`);
    },
});
