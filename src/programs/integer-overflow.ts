import { address, getAddressCodec, getStructCodec, getU64Codec } from "@solana/kit";
import { checkedAdd, checkedSub } from "../arithmetic.js";
import { hasOne } from "../constraints.js";
import { defineInstruction, slot, type SlotMap } from "../instruction.js";
import { defineAccountSchema } from "../schema.js";

export const INTEGER_OVERFLOW_PROGRAM_ADDRESS = address("Ledger1111111111111111111111111111111111111");

export const LedgerSchema = defineAccountSchema(
    "Ledger",
    getStructCodec([
        ["authority", getAddressCodec()],
        ["totalSupply", getU64Codec()],
        ["userBalance", getU64Codec()],
    ]),
);

const amountArgs = getStructCodec([["amount", getU64Codec()]]);

// u64 two's-complement wraparound, what unchecked native arithmetic does
const wrappingAdd = (a: bigint, b: bigint) => BigInt.asUintN(64, a + b);
const wrappingSub = (a: bigint, b: bigint) => BigInt.asUintN(64, a - b);

const operateAccounts = {
    ledger: slot.typed(LedgerSchema, { writable: true }),
    authority: slot.signer(),
} satisfies SlotMap;

export const initializeLedger = defineInstruction({
    name: "initialize",
    programAddress: INTEGER_OVERFLOW_PROGRAM_ADDRESS,
    accounts: {
        ledger: slot.init(LedgerSchema),
        authority: slot.signer({ writable: true }),
    },
    args: getStructCodec([["initialSupply", getU64Codec()]]),
    handler(ctx, { initialSupply }) {
        const { ledger, authority } = ctx.accounts;
        ledger.write({ authority: authority.address, totalSupply: initialSupply, userBalance: 0n });
        ctx.msg(`Ledger initialized: supply=${initialSupply}`);
    },
});

export const mintVulnerable = defineInstruction({
    name: "mint_vulnerable",
    programAddress: INTEGER_OVERFLOW_PROGRAM_ADDRESS,
    accounts: operateAccounts,
    constraints: [hasOne("ledger", "authority")],
    args: amountArgs,
    handler(ctx, { amount }) {
        const { ledger } = ctx.accounts;
        const totalSupply = wrappingAdd(ledger.data.totalSupply, amount);
        const userBalance = wrappingAdd(ledger.data.userBalance, amount);
        ledger.update({ totalSupply, userBalance });
        ctx.msg(`Mint: amount=${amount}, new_supply=${totalSupply}, new_balance=${userBalance}`);
    },
});

export const burnVulnerable = defineInstruction({
    name: "burn_vulnerable",
    programAddress: INTEGER_OVERFLOW_PROGRAM_ADDRESS,
    accounts: operateAccounts,
    constraints: [hasOne("ledger", "authority")],
    args: amountArgs,
    handler(ctx, { amount }) {
        const { ledger } = ctx.accounts;
        const userBalance = wrappingSub(ledger.data.userBalance, amount);
        const totalSupply = wrappingSub(ledger.data.totalSupply, amount);
        ledger.update({ totalSupply, userBalance });
        ctx.msg(`Burn: amount=${amount}, new_supply=${totalSupply}, new_balance=${userBalance}`);
    },
});

export const mintSecure = defineInstruction({
    name: "mint_secure",
    programAddress: INTEGER_OVERFLOW_PROGRAM_ADDRESS,
    accounts: operateAccounts,
    constraints: [hasOne("ledger", "authority")],
    args: amountArgs,
    handler(ctx, { amount }) {
        const { ledger } = ctx.accounts;
        const totalSupply = checkedAdd(ledger.data.totalSupply, amount);
        const userBalance = checkedAdd(ledger.data.userBalance, amount);
        ledger.update({ totalSupply, userBalance });
        ctx.msg(`Mint: amount=${amount}, new_supply=${totalSupply}, new_balance=${userBalance}`);
    },
});

export const burnSecure = defineInstruction({
    name: "burn_secure",
    programAddress: INTEGER_OVERFLOW_PROGRAM_ADDRESS,
    accounts: operateAccounts,
    constraints: [hasOne("ledger", "authority")],
    args: amountArgs,
    handler(ctx, { amount }) {
        const { ledger } = ctx.accounts;
        const userBalance = checkedSub(ledger.data.userBalance, amount);
        const totalSupply = checkedSub(ledger.data.totalSupply, amount);
        ledger.update({ totalSupply, userBalance });
        ctx.msg(`Burn: amount=${amount}, new_supply=${totalSupply}, new_balance=${userBalance}`);
    },
});
