import {
    address,
    getAddressCodec,
    getStructCodec,
    getU64Codec,
    getUnitCodec,
} from "@solana/kit";
import { checkedAdd, checkedSub } from "../arithmetic.js";
import { hasOne, seeds } from "../constraints.js";
import { businessError } from "../errors.js";
import { defineInstruction, slot } from "../instruction.js";
import { defineAccountSchema } from "../schema.js";

export const MISSING_SIGNER_PROGRAM_ADDRESS = address("MissingSigner111111111111111111111111111111");

/** Seed prefix of vault addresses: `["vault", authority]` */
export const VAULT_SEED = "vault";

export const VaultSchema = defineAccountSchema(
    "Vault",
    getStructCodec([
        ["authority", getAddressCodec()],
        ["balance", getU64Codec()],
    ]),
);

const amountArgs = getStructCodec([["amount", getU64Codec()]]);

export const initializeVault = defineInstruction({
    name: "initialize",
    programAddress: MISSING_SIGNER_PROGRAM_ADDRESS,
    accounts: {
        vault: slot.init(VaultSchema),
        authority: slot.signer({ writable: true }),
    },
    constraints: [seeds<"vault" | "authority">("vault", [VAULT_SEED, { account: "authority" }])],
    args: getUnitCodec(),
    handler(ctx) {
        const { vault, authority } = ctx.accounts;
        vault.write({ authority: authority.address, balance: 0n });
        ctx.msg(`Vault initialized with authority: ${authority.address}`);
    },
});

export const deposit = defineInstruction({
    name: "deposit",
    programAddress: MISSING_SIGNER_PROGRAM_ADDRESS,
    accounts: {
        vault: slot.typed(VaultSchema, { writable: true }),
        depositor: slot.signer({ writable: true }),
    },
    args: amountArgs,
    handler(ctx, { amount }) {
        const { vault, depositor } = ctx.accounts;
        const balance = checkedAdd(vault.data.balance, amount);

        ctx.systemTransfer(depositor, vault, amount);
        vault.update({ balance });
        ctx.msg(`Deposited ${amount} lamports. New balance: ${balance}`);
    },
});

function withdraw(
    vault: { readonly data: { balance: bigint } },
    amount: bigint,
): bigint {
    if (vault.data.balance < amount) {
        throw businessError("InsufficientFunds", "Insufficient funds in vault", {
            balance: vault.data.balance,
            amount,
        });
    }
    return checkedSub(vault.data.balance, amount);
}

/**
 * Withdraw with `authority` matched by address only. Anyone who knows the
 * authority's address can pass it unsigned and drain the vault.
 */
export const withdrawVulnerable = defineInstruction({
    name: "withdraw_vulnerable",
    programAddress: MISSING_SIGNER_PROGRAM_ADDRESS,
    accounts: {
        vault: slot.typed(VaultSchema, { writable: true }),
        authority: slot.unchecked(),
        recipient: slot.unchecked({ writable: true }),
    },
    constraints: [
        seeds<"vault" | "authority">("vault", [VAULT_SEED, { account: "authority" }]),
        hasOne("vault", "authority"),
    ],
    args: amountArgs,
    handler(ctx, { amount }) {
        const { vault, recipient } = ctx.accounts;
        const balance = withdraw(vault, amount);

        ctx.transferLamports(vault, recipient, amount);
        vault.update({ balance });
        ctx.msg(`Withdrew ${amount} lamports without signature verification`);
    },
});

/**
 * Withdraw with `authority` matched by address and required to sign.
 */
export const withdrawSecure = defineInstruction({
    name: "withdraw_secure",
    programAddress: MISSING_SIGNER_PROGRAM_ADDRESS,
    accounts: {
        vault: slot.typed(VaultSchema, { writable: true }),
        authority: slot.signer(),
        recipient: slot.unchecked({ writable: true }),
    },
    constraints: [
        seeds<"vault" | "authority">("vault", [VAULT_SEED, { account: "authority" }]),
        hasOne("vault", "authority"),
    ],
    args: amountArgs,
    handler(ctx, { amount }) {
        const { vault, recipient } = ctx.accounts;
        const balance = withdraw(vault, amount);

        ctx.transferLamports(vault, recipient, amount);
        vault.update({ balance });
        ctx.msg(`Withdrew ${amount} lamports with signature verification`);
    },
});
