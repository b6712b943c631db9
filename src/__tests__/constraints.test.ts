import { describe, it, expect } from "vitest";
import {
    getAddressCodec,
    getAddressEncoder,
    getBooleanCodec,
    getStructCodec,
    getU8Codec,
} from "@solana/kit";
import {
    asOwned,
    asSigner,
    asTyped,
    asUnchecked,
    type AccountView,
} from "../capabilities.js";
import {
    evaluateConstraints,
    hasOne,
    initGuard,
    readPath,
    requireOwned,
    requireSigner,
    seeds,
    type Constraint,
} from "../constraints.js";
import { ErrorCode } from "../errors.js";
import {
    dataAccount,
    mockAddress,
    nonCanonicalAddress,
    programAccount,
    walletAccount,
} from "../fixtures.js";
import { deriveProgramAddress } from "../pda.js";
import { defineAccountSchema } from "../schema.js";
import { expectProgramError } from "../../test/fixtures/test-helpers.js";

const PROGRAM = mockAddress(200);
const OTHER_PROGRAM = mockAddress(201);
const AUTHORITY = mockAddress(1);
const STRANGER = mockAddress(2);

const SlotSchema = defineAccountSchema(
    "Slot",
    getStructCodec([
        ["authority", getAddressCodec()],
        ["ready", getBooleanCodec()],
        ["bump", getU8Codec()],
    ]),
);

const slotSeeds = (authority = AUTHORITY) => ["slot", getAddressEncoder().encode(authority)];

function typedSlot(
    value: { authority: typeof AUTHORITY; ready: boolean; bump: number },
    address = mockAddress(50),
) {
    return asTyped(programAccount(address, PROGRAM, SlotSchema, value), SlotSchema, PROGRAM);
}

const evaluate = (constraints: readonly Constraint[], views: Record<string, AccountView>) =>
    evaluateConstraints(constraints, new Map(Object.entries(views)), PROGRAM);

describe("readPath", () => {
    it("should follow dotted paths", () => {
        expect(readPath({ a: { b: 3 } }, "a.b")).toBe(3);
    });

    it("should return undefined for missing segments", () => {
        expect(readPath({ a: 1 }, "a.b")).toBeUndefined();
        expect(readPath({}, "missing")).toBeUndefined();
    });

    it("should not read inherited properties", () => {
        expect(readPath({}, "toString")).toBeUndefined();
    });
});

describe("requireSigner", () => {
    it("should pass for a signer view", () => {
        expect(() =>
            evaluate([requireSigner("user")], { user: asSigner(walletAccount(AUTHORITY)) }),
        ).not.toThrow();
    });

    it("should pass for an owned view that signed", () => {
        const raw = dataAccount(AUTHORITY, PROGRAM, new Uint8Array(1), { isSigner: true });
        expect(() => evaluate([requireSigner("user")], { user: asOwned(raw, PROGRAM) })).not.toThrow();
    });

    it("should fail for an owned view that did not sign", () => {
        const raw = dataAccount(AUTHORITY, PROGRAM, new Uint8Array(1));
        expectProgramError(
            () => evaluate([requireSigner("user")], { user: asOwned(raw, PROGRAM) }),
            ErrorCode.NotSigner,
        );
    });

    it("should fail for an unchecked view even when the account signed", () => {
        const view = asUnchecked(walletAccount(AUTHORITY, { isSigner: true }));
        expectProgramError(() => evaluate([requireSigner("user")], { user: view }), ErrorCode.NotSigner);
    });
});

describe("requireOwned", () => {
    it("should pass when the proven owner matches", () => {
        const view = asOwned(dataAccount(STRANGER, OTHER_PROGRAM, new Uint8Array(1)), OTHER_PROGRAM);
        expect(() => evaluate([requireOwned("pool", OTHER_PROGRAM)], { pool: view })).not.toThrow();
    });

    it("should fail when the proven owner differs", () => {
        const view = asOwned(dataAccount(STRANGER, OTHER_PROGRAM, new Uint8Array(1)), OTHER_PROGRAM);
        expectProgramError(
            () => evaluate([requireOwned("pool", PROGRAM)], { pool: view }),
            ErrorCode.WrongOwner,
        );
    });

    it("should fail for an unchecked view whatever its owner", () => {
        const view = asUnchecked(dataAccount(STRANGER, PROGRAM, new Uint8Array(1)));
        expectProgramError(
            () => evaluate([requireOwned("pool", PROGRAM)], { pool: view }),
            ErrorCode.WrongOwner,
        );
    });
});

describe("hasOne", () => {
    it("should default the target to the path", () => {
        expect(hasOne("slot", "authority")).toEqual({
            kind: "hasOne",
            field: "slot",
            path: "authority",
            target: "authority",
        });
    });

    it("should pass when the stored address equals the target's", () => {
        const views = {
            slot: typedSlot({ authority: AUTHORITY, ready: false, bump: 0 }),
            authority: asSigner(walletAccount(AUTHORITY)),
        };
        expect(() => evaluate([hasOne("slot", "authority")], views)).not.toThrow();
    });

    it("should fail with HasOneMismatch for another address", () => {
        const views = {
            slot: typedSlot({ authority: AUTHORITY, ready: false, bump: 0 }),
            owner: asSigner(walletAccount(STRANGER)),
        };
        const error = expectProgramError(
            () => evaluate([hasOne("slot", "authority", "owner")], views),
            ErrorCode.HasOneMismatch,
        );
        expect(error.details).toEqual({ field: "slot", path: "authority", target: "owner" });
    });

    it("should pass for an unsigned target: the relation proves no signature", () => {
        const views = {
            slot: typedSlot({ authority: AUTHORITY, ready: false, bump: 0 }),
            authority: asUnchecked(walletAccount(AUTHORITY, { isSigner: false })),
        };
        expect(() => evaluate([hasOne("slot", "authority")], views)).not.toThrow();
        expectProgramError(
            () => evaluate([hasOne("slot", "authority"), requireSigner("authority")], views),
            ErrorCode.NotSigner,
        );
    });
});

describe("seeds", () => {
    it("should pass for the canonical address", () => {
        const [address, bump] = deriveProgramAddress(slotSeeds(), PROGRAM);
        const views = {
            slot: typedSlot({ authority: AUTHORITY, ready: false, bump }, address),
            authority: asSigner(walletAccount(AUTHORITY)),
        };
        expect(() =>
            evaluate([seeds("slot", ["slot", { account: "authority" }], { bump: "bump" })], views),
        ).not.toThrow();
    });

    it("should fail with PdaMismatch for a non-canonical address", () => {
        const [address, bump] = nonCanonicalAddress(slotSeeds(), PROGRAM);
        const views = {
            slot: typedSlot({ authority: AUTHORITY, ready: false, bump }, address),
            authority: asSigner(walletAccount(AUTHORITY)),
        };
        expectProgramError(
            () => evaluate([seeds("slot", ["slot", { account: "authority" }])], views),
            ErrorCode.PdaMismatch,
        );
    });

    it("should fail when seeded with another account's address", () => {
        const [address] = deriveProgramAddress(slotSeeds(), PROGRAM);
        const views = {
            slot: asUnchecked(walletAccount(address, { isSigner: false })),
            authority: asSigner(walletAccount(STRANGER)),
        };
        expectProgramError(
            () => evaluate([seeds("slot", ["slot", { account: "authority" }])], views),
            ErrorCode.PdaMismatch,
        );
    });

    it("should fail with PdaMismatch when the stored bump is not canonical", () => {
        const [address, bump] = deriveProgramAddress(slotSeeds(), PROGRAM);
        const views = {
            slot: typedSlot({ authority: AUTHORITY, ready: false, bump: (bump + 255) % 256 }, address),
            authority: asSigner(walletAccount(AUTHORITY)),
        };
        const error = expectProgramError(
            () => evaluate([seeds("slot", ["slot", { account: "authority" }], { bump: "bump" })], views),
            ErrorCode.PdaMismatch,
        );
        expect(error.details?.canonicalBump).toBe(bump);
    });

    it("should derive under another program when asked", () => {
        const [address] = deriveProgramAddress(["pool"], OTHER_PROGRAM);
        const views = { pool: asUnchecked(walletAccount(address, { isSigner: false })) };
        expect(() => evaluate([seeds("pool", ["pool"], { program: OTHER_PROGRAM })], views)).not.toThrow();
        expectProgramError(() => evaluate([seeds("pool", ["pool"])], views), ErrorCode.PdaMismatch);
    });
});

describe("initGuard", () => {
    it("should pass while the flag is unset", () => {
        const views = { slot: typedSlot({ authority: AUTHORITY, ready: false, bump: 0 }) };
        expect(() => evaluate([initGuard("slot", "ready")], views)).not.toThrow();
    });

    it("should fail with AlreadyInitialized once the flag is set", () => {
        const views = { slot: typedSlot({ authority: AUTHORITY, ready: true, bump: 0 }) };
        expectProgramError(() => evaluate([initGuard("slot", "ready")], views), ErrorCode.AlreadyInitialized);
    });

    it("should treat a missing flag as unset", () => {
        const views = { slot: typedSlot({ authority: AUTHORITY, ready: true, bump: 0 }) };
        expect(() => evaluate([initGuard("slot", "absent")], views)).not.toThrow();
    });
});

describe("evaluateConstraints", () => {
    it("should stop at the first failure in declaration order", () => {
        const views = {
            slot: typedSlot({ authority: AUTHORITY, ready: true, bump: 0 }),
            authority: asUnchecked(walletAccount(STRANGER, { isSigner: false })),
        };
        expectProgramError(
            () => evaluate([initGuard("slot", "ready"), requireSigner("authority")], views),
            ErrorCode.AlreadyInitialized,
        );
        expectProgramError(
            () => evaluate([requireSigner("authority"), initGuard("slot", "ready")], views),
            ErrorCode.NotSigner,
        );
    });

    it("should pass an empty set", () => {
        expect(() => evaluate([], {})).not.toThrow();
    });
});
