import { describe, it, expect } from "vitest";
import { getAddressCodec, getStructCodec, getU64Codec } from "@solana/kit";
import { SYSTEM_PROGRAM_ADDRESS } from "@solana-program/system";
import { asOwned, asSigner, asTyped, asUnchecked, rawAccountOf } from "../capabilities.js";
import { ErrorCode } from "../errors.js";
import {
    dataAccount,
    freshAccount,
    mockAddress,
    programAccount,
    walletAccount,
} from "../fixtures.js";
import { allocateAccountData, defineAccountSchema, encodeAccountData } from "../schema.js";
import { expectProgramError } from "../../test/fixtures/test-helpers.js";

const PROGRAM = mockAddress(200);
const OTHER_PROGRAM = mockAddress(201);
const ACCOUNT = mockAddress(10);
const HOLDER = mockAddress(11);

const PositionSchema = defineAccountSchema(
    "Position",
    getStructCodec([
        ["holder", getAddressCodec()],
        ["size", getU64Codec()],
    ]),
);
const MirrorSchema = defineAccountSchema(
    "Mirror",
    getStructCodec([
        ["holder", getAddressCodec()],
        ["size", getU64Codec()],
    ]),
);

describe("asUnchecked", () => {
    it("should wrap any account, existing or not", () => {
        const view = asUnchecked(freshAccount(ACCOUNT));
        expect(view.kind).toBe("unchecked");
        expect(view.address).toBe(ACCOUNT);
        expect(view.data).toHaveLength(0);
    });

    it("should expose the raw bytes read-only", () => {
        const view = asUnchecked(dataAccount(ACCOUNT, PROGRAM, new Uint8Array([1, 2, 3])));
        expect(view.data).toEqual(new Uint8Array([1, 2, 3]));
        expect("writeBytes" in view).toBe(false);
    });
});

describe("asSigner", () => {
    it("should fail with NotSigner for every unsigned account", () => {
        for (let i = 0; i < 32; i++) {
            const raw = walletAccount(mockAddress(i), { isSigner: false, isWritable: i % 2 === 0 });
            expectProgramError(() => asSigner(raw), ErrorCode.NotSigner);
        }
    });

    it("should succeed for every signed account", () => {
        for (let i = 0; i < 32; i++) {
            const raw = walletAccount(mockAddress(i), { isSigner: true, lamports: BigInt(i) });
            const view = asSigner(raw);
            expect(view.kind).toBe("signer");
            expect(view.address).toBe(mockAddress(i));
            expect(view.lamports).toBe(BigInt(i));
        }
    });

    it("should not expose account data", () => {
        const view = asSigner(walletAccount(ACCOUNT));
        expect("data" in view).toBe(false);
    });
});

describe("asOwned", () => {
    it("should succeed when the account exists and the owner matches", () => {
        const view = asOwned(dataAccount(ACCOUNT, PROGRAM, new Uint8Array(4)), PROGRAM);
        expect(view.kind).toBe("owned");
        expect(view.owner).toBe(PROGRAM);
    });

    it("should fail with WrongOwner for a foreign owner whatever the bytes", () => {
        const valid = encodeAccountData(PositionSchema, { holder: HOLDER, size: 5n });
        for (const data of [valid, new Uint8Array(0), new Uint8Array(48).fill(0xff)]) {
            const raw = dataAccount(ACCOUNT, OTHER_PROGRAM, data);
            expectProgramError(() => asOwned(raw, PROGRAM), ErrorCode.WrongOwner);
        }
    });

    it("should fail with WrongOwner for an account that does not exist", () => {
        const raw = freshAccount(ACCOUNT);
        expectProgramError(() => asOwned(raw, SYSTEM_PROGRAM_ADDRESS), ErrorCode.WrongOwner);
    });

    it("should write bytes into a writable account", () => {
        const raw = dataAccount(ACCOUNT, PROGRAM, new Uint8Array(4));
        asOwned(raw, PROGRAM).writeBytes(1, new Uint8Array([7, 8]));
        expect(raw.data).toEqual(new Uint8Array([0, 7, 8, 0]));
    });

    it("should refuse writes to a read-only account", () => {
        const raw = dataAccount(ACCOUNT, PROGRAM, new Uint8Array(4), { isWritable: false });
        const view = asOwned(raw, PROGRAM);
        expectProgramError(() => view.writeBytes(0, new Uint8Array([1])), ErrorCode.AccountNotWritable);
        expect(raw.data).toEqual(new Uint8Array(4));
    });

    it("should refuse writes past the end of the buffer", () => {
        const view = asOwned(dataAccount(ACCOUNT, PROGRAM, new Uint8Array(4)), PROGRAM);
        expect(() => view.writeBytes(3, new Uint8Array([1, 2]))).toThrow(RangeError);
    });

    it("should not mutate the account", () => {
        const raw = dataAccount(ACCOUNT, PROGRAM, new Uint8Array([5]));
        const before = { ...raw, data: new Uint8Array(raw.data) };
        asOwned(raw, PROGRAM);
        expect(raw).toEqual(before);
    });
});

describe("asTyped", () => {
    it("should decode the body of a matching account", () => {
        const raw = programAccount(ACCOUNT, PROGRAM, PositionSchema, { holder: HOLDER, size: 42n });
        const view = asTyped(raw, PositionSchema, PROGRAM);
        expect(view.kind).toBe("typed");
        expect(view.data).toEqual({ holder: HOLDER, size: 42n });
        expect(view.schema).toBe(PositionSchema);
    });

    it("should check the owner before the discriminator", () => {
        const raw = dataAccount(ACCOUNT, OTHER_PROGRAM, new Uint8Array(3));
        expectProgramError(() => asTyped(raw, PositionSchema, PROGRAM), ErrorCode.WrongOwner);
    });

    it("should fail with DiscriminatorMismatch for any foreign tag, even when the layout matches", () => {
        const mirror = programAccount(ACCOUNT, PROGRAM, MirrorSchema, { holder: HOLDER, size: 1n });
        expectProgramError(() => asTyped(mirror, PositionSchema, PROGRAM), ErrorCode.DiscriminatorMismatch);

        for (let i = 0; i < 16; i++) {
            const data = encodeAccountData(PositionSchema, { holder: HOLDER, size: BigInt(i) });
            data[i % 8] ^= 0x01;
            const raw = dataAccount(ACCOUNT, PROGRAM, data);
            expectProgramError(() => asTyped(raw, PositionSchema, PROGRAM), ErrorCode.DiscriminatorMismatch);
        }
    });

    it("should fail with AccountDidNotDeserialize for a truncated body", () => {
        const data = encodeAccountData(PositionSchema, { holder: HOLDER, size: 1n }).slice(0, 20);
        const raw = dataAccount(ACCOUNT, PROGRAM, data);
        expectProgramError(
            () => asTyped(raw, PositionSchema, PROGRAM),
            ErrorCode.AccountDidNotDeserialize,
        );
    });

    it("should read the live buffer after writes", () => {
        const raw = dataAccount(ACCOUNT, PROGRAM, allocateAccountData(PositionSchema));
        const view = asTyped(raw, PositionSchema, PROGRAM);
        view.write({ holder: HOLDER, size: 3n });
        view.update({ size: 9n });
        expect(view.data).toEqual({ holder: HOLDER, size: 9n });
        expect(raw.data).toEqual(encodeAccountData(PositionSchema, { holder: HOLDER, size: 9n }));
    });

    it("should keep the stored value of fields patched with undefined", () => {
        const raw = programAccount(ACCOUNT, PROGRAM, PositionSchema, { holder: HOLDER, size: 5n });
        const view = asTyped(raw, PositionSchema, PROGRAM);
        view.update({ size: undefined });
        expect(view.data).toEqual({ holder: HOLDER, size: 5n });

        view.update({ holder: undefined, size: 6n });
        expect(raw.data).toEqual(encodeAccountData(PositionSchema, { holder: HOLDER, size: 6n }));
    });

    it("should refuse writes to a read-only account", () => {
        const raw = programAccount(ACCOUNT, PROGRAM, PositionSchema, { holder: HOLDER, size: 1n }, {
            isWritable: false,
        });
        const view = asTyped(raw, PositionSchema, PROGRAM);
        expectProgramError(() => view.update({ size: 2n }), ErrorCode.AccountNotWritable);
        expect(view.data.size).toBe(1n);
    });
});

describe("rawAccountOf", () => {
    it("should return the account behind a view", () => {
        const raw = walletAccount(ACCOUNT);
        expect(rawAccountOf(asSigner(raw))).toBe(raw);
    });
});
