import { describe, it, expect } from "vitest";
import { pino } from "pino";
import { getAddressCodec, getStructCodec, getU64Codec, getUnitCodec } from "@solana/kit";
import { hasOne, initGuard, requireSigner, seeds } from "../constraints.js";
import { instructionDiscriminator } from "../discriminator.js";
import { mockAddress } from "../fixtures.js";
import { defineInstruction, encodeInstructionData, slot, type SlotMap } from "../instruction.js";
import { defineAccountSchema } from "../schema.js";

const PROGRAM = mockAddress(200);

const GateSchema = defineAccountSchema(
    "Gate",
    getStructCodec([
        ["keeper", getAddressCodec()],
        ["opened", getU64Codec()],
    ]),
);

function captureLogger() {
    const lines: unknown[] = [];
    const logger = pino(
        { level: "warn" },
        {
            write(line: string) {
                lines.push(JSON.parse(line));
            },
        },
    );
    return { logger, lines };
}

describe("slot", () => {
    it("should default to read-only", () => {
        expect(slot.unchecked()).toEqual({ kind: "unchecked", writable: false });
        expect(slot.signer()).toEqual({ kind: "signer", writable: false });
    });

    it("should make init slots writable", () => {
        expect(slot.init(GateSchema)).toEqual({ kind: "init", writable: true, schema: GateSchema });
    });
});

describe("defineInstruction", () => {
    it("should keep slot order and compute the discriminator", () => {
        const open = defineInstruction({
            name: "open_gate",
            programAddress: PROGRAM,
            accounts: {
                gate: slot.typed(GateSchema, { writable: true }),
                keeper: slot.signer(),
                visitor: slot.unchecked(),
            },
            constraints: [hasOne("gate", "keeper")],
            args: getUnitCodec(),
            handler() {},
        });

        expect(open.slotNames).toEqual(["gate", "keeper", "visitor"]);
        expect(open.discriminator).toEqual(instructionDiscriminator("open_gate"));
        expect(open.constraints).toHaveLength(1);
    });

    it("should reject a constraint on an unknown account", () => {
        // a loosely typed slot map lets any field name through the compiler
        const accounts: SlotMap = { keeper: slot.unchecked() };
        expect(() =>
            defineInstruction({
                name: "broken",
                programAddress: PROGRAM,
                accounts,
                constraints: [requireSigner("gate")],
                args: getUnitCodec(),
                handler() {},
            }),
        ).toThrow('broken: signer: unknown account "gate"');
    });

    it("should require a typed slot for hasOne", () => {
        expect(() =>
            defineInstruction({
                name: "broken",
                programAddress: PROGRAM,
                accounts: { gate: slot.owned(), keeper: slot.signer() },
                constraints: [hasOne("gate", "keeper")],
                args: getUnitCodec(),
                handler() {},
            }),
        ).toThrow('broken: hasOne: account "gate" must be a typed slot, got owned');
    });

    it("should require a typed slot for initGuard", () => {
        expect(() =>
            defineInstruction({
                name: "broken",
                programAddress: PROGRAM,
                accounts: { gate: slot.init(GateSchema) },
                constraints: [initGuard("gate", "opened")],
                args: getUnitCodec(),
                handler() {},
            }),
        ).toThrow('broken: initGuard: account "gate" must be a typed slot, got init');
    });

    it("should reject a seed taken from an unknown account", () => {
        const accounts: SlotMap = { gate: slot.unchecked() };
        expect(() =>
            defineInstruction({
                name: "broken",
                programAddress: PROGRAM,
                accounts,
                constraints: [seeds("gate", ["gate", { account: "keeper" }])],
                args: getUnitCodec(),
                handler() {},
            }),
        ).toThrow('broken: seeds: unknown account "keeper"');
    });

    it("should warn when a hasOne target is not required to sign", () => {
        const { logger, lines } = captureLogger();
        defineInstruction({
            name: "open_unsigned",
            programAddress: PROGRAM,
            accounts: { gate: slot.typed(GateSchema), keeper: slot.unchecked() },
            constraints: [hasOne("gate", "keeper")],
            args: getUnitCodec(),
            handler() {},
            logger,
        });

        expect(lines).toHaveLength(1);
        expect(lines[0]).toMatchObject({
            level: 40,
            instruction: "open_unsigned",
            field: "gate",
            target: "keeper",
            msg: 'hasOne target "keeper" is not required to sign',
        });
    });

    it("should not warn when the target is paired with requireSigner", () => {
        const { logger, lines } = captureLogger();
        defineInstruction({
            name: "open_paired",
            programAddress: PROGRAM,
            accounts: { gate: slot.typed(GateSchema), keeper: slot.owned() },
            constraints: [hasOne("gate", "keeper"), requireSigner("keeper")],
            args: getUnitCodec(),
            handler() {},
            logger,
        });

        expect(lines).toHaveLength(0);
    });
});

describe("encodeInstructionData", () => {
    it("should prefix the encoded arguments with the discriminator", () => {
        const withdraw = defineInstruction({
            name: "withdraw_secure",
            programAddress: PROGRAM,
            accounts: { keeper: slot.signer() },
            args: getStructCodec([["amount", getU64Codec()]]),
            handler() {},
        });

        expect(encodeInstructionData(withdraw, { amount: 258n })).toEqual(
            new Uint8Array([22, 173, 114, 7, 175, 179, 168, 58, 2, 1, 0, 0, 0, 0, 0, 0]),
        );
    });
});
