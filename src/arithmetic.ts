import { ErrorCode, ProgramError } from "./errors.js";

/**
 * A fixed-width integer domain.
 */
export interface IntegerWidth {
    readonly name: string;
    readonly min: bigint;
    readonly max: bigint;
}

function unsigned(bits: number): IntegerWidth {
    return { name: `u${bits}`, min: 0n, max: (1n << BigInt(bits)) - 1n };
}

function signed(bits: number): IntegerWidth {
    const half = 1n << BigInt(bits - 1);
    return { name: `i${bits}`, min: -half, max: half - 1n };
}

export const U8 = unsigned(8);
export const U16 = unsigned(16);
export const U32 = unsigned(32);
export const U64 = unsigned(64);
export const U128 = unsigned(128);
export const I8 = signed(8);
export const I16 = signed(16);
export const I32 = signed(32);
export const I64 = signed(64);
export const I128 = signed(128);

type Operation = "add" | "sub" | "mul" | "div";

function fit(value: bigint, width: IntegerWidth, op: Operation, a: bigint, b: bigint): bigint {
    if (value > width.max) {
        throw new ProgramError(
            ErrorCode.ArithmeticOverflow,
            `Arithmetic overflow: ${a} ${op} ${b} exceeds ${width.name} max ${width.max}`,
            { op, a, b, width: width.name },
        );
    }
    if (value < width.min) {
        throw new ProgramError(
            ErrorCode.ArithmeticUnderflow,
            `Arithmetic underflow: ${a} ${op} ${b} is below ${width.name} min ${width.min}`,
            { op, a, b, width: width.name },
        );
    }
    return value;
}

function checked(
    op: Operation,
    a: bigint,
    b: bigint,
    width: IntegerWidth,
    compute: (x: bigint, y: bigint) => bigint,
): bigint {
    // operands outside the width are rejected the same way as results
    fit(a, width, op, a, b);
    fit(b, width, op, a, b);
    return fit(compute(a, b), width, op, a, b);
}

/**
 * `a + b`, or `ArithmeticOverflow` when the sum leaves the width.
 */
export function checkedAdd(a: bigint, b: bigint, width: IntegerWidth = U64): bigint {
    return checked("add", a, b, width, (x, y) => x + y);
}

/**
 * `a - b`, or `ArithmeticUnderflow` when the difference leaves the width.
 */
export function checkedSub(a: bigint, b: bigint, width: IntegerWidth = U64): bigint {
    return checked("sub", a, b, width, (x, y) => x - y);
}

export function checkedMul(a: bigint, b: bigint, width: IntegerWidth = U64): bigint {
    return checked("mul", a, b, width, (x, y) => x * y);
}

/**
 * Truncating division. `DivideByZero` when `b` is zero; for signed widths
 * `min / -1` overflows.
 */
export function checkedDiv(a: bigint, b: bigint, width: IntegerWidth = U64): bigint {
    if (b === 0n) {
        throw new ProgramError(ErrorCode.DivideByZero, `Division by zero: ${a} / 0`, {
            op: "div",
            a,
            width: width.name,
        });
    }
    return checked("div", a, b, width, (x, y) => x / y);
}
