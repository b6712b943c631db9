import type { ReadonlyUint8Array } from "@solana/kit";

/**
 * Check if two byte arrays hold the same bytes.
 */
export function bytesEqual(a: ReadonlyUint8Array, b: ReadonlyUint8Array): boolean {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return false;
    }
    return true;
}

/**
 * Check if a byte array starts with the given prefix.
 *
 * @example
 * ```typescript
 * const data = new Uint8Array([0x9a, 0x5c, 0x1b, 0x3d, 0x00, 0x01]);
 * startsWith(data, new Uint8Array([0x9a, 0x5c])); // true
 * ```
 */
export function startsWith(data: ReadonlyUint8Array, prefix: ReadonlyUint8Array): boolean {
    if (data.length < prefix.length) return false;
    for (let i = 0; i < prefix.length; i++) {
        if (data[i] !== prefix[i]) return false;
    }
    return true;
}

export function concatBytes(parts: readonly ReadonlyUint8Array[]): Uint8Array {
    const out = new Uint8Array(parts.reduce((total, part) => total + part.length, 0));
    let offset = 0;
    for (const part of parts) {
        out.set(part, offset);
        offset += part.length;
    }
    return out;
}

/**
 * Hex preview of the first `max` bytes, for error messages.
 */
export function hexPreview(data: ReadonlyUint8Array, max = 8): string {
    const preview = Array.from(data.slice(0, max))
        .map((b) => b.toString(16).padStart(2, "0"))
        .join("");
    return `0x${preview}${data.length > max ? "..." : ""}`;
}
