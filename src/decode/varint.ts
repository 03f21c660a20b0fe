/**
 * Base-128 varint decoding
 *
 * Values decode to unsigned 64-bit bigints. Decoders never throw: a truncated
 * or over-long encoding returns null.
 */

// ============================================================================
// WIRE FORMAT
// ============================================================================

export const WireType = {
    Varint: 0,
    Fixed64: 1,
    LengthDelimited: 2,
    StartGroup: 3,
    EndGroup: 4,
    Fixed32: 5,
} as const;

export type WireType = (typeof WireType)[keyof typeof WireType];

/** A 64-bit value never takes more than 10 bytes */
export const MAX_VARINT_BYTES = 10;

export function makeTag(fieldId: number, wireType: WireType): number {
    return ((fieldId << 3) | wireType) >>> 0;
}

export interface VarintResult {
    value: bigint;
    /** Position directly after the last byte of the varint */
    next: number;
}

// ============================================================================
// DECODERS
// ============================================================================

/**
 * Decode a varint starting at `pos`, reading no byte at or beyond `end`.
 * Bits past the 64th are discarded.
 */
export function parseVarint(buf: Uint8Array, pos: number, end: number): VarintResult | null {
    const limit = Math.min(end, buf.length);
    let lo = 0;
    let hi = 0;
    let shift = 0;
    let i = pos;

    while (i < limit) {
        const b = buf[i++];
        const bits = b & 0x7f;

        if (shift < 28) {
            lo |= bits << shift;
        } else if (shift === 28) {
            lo |= (bits & 0x0f) << 28;
            hi |= bits >>> 4;
        } else {
            hi |= bits << (shift - 32);
        }

        if ((b & 0x80) === 0) {
            return { value: combine(lo, hi), next: i };
        }

        shift += 7;
        if (shift >= MAX_VARINT_BYTES * 7) return null;
    }

    return null;
}

/**
 * Fast decoder for the hot path: bounded to MAX_VARINT_BYTES from `pos`.
 */
export function parseVarintBounded(buf: Uint8Array, pos: number): VarintResult | null {
    return parseVarint(buf, pos, pos + MAX_VARINT_BYTES);
}

// --- Integer reinterpretation ---

export function toInt64(value: bigint): bigint {
    return BigInt.asIntN(64, value);
}

export function toInt32(value: bigint): number {
    return Number(BigInt.asIntN(32, value));
}

export function toUint32(value: bigint): number {
    return Number(BigInt.asUintN(32, value));
}

// --- Internal ---

function combine(lo: number, hi: number): bigint {
    if (hi === 0) return BigInt(lo >>> 0);
    return (BigInt(hi >>> 0) << 32n) | BigInt(lo >>> 0);
}
