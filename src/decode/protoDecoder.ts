/**
 * Generic Protobuf Field Decoder
 *
 * Walks the fields of one serialized message without a schema. Used for the
 * bundle and compact sched containers, and as the slow path of timestamp
 * extraction.
 *
 * Design:
 * - Zero-copy: length-delimited payloads are subarrays of the input
 * - Never throws on bad bytes: decoding stops and `malformed` is set
 */

import { WireType, parseVarint } from './varint.js';

export interface ProtoField {
    id: number;
    wireType: WireType;
    /** Varint and fixed-width payloads (unsigned) */
    int: bigint;
    /** Length-delimited payload (empty for other wire types) */
    bytes: Uint8Array;
}

const EMPTY = new Uint8Array(0);

// Tags wider than this cannot carry a valid field id
const MAX_TAG = 0xffffffffn;

export class ProtoDecoder {
    readonly buf: Uint8Array;
    private readonly begin: number;
    private readonly end: number;
    private pos: number;
    private _malformed = false;

    constructor(buf: Uint8Array, begin: number = 0, end: number = buf.length) {
        this.buf = buf;
        this.begin = begin;
        this.end = Math.min(end, buf.length);
        this.pos = begin;
    }

    /** True once decoding has hit bytes it could not parse */
    get malformed(): boolean {
        return this._malformed;
    }

    /**
     * Read the next field. Returns null at the end of input or on malformed
     * bytes (check `malformed` to tell them apart).
     */
    readField(): ProtoField | null {
        if (this._malformed || this.pos >= this.end) return null;

        const tag = parseVarint(this.buf, this.pos, this.end);
        if (!tag || tag.value > MAX_TAG) return this.fail();

        const id = Number(tag.value >> 3n);
        const wireType = Number(tag.value & 7n);
        if (id === 0) return this.fail();

        let pos = tag.next;

        switch (wireType) {
            case WireType.Varint: {
                const v = parseVarint(this.buf, pos, this.end);
                if (!v) return this.fail();
                this.pos = v.next;
                return { id, wireType: WireType.Varint, int: v.value, bytes: EMPTY };
            }
            case WireType.Fixed64: {
                if (pos + 8 > this.end) return this.fail();
                const int = readFixed(this.buf, pos, 8);
                this.pos = pos + 8;
                return { id, wireType: WireType.Fixed64, int, bytes: EMPTY };
            }
            case WireType.Fixed32: {
                if (pos + 4 > this.end) return this.fail();
                const int = readFixed(this.buf, pos, 4);
                this.pos = pos + 4;
                return { id, wireType: WireType.Fixed32, int, bytes: EMPTY };
            }
            case WireType.LengthDelimited: {
                const len = parseVarint(this.buf, pos, this.end);
                if (!len) return this.fail();
                pos = len.next;
                if (len.value > BigInt(this.end - pos)) return this.fail();
                const size = Number(len.value);
                this.pos = pos + size;
                return {
                    id,
                    wireType: WireType.LengthDelimited,
                    int: 0n,
                    bytes: this.buf.subarray(pos, pos + size),
                };
            }
            default:
                // Groups are not used by the trace format
                return this.fail();
        }
    }

    /**
     * Linear scan from the start of the message for the first field with `id`.
     * Does not disturb the iteration position.
     */
    findField(id: number): ProtoField | null {
        const scan = new ProtoDecoder(this.buf, this.begin, this.end);
        for (let field = scan.readField(); field; field = scan.readField()) {
            if (field.id === id) return field;
        }
        return null;
    }

    private fail(): null {
        this._malformed = true;
        return null;
    }
}

/** Shared by all column iterators of one batch */
export interface ParseErrorFlag {
    parseError: boolean;
}

/**
 * Lazy iterator over a packed repeated varint field. A field may be split
 * across several segments; they are read in order. A malformed varint sets
 * the shared flag and ends the sequence.
 */
export function* packedVarints(
    segments: readonly Uint8Array[],
    flag: ParseErrorFlag
): Generator<bigint, void, undefined> {
    for (const seg of segments) {
        let pos = 0;
        while (pos < seg.length) {
            const v = parseVarint(seg, pos, seg.length);
            if (!v) {
                flag.parseError = true;
                return;
            }
            pos = v.next;
            yield v.value;
        }
    }
}

// --- Internal ---

function readFixed(buf: Uint8Array, pos: number, width: 4 | 8): bigint {
    const view = new DataView(buf.buffer, buf.byteOffset + pos, width);
    return width === 8 ? view.getBigUint64(0, true) : BigInt(view.getUint32(0, true));
}
