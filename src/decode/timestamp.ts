/**
 * Ftrace event timestamp extraction
 *
 * The timestamp (field 1, varint) is the first field of nearly every
 * serialized FtraceEvent. The fast path checks the first byte against the
 * field's tag and decodes the varint right after it; anything else goes
 * through a generic field scan. Both paths must return the same value.
 */

import { ProtoDecoder } from './protoDecoder.js';
import { MAX_VARINT_BYTES, WireType, makeTag, parseVarintBounded } from './varint.js';

export const TIMESTAMP_FIELD_ID = 1;
export const TIMESTAMP_FIELD_TAG = makeTag(TIMESTAMP_FIELD_ID, WireType.Varint);

export interface RawTimestamp {
    /** Unsigned value as stored on the wire */
    value: bigint;
    /** Where iteration over the remaining fields can resume */
    fieldsOffset: number;
}

/**
 * Fast path precondition: long enough to hold tag + a full varint, and the
 * first byte is the timestamp tag.
 */
export function canUseFastPath(data: Uint8Array): boolean {
    return data.length > MAX_VARINT_BYTES && data[0] === TIMESTAMP_FIELD_TAG;
}

export function readTimestampFast(data: Uint8Array): RawTimestamp | null {
    if (data.length === 0 || data[0] !== TIMESTAMP_FIELD_TAG) return null;
    const v = parseVarintBounded(data, 1);
    if (!v) return null;
    return { value: v.value, fieldsOffset: v.next };
}

export function readTimestampSlow(data: Uint8Array): RawTimestamp | null {
    const field = new ProtoDecoder(data).findField(TIMESTAMP_FIELD_ID);
    if (!field || field.wireType !== WireType.Varint) return null;
    return { value: field.int, fieldsOffset: 0 };
}

export function readTimestamp(data: Uint8Array): RawTimestamp | null {
    return canUseFastPath(data) ? readTimestampFast(data) : readTimestampSlow(data);
}
