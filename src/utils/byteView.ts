/**
 * Zero-copy byte view
 *
 * A window (offset, length) onto a shared owning buffer. Slicing never
 * copies; every view keeps a reference to the same backing Uint8Array.
 */

export class ByteView {
    readonly buffer: Uint8Array;
    readonly offset: number;
    readonly length: number;

    constructor(buffer: Uint8Array, offset: number = 0, length: number = buffer.length - offset) {
        if (offset < 0 || length < 0 || offset + length > buffer.length) {
            throw new RangeError(
                `View [${offset}, ${offset + length}) outside buffer of ${buffer.length} bytes`
            );
        }
        this.buffer = buffer;
        this.offset = offset;
        this.length = length;
    }

    /**
     * Bytes covered by this view (subarray, no copy)
     */
    data(): Uint8Array {
        return this.buffer.subarray(this.offset, this.offset + this.length);
    }

    /**
     * Sub-view relative to the start of this view
     */
    slice(offset: number, length: number): ByteView {
        if (offset < 0 || length < 0 || offset + length > this.length) {
            throw new RangeError(
                `Slice [${offset}, ${offset + length}) outside view of ${this.length} bytes`
            );
        }
        return new ByteView(this.buffer, this.offset + offset, length);
    }

    /**
     * Offset of a subarray of this view's data, relative to the view start.
     * Returns -1 when `sub` does not share this view's memory.
     */
    offsetOf(sub: Uint8Array): number {
        if (sub.buffer !== this.buffer.buffer) return -1;
        const start = this.buffer.byteOffset + this.offset;
        const off = sub.byteOffset - start;
        if (off < 0 || off + sub.length > this.length) return -1;
        return off;
    }
}
