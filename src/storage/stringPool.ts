/**
 * Interned String Storage
 *
 * Append-only pool of strings. Ids are keyed on the raw bytes, so byte
 * strings that are not valid UTF-8 still get distinct ids; `get` returns the
 * UTF-8 decoding (with replacement characters). Id 0 is the empty string.
 */

import type { StringId } from '../types.js';

export interface StringInterner {
    intern(bytes: Uint8Array): StringId;
}

export class StringPool implements StringInterner {
    private readonly strings: string[] = [''];
    // latin1 image of the raw bytes -> id
    private readonly ids = new Map<string, StringId>([['', 0]]);
    private readonly decoder = new TextDecoder('utf-8');

    intern(bytes: Uint8Array): StringId {
        const key = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
        const existing = this.ids.get(key);
        if (existing !== undefined) return existing;

        const id = this.strings.length;
        this.strings.push(this.decoder.decode(bytes));
        this.ids.set(key, id);
        return id;
    }

    internString(value: string): StringId {
        return this.intern(Buffer.from(value, 'utf8'));
    }

    get(id: StringId): string | undefined {
        return this.strings[id];
    }

    size(): number {
        return this.strings.length;
    }
}
