/**
 * Buffered Event Sink
 *
 * Keeps every pushed event in arrival order. `sorted()` orders them by trace
 * time, ties kept in arrival order (Array.prototype.sort is stable).
 */

import type { InlineSchedEvent } from '../types.js';
import type { ByteView } from '../utils/byteView.js';
import type { EventSink } from './types.js';

export type SinkEntry =
    | { type: 'ftrace'; cpu: number; ts: bigint; event: ByteView }
    | { type: 'inline'; cpu: number; ts: bigint; event: InlineSchedEvent };

export class BufferedEventSink implements EventSink {
    private entries: SinkEntry[] = [];

    pushFtraceEvent(cpu: number, ts: bigint, event: ByteView): void {
        this.entries.push({ type: 'ftrace', cpu, ts, event });
    }

    pushInlineFtraceEvent(cpu: number, ts: bigint, event: InlineSchedEvent): void {
        this.entries.push({ type: 'inline', cpu, ts, event });
    }

    get size(): number {
        return this.entries.length;
    }

    /**
     * Events in arrival order
     */
    events(): readonly SinkEntry[] {
        return this.entries;
    }

    /**
     * Copy of the events ordered by timestamp
     */
    sorted(): SinkEntry[] {
        return [...this.entries].sort((a, b) => (a.ts < b.ts ? -1 : a.ts > b.ts ? 1 : 0));
    }

    /**
     * Remove and return everything buffered so far
     */
    drain(): SinkEntry[] {
        const out = this.entries;
        this.entries = [];
        return out;
    }
}
