/**
 * Event Sink contract
 * Receives decoded events (per CPU, trace time) for downstream ordering
 */

import type { InlineSchedEvent } from '../types.js';
import type { ByteView } from '../utils/byteView.js';

export interface EventSink {
    /** Generic ftrace event, still in its serialized form */
    pushFtraceEvent(cpu: number, ts: bigint, event: ByteView): void;

    /** Compact sched record decoded inline */
    pushInlineFtraceEvent(cpu: number, ts: bigint, event: InlineSchedEvent): void;
}
