/**
 * Ftrace Bundle Tokenizer
 *
 * Splits one per-CPU FtraceEventBundle into timestamped events for the
 * downstream sorter.
 *
 * Handles:
 * - CPU / clock domain validation
 * - Per-event timestamp extraction (fast path + generic scan)
 * - Compact sched batches (see decode/compactSched.ts)
 *
 * Design:
 * - Synchronous, no internal queue; bundles are not retained
 * - Events keep their wire order and are forwarded as zero-copy views
 * - Recoverable anomalies are counted; only unsupported clocks fail the call
 */

import { DEFAULT_CONFIG, type TokenizerConfig } from '../config.js';
import { ClockResolver, mapFtraceClock, type ClockRegistry } from '../clock/resolver.js';
import { CompactSchedDecoder } from '../decode/compactSched.js';
import { ProtoDecoder } from '../decode/protoDecoder.js';
import { readTimestamp } from '../decode/timestamp.js';
import { WireType, toInt32, toInt64, toUint32 } from '../decode/varint.js';
import { StatKey, type StatsSink } from '../instrument/stats.js';
import type { EventSink } from '../sink/types.js';
import type { StringInterner } from '../storage/stringPool.js';
import { OK, errResult, FtraceClock, type ClockId, type TokenizeResult } from '../types.js';
import type { ByteView } from '../utils/byteView.js';
import { debugLog, logErrorLimited } from '../utils/logger.js';

// ============================================================================
// WIRE LAYOUT
// ============================================================================

export const FtraceBundleField = {
    Cpu: 1,
    Event: 2,
    LostEvents: 3,
    CompactSched: 4,
    FtraceClock: 5,
} as const;

interface BundleFields {
    cpu: number | undefined;
    clock: number;
    compactSched: Uint8Array | undefined;
    events: Uint8Array[];
    malformed: boolean;
}

/**
 * Top-level bundle fields. Decoding stops at the first malformed byte;
 * fields read before it are kept.
 */
function decodeBundle(data: Uint8Array): BundleFields {
    const out: BundleFields = {
        cpu: undefined,
        clock: FtraceClock.Unspecified,
        compactSched: undefined,
        events: [],
        malformed: false,
    };

    const decoder = new ProtoDecoder(data);
    for (let field = decoder.readField(); field; field = decoder.readField()) {
        switch (field.id) {
            case FtraceBundleField.Cpu:
                if (field.wireType === WireType.Varint) out.cpu = toUint32(field.int);
                break;
            case FtraceBundleField.Event:
                if (field.wireType === WireType.LengthDelimited) out.events.push(field.bytes);
                break;
            case FtraceBundleField.CompactSched:
                if (field.wireType === WireType.LengthDelimited) out.compactSched = field.bytes;
                break;
            case FtraceBundleField.FtraceClock:
                if (field.wireType === WireType.Varint) out.clock = toInt32(field.int);
                break;
            default:
                break;
        }
    }

    out.malformed = decoder.malformed;
    return out;
}

// ============================================================================
// TOKENIZER
// ============================================================================

export interface FtraceTokenizerDeps {
    clocks: ClockRegistry;
    sink: EventSink;
    stats: StatsSink;
    strings: StringInterner;
    config?: Partial<TokenizerConfig>;
}

export class FtraceTokenizer {
    private readonly config: TokenizerConfig;
    private readonly resolver: ClockResolver;
    private readonly sink: EventSink;
    private readonly stats: StatsSink;
    private readonly compactSched: CompactSchedDecoder;

    constructor(deps: FtraceTokenizerDeps) {
        this.config = { ...DEFAULT_CONFIG, ...deps.config };
        this.resolver = new ClockResolver(deps.clocks);
        this.sink = deps.sink;
        this.stats = deps.stats;
        this.compactSched = new CompactSchedDecoder({
            resolver: this.resolver,
            sink: deps.sink,
            stats: deps.stats,
            strings: deps.strings,
            clockFailurePolicy: this.config.clockFailurePolicy,
        });
    }

    /**
     * Tokenize one bundle. Dropped bundles still return success; only an
     * unsupported clock domain fails.
     */
    tokenizeFtraceBundle(bundle: ByteView): TokenizeResult {
        const data = bundle.data();
        const fields = decodeBundle(data);

        if (fields.malformed) {
            logErrorLimited('bundle_malformed', `FtraceEventBundle truncated or malformed (${data.length} bytes)`);
        }

        if (fields.cpu === undefined) {
            logErrorLimited('bundle_no_cpu', 'CPU field not found in FtraceEventBundle');
            this.stats.increment(StatKey.FtraceBundleTokenizerErrors);
            return OK;
        }

        const cpu = fields.cpu;
        if (cpu >= this.config.maxCpus) {
            logErrorLimited('bundle_cpu_range', `CPU larger than max CPUs (${cpu} >= ${this.config.maxCpus})`);
            return OK;
        }

        const clock = mapFtraceClock(fields.clock);
        if (!clock.success) return errResult(clock.error);
        const clockId = clock.clockId;

        if (fields.compactSched) {
            this.compactSched.decode(cpu, clockId, fields.compactSched);
        }

        for (const event of fields.events) {
            const off = bundle.offsetOf(event);
            this.tokenizeFtraceEvent(cpu, clockId, bundle.slice(off, event.length));
        }

        if (this.config.debug) {
            debugLog(`bundle cpu=${cpu} clock=${clockId} events=${fields.events.length}`);
        }
        return OK;
    }

    /**
     * Extract one event's timestamp and forward it. Events without a
     * timestamp are counted and dropped; unresolvable timestamps are dropped
     * silently (the clock registry counts those).
     */
    tokenizeFtraceEvent(cpu: number, clockId: ClockId, event: ByteView): void {
        const raw = readTimestamp(event.data());
        if (!raw) {
            logErrorLimited('event_no_timestamp', 'Timestamp field not found in FtraceEvent');
            this.stats.increment(StatKey.FtraceBundleTokenizerErrors);
            return;
        }

        const ts = this.resolver.resolve(clockId, toInt64(raw.value));
        if (ts === undefined) return;
        this.sink.pushFtraceEvent(cpu, ts, event);
    }
}
