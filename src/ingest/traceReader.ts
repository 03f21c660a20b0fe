/**
 * Trace Reader
 *
 * Walks a serialized Trace (a sequence of TracePackets) and routes the
 * packets the tokenizer cares about:
 * - clock_snapshot -> ClockTracker
 * - ftrace_events  -> FtraceTokenizer
 *
 * Packets are handled strictly in order, so a snapshot only affects bundles
 * that follow it. The first failing bundle stops the read and its error is
 * returned to the caller.
 */

import type { ClockReading, ClockTracker } from '../clock/tracker.js';
import { ProtoDecoder } from '../decode/protoDecoder.js';
import { WireType, toUint32 } from '../decode/varint.js';
import type { FtraceTokenizer } from '../tokenizer/ftraceTokenizer.js';
import { OK, errResult, type TokenizeResult } from '../types.js';
import type { ByteView } from '../utils/byteView.js';
import { logger } from '../utils/logger.js';

// ============================================================================
// WIRE LAYOUT
// ============================================================================

const TRACE_PACKET_FIELD = 1;

const TracePacketField = {
    FtraceEvents: 1,
    ClockSnapshot: 6,
} as const;

const CLOCK_SNAPSHOT_CLOCKS_FIELD = 1;

const ClockField = {
    ClockId: 1,
    Timestamp: 2,
} as const;

export interface TraceReaderStats {
    packets: number;
    ftraceBundles: number;
    clockSnapshots: number;
}

export interface TraceReaderDeps {
    tokenizer: FtraceTokenizer;
    clocks: ClockTracker;
}

export class TraceReader {
    private readonly tokenizer: FtraceTokenizer;
    private readonly clocks: ClockTracker;
    private stats: TraceReaderStats = { packets: 0, ftraceBundles: 0, clockSnapshots: 0 };

    constructor(deps: TraceReaderDeps) {
        this.tokenizer = deps.tokenizer;
        this.clocks = deps.clocks;
    }

    getStats(): TraceReaderStats {
        return { ...this.stats };
    }

    /**
     * Read every packet of `trace`
     */
    read(trace: ByteView): TokenizeResult {
        const decoder = new ProtoDecoder(trace.data());

        for (let field = decoder.readField(); field; field = decoder.readField()) {
            if (field.id !== TRACE_PACKET_FIELD) continue;
            if (field.wireType !== WireType.LengthDelimited) {
                return errResult(`Trace packet ${this.stats.packets} is not length-delimited`);
            }

            this.stats.packets++;
            const packet = trace.slice(trace.offsetOf(field.bytes), field.bytes.length);
            const result = this.readPacket(packet);
            if (!result.success) {
                return errResult(`Trace packet ${this.stats.packets - 1}: ${result.error}`);
            }
        }

        if (decoder.malformed) {
            return errResult(`Malformed trace after packet ${this.stats.packets}`);
        }
        return OK;
    }

    private readPacket(packet: ByteView): TokenizeResult {
        const decoder = new ProtoDecoder(packet.data());

        for (let field = decoder.readField(); field; field = decoder.readField()) {
            if (field.wireType !== WireType.LengthDelimited) continue;

            if (field.id === TracePacketField.ClockSnapshot) {
                this.stats.clockSnapshots++;
                const readings = parseClockSnapshot(field.bytes);
                if (!this.clocks.addSnapshot(readings)) {
                    logger.warn(`Clock snapshot without trace clock ${this.clocks.traceClock} ignored`);
                }
            } else if (field.id === TracePacketField.FtraceEvents) {
                this.stats.ftraceBundles++;
                const bundle = packet.slice(packet.offsetOf(field.bytes), field.bytes.length);
                const result = this.tokenizer.tokenizeFtraceBundle(bundle);
                if (!result.success) return result;
            }
        }

        if (decoder.malformed) return errResult('Malformed TracePacket');
        return OK;
    }
}

// --- Internal ---

function parseClockSnapshot(bytes: Uint8Array): ClockReading[] {
    const readings: ClockReading[] = [];
    const decoder = new ProtoDecoder(bytes);

    for (let field = decoder.readField(); field; field = decoder.readField()) {
        if (field.id !== CLOCK_SNAPSHOT_CLOCKS_FIELD || field.wireType !== WireType.LengthDelimited) continue;

        const clock = new ProtoDecoder(field.bytes);
        let clockId: number | undefined;
        let timestamp: bigint | undefined;
        for (let f = clock.readField(); f; f = clock.readField()) {
            if (f.wireType !== WireType.Varint) continue;
            if (f.id === ClockField.ClockId) clockId = toUint32(f.int);
            else if (f.id === ClockField.Timestamp) timestamp = f.int;
        }
        if (clockId !== undefined && timestamp !== undefined) {
            readings.push({ clockId, timestamp });
        }
    }
    return readings;
}
