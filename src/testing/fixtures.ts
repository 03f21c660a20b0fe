/**
 * Test fixtures
 *
 * Encodes trace messages from proto/trace.proto with protobufjs, plus
 * collaborator fakes shared by the specs.
 */

import { fileURLToPath } from 'node:url';
import protobuf from 'protobufjs';
import type { Type, Writer } from 'protobufjs';

import type { ClockRegistry } from '../clock/resolver.js';
import { StatsCollector } from '../instrument/stats.js';
import { BufferedEventSink } from '../sink/bufferedSink.js';
import { StringPool } from '../storage/stringPool.js';
import { FtraceTokenizer } from '../tokenizer/ftraceTokenizer.js';
import type { TokenizerConfig } from '../config.js';
import type { ClockId } from '../types.js';
import { ByteView } from '../utils/byteView.js';

const PROTO_PATH = fileURLToPath(new URL('../../proto/trace.proto', import.meta.url));

const root = protobuf.loadSync(PROTO_PATH);

export const FtraceEventType = root.lookupType('ftrace.FtraceEvent');
export const FtraceEventBundleType = root.lookupType('ftrace.FtraceEventBundle');
export const CompactSchedType = root.lookupType('ftrace.FtraceEventBundle.CompactSched');
export const TraceType = root.lookupType('ftrace.Trace');

function encode(type: Type, value: Record<string, unknown>): Uint8Array {
    return type.encode(type.fromObject(value)).finish();
}

export function encodeEvent(value: Record<string, unknown>): Uint8Array {
    return encode(FtraceEventType, value);
}

export function encodeBundle(value: Record<string, unknown>): Uint8Array {
    return encode(FtraceEventBundleType, value);
}

export function encodeCompactSched(value: Record<string, unknown>): Uint8Array {
    return encode(CompactSchedType, value);
}

export function encodeTrace(value: Record<string, unknown>): Uint8Array {
    return encode(TraceType, value);
}

/** Writer for hand-built (often malformed) messages */
export function writer(): Writer {
    return protobuf.Writer.create();
}

/**
 * Varint of `value` as a 64-bit two's complement integer. Covers the values
 * a number cannot carry through fromObject (negative uint64, above 2^53).
 */
export function varint64(value: bigint): Uint8Array {
    let v = BigInt.asUintN(64, value);
    const out: number[] = [];
    while (v >= 0x80n) {
        out.push(Number(v & 0x7fn) | 0x80);
        v >>= 7n;
    }
    out.push(Number(v));
    return Uint8Array.from(out);
}

/** Packed varint column body */
export function packedVarint64(values: readonly bigint[]): Uint8Array {
    return Buffer.concat(values.map(varint64));
}

/** Event body long enough (> 10 bytes) for the timestamp fast path */
export function fastPathEvent(timestamp: number): Record<string, unknown> {
    return { timestamp, pid: 42, print: { buf: 'hello' } };
}

/**
 * ClockRegistry that records every call. Converts with `convert`
 * (identity by default).
 */
export class FakeClockRegistry implements ClockRegistry {
    readonly calls: Array<{ clockId: ClockId; ts: bigint }> = [];
    private readonly convert: (clockId: ClockId, ts: bigint) => bigint | undefined;

    constructor(convert: (clockId: ClockId, ts: bigint) => bigint | undefined = (_clockId, ts) => ts) {
        this.convert = convert;
    }

    toTraceTime(clockId: ClockId, ts: bigint): bigint | undefined {
        this.calls.push({ clockId, ts });
        return this.convert(clockId, ts);
    }
}

export interface TokenizerHarness {
    stats: StatsCollector;
    strings: StringPool;
    clocks: FakeClockRegistry;
    sink: BufferedEventSink;
    tokenizer: FtraceTokenizer;
    tokenize(bytes: Uint8Array): ReturnType<FtraceTokenizer['tokenizeFtraceBundle']>;
}

export function makeTokenizer(
    clocks: FakeClockRegistry = new FakeClockRegistry(),
    config: Partial<TokenizerConfig> = {}
): TokenizerHarness {
    const stats = new StatsCollector();
    const strings = new StringPool();
    const sink = new BufferedEventSink();
    const tokenizer = new FtraceTokenizer({ clocks, sink, stats, strings, config });
    return {
        stats,
        strings,
        clocks,
        sink,
        tokenizer,
        tokenize: (bytes) => tokenizer.tokenizeFtraceBundle(new ByteView(bytes)),
    };
}
