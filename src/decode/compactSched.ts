/**
 * Compact Sched Decoder
 *
 * sched_switch and sched_waking events packed structure-of-arrays style:
 * one packed varint column per field, delta-encoded timestamps, and comm
 * strings as indexes into a per-bundle intern table.
 *
 * Design:
 * - Each column is a lazy iterator; all columns of a batch share one
 *   parse-error flag and are stepped together
 * - The first exhausted column ends the batch; leftover elements in any
 *   other column are a parse error, counted once per batch
 * - Rows already forwarded are never retracted
 */

import type {
    ClockFailurePolicy,
    ClockId,
    InlineSchedEvent,
    InlineSchedSwitch,
    InlineSchedWaking,
    StringId,
} from '../types.js';
import type { ClockResolver } from '../clock/resolver.js';
import type { EventSink } from '../sink/types.js';
import type { StringInterner } from '../storage/stringPool.js';
import { StatKey, type StatsSink } from '../instrument/stats.js';
import { logErrorLimited } from '../utils/logger.js';
import { ProtoDecoder, packedVarints, type ParseErrorFlag } from './protoDecoder.js';
import { WireType, toInt32, toInt64 } from './varint.js';

// ============================================================================
// WIRE LAYOUT
// ============================================================================

export const CompactSchedField = {
    SwitchTimestamp: 1,
    SwitchPrevState: 2,
    SwitchNextPid: 3,
    SwitchNextPrio: 4,
    InternTable: 5,
    SwitchNextCommIndex: 6,
    WakingTimestamp: 7,
    WakingPid: 8,
    WakingTargetCpu: 9,
    WakingPrio: 10,
    WakingCommIndex: 11,
} as const;

const F = CompactSchedField;

/** Column ids and record shape of one event kind */
interface BatchLayout<T extends InlineSchedEvent> {
    timestamp: number;
    fields: readonly [number, number, number];
    commIndex: number;
    build(a: bigint, b: bigint, c: bigint, comm: StringId): T;
}

const SWITCH_LAYOUT: BatchLayout<InlineSchedSwitch> = {
    timestamp: F.SwitchTimestamp,
    fields: [F.SwitchPrevState, F.SwitchNextPid, F.SwitchNextPrio],
    commIndex: F.SwitchNextCommIndex,
    build: (prevState, nextPid, nextPrio, nextComm) => ({
        kind: 'sched_switch',
        prevState: toInt64(prevState),
        nextPid: toInt32(nextPid),
        nextPrio: toInt32(nextPrio),
        nextComm,
    }),
};

const WAKING_LAYOUT: BatchLayout<InlineSchedWaking> = {
    timestamp: F.WakingTimestamp,
    fields: [F.WakingPid, F.WakingTargetCpu, F.WakingPrio],
    commIndex: F.WakingCommIndex,
    build: (pid, targetCpu, prio, comm) => ({
        kind: 'sched_waking',
        pid: toInt32(pid),
        targetCpu: toInt32(targetCpu),
        prio: toInt32(prio),
        comm,
    }),
};

// ============================================================================
// CONTAINER PARSE
// ============================================================================

/** Compact sched message split into raw column segments */
export interface CompactSchedMessage {
    internTable: Uint8Array[];
    columns: Map<number, Uint8Array[]>;
    /** Container bytes, intern table or a column had the wrong shape */
    malformed: boolean;
}

export function parseCompactSched(bytes: Uint8Array): CompactSchedMessage {
    const msg: CompactSchedMessage = { internTable: [], columns: new Map(), malformed: false };
    const decoder = new ProtoDecoder(bytes);

    for (let field = decoder.readField(); field; field = decoder.readField()) {
        if (field.id > F.WakingCommIndex) continue;

        // Intern table entries and packed columns are all length-delimited
        if (field.wireType !== WireType.LengthDelimited) {
            msg.malformed = true;
            continue;
        }

        if (field.id === F.InternTable) {
            msg.internTable.push(field.bytes);
            continue;
        }

        const segments = msg.columns.get(field.id);
        if (segments) segments.push(field.bytes);
        else msg.columns.set(field.id, [field.bytes]);
    }

    if (decoder.malformed) msg.malformed = true;
    return msg;
}

// ============================================================================
// COLUMN CURSOR
// ============================================================================

/** One-element lookahead over a column, so validity is known before stepping */
class ColumnCursor {
    private readonly it: Iterator<bigint, void, undefined>;
    private head: IteratorResult<bigint, void>;

    constructor(it: Iterator<bigint, void, undefined>) {
        this.it = it;
        this.head = it.next();
    }

    get valid(): boolean {
        return this.head.done !== true;
    }

    get value(): bigint {
        return this.head.done ? 0n : this.head.value;
    }

    advance(): void {
        this.head = this.it.next();
    }
}

// ============================================================================
// DECODER
// ============================================================================

export interface CompactSchedDeps {
    resolver: ClockResolver;
    sink: EventSink;
    stats: StatsSink;
    strings: StringInterner;
    clockFailurePolicy: ClockFailurePolicy;
}

export class CompactSchedDecoder {
    private readonly deps: CompactSchedDeps;

    constructor(deps: CompactSchedDeps) {
        this.deps = deps;
    }

    /**
     * Decode a bundle's compact_sched message: intern table first, then the
     * switch batch, then the waking batch.
     */
    decode(cpu: number, clockId: ClockId, bytes: Uint8Array): void {
        const msg = parseCompactSched(bytes);
        const table = this.buildInternTable(msg);
        this.decodeSwitch(cpu, clockId, msg, table);
        this.decodeWaking(cpu, clockId, msg, table);
    }

    buildInternTable(msg: CompactSchedMessage): StringId[] {
        const table: StringId[] = [];
        for (const entry of msg.internTable) {
            table.push(this.deps.strings.intern(entry));
        }
        return table;
    }

    decodeSwitch(cpu: number, clockId: ClockId, msg: CompactSchedMessage, table: readonly StringId[]): void {
        this.decodeBatch(cpu, clockId, msg, table, SWITCH_LAYOUT);
    }

    decodeWaking(cpu: number, clockId: ClockId, msg: CompactSchedMessage, table: readonly StringId[]): void {
        this.decodeBatch(cpu, clockId, msg, table, WAKING_LAYOUT);
    }

    private decodeBatch<T extends InlineSchedEvent>(
        cpu: number,
        clockId: ClockId,
        msg: CompactSchedMessage,
        table: readonly StringId[],
        layout: BatchLayout<T>
    ): void {
        const { resolver, sink, stats, clockFailurePolicy } = this.deps;
        const flag: ParseErrorFlag = { parseError: msg.malformed };

        const open = (id: number) => new ColumnCursor(packedVarints(msg.columns.get(id) ?? [], flag));
        const tsCol = open(layout.timestamp);
        const aCol = open(layout.fields[0]);
        const bCol = open(layout.fields[1]);
        const cCol = open(layout.fields[2]);
        const commCol = open(layout.commIndex);
        const cursors = [tsCol, aCol, bCol, cCol, commCol];

        // Delta accumulator, signed 64-bit with wraparound
        let acc = 0n;

        for (; cursors.every(c => c.valid); cursors.forEach(c => c.advance())) {
            acc = toInt64(acc + toInt64(tsCol.value));

            const commIndex = commCol.value;
            if (commIndex >= BigInt(table.length)) {
                logErrorLimited(
                    'compact_sched_comm_index',
                    `Compact sched comm index ${commIndex} out of bounds (table size ${table.length})`
                );
                stats.increment(StatKey.CompactSchedCommIndexOutOfBounds);
                continue;
            }

            const event = layout.build(aCol.value, bCol.value, cCol.value, table[Number(commIndex)]);

            const ts = resolver.resolve(clockId, acc);
            if (ts === undefined) {
                // abort-batch: the rest of the batch is dropped unchecked
                if (clockFailurePolicy === 'abort-batch') return;
                continue;
            }
            sink.pushInlineFtraceEvent(cpu, ts, event);
        }

        const sizesMatch = cursors.every(c => !c.valid);
        if (flag.parseError || !sizesMatch) {
            logErrorLimited('compact_sched_parse', 'Compact sched batch has parse errors or mismatched columns');
            stats.increment(StatKey.CompactSchedHasParseErrors);
        }
    }
}
