/**
 * Snapshot-based Clock Tracker
 *
 * In-process ClockRegistry. Each clock snapshot records the same instant on
 * several clocks; a timestamp on a non-trace clock converts through the
 * latest snapshot taken at or before it (or the first one, for timestamps
 * earlier than every snapshot).
 */

import { DEFAULT_CLOCK, type ClockId } from '../types.js';
import { toInt64 } from '../decode/varint.js';
import { StatKey, type StatsSink } from '../instrument/stats.js';
import type { ClockRegistry } from './resolver.js';

export interface ClockReading {
    clockId: ClockId;
    timestamp: bigint;
}

interface SyncPoint {
    srcTs: bigint;
    traceTs: bigint;
}

export class ClockTracker implements ClockRegistry {
    readonly traceClock: ClockId;
    private readonly stats: StatsSink;
    // Per source clock, sorted by srcTs
    private readonly syncPoints = new Map<ClockId, SyncPoint[]>();

    constructor(stats: StatsSink, traceClock: ClockId = DEFAULT_CLOCK) {
        this.stats = stats;
        this.traceClock = traceClock;
    }

    /**
     * Record a snapshot. Returns false (and stores nothing) when the snapshot
     * has no reading for the trace clock.
     */
    addSnapshot(readings: readonly ClockReading[]): boolean {
        const anchor = readings.find(r => r.clockId === this.traceClock);
        if (!anchor) return false;

        for (const reading of readings) {
            if (reading.clockId === this.traceClock) continue;

            let points = this.syncPoints.get(reading.clockId);
            if (!points) {
                points = [];
                this.syncPoints.set(reading.clockId, points);
            }
            const at = upperBound(points, reading.timestamp);
            points.splice(at, 0, { srcTs: reading.timestamp, traceTs: anchor.timestamp });
        }
        return true;
    }

    toTraceTime(clockId: ClockId, ts: bigint): bigint | undefined {
        if (clockId === this.traceClock) return ts;

        const points = this.syncPoints.get(clockId);
        if (!points || points.length === 0) {
            this.stats.increment(StatKey.ClockSyncFailure);
            return undefined;
        }

        const at = upperBound(points, ts);
        const point = points[at === 0 ? 0 : at - 1];
        return toInt64(ts - point.srcTs + point.traceTs);
    }
}

// --- Internal ---

/** Index of the first point with srcTs > ts */
function upperBound(points: readonly SyncPoint[], ts: bigint): number {
    let lo = 0;
    let hi = points.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        if (points[mid].srcTs <= ts) lo = mid + 1;
        else hi = mid;
    }
    return lo;
}
