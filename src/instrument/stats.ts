/**
 * Diagnostics Counters
 *
 * Named anomaly counters for recoverable decode problems. Components get a
 * StatsSink at construction; nothing reaches for a global.
 */

export const StatKey = {
    FtraceBundleTokenizerErrors: 'ftrace_bundle_tokenizer_errors',
    CompactSchedHasParseErrors: 'compact_sched_has_parse_errors',
    CompactSchedCommIndexOutOfBounds: 'compact_sched_comm_index_out_of_bounds',
    ClockSyncFailure: 'clock_sync_failure',
} as const;

export type StatKey = (typeof StatKey)[keyof typeof StatKey];

/** Increment-only view handed to decoders */
export interface StatsSink {
    increment(key: StatKey): void;
}

export type StatsSnapshot = Record<StatKey, bigint>;

function emptySnapshot(): StatsSnapshot {
    return {
        [StatKey.FtraceBundleTokenizerErrors]: 0n,
        [StatKey.CompactSchedHasParseErrors]: 0n,
        [StatKey.CompactSchedCommIndexOutOfBounds]: 0n,
        [StatKey.ClockSyncFailure]: 0n,
    };
}

export class StatsCollector implements StatsSink {
    private counters: StatsSnapshot = emptySnapshot();

    increment(key: StatKey): void {
        this.counters[key]++;
    }

    get(key: StatKey): bigint {
        return this.counters[key];
    }

    /**
     * Sum of all counters
     */
    total(): bigint {
        let sum = 0n;
        for (const value of Object.values(this.counters)) {
            sum += value;
        }
        return sum;
    }

    snapshot(): StatsSnapshot {
        return { ...this.counters };
    }

    reset(): void {
        this.counters = emptySnapshot();
    }
}
