/**
 * Clock Resolution
 *
 * Maps a bundle's clock domain to a canonical clock and converts raw ticks
 * on that clock to trace time through a ClockRegistry.
 */

import { BuiltinClock, DEFAULT_CLOCK, FtraceClock, type ClockId } from '../types.js';

/** Process-wide clock conversion backend */
export interface ClockRegistry {
    /**
     * Convert `ts` on `clockId` to trace time, or undefined when no
     * conversion exists. Implementations count their own failures.
     */
    toTraceTime(clockId: ClockId, ts: bigint): bigint | undefined;
}

export type ClockMapping =
    | { success: true; clockId: ClockId }
    | { success: false; error: string };

/**
 * Canonical clock for a bundle's ftrace_clock selector
 */
export function mapFtraceClock(selector: number): ClockMapping {
    switch (selector) {
        case FtraceClock.Unspecified:
            return { success: true, clockId: BuiltinClock.Boottime };
        case FtraceClock.Global:
            return { success: true, clockId: BuiltinClock.Monotonic };
        case FtraceClock.Local:
            return { success: false, error: 'Unable to parse ftrace packets with local clock' };
        default:
            return { success: false, error: 'Unable to parse ftrace packets with unknown clock' };
    }
}

export class ClockResolver {
    private readonly registry: ClockRegistry;

    constructor(registry: ClockRegistry) {
        this.registry = registry;
    }

    /**
     * Trace time for `ts`. The default clock is already trace time and skips
     * the registry entirely.
     */
    resolve(clockId: ClockId, ts: bigint): bigint | undefined {
        if (clockId === DEFAULT_CLOCK) return ts;
        return this.registry.toTraceTime(clockId, ts);
    }
}
