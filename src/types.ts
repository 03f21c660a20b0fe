/**
 * Core type definitions for the ftrace tokenizer
 * These interfaces define module boundaries and collaborator contracts
 */

// ============================================================================
// CLOCKS
// ============================================================================

/** Canonical clock ids (BuiltinClock in the trace schema) */
export const BuiltinClock = {
    Realtime: 1,
    RealtimeCoarse: 2,
    Monotonic: 3,
    MonotonicCoarse: 4,
    MonotonicRaw: 5,
    Boottime: 6,
} as const;

export type BuiltinClock = (typeof BuiltinClock)[keyof typeof BuiltinClock];

/** Any clock id, builtin or sequence-scoped */
export type ClockId = number;

/** Clock domain selector carried by each bundle (FtraceClock on the wire) */
export const FtraceClock = {
    Unspecified: 0,
    Unknown: 1,
    Global: 2,
    Local: 3,
    MonoRaw: 4,
} as const;

export type FtraceClock = (typeof FtraceClock)[keyof typeof FtraceClock];

/** Trace time of the default clock needs no conversion */
export const DEFAULT_CLOCK: ClockId = BuiltinClock.Boottime;

// ============================================================================
// LIMITS
// ============================================================================

export const MAX_CPUS = 128;

// ============================================================================
// DECODED EVENTS
// ============================================================================

/** Handle into the global string storage */
export type StringId = number;

export interface InlineSchedSwitch {
    kind: 'sched_switch';
    prevState: bigint;
    nextPid: number;
    nextPrio: number;
    nextComm: StringId;
}

export interface InlineSchedWaking {
    kind: 'sched_waking';
    pid: number;
    targetCpu: number;
    prio: number;
    comm: StringId;
}

export type InlineSchedEvent = InlineSchedSwitch | InlineSchedWaking;

// ============================================================================
// RESULTS
// ============================================================================

/** Outcome of tokenizing one bundle (or one trace) */
export type TokenizeResult =
    | { success: true }
    | { success: false; error: string };

export const OK: TokenizeResult = { success: true };

export function errResult(error: string): TokenizeResult {
    return { success: false, error };
}

// ============================================================================
// POLICIES
// ============================================================================

/**
 * What the compact sched decoder does when a row's timestamp cannot be
 * converted to trace time.
 */
export type ClockFailurePolicy = 'abort-batch' | 'skip-row';
