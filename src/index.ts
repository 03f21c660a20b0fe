/**
 * Public entry point
 */

import { loadConfig, type TokenizerConfig } from './config.js';
import { ClockTracker } from './clock/tracker.js';
import { TraceReader } from './ingest/traceReader.js';
import { StatsCollector } from './instrument/stats.js';
import { BufferedEventSink } from './sink/bufferedSink.js';
import { StringPool } from './storage/stringPool.js';
import { FtraceTokenizer } from './tokenizer/ftraceTokenizer.js';

export * from './types.js';
export { loadConfig, ConfigError, DEFAULT_CONFIG, type TokenizerConfig } from './config.js';
export { ByteView } from './utils/byteView.js';
export { logger } from './utils/logger.js';
export { ClockResolver, mapFtraceClock, type ClockRegistry, type ClockMapping } from './clock/resolver.js';
export { ClockTracker, type ClockReading } from './clock/tracker.js';
export { StatKey, StatsCollector, type StatsSink, type StatsSnapshot } from './instrument/stats.js';
export { StringPool, type StringInterner } from './storage/stringPool.js';
export type { EventSink } from './sink/types.js';
export { BufferedEventSink, type SinkEntry } from './sink/bufferedSink.js';
export { parseVarint, parseVarintBounded, WireType, MAX_VARINT_BYTES } from './decode/varint.js';
export { ProtoDecoder, type ProtoField } from './decode/protoDecoder.js';
export { readTimestamp, readTimestampFast, readTimestampSlow, canUseFastPath } from './decode/timestamp.js';
export { CompactSchedDecoder, parseCompactSched, CompactSchedField } from './decode/compactSched.js';
export { FtraceTokenizer, FtraceBundleField, type FtraceTokenizerDeps } from './tokenizer/ftraceTokenizer.js';
export { TraceReader, type TraceReaderStats } from './ingest/traceReader.js';

export interface TokenizerPipeline {
    config: TokenizerConfig;
    stats: StatsCollector;
    strings: StringPool;
    clocks: ClockTracker;
    sink: BufferedEventSink;
    tokenizer: FtraceTokenizer;
    reader: TraceReader;
}

/**
 * Wire a tokenizer to the in-process collaborators
 */
export function createTokenizerPipeline(config: TokenizerConfig = loadConfig()): TokenizerPipeline {
    const stats = new StatsCollector();
    const strings = new StringPool();
    const clocks = new ClockTracker(stats);
    const sink = new BufferedEventSink();
    const tokenizer = new FtraceTokenizer({ clocks, sink, stats, strings, config });
    const reader = new TraceReader({ tokenizer, clocks });
    return { config, stats, strings, clocks, sink, tokenizer, reader };
}
