/**
 * Tokenizer configuration
 *
 * Read from the environment (and a local .env file via dotenv when no
 * explicit environment is given).
 */

import dotenv from 'dotenv';
import { MAX_CPUS, type ClockFailurePolicy } from './types.js';

export interface TokenizerConfig {
    /** Bundles with cpu >= maxCpus are dropped */
    maxCpus: number;
    /** Compact sched behaviour when a row's clock cannot be resolved */
    clockFailurePolicy: ClockFailurePolicy;
    debug: boolean;
}

export const DEFAULT_CONFIG: TokenizerConfig = {
    maxCpus: MAX_CPUS,
    clockFailurePolicy: 'abort-batch',
    debug: false,
};

export class ConfigError extends Error {
    readonly variable: string;

    constructor(variable: string, message: string) {
        super(`${variable}: ${message}`);
        this.name = 'ConfigError';
        this.variable = variable;
    }
}

/**
 * Build config from environment variables:
 *   FTRACE_MAX_CPUS              positive integer (default 128)
 *   FTRACE_CLOCK_FAILURE_POLICY  abort-batch | skip-row
 *   DEBUG                        '1' enables debug logging
 */
export function loadConfig(env?: NodeJS.ProcessEnv): TokenizerConfig {
    let source = env;
    if (!source) {
        dotenv.config();
        source = process.env;
    }

    return {
        maxCpus: parseMaxCpus(source.FTRACE_MAX_CPUS),
        clockFailurePolicy: parsePolicy(source.FTRACE_CLOCK_FAILURE_POLICY),
        debug: source.DEBUG === '1',
    };
}

// --- Internal ---

function parseMaxCpus(raw: string | undefined): number {
    if (raw === undefined || raw === '') return DEFAULT_CONFIG.maxCpus;
    if (!/^\d+$/.test(raw)) {
        throw new ConfigError('FTRACE_MAX_CPUS', `expected a positive integer, got '${raw}'`);
    }
    const value = Number(raw);
    if (value < 1 || !Number.isSafeInteger(value)) {
        throw new ConfigError('FTRACE_MAX_CPUS', `expected a positive integer, got '${raw}'`);
    }
    return value;
}

function parsePolicy(raw: string | undefined): ClockFailurePolicy {
    if (raw === undefined || raw === '') return DEFAULT_CONFIG.clockFailurePolicy;
    if (raw === 'abort-batch' || raw === 'skip-row') return raw;
    throw new ConfigError(
        'FTRACE_CLOCK_FAILURE_POLICY',
        `expected 'abort-batch' or 'skip-row', got '${raw}'`
    );
}
