import test from 'node:test';
import assert from 'node:assert/strict';

import { ConfigError, DEFAULT_CONFIG, loadConfig } from './config.js';

test('loadConfig: defaults for an empty environment', () => {
    assert.deepEqual(loadConfig({}), DEFAULT_CONFIG);
    assert.deepEqual(DEFAULT_CONFIG, { maxCpus: 128, clockFailurePolicy: 'abort-batch', debug: false });
});

test('loadConfig: reads every variable', () => {
    const config = loadConfig({
        FTRACE_MAX_CPUS: '16',
        FTRACE_CLOCK_FAILURE_POLICY: 'skip-row',
        DEBUG: '1',
    });
    assert.deepEqual(config, { maxCpus: 16, clockFailurePolicy: 'skip-row', debug: true });
});

test('loadConfig: empty values fall back to defaults', () => {
    const config = loadConfig({ FTRACE_MAX_CPUS: '', FTRACE_CLOCK_FAILURE_POLICY: '', DEBUG: 'true' });
    assert.deepEqual(config, DEFAULT_CONFIG);
});

test('loadConfig: rejects a bad cpu limit', () => {
    for (const raw of ['0', '-1', '1.5', 'many', '99999999999999999999']) {
        assert.throws(
            () => loadConfig({ FTRACE_MAX_CPUS: raw }),
            (err: unknown) =>
                err instanceof ConfigError &&
                err.variable === 'FTRACE_MAX_CPUS' &&
                err.message === `FTRACE_MAX_CPUS: expected a positive integer, got '${raw}'`
        );
    }
});

test('loadConfig: rejects an unknown clock failure policy', () => {
    assert.throws(() => loadConfig({ FTRACE_CLOCK_FAILURE_POLICY: 'ignore' }), {
        name: 'ConfigError',
        message: "FTRACE_CLOCK_FAILURE_POLICY: expected 'abort-batch' or 'skip-row', got 'ignore'",
    });
});
