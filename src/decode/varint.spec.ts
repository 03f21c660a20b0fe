import test from 'node:test';
import assert from 'node:assert/strict';

import {
    MAX_VARINT_BYTES,
    WireType,
    makeTag,
    parseVarint,
    parseVarintBounded,
    toInt32,
    toInt64,
    toUint32,
} from './varint.js';
import { writer } from '../testing/fixtures.js';

const U64_MAX = (1n << 64n) - 1n;

test('varint: single and multi byte values', () => {
    assert.deepEqual(parseVarint(new Uint8Array([0x00]), 0, 1), { value: 0n, next: 1 });
    assert.deepEqual(parseVarint(new Uint8Array([0x7f]), 0, 1), { value: 127n, next: 1 });
    assert.deepEqual(parseVarint(new Uint8Array([0xac, 0x02]), 0, 2), { value: 300n, next: 2 });
});

test('varint: decodes at an offset and reports the following position', () => {
    const buf = new Uint8Array([0xff, 0xe8, 0x07, 0x05]);
    assert.deepEqual(parseVarint(buf, 1, buf.length), { value: 1000n, next: 3 });
});

test('varint: 64-bit maximum uses all ten bytes', () => {
    const buf = new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x01]);
    assert.deepEqual(parseVarint(buf, 0, buf.length), { value: U64_MAX, next: 10 });
});

test('varint: values straddling the 32-bit boundary', () => {
    const w = writer();
    w.uint64(2 ** 32);
    w.uint64(2 ** 35 + 5);
    const buf = w.finish();

    const first = parseVarint(buf, 0, buf.length);
    assert.ok(first);
    assert.equal(first.value, 1n << 32n);

    const second = parseVarint(buf, first.next, buf.length);
    assert.ok(second);
    assert.equal(second.value, (1n << 35n) + 5n);
    assert.equal(second.next, buf.length);
});

test('varint: negative int64 round-trips through reinterpretation', () => {
    const buf = writer().int64(-5).finish();
    assert.equal(buf.length, MAX_VARINT_BYTES);

    const r = parseVarint(buf, 0, buf.length);
    assert.ok(r);
    assert.equal(r.value, U64_MAX - 4n);
    assert.equal(toInt64(r.value), -5n);
    assert.equal(toInt32(r.value), -5);
});

test('varint: truncated input fails', () => {
    assert.equal(parseVarint(new Uint8Array([0x80, 0x80]), 0, 2), null);
    assert.equal(parseVarint(new Uint8Array([]), 0, 0), null);
});

test('varint: end bound is respected', () => {
    assert.equal(parseVarint(new Uint8Array([0xac, 0x02]), 0, 1), null);
});

test('varint: encodings longer than ten bytes fail', () => {
    const buf = new Uint8Array(11).fill(0x80);
    buf[10] = 0x01;
    assert.equal(parseVarint(buf, 0, buf.length), null);
});

test('varint: bounded decoder reads at most ten bytes', () => {
    const buf = new Uint8Array(16).fill(0x80);
    buf[15] = 0x01;
    assert.equal(parseVarintBounded(buf, 0), null);

    const ok = new Uint8Array([0x08, 0xe8, 0x07]);
    assert.deepEqual(parseVarintBounded(ok, 1), { value: 1000n, next: 3 });
});

test('varint: integer reinterpretation helpers', () => {
    assert.equal(toUint32(0x1_0000_0005n), 5);
    assert.equal(toInt32(0xffff_ffffn), -1);
    assert.equal(toInt64(1n << 63n), -(1n << 63n));
});

test('varint: tags combine field id and wire type', () => {
    assert.equal(makeTag(1, WireType.Varint), 0x08);
    assert.equal(makeTag(2, WireType.LengthDelimited), 0x12);
    assert.equal(makeTag(11, WireType.LengthDelimited), 0x5a);
});
