import { describe, it, expect } from 'vitest';
import { ResultLimit, QUERY_DEFAULT_LIMIT, QUERY_MAX_LIMIT } from '../../src/values/result-limit.js';
import { toUnsigned64 } from '../../src/values/count.js';
import { unwrap, unwrapError } from '../helpers.js';

describe('ResultLimit', () => {
  it('defaults to 10 when absent', () => {
    expect(unwrap(new ResultLimit().resolve())).toBe(QUERY_DEFAULT_LIMIT);
    expect(QUERY_DEFAULT_LIMIT).toBe(10);
  });

  it('falls back to the default below one', () => {
    expect(unwrap(new ResultLimit(0).resolve())).toBe(10);
    expect(unwrap(new ResultLimit(-3).resolve())).toBe(10);
  });

  it('passes values in range through', () => {
    expect(unwrap(new ResultLimit(1).resolve())).toBe(1);
    expect(unwrap(new ResultLimit(42).resolve())).toBe(42);
    expect(unwrap(new ResultLimit(100).resolve())).toBe(100);
  });

  it('clamps to the maximum', () => {
    expect(unwrap(new ResultLimit(101).resolve())).toBe(QUERY_MAX_LIMIT);
    expect(unwrap(new ResultLimit(200).resolve())).toBe(100);
    expect(unwrap(new ResultLimit(0xffff_ffff).resolve())).toBe(100);
  });

  it('rejects values that are not unsigned 32-bit integers', () => {
    const expected = { kind: 'data-conversion-u32-to-usize' };
    expect(unwrapError(new ResultLimit(2.5).resolve())).toEqual(expected);
    expect(unwrapError(new ResultLimit(Number.NaN).resolve())).toEqual(expected);
    expect(unwrapError(new ResultLimit(2 ** 32).resolve())).toEqual(expected);
  });
});

describe('toUnsigned64', () => {
  it('passes non-negative integers through', () => {
    expect(unwrap(toUnsigned64(0))).toBe(0);
    expect(unwrap(toUnsigned64(12))).toBe(12);
  });

  it('rejects values that cannot be an unsigned count', () => {
    expect(unwrapError(toUnsigned64(-1))).toEqual({ kind: 'data-conversion-usize-to-u64', value: -1 });
    expect(unwrapError(toUnsigned64(1.5))).toEqual({ kind: 'data-conversion-usize-to-u64', value: 1.5 });
  });
});
