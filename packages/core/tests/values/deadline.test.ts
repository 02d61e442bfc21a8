import { describe, it, expect } from 'vitest';
import { DeadlineInput, DEADLINE_FORMAT, parseDeadline } from '../../src/values/deadline.js';
import { unwrap, unwrapError } from '../helpers.js';

describe('parseDeadline', () => {
  it('parses 2022-01-01 09', () => {
    expect(parseDeadline('2022-01-01 09')).toBe(1641027600);
  });

  it('parses the epoch', () => {
    expect(parseDeadline('1970-01-01 00')).toBe(0);
  });

  it('accepts single-digit month, day and hour', () => {
    expect(parseDeadline('2022-1-1 9')).toBe(1641027600);
  });

  it('trims surrounding whitespace', () => {
    expect(parseDeadline('  2022-01-01 09 ')).toBe(1641027600);
  });

  it('accepts February 29 on a leap year', () => {
    expect(parseDeadline('2024-02-29 12')).toBe(1709208000);
  });

  it('lands on the top of the hour', () => {
    expect(parseDeadline('2022-01-01 23')! % 3600).toBe(0);
  });

  it('rejects February 29 on a non-leap year', () => {
    expect(parseDeadline('2021-02-29 01')).toBeNull();
  });

  it('rejects February 30', () => {
    expect(parseDeadline('2024-02-30 01')).toBeNull();
  });

  it('rejects month 13', () => {
    expect(parseDeadline('2022-13-01 00')).toBeNull();
  });

  it('rejects hour 24', () => {
    expect(parseDeadline('2022-01-01 24')).toBeNull();
  });

  it('rejects a date without an hour', () => {
    expect(parseDeadline('2022-01-01')).toBeNull();
  });

  it('rejects minutes', () => {
    expect(parseDeadline('2022-01-01 09:30')).toBeNull();
  });

  it('rejects garbage', () => {
    expect(parseDeadline('abc')).toBeNull();
  });
});

describe('DeadlineInput', () => {
  it('resolves absent input to no deadline', () => {
    expect(unwrap(new DeadlineInput().resolve())).toBeNull();
    expect(unwrap(new DeadlineInput(null).resolve())).toBeNull();
  });

  it('reports presence', () => {
    expect(new DeadlineInput().isPresent()).toBe(false);
    expect(new DeadlineInput(null).isPresent()).toBe(false);
    expect(new DeadlineInput('abc').isPresent()).toBe(true);
  });

  it('resolves a valid deadline to unix seconds', () => {
    expect(unwrap(new DeadlineInput('2022-01-01 09').resolve())).toBe(1641027600);
  });

  it('fails with the raw input and the expected format', () => {
    expect(unwrapError(new DeadlineInput('abc').resolve())).toEqual({
      kind: 'date-time-parse-error',
      input: 'abc',
      expectedFormat: 'YYYY-MM-DD HH',
    });
  });

  it('fails on a calendar-invalid date', () => {
    expect(unwrapError(new DeadlineInput('2021-02-29 01').resolve())).toEqual({
      kind: 'date-time-parse-error',
      input: '2021-02-29 01',
      expectedFormat: DEADLINE_FORMAT,
    });
  });
});
