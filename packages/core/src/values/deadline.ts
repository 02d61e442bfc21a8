/**
 * Parses user deadlines of the form `YYYY-MM-DD HH` into unix seconds.
 * Only hour granularity is exposed; the result always sits on the top of the hour
 * and is interpreted in UTC.
 */

import { AppError } from '../types/app-error.js';
import type { AppResult } from '../types/results.js';
import { success, failure } from '../types/results.js';
import type { UnixTime } from '../types/todo.js';

export const DEADLINE_FORMAT = 'YYYY-MM-DD HH';

/** yyyy-M(M)-d(d) H(H) */
const DEADLINE_RE = /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2})$/;

/**
 * Convert calendar parts to unix seconds, or null when they don't name a real hour
 * (e.g. 2021-02-29 or hour 24).
 */
function toUnixTime(year: number, month: number, day: number, hour: number): UnixTime | null {
  if (hour > 23) return null;

  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC
  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  d.setUTCHours(hour, 0, 0, 0);

  // Rolled over means the day doesn't exist in that month
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return d.getTime() / 1000;
}

/** Parse a trimmed deadline string, or null if it can't be parsed */
export function parseDeadline(input: string): UnixTime | null {
  const m = DEADLINE_RE.exec(input.trim());
  if (!m) return null;

  const [, year, month, day, hour] = m.map(Number);
  if (year === undefined || month === undefined || day === undefined || hour === undefined) return null;
  return toUnixTime(year, month, day, hour);
}

/** An optional raw deadline. Absent input resolves to "no deadline". */
export class DeadlineInput {
  constructor(private readonly raw?: string | null) {}

  isPresent(): boolean {
    return this.raw != null;
  }

  resolve(): AppResult<UnixTime | null> {
    if (this.raw == null) return success(null);

    const unixTime = parseDeadline(this.raw);
    return unixTime === null
      ? failure(AppError.dateTimeParse(this.raw, DEADLINE_FORMAT))
      : success(unixTime);
  }
}
