/**
 * CLI helpers: mapping user words onto core enums, id parsing, error handling.
 */

import type { AppResult, TodoId, TodoStatus as TodoStatusType, Priority as PriorityType } from '@memtodo/core';
import { AppError, TodoStatus, Priority, QuerySort, success, failure } from '@memtodo/core';
import * as out from './output.js';

const PRIORITY_MAP: Record<string, PriorityType> = {
  high: Priority.High,
  p1: Priority.High,
  '1': Priority.High,
  medium: Priority.Medium,
  p2: Priority.Medium,
  '2': Priority.Medium,
  low: Priority.Low,
  p3: Priority.Low,
  '3': Priority.Low,
};

const STATUS_MAP: Record<string, TodoStatusType> = {
  backlog: TodoStatus.Backlog,
  'in-progress': TodoStatus.InProgress,
  inprogress: TodoStatus.InProgress,
  wip: TodoStatus.InProgress,
  done: TodoStatus.Done,
};

/** `title` is accepted for completeness and maps to the default order */
const SORT_MAP: Record<string, QuerySort | 'title'> = {
  deadline: QuerySort.Deadline,
  priority: QuerySort.Priority,
  status: QuerySort.Status,
  title: 'title',
};

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Parse a priority string into a Priority value, or null if unknown.
 */
export function parsePriorityArg(level: string): PriorityType | null {
  return PRIORITY_MAP[level.toLowerCase()] ?? null;
}

/**
 * Parse a status string into a TodoStatus value, or null if unknown.
 */
export function parseStatus(status: string): TodoStatusType | null {
  return STATUS_MAP[status.toLowerCase()] ?? null;
}

/**
 * Parse a sort dimension. `undefined` means title order; null means unknown.
 */
export function parseSortArg(sort: string): QuerySort | undefined | null {
  const mapped = SORT_MAP[sort.toLowerCase()];
  if (mapped === undefined) return null;
  return mapped === 'title' ? undefined : mapped;
}

/** Parse a hyphenated UUID into the store's id form (lowercase) */
export function parseTodoId(raw: string): AppResult<TodoId> {
  const trimmed = raw.trim();
  return UUID_RE.test(trimmed)
    ? success(trimmed.toLowerCase())
    : failure(AppError.invalidUuid(raw));
}

/**
 * Parse every word with `parse`, reporting the first unknown one.
 * Returns null after printing the error.
 */
export function parseAll<T>(
  words: readonly string[],
  parse: (word: string) => T | null,
  describe: string,
): T[] | null {
  const parsed: T[] = [];
  for (const word of words) {
    const value = parse(word);
    if (value === null) {
      out.error(`Unknown ${describe}: '${word}'`);
      return null;
    }
    parsed.push(value);
  }
  return parsed;
}

/**
 * Run a command action, reporting anything it throws instead of letting it
 * take down the session.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof Error) {
      out.error(err.message);
    } else {
      out.error(String(err));
    }
  }
}
