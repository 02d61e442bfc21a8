import type { Todo, UnixTime } from '../types/todo.js';
import type { Priority } from '../types/priority.js';
import type { TodoStatus } from '../types/status.js';
import type { QuerySort } from '../types/query-sort.js';

/** Criteria shared by search and count. Unset fields match everything. */
export interface TodoFilter {
  /** Case-sensitive substring of the title */
  readonly keyword?: string;
  readonly priority?: Priority;
  readonly status?: TodoStatus;
  /** Upper bound in `YYYY-MM-DD HH`; todos without a deadline always pass */
  readonly deadline?: string;
}

export interface Query extends TodoFilter {
  /** Omit to order by title */
  readonly sort?: QuerySort;
  readonly limit?: number;
}

export function matchKeyword(filter: TodoFilter, todo: Todo): boolean {
  return filter.keyword === undefined || todo.title.includes(filter.keyword);
}

export function matchPriority(filter: TodoFilter, todo: Todo): boolean {
  return filter.priority === undefined || todo.priority === filter.priority;
}

export function matchStatus(filter: TodoFilter, todo: Todo): boolean {
  return filter.status === undefined || todo.status === filter.status;
}

export function matchDeadline(bound: UnixTime | null, todo: Todo): boolean {
  if (bound === null || todo.deadline === null) return true;
  return todo.deadline <= bound;
}

/**
 * Build the combined predicate for a filter. `bound` is the filter's deadline,
 * already resolved by the caller.
 */
export function matchesFilter(filter: TodoFilter, bound: UnixTime | null): (todo: Todo) => boolean {
  return (todo) =>
    matchKeyword(filter, todo) &&
    matchPriority(filter, todo) &&
    matchStatus(filter, todo) &&
    matchDeadline(bound, todo);
}
