import type { Todo, TodoId } from '../types/todo.js';
import { PRIORITY_SORT_ORDER } from '../types/priority.js';
import type { Priority } from '../types/priority.js';
import { STATUS_SORT_ORDER } from '../types/status.js';
import type { TodoStatus } from '../types/status.js';
import { QuerySort } from '../types/query-sort.js';

/**
 * Comparable key for one todo under one sort dimension.
 * Ordered by `rank`, then `text`, then `id`; smaller sorts first.
 */
export interface SortKey {
  readonly rank: number;
  readonly text: string;
  readonly id: TodoId;
}

function priorityRank(priority: Priority): number {
  return PRIORITY_SORT_ORDER.indexOf(priority);
}

function statusRank(status: TodoStatus): number {
  return STATUS_SORT_ORDER.indexOf(status);
}

/** Returns the key function for the requested dimension (title when none) */
export function sortKeyFor(sort: QuerySort | undefined): (todo: Todo) => SortKey {
  switch (sort) {
    case QuerySort.Priority:
      return (t) => ({ rank: priorityRank(t.priority), text: '', id: t.id });
    case QuerySort.Status:
      return (t) => ({ rank: statusRank(t.status), text: '', id: t.id });
    case QuerySort.Deadline:
      // No deadline sorts after every dated todo
      return (t) => ({ rank: t.deadline ?? Number.POSITIVE_INFINITY, text: '', id: t.id });
    case undefined:
      return (t) => ({ rank: 0, text: t.title, id: t.id });
  }
}

/** Code point order; `<` on strings compares UTF-16 units */
function compareText(a: string, b: string): number {
  if (a === b) return 0;
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(i) ?? 0;
    if (ca !== cb) return ca < cb ? -1 : 1;
    if (ca > 0xffff) i++;
  }
  return a.length < b.length ? -1 : 1;
}

export function compareSortKeys(a: SortKey, b: SortKey): number {
  if (a.rank !== b.rank) return a.rank < b.rank ? -1 : 1;
  return compareText(a.text, b.text) || compareText(a.id, b.id);
}

/** Comparator over todos for a sort dimension */
export function compareTodosBy(sort: QuerySort | undefined): (a: Todo, b: Todo) => number {
  const key = sortKeyFor(sort);
  return (a, b) => compareSortKeys(key(a), key(b));
}
