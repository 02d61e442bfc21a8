export { matchesFilter, matchKeyword, matchPriority, matchStatus, matchDeadline } from './query.js';
export type { TodoFilter, Query } from './query.js';
export { sortKeyFor, compareSortKeys, compareTodosBy } from './sort-key.js';
export type { SortKey } from './sort-key.js';
