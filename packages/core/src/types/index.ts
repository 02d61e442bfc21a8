export { TodoStatus, STATUS_SORT_ORDER } from './status.js';
export { Priority, PRIORITY_SORT_ORDER } from './priority.js';
export { QuerySort } from './query-sort.js';
export type { TodoId, UnixTime, Todo, NewTodo, UpdateTodo } from './todo.js';
export { AppError } from './app-error.js';
export type { AppErrorKind } from './app-error.js';
export type { AppResult } from './results.js';
export { success, failure } from './results.js';
