import type { TodoId } from './todo.js';

/** Every failure the core reports. Errors are values, never thrown for control flow. */
export type AppError =
  | { readonly kind: 'collection-is-empty' }
  | { readonly kind: 'data-conversion-u32-to-usize' }
  | { readonly kind: 'data-conversion-usize-to-u64'; readonly value: number }
  | { readonly kind: 'date-time-parse-error'; readonly input: string; readonly expectedFormat: string }
  | { readonly kind: 'empty-todo-title' }
  | { readonly kind: 'invalid-uuid'; readonly input: string }
  | { readonly kind: 'too-long-todo-title'; readonly input: string; readonly expectedLen: number }
  | { readonly kind: 'todo-not-found'; readonly id: TodoId }
  | { readonly kind: 'update-has-no-changes' };

export type AppErrorKind = AppError['kind'];

export const AppError = {
  collectionIsEmpty: (): AppError => ({ kind: 'collection-is-empty' }),
  dataConversionU32ToUsize: (): AppError => ({ kind: 'data-conversion-u32-to-usize' }),
  dataConversionUsizeToU64: (value: number): AppError => ({ kind: 'data-conversion-usize-to-u64', value }),
  dateTimeParse: (input: string, expectedFormat: string): AppError => (
    { kind: 'date-time-parse-error', input, expectedFormat }
  ),
  emptyTodoTitle: (): AppError => ({ kind: 'empty-todo-title' }),
  invalidUuid: (input: string): AppError => ({ kind: 'invalid-uuid', input }),
  tooLongTodoTitle: (input: string, expectedLen: number): AppError => (
    { kind: 'too-long-todo-title', input, expectedLen }
  ),
  todoNotFound: (id: TodoId): AppError => ({ kind: 'todo-not-found', id }),
  updateHasNoChanges: (): AppError => ({ kind: 'update-has-no-changes' }),
};
