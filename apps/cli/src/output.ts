/**
 * chalk-based output formatting for todos, counts and errors.
 */

import chalk from 'chalk';
import { TodoStatus, Priority, toUnsigned64 } from '@memtodo/core';
import type { AppError, AppErrorKind, Todo, UnixTime } from '@memtodo/core';

// --- Formatting functions ---

export function formatCheckbox(status: TodoStatus): string {
  switch (status) {
    case TodoStatus.Done: return chalk.green('[x]');
    case TodoStatus.InProgress: return chalk.yellow('[-]');
    case TodoStatus.Backlog: return chalk.gray('[ ]');
  }
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case Priority.High: return chalk.red.bold('>>>');
    case Priority.Medium: return chalk.yellow('>> ');
    case Priority.Low: return chalk.blue('>  ');
  }
}

/** Render unix seconds in the same `YYYY-MM-DD HH` form deadlines are entered in */
export function formatUnixHour(unixTime: UnixTime): string {
  const d = new Date(unixTime * 1000);
  const y = String(d.getUTCFullYear()).padStart(4, '0');
  const m = String(d.getUTCMonth() + 1).padStart(2, '0');
  const day = String(d.getUTCDate()).padStart(2, '0');
  const h = String(d.getUTCHours()).padStart(2, '0');
  return `${y}-${m}-${day} ${h}`;
}

export function formatDeadline(deadline: UnixTime | null): string {
  if (deadline === null) return '';
  return chalk.dim(`  Due: ${formatUnixHour(deadline)}`);
}

/** One-line summary: (id) priority checkbox title  Due: ... */
export function formatTodo(todo: Todo): string {
  const id = chalk.dim(`(${todo.id})`);
  return `${id} ${formatPriority(todo.priority)} ${formatCheckbox(todo.status)} ${chalk.bold(todo.title)}${formatDeadline(todo.deadline)}`;
}

const ERROR_LABEL: Record<AppErrorKind, string> = {
  'collection-is-empty': 'CollectionIsEmpty',
  'data-conversion-u32-to-usize': 'DataConversionU32ToUsize',
  'data-conversion-usize-to-u64': 'DataConversionUsizeToU64',
  'date-time-parse-error': 'DateTimeParseError',
  'empty-todo-title': 'EmptyTodoTitle',
  'invalid-uuid': 'InvalidUuid',
  'too-long-todo-title': 'TooLongTodoTitle',
  'todo-not-found': 'TodoNotFound',
  'update-has-no-changes': 'UpdateHasNoChanges',
};

function describeError(err: AppError): string {
  switch (err.kind) {
    case 'collection-is-empty': return 'At least one target must be given.';
    case 'data-conversion-u32-to-usize': return 'Error converting the result limit to an index.';
    case 'data-conversion-usize-to-u64': return `Error converting ${err.value} to unsigned-64.`;
    case 'date-time-parse-error': return `'${err.input}' is NOT in the required format of '${err.expectedFormat}'.`;
    case 'empty-todo-title': return 'Title cannot be empty.';
    case 'invalid-uuid': return `'${err.input}' is not a valid UUID.`;
    case 'too-long-todo-title': return `The provided title '${err.input}' exceeds max ${err.expectedLen} characters.`;
    case 'todo-not-found': return `Item with ID '${err.id}' not found.`;
    case 'update-has-no-changes': return 'At least one change must be present.';
  }
}

/** `[Kind] message` */
export function formatError(err: AppError): string {
  return `[${ERROR_LABEL[err.kind]}] ${describeError(err)}`;
}

// --- Result output ---

export function printError(err: AppError): void {
  error(formatError(err));
}

export function printTodos(todos: readonly Todo[], emptyMessage = 'No todos found'): void {
  if (todos.length === 0) {
    info(emptyMessage);
    return;
  }
  for (const todo of todos) info(formatTodo(todo));
}

/**
 * Print a count after checking it fits the unsigned 64-bit wire width.
 * `render` builds the message from the checked count.
 */
export function printCount(count: number, render: (n: number) => string): void {
  const checked = toUnsigned64(count);
  if (checked.type === 'error') {
    printError(checked.error);
    return;
  }
  success(render(checked.data));
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function info(message: string): void {
  console.log(message);
}
