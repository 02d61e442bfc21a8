import { describe, it, expect, beforeEach } from 'vitest';
import chalk from 'chalk';
import { Priority, TodoStatus } from '@memtodo/core';
import type { Todo } from '@memtodo/core';
import { formatError, formatTodo, formatUnixHour, formatDeadline } from '../src/output.js';

beforeEach(() => {
  chalk.level = 0;
});

describe('formatUnixHour', () => {
  it('renders the entry format', () => {
    expect(formatUnixHour(1641027600)).toBe('2022-01-01 09');
    expect(formatUnixHour(0)).toBe('1970-01-01 00');
  });
});

describe('formatDeadline', () => {
  it('is empty without a deadline', () => {
    expect(formatDeadline(null)).toBe('');
  });

  it('shows a due label', () => {
    expect(formatDeadline(1641027600)).toBe('  Due: 2022-01-01 09');
  });
});

describe('formatTodo', () => {
  const todo: Todo = {
    id: '00000000-0000-4000-8000-000000000001',
    title: 'Buy milk',
    priority: Priority.High,
    status: TodoStatus.InProgress,
    createdAt: 0,
    updatedAt: 0,
    deadline: 1641027600,
  };

  it('renders id, priority, status, title and deadline', () => {
    expect(formatTodo(todo)).toBe('(00000000-0000-4000-8000-000000000001) >>> [-] Buy milk  Due: 2022-01-01 09');
  });

  it('renders low priority, done and no deadline', () => {
    expect(formatTodo({ ...todo, priority: Priority.Low, status: TodoStatus.Done, deadline: null }))
      .toBe('(00000000-0000-4000-8000-000000000001) >   [x] Buy milk');
  });
});

describe('formatError', () => {
  it('labels each error kind', () => {
    expect(formatError({ kind: 'collection-is-empty' }))
      .toBe('[CollectionIsEmpty] At least one target must be given.');
    expect(formatError({ kind: 'data-conversion-u32-to-usize' }))
      .toBe('[DataConversionU32ToUsize] Error converting the result limit to an index.');
    expect(formatError({ kind: 'data-conversion-usize-to-u64', value: -1 }))
      .toBe('[DataConversionUsizeToU64] Error converting -1 to unsigned-64.');
    expect(formatError({ kind: 'date-time-parse-error', input: 'abc', expectedFormat: 'YYYY-MM-DD HH' }))
      .toBe("[DateTimeParseError] 'abc' is NOT in the required format of 'YYYY-MM-DD HH'.");
    expect(formatError({ kind: 'empty-todo-title' }))
      .toBe('[EmptyTodoTitle] Title cannot be empty.');
    expect(formatError({ kind: 'invalid-uuid', input: 'nope' }))
      .toBe("[InvalidUuid] 'nope' is not a valid UUID.");
    expect(formatError({ kind: 'too-long-todo-title', input: 'x', expectedLen: 20 }))
      .toBe("[TooLongTodoTitle] The provided title 'x' exceeds max 20 characters.");
    expect(formatError({ kind: 'todo-not-found', id: 'abc' }))
      .toBe("[TodoNotFound] Item with ID 'abc' not found.");
    expect(formatError({ kind: 'update-has-no-changes' }))
      .toBe('[UpdateHasNoChanges] At least one change must be present.');
  });
});
