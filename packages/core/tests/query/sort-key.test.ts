import { describe, it, expect } from 'vitest';
import { sortKeyFor, compareSortKeys, compareTodosBy } from '../../src/query/sort-key.js';
import type { Todo } from '../../src/types/todo.js';
import { Priority } from '../../src/types/priority.js';
import { TodoStatus, STATUS_SORT_ORDER } from '../../src/types/status.js';
import { QuerySort } from '../../src/types/query-sort.js';

function makeTodo(id: string, overrides: Partial<Todo> = {}): Todo {
  return {
    id,
    title: 'todo',
    priority: Priority.Medium,
    status: TodoStatus.Backlog,
    createdAt: 0,
    updatedAt: 0,
    deadline: null,
    ...overrides,
  };
}

function idsSortedBy(sort: QuerySort | undefined, todos: Todo[]): string[] {
  return [...todos].sort(compareTodosBy(sort)).map(t => t.id);
}

describe('sortKeyFor', () => {
  it('ranks priority High, Medium, Low', () => {
    const todos = [
      makeTodo('low', { priority: Priority.Low }),
      makeTodo('high', { priority: Priority.High }),
      makeTodo('medium', { priority: Priority.Medium }),
    ];
    expect(idsSortedBy(QuerySort.Priority, todos)).toEqual(['high', 'medium', 'low']);
  });

  it('ranks status InProgress, Backlog, Done', () => {
    const todos = [
      makeTodo('done', { status: TodoStatus.Done }),
      makeTodo('backlog', { status: TodoStatus.Backlog }),
      makeTodo('wip', { status: TodoStatus.InProgress }),
    ];
    expect(idsSortedBy(QuerySort.Status, todos)).toEqual(['wip', 'backlog', 'done']);
    expect(STATUS_SORT_ORDER).toEqual([TodoStatus.InProgress, TodoStatus.Backlog, TodoStatus.Done]);
  });

  it('orders deadlines ascending with undated todos last', () => {
    const todos = [
      makeTodo('none', { deadline: null }),
      makeTodo('late', { deadline: 7200 }),
      makeTodo('epoch', { deadline: 0 }),
      makeTodo('early', { deadline: 3600 }),
    ];
    expect(idsSortedBy(QuerySort.Deadline, todos)).toEqual(['epoch', 'early', 'late', 'none']);
  });

  it('orders by title when no dimension is requested', () => {
    const todos = [
      makeTodo('1', { title: 'pay rent' }),
      makeTodo('2', { title: 'Call mom' }),
      makeTodo('3', { title: 'buy milk' }),
    ];
    // Code point order puts uppercase first
    expect(idsSortedBy(undefined, todos)).toEqual(['2', '3', '1']);
  });

  it('orders titles by code point', () => {
    const todos = [
      makeTodo('astral', { title: '\u{1F600} party' }),
      makeTodo('fullwidth', { title: '\uFF01 party' }),
      makeTodo('prefix', { title: '\uFF01' }),
    ];
    expect(idsSortedBy(undefined, todos)).toEqual(['prefix', 'fullwidth', 'astral']);
  });

  it('breaks ties on id', () => {
    const todos = [
      makeTodo('c', { priority: Priority.High }),
      makeTodo('a', { priority: Priority.High }),
      makeTodo('b', { priority: Priority.High }),
    ];
    expect(idsSortedBy(QuerySort.Priority, todos)).toEqual(['a', 'b', 'c']);
  });

  it('builds keys from the chosen dimension', () => {
    const todo = makeTodo('x', { title: 'walk', priority: Priority.Low, deadline: 60 });
    expect(sortKeyFor(QuerySort.Priority)(todo)).toEqual({ rank: 2, text: '', id: 'x' });
    expect(sortKeyFor(QuerySort.Status)(todo)).toEqual({ rank: 1, text: '', id: 'x' });
    expect(sortKeyFor(QuerySort.Deadline)(todo)).toEqual({ rank: 60, text: '', id: 'x' });
    expect(sortKeyFor(undefined)(todo)).toEqual({ rank: 0, text: 'walk', id: 'x' });
  });
});

describe('compareSortKeys', () => {
  it('compares rank, then text, then id', () => {
    expect(compareSortKeys({ rank: 0, text: 'z', id: 'z' }, { rank: 1, text: 'a', id: 'a' })).toBe(-1);
    expect(compareSortKeys({ rank: 1, text: 'a', id: 'z' }, { rank: 1, text: 'b', id: 'a' })).toBe(-1);
    expect(compareSortKeys({ rank: 1, text: 'a', id: 'b' }, { rank: 1, text: 'a', id: 'a' })).toBe(1);
    expect(compareSortKeys({ rank: 1, text: 'a', id: 'a' }, { rank: 1, text: 'a', id: 'a' })).toBe(0);
  });

  it('treats two missing deadlines as equal rank', () => {
    const inf = Number.POSITIVE_INFINITY;
    expect(compareSortKeys({ rank: inf, text: '', id: 'a' }, { rank: inf, text: '', id: 'b' })).toBe(-1);
  });
});
