/**
 * Keyed in-memory store of todos: CRUD, filtered counting and bounded top-N search.
 *
 * Every operation is synchronous and runs to completion. The store does no locking;
 * whoever shares an instance must serialize access to it.
 */

import type { Todo, TodoId, NewTodo, UpdateTodo, UnixTime } from '../types/todo.js';
import type { Priority } from '../types/priority.js';
import type { TodoStatus } from '../types/status.js';
import { AppError } from '../types/app-error.js';
import type { AppResult } from '../types/results.js';
import { success, failure } from '../types/results.js';
import { Title, MAX_TITLE_LEN } from '../values/title.js';
import { DeadlineInput } from '../values/deadline.js';
import { ResultLimit } from '../values/result-limit.js';
import type { Query, TodoFilter } from '../query/query.js';
import { matchesFilter } from '../query/query.js';
import { compareTodosBy } from '../query/sort-key.js';
import { BoundedMaxHeap } from './bounded-heap.js';
import { generateId, unixNow, createTodo, cloneTodo } from './todo-helpers.js';

export interface StoreOptions {
  /** Clock in unix seconds. Defaults to the system clock. */
  now?: () => UnixTime;
  generateId?: () => TodoId;
  /** Defaults to MAX_TITLE_LEN */
  maxTitleLength?: number;
}

export class TodoStore {
  private readonly todos = new Map<TodoId, Todo>();
  private readonly now: () => UnixTime;
  private readonly nextId: () => TodoId;
  private readonly maxTitleLength: number;

  constructor(options: StoreOptions = {}) {
    this.now = options.now ?? unixNow;
    this.nextId = options.generateId ?? generateId;
    this.maxTitleLength = options.maxTitleLength ?? MAX_TITLE_LEN;
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  /** Validate and insert a new Backlog todo. Deadline errors win over title errors. */
  add(item: NewTodo): AppResult<Todo> {
    const deadline = new DeadlineInput(item.deadline).resolve();
    if (deadline.type === 'error') return deadline;

    const title = new Title(item.title).validate(this.maxTitleLength);
    if (title.type === 'error') return title;

    let id = this.nextId();
    while (this.todos.has(id)) id = this.nextId();

    const todo = createTodo(id, title.data, item.priority, deadline.data, this.now());
    this.todos.set(id, todo);
    return success(cloneTodo(todo));
  }

  /**
   * Apply the fields of `change` that differ from the stored todo.
   *
   * The deadline is resolved before the lookup, and is always compared: leaving it
   * out resolves to "no deadline" and clears a stored one. `updatedAt` moves only
   * when some value actually changed.
   */
  update(id: TodoId, change: UpdateTodo): AppResult<Todo> {
    const deadlineInput = new DeadlineInput(change.deadline);
    const changeIsPresent = change.title !== undefined
      || change.priority !== undefined
      || change.status !== undefined
      || deadlineInput.isPresent();
    if (!changeIsPresent) return failure(AppError.updateHasNoChanges());

    const deadline = deadlineInput.resolve();
    if (deadline.type === 'error') return deadline;

    const current = this.todos.get(id);
    if (!current) return failure(AppError.todoNotFound(id));

    let next: Todo = current;
    let modified = false;

    if (change.title !== undefined) {
      const title = new Title(change.title).validate(this.maxTitleLength);
      if (title.type === 'error') return title;
      if (title.data !== next.title) {
        next = { ...next, title: title.data };
        modified = true;
      }
    }

    if (change.priority !== undefined && change.priority !== next.priority) {
      next = { ...next, priority: change.priority };
      modified = true;
    }

    if (change.status !== undefined && change.status !== next.status) {
      next = { ...next, status: change.status };
      modified = true;
    }

    if (deadline.data !== next.deadline) {
      next = { ...next, deadline: deadline.data };
      modified = true;
    }

    if (modified) {
      // Never let a clock that went backwards pull updatedAt down
      next = { ...next, updatedAt: Math.max(next.updatedAt, this.now()) };
      this.todos.set(id, next);
    }
    return success(cloneTodo(next));
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  private *filterBy(filter: TodoFilter, bound: UnixTime | null): Generator<Todo> {
    const matches = matchesFilter(filter, bound);
    for (const todo of this.todos.values()) {
      if (matches(todo)) yield todo;
    }
  }

  /**
   * Matching todos in the requested order, at most `limit` of them.
   * Keeps only the best `limit` candidates while scanning and sorts those at the end.
   */
  search(query: Query): AppResult<Todo[]> {
    const bound = new DeadlineInput(query.deadline).resolve();
    if (bound.type === 'error') return bound;

    const limit = new ResultLimit(query.limit).resolve();
    if (limit.type === 'error') return limit;

    const heap = new BoundedMaxHeap<Todo>(limit.data, compareTodosBy(query.sort));
    for (const todo of this.filterBy(query, bound.data)) {
      heap.offer(todo);
    }
    return success(heap.toSortedArray().map(cloneTodo));
  }

  /** Number of todos matching the filter; sort and limit don't apply */
  countBy(filter: TodoFilter): AppResult<number> {
    const bound = new DeadlineInput(filter.deadline).resolve();
    if (bound.type === 'error') return bound;

    const matches = matchesFilter(filter, bound.data);
    let count = 0;
    for (const todo of this.todos.values()) {
      if (matches(todo)) count++;
    }
    return success(count);
  }

  countAll(): number {
    return this.todos.size;
  }

  get(id: TodoId): AppResult<Todo> {
    const todo = this.todos.get(id);
    return todo ? success(cloneTodo(todo)) : failure(AppError.todoNotFound(id));
  }

  // ---------------------------------------------------------------------------
  // Deletes
  // ---------------------------------------------------------------------------

  delete(id: TodoId): AppResult<void> {
    return this.todos.delete(id)
      ? success(undefined)
      : failure(AppError.todoNotFound(id));
  }

  /** Single pass removing every todo the predicate selects */
  private removeWhere(shouldDelete: (todo: Todo) => boolean): number {
    let count = 0;
    for (const [id, todo] of this.todos) {
      if (shouldDelete(todo)) {
        this.todos.delete(id);
        count++;
      }
    }
    return count;
  }

  /** Remove every todo whose `pick`ed attribute is in `targets` */
  private deleteBy<T>(targets: Iterable<T>, pick: (todo: Todo) => T): AppResult<number> {
    const set = new Set(targets);
    if (set.size === 0) return failure(AppError.collectionIsEmpty());
    return success(this.removeWhere((todo) => set.has(pick(todo))));
  }

  deleteByIds(ids: Iterable<TodoId>): AppResult<number> {
    return this.deleteBy(ids, (t) => t.id);
  }

  deleteByPriorities(priorities: Iterable<Priority>): AppResult<number> {
    return this.deleteBy(priorities, (t) => t.priority);
  }

  deleteByStatuses(statuses: Iterable<TodoStatus>): AppResult<number> {
    return this.deleteBy(statuses, (t) => t.status);
  }

  /** Remove every todo with the given status. A single target is never empty. */
  deleteByStatus(status: TodoStatus): number {
    return this.removeWhere((todo) => todo.status === status);
  }

  /** Remove everything; returns how many todos there were */
  deleteAll(): number {
    const count = this.todos.size;
    this.todos.clear();
    return count;
  }
}
