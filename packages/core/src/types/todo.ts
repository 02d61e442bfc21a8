import type { TodoStatus } from './status.js';
import type { Priority } from './priority.js';

export type TodoId = string;

/** Seconds since the unix epoch */
export type UnixTime = number;

export interface Todo {
  readonly id: TodoId;
  readonly title: string;
  readonly priority: Priority;
  readonly status: TodoStatus;
  readonly createdAt: UnixTime;
  readonly updatedAt: UnixTime;
  readonly deadline: UnixTime | null;
}

/** Creation input. Title and deadline are raw and validated by the store. */
export interface NewTodo {
  readonly title: string;
  readonly priority: Priority;
  readonly deadline?: string;
}

/**
 * Partial update. `deadline` has three states: `undefined` leaves it out of the
 * change check, `null` clears, a string sets.
 */
export interface UpdateTodo {
  readonly title?: string;
  readonly priority?: Priority;
  readonly status?: TodoStatus;
  readonly deadline?: string | null;
}
