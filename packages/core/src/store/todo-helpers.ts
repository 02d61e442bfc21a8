import { randomUUID } from 'node:crypto';
import type { Todo, TodoId, UnixTime } from '../types/todo.js';
import type { Priority } from '../types/priority.js';
import { TodoStatus } from '../types/status.js';

/** Generate a random v4 UUID */
export function generateId(): TodoId {
  return randomUUID();
}

/** Current time in whole unix seconds */
export function unixNow(): UnixTime {
  return Math.floor(Date.now() / 1000);
}

/** Build a fresh Backlog todo from already validated parts */
export function createTodo(
  id: TodoId,
  title: string,
  priority: Priority,
  deadline: UnixTime | null,
  now: UnixTime,
): Todo {
  return {
    id,
    title,
    priority,
    status: TodoStatus.Backlog,
    createdAt: now,
    updatedAt: now,
    deadline,
  };
}

/** Shallow copy handed to callers so the store's records stay private */
export function cloneTodo(todo: Todo): Todo {
  return { ...todo };
}
