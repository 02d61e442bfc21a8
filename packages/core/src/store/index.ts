export { TodoStore } from './todo-store.js';
export type { StoreOptions } from './todo-store.js';
export { BoundedMaxHeap } from './bounded-heap.js';
export { generateId, unixNow } from './todo-helpers.js';
