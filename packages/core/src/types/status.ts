export const TodoStatus = {
  Backlog: 0,
  InProgress: 1,
  Done: 2,
} as const;

export type TodoStatus = (typeof TodoStatus)[keyof typeof TodoStatus];

/** Order used when sorting by status: InProgress, then Backlog, then Done */
export const STATUS_SORT_ORDER: readonly TodoStatus[] = [
  TodoStatus.InProgress,
  TodoStatus.Backlog,
  TodoStatus.Done,
];
