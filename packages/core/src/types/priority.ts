/** Urgency of a todo; lower value is more urgent */
export const Priority = {
  High: 1,
  Medium: 2,
  Low: 3,
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

/** Order used when sorting by priority: most urgent first */
export const PRIORITY_SORT_ORDER: readonly Priority[] = [
  Priority.High,
  Priority.Medium,
  Priority.Low,
];
