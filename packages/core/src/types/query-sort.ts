/** Sort dimensions a query can request. No dimension means "by title". */
export const QuerySort = {
  Deadline: 'deadline',
  Priority: 'priority',
  Status: 'status',
} as const;

export type QuerySort = (typeof QuerySort)[keyof typeof QuerySort];
