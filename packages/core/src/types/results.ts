import type { AppError } from './app-error.js';

/** Two-variant discriminated union returned by every fallible core operation */
export type AppResult<T> =
  | { readonly type: 'success'; readonly data: T }
  | { readonly type: 'error'; readonly error: AppError };

export function success<T>(data: T): AppResult<T> {
  return { type: 'success', data };
}

export function failure<T = never>(error: AppError): AppResult<T> {
  return { type: 'error', error };
}
