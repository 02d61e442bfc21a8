import type { AppResult, AppError } from '../src/types/index.js';

/** Unwrap a success or fail the test with the error it carried */
export function unwrap<T>(result: AppResult<T>): T {
  if (result.type === 'error') {
    throw new Error(`expected success, got ${JSON.stringify(result.error)}`);
  }
  return result.data;
}

/** Unwrap an error or fail the test */
export function unwrapError<T>(result: AppResult<T>): AppError {
  if (result.type === 'success') {
    throw new Error(`expected an error, got ${JSON.stringify(result.data)}`);
  }
  return result.error;
}
