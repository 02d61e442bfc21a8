import { AppError } from '../types/app-error.js';
import type { AppResult } from '../types/results.js';
import { success, failure } from '../types/results.js';

/** Longest title the store accepts, counted in UTF-8 bytes */
export const MAX_TITLE_LEN = 20;

/** A todo title as supplied by the caller. Surrounding whitespace is dropped on construction. */
export class Title {
  readonly value: string;

  constructor(raw: string) {
    this.value = raw.trim();
  }

  validate(maxLength: number = MAX_TITLE_LEN): AppResult<string> {
    const length = Buffer.byteLength(this.value, 'utf8');
    if (length < 1) return failure(AppError.emptyTodoTitle());
    if (length > maxLength) return failure(AppError.tooLongTodoTitle(this.value, maxLength));
    return success(this.value);
  }
}
