import { AppError } from '../types/app-error.js';
import type { AppResult } from '../types/results.js';
import { success, failure } from '../types/results.js';

/** Guard a collection count before handing it across the boundary as an unsigned 64-bit value */
export function toUnsigned64(n: number): AppResult<number> {
  return Number.isSafeInteger(n) && n >= 0
    ? success(n)
    : failure(AppError.dataConversionUsizeToU64(n));
}
