import { AppError } from '../types/app-error.js';
import type { AppResult } from '../types/results.js';
import { success, failure } from '../types/results.js';

export const QUERY_DEFAULT_LIMIT = 10;
export const QUERY_MAX_LIMIT = 100;

const U32_MAX = 0xffff_ffff;

/** Optional cap on the number of search results */
export class ResultLimit {
  constructor(private readonly raw?: number) {}

  resolve(): AppResult<number> {
    if (this.raw === undefined) return success(QUERY_DEFAULT_LIMIT);

    const n = this.raw;
    if (!Number.isInteger(n) || n > U32_MAX) {
      return failure(AppError.dataConversionU32ToUsize());
    }
    if (n > QUERY_MAX_LIMIT) return success(QUERY_MAX_LIMIT);
    if (n < 1) return success(QUERY_DEFAULT_LIMIT);
    return success(n);
  }
}
