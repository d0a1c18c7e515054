/**
 * Port: read-only configuration lookup by dotted path ("retry.maxAttempts").
 */

import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

export interface ConfigProvider {
  get(path: string): Result<unknown, AppError>;
}
