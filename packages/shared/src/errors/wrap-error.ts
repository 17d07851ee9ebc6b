import { AppError } from "./app-error";
import { ErrorCode } from "./error-codes";

/**
 * Converts unknown errors to AppError so callers of the pipeline only ever
 * see one error type. The original error is kept as `cause`.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const statusMessage = error instanceof Error ? error.message : String(error);
  return new AppError(ErrorCode.UNKNOWN, error, { statusMessage });
}
