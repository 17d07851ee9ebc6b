import { AppError } from "@colframe/shared";

/**
 * Narrows away `null` and `undefined`, failing the test otherwise.
 */
export function assertDefined<T>(
  value: T,
  message = "expected value to be defined",
): asserts value is NonNullable<T> {
  if (value === null || value === undefined) {
    throw new Error(message);
  }
}

/**
 * Runs `fn` and returns the AppError it throws. Fails when `fn` returns
 * normally or throws anything else.
 */
export function captureAppError(fn: () => unknown): AppError {
  try {
    fn();
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }
    throw new Error(`expected an AppError, got ${String(error)}`, { cause: error });
  }
  throw new Error("expected an AppError, but nothing was thrown");
}
