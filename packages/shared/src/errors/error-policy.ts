import { AppError } from "./app-error";
import { ErrorCode } from "./error-codes";

/**
 * Terminal errors should NOT be retried - they will fail again.
 * Ingestion is a pure in-memory transform, so every domain failure is terminal.
 */
const TERMINAL_CODES = new Set<ErrorCode>([
  ErrorCode.EMPTY_INPUT,
  ErrorCode.INVALID_RANK,
  ErrorCode.INVALID_INPUT_TYPE,
  ErrorCode.AXIS_LENGTH_MISMATCH,
  ErrorCode.TYPE_MERGE_FAILED,
  ErrorCode.UNRESOLVED_TYPE,
  ErrorCode.INVALID_SCHEMA_DDL,
  ErrorCode.UNSUPPORTED_TYPE_FOR_ENCODING,
  ErrorCode.INVALID_FIELD_VALUE,
  ErrorCode.UNSAFE_VALUE_CAST,
  ErrorCode.CONFIG_ERROR,
]);

/**
 * Determines if an error is terminal (should NOT be retried).
 *
 * - Unknown errors (non-AppError) → not terminal
 * - AppError with terminal code → terminal
 */
export function isTerminal(error: unknown): boolean {
  if (!(error instanceof AppError)) {
    return false;
  }
  return TERMINAL_CODES.has(error.code);
}

/**
 * Maps error code to a human-readable title.
 */
export function getErrorTitle(code: ErrorCode): string {
  const titles: Record<ErrorCode, string> = {
    [ErrorCode.EMPTY_INPUT]: "Empty Input",
    [ErrorCode.INVALID_RANK]: "Invalid Array Rank",
    [ErrorCode.INVALID_INPUT_TYPE]: "Invalid Input Type",
    [ErrorCode.AXIS_LENGTH_MISMATCH]: "Axis Length Mismatch",
    [ErrorCode.TYPE_MERGE_FAILED]: "Type Merge Failed",
    [ErrorCode.UNRESOLVED_TYPE]: "Unresolved Type",
    [ErrorCode.INVALID_SCHEMA_DDL]: "Invalid Schema String",
    [ErrorCode.UNSUPPORTED_TYPE_FOR_ENCODING]: "Unsupported Type For Encoding",
    [ErrorCode.INVALID_FIELD_VALUE]: "Invalid Field Value",
    [ErrorCode.UNSAFE_VALUE_CAST]: "Unsafe Value Cast",
    [ErrorCode.CONFIG_ERROR]: "Configuration Error",
    [ErrorCode.UNKNOWN]: "Internal Error",
  };
  return titles[code];
}
