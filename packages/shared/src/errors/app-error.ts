import { ErrorCode } from "./error-codes";
import { ErrorMessages } from "./error-messages";

/**
 * Debugging context for error tracing. Logged, never part of the message.
 */
export interface ErrorContext {
  operation?: string;
  inputShape?: string;
  statusMessage?: string;
}

/**
 * Structured details for callers that need to react to a specific failure.
 * Values are derived from caller input only.
 */
export interface AppErrorExtensions {
  /** Column count the caller declared (AXIS_LENGTH_MISMATCH) */
  expectedLength?: number;
  /** Column count the data produced (AXIS_LENGTH_MISMATCH) */
  actualLength?: number;
  /** Rank of a rejected array input (INVALID_RANK) */
  dimensions?: number;
  /** Types that failed to merge, as type strings (TYPE_MERGE_FAILED) */
  leftType?: string;
  rightType?: string;
  /** Field that caused the error */
  field?: string;
  /** Offending type or runtime value description */
  dataType?: string;
  /** Character offset of a DDL parse failure */
  position?: number;
  /** Validation violations (CONFIG_ERROR) */
  violations?: string[];
}

/**
 * Centralized error class for ingestion failures.
 *
 * Message is derived from the error code so every caller sees the same text;
 * specifics are carried in `extensions`.
 *
 * @param code - Error code from ErrorCode enum
 * @param cause - Original error for error chaining
 * @param context - Debugging context (logged, never part of the message)
 * @param extensions - Structured details about the failure
 */
export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    readonly cause?: unknown,
    readonly context?: ErrorContext,
    readonly extensions?: AppErrorExtensions,
  ) {
    super(ErrorMessages[code]);
    this.name = "AppError";
  }
}
