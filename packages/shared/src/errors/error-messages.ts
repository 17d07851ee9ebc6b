import { ErrorCode } from "./error-codes";

/**
 * Caller-facing error messages for each error code.
 *
 * Messages are generic and remediation-focused. Values that identify the
 * offending input (lengths, types, field names) travel in
 * `AppError.extensions`, never in the message text.
 */
export const ErrorMessages: Record<ErrorCode, string> = {
  // Input shape
  [ErrorCode.EMPTY_INPUT]:
    "Cannot infer a schema from empty data. Please provide a schema.",
  [ErrorCode.INVALID_RANK]: "Array input must have 1 or 2 dimensions.",
  [ErrorCode.INVALID_INPUT_TYPE]:
    "Input must be a tabular frame, a 1-D or 2-D array, or an iterable of records.",

  // Schema resolution
  [ErrorCode.AXIS_LENGTH_MISMATCH]:
    "Number of declared columns does not match the number of columns in the data.",
  [ErrorCode.TYPE_MERGE_FAILED]:
    "Records contain incompatible types for the same field.",
  [ErrorCode.UNRESOLVED_TYPE]:
    "Some of types cannot be determined after inferring. Please provide a full schema.",
  [ErrorCode.INVALID_SCHEMA_DDL]: "Schema string could not be parsed.",

  // Encoding
  [ErrorCode.UNSUPPORTED_TYPE_FOR_ENCODING]:
    "Schema type has no columnar encoding.",
  [ErrorCode.INVALID_FIELD_VALUE]:
    "A value does not match the type declared for its field.",
  [ErrorCode.UNSAFE_VALUE_CAST]:
    "A value cannot be cast to its column type without losing data.",

  // Infrastructure
  [ErrorCode.CONFIG_ERROR]: "Ingestion configuration is invalid.",
  [ErrorCode.UNKNOWN]: "An unexpected error occurred.",
};
