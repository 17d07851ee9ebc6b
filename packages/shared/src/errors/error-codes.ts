/**
 * Error codes for every failure the ingestion pipeline can raise.
 * Values are stable strings so they can cross process boundaries.
 */
export enum ErrorCode {
  // Input shape
  EMPTY_INPUT = "EMPTY_INPUT",
  INVALID_RANK = "INVALID_RANK",
  INVALID_INPUT_TYPE = "INVALID_INPUT_TYPE",

  // Schema resolution
  AXIS_LENGTH_MISMATCH = "AXIS_LENGTH_MISMATCH",
  TYPE_MERGE_FAILED = "TYPE_MERGE_FAILED",
  UNRESOLVED_TYPE = "UNRESOLVED_TYPE",
  INVALID_SCHEMA_DDL = "INVALID_SCHEMA_DDL",

  // Encoding
  UNSUPPORTED_TYPE_FOR_ENCODING = "UNSUPPORTED_TYPE_FOR_ENCODING",
  INVALID_FIELD_VALUE = "INVALID_FIELD_VALUE",
  UNSAFE_VALUE_CAST = "UNSAFE_VALUE_CAST",

  // Infrastructure
  CONFIG_ERROR = "CONFIG_ERROR",
  UNKNOWN = "UNKNOWN",
}
