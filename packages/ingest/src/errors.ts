import { AppError, ErrorCode } from "@colframe/shared";

import { describeValue } from "./record-shape";

export function axisLengthMismatch(
  expected: number,
  actual: number,
  operation: string,
): AppError {
  return new AppError(
    ErrorCode.AXIS_LENGTH_MISMATCH,
    undefined,
    { operation },
    { expectedLength: expected, actualLength: actual },
  );
}

export function invalidInputType(value: unknown, operation: string): AppError {
  return new AppError(
    ErrorCode.INVALID_INPUT_TYPE,
    undefined,
    { operation },
    { dataType: describeValue(value) },
  );
}
