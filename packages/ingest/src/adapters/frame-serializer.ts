import { AppError, ErrorCode, type SerializerConfig } from "@colframe/shared";

import { buildColumnarTable, type ColumnarTable, type EncodedColumn } from "../columnar";
import { simpleString } from "../type-model";
import type { DataType, IntegerType } from "../types";
import { convertValue } from "../value-converter";

export interface SerializedColumn {
  name: string;
  type: DataType;
  values: readonly unknown[];
}

function unsafeCast(type: DataType, path: string, value: unknown): AppError {
  return new AppError(
    ErrorCode.UNSAFE_VALUE_CAST,
    undefined,
    { operation: "serializeFrame", statusMessage: String(value) },
    { field: path, dataType: simpleString(type) },
  );
}

function fitsInteger(value: number | bigint, bits: IntegerType["bits"]): boolean {
  if (typeof value === "number" && !Number.isInteger(value)) {
    return false;
  }
  const n = BigInt(value);
  return BigInt.asIntN(bits, n) === n;
}

/**
 * Truncates toward zero and wraps to `bits`.
 */
function wrapInteger(value: number | bigint, bits: IntegerType["bits"]): number | bigint {
  const wrapped = BigInt.asIntN(bits, typeof value === "number" ? BigInt(Math.trunc(value)) : value);
  return bits === 64 ? wrapped : Number(wrapped);
}

function castCell(
  value: unknown,
  type: DataType,
  path: string,
  safeCast: boolean,
): unknown {
  // NaN marks a missing cell in frame storage.
  if (typeof value === "number" && Number.isNaN(value)) {
    return null;
  }
  if (type.kind !== "integer" || (typeof value !== "number" && typeof value !== "bigint")) {
    return convertValue(value, type, path);
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    if (safeCast) {
      throw unsafeCast(type, path, value);
    }
    return null;
  }
  if (fitsInteger(value, type.bits)) {
    return convertValue(value, type, path);
  }
  if (safeCast) {
    throw unsafeCast(type, path, value);
  }
  return wrapInteger(value, type.bits);
}

/**
 * Writes frame columns into a table, casting each cell to its column type.
 * With `safeCast` a lossy integer cast fails; without it the value is
 * truncated and wrapped. Zoned timestamps are tagged with the session time
 * zone.
 *
 * @throws AppError UNSAFE_VALUE_CAST
 */
export function serializeFrame(
  columns: readonly SerializedColumn[],
  rowCount: number,
  config: SerializerConfig,
): ColumnarTable {
  const encoded: EncodedColumn[] = columns.map((column) => ({
    name: column.name,
    type: column.type,
    nullable: true,
    values: column.values.map((value) =>
      castCell(value, column.type, column.name, config.safeCast),
    ),
  }));
  return buildColumnarTable(encoded, rowCount, config.timezone);
}
