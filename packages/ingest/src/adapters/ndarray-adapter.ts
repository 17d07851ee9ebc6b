import { AppError, ErrorCode } from "@colframe/shared";

import { buildColumnarTable } from "../columnar";
import { axisLengthMismatch } from "../errors";
import { positionalNames } from "../schema-inferrer";
import { asSchema } from "../type-model";
import { structField, structType, type StructType } from "../types";
import { convertValue } from "../value-converter";
import type { AdapterResult, DeclaredSchema } from "./adapter-result";
import { elementType, type NDArrayLike } from "./ndarray";

function defaultNames(width: number, rank: number): string[] {
  return rank === 1 || width === 1 ? ["value"] : positionalNames(width);
}

function columnValues(array: NDArrayLike, column: number, width: number): unknown[] {
  const rows = array.shape[0] ?? 0;
  const values: unknown[] = [];
  for (let row = 0; row < rows; row++) {
    values.push(array.data[row * width + column]);
  }
  return values;
}

/**
 * Converts a 1-D or 2-D array into a table. A 1-D array is a single column;
 * a 2-D array has one column per entry of its second axis.
 *
 * Columns are named from `names`, then from a struct schema's fields, then
 * `value` for a single column or `_1`..`_k`. The names chosen here are final.
 *
 * @throws AppError INVALID_RANK
 * @throws AppError AXIS_LENGTH_MISMATCH when the names or schema fields do
 *   not match the column count
 */
export function adaptNDArray(
  array: NDArrayLike,
  declared: DeclaredSchema,
): AdapterResult {
  const rank = array.shape.length;
  if (rank !== 1 && rank !== 2) {
    throw new AppError(
      ErrorCode.INVALID_RANK,
      undefined,
      { operation: "adaptNDArray" },
      { dimensions: rank },
    );
  }

  const width = rank === 1 ? 1 : (array.shape[1] ?? 0);
  const schema: StructType | undefined = declared.schema && asSchema(declared.schema);
  const names =
    declared.names ?? schema?.fields.map((f) => f.name) ?? defaultNames(width, rank);

  if (names.length !== width) {
    throw axisLengthMismatch(names.length, width, "adaptNDArray");
  }

  const type = elementType(array.data);
  const rowCount = array.shape[0] ?? 0;
  const columns = names.map((name, i) => {
    const columnType = schema?.fields[i]?.type ?? type;
    return {
      name,
      type: columnType,
      nullable: true,
      values: columnValues(array, i, width).map((v) =>
        convertValue(v, columnType, name),
      ),
    };
  });

  return {
    table: buildColumnarTable(columns, rowCount),
    schema: schema ?? structType(columns.map((c) => structField(c.name, c.type, true))),
    expectedColumnCount: names.length,
  };
}
