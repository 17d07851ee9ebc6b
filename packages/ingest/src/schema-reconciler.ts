import { type ColumnarTable, columnNames, renameColumns } from "./columnar";
import { axisLengthMismatch } from "./errors";
import { structField, structType, type StructType } from "./types";

export interface ReconcileExpectation {
  expectedColumnCount?: number;
  columnNames?: readonly string[];
}

export interface ReconciledTable {
  table: ColumnarTable;
  schema: StructType;
}

function sameNames(current: readonly string[], names: readonly string[]): boolean {
  return current.length === names.length && current.every((n, i) => n === names[i]);
}

/**
 * Checks the table's column count against what the caller declared, then
 * applies `columnNames` to both the table and the schema. Reconciling an
 * already consistent pair returns it unchanged.
 *
 * @throws AppError AXIS_LENGTH_MISMATCH
 */
export function reconcileSchema(
  { table, schema }: ReconciledTable,
  expectation: ReconcileExpectation = {},
): ReconciledTable {
  const actual = table.numCols;
  if (
    expectation.expectedColumnCount !== undefined &&
    expectation.expectedColumnCount !== actual
  ) {
    throw axisLengthMismatch(expectation.expectedColumnCount, actual, "reconcileSchema");
  }
  if (schema.fields.length !== actual) {
    throw axisLengthMismatch(schema.fields.length, actual, "reconcileSchema");
  }

  const names = expectation.columnNames;
  if (!names || names.length === 0) {
    return { table, schema };
  }

  const renamedTable = sameNames(columnNames(table), names)
    ? table
    : renameColumns(table, names);
  const renamedSchema = sameNames(
    schema.fields.map((f) => f.name),
    names,
  )
    ? schema
    : structType(
        schema.fields.map((f, i) => structField(names[i] ?? f.name, f.type, f.nullable)),
      );
  return { table: renamedTable, schema: renamedSchema };
}
