import type { ColumnarTable } from "../columnar";
import type { DataType, StructType } from "../types";

/**
 * A table and schema produced by an adapter, plus what the reconciler still
 * has to check or apply.
 */
export interface AdapterResult {
  table: ColumnarTable;
  schema: StructType;
  /** Column count the caller declared, if any. */
  expectedColumnCount?: number;
  /** Names to apply positionally; absent when the adapter named the columns. */
  columnNames?: readonly string[];
}

/**
 * What the caller supplied in place of a schema.
 */
export interface DeclaredSchema {
  schema?: DataType;
  names?: readonly string[];
}
