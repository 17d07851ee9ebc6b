import type { ColumnarTable } from "./columnar";
import { toDdl, toJson } from "./type-model";
import type { StructType } from "./types";

/**
 * A columnar table paired with its schema, ready to hand to a remote
 * session.
 */
export class LocalRelation {
  constructor(
    readonly table: ColumnarTable,
    readonly schema: StructType,
  ) {}

  get numRows(): number {
    return this.table.numRows;
  }

  get numColumns(): number {
    return this.table.numCols;
  }

  /** The schema in its JSON wire form. */
  get schemaJson(): string {
    return JSON.stringify(toJson(this.schema));
  }

  get schemaDdl(): string {
    return toDdl(this.schema);
  }
}
