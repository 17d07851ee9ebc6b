import { AppError, ErrorCode } from "@colframe/shared";

import { buildColumnarTable, emptyColumnarTable } from "../columnar";
import { normalizeRecord, type RecordShape } from "../record-shape";
import {
  type InferenceOptions,
  inferSchemaFromShapes,
  positionalNames,
} from "../schema-inferrer";
import { asSchema, findUnresolvedField } from "../type-model";
import { convertRecords } from "../value-converter";
import type { AdapterResult, DeclaredSchema } from "./adapter-result";

function longestSequence(records: readonly RecordShape[]): number {
  return records.reduce(
    (max, r) => (r.kind === "sequence" ? Math.max(max, r.values.length) : max),
    0,
  );
}

/**
 * Converts an iterable of records into a table.
 *
 * With a schema the records are converted against it (a non-struct schema
 * becomes a single `value` field). Otherwise the schema is inferred and a
 * name list shorter than the widest positional record is extended with
 * `_{k}`.
 *
 * @throws AppError EMPTY_INPUT when there are no records and no schema
 * @throws AppError UNRESOLVED_TYPE when an inferred field stays Null-typed
 * @throws AppError TYPE_MERGE_FAILED
 * @throws AppError INVALID_FIELD_VALUE
 */
export function adaptSequence(
  data: Iterable<unknown>,
  declared: DeclaredSchema,
  options: InferenceOptions,
): AdapterResult {
  const records = Array.from(data, normalizeRecord);

  if (declared.schema) {
    const schema = asSchema(declared.schema);
    const table =
      records.length === 0
        ? emptyColumnarTable(schema)
        : buildColumnarTable(convertRecords(records, schema), records.length);
    return { table, schema, expectedColumnCount: schema.fields.length };
  }

  const schema = inferSchemaFromShapes(records, declared.names, options);
  const unresolved = findUnresolvedField(schema);
  if (unresolved !== undefined) {
    throw new AppError(
      ErrorCode.UNRESOLVED_TYPE,
      undefined,
      { operation: "adaptSequence" },
      { field: unresolved },
    );
  }

  const table = buildColumnarTable(convertRecords(records, schema), records.length);
  if (!declared.names) {
    return { table, schema };
  }

  const width = longestSequence(records);
  const names =
    declared.names.length < width
      ? positionalNames(width, declared.names)
      : declared.names;
  return {
    table,
    schema,
    expectedColumnCount: names.length,
    columnNames: names,
  };
}
