import { AppError, ErrorCode } from "@colframe/shared";
import * as arrow from "apache-arrow";

import { simpleString } from "./type-model";
import {
  type DataType,
  isAtomicType,
  MAX_DECIMAL_PRECISION,
  type StructType,
} from "./types";

/** The pipeline's output table. */
export type ColumnarTable = arrow.Table;

/** One column ready to be written: values are already in builder form. */
export interface EncodedColumn {
  name: string;
  type: DataType;
  nullable: boolean;
  values: readonly unknown[];
}

export const DEFAULT_TIMEZONE = "UTC";

function unsupported(type: DataType): AppError {
  return new AppError(
    ErrorCode.UNSUPPORTED_TYPE_FOR_ENCODING,
    undefined,
    { operation: "toArrowType" },
    { dataType: simpleString(type) },
  );
}

function integerType(bits: 8 | 16 | 32 | 64): arrow.DataType {
  switch (bits) {
    case 8:
      return new arrow.Int8();
    case 16:
      return new arrow.Int16();
    case 32:
      return new arrow.Int32();
    case 64:
      return new arrow.Int64();
  }
}

/**
 * Canonical Arrow type for a type. Zoned timestamps carry `timezone`.
 *
 * @throws AppError UNSUPPORTED_TYPE_FOR_ENCODING for decimals wider than 38
 *   digits and maps whose key type is not a non-null atomic type
 */
export function toArrowType(
  type: DataType,
  timezone: string = DEFAULT_TIMEZONE,
): arrow.DataType {
  switch (type.kind) {
    case "null":
      return new arrow.Null();
    case "boolean":
      return new arrow.Bool();
    case "integer":
      return integerType(type.bits);
    case "float":
      return type.bits === 32 ? new arrow.Float32() : new arrow.Float64();
    case "decimal":
      if (type.precision > MAX_DECIMAL_PRECISION || type.scale > type.precision) {
        throw unsupported(type);
      }
      return new arrow.Decimal(type.scale, type.precision, 128);
    case "string":
      return new arrow.Utf8();
    case "binary":
      return new arrow.Binary();
    case "date":
      return new arrow.DateDay();
    case "timestamp":
      return new arrow.TimestampMicrosecond(type.withTimezone ? timezone : null);
    case "daytime_interval":
      return new arrow.Duration(arrow.TimeUnit.MICROSECOND);
    case "array":
      return new arrow.List(
        new arrow.Field("element", toArrowType(type.elementType, timezone), type.containsNull),
      );
    case "map": {
      if (!isAtomicType(type.keyType)) {
        throw unsupported(type);
      }
      const entries = new arrow.Struct([
        new arrow.Field("key", toArrowType(type.keyType, timezone), false),
        new arrow.Field("value", toArrowType(type.valueType, timezone), type.valueContainsNull),
      ]);
      return new arrow.Map_(new arrow.Field("entries", entries, false), false);
    }
    case "struct":
      return new arrow.Struct(
        type.fields.map(
          (f) => new arrow.Field(f.name, toArrowType(f.type, timezone), f.nullable),
        ),
      );
  }
}

function buildData(type: arrow.DataType, values: readonly unknown[]): arrow.Data {
  const builder = arrow.makeBuilder({ type, nullValues: [null, undefined] });
  for (const value of values) {
    builder.append(value);
  }
  return builder.finish().flush();
}

/**
 * Writes columns into a single-batch table. Every column must hold
 * `rowCount` values.
 */
export function buildColumnarTable(
  columns: readonly EncodedColumn[],
  rowCount: number,
  timezone: string = DEFAULT_TIMEZONE,
): ColumnarTable {
  const fields = columns.map(
    (c) => new arrow.Field(c.name, toArrowType(c.type, timezone), c.nullable),
  );
  const children = columns.map((c, i) => {
    const field = fields[i];
    if (!field || c.values.length !== rowCount) {
      throw new RangeError(
        `Column ${c.name} has ${c.values.length} values, expected ${rowCount}`,
      );
    }
    return buildData(field.type, c.values);
  });

  const schema = new arrow.Schema(fields);
  return new arrow.Table(schema, [recordBatch(schema, rowCount, children)]);
}

/**
 * The RecordBatch constructor merges fields that share a name into one slot,
 * so a batch with repeated column names is given back its own schema and data.
 */
function recordBatch(
  schema: arrow.Schema,
  length: number,
  children: arrow.Data[],
): arrow.RecordBatch {
  const data = arrow.makeData({
    type: new arrow.Struct(schema.fields),
    length,
    nullCount: 0,
    children,
  });
  const batch = new arrow.RecordBatch(schema, data);
  const names = schema.fields.map((f) => f.name);
  if (new Set(names).size !== names.length) {
    Object.defineProperty(batch, "schema", { value: schema });
    Object.defineProperty(batch, "data", { value: data });
  }
  return batch;
}

/**
 * Zero-row table whose columns follow `schema`.
 */
export function emptyColumnarTable(
  schema: StructType,
  timezone: string = DEFAULT_TIMEZONE,
): ColumnarTable {
  return buildColumnarTable(
    schema.fields.map((f) => ({
      name: f.name,
      type: f.type,
      nullable: f.nullable,
      values: [],
    })),
    0,
    timezone,
  );
}

export function columnNames(table: ColumnarTable): string[] {
  return table.schema.fields.map((f) => f.name);
}

/**
 * Renames columns positionally; columns beyond `names` keep their name.
 * Column data is shared with the input table, not copied.
 */
export function renameColumns(
  table: ColumnarTable,
  names: readonly string[],
): ColumnarTable {
  const fields = table.schema.fields.map(
    (f, i) => new arrow.Field(names[i] ?? f.name, f.type, f.nullable, f.metadata),
  );
  const schema = new arrow.Schema(fields, table.schema.metadata);
  const batches = table.batches.map((batch) =>
    recordBatch(schema, batch.numRows, batch.data.children),
  );
  return new arrow.Table(schema, batches);
}
