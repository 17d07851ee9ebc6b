import { AppError, ErrorCode } from "@colframe/shared";

import { mergeSchemas, mergeTypes } from "./type-model";
import {
  arrayType,
  binaryType,
  booleanType,
  type DataType,
  dayTimeIntervalType,
  decimalType,
  doubleType,
  longType,
  mapType,
  nullType,
  stringType,
  type StructField,
  structField,
  structType,
  type StructType,
  timestampNtzType,
  timestampType,
} from "./types";
import {
  describeValue,
  isNamedFieldObject,
  isPlainObject,
  normalizeRecord,
  objectEntries,
  type RecordShape,
} from "./record-shape";
import { DecimalValue, TimeDelta } from "./values";

export interface InferenceOptions {
  /** Infer nested plain objects as structs instead of maps. */
  inferDictAsStruct: boolean;
  /** Take an array's element type from its first element only. */
  inferArrayFromFirstElement: boolean;
  /** Infer `Date` values as zone-naive timestamps. */
  preferTimestampNtz: boolean;
}

export const DEFAULT_INFERENCE_OPTIONS: InferenceOptions = {
  inferDictAsStruct: false,
  inferArrayFromFirstElement: false,
  preferTimestampNtz: false,
};

/** Type given to `DecimalValue` when nothing else is known. */
export const INFERRED_DECIMAL = decimalType(38, 18);

function inferArrayType(values: readonly unknown[], options: InferenceOptions): DataType {
  const [first] = values;
  if (values.length === 0) {
    return arrayType(nullType);
  }
  if (options.inferArrayFromFirstElement) {
    return arrayType(inferType(first, options));
  }
  return arrayType(
    values
      .map((v) => inferType(v, options))
      .reduce((acc, t) => mergeTypes(acc, t)),
  );
}

function inferMapType(
  entries: Iterable<[unknown, unknown]>,
  options: InferenceOptions,
): DataType {
  for (const [key, value] of entries) {
    if (key !== null && key !== undefined && value !== null && value !== undefined) {
      return mapType(inferType(key, options), inferType(value, options));
    }
  }
  return mapType(nullType, nullType);
}

function inferStructType(
  entries: Array<[string, unknown]>,
  options: InferenceOptions,
): StructType {
  return structType(
    entries.map(([name, value]) => structField(name, inferType(value, options), true)),
  );
}

/**
 * Infers the type of a single value.
 *
 * @throws AppError INVALID_INPUT_TYPE for values with no type (functions, symbols, sets)
 */
export function inferType(value: unknown, options: InferenceOptions): DataType {
  if (value === null || value === undefined) {
    return nullType;
  }

  switch (typeof value) {
    case "boolean":
      return booleanType;
    case "number":
      return Number.isInteger(value) ? longType : doubleType;
    case "bigint":
      return longType;
    case "string":
      return stringType;
    default:
      break;
  }

  if (value instanceof Date) {
    return options.preferTimestampNtz ? timestampNtzType : timestampType;
  }
  if (value instanceof DecimalValue) {
    return INFERRED_DECIMAL;
  }
  if (value instanceof TimeDelta) {
    return dayTimeIntervalType;
  }
  if (ArrayBuffer.isView(value)) {
    return binaryType;
  }
  if (Array.isArray(value)) {
    return inferArrayType(value, options);
  }
  if (value instanceof Map) {
    return inferMapType(value.entries(), options);
  }
  if (isPlainObject(value)) {
    return options.inferDictAsStruct
      ? inferStructType(Object.entries(value), options)
      : inferMapType(Object.entries(value), options);
  }
  if (isNamedFieldObject(value)) {
    return inferStructType(objectEntries(value), options);
  }

  throw new AppError(
    ErrorCode.INVALID_INPUT_TYPE,
    undefined,
    { operation: "inferType" },
    { dataType: describeValue(value) },
  );
}

/**
 * Positional field names: the caller's names first, then `_{k}` for the
 * remaining 1-based positions.
 */
export function positionalNames(
  width: number,
  names?: readonly string[],
): string[] {
  const result: string[] = [];
  for (let i = 0; i < width; i++) {
    result.push(names?.[i] ?? `_${i + 1}`);
  }
  return result;
}

/**
 * Per-record schema for an already-normalized record.
 */
export function inferRecordSchema(
  record: RecordShape,
  names: readonly string[] | undefined,
  options: InferenceOptions,
): StructType {
  switch (record.kind) {
    case "mapping":
    case "object":
      return inferStructType(record.entries, options);
    case "sequence": {
      const fieldNames = positionalNames(record.values.length, names);
      const fields: StructField[] = record.values.map((value, i) =>
        structField(fieldNames[i] ?? `_${i + 1}`, inferType(value, options), true),
      );
      return structType(fields);
    }
    case "scalar":
      return structType([
        structField(names?.[0] ?? "value", inferType(record.value, options), true),
      ]);
  }
}

/**
 * Infers one schema for a sequence of records by merging the schema of each
 * record left to right.
 *
 * Records may be mappings (fields sorted by key), arrays (positional fields
 * named from `names`, then `_{k}`), named-field objects, or bare scalars (one
 * field named `value`). A field that stays Null-typed in every record is left
 * as Null; deciding whether that is acceptable is up to the caller.
 *
 * @throws AppError EMPTY_INPUT when there are no records
 * @throws AppError TYPE_MERGE_FAILED when records disagree on a field's type
 */
export function inferSchemaFromRecords(
  records: Iterable<unknown>,
  names: readonly string[] | undefined,
  options: InferenceOptions = DEFAULT_INFERENCE_OPTIONS,
): StructType {
  return inferSchemaFromShapes(Array.from(records, normalizeRecord), names, options);
}

/**
 * {@link inferSchemaFromRecords} over records that are already normalized.
 */
export function inferSchemaFromShapes(
  records: readonly RecordShape[],
  names: readonly string[] | undefined,
  options: InferenceOptions = DEFAULT_INFERENCE_OPTIONS,
): StructType {
  let schema: StructType | undefined;

  for (const record of records) {
    const recordSchema = inferRecordSchema(record, names, options);
    schema = schema ? mergeSchemas(schema, recordSchema) : recordSchema;
  }

  if (!schema) {
    throw new AppError(ErrorCode.EMPTY_INPUT, undefined, {
      operation: "inferSchemaFromRecords",
    });
  }
  return schema;
}
