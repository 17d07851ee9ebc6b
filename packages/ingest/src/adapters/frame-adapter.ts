import { AppError, ErrorCode, type SerializerConfig } from "@colframe/shared";

import { axisLengthMismatch } from "../errors";
import { type InferenceOptions, inferType, positionalNames } from "../schema-inferrer";
import { deduplicateFieldNames, mergeTypes, simpleString } from "../type-model";
import {
  booleanType,
  byteType,
  binaryType,
  type DataType,
  dayTimeIntervalType,
  doubleType,
  floatType,
  intType,
  longType,
  nullType,
  shortType,
  stringType,
  structField,
  structType,
  type StructType,
  timestampType,
} from "../types";
import type { AdapterResult, DeclaredSchema } from "./adapter-result";
import type { FrameLike, StorageType } from "./frame";
import { serializeFrame, type SerializedColumn } from "./frame-serializer";

export interface FrameAdapterOptions {
  serializer: SerializerConfig;
  inference: InferenceOptions;
}

/**
 * Column type a storage type maps to; `object` columns are inferred from
 * their values.
 */
export function storageToType(
  storage: StorageType,
  values: readonly unknown[],
  options: InferenceOptions,
): DataType {
  switch (storage) {
    case "bool":
      return booleanType;
    case "int8":
      return byteType;
    case "int16":
      return shortType;
    case "int32":
      return intType;
    case "int64":
      return longType;
    case "float32":
      return floatType;
    case "float64":
      return doubleType;
    case "string":
      return stringType;
    case "binary":
      return binaryType;
    case "datetime64":
    case "datetime64tz":
      return timestampType;
    case "timedelta64":
      return dayTimeIntervalType;
    case "object":
      return values
        .map((value) => inferType(value, options))
        .reduce<DataType>((acc, type) => mergeTypes(acc, type), nullType);
  }
}

function storageColumns(
  frame: FrameLike,
  names: readonly string[],
  options: InferenceOptions,
): SerializedColumn[] {
  return frame.columns.map((_label, i) => {
    const values = frame.column(i);
    const storage = frame.dtypes[i] ?? "object";
    return {
      name: names[i] ?? String(frame.columns[i]),
      type: storageToType(storage, values, options),
      values,
    };
  });
}

function declaredColumns(frame: FrameLike, schema: StructType): SerializedColumn[] {
  return schema.fields.map((field, i) => ({
    name: field.name,
    type: field.type,
    values: frame.column(i),
  }));
}

/**
 * Converts a frame into a table.
 *
 * Without a schema the frame's labels name the columns and storage types
 * pick the column types. A name list shorter than the frame is padded with
 * `_{k}`. A struct schema supplies the column types; the columns are written
 * under de-duplicated field names and renamed to the schema's names when
 * reconciled.
 *
 * @throws AppError UNSUPPORTED_TYPE_FOR_ENCODING for a non-struct schema
 * @throws AppError AXIS_LENGTH_MISMATCH when a struct schema's field count
 *   differs from the frame's column count
 */
export function adaptFrame(
  frame: FrameLike,
  declared: DeclaredSchema,
  options: FrameAdapterOptions,
): AdapterResult {
  const width = frame.columns.length;
  const { schema } = declared;

  if (schema && schema.kind !== "struct") {
    throw new AppError(
      ErrorCode.UNSUPPORTED_TYPE_FOR_ENCODING,
      undefined,
      { operation: "adaptFrame" },
      { dataType: simpleString(schema) },
    );
  }

  if (schema) {
    if (schema.fields.length !== width) {
      throw axisLengthMismatch(schema.fields.length, width, "adaptFrame");
    }
    const deduplicated = deduplicateFieldNames(schema);
    const target = deduplicated.kind === "struct" ? deduplicated : schema;
    const table = serializeFrame(
      declaredColumns(frame, target),
      frame.rowCount,
      options.serializer,
    );
    return {
      table,
      schema,
      expectedColumnCount: schema.fields.length,
      columnNames: schema.fields.map((f) => f.name),
    };
  }

  const labels = frame.columns.map(String);
  const columns = storageColumns(frame, labels, options.inference);
  const table = serializeFrame(columns, frame.rowCount, options.serializer);
  const derived = structType(columns.map((c) => structField(c.name, c.type, true)));

  if (!declared.names) {
    return { table, schema: derived };
  }

  const names =
    declared.names.length < width
      ? positionalNames(width, declared.names)
      : declared.names;
  return {
    table,
    schema: derived,
    expectedColumnCount: names.length,
    columnNames: names,
  };
}
