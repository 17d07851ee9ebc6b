import { AppError, ErrorCode } from "@colframe/shared";

import type { EncodedColumn } from "./columnar";
import { isMapping, isNamedFieldObject, isPlainObject, type RecordShape } from "./record-shape";
import { simpleString } from "./type-model";
import type { DataType, DecimalType, IntegerType, StructType } from "./types";
import { DecimalValue, TimeDelta } from "./values";

const MS_PER_DAY = 86_400_000;
const utf8 = new TextEncoder();

function invalidValue(type: DataType, path: string, cause?: unknown): AppError {
  return new AppError(
    ErrorCode.INVALID_FIELD_VALUE,
    cause,
    { operation: "convertValue" },
    { field: path, dataType: simpleString(type) },
  );
}

function integerBounds(bits: IntegerType["bits"]): [bigint, bigint] {
  const half = 1n << BigInt(bits - 1);
  return [-half, half - 1n];
}

function toInteger(value: unknown, type: IntegerType, path: string): number | bigint {
  let n: bigint;
  if (typeof value === "bigint") {
    n = value;
  } else if (typeof value === "number" && Number.isInteger(value)) {
    n = BigInt(value);
  } else {
    throw invalidValue(type, path);
  }

  const [min, max] = integerBounds(type.bits);
  if (n < min || n > max) {
    throw invalidValue(type, path);
  }
  return type.bits === 64 ? n : Number(n);
}

function toDecimalValue(value: unknown): DecimalValue | undefined {
  if (value instanceof DecimalValue) {
    return value;
  }
  if (typeof value === "bigint") {
    return new DecimalValue(value, 0);
  }
  if (typeof value === "number") {
    return DecimalValue.fromNumber(value);
  }
  if (typeof value === "string") {
    return DecimalValue.parse(value);
  }
  return undefined;
}

/**
 * 128-bit two's complement, little-endian 32-bit words.
 */
export function decimalWords(unscaled: bigint): Uint32Array {
  let bits = BigInt.asUintN(128, unscaled);
  const words = new Uint32Array(4);
  for (let i = 0; i < 4; i++) {
    words[i] = Number(bits & 0xffff_ffffn);
    bits >>= 32n;
  }
  return words;
}

function toDecimal(value: unknown, type: DecimalType, path: string): Uint32Array {
  const decimal = toDecimalValue(value);
  if (!decimal) {
    throw invalidValue(type, path);
  }
  const unscaled = decimal.rescale(type.scale);
  const limit = 10n ** BigInt(type.precision);
  if (unscaled >= limit || unscaled <= -limit) {
    throw invalidValue(type, path);
  }
  return decimalWords(unscaled);
}

function toText(value: unknown, type: DataType, path: string): string {
  switch (typeof value) {
    case "string":
      return value;
    case "boolean":
      return value ? "true" : "false";
    case "number":
    case "bigint":
      return String(value);
    default:
      break;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof DecimalValue || value instanceof TimeDelta) {
    return value.toString();
  }
  throw invalidValue(type, path);
}

function toBinary(value: unknown, type: DataType, path: string): Uint8Array {
  if (value instanceof Uint8Array) {
    return value;
  }
  if (ArrayBuffer.isView(value)) {
    return new Uint8Array(value.buffer, value.byteOffset, value.byteLength);
  }
  if (typeof value === "string") {
    return utf8.encode(value);
  }
  throw invalidValue(type, path);
}

function toEpochMs(value: unknown, type: DataType, path: string): number {
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value.getTime();
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  throw invalidValue(type, path);
}

function toMicroseconds(value: unknown, type: DataType, path: string): bigint {
  if (value instanceof TimeDelta) {
    return value.microseconds;
  }
  if (typeof value === "bigint") {
    return value;
  }
  throw invalidValue(type, path);
}

function fieldLookup(value: unknown): ((name: string, index: number) => unknown) | undefined {
  if (Array.isArray(value)) {
    return (_name, index) => value[index];
  }
  if (value instanceof Map) {
    return (name) => value.get(name);
  }
  if (isPlainObject(value) || isNamedFieldObject(value)) {
    const record = new Map<string, unknown>(Object.entries(value));
    return (name) => record.get(name);
  }
  return undefined;
}

function toStruct(value: unknown, type: StructType, path: string): unknown[] {
  const lookup = fieldLookup(value);
  if (!lookup) {
    throw invalidValue(type, path);
  }
  return type.fields.map((field, i) =>
    convertValue(lookup(field.name, i), field.type, `${path}.${field.name}`, field.nullable),
  );
}

function toMap(
  value: unknown,
  type: Extract<DataType, { kind: "map" }>,
  path: string,
): Map<unknown, unknown> {
  if (!isMapping(value)) {
    throw invalidValue(type, path);
  }
  const entries: Array<[unknown, unknown]> =
    value instanceof Map ? [...value.entries()] : Object.entries(value);
  return new Map(
    entries.map(([k, v]) => [
      convertValue(k, type.keyType, `${path}.key`, false),
      convertValue(v, type.valueType, `${path}.value`, type.valueContainsNull),
    ]),
  );
}

/**
 * Coerces one value to the builder representation of `type`.
 *
 * Integers widen from numbers and bigints (bigint for 64-bit columns),
 * strings accept any scalar (booleans as `true`/`false`), decimals are
 * rescaled to the column scale, dates and timestamps become epoch
 * milliseconds, intervals microseconds, and nested values recurse.
 *
 * @param path - Field path used in errors
 * @throws AppError INVALID_FIELD_VALUE
 */
export function convertValue(
  value: unknown,
  type: DataType,
  path: string,
  nullable = true,
): unknown {
  if (value === null || value === undefined) {
    if (!nullable) {
      throw invalidValue(type, path);
    }
    return null;
  }

  switch (type.kind) {
    case "null":
      throw invalidValue(type, path);
    case "boolean":
      if (typeof value !== "boolean") {
        throw invalidValue(type, path);
      }
      return value;
    case "integer":
      return toInteger(value, type, path);
    case "float":
      if (typeof value === "number") {
        return value;
      }
      if (typeof value === "bigint") {
        return Number(value);
      }
      throw invalidValue(type, path);
    case "decimal":
      return toDecimal(value, type, path);
    case "string":
      return toText(value, type, path);
    case "binary":
      return toBinary(value, type, path);
    case "date":
      // Bare numbers are epoch days.
      if (typeof value === "number" && Number.isInteger(value)) {
        return value * MS_PER_DAY;
      }
      return toEpochMs(value, type, path);
    case "timestamp":
      return toEpochMs(value, type, path);
    case "daytime_interval":
      return toMicroseconds(value, type, path);
    case "array":
      if (!Array.isArray(value)) {
        throw invalidValue(type, path);
      }
      return value.map((v, i) =>
        convertValue(v, type.elementType, `${path}[${i}]`, type.containsNull),
      );
    case "map":
      return toMap(value, type, path);
    case "struct":
      return toStruct(value, type, path);
  }
}

/**
 * Positional field values of a normalized record against `schema`.
 * Mappings and named-field objects are read by field name, sequences by
 * position, and a bare scalar fills the first field.
 */
export function recordValues(record: RecordShape, schema: StructType): unknown[] {
  switch (record.kind) {
    case "mapping":
    case "object": {
      const byName = new Map(record.entries);
      return schema.fields.map((f) => byName.get(f.name));
    }
    case "sequence":
      return schema.fields.map((_f, i) => record.values[i]);
    case "scalar":
      return schema.fields.map((_f, i) => (i === 0 ? record.value : undefined));
  }
}

/**
 * Converts normalized records into encoded columns, one per schema field.
 */
export function convertRecords(
  records: readonly RecordShape[],
  schema: StructType,
): EncodedColumn[] {
  const columns = schema.fields.map((field) => {
    const values: unknown[] = [];
    return { name: field.name, type: field.type, nullable: field.nullable, values };
  });

  for (const record of records) {
    const values = recordValues(record, schema);
    columns.forEach((column, i) => {
      column.values.push(
        convertValue(values[i], column.type, column.name, column.nullable),
      );
    });
  }

  return columns;
}
