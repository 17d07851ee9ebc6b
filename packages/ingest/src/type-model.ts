import { AppError, ErrorCode } from "@colframe/shared";

import {
  arrayType,
  type DataType,
  decimalType,
  type DecimalType,
  doubleType,
  floatType,
  type IntegerType,
  mapType,
  MAX_DECIMAL_PRECISION,
  type StructField,
  structField,
  type StructType,
  structType,
} from "./types";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

const INTEGER_NAMES: Record<IntegerType["bits"], string> = {
  8: "tinyint",
  16: "smallint",
  32: "int",
  64: "bigint",
};

/** Decimal wide enough to hold every value of an integer width. */
const INTEGER_AS_DECIMAL: Record<IntegerType["bits"], DecimalType> = {
  8: decimalType(3, 0),
  16: decimalType(5, 0),
  32: decimalType(10, 0),
  64: decimalType(20, 0),
};

export function typeEquals(a: DataType, b: DataType): boolean {
  switch (a.kind) {
    case "integer":
    case "float":
      return b.kind === a.kind && b.bits === a.bits;
    case "decimal":
      return (
        b.kind === "decimal" && b.precision === a.precision && b.scale === a.scale
      );
    case "timestamp":
      return b.kind === "timestamp" && b.withTimezone === a.withTimezone;
    case "array":
      return (
        b.kind === "array" &&
        b.containsNull === a.containsNull &&
        typeEquals(a.elementType, b.elementType)
      );
    case "map":
      return (
        b.kind === "map" &&
        b.valueContainsNull === a.valueContainsNull &&
        typeEquals(a.keyType, b.keyType) &&
        typeEquals(a.valueType, b.valueType)
      );
    case "struct":
      return (
        b.kind === "struct" &&
        b.fields.length === a.fields.length &&
        a.fields.every((field, i) => {
          const other = b.fields[i];
          return (
            other !== undefined &&
            other.name === field.name &&
            other.nullable === field.nullable &&
            typeEquals(field.type, other.type)
          );
        })
      );
    default:
      return a.kind === b.kind;
  }
}

/**
 * Lower-case type string, e.g. `bigint`, `array<int>`,
 * `struct<a:bigint,b:string>`.
 */
export function simpleString(type: DataType): string {
  switch (type.kind) {
    case "null":
      return "void";
    case "integer":
      return INTEGER_NAMES[type.bits];
    case "float":
      return type.bits === 32 ? "float" : "double";
    case "decimal":
      return `decimal(${type.precision},${type.scale})`;
    case "timestamp":
      return type.withTimezone ? "timestamp" : "timestamp_ntz";
    case "daytime_interval":
      return "interval day to second";
    case "array":
      return `array<${simpleString(type.elementType)}>`;
    case "map":
      return `map<${simpleString(type.keyType)},${simpleString(type.valueType)}>`;
    case "struct":
      return `struct<${type.fields
        .map((f) => `${f.name}:${simpleString(f.type)}`)
        .join(",")}>`;
    default:
      return type.kind;
  }
}

const PLAIN_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function quoteIdentifier(name: string): string {
  if (PLAIN_IDENTIFIER.test(name)) {
    return name;
  }
  return `\`${name.replace(/`/g, "``")}\``;
}

function ddlFieldString(field: StructField, separator: string): string {
  const notNull = field.nullable ? "" : " NOT NULL";
  return `${quoteIdentifier(field.name)}${separator}${typeToDdl(field.type)}${notNull}`;
}

/**
 * Upper-case DDL type string; nested field names keep their case.
 */
export function typeToDdl(type: DataType): string {
  switch (type.kind) {
    case "array":
      return `ARRAY<${typeToDdl(type.elementType)}>`;
    case "map":
      return `MAP<${typeToDdl(type.keyType)}, ${typeToDdl(type.valueType)}>`;
    case "struct":
      return `STRUCT<${type.fields.map((f) => ddlFieldString(f, ": ")).join(", ")}>`;
    default:
      return simpleString(type).toUpperCase();
  }
}

/**
 * Column-list DDL for a schema: `a BIGINT, b STRING NOT NULL`.
 */
export function toDdl(schema: StructType): string {
  return schema.fields.map((f) => ddlFieldString(f, " ")).join(", ");
}

export function toJson(type: DataType): JsonValue {
  switch (type.kind) {
    case "array":
      return {
        type: "array",
        elementType: toJson(type.elementType),
        containsNull: type.containsNull,
      };
    case "map":
      return {
        type: "map",
        keyType: toJson(type.keyType),
        valueType: toJson(type.valueType),
        valueContainsNull: type.valueContainsNull,
      };
    case "struct":
      return {
        type: "struct",
        fields: type.fields.map((f) => ({
          name: f.name,
          type: toJson(f.type),
          nullable: f.nullable,
          metadata: {},
        })),
      };
    default:
      return simpleString(type);
  }
}

/**
 * True when a Null type appears anywhere in the type tree.
 */
export function hasNullType(type: DataType): boolean {
  switch (type.kind) {
    case "null":
      return true;
    case "array":
      return hasNullType(type.elementType);
    case "map":
      return hasNullType(type.keyType) || hasNullType(type.valueType);
    case "struct":
      return type.fields.some((f) => hasNullType(f.type));
    default:
      return false;
  }
}

/**
 * Path of the first field whose type contains Null, e.g. `b` or `a.c`.
 */
export function findUnresolvedField(schema: StructType): string | undefined {
  for (const field of schema.fields) {
    if (field.type.kind === "struct") {
      const nested = findUnresolvedField(field.type);
      if (nested !== undefined) {
        return `${field.name}.${nested}`;
      }
    } else if (hasNullType(field.type)) {
      return field.name;
    }
  }
  return undefined;
}

function mergeFailure(a: DataType, b: DataType, field?: string): AppError {
  return new AppError(
    ErrorCode.TYPE_MERGE_FAILED,
    undefined,
    { operation: "mergeTypes" },
    { leftType: simpleString(a), rightType: simpleString(b), field },
  );
}

function boundedDecimal(precision: number, scale: number): DecimalType {
  const boundedPrecision = Math.min(precision, MAX_DECIMAL_PRECISION);
  return decimalType(boundedPrecision, Math.min(scale, boundedPrecision));
}

function mergeDecimals(a: DecimalType, b: DecimalType): DecimalType {
  const scale = Math.max(a.scale, b.scale);
  const integerDigits = Math.max(a.precision - a.scale, b.precision - b.scale);
  return boundedDecimal(integerDigits + scale, scale);
}

function mergeNumeric(a: DataType, b: DataType): DataType | undefined {
  if (a.kind === "integer" && b.kind === "integer") {
    return a.bits >= b.bits ? a : b;
  }
  if (a.kind === "float" && b.kind === "float") {
    return a.bits >= b.bits ? a : b;
  }
  if (a.kind === "decimal" && b.kind === "decimal") {
    return mergeDecimals(a, b);
  }
  if (a.kind === "integer" && b.kind === "float") {
    return b.bits === 32 && a.bits <= 16 ? floatType : doubleType;
  }
  if (a.kind === "float" && b.kind === "integer") {
    return mergeNumeric(b, a);
  }
  if (a.kind === "integer" && b.kind === "decimal") {
    return mergeDecimals(INTEGER_AS_DECIMAL[a.bits], b);
  }
  if (a.kind === "decimal" && b.kind === "integer") {
    return mergeNumeric(b, a);
  }
  if (
    (a.kind === "decimal" && b.kind === "float") ||
    (a.kind === "float" && b.kind === "decimal")
  ) {
    return doubleType;
  }
  return undefined;
}

function findField(type: StructType, name: string): StructField | undefined {
  return type.fields.find((f) => f.name === name);
}

function qualify(parent: string | undefined, name: string): string {
  return parent === undefined ? name : `${parent}.${name}`;
}

function mergeStructs(a: StructType, b: StructType, path?: string): StructType {
  const fields: StructField[] = a.fields.map((field) => {
    const other = findField(b, field.name);
    if (!other) {
      return structField(field.name, field.type, true);
    }
    return structField(
      field.name,
      mergeTypes(field.type, other.type, qualify(path, field.name)),
      field.nullable ||
        other.nullable ||
        field.type.kind === "null" ||
        other.type.kind === "null",
    );
  });

  const seen = new Set(a.fields.map((f) => f.name));
  for (const field of b.fields) {
    if (!seen.has(field.name)) {
      seen.add(field.name);
      fields.push(structField(field.name, field.type, true));
    }
  }

  return structType(fields);
}

/**
 * Struct-level merge used when reducing per-record schemas.
 */
export function mergeSchemas(a: StructType, b: StructType): StructType {
  return typeEquals(a, b) ? a : mergeStructs(a, b);
}

/**
 * Combines two observed types for the same logical field into one type
 * compatible with both.
 *
 * - Null yields the other side.
 * - Numeric types promote (integer widening, float when either side is float,
 *   decimal precision/scale widening).
 * - Structs merge by field name: the left side's order first, then fields only
 *   on the right; one-sided fields become nullable.
 * - Timestamp with and without time zone merge to the zoned variant.
 *
 * @param path - Field path used in the error when the types are incompatible
 * @throws AppError TYPE_MERGE_FAILED for any other combination
 */
export function mergeTypes(a: DataType, b: DataType, path?: string): DataType {
  if (typeEquals(a, b)) {
    return a;
  }
  if (a.kind === "null") {
    return b;
  }
  if (b.kind === "null") {
    return a;
  }

  const numeric = mergeNumeric(a, b);
  if (numeric) {
    return numeric;
  }

  if (a.kind === "timestamp" && b.kind === "timestamp") {
    return a.withTimezone ? a : b;
  }

  if (a.kind === "struct" && b.kind === "struct") {
    return mergeStructs(a, b, path);
  }

  if (a.kind === "array" && b.kind === "array") {
    return arrayType(
      mergeTypes(a.elementType, b.elementType, path),
      a.containsNull || b.containsNull,
    );
  }

  if (a.kind === "map" && b.kind === "map") {
    return mapType(
      mergeTypes(a.keyType, b.keyType, path),
      mergeTypes(a.valueType, b.valueType, path),
      a.valueContainsNull || b.valueContainsNull,
    );
  }

  throw mergeFailure(a, b, path);
}

function dedupNames(names: readonly string[]): string[] {
  const counts = new Map<string, number>();
  for (const name of names) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  if (counts.size === names.length) {
    return [...names];
  }

  const next = new Map<string, number>();
  return names.map((name) => {
    if ((counts.get(name) ?? 0) < 2) {
      return name;
    }
    const index = next.get(name) ?? 0;
    next.set(name, index + 1);
    return `${name}_${index}`;
  });
}

/**
 * Renames duplicate struct field names to `name_0`, `name_1`, ... at every
 * nesting level. Unique names are left alone.
 */
export function deduplicateFieldNames(type: DataType): DataType {
  switch (type.kind) {
    case "struct": {
      const names = dedupNames(type.fields.map((f) => f.name));
      return structType(
        type.fields.map((f, i) =>
          structField(names[i] ?? f.name, deduplicateFieldNames(f.type), f.nullable),
        ),
      );
    }
    case "array":
      return arrayType(deduplicateFieldNames(type.elementType), type.containsNull);
    case "map":
      return mapType(
        deduplicateFieldNames(type.keyType),
        deduplicateFieldNames(type.valueType),
        type.valueContainsNull,
      );
    default:
      return type;
  }
}

/**
 * Wraps a non-struct type as the single-field schema `value`.
 */
export function asSchema(type: DataType): StructType {
  if (type.kind === "struct") {
    return type;
  }
  return structType([structField("value", type, true)]);
}
