export type IntegerBits = 8 | 16 | 32 | 64;
export type FloatBits = 32 | 64;

export interface NullType {
  readonly kind: "null";
}

export interface BooleanType {
  readonly kind: "boolean";
}

export interface IntegerType {
  readonly kind: "integer";
  readonly bits: IntegerBits;
}

export interface FloatType {
  readonly kind: "float";
  readonly bits: FloatBits;
}

export interface DecimalType {
  readonly kind: "decimal";
  readonly precision: number;
  readonly scale: number;
}

export interface StringType {
  readonly kind: "string";
}

export interface BinaryType {
  readonly kind: "binary";
}

export interface DateType {
  readonly kind: "date";
}

/**
 * `withTimezone: false` is the zone-naive (NTZ) variant.
 */
export interface TimestampType {
  readonly kind: "timestamp";
  readonly withTimezone: boolean;
}

export interface DayTimeIntervalType {
  readonly kind: "daytime_interval";
}

export interface ArrayType {
  readonly kind: "array";
  readonly elementType: DataType;
  readonly containsNull: boolean;
}

export interface MapType {
  readonly kind: "map";
  readonly keyType: DataType;
  readonly valueType: DataType;
  readonly valueContainsNull: boolean;
}

export interface StructField {
  readonly name: string;
  readonly type: DataType;
  readonly nullable: boolean;
}

export interface StructType {
  readonly kind: "struct";
  readonly fields: readonly StructField[];
}

export type AtomicType =
  | BooleanType
  | IntegerType
  | FloatType
  | DecimalType
  | StringType
  | BinaryType
  | DateType
  | TimestampType
  | DayTimeIntervalType;

export type DataType = NullType | AtomicType | ArrayType | MapType | StructType;

/** A table schema: the top-level struct. */
export type Schema = StructType;

export type NumericType = IntegerType | FloatType | DecimalType;

export const nullType: NullType = { kind: "null" };
export const booleanType: BooleanType = { kind: "boolean" };
export const byteType: IntegerType = { kind: "integer", bits: 8 };
export const shortType: IntegerType = { kind: "integer", bits: 16 };
export const intType: IntegerType = { kind: "integer", bits: 32 };
export const longType: IntegerType = { kind: "integer", bits: 64 };
export const floatType: FloatType = { kind: "float", bits: 32 };
export const doubleType: FloatType = { kind: "float", bits: 64 };
export const stringType: StringType = { kind: "string" };
export const binaryType: BinaryType = { kind: "binary" };
export const dateType: DateType = { kind: "date" };
export const timestampType: TimestampType = {
  kind: "timestamp",
  withTimezone: true,
};
export const timestampNtzType: TimestampType = {
  kind: "timestamp",
  withTimezone: false,
};
export const dayTimeIntervalType: DayTimeIntervalType = {
  kind: "daytime_interval",
};

export const MAX_DECIMAL_PRECISION = 38;

export function decimalType(precision = 10, scale = 0): DecimalType {
  return { kind: "decimal", precision, scale };
}

export function arrayType(elementType: DataType, containsNull = true): ArrayType {
  return { kind: "array", elementType, containsNull };
}

export function mapType(
  keyType: DataType,
  valueType: DataType,
  valueContainsNull = true,
): MapType {
  return { kind: "map", keyType, valueType, valueContainsNull };
}

export function structField(
  name: string,
  type: DataType,
  nullable = true,
): StructField {
  return { name, type, nullable };
}

export function structType(fields: readonly StructField[] = []): StructType {
  return { kind: "struct", fields: [...fields] };
}

export function isAtomicType(type: DataType): type is AtomicType {
  return (
    type.kind !== "null" &&
    type.kind !== "array" &&
    type.kind !== "map" &&
    type.kind !== "struct"
  );
}

export function isNumericType(type: DataType): type is NumericType {
  return (
    type.kind === "integer" || type.kind === "float" || type.kind === "decimal"
  );
}
