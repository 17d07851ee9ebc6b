import { DecimalValue, TimeDelta } from "./values";

/**
 * Shape of one input unit, as seen by inference and conversion.
 */
export type RecordShape =
  | { kind: "mapping"; entries: Array<[string, unknown]> }
  | { kind: "sequence"; values: readonly unknown[] }
  | { kind: "object"; entries: Array<[string, unknown]> }
  | { kind: "scalar"; value: unknown };

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Objects the value model treats as single values rather than records.
 */
export function isScalarObject(value: object): boolean {
  return (
    value instanceof Date ||
    value instanceof DecimalValue ||
    value instanceof TimeDelta ||
    ArrayBuffer.isView(value)
  );
}

/**
 * A class instance whose own enumerable properties are its fields.
 */
export function isNamedFieldObject(value: unknown): value is object {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Map) &&
    !(value instanceof Set) &&
    !isPlainObject(value) &&
    !isScalarObject(value)
  );
}

export function isMapping(
  value: unknown,
): value is Record<string, unknown> | Map<unknown, unknown> {
  return isPlainObject(value) || value instanceof Map;
}

function mappingEntries(
  value: Record<string, unknown> | Map<unknown, unknown>,
): Array<[string, unknown]> {
  if (value instanceof Map) {
    return [...value.entries()].map(([key, v]): [string, unknown] => [String(key), v]);
  }
  return Object.entries(value);
}

export function objectEntries(value: object): Array<[string, unknown]> {
  return Object.entries(value);
}

export function classifyRecord(record: unknown): RecordShape {
  if (isMapping(record)) {
    return { kind: "mapping", entries: mappingEntries(record) };
  }
  if (Array.isArray(record)) {
    return { kind: "sequence", values: record };
  }
  if (isNamedFieldObject(record)) {
    return { kind: "object", entries: objectEntries(record) };
  }
  return { kind: "scalar", value: record };
}

function compareKeys(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

/**
 * Puts a record into the shape inference expects: mappings get their keys
 * sorted (code-unit order) so field order does not depend on insertion order.
 */
export function normalizeRecord(record: unknown): RecordShape {
  const shape = classifyRecord(record);
  switch (shape.kind) {
    case "mapping":
      return {
        kind: "mapping",
        entries: [...shape.entries].sort(([a], [b]) => compareKeys(a, b)),
      };
    default:
      return shape;
  }
}

/**
 * Short runtime description used in error extensions.
 */
export function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  if (typeof value === "object") {
    const name: unknown = Object.getPrototypeOf(value)?.constructor?.name;
    return typeof name === "string" && name.length > 0 ? name : "object";
  }
  return typeof value;
}
