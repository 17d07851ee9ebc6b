import { invalidInputType } from "../errors";
import { TimeDelta } from "../values";

/**
 * Native storage type of a frame column.
 */
export type StorageType =
  | "bool"
  | "int8"
  | "int16"
  | "int32"
  | "int64"
  | "float32"
  | "float64"
  | "string"
  | "binary"
  | "datetime64"
  | "datetime64tz"
  | "timedelta64"
  | "object";

/**
 * A table-like object with labelled columns and per-column storage types.
 */
export interface FrameLike {
  readonly columns: readonly (string | number)[];
  readonly dtypes: readonly StorageType[];
  readonly rowCount: number;
  column(index: number): readonly unknown[];
}

export function isFrameLike(value: unknown): value is FrameLike {
  return (
    typeof value === "object" &&
    value !== null &&
    "columns" in value &&
    Array.isArray(value.columns) &&
    "dtypes" in value &&
    Array.isArray(value.dtypes) &&
    "rowCount" in value &&
    typeof value.rowCount === "number" &&
    "column" in value &&
    typeof value.column === "function"
  );
}

function every(values: readonly unknown[], test: (v: unknown) => boolean): boolean {
  return values.length > 0 && values.every(test);
}

/**
 * Storage type a column of `values` would get; nulls are ignored and mixed
 * or empty columns are `object`.
 */
export function detectStorageType(values: readonly unknown[]): StorageType {
  const present = values.filter((v) => v !== null && v !== undefined);

  if (every(present, (v) => typeof v === "boolean")) {
    return "bool";
  }
  if (every(present, (v) => typeof v === "bigint")) {
    return "int64";
  }
  if (every(present, (v) => typeof v === "number")) {
    return present.every((v) => Number.isInteger(v)) ? "int64" : "float64";
  }
  if (every(present, (v) => typeof v === "string")) {
    return "string";
  }
  if (every(present, (v) => v instanceof Date)) {
    return "datetime64";
  }
  if (every(present, (v) => v instanceof TimeDelta)) {
    return "timedelta64";
  }
  if (every(present, (v) => v instanceof Uint8Array)) {
    return "binary";
  }
  return "object";
}

/**
 * In-memory column-oriented frame.
 *
 * @example
 * const frame = LocalFrame.fromColumns(
 *   { id: [1, 2], score: [0.5, 0.75] },
 *   { id: "int32" },
 * );
 */
export class LocalFrame implements FrameLike {
  private constructor(
    readonly columns: readonly (string | number)[],
    readonly dtypes: readonly StorageType[],
    private readonly data: readonly (readonly unknown[])[],
    readonly rowCount: number,
  ) {}

  static fromColumns(
    columns: Readonly<Record<string, readonly unknown[]>>,
    dtypes: Readonly<Record<string, StorageType>> = {},
  ): LocalFrame {
    const labels = Object.keys(columns);
    const data = labels.map((label) => [...(columns[label] ?? [])]);
    const rowCount = data[0]?.length ?? 0;

    if (data.some((values) => values.length !== rowCount)) {
      throw invalidInputType(columns, "LocalFrame.fromColumns");
    }

    return new LocalFrame(
      labels,
      labels.map((label, i) => dtypes[label] ?? detectStorageType(data[i] ?? [])),
      data,
      rowCount,
    );
  }

  column(index: number): readonly unknown[] {
    const values = this.data[index];
    if (!values) {
      throw new RangeError(`Column index ${index} out of range`);
    }
    return values;
  }
}
