import { invalidInputType } from "../errors";
import {
  type DataType,
  byteType,
  doubleType,
  floatType,
  intType,
  longType,
  shortType,
} from "../types";

export type NumericTypedArray =
  | Int8Array
  | Uint8Array
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | BigInt64Array
  | Float32Array
  | Float64Array;

/**
 * Rectangular numeric array stored row-major in `data`.
 */
export interface NDArrayLike {
  readonly shape: readonly number[];
  readonly data: NumericTypedArray;
}

export function isNumericTypedArray(value: unknown): value is NumericTypedArray {
  return (
    value instanceof Int8Array ||
    value instanceof Uint8Array ||
    value instanceof Int16Array ||
    value instanceof Uint16Array ||
    value instanceof Int32Array ||
    value instanceof Uint32Array ||
    value instanceof BigInt64Array ||
    value instanceof Float32Array ||
    value instanceof Float64Array
  );
}

export function isNDArrayLike(value: unknown): value is NDArrayLike {
  return (
    typeof value === "object" &&
    value !== null &&
    "shape" in value &&
    Array.isArray(value.shape) &&
    value.shape.every((n: unknown) => typeof n === "number") &&
    "data" in value &&
    isNumericTypedArray(value.data)
  );
}

/**
 * Element type of a typed array; unsigned storage widens to the next signed
 * width.
 */
export function elementType(data: NumericTypedArray): DataType {
  if (data instanceof Int8Array) {
    return byteType;
  }
  if (data instanceof Uint8Array || data instanceof Int16Array) {
    return shortType;
  }
  if (data instanceof Uint16Array || data instanceof Int32Array) {
    return intType;
  }
  if (data instanceof Uint32Array || data instanceof BigInt64Array) {
    return longType;
  }
  return data instanceof Float32Array ? floatType : doubleType;
}

export class NDArray implements NDArrayLike {
  readonly shape: readonly number[];

  constructor(
    readonly data: NumericTypedArray,
    shape: readonly number[] = [data.length],
  ) {
    const size = shape.reduce((acc, n) => acc * n, 1);
    if (size !== data.length || shape.some((n) => !Number.isInteger(n) || n < 0)) {
      throw invalidInputType(data, "NDArray");
    }
    this.shape = [...shape];
  }

  /**
   * Builds a 2-D array from equal-length rows.
   */
  static fromRows(rows: readonly (readonly number[])[]): NDArray {
    const width = rows[0]?.length ?? 0;
    if (rows.some((row) => row.length !== width)) {
      throw invalidInputType(rows, "NDArray.fromRows");
    }
    return new NDArray(Float64Array.from(rows.flat()), [rows.length, width]);
  }

  get ndim(): number {
    return this.shape.length;
  }
}
