import { ErrorCode } from "@colframe/shared";
import { captureAppError } from "@colframe/test-utils";
import { describe, expect, it } from "vitest";

import { normalizeRecord } from "../record-shape";
import {
  arrayType,
  booleanType,
  dateType,
  dayTimeIntervalType,
  decimalType,
  doubleType,
  intType,
  longType,
  mapType,
  stringType,
  structField,
  structType,
  timestampType,
} from "../types";
import { convertRecords, convertValue, decimalWords, recordValues } from "../value-converter";
import { DecimalValue, TimeDelta } from "../values";

describe("convertValue", () => {
  it("keeps 32-bit integers as numbers and widens 64-bit ones to bigint", () => {
    expect(convertValue(5, intType, "a")).toBe(5);
    expect(convertValue(5, longType, "a")).toBe(5n);
    expect(convertValue(7n, intType, "a")).toBe(7);
  });

  it("rejects integers that do not fit or are fractional", () => {
    const overflow = captureAppError(() => convertValue(2 ** 31, intType, "a"));
    expect(overflow.code).toBe(ErrorCode.INVALID_FIELD_VALUE);
    expect(overflow.extensions).toEqual({ field: "a", dataType: "int" });

    expect(captureAppError(() => convertValue(1.5, longType, "a")).code).toBe(
      ErrorCode.INVALID_FIELD_VALUE,
    );
  });

  it("accepts numbers and bigints for floating columns", () => {
    expect(convertValue(3n, doubleType, "a")).toBe(3);
    expect(captureAppError(() => convertValue("3", doubleType, "a")).code).toBe(
      ErrorCode.INVALID_FIELD_VALUE,
    );
  });

  it("renders scalars as strings", () => {
    expect(convertValue(true, stringType, "a")).toBe("true");
    expect(convertValue(12n, stringType, "a")).toBe("12");
    expect(convertValue(new DecimalValue(-1050n, 3), stringType, "a")).toBe("-1.050");
  });

  it("only accepts booleans for boolean columns", () => {
    expect(convertValue(false, booleanType, "a")).toBe(false);
    expect(captureAppError(() => convertValue(0, booleanType, "a")).code).toBe(
      ErrorCode.INVALID_FIELD_VALUE,
    );
  });

  it("rescales decimals with half-away-from-zero rounding", () => {
    expect(convertValue("1.005", decimalType(5, 2), "d")).toEqual(
      new Uint32Array([101, 0, 0, 0]),
    );
    expect(convertValue(-1, decimalType(5, 0), "d")).toEqual(
      new Uint32Array([0xffffffff, 0xffffffff, 0xffffffff, 0xffffffff]),
    );
  });

  it("rejects decimals beyond the column precision", () => {
    const error = captureAppError(() => convertValue(1000, decimalType(3, 0), "d"));
    expect(error.extensions).toEqual({ field: "d", dataType: "decimal(3,0)" });
  });

  it("converts dates and timestamps to epoch milliseconds", () => {
    const instant = new Date(Date.UTC(2024, 4, 1, 12, 30));

    expect(convertValue(instant, timestampType, "t")).toBe(instant.getTime());
    expect(convertValue(3, dateType, "d")).toBe(3 * 86_400_000);
  });

  it("converts durations to microseconds", () => {
    const delta = TimeDelta.of({ seconds: 2, milliseconds: 5 });

    expect(convertValue(delta, dayTimeIntervalType, "i")).toBe(2_005_000n);
  });

  it("enforces nullability", () => {
    expect(convertValue(undefined, longType, "a")).toBeNull();
    expect(captureAppError(() => convertValue(null, longType, "a", false)).code).toBe(
      ErrorCode.INVALID_FIELD_VALUE,
    );
  });

  it("converts nested arrays, maps and structs", () => {
    const struct = structType([structField("a", longType), structField("b", stringType)]);

    expect(convertValue([1, null], arrayType(intType), "xs")).toEqual([1, null]);
    expect(convertValue({ k: 1 }, mapType(stringType, longType), "m")).toEqual(
      new Map([["k", 1n]]),
    );
    expect(convertValue({ b: "x", a: 1 }, struct, "s")).toEqual([1n, "x"]);
    expect(convertValue([2, "y"], struct, "s")).toEqual([2n, "y"]);
  });

  it("reports the nested path of a bad value", () => {
    const struct = structType([structField("a", arrayType(longType))]);
    const error = captureAppError(() => convertValue({ a: [1, "two"] }, struct, "s"));

    expect(error.extensions).toEqual({ field: "s.a[1]", dataType: "bigint" });
  });
});

describe("decimalWords", () => {
  it("splits the unscaled value into little-endian 32-bit words", () => {
    expect(decimalWords(2n ** 32n + 7n)).toEqual(new Uint32Array([7, 1, 0, 0]));
  });
});

describe("recordValues / convertRecords", () => {
  const schema = structType([structField("a", longType), structField("b", stringType)]);

  it("reads mappings by name, sequences by position and scalars into the first field", () => {
    expect(recordValues(normalizeRecord({ b: "x", a: 1 }), schema)).toEqual([1, "x"]);
    expect(recordValues(normalizeRecord([2, "y"]), schema)).toEqual([2, "y"]);
    expect(recordValues(normalizeRecord(3), schema)).toEqual([3, undefined]);
  });

  it("produces one encoded column per field", () => {
    const columns = convertRecords(
      [normalizeRecord({ a: 1, b: "x" }), normalizeRecord([2, null])],
      schema,
    );

    expect(columns).toEqual([
      { name: "a", type: longType, nullable: true, values: [1n, 2n] },
      { name: "b", type: stringType, nullable: true, values: ["x", null] },
    ]);
  });
});
