import { ErrorCode } from "@colframe/shared";
import { assertDefined, captureAppError } from "@colframe/test-utils";
import * as arrow from "apache-arrow";
import { describe, expect, it } from "vitest";

import {
  buildColumnarTable,
  columnNames,
  emptyColumnarTable,
  renameColumns,
  toArrowType,
} from "../columnar";
import {
  arrayType,
  dayTimeIntervalType,
  decimalType,
  longType,
  mapType,
  stringType,
  structField,
  structType,
  timestampNtzType,
  timestampType,
} from "../types";

function sampleTable(): arrow.Table {
  return buildColumnarTable(
    [
      { name: "id", type: longType, nullable: false, values: [1n, 2n] },
      { name: "name", type: stringType, nullable: true, values: ["a", null] },
    ],
    2,
  );
}

describe("toArrowType", () => {
  it("maps atomic types", () => {
    expect(toArrowType(longType)).toBeInstanceOf(arrow.Int64);
    expect(toArrowType(stringType)).toBeInstanceOf(arrow.Utf8);
    expect(toArrowType(decimalType(12, 2))).toMatchObject({ precision: 12, scale: 2 });
    expect(toArrowType(dayTimeIntervalType)).toMatchObject({
      unit: arrow.TimeUnit.MICROSECOND,
    });
  });

  it("tags zoned timestamps with the session time zone only", () => {
    expect(toArrowType(timestampType, "Europe/Paris")).toMatchObject({
      unit: arrow.TimeUnit.MICROSECOND,
      timezone: "Europe/Paris",
    });
    expect(toArrowType(timestampNtzType, "Europe/Paris")).toMatchObject({
      timezone: null,
    });
  });

  it("maps nested types with element and entry fields", () => {
    const list = toArrowType(arrayType(longType));
    expect(list).toBeInstanceOf(arrow.List);
    expect(list.children[0]?.name).toBe("element");

    const map = toArrowType(mapType(stringType, longType));
    expect(map).toBeInstanceOf(arrow.Map_);
    expect(map.children[0]?.name).toBe("entries");
  });

  it("rejects types the columnar format cannot hold", () => {
    const wide = captureAppError(() => toArrowType(decimalType(40, 2)));
    expect(wide.code).toBe(ErrorCode.UNSUPPORTED_TYPE_FOR_ENCODING);
    expect(wide.extensions).toEqual({ dataType: "decimal(40,2)" });

    const structKey = structType([structField("k", longType)]);
    expect(captureAppError(() => toArrowType(mapType(structKey, longType))).code).toBe(
      ErrorCode.UNSUPPORTED_TYPE_FOR_ENCODING,
    );
  });
});

describe("buildColumnarTable", () => {
  it("writes one column per encoded column", () => {
    const table = sampleTable();

    expect(table.numRows).toBe(2);
    expect(columnNames(table)).toEqual(["id", "name"]);
    expect(table.schema.fields.map((f) => f.nullable)).toEqual([false, true]);

    const ids = table.getChild("id");
    const names = table.getChild("name");
    assertDefined(ids);
    assertDefined(names);
    expect([...ids]).toEqual([1n, 2n]);
    expect([...names]).toEqual(["a", null]);
  });

  it("writes struct values given positionally", () => {
    const point = structType([structField("x", longType), structField("label", stringType)]);
    const table = buildColumnarTable(
      [{ name: "p", type: point, nullable: true, values: [[3n, "c"]] }],
      1,
    );

    const column = table.getChild("p");
    assertDefined(column);
    expect(column.get(0)?.toJSON()).toEqual({ x: 3n, label: "c" });
  });

  it("keeps columns that share a name apart", () => {
    const table = buildColumnarTable(
      [
        { name: "x", type: longType, nullable: true, values: [1n] },
        { name: "x", type: stringType, nullable: true, values: ["u"] },
      ],
      1,
    );

    expect(columnNames(table)).toEqual(["x", "x"]);
    expect(table.numCols).toBe(2);
    expect(table.schema.fields.map((f) => String(f.type))).toEqual(["Int64", "Utf8"]);
    const first = table.getChildAt(0);
    const second = table.getChildAt(1);
    assertDefined(first);
    assertDefined(second);
    expect([...first]).toEqual([1n]);
    expect([...second]).toEqual(["u"]);
  });

  it("refuses columns of the wrong length", () => {
    expect(() =>
      buildColumnarTable(
        [{ name: "id", type: longType, nullable: true, values: [1n] }],
        2,
      ),
    ).toThrow(RangeError);
  });
});

describe("emptyColumnarTable", () => {
  it("keeps the schema with zero rows", () => {
    const table = emptyColumnarTable(
      structType([structField("a", longType), structField("b", stringType, false)]),
    );

    expect(table.numRows).toBe(0);
    expect(columnNames(table)).toEqual(["a", "b"]);
    expect(table.schema.fields[1]?.nullable).toBe(false);
  });
});

describe("renameColumns", () => {
  it("renames positionally and keeps the data", () => {
    const renamed = renameColumns(sampleTable(), ["key"]);

    expect(columnNames(renamed)).toEqual(["key", "name"]);
    const keys = renamed.getChild("key");
    assertDefined(keys);
    expect([...keys]).toEqual([1n, 2n]);
  });

  it("renames to repeated names without merging the columns", () => {
    const renamed = renameColumns(sampleTable(), ["x", "x"]);

    expect(columnNames(renamed)).toEqual(["x", "x"]);
    expect(renamed.schema.fields.map((f) => String(f.type))).toEqual(["Int64", "Utf8"]);
    const second = renamed.getChildAt(1);
    assertDefined(second);
    expect([...second]).toEqual(["a", null]);
  });
});
