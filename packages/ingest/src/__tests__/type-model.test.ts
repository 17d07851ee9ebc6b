import { ErrorCode } from "@colframe/shared";
import { captureAppError } from "@colframe/test-utils";
import { describe, expect, it } from "vitest";

import {
  asSchema,
  deduplicateFieldNames,
  findUnresolvedField,
  hasNullType,
  mergeTypes,
  simpleString,
  toDdl,
  toJson,
  typeEquals,
} from "../type-model";
import {
  arrayType,
  booleanType,
  byteType,
  type DataType,
  decimalType,
  doubleType,
  floatType,
  intType,
  longType,
  mapType,
  nullType,
  shortType,
  stringType,
  structField,
  structType,
  type StructType,
  timestampNtzType,
  timestampType,
} from "../types";

describe("simpleString", () => {
  it.each<[DataType, string]>([
    [nullType, "void"],
    [byteType, "tinyint"],
    [longType, "bigint"],
    [floatType, "float"],
    [decimalType(12, 2), "decimal(12,2)"],
    [timestampNtzType, "timestamp_ntz"],
    [arrayType(intType), "array<int>"],
    [mapType(stringType, doubleType), "map<string,double>"],
    [
      structType([structField("a", longType), structField("b", arrayType(stringType))]),
      "struct<a:bigint,b:array<string>>",
    ],
  ])("renders %o as %s", (type, expected) => {
    expect(simpleString(type)).toBe(expected);
  });
});

describe("toDdl", () => {
  it("renders a column list with nullability", () => {
    const schema = structType([
      structField("a", longType),
      structField("b", stringType, false),
      structField("c d", mapType(stringType, arrayType(intType))),
    ]);

    expect(toDdl(schema)).toBe(
      "a BIGINT, b STRING NOT NULL, `c d` MAP<STRING, ARRAY<INT>>",
    );
  });

  it("keeps nested field names as written", () => {
    const schema = structType([
      structField("s", structType([structField("Inner", booleanType, false)])),
    ]);

    expect(toDdl(schema)).toBe("s STRUCT<Inner: BOOLEAN NOT NULL>");
  });
});

describe("toJson", () => {
  it("serializes structs with empty metadata", () => {
    const schema = structType([
      structField("id", longType, false),
      structField("tags", arrayType(stringType, false)),
    ]);

    expect(toJson(schema)).toEqual({
      type: "struct",
      fields: [
        { name: "id", type: "bigint", nullable: false, metadata: {} },
        {
          name: "tags",
          type: { type: "array", elementType: "string", containsNull: false },
          nullable: true,
          metadata: {},
        },
      ],
    });
  });
});

describe("mergeTypes", () => {
  it("returns either side when the types are equal", () => {
    expect(mergeTypes(stringType, stringType)).toBe(stringType);
  });

  it("lets Null yield to the other side", () => {
    expect(mergeTypes(nullType, longType)).toEqual(longType);
    expect(mergeTypes(doubleType, nullType)).toEqual(doubleType);
  });

  it.each<[DataType, DataType, DataType]>([
    [byteType, intType, intType],
    [longType, doubleType, doubleType],
    [shortType, floatType, floatType],
    [intType, floatType, doubleType],
    [decimalType(5, 2), decimalType(10, 0), decimalType(12, 2)],
    [intType, decimalType(5, 2), decimalType(12, 2)],
    [decimalType(38, 10), decimalType(38, 20), decimalType(38, 20)],
    [decimalType(10, 2), doubleType, doubleType],
    [timestampNtzType, timestampType, timestampType],
  ])("promotes %o with %o", (a, b, expected) => {
    expect(mergeTypes(a, b)).toEqual(expected);
    expect(mergeTypes(b, a)).toEqual(expected);
  });

  it("merges struct fields by name, left order first", () => {
    const left = structType([structField("a", longType), structField("b", nullType)]);
    const right = structType([
      structField("c", stringType, false),
      structField("b", doubleType),
    ]);

    expect(mergeTypes(left, right)).toEqual(
      structType([
        structField("a", longType, true),
        structField("b", doubleType, true),
        structField("c", stringType, true),
      ]),
    );
  });

  it("is commutative up to struct field order", () => {
    const left = structType([structField("a", longType)]);
    const right = structType([structField("b", stringType)]);

    const forward = mergeTypes(left, right);
    const backward = mergeTypes(right, left);
    if (forward.kind !== "struct" || backward.kind !== "struct") {
      throw new Error("expected structs");
    }
    const byName = (t: StructType) =>
      [...t.fields].sort((x, y) => x.name.localeCompare(y.name));

    expect(byName(forward)).toEqual(byName(backward));
  });

  it("merges arrays and maps element-wise", () => {
    expect(mergeTypes(arrayType(nullType), arrayType(longType, false))).toEqual(
      arrayType(longType, true),
    );
    expect(
      mergeTypes(mapType(stringType, intType, false), mapType(stringType, longType, false)),
    ).toEqual(mapType(stringType, longType, false));
  });

  it("rejects incompatible types with both type strings", () => {
    const error = captureAppError(() => mergeTypes(longType, stringType, "age"));

    expect(error.code).toBe(ErrorCode.TYPE_MERGE_FAILED);
    expect(error.extensions).toEqual({
      leftType: "bigint",
      rightType: "string",
      field: "age",
    });
  });

  it("reports the nested field path on struct conflicts", () => {
    const left = structType([
      structField("outer", structType([structField("x", booleanType)])),
    ]);
    const right = structType([
      structField("outer", structType([structField("x", longType)])),
    ]);

    const error = captureAppError(() => mergeTypes(left, right));
    expect(error.extensions?.field).toBe("outer.x");
  });
});

describe("hasNullType / findUnresolvedField", () => {
  it("finds Null anywhere in the tree", () => {
    expect(hasNullType(arrayType(mapType(stringType, nullType)))).toBe(true);
    expect(hasNullType(arrayType(longType))).toBe(false);
  });

  it("returns the dotted path of the first unresolved field", () => {
    const schema = structType([
      structField("name", stringType),
      structField("address", structType([structField("zip", nullType)])),
      structField("age", nullType),
    ]);

    expect(findUnresolvedField(schema)).toBe("address.zip");
    expect(findUnresolvedField(structType([structField("a", longType)]))).toBeUndefined();
  });
});

describe("deduplicateFieldNames", () => {
  it("suffixes every duplicate, leaving unique names alone", () => {
    const schema = structType([
      structField("a", longType),
      structField("b", stringType),
      structField("a", doubleType),
    ]);

    expect(deduplicateFieldNames(schema)).toEqual(
      structType([
        structField("a_0", longType),
        structField("b", stringType),
        structField("a_1", doubleType),
      ]),
    );
  });

  it("applies inside nested types", () => {
    const inner = structType([structField("x", longType), structField("x", longType)]);

    expect(deduplicateFieldNames(arrayType(inner))).toEqual(
      arrayType(structType([structField("x_0", longType), structField("x_1", longType)])),
    );
  });
});

describe("asSchema / typeEquals", () => {
  it("wraps a non-struct type as a single value field", () => {
    expect(asSchema(longType)).toEqual(structType([structField("value", longType, true)]));
  });

  it("distinguishes nullability and field names", () => {
    const a = structType([structField("x", longType, true)]);
    expect(typeEquals(a, structType([structField("x", longType, false)]))).toBe(false);
    expect(typeEquals(a, structType([structField("y", longType, true)]))).toBe(false);
    expect(typeEquals(a, structType([structField("x", longType, true)]))).toBe(true);
  });
});
