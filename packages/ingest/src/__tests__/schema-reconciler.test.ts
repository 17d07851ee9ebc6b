import { ErrorCode } from "@colframe/shared";
import { captureAppError } from "@colframe/test-utils";
import { describe, expect, it } from "vitest";

import { buildColumnarTable, columnNames } from "../columnar";
import { reconcileSchema } from "../schema-reconciler";
import { longType, stringType, structField, structType } from "../types";

function pair() {
  const schema = structType([structField("a", longType), structField("b", stringType)]);
  const table = buildColumnarTable(
    [
      { name: "a", type: longType, nullable: true, values: [1n] },
      { name: "b", type: stringType, nullable: true, values: ["x"] },
    ],
    1,
  );
  return { table, schema };
}

describe("reconcileSchema", () => {
  it("returns a consistent pair unchanged", () => {
    const input = pair();

    const result = reconcileSchema(input);

    expect(result.table).toBe(input.table);
    expect(result.schema).toBe(input.schema);
  });

  it("renames the table and the schema together", () => {
    const result = reconcileSchema(pair(), {
      expectedColumnCount: 2,
      columnNames: ["id", "label"],
    });

    expect(columnNames(result.table)).toEqual(["id", "label"]);
    expect(result.schema).toEqual(
      structType([structField("id", longType), structField("label", stringType)]),
    );
  });

  it("is idempotent", () => {
    const expectation = { expectedColumnCount: 2, columnNames: ["id", "label"] };
    const once = reconcileSchema(pair(), expectation);

    const twice = reconcileSchema(once, expectation);

    expect(twice.table).toBe(once.table);
    expect(twice.schema).toBe(once.schema);
  });

  it("rejects a declared column count the table does not have", () => {
    const error = captureAppError(() =>
      reconcileSchema(pair(), { expectedColumnCount: 3, columnNames: ["p", "q", "r"] }),
    );

    expect(error.code).toBe(ErrorCode.AXIS_LENGTH_MISMATCH);
    expect(error.extensions).toEqual({ expectedLength: 3, actualLength: 2 });
  });

  it("rejects a schema whose field count differs from the table", () => {
    const { table } = pair();

    const error = captureAppError(() =>
      reconcileSchema({ table, schema: structType([structField("a", longType)]) }),
    );

    expect(error.extensions).toEqual({ expectedLength: 1, actualLength: 2 });
  });
});
