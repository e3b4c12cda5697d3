import { describe, expect, it } from "vitest";

import { ErrorCode } from "../common/errors";
import { ident, quoteIdentifier, sql } from "./sql";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("quoteIdentifier", () => {
  it("wraps names in backticks", () => {
    expect(quoteIdentifier("test_clustering")).toBe("`test_clustering`");
  });

  it("doubles embedded backticks", () => {
    expect(quoteIdentifier("a`b")).toBe("`a``b`");
  });

  it.each(["", "   ", "bad\nname"])("rejects %j", (name) => {
    expect(captureError(() => quoteIdentifier(name))).toMatchObject({
      code: ErrorCode.VALIDATION_ERROR,
    });
  });
});

describe("sql", () => {
  it("inlines identifiers as quoted dotted names", () => {
    const statement = sql`DESCRIBE DETAIL ${ident("workspace", "s", "t")}`;

    expect(statement.text).toBe("DESCRIBE DETAIL `workspace`.`s`.`t`");
    expect(statement.parameters).toEqual([]);
  });

  it("binds values as named parameters", () => {
    const statement = sql`SELECT 1 FROM x WHERE a = ${"o'hara"} AND b = ${3} AND c = ${true} AND d = ${1.5}`;

    expect(statement.text).toBe(
      "SELECT 1 FROM x WHERE a = :p0 AND b = :p1 AND c = :p2 AND d = :p3",
    );
    expect(statement.parameters).toEqual([
      { name: "p0", value: "o'hara", type: "STRING" },
      { name: "p1", value: "3", type: "BIGINT" },
      { name: "p2", value: "true", type: "BOOLEAN" },
      { name: "p3", value: "1.5", type: "DOUBLE" },
    ]);
  });

  it("binds null without a value", () => {
    expect(sql`SELECT ${null}`.parameters).toEqual([
      { name: "p0", type: "STRING" },
    ]);
  });

  it("keeps injection attempts out of the statement text", () => {
    const statement = sql`SHOW TABLES IN ${ident("main", "x; DROP SCHEMA y")}`;

    expect(statement.text).toBe("SHOW TABLES IN `main`.`x; DROP SCHEMA y`");
  });

  it("renders identifiers for messages without quotes", () => {
    expect(String(ident("a", "b", "c"))).toBe("a.b.c");
  });
});
