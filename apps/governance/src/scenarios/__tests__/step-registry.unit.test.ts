import { AppError, ErrorCode } from "@dbx-governance/backend-shared";
import { describe, expect, it, vi } from "vitest";

import { StepArguments, StepRegistry } from "../step-registry";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}

describe("StepRegistry", () => {
  it("matches literal step text", () => {
    const handler = vi.fn();
    const registry = new StepRegistry().define("I connect to the Databricks workspace", handler);

    expect(registry.match("I connect to the Databricks workspace").handler).toBe(handler);
    expect(registry.size).toBe(1);
  });

  it("matches regex characters in the literal parts as text", () => {
    const registry = new StepRegistry().define(
      "each production job should have max_retries > 0",
      vi.fn(),
    );

    expect(() => registry.match("each production job should have max_retries > 0")).not.toThrow();
    expect(() => registry.match("each production job should have max_retries >= 0")).toThrow(
      AppError,
    );
  });

  it("extracts string, word and integer parameters in order", () => {
    const registry = new StepRegistry().define(
      "timeout {string} between {int} and {int} up to {word}",
      vi.fn(),
    );

    const { args } = registry.match('timeout "nightly load" between 300 and -5 up to 1GB');

    expect(args.length).toBe(4);
    expect(args.text(0)).toBe("nightly load");
    expect(args.int(1)).toBe(300);
    expect(args.int(2)).toBe(-5);
    expect(args.text(3)).toBe("1GB");
  });

  it("matches escaped parentheses literally", () => {
    const registry = new StepRegistry().define(
      "critical columns \\(containing {string}\\) must have descriptions",
      vi.fn(),
    );

    const { args } = registry.match(
      'critical columns (containing "email, ssn") must have descriptions',
    );

    expect(args.text(0)).toBe("email, ssn");
  });

  it.each(["within thirty days", "within 7.5 days", "within 1GB days"])(
    "does not match %j where an integer is expected",
    (text) => {
      const registry = new StepRegistry().define("within {int} days", vi.fn());

      const error = captureError(() => registry.match(text));

      expect(error).toMatchObject({
        code: ErrorCode.STEP_UNDEFINED,
        extensions: { field: text },
      });
    },
  );

  it("rejects asking for an argument the step does not have", () => {
    const registry = new StepRegistry().define("at least {int}%", vi.fn());
    const { args } = registry.match("at least 80%");

    const error = captureError(() => args.text(1));

    expect(error).toMatchObject({
      code: ErrorCode.VALIDATION_ERROR,
      context: { statusMessage: "Step has no argument 1" },
      extensions: { field: "at least 80%" },
    });
  });

  it("refuses to define the same expression twice", () => {
    const registry = new StepRegistry().define("the table should exist", vi.fn());

    expect(captureError(() => registry.define("the table should exist", vi.fn()))).toMatchObject({
      code: ErrorCode.STEP_AMBIGUOUS,
    });
  });

  it("reports steps matched by more than one definition", () => {
    const registry = new StepRegistry()
      .define("I check {string}", vi.fn())
      .define('I check "main.sales"', vi.fn());

    const error = captureError(() => registry.match('I check "main.sales"'));

    expect(error).toMatchObject({
      code: ErrorCode.STEP_AMBIGUOUS,
      context: { statusMessage: 'I check {string} | I check "main.sales"' },
    });
  });
});

describe("StepArguments", () => {
  it("reads integer text as a number", () => {
    expect(new StepArguments(["30", "-4"], "step").int(0)).toBe(30);
    expect(new StepArguments(["30", "-4"], "step").int(1)).toBe(-4);
  });

  it.each(["1GB", "7.5", "", " 7"])("reports %j read as an integer", (value) => {
    const args = new StepArguments([value], "size step");

    expect(captureError(() => args.int(0))).toMatchObject({
      code: ErrorCode.VALIDATION_ERROR,
      context: { statusMessage: `Argument 0 is not an integer: ${value}` },
      extensions: { field: "size step" },
    });
  });

  it("reports a fractional number read as an integer", () => {
    expect(captureError(() => new StepArguments([7.5], "step").int(0))).toMatchObject({
      code: ErrorCode.VALIDATION_ERROR,
      context: { statusMessage: "Argument 0 is not an integer: 7.5" },
    });
  });

  it("renders a number read as text", () => {
    expect(new StepArguments([80], "step").text(0)).toBe("80");
  });

  it("rejects a missing value read as text", () => {
    expect(captureError(() => new StepArguments([null], "step").text(0))).toMatchObject({
      code: ErrorCode.VALIDATION_ERROR,
      context: { statusMessage: "Argument 0 is not text" },
    });
  });
});
