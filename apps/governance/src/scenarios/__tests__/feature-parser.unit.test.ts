import { ErrorCode } from "@dbx-governance/backend-shared";
import { describe, expect, it } from "vitest";

import { parseFeature } from "../feature-parser";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}

const SOURCE = `# governance checks
@tables @clustering
Feature: Table clustering
  Every table is clustered
  unless it is excluded.

  Background:
    Given I connect to the Databricks workspace

  @smoke
  Scenario: Clustered tables
    When I check all tables in "main.sales" are clustered or auto-clustered
    Then all tables should be clustered or auto-clustered

  Scenario: Excluded tables
    * I use the catalog schema "main.sales"
    But the table should not exist
`;

const CONNECT = { keyword: "Given", text: "I connect to the Databricks workspace", line: 8 };

describe("parseFeature", () => {
  it("folds the background into every scenario", () => {
    const feature = parseFeature(SOURCE, "features/clustering.feature");

    expect(feature).toEqual({
      name: "Table clustering",
      uri: "features/clustering.feature",
      tags: ["@tables", "@clustering"],
      description: "Every table is clustered\nunless it is excluded.",
      scenarios: [
        {
          name: "Clustered tables",
          tags: ["@tables", "@clustering", "@smoke"],
          line: 11,
          steps: [
            CONNECT,
            {
              keyword: "When",
              text: 'I check all tables in "main.sales" are clustered or auto-clustered',
              line: 12,
            },
            {
              keyword: "Then",
              text: "all tables should be clustered or auto-clustered",
              line: 13,
            },
          ],
        },
        {
          name: "Excluded tables",
          tags: ["@tables", "@clustering"],
          line: 15,
          steps: [
            CONNECT,
            { keyword: "*", text: 'I use the catalog schema "main.sales"', line: 16 },
            { keyword: "But", text: "the table should not exist", line: 17 },
          ],
        },
      ],
    });
  });

  it("accepts Windows line endings and Example as a scenario", () => {
    const feature = parseFeature(
      "Feature: F\r\nExample: E\r\n  Given a step\r\n",
      "f.feature",
    );

    expect(feature.scenarios).toEqual([
      { name: "E", tags: [], line: 2, steps: [{ keyword: "Given", text: "a step", line: 3 }] },
    ]);
  });

  it("expands a scenario outline into one scenario per example row", () => {
    const feature = parseFeature(
      [
        "Feature: Outline",
        "  Scenario Outline: Vacuum within <days> days",
        "    Then each table should have a VACUUM operation within the last <days> days",
        "",
        "    Examples:",
        "      | days |",
        "      | 7    |",
        "      | 30   |",
      ].join("\n"),
      "outline.feature",
    );

    expect(feature.scenarios).toEqual([
      {
        name: "Vacuum within 7 days",
        tags: [],
        line: 7,
        steps: [
          {
            keyword: "Then",
            text: "each table should have a VACUUM operation within the last 7 days",
            line: 3,
          },
        ],
      },
      {
        name: "Vacuum within 30 days",
        tags: [],
        line: 8,
        steps: [
          {
            keyword: "Then",
            text: "each table should have a VACUUM operation within the last 30 days",
            line: 3,
          },
        ],
      },
    ]);
  });

  it("accepts a step followed by a data table", () => {
    const feature = parseFeature(
      [
        "Feature: Tables",
        "  Scenario: With a table",
        "    Given these tables:",
        "      | name   |",
        "      | orders |",
        "    Then the table should exist",
      ].join("\n"),
      "tables.feature",
    );

    expect(feature.scenarios[0]?.steps).toEqual([
      { keyword: "Given", text: "these tables:", line: 3 },
      { keyword: "Then", text: "the table should exist", line: 6 },
    ]);
  });

  it("inherits rule tags and backgrounds", () => {
    const feature = parseFeature(
      [
        "@tables",
        "Feature: Rules",
        "  Background:",
        "    Given a connection",
        "",
        "  @maintenance",
        "  Rule: Vacuum",
        "    Background:",
        "      Given the history is readable",
        "",
        "    Scenario: Recent vacuum",
        "      Then it passes",
      ].join("\n"),
      "rules.feature",
    );

    expect(feature.scenarios).toEqual([
      {
        name: "Recent vacuum",
        tags: ["@tables", "@maintenance"],
        line: 11,
        steps: [
          { keyword: "Given", text: "a connection", line: 4 },
          { keyword: "Given", text: "the history is readable", line: 9 },
          { keyword: "Then", text: "it passes", line: 12 },
        ],
      },
    ]);
  });

  it.each([
    ["a step before the Feature", "Given x\n", "(1:1): expected"],
    [
      "free text after a step",
      "Feature: F\nScenario: S\n  Given x\n  free text\n",
      "(4:3): expected",
    ],
  ])("rejects %s with its position", (_, source, position) => {
    const error = captureError(() => parseFeature(source, "f.feature"));

    expect(error).toMatchObject({
      code: ErrorCode.FEATURE_PARSE_FAILED,
      context: { statusMessage: expect.stringContaining(position) },
      extensions: { field: "f.feature" },
    });
  });

  it("rejects a file without a Feature", () => {
    const error = captureError(() => parseFeature("# only a comment\n", "f.feature"));

    expect(error).toMatchObject({
      code: ErrorCode.FEATURE_PARSE_FAILED,
      context: { statusMessage: "No Feature found" },
      extensions: { field: "f.feature" },
    });
  });
});
