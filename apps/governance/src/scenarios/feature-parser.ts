import {
  AstBuilder,
  compile,
  GherkinClassicTokenMatcher,
  Parser,
} from "@cucumber/gherkin";
import { IdGenerator } from "@cucumber/messages";
import type * as messages from "@cucumber/messages";
import { AppError, ErrorCode } from "@dbx-governance/backend-shared";

import type { Feature, FeatureStep, Scenario } from "./feature.types";

interface StepSource {
  keyword: string;
  line: number;
}

/** Step keywords and source lines by AST node id. */
interface SourceIndex {
  steps: Map<string, StepSource>;
  lines: Map<string, number>;
}

function parseError(uri: string, detail: string, cause?: unknown): AppError {
  return new AppError(
    ErrorCode.FEATURE_PARSE_FAILED,
    cause,
    { statusMessage: detail },
    { field: uri },
  );
}

function indexSteps(steps: readonly messages.Step[], index: SourceIndex): void {
  for (const step of steps) {
    index.steps.set(step.id, { keyword: step.keyword.trim(), line: step.location.line });
  }
}

function indexScenario(scenario: messages.Scenario, index: SourceIndex): void {
  index.lines.set(scenario.id, scenario.location.line);
  indexSteps(scenario.steps, index);
  for (const examples of scenario.examples) {
    for (const row of examples.tableBody) {
      index.lines.set(row.id, row.location.line);
    }
  }
}

function indexFeature(feature: messages.Feature): SourceIndex {
  const index: SourceIndex = { steps: new Map(), lines: new Map() };
  const children = feature.children.flatMap(
    (child): Array<messages.FeatureChild | messages.RuleChild> =>
      child.rule ? [child, ...child.rule.children] : [child],
  );
  for (const child of children) {
    if (child.background) {
      indexSteps(child.background.steps, index);
    }
    if (child.scenario) {
      indexScenario(child.scenario, index);
    }
  }
  return index;
}

function toStep(step: messages.PickleStep, index: SourceIndex): FeatureStep {
  const source = index.steps.get(step.astNodeIds[0] ?? "");
  return {
    keyword: source?.keyword ?? "*",
    text: step.text,
    line: source?.line ?? 0,
  };
}

function toScenario(pickle: messages.Pickle, index: SourceIndex): Scenario {
  // Outline rows come last in astNodeIds, so an example points at its row.
  const lastNode = pickle.astNodeIds[pickle.astNodeIds.length - 1] ?? "";
  return {
    name: pickle.name,
    tags: pickle.tags.map((tag) => tag.name),
    line: index.lines.get(lastNode) ?? 0,
    steps: pickle.steps.map((step) => toStep(step, index)),
  };
}

function describeLines(text: string): string {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

/**
 * Parses a Gherkin feature file and compiles it into runnable scenarios:
 * background steps are folded in, outlines expand to one scenario per
 * example row, and scenario tags include the feature's and the rule's.
 */
export function parseFeature(source: string, uri: string): Feature {
  const newId = IdGenerator.incrementing();
  const parser = new Parser(new AstBuilder(newId), new GherkinClassicTokenMatcher());

  let document: messages.GherkinDocument;
  try {
    document = parser.parse(source);
  } catch (error) {
    throw parseError(uri, error instanceof Error ? error.message : String(error), error);
  }

  const feature = document.feature;
  if (!feature) {
    throw parseError(uri, "No Feature found");
  }

  const index = indexFeature(feature);
  const pickles = compile(document, uri, newId);
  return {
    name: feature.name,
    uri,
    tags: feature.tags.map((tag) => tag.name),
    description: describeLines(feature.description),
    scenarios: pickles.map((pickle) => toScenario(pickle, index)),
  };
}
