import {
  CucumberExpression,
  ParameterTypeRegistry,
} from "@cucumber/cucumber-expressions";
import { AppError, ErrorCode } from "@dbx-governance/backend-shared";

import type { ScenarioContext } from "./scenario-context";

export type StepHandler = (
  context: ScenarioContext,
  args: StepArguments,
) => void | Promise<void>;

interface StepDefinition {
  expression: CucumberExpression;
  handler: StepHandler;
}

export interface StepMatch {
  expression: string;
  handler: StepHandler;
  args: StepArguments;
}

/** Anything that contributes step definitions. */
export interface StepBindings {
  register(registry: StepRegistry): void;
}

const INTEGER = /^-?\d+$/;

/**
 * Values captured by a step's parameters, in order. `{int}` arrives as a
 * number; `{string}` and `{word}` as text.
 */
export class StepArguments {
  constructor(
    private readonly values: readonly unknown[],
    private readonly step: string,
  ) {}

  get length(): number {
    return this.values.length;
  }

  text(index: number): string {
    const value = this.at(index);
    if (typeof value === "string") {
      return value;
    }
    if (typeof value === "number") {
      return String(value);
    }
    throw this.invalid(`Argument ${index} is not text`);
  }

  int(index: number): number {
    const value = this.at(index);
    if (typeof value === "number" && Number.isInteger(value)) {
      return value;
    }
    if (typeof value === "string" && INTEGER.test(value)) {
      return Number(value);
    }
    throw this.invalid(`Argument ${index} is not an integer: ${String(value)}`);
  }

  private at(index: number): unknown {
    if (index < 0 || index >= this.values.length) {
      throw this.invalid(`Step has no argument ${index}`);
    }
    return this.values[index];
  }

  private invalid(statusMessage: string): AppError {
    return new AppError(
      ErrorCode.VALIDATION_ERROR,
      undefined,
      { statusMessage },
      { field: this.step },
    );
  }
}

/**
 * Maps step text to handlers through Cucumber expressions. Keywords play no
 * part in matching, so a step can follow `Given`, `When`, `Then`, `And` or
 * `But`.
 */
export class StepRegistry {
  private readonly parameterTypes = new ParameterTypeRegistry();
  private readonly definitions: StepDefinition[] = [];

  define(expression: string, handler: StepHandler): this {
    if (this.definitions.some((definition) => definition.expression.source === expression)) {
      throw new AppError(
        ErrorCode.STEP_AMBIGUOUS,
        undefined,
        { statusMessage: `Step defined twice: ${expression}` },
        { field: expression },
      );
    }
    this.definitions.push({
      expression: new CucumberExpression(expression, this.parameterTypes),
      handler,
    });
    return this;
  }

  get size(): number {
    return this.definitions.length;
  }

  match(text: string): StepMatch {
    const matches: StepMatch[] = [];
    for (const { expression, handler } of this.definitions) {
      const found = expression.match(text);
      if (!found) {
        continue;
      }
      matches.push({
        expression: expression.source,
        handler,
        args: new StepArguments(
          found.map((argument) => argument.getValue<unknown>(null)),
          text,
        ),
      });
    }

    const [only, ...rest] = matches;
    if (!only) {
      throw new AppError(
        ErrorCode.STEP_UNDEFINED,
        undefined,
        { statusMessage: text },
        { field: text },
      );
    }
    if (rest.length > 0) {
      throw new AppError(
        ErrorCode.STEP_AMBIGUOUS,
        undefined,
        { statusMessage: matches.map((m) => m.expression).join(" | ") },
        { field: text },
      );
    }
    return only;
  }
}
