import { describeError, errorLogFields } from "@dbx-governance/backend-shared";
import { Injectable, Logger } from "@nestjs/common";

import { GovernanceSettings } from "../config/governance-settings";
import type {
  Feature,
  FeatureReport,
  Scenario,
  ScenarioReport,
  StepReport,
} from "./feature.types";
import { ScenarioContext } from "./scenario-context";
import { StepRegistry } from "./step-registry";

export interface RunOptions {
  /** Only scenarios carrying one of these tags (feature tags count). */
  tags?: readonly string[];
}

function selected(scenario: Scenario, tags: readonly string[]): boolean {
  if (tags.length === 0) {
    return true;
  }
  return tags.some((tag) => scenario.tags.includes(tag));
}

/**
 * Runs scenarios step by step, each with a fresh context. After a failing
 * step the rest of the scenario is skipped.
 */
@Injectable()
export class ScenarioRunner {
  private readonly logger = new Logger(ScenarioRunner.name);

  constructor(
    private readonly registry: StepRegistry,
    private readonly settings: GovernanceSettings,
  ) {}

  async runFeature(feature: Feature, options: RunOptions = {}): Promise<FeatureReport> {
    const tags = options.tags ?? [];
    const scenarios: ScenarioReport[] = [];
    for (const scenario of feature.scenarios) {
      if (selected(scenario, tags)) {
        scenarios.push(await this.runScenario(feature, scenario));
      }
    }
    return { name: feature.name, uri: feature.uri, scenarios };
  }

  async runScenario(feature: Feature, scenario: Scenario): Promise<ScenarioReport> {
    const context = new ScenarioContext(scenario.name, this.settings.catalogSchema);
    const steps: StepReport[] = [];
    let failed = false;

    for (const step of scenario.steps) {
      if (failed) {
        steps.push({ keyword: step.keyword, text: step.text, status: "skipped" });
        continue;
      }
      try {
        const { handler, args } = this.registry.match(step.text);
        await handler(context, args);
        steps.push({ keyword: step.keyword, text: step.text, status: "passed" });
      } catch (error) {
        failed = true;
        const message = describeError(error);
        steps.push({
          keyword: step.keyword,
          text: step.text,
          status: "failed",
          error: message,
        });
        this.logger.error({
          message: "Step failed",
          feature: feature.name,
          scenario: scenario.name,
          step: `${step.keyword} ${step.text}`,
          line: step.line,
          ...errorLogFields(error),
        });
      }
    }

    const status = failed ? "failed" : "passed";
    this.logger.log({
      message: "Scenario finished",
      feature: feature.name,
      scenario: scenario.name,
      status,
    });
    return { feature: feature.name, name: scenario.name, status, steps };
  }
}
