import { Injectable, Logger } from "@nestjs/common";
import { readFile } from "node:fs/promises";

import { TestEnvironmentService } from "../environment/test-environment.service";
import { parseFeature } from "./feature-parser";
import type { FeatureReport } from "./feature.types";
import { ScenarioRunner } from "./scenario-runner";
import type { RunOptions } from "./scenario-runner";

export interface RunSummary {
  features: FeatureReport[];
  passed: number;
  failed: number;
}

/**
 * A full run: environment setup, every feature file in order, teardown.
 * Teardown runs even when setup fails part-way or a feature cannot be read
 * or parsed.
 */
@Injectable()
export class GovernanceRunService {
  private readonly logger = new Logger(GovernanceRunService.name);

  constructor(
    private readonly runner: ScenarioRunner,
    private readonly environment: TestEnvironmentService,
  ) {}

  async run(featurePaths: readonly string[], options: RunOptions = {}): Promise<RunSummary> {
    try {
      await this.environment.setUp();
      const features: FeatureReport[] = [];
      for (const path of featurePaths) {
        const feature = parseFeature(await readFile(path, "utf8"), path);
        features.push(await this.runner.runFeature(feature, options));
      }
      return this.summarize(features);
    } finally {
      await this.environment.tearDown();
    }
  }

  private summarize(features: FeatureReport[]): RunSummary {
    const scenarios = features.flatMap((feature) => feature.scenarios);
    const failed = scenarios.filter((scenario) => scenario.status === "failed");
    const summary = {
      features,
      passed: scenarios.length - failed.length,
      failed: failed.length,
    };

    this.logger.log({
      message: "Governance run finished",
      features: features.length,
      scenarios: scenarios.length,
      passed: summary.passed,
      failed: summary.failed,
    });
    for (const scenario of failed) {
      const step = scenario.steps.find((candidate) => candidate.status === "failed");
      this.logger.error({
        message: "Scenario failed",
        feature: scenario.feature,
        scenario: scenario.name,
        step: step ? `${step.keyword} ${step.text}` : undefined,
        error: step?.error,
      });
    }
    return summary;
  }
}
