/** A step as written, after background steps are folded into the scenario. */
export interface FeatureStep {
  /** `Given`, `When`, `Then`, `And`, `But` or `*`. */
  keyword: string;
  text: string;
  line: number;
}

/** One runnable scenario; an outline yields one per example row. */
export interface Scenario {
  name: string;
  tags: string[];
  line: number;
  steps: FeatureStep[];
}

export interface Feature {
  name: string;
  uri: string;
  tags: string[];
  description: string;
  scenarios: Scenario[];
}

export type StepStatus = "passed" | "failed" | "skipped";

export interface StepReport {
  keyword: string;
  text: string;
  status: StepStatus;
  error?: string;
}

export interface ScenarioReport {
  feature: string;
  name: string;
  status: "passed" | "failed";
  steps: StepReport[];
}

export interface FeatureReport {
  name: string;
  uri: string;
  scenarios: ScenarioReport[];
}
