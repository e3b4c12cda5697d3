import { ErrorCode } from "@dbx-governance/backend-shared";
import { describe, expect, it, vi } from "vitest";

import { ScenarioContext } from "../scenario-context";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}

const clean = { failed: [], errors: [] };

describe("ScenarioContext", () => {
  it("starts on the configured catalog schema", () => {
    const context = new ScenarioContext("s", "main.sales");

    expect(context.catalogSchema).toBe("main.sales");
    expect(context.connected).toBe(false);
  });

  it("reuses a table check run with the same options", async () => {
    const context = new ScenarioContext("s", "main.sales");
    const run = vi.fn().mockResolvedValue({ failed: ["main.sales.a"], errors: [] });

    await context.ensureTableCheck("vacuum", "30", run);
    const second = await context.ensureTableCheck("vacuum", "30", run);

    expect(run).toHaveBeenCalledTimes(1);
    expect(second.failed).toEqual(["main.sales.a"]);
  });

  it("reruns a table check when its options or schema change", async () => {
    const context = new ScenarioContext("s", "main.sales");
    const run = vi.fn().mockResolvedValue(clean);

    await context.ensureTableCheck("vacuum", "30", run);
    await context.ensureTableCheck("vacuum", "7", run);
    context.catalogSchema = "main.finance";
    await context.ensureTableCheck("vacuum", "7", run);

    expect(run).toHaveBeenCalledTimes(3);
  });

  it("keeps the latest recorded outcome", async () => {
    const context = new ScenarioContext("s", "main.sales");
    const run = vi.fn();

    context.recordTableCheck("clustering", { failed: ["x"], errors: [] });
    context.recordTableCheck("clustering", clean);

    expect(context.requireTableCheck("clustering")).toEqual(clean);
    await expect(context.ensureTableCheck("clustering", undefined, run)).resolves.toEqual(clean);
    expect(run).not.toHaveBeenCalled();
  });

  it.each([
    ["table check 'documentation'", (c: ScenarioContext) => c.requireTableCheck("documentation")],
    ["job check 'cluster'", (c: ScenarioContext) => c.requireJobFailures("cluster")],
    ["job listing", (c: ScenarioContext) => c.requireJobs()],
    ["filtered job listing", (c: ScenarioContext) => c.requireFilteredJobs()],
    ["cluster listing", (c: ScenarioContext) => c.requireClusters()],
    ["table lookup", (c: ScenarioContext) => c.requireTableLookup()],
  ])("reports a missing %s", (what, read) => {
    const error = captureError(() => read(new ScenarioContext("s", "main.sales")));

    expect(error).toMatchObject({
      code: ErrorCode.SCENARIO_STATE_MISSING,
      context: { statusMessage: `No ${what} recorded` },
    });
  });
});
