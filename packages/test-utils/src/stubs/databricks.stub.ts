/**
 * Workspace service stubs for unit tests that wire services through
 * `Test.createTestingModule` with `useValue`.
 */

import { vi } from "vitest";

import { withOverrides } from "./with-overrides";

/** StatementExecutionService stub interface */
export interface StatementExecutionStub {
  execute: ReturnType<typeof vi.fn>;
  executeJson: ReturnType<typeof vi.fn>;
}

/** JobsService stub interface */
export interface JobsServiceStub {
  list: ReturnType<typeof vi.fn>;
  get: ReturnType<typeof vi.fn>;
}

/** ClustersService stub interface */
export interface ClustersServiceStub {
  list: ReturnType<typeof vi.fn>;
}

/** ConfigService stub interface */
export interface ConfigServiceStub {
  get: ReturnType<typeof vi.fn>;
}

export function createStatementExecutionStub(
  overrides?: Partial<StatementExecutionStub>,
): StatementExecutionStub {
  return withOverrides(
    {
      execute: vi.fn().mockResolvedValue({
        statementId: "stmt-1",
        columns: [],
        rows: [],
        dataArray: [],
      }),
      executeJson: vi.fn().mockResolvedValue({}),
    },
    overrides,
  );
}

export function createJobsServiceStub(
  overrides?: Partial<JobsServiceStub>,
): JobsServiceStub {
  return withOverrides(
    {
      list: vi.fn().mockResolvedValue([]),
      get: vi.fn(),
    },
    overrides,
  );
}

export function createClustersServiceStub(
  overrides?: Partial<ClustersServiceStub>,
): ClustersServiceStub {
  return withOverrides(
    {
      list: vi.fn().mockResolvedValue([]),
    },
    overrides,
  );
}

/**
 * ConfigService stand-in: `get(key, fallback)` returns the configured value
 * or the caller's fallback.
 */
export function createConfigServiceStub(
  values: Record<string, unknown> = {},
): ConfigServiceStub {
  return {
    get: vi.fn((key: string, fallback?: unknown) =>
      key in values ? values[key] : fallback,
    ),
  };
}
