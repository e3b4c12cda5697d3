import type { ResultRow } from "@dbx-governance/backend-shared";

import type { FakeTable } from "../fake-workspace/fake-workspace";
import { getNextTableId } from "../setup/reset";

const MB = 1024 * 1024;

/**
 * A clustered, documented table with healthy file sizing
 * (10 files of 128MB) in `workspace.governance`.
 */
export function createFakeTable(overrides: Partial<FakeTable> = {}): FakeTable {
  const id = getNextTableId();
  return {
    catalog: "workspace",
    schema: "governance",
    name: `table_${id}`,
    comment: "Daily order facts",
    clusteringColumns: ["id"],
    clusterByAuto: false,
    partitionColumns: [],
    properties: {},
    columns: [
      { name: "id", dataType: "BIGINT", comment: "Surrogate key" },
      { name: "amount", dataType: "DOUBLE", comment: "Order amount" },
    ],
    history: [],
    numFiles: 10,
    sizeInBytes: 10 * 128 * MB,
    createdAt: "2024-01-01T00:00:00.000Z",
    managedLocation: true,
    ...overrides,
  };
}

/**
 * A `DESCRIBE DETAIL` row as the statement API returns it: every value a
 * string, arrays and maps JSON-encoded.
 */
export function createDescribeDetailRow(
  overrides: Partial<ResultRow> = {},
): ResultRow {
  const row: ResultRow = {
    format: "delta",
    id: "5e1f0b8a-0000-0000-0000-000000000001",
    name: "workspace.governance.orders",
    description: "Daily order facts",
    location: "s3://fake-bucket/workspace/governance/orders",
    createdAt: "2024-01-01T00:00:00.000Z",
    lastModified: "2024-01-02T00:00:00.000Z",
    partitionColumns: "[]",
    clusteringColumns: '["id"]',
    numFiles: "10",
    sizeInBytes: String(10 * 128 * MB),
    properties: "{}",
    minReaderVersion: "1",
    minWriterVersion: "2",
    clusterByAuto: "false",
  };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      row[key] = value;
    }
  }
  return row;
}
