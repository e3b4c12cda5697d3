/**
 * In-process Databricks workspace served through msw.
 *
 * Understands the statements the governance suite issues (metadata reads and
 * the setup/teardown DDL) plus the Jobs, Clusters and OAuth endpoints. State
 * lives in memory; DDL statements mutate it.
 */

import type {
  CellValue,
  ClusterSummary,
  Job,
  StatementResponse,
} from "@dbx-governance/backend-shared";
import { http, HttpResponse } from "msw";
import type { HttpHandler } from "msw";
import { z } from "zod";

export const FAKE_WORKSPACE_HOST = "https://fake-workspace.cloud.databricks.com";

export interface FakeColumn {
  name: string;
  dataType: string;
  comment?: string | null;
}

export interface FakeHistoryEntry {
  version: number;
  timestamp: string;
  operation: string;
}

export interface FakeTable {
  catalog: string;
  schema: string;
  name: string;
  comment?: string | null;
  clusteringColumns?: string[];
  clusterByAuto?: boolean;
  partitionColumns?: string[];
  /** Number of rows SHOW PARTITIONS returns. */
  partitionCount?: number;
  properties?: Record<string, string>;
  columns?: FakeColumn[];
  history?: FakeHistoryEntry[];
  numFiles?: number;
  sizeInBytes?: number;
  createdAt?: string;
  /** `null` renders as SQL NULL; undefined falls back to createdAt. */
  lastModified?: string | null;
  managedLocation?: boolean;
}

export interface FakeWorkspaceOptions {
  host?: string;
  /** Polls a statement stays RUNNING before it finishes. */
  pendingPolls?: number;
  /** Rows per result chunk; all rows in one chunk when unset. */
  chunkSize?: number;
}

export interface SubmittedStatement {
  text: string;
  parameters: Record<string, string | undefined>;
  catalog?: string;
  schema?: string;
}

interface QueryResult {
  columns: string[];
  rows: CellValue[][];
}

interface StoredStatement {
  id: string;
  result: QueryResult | undefined;
  error: string | undefined;
  pollsRemaining: number;
  canceled: boolean;
}

const submitSchema = z.object({
  statement: z.string(),
  warehouse_id: z.string(),
  catalog: z.string().optional(),
  schema: z.string().optional(),
  parameters: z
    .array(z.object({ name: z.string(), value: z.string().optional() }))
    .optional(),
});

const DETAIL_COLUMNS = [
  "format",
  "id",
  "name",
  "description",
  "location",
  "createdAt",
  "lastModified",
  "partitionColumns",
  "clusteringColumns",
  "numFiles",
  "sizeInBytes",
  "properties",
  "minReaderVersion",
  "minWriterVersion",
  "clusterByAuto",
];

const NAME = "((?:`(?:[^`]|``)+`)(?:\\.`(?:[^`]|``)+`)*)";
const DEFAULT_TIMESTAMP = "2024-01-01T00:00:00.000Z";

class StatementFailure extends Error {}

function pattern(source: string): RegExp {
  return new RegExp(`^${source}$`, "is");
}

function splitName(raw: string): string[] {
  return [...raw.matchAll(/`((?:[^`]|``)+)`/g)].map((m) =>
    (m[1] ?? "").replace(/``/g, "`"),
  );
}

function tableKey(catalog: string, schema: string, table: string): string {
  return `${catalog}.${schema}.${table}`;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim().replace(/^`|`$/g, ""))
    .filter((item) => item.length > 0);
}

export class FakeWorkspace {
  readonly submitted: SubmittedStatement[] = [];
  readonly cancelled: string[] = [];
  readonly authorizationHeaders: string[] = [];
  tokenRequests = 0;

  private readonly schemas = new Map<string, Set<string>>();
  private readonly tables = new Map<string, FakeTable>();
  private readonly jobs: Job[] = [];
  private readonly clusters: ClusterSummary[] = [];
  private readonly statementFailures: Array<{ match: RegExp; message: string }> = [];
  private readonly requestFailures = new Map<
    string,
    { status: number; body: Record<string, unknown> }
  >();
  private readonly statements = new Map<string, StoredStatement>();
  private statementCounter = 0;

  private readonly routes: Array<{
    match: RegExp;
    run: (match: RegExpMatchArray, statement: SubmittedStatement) => QueryResult;
  }> = [
    { match: pattern("SELECT 1"), run: () => ({ columns: ["1"], rows: [["1"]] }) },
    { match: pattern(`SHOW SCHEMAS IN ${NAME}`), run: (m) => this.showSchemas(m) },
    { match: pattern(`SHOW TABLES IN ${NAME}`), run: (m) => this.showTables(m) },
    { match: pattern(`DESCRIBE DETAIL ${NAME}`), run: (m) => this.describeDetail(m) },
    { match: pattern(`SHOW TBLPROPERTIES ${NAME}`), run: (m) => this.showProperties(m) },
    { match: pattern(`DESCRIBE HISTORY ${NAME}`), run: (m) => this.describeHistory(m) },
    {
      match: pattern(`DESCRIBE TABLE EXTENDED ${NAME} AS JSON`),
      run: (m) => this.describeExtended(m),
    },
    { match: pattern(`SHOW PARTITIONS ${NAME}`), run: (m) => this.showPartitions(m) },
    {
      match: pattern(
        `SELECT column_name, data_type, comment FROM ${NAME} WHERE table_schema = :p0 AND table_name = :p1 ORDER BY ordinal_position`,
      ),
      run: (m, s) => this.selectColumns(m, s),
    },
    {
      match: pattern(`CREATE SCHEMA IF NOT EXISTS ${NAME}`),
      run: (m) => this.createSchema(m),
    },
    { match: pattern(`DROP TABLE IF EXISTS ${NAME}`), run: (m) => this.dropTable(m) },
    {
      match: pattern(`CREATE TABLE ${NAME} \\((.*?)\\)(.*)`),
      run: (m) => this.createTable(m),
    },
    {
      match: pattern(`DROP SCHEMA IF EXISTS ${NAME} CASCADE`),
      run: (m) => this.dropSchema(m),
    },
  ];

  constructor(private readonly options: FakeWorkspaceOptions = {}) {}

  get host(): string {
    return this.options.host ?? FAKE_WORKSPACE_HOST;
  }

  // ---------------------------------------------------------------------------
  // Seeding
  // ---------------------------------------------------------------------------

  addSchema(catalog: string, schema: string): this {
    const schemas = this.schemas.get(catalog) ?? new Set<string>();
    schemas.add(schema);
    this.schemas.set(catalog, schemas);
    return this;
  }

  addTable(table: FakeTable): this {
    this.addSchema(table.catalog, table.schema);
    this.tables.set(tableKey(table.catalog, table.schema, table.name), table);
    return this;
  }

  addJob(job: Job): this {
    this.jobs.push(job);
    return this;
  }

  addCluster(cluster: ClusterSummary): this {
    this.clusters.push(cluster);
    return this;
  }

  /** Statements whose text matches finish in FAILED with this message. */
  failStatement(match: RegExp, message: string): this {
    this.statementFailures.push({ match, message });
    return this;
  }

  /** Every request to this path answers with the given status and body. */
  failRequest(
    path: string,
    status: number,
    body: Record<string, unknown>,
  ): this {
    this.requestFailures.set(path, { status, body });
    return this;
  }

  hasTable(catalog: string, schema: string, table: string): boolean {
    return this.tables.has(tableKey(catalog, schema, table));
  }

  hasSchema(catalog: string, schema: string): boolean {
    return this.schemas.get(catalog)?.has(schema) ?? false;
  }

  getTable(catalog: string, schema: string, table: string): FakeTable | undefined {
    return this.tables.get(tableKey(catalog, schema, table));
  }

  // ---------------------------------------------------------------------------
  // msw handlers
  // ---------------------------------------------------------------------------

  handlers(): HttpHandler[] {
    const base = this.host;

    return [
      http.post(`${base}/oidc/v1/token`, () => {
        this.tokenRequests++;
        return HttpResponse.json({
          access_token: `fake-access-token-${this.tokenRequests}`,
          token_type: "Bearer",
          expires_in: 3600,
        });
      }),

      http.post(`${base}/api/2.0/sql/statements`, async ({ request }) => {
        const failure = this.intercept(request);
        if (failure) {
          return failure;
        }
        const body = submitSchema.parse(await request.json());
        return HttpResponse.json(this.submit(body));
      }),

      http.get<{ id: string }>(
        `${base}/api/2.0/sql/statements/:id`,
        ({ request, params }) => {
          const failure = this.intercept(request);
          if (failure) {
            return failure;
          }
          const stored = this.statements.get(params.id);
          if (!stored) {
            return this.notFound(`Statement ${params.id} not found.`);
          }
          if (stored.pollsRemaining > 0) {
            stored.pollsRemaining--;
          }
          return HttpResponse.json(this.render(stored));
        },
      ),

      http.post<{ id: string }>(
        `${base}/api/2.0/sql/statements/:id/cancel`,
        ({ request, params }) => {
          const failure = this.intercept(request);
          if (failure) {
            return failure;
          }
          const stored = this.statements.get(params.id);
          if (stored) {
            stored.canceled = true;
          }
          this.cancelled.push(params.id);
          return HttpResponse.json({});
        },
      ),

      http.get<{ id: string; chunk: string }>(
        `${base}/api/2.0/sql/statements/:id/result/chunks/:chunk`,
        ({ request, params }) => {
          const failure = this.intercept(request);
          if (failure) {
            return failure;
          }
          const stored = this.statements.get(params.id);
          if (!stored?.result) {
            return this.notFound(`Statement ${params.id} has no result.`);
          }
          return HttpResponse.json(
            this.chunk(stored.result, Number.parseInt(params.chunk, 10)),
          );
        },
      ),

      http.get(`${base}/api/2.1/jobs/list`, ({ request }) => {
        const failure = this.intercept(request);
        if (failure) {
          return failure;
        }
        const url = new URL(request.url);
        const limit = Number.parseInt(url.searchParams.get("limit") ?? "20", 10);
        const offset = Number.parseInt(url.searchParams.get("page_token") ?? "0", 10);
        const page = this.jobs.slice(offset, offset + limit);
        const hasMore = offset + limit < this.jobs.length;
        return HttpResponse.json({
          jobs: page,
          has_more: hasMore,
          ...(hasMore ? { next_page_token: String(offset + limit) } : {}),
        });
      }),

      http.get(`${base}/api/2.1/jobs/get`, ({ request }) => {
        const failure = this.intercept(request);
        if (failure) {
          return failure;
        }
        const jobId = Number(new URL(request.url).searchParams.get("job_id"));
        const job = this.jobs.find((candidate) => candidate.job_id === jobId);
        return job
          ? HttpResponse.json(job)
          : this.notFound(`Job ${jobId} does not exist.`);
      }),

      http.get(`${base}/api/2.1/clusters/list`, ({ request }) => {
        const failure = this.intercept(request);
        if (failure) {
          return failure;
        }
        const url = new URL(request.url);
        const size = Number.parseInt(url.searchParams.get("page_size") ?? "100", 10);
        const offset = Number.parseInt(url.searchParams.get("page_token") ?? "0", 10);
        const hasMore = offset + size < this.clusters.length;
        return HttpResponse.json({
          clusters: this.clusters.slice(offset, offset + size),
          ...(hasMore ? { next_page_token: String(offset + size) } : {}),
        });
      }),
    ];
  }

  private intercept(request: Request) {
    this.authorizationHeaders.push(request.headers.get("authorization") ?? "");
    const failure = this.requestFailures.get(new URL(request.url).pathname);
    return failure
      ? HttpResponse.json(failure.body, { status: failure.status })
      : undefined;
  }

  private notFound(message: string) {
    return HttpResponse.json(
      { error_code: "RESOURCE_DOES_NOT_EXIST", message },
      { status: 404 },
    );
  }

  // ---------------------------------------------------------------------------
  // Statement lifecycle
  // ---------------------------------------------------------------------------

  private submit(body: z.infer<typeof submitSchema>): StatementResponse {
    const statement: SubmittedStatement = {
      text: body.statement.trim().replace(/\s+/g, " "),
      parameters: Object.fromEntries(
        (body.parameters ?? []).map((p) => [p.name, p.value]),
      ),
      catalog: body.catalog,
      schema: body.schema,
    };
    this.submitted.push(statement);

    this.statementCounter++;
    const stored: StoredStatement = {
      id: `stmt-${this.statementCounter}`,
      result: undefined,
      error: undefined,
      pollsRemaining: this.options.pendingPolls ?? 0,
      canceled: false,
    };

    try {
      stored.result = this.run(statement);
    } catch (error) {
      if (!(error instanceof StatementFailure)) {
        throw error;
      }
      stored.error = error.message;
    }

    this.statements.set(stored.id, stored);
    return this.render(stored);
  }

  private run(statement: SubmittedStatement): QueryResult {
    const failure = this.statementFailures.find((f) => f.match.test(statement.text));
    if (failure) {
      throw new StatementFailure(failure.message);
    }

    for (const route of this.routes) {
      const match = statement.text.match(route.match);
      if (match) {
        return route.run(match, statement);
      }
    }
    throw new StatementFailure(`[PARSE_SYNTAX_ERROR] Unsupported statement: ${statement.text}`);
  }

  private render(stored: StoredStatement): StatementResponse {
    if (stored.canceled) {
      return { statement_id: stored.id, status: { state: "CANCELED" } };
    }
    if (stored.pollsRemaining > 0) {
      return { statement_id: stored.id, status: { state: "RUNNING" } };
    }
    if (stored.error !== undefined || !stored.result) {
      return {
        statement_id: stored.id,
        status: {
          state: "FAILED",
          error: { error_code: "BAD_REQUEST", message: stored.error },
        },
      };
    }

    const result = stored.result;
    const chunkSize = this.chunkSize(result);
    return {
      statement_id: stored.id,
      status: { state: "SUCCEEDED" },
      manifest: {
        format: "JSON_ARRAY",
        schema: {
          column_count: result.columns.length,
          columns: result.columns.map((name, position) => ({ name, position })),
        },
        total_chunk_count: Math.max(1, Math.ceil(result.rows.length / chunkSize)),
        total_row_count: result.rows.length,
      },
      result: this.chunk(result, 0),
    };
  }

  private chunkSize(result: QueryResult): number {
    return this.options.chunkSize ?? Math.max(1, result.rows.length);
  }

  private chunk(result: QueryResult, index: number) {
    const size = this.chunkSize(result);
    const start = index * size;
    const rows = result.rows.slice(start, start + size);
    const hasNext = start + size < result.rows.length;
    return {
      chunk_index: index,
      row_offset: start,
      row_count: rows.length,
      data_array: rows,
      ...(hasNext ? { next_chunk_index: index + 1 } : {}),
    };
  }

  // ---------------------------------------------------------------------------
  // Statement semantics
  // ---------------------------------------------------------------------------

  private requireTable(raw: string | undefined): FakeTable {
    const parts = splitName(raw ?? "");
    const [catalog, schema, name] = parts;
    const table =
      parts.length === 3 && catalog && schema && name
        ? this.tables.get(tableKey(catalog, schema, name))
        : undefined;
    if (!table) {
      throw new StatementFailure(
        `[TABLE_OR_VIEW_NOT_FOUND] The table or view ${parts.join(".")} cannot be found.`,
      );
    }
    return table;
  }

  private showSchemas(match: RegExpMatchArray): QueryResult {
    const [catalog = ""] = splitName(match[1] ?? "");
    const schemas = this.schemas.get(catalog);
    if (!schemas) {
      throw new StatementFailure(`[NO_SUCH_CATALOG_EXCEPTION] Catalog '${catalog}' not found.`);
    }
    return {
      columns: ["databaseName"],
      rows: [...schemas].map((schema) => [schema]),
    };
  }

  private showTables(match: RegExpMatchArray): QueryResult {
    const [catalog = "", schema = ""] = splitName(match[1] ?? "");
    if (!this.hasSchema(catalog, schema)) {
      throw new StatementFailure(
        `[SCHEMA_NOT_FOUND] The schema \`${catalog}\`.\`${schema}\` cannot be found.`,
      );
    }
    const rows = [...this.tables.values()]
      .filter((table) => table.catalog === catalog && table.schema === schema)
      .map((table): CellValue[] => [schema, table.name, "false"]);
    return { columns: ["database", "tableName", "isTemporary"], rows };
  }

  private describeDetail(match: RegExpMatchArray): QueryResult {
    const table = this.requireTable(match[1]);
    const createdAt = table.createdAt ?? DEFAULT_TIMESTAMP;
    const lastModified =
      table.lastModified === undefined ? createdAt : table.lastModified;
    const row: CellValue[] = [
      "delta",
      `fake-${table.catalog}-${table.schema}-${table.name}`,
      tableKey(table.catalog, table.schema, table.name),
      table.comment ?? null,
      `s3://fake-bucket/${table.catalog}/${table.schema}/${table.name}`,
      createdAt,
      lastModified,
      JSON.stringify(table.partitionColumns ?? []),
      JSON.stringify(table.clusteringColumns ?? []),
      String(table.numFiles ?? 0),
      String(table.sizeInBytes ?? 0),
      JSON.stringify(table.properties ?? {}),
      "1",
      "2",
      String(table.clusterByAuto ?? false),
    ];
    return { columns: DETAIL_COLUMNS, rows: [row] };
  }

  private showProperties(match: RegExpMatchArray): QueryResult {
    const table = this.requireTable(match[1]);
    return {
      columns: ["key", "value"],
      rows: Object.entries(table.properties ?? {}).map(([key, value]) => [key, value]),
    };
  }

  private describeHistory(match: RegExpMatchArray): QueryResult {
    const table = this.requireTable(match[1]);
    const history = [...(table.history ?? [])].sort((a, b) => b.version - a.version);
    return {
      columns: ["version", "timestamp", "operation"],
      rows: history.map((entry) => [String(entry.version), entry.timestamp, entry.operation]),
    };
  }

  private describeExtended(match: RegExpMatchArray): QueryResult {
    const table = this.requireTable(match[1]);
    const managed = table.managedLocation ?? true;
    const metadata = {
      table_name: table.name,
      catalog_name: table.catalog,
      schema_name: table.schema,
      type: managed ? "MANAGED" : "EXTERNAL",
      is_managed_location: managed,
      columns: (table.columns ?? []).map((column) => ({
        name: column.name,
        type: { name: column.dataType.toLowerCase() },
        comment: column.comment ?? undefined,
      })),
    };
    return { columns: ["json_metadata"], rows: [[JSON.stringify(metadata)]] };
  }

  private showPartitions(match: RegExpMatchArray): QueryResult {
    const table = this.requireTable(match[1]);
    const partitionColumns = table.partitionColumns ?? [];
    if (partitionColumns.length === 0) {
      throw new StatementFailure(
        `[INVALID_PARTITION_OPERATION.PARTITION_SCHEMA_IS_EMPTY] Table ${table.name} is not partitioned.`,
      );
    }
    const rows: CellValue[][] = [];
    for (let i = 0; i < (table.partitionCount ?? 0); i++) {
      rows.push(partitionColumns.map((column) => `${column}-${i}`));
    }
    return { columns: partitionColumns, rows };
  }

  private selectColumns(
    match: RegExpMatchArray,
    statement: SubmittedStatement,
  ): QueryResult {
    const [catalog = ""] = splitName(match[1] ?? "");
    const schema = statement.parameters.p0 ?? "";
    const name = statement.parameters.p1 ?? "";
    const table = this.tables.get(tableKey(catalog, schema, name));
    return {
      columns: ["column_name", "data_type", "comment"],
      rows: (table?.columns ?? []).map((column) => [
        column.name,
        column.dataType,
        column.comment ?? null,
      ]),
    };
  }

  private createSchema(match: RegExpMatchArray): QueryResult {
    const [catalog = "", schema = ""] = splitName(match[1] ?? "");
    this.addSchema(catalog, schema);
    return { columns: [], rows: [] };
  }

  private dropTable(match: RegExpMatchArray): QueryResult {
    const [catalog = "", schema = "", name = ""] = splitName(match[1] ?? "");
    this.tables.delete(tableKey(catalog, schema, name));
    return { columns: [], rows: [] };
  }

  private createTable(match: RegExpMatchArray): QueryResult {
    const [catalog = "", schema = "", name = ""] = splitName(match[1] ?? "");
    if (!this.hasSchema(catalog, schema)) {
      throw new StatementFailure(`[SCHEMA_NOT_FOUND] The schema ${catalog}.${schema} cannot be found.`);
    }
    if (this.hasTable(catalog, schema, name)) {
      throw new StatementFailure(`[TABLE_OR_VIEW_ALREADY_EXISTS] ${catalog}.${schema}.${name}`);
    }

    const columns = splitList(match[2] ?? "").map((definition): FakeColumn => {
      const [columnName = "", ...type] = definition.split(/\s+/);
      return { name: columnName, dataType: type.join(" ").toUpperCase(), comment: null };
    });
    const clauses = match[3] ?? "";
    const clusterBy = clauses.match(/CLUSTER BY \(([^)]*)\)/i);
    const partitionedBy = clauses.match(/PARTITIONED BY \(([^)]*)\)/i);
    const comment = clauses.match(/COMMENT '((?:[^']|'')*)'/i);
    const tblProperties = clauses.match(/TBLPROPERTIES \((.*)\)/i);
    const properties: Record<string, string> = {};
    for (const pair of (tblProperties?.[1] ?? "").matchAll(
      /'([^']+)'\s*=\s*'?([^',)]+)'?/g,
    )) {
      properties[pair[1] ?? ""] = (pair[2] ?? "").trim();
    }

    this.addTable({
      catalog,
      schema,
      name,
      columns,
      comment: comment ? (comment[1] ?? "").replace(/''/g, "'") : null,
      clusteringColumns: clusterBy ? splitList(clusterBy[1] ?? "") : [],
      clusterByAuto: /CLUSTER BY AUTO/i.test(clauses),
      partitionColumns: partitionedBy ? splitList(partitionedBy[1] ?? "") : [],
      properties,
      history: [{ version: 0, timestamp: DEFAULT_TIMESTAMP, operation: "CREATE TABLE" }],
    });
    return { columns: [], rows: [] };
  }

  private dropSchema(match: RegExpMatchArray): QueryResult {
    const [catalog = "", schema = ""] = splitName(match[1] ?? "");
    for (const [key, table] of this.tables) {
      if (table.catalog === catalog && table.schema === schema) {
        this.tables.delete(key);
      }
    }
    this.schemas.get(catalog)?.delete(schema);
    return { columns: [], rows: [] };
  }
}
