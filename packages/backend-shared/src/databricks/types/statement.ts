import { z } from "zod";

export const statementStateSchema = z.enum([
  "PENDING",
  "RUNNING",
  "SUCCEEDED",
  "FAILED",
  "CANCELED",
  "CLOSED",
]);

export type StatementState = z.infer<typeof statementStateSchema>;

export const cellValueSchema = z.string().nullable();

export type CellValue = z.infer<typeof cellValueSchema>;

export const resultDataSchema = z.object({
  chunk_index: z.number().optional(),
  row_offset: z.number().optional(),
  row_count: z.number().optional(),
  data_array: z.array(z.array(cellValueSchema)).optional(),
  next_chunk_index: z.number().int().nonnegative().optional(),
});

export type ResultData = z.infer<typeof resultDataSchema>;

export const statementResponseSchema = z.object({
  statement_id: z.string(),
  status: z.object({
    state: statementStateSchema,
    error: z
      .object({
        error_code: z.string().optional(),
        message: z.string().optional(),
      })
      .optional(),
  }),
  manifest: z
    .object({
      format: z.string().optional(),
      schema: z
        .object({
          column_count: z.number().optional(),
          columns: z
            .array(
              z.object({
                name: z.string(),
                position: z.number().optional(),
                type_name: z.string().optional(),
                type_text: z.string().optional(),
              }),
            )
            .optional(),
        })
        .optional(),
      total_chunk_count: z.number().optional(),
      total_row_count: z.number().optional(),
      truncated: z.boolean().optional(),
    })
    .optional(),
  result: resultDataSchema.optional(),
});

export type StatementResponse = z.infer<typeof statementResponseSchema>;

export type StatementParameterType = "STRING" | "INT" | "BIGINT" | "DOUBLE" | "BOOLEAN";

export interface StatementParameter {
  name: string;
  /** Omitted value binds SQL NULL. */
  value?: string;
  type: StatementParameterType;
}

export interface ExecuteStatementRequest {
  statement: string;
  warehouse_id: string;
  catalog?: string;
  schema?: string;
  parameters?: StatementParameter[];
  wait_timeout: string;
  on_wait_timeout: "CONTINUE" | "CANCEL";
  format: "JSON_ARRAY";
  disposition: "INLINE";
}

/** Default catalog/schema the statement resolves unqualified names against. */
export interface StatementTarget {
  catalog?: string;
  schema?: string;
}

export type ResultRow = Record<string, CellValue>;

export interface StatementResult {
  statementId: string;
  columns: string[];
  rows: ResultRow[];
  dataArray: CellValue[][];
}
