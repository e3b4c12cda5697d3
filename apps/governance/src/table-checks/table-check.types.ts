import type { ErrorCode } from "@dbx-governance/backend-shared";

import type { TableCheckErrorMode } from "../config/governance-settings";
import type { TableDetail } from "./table-detail";
import type { TableRef } from "./table-ref";

export type TablePredicate = (
  detail: TableDetail,
  table: TableRef,
) => boolean | Promise<boolean>;

/** A table whose metadata or predicate threw; reported, never dropped. */
export interface TableCheckError {
  identifier: string;
  message: string;
  code?: ErrorCode;
}

export interface TableCheckOutcome {
  /** Fully-qualified names of non-compliant tables, sorted. */
  failed: string[];
  errors: TableCheckError[];
}

export interface ForEachTableOptions {
  concurrency?: number;
  errorMode?: TableCheckErrorMode;
}
