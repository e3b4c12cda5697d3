import { AppError, ErrorCode } from "../common/errors";
import type {
  StatementParameter,
  StatementParameterType,
} from "./types/statement";

const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;

/**
 * A statement ready for submission: the text carries `:pN` parameter markers,
 * `parameters` carries their values.
 */
export interface SqlStatement {
  readonly text: string;
  readonly parameters: readonly StatementParameter[];
}

/** Dotted object name, rendered as backtick-quoted parts. */
export class SqlIdentifier {
  readonly parts: readonly string[];

  constructor(parts: readonly string[]) {
    if (parts.length === 0) {
      throw new AppError(ErrorCode.VALIDATION_ERROR, undefined, undefined, {
        violations: ["Identifier must have at least one part"],
      });
    }
    parts.forEach(assertIdentifierPart);
    this.parts = parts;
  }

  toSql(): string {
    return this.parts.map(quoteIdentifier).join(".");
  }

  toString(): string {
    return this.parts.join(".");
  }
}

export type SqlValue = string | number | boolean | null;

function assertIdentifierPart(part: string): void {
  if (part.trim().length === 0 || CONTROL_CHARACTERS.test(part)) {
    throw new AppError(
      ErrorCode.VALIDATION_ERROR,
      undefined,
      { identifier: part },
      {
        violations: ["Identifier parts must be non-empty printable text"],
        field: "identifier",
      },
    );
  }
}

export function quoteIdentifier(part: string): string {
  assertIdentifierPart(part);
  return `\`${part.replace(/`/g, "``")}\``;
}

export function ident(...parts: string[]): SqlIdentifier {
  return new SqlIdentifier(parts);
}

function toParameter(name: string, value: SqlValue): StatementParameter {
  if (value === null) {
    return { name, type: "STRING" };
  }

  let type: StatementParameterType;
  switch (typeof value) {
    case "boolean":
      type = "BOOLEAN";
      break;
    case "number":
      type = Number.isInteger(value) ? "BIGINT" : "DOUBLE";
      break;
    default:
      type = "STRING";
  }
  return { name, value: String(value), type };
}

/**
 * Tagged template for SQL. Interpolated identifiers are quoted inline;
 * every other value becomes a named parameter marker.
 *
 * @example
 * ```typescript
 * sql`SELECT * FROM ${ident(catalog, "information_schema", "columns")}
 *     WHERE table_name = ${table}`
 * ```
 */
export function sql(
  strings: TemplateStringsArray,
  ...values: Array<SqlIdentifier | SqlValue>
): SqlStatement {
  const parameters: StatementParameter[] = [];
  let text = strings[0] ?? "";

  values.forEach((value, index) => {
    if (value instanceof SqlIdentifier) {
      text += value.toSql();
    } else {
      const name = `p${parameters.length}`;
      parameters.push(toParameter(name, value));
      text += `:${name}`;
    }
    text += strings[index + 1] ?? "";
  });

  return { text, parameters };
}
