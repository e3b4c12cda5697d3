import { AppError, ErrorCode } from "@dbx-governance/backend-shared";
import { readdir } from "node:fs/promises";
import { join, resolve } from "node:path";

export interface CliArgs {
  features: string[];
  tags: string[];
}

/**
 * `dbx-governance [--tags @a,@b] [feature files or directories...]`.
 * Arguments are returned as given; directories expand later.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const features: string[] = [];
  const tags: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--tags" || arg.startsWith("--tags=")) {
      const value = arg === "--tags" ? argv[++i] : arg.slice("--tags=".length);
      if (value === undefined || value.length === 0) {
        throw new AppError(
          ErrorCode.VALIDATION_ERROR,
          undefined,
          { statusMessage: "--tags needs a value" },
          { field: "--tags" },
        );
      }
      tags.push(
        ...value
          .split(",")
          .map((tag) => tag.trim())
          .filter((tag) => tag.length > 0)
          .map((tag) => (tag.startsWith("@") ? tag : `@${tag}`)),
      );
    } else if (arg.startsWith("--")) {
      throw new AppError(
        ErrorCode.VALIDATION_ERROR,
        undefined,
        { statusMessage: `Unknown option ${arg}` },
        { field: arg },
      );
    } else {
      features.push(arg);
    }
  }

  return { features, tags };
}

/** Expands directories to their `.feature` files, sorted by name. */
export async function resolveFeaturePaths(inputs: readonly string[]): Promise<string[]> {
  const paths: string[] = [];
  for (const input of inputs) {
    const absolute = resolve(input);
    if (absolute.endsWith(".feature")) {
      paths.push(absolute);
      continue;
    }
    const entries = await readdir(absolute);
    paths.push(
      ...entries
        .filter((entry) => entry.endsWith(".feature"))
        .sort()
        .map((entry) => join(absolute, entry)),
    );
  }
  return paths;
}
