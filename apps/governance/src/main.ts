import "reflect-metadata";

import { describeError } from "@dbx-governance/backend-shared";
import { Logger as NestLogger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { Logger } from "nestjs-pino";
import { resolve } from "node:path";

import { AppModule } from "./app.module";
import { parseCliArgs, resolveFeaturePaths } from "./cli-args";
import { GovernanceRunService } from "./scenarios/governance-run.service";

const DEFAULT_FEATURES_DIR = resolve(__dirname, "../features");

async function bootstrap(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(app.get(Logger));

  try {
    const paths = await resolveFeaturePaths(
      args.features.length > 0 ? args.features : [DEFAULT_FEATURES_DIR],
    );
    const summary = await app.get(GovernanceRunService).run(paths, { tags: args.tags });
    return summary.failed > 0 ? 1 : 0;
  } finally {
    await app.close();
  }
}

bootstrap()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    new NestLogger("GovernanceBootstrap").error(describeError(error));
    process.exitCode = 2;
  });
