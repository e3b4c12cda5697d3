import { Global, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { LoggerModule as PinoLoggerModule, type Params } from "nestjs-pino";

/**
 * Credential paths that must be redacted from logs.
 * Exported for testing to prevent regression.
 */
export const REDACTED_FIELD_PATHS = [
  "token",
  "accessToken",
  "access_token",
  "client_secret",
  "secret",
  "headers.Authorization",
  "headers.authorization",
] as const;

/**
 * Creates the pino configuration for the governance runner.
 *
 * Text format goes through pino-pretty for terminal runs; JSON is emitted
 * as-is for CI log collection.
 * Exported for testing.
 */
export function createPinoOptions(
  nodeEnv: string | undefined,
  logFormat: string | undefined,
  logLevel: string | undefined,
  serviceName: string | undefined,
): Params {
  const isProduction = nodeEnv === "production";
  const useJson = logFormat === "json" || isProduction;

  return {
    pinoHttp: {
      level: logLevel ?? (isProduction ? "info" : "debug"),
      transport: useJson
        ? undefined
        : {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
      redact: {
        paths: [...REDACTED_FIELD_PATHS],
        censor: "[REDACTED]",
      },
      base: { service: serviceName ?? "dbx-governance" },
      autoLogging: false,
    },
  };
}

@Global()
@Module({
  imports: [
    PinoLoggerModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        createPinoOptions(
          config.get<string>("NODE_ENV"),
          config.get<string>("LOG_FORMAT"),
          config.get<string>("LOG_LEVEL"),
          config.get<string>("SERVICE_NAME"),
        ),
    }),
  ],
  exports: [PinoLoggerModule],
})
export class LoggerModule {}
