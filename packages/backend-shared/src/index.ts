export {
  AppError,
  type AppErrorExtensions,
  describeError,
  ErrorCode,
  type ErrorContext,
  errorLogFields,
  type ErrorLogFields,
  ErrorMessages,
  isUnrecoverable,
  scrubLogValue,
  toAppError,
} from "./common/errors";
export * from "./config";
export * from "./databricks";
export * from "./logger";
