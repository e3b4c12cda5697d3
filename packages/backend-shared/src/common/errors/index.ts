export {
  AppError,
  type AppErrorExtensions,
  type ErrorContext,
} from "./app-error";
export { ErrorCode } from "./error-codes";
export { ErrorMessages } from "./error-messages";
export { isUnrecoverable } from "./error-policy";
export { errorLogFields, type ErrorLogFields, scrubLogValue } from "./log-fields";
export { describeError, toAppError } from "./wrap-error";
