export {
  AppError,
  type AppErrorExtensions,
  type ErrorContext,
} from "./app-error";
export { ErrorCode } from "./error-codes";
export { ErrorMessages } from "./error-messages";
export { getErrorTitle, isTerminal } from "./error-policy";
export { toAppError } from "./wrap-error";
