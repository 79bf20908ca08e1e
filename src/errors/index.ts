export type { ErrorContext, SitecheckErrorOptions, UsageErrorOptions, InternalErrorOptions } from "./base";
export { formatErrorMessageWithContext, InternalError, SitecheckError, UsageError } from "./base";
