import { EXIT_CODE_CONFIG_ERROR, EXIT_CODE_INTERNAL_ERROR, type ExitCode } from "../exit-codes";

export interface ErrorContext {
  target?: string;
  attempt?: number;
  index?: number;
}

export interface SitecheckErrorOptions {
  exitCode: ExitCode;
  context?: ErrorContext;
  cause?: unknown;
  name?: string;
}

function isFiniteInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

export function formatErrorMessageWithContext(message: string, context?: ErrorContext): string {
  if (!context) {
    return message;
  }

  const details: string[] = [];

  if (typeof context.target === "string" && context.target.length > 0) {
    details.push(`target=${context.target}`);
  }

  if (isFiniteInteger(context.index)) {
    details.push(`index=${context.index}`);
  }

  if (isFiniteInteger(context.attempt)) {
    details.push(`attempt=${context.attempt}`);
  }

  if (details.length === 0) {
    return message;
  }

  return `${message} (${details.join(", ")})`;
}

export class SitecheckError extends Error {
  readonly exitCode: ExitCode;
  readonly context?: ErrorContext;

  constructor(message: string, options: SitecheckErrorOptions) {
    const formatted = formatErrorMessageWithContext(message, options.context);
    super(formatted, options.cause !== undefined ? { cause: options.cause } : undefined);

    this.exitCode = options.exitCode;
    this.context = options.context;
    this.name = options.name ?? new.target.name;
  }
}

export interface UsageErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

export class UsageError extends SitecheckError {
  constructor(message: string, options: UsageErrorOptions = {}) {
    super(message, {
      exitCode: EXIT_CODE_CONFIG_ERROR,
      context: options.context,
      cause: options.cause,
      name: "UsageError",
    });
  }
}

export interface InternalErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * Raised when the engine breaks one of its own guarantees, e.g. a dispatched
 * target that never produced a result. Never caused by a target's behaviour.
 */
export class InternalError extends SitecheckError {
  constructor(message: string, options: InternalErrorOptions = {}) {
    super(message, {
      exitCode: EXIT_CODE_INTERNAL_ERROR,
      context: options.context,
      cause: options.cause,
      name: "InternalError",
    });
  }
}
