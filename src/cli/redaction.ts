import type { CliParameters } from "../domain";
import { REDACTED_PLACEHOLDER, redactOptionalUrlCredentials } from "../redaction";

/**
 * Shallow copy of the CLI parameters with the proxy credentials masked, for
 * diagnostic logging.
 */
export function redactCliParameters(parameters: CliParameters): CliParameters {
  const redacted: CliParameters = { ...parameters };

  if (typeof parameters.proxy === "string") {
    redacted.proxy = redactOptionalUrlCredentials(parameters.proxy) ?? REDACTED_PLACEHOLDER;
  }

  return redacted;
}
