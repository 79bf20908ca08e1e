import Ajv, { type ErrorObject } from "ajv";
import ajvErrors from "ajv-errors";
import addFormats from "ajv-formats";
import addKeywords from "ajv-keywords";

import { ConfigValidationError } from "./errors";
import { sitecheckConfigSchema } from "./schema";
import type { RawSitecheckFile } from "./types";

const ajv = new Ajv({
  allErrors: true,
  strict: false,
  messages: true,
  coerceTypes: true,
});

addFormats(ajv, ["uri"]);
addKeywords(ajv, ["transform"]);
ajvErrors(ajv, { singleError: false });

const validateFn = ajv.compile<RawSitecheckFile>(sitecheckConfigSchema);

function toPointer(instancePath: string): string {
  if (!instancePath) {
    return "config";
  }

  const segments = instancePath
    .split("/")
    .filter(Boolean)
    .map((segment) => segment.replaceAll("~1", "/").replaceAll("~0", "~"));

  return `config${segments
    .map((segment) => (/^\d+$/.test(segment) ? `[${segment}]` : `.${segment}`))
    .join("")}`;
}

function formatErrors(errors: ErrorObject[]): string {
  return errors
    .map((error) => `${toPointer(error.instancePath)}: ${error.message ?? "is invalid"}`)
    .join("\n");
}

/**
 * Validates a parsed configuration document in place. String list entries are
 * trimmed as a side effect of the schema's `transform` keyword.
 */
export function validateSitecheckConfig(payload: unknown): asserts payload is RawSitecheckFile {
  if (!validateFn(payload)) {
    throw new ConfigValidationError(formatErrors(validateFn.errors ?? []));
  }
}
