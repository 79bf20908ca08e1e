import { MissingEnvironmentVariableError } from "./errors";

const PLACEHOLDER_PATTERN = /\$\{([A-Z0-9_]+)\}/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") {
    return false;
  }

  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Replaces `${NAME}` references in every string of a parsed document with
 * values from `env`. `path` names the location for error messages, e.g.
 * `config.request_headers.Authorization`.
 */
export function resolvePlaceholders(value: unknown, env: NodeJS.ProcessEnv, path: string): unknown {
  if (typeof value === "string") {
    return value.replace(PLACEHOLDER_PATTERN, (_match, variableName: string) => {
      const replacement = env[variableName];

      if (replacement === undefined) {
        throw new MissingEnvironmentVariableError(variableName, path);
      }

      return replacement;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => resolvePlaceholders(item, env, `${path}[${index}]`));
  }

  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, nested]) => [
        key,
        resolvePlaceholders(nested, env, `${path}.${key}`),
      ]),
    );
  }

  return value;
}
