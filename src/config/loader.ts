import { promises as fs } from "node:fs";
import path from "node:path";
import { parse } from "yaml";

import { ConfigError } from "./errors";
import { resolvePlaceholders } from "./placeholders";
import type { RawSitecheckFile } from "./types";
import { validateSitecheckConfig } from "./validator";

export interface ParseConfigOptions {
  /** Source of `${NAME}` placeholder values. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

export interface LoadConfigOptions extends ParseConfigOptions {
  /** Base directory for a relative configuration path. */
  cwd?: string;
}

export interface LoadedSitecheckConfig {
  file: RawSitecheckFile;
  /** Absolute path the configuration was read from. */
  path: string;
  /** Directory relative `targets_file` entries are resolved against. */
  directory: string;
}

export function parseSitecheckConfig(
  content: string,
  options: ParseConfigOptions = {},
): RawSitecheckFile {
  let parsed: unknown;

  try {
    parsed = parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown parse error";
    throw new ConfigError(`Unable to parse configuration: ${message}`, { cause: error });
  }

  // An empty document is a configuration that relies on defaults only.
  const document = parsed ?? {};
  const withEnv = resolvePlaceholders(document, options.env ?? process.env, "config");

  validateSitecheckConfig(withEnv);

  return withEnv;
}

export async function loadSitecheckConfig(
  configPath: string,
  options: LoadConfigOptions = {},
): Promise<LoadedSitecheckConfig> {
  const absolutePath = path.resolve(options.cwd ?? process.cwd(), configPath);
  let raw: string;

  try {
    raw = await fs.readFile(absolutePath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown read error";
    throw new ConfigError(`Unable to read configuration at ${absolutePath}: ${message}`, {
      cause: error,
    });
  }

  return {
    file: parseSitecheckConfig(raw, { env: options.env }),
    path: absolutePath,
    directory: path.dirname(absolutePath),
  };
}
