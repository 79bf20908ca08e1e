import { promises as fs } from "node:fs";

import { ConfigError } from "./config/errors";
import type { Target } from "./domain";

const COMMENT_PREFIX = "#";

/**
 * Parses a line-oriented target list: lines are trimmed, blank lines and lines
 * starting with `#` are dropped, order is preserved.
 */
export function parseTargetList(text: string): Target[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith(COMMENT_PREFIX));
}

export async function loadTargetList(path: string): Promise<Target[]> {
  let raw: string;

  try {
    raw = await fs.readFile(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown read error";
    throw new ConfigError(`Unable to read target list at ${path}: ${message}`, { cause: error });
  }

  return parseTargetList(raw);
}
