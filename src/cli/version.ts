import { readFileSync } from "node:fs";

const PACKAGE_JSON_URL = new URL("../../package.json", import.meta.url);

export function readPackageVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(PACKAGE_JSON_URL, "utf8"));

  if (typeof parsed === "object" && parsed !== null) {
    const version: unknown = Reflect.get(parsed, "version");
    if (typeof version === "string") {
      return version;
    }
  }

  return "0.0.0";
}
