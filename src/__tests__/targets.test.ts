import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";

import { ConfigError } from "../config";
import { loadTargetList, parseTargetList } from "../targets";

describe("parseTargetList", () => {
  it("trims lines, drops blanks and comments, keeps order", () => {
    const text = [
      "# production sites",
      "  https://b.example.com  ",
      "",
      "https://a.example.com",
      "   ",
      "\t# disabled: https://c.example.com",
      "http://plain.example.com",
    ].join("\n");

    expect(parseTargetList(text)).toEqual([
      "https://b.example.com",
      "https://a.example.com",
      "http://plain.example.com",
    ]);
  });

  it("accepts windows line endings", () => {
    expect(parseTargetList("https://a.test\r\nhttps://b.test\r\n")).toEqual([
      "https://a.test",
      "https://b.test",
    ]);
  });

  it("keeps duplicates", () => {
    expect(parseTargetList("https://a.test\nhttps://a.test")).toEqual([
      "https://a.test",
      "https://a.test",
    ]);
  });

  it("returns an empty list for an empty file", () => {
    expect(parseTargetList("")).toEqual([]);
  });
});

describe("loadTargetList", () => {
  it("reads a UTF-8 file from disk", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "sitecheck-targets-"));
    const file = path.join(directory, "website_list.txt");
    await writeFile(file, "https://ä.example.com\n# skip\nhttps://b.example.com\n", "utf8");

    await expect(loadTargetList(file)).resolves.toEqual([
      "https://ä.example.com",
      "https://b.example.com",
    ]);
  });

  it("throws a ConfigError when the file cannot be read", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "sitecheck-targets-"));
    const missing = path.join(directory, "missing.txt");

    await expect(loadTargetList(missing)).rejects.toBeInstanceOf(ConfigError);
    await expect(loadTargetList(missing)).rejects.toThrow(
      `Unable to read target list at ${missing}`,
    );
  });
});
