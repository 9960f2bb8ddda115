import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { read, toFileRecord } from "./reader.js";
import { scan } from "./scanner.js";
import { createDefaultBuildConfig, type BuildConfig } from "../types/config.js";

describe("toFileRecord", () => {
  const config = createDefaultBuildConfig();

  it("splits and parses front matter", () => {
    const record = toFileRecord("---\ntitle: A\n---\nbody text", config, "a.md");
    expect(record.frontmatter).toEqual([{ title: "A" }]);
    expect(record.content.toString()).toBe("body text");
  });

  it("records empty metadata for an empty block", () => {
    const record = toFileRecord("---\n---\nbody", config, "a.md");
    expect(record.frontmatter).toEqual([]);
    expect(record.content.toString()).toBe("body");
  });

  it("keeps the whole text when front matter is disabled", () => {
    const record = toFileRecord(
      "---\ntitle: A\n---\nbody",
      { ...config, frontmatter: false },
      "a.md",
    );
    expect(record.frontmatter).toEqual([]);
    expect(record.content.toString()).toBe("---\ntitle: A\n---\nbody");
  });
});

describe("scan and read", () => {
  let source: string;
  let config: BuildConfig;

  beforeEach(() => {
    source = mkdtempSync(path.join(tmpdir(), "kiln-read-"));
    mkdirSync(path.join(source, "posts", "2024"), { recursive: true });
    mkdirSync(path.join(source, "empty"));
    writeFileSync(path.join(source, "b.txt"), "b");
    writeFileSync(path.join(source, "posts", "2024", "a.md"), "---\nx: 1\n---\na");
    config = { ...createDefaultBuildConfig(), source };
  });

  afterEach(() => {
    rmSync(source, { recursive: true, force: true });
  });

  it("lists regular files only, sorted", () => {
    expect(scan(config)).toEqual([
      path.join(source, "b.txt"),
      path.join(source, "posts", "2024", "a.md"),
    ]);
  });

  it("honours ignore patterns", () => {
    expect(scan({ ...config, ignores: ["posts/**"] })).toEqual([
      path.join(source, "b.txt"),
    ]);
  });

  it("keys records by their relative path", () => {
    const store = read(config, scan(config));

    expect([...store.keys()].sort()).toEqual(["b.txt", "posts/2024/a.md"]);
    expect(store.get("posts/2024/a.md")?.frontmatter).toEqual([{ x: 1 }]);
    expect(store.get("posts/2024/a.md")?.content.toString()).toBe("a");
  });

  it("fails with a read-error for a missing file", () => {
    expect(() => read(config, [path.join(source, "nope.txt")])).toThrow(
      expect.objectContaining({ reason: "read-error", code: "ENOENT" }),
    );
  });
});
