import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import {
  getUserConfigPath,
  loadConfig,
  loadConfigFile,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config.js";
import type { ProjectConfig } from "../types/config.js";

vi.mock("env-paths", () => ({
  default: () => ({ config: "/nonexistent/kiln-config" }),
}));

const base: ProjectConfig = {
  source: "./src",
  destination: "./build",
  ignores: ["drafts/**"],
  clean: false,
  frontmatter: true,
  render: false,
  logging: { level: "info" },
};

describe("loadDefaultConfig", () => {
  it("loads the shipped defaults", async () => {
    expect(await loadDefaultConfig()).toEqual({ ...base, ignores: [] });
  });
});

describe("mergeConfig", () => {
  it("overrides top-level values", () => {
    const merged = mergeConfig(base, { destination: "./public", clean: true });
    expect(merged.destination).toBe("./public");
    expect(merged.clean).toBe(true);
    expect(merged.source).toBe("./src");
  });

  it("merges logging and deduplicates ignores", () => {
    const merged = mergeConfig(base, {
      ignores: ["drafts/**", "*.tmp"],
      logging: { level: "debug" },
    });
    expect(merged.ignores).toEqual(["drafts/**", "*.tmp"]);
    expect(merged.logging).toEqual({ level: "debug" });
  });
});

describe("loading config files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "kiln-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("parses a partial config file", async () => {
    const file = path.join(dir, "kiln.json");
    writeFileSync(file, JSON.stringify({ source: "content", render: true }));

    expect(await loadConfigFile(file)).toEqual({ source: "content", render: true });
  });

  it("rejects values of the wrong type", async () => {
    const file = path.join(dir, "kiln.json");
    writeFileSync(file, JSON.stringify({ clean: "yes" }));

    await expect(loadConfigFile(file)).rejects.toThrow();
  });

  it("applies a custom config over the defaults", async () => {
    const file = path.join(dir, "kiln.json");
    writeFileSync(file, JSON.stringify({ destination: "out", logging: { level: "warn" } }));

    const { config, errors } = await loadConfig(file);

    expect(errors).toEqual([]);
    expect(config.destination).toBe("out");
    expect(config.source).toBe("./src");
    expect(config.logging.level).toBe("warn");
  });

  it("reports an invalid custom config and keeps the defaults", async () => {
    const file = path.join(dir, "broken.json");
    writeFileSync(file, "{ not json");

    const { config, errors } = await loadConfig(file);

    expect(errors).toHaveLength(1);
    expect(errors[0].path).toBe(file);
    expect(errors[0].error).toBeInstanceOf(SyntaxError);
    expect(config).toEqual(await loadDefaultConfig());
  });
});

describe("getUserConfigPath", () => {
  it("points at config.json in the OS config directory", () => {
    expect(getUserConfigPath()).toBe(path.join("/nonexistent/kiln-config", "config.json"));
  });
});
