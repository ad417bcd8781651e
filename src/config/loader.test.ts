/**
 * Tests for configuration loader
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import { CONFIG_PATHS, getProjectConfigPath } from "./paths.js";
import { loadConfig, mergeConfig, deepMerge, findConfigPath } from "./loader.js";
import { createDefaultConfig } from "./schema.js";
import { ConfigError, ValidationError } from "../utils/errors.js";

vi.mock("node:fs/promises", () => ({
  default: {
    readFile: vi.fn(),
    access: vi.fn(),
  },
}));

function enoent(): Error {
  return Object.assign(new Error("not found"), { code: "ENOENT" });
}

/**
 * Serve file contents by path; anything else is ENOENT
 */
function serveFiles(files: Record<string, string>): void {
  vi.mocked(fs.readFile).mockImplementation(async (file) => {
    const content = typeof file === "string" ? files[file] : undefined;
    if (content === undefined) throw enoent();
    return content;
  });
}

describe("loadConfig", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    delete process.env["CURRICULA_CONFIG_PATH"];
  });

  afterEach(() => {
    delete process.env["CURRICULA_CONFIG_PATH"];
  });

  it("should return defaults when no files exist", async () => {
    serveFiles({});

    const config = await loadConfig(undefined, { cwd: "/work" });

    expect(config).toEqual(createDefaultConfig());
  });

  it("should layer project config over global config", async () => {
    serveFiles({
      [CONFIG_PATHS.config]: "{ workflow: { maxIterations: 5, concurrencyLimit: 2 } }",
      [getProjectConfigPath("/work")]: "{ workflow: { maxIterations: 1 }, // comment\n }",
    });

    const config = await loadConfig(undefined, { cwd: "/work" });

    expect(config.workflow.maxIterations).toBe(1);
    expect(config.workflow.concurrencyLimit).toBe(2);
    expect(config.workflow.qualityThreshold).toBe(0.85);
  });

  it("should prefer CURRICULA_CONFIG_PATH over the project file", async () => {
    process.env["CURRICULA_CONFIG_PATH"] = "/etc/curricula.json5";
    serveFiles({
      "/etc/curricula.json5": "{ workflow: { qualityThreshold: 0.5 } }",
      [getProjectConfigPath("/work")]: "{ workflow: { qualityThreshold: 0.9 } }",
    });

    const config = await loadConfig(undefined, { cwd: "/work" });

    expect(config.workflow.qualityThreshold).toBe(0.5);
  });

  it("should fail when an explicit path does not exist", async () => {
    serveFiles({});

    await expect(loadConfig("/missing.json")).rejects.toBeInstanceOf(ConfigError);
  });

  it("should report schema issues with their paths", async () => {
    serveFiles({ [getProjectConfigPath("/work")]: "{ workflow: { maxIterations: 99 } }" });

    try {
      await loadConfig(undefined, { cwd: "/work" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues[0]?.path).toBe("workflow.maxIterations");
      }
    }
  });

  it("should reject files that are not objects or not JSON5", async () => {
    serveFiles({ [getProjectConfigPath("/work")]: "[1, 2]" });
    await expect(loadConfig(undefined, { cwd: "/work" })).rejects.toThrow(
      "Invalid configuration: expected an object",
    );

    serveFiles({ [getProjectConfigPath("/work")]: "{ broken" });
    await expect(loadConfig(undefined, { cwd: "/work" })).rejects.toThrow(
      "Configuration is not valid JSON5",
    );
  });
});

describe("mergeConfig", () => {
  it("should apply overrides and validate the result", () => {
    const merged = mergeConfig(createDefaultConfig(), { workflow: { maxIterations: 0 } });

    expect(merged.workflow.maxIterations).toBe(0);
    expect(merged.workflow.concurrencyLimit).toBe(4);
  });

  it("should raise ValidationError for malformed overrides", () => {
    expect(() => mergeConfig(createDefaultConfig(), { workflow: { maxIterations: -1 } })).toThrow(
      ValidationError,
    );
    expect(() => mergeConfig(createDefaultConfig(), "fast")).toThrow(ValidationError);
  });
});

describe("deepMerge", () => {
  it("should replace arrays and skip undefined", () => {
    expect(deepMerge({ a: [1, 2], b: { c: 1, d: 2 } }, { a: [3], b: { c: undefined, d: 5 } })).toEqual(
      { a: [3], b: { c: 1, d: 5 } },
    );
  });
});

describe("findConfigPath", () => {
  it("should return the first accessible candidate", async () => {
    vi.mocked(fs.access).mockImplementation(async (file) => {
      if (file !== CONFIG_PATHS.config) throw enoent();
    });

    await expect(findConfigPath("/work")).resolves.toBe(CONFIG_PATHS.config);
  });
});
