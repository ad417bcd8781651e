/**
 * Tests for config command
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Command } from "commander";
import * as p from "@clack/prompts";
import {
  getNestedValue,
  registerConfigCommand,
  runConfigGet,
  runConfigList,
  runConfigPath,
  runConfigSet,
  setNestedValue,
} from "./config.js";
import { ConfigError } from "../../utils/errors.js";

vi.mock("@clack/prompts", () => ({
  log: {
    info: vi.fn(),
    success: vi.fn(),
    warning: vi.fn(),
    error: vi.fn(),
  },
}));

describe("registerConfigCommand", () => {
  it("should register the config subcommands", () => {
    const program = new Command();

    registerConfigCommand(program);

    const config = program.commands.find((c) => c.name() === "config");
    expect(config?.commands.map((c) => c.name())).toEqual(["get", "set", "list", "path"]);
  });
});

describe("config subcommands", () => {
  let cwd: string;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    vi.clearAllMocks();
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "curricula-config-"));
    logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    logSpy.mockRestore();
    await fs.rm(cwd, { recursive: true, force: true });
  });

  const projectFile = (): string => path.join(cwd, ".curricula", "config.json");

  describe("set", () => {
    it("should write parsed values to the project config", async () => {
      await runConfigSet("workflow.maxIterations", "5", { cwd });
      await runConfigSet("logging.level", "debug", { cwd });

      const written: unknown = JSON.parse(await fs.readFile(projectFile(), "utf-8"));
      expect(written).toEqual({ workflow: { maxIterations: 5 }, logging: { level: "debug" } });
      expect(p.log.success).toHaveBeenCalledWith("Set workflow.maxIterations = 5");
      expect(p.log.success).toHaveBeenCalledWith('Set logging.level = "debug"');
    });

    it("should reject values the schema refuses without writing", async () => {
      await expect(runConfigSet("workflow.qualityThreshold", "1.5", { cwd })).rejects.toThrow(
        ConfigError,
      );

      await expect(fs.access(projectFile())).rejects.toThrow();
    });

    it("should reject unknown keys", async () => {
      await expect(runConfigSet("workflow.unknownKey", "1", { cwd })).rejects.toThrow(
        "Unknown configuration key 'workflow.unknownKey'",
      );
    });

    it("should keep existing keys of a JSON5 project file", async () => {
      await fs.mkdir(path.dirname(projectFile()), { recursive: true });
      await fs.writeFile(projectFile(), "{ workflow: { concurrencyLimit: 2, }, }");

      await runConfigSet("workflow.maxIterations", "1", { cwd });

      const written: unknown = JSON.parse(await fs.readFile(projectFile(), "utf-8"));
      expect(written).toEqual({ workflow: { concurrencyLimit: 2, maxIterations: 1 } });
    });
  });

  describe("get", () => {
    it("should print resolved values", async () => {
      await runConfigSet("workflow.qualityThreshold", "0.9", { cwd });

      expect(await runConfigGet("workflow.qualityThreshold", { cwd })).toBe(true);
      expect(await runConfigGet("workflow.maxIterations", { cwd })).toBe(true);

      expect(logSpy).toHaveBeenNthCalledWith(1, "0.9");
      expect(logSpy).toHaveBeenNthCalledWith(2, "3");
    });

    it("should report unknown keys", async () => {
      expect(await runConfigGet("workflow.missing", { cwd })).toBe(false);

      expect(p.log.error).toHaveBeenCalledWith("Configuration key 'workflow.missing' not found.");
      expect(logSpy).not.toHaveBeenCalled();
    });
  });

  describe("list", () => {
    it("should print the resolved configuration as JSON", async () => {
      await runConfigList({ cwd, json: true });

      const printed = logSpy.mock.calls[0]?.[0];
      expect(typeof printed).toBe("string");
      const parsed: unknown = JSON.parse(String(printed));
      expect(getNestedValue(parsed, "workflow.concurrencyLimit")).toBe(4);
      expect(getNestedValue(parsed, "gateway.profiles.creative.primary")).toBe("anthropic");
    });
  });

  describe("path", () => {
    it("should print the project file once it exists", async () => {
      await runConfigSet("workflow.maxIterations", "2", { cwd });

      await runConfigPath({ cwd });

      expect(logSpy).toHaveBeenCalledWith(projectFile());
    });
  });
});

describe("nested values", () => {
  it("should create intermediate objects", () => {
    const target: Record<string, unknown> = { workflow: 3 };

    setNestedValue(target, "workflow.routing.create_content", "structured");

    expect(target).toEqual({ workflow: { routing: { create_content: "structured" } } });
    expect(getNestedValue(target, "workflow.routing.create_content")).toBe("structured");
    expect(getNestedValue(target, "workflow.routing.create_content.deeper")).toBeUndefined();
  });
});
