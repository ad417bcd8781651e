/**
 * Tests for environment configuration
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { getApiKey, getBaseUrl, loadGlobalEnv } from "./env.js";

const VARS = [
  "ANTHROPIC_API_KEY",
  "OPENAI_API_KEY",
  "ANTHROPIC_BASE_URL",
  "OPENAI_BASE_URL",
  "CURRICULA_TEST_QUOTED",
  "CURRICULA_TEST_PLAIN",
];

describe("environment", () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const name of VARS) {
      saved.set(name, process.env[name]);
      delete process.env[name];
    }
  });

  afterEach(() => {
    for (const [name, value] of saved) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  });

  describe("getApiKey", () => {
    it("should read the key of each backend", () => {
      process.env["ANTHROPIC_API_KEY"] = "test-anthropic-key";
      process.env["OPENAI_API_KEY"] = "test-openai-key";

      expect(getApiKey("anthropic")).toBe("test-anthropic-key");
      expect(getApiKey("openai")).toBe("test-openai-key");
    });

    it("should return undefined when unset", () => {
      expect(getApiKey("anthropic")).toBeUndefined();
    });
  });

  describe("getBaseUrl", () => {
    it("should read custom endpoints", () => {
      process.env["OPENAI_BASE_URL"] = "http://localhost:8080/v1";

      expect(getBaseUrl("openai")).toBe("http://localhost:8080/v1");
      expect(getBaseUrl("anthropic")).toBeUndefined();
    });
  });

  describe("loadGlobalEnv", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "curricula-env-"));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("should load variables, strip quotes and skip comments", () => {
      const file = path.join(dir, ".env");
      fs.writeFileSync(
        file,
        [
          "# keys",
          "ANTHROPIC_API_KEY=test-secret",
          'CURRICULA_TEST_QUOTED="with spaces"',
          "not a pair",
          "CURRICULA_TEST_PLAIN = padded ",
        ].join("\n"),
      );

      loadGlobalEnv(file);

      expect(process.env["ANTHROPIC_API_KEY"]).toBe("test-secret");
      expect(process.env["CURRICULA_TEST_QUOTED"]).toBe("with spaces");
      expect(process.env["CURRICULA_TEST_PLAIN"]).toBe("padded");
    });

    it("should not override variables already set", () => {
      const file = path.join(dir, ".env");
      fs.writeFileSync(file, "OPENAI_API_KEY=from-file\n");
      process.env["OPENAI_API_KEY"] = "from-shell";

      loadGlobalEnv(file);

      expect(process.env["OPENAI_API_KEY"]).toBe("from-shell");
    });

    it("should ignore a missing file", () => {
      expect(() => loadGlobalEnv(path.join(dir, "missing.env"))).not.toThrow();
    });
  });
});
