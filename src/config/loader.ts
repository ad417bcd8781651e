/**
 * Configuration loader for Curricula
 *
 * Supports hierarchical configuration with priority:
 * 1. Explicit path (argument or CURRICULA_CONFIG_PATH)
 * 2. Project config (<cwd>/.curricula/config.json)
 * 3. Global config (~/.curricula/config.json)
 * 4. Built-in defaults
 *
 * Files are JSON5. Layers are deep-merged before validation, so a file only needs
 * the keys it changes.
 */

import fs from "node:fs/promises";
import JSON5 from "json5";
import { CurriculaConfigSchema, type CurriculaConfig } from "./schema.js";
import { ConfigError, ValidationError } from "../utils/errors.js";
import { CONFIG_PATHS, getProjectConfigPath } from "./paths.js";
import { validate } from "../utils/validation.js";

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge plain objects. Arrays and scalars from `override` replace those in `base`;
 * undefined values in `override` are ignored.
 */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (override === undefined) return base;
  if (!isPlainObject(base) || !isPlainObject(override)) return override;

  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = deepMerge(base[key], value);
  }
  return merged;
}

/**
 * Load configuration from file with hierarchical fallback
 */
export async function loadConfig(
  configPath?: string,
  options: { cwd?: string } = {},
): Promise<CurriculaConfig> {
  let raw: unknown = {};

  const globalConfig = await loadConfigFile(CONFIG_PATHS.config);
  if (globalConfig) {
    raw = deepMerge(raw, globalConfig);
  }

  const explicitPath = configPath ?? process.env["CURRICULA_CONFIG_PATH"];
  const projectPath = explicitPath ?? getProjectConfigPath(options.cwd);
  const projectConfig = await loadConfigFile(projectPath, { required: explicitPath !== undefined });
  if (projectConfig) {
    raw = deepMerge(raw, projectConfig);
  }

  const result = CurriculaConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError("Invalid configuration", {
      issues: result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      configPath: projectPath,
    });
  }
  return result.data;
}

/**
 * Load a single config file, returning null if not found
 */
async function loadConfigFile(
  configPath: string,
  options: { required?: boolean } = {},
): Promise<PlainObject | null> {
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isNotFound(error) && !options.required) {
      return null;
    }
    throw new ConfigError("Failed to read configuration", { configPath, cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (error) {
    throw new ConfigError("Configuration is not valid JSON5", { configPath, cause: error });
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError("Invalid configuration: expected an object", { configPath });
  }
  return parsed;
}

function isNotFound(error: unknown): boolean {
  return isPlainObject(error) && error["code"] === "ENOENT";
}

/**
 * Apply run-level overrides on top of a resolved configuration.
 * Malformed overrides are a caller error, so they raise ValidationError.
 */
export function mergeConfig(base: CurriculaConfig, overrides: unknown): CurriculaConfig {
  if (overrides === undefined) return base;
  if (!isPlainObject(overrides)) {
    throw new ValidationError("Configuration overrides must be an object", { field: "config" });
  }
  return validate(CurriculaConfigSchema, deepMerge(base, overrides), "config");
}

/**
 * Find the configuration file that loadConfig would read first
 */
export async function findConfigPath(cwd?: string): Promise<string | undefined> {
  const candidates = [
    process.env["CURRICULA_CONFIG_PATH"],
    getProjectConfigPath(cwd),
    CONFIG_PATHS.config,
  ];

  for (const candidate of candidates) {
    if (!candidate) continue;
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      // Try the next location
    }
  }
  return undefined;
}
