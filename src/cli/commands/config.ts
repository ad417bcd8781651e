import fs from "node:fs/promises";
import path from "node:path";
import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import JSON5 from "json5";
import { findConfigPath, loadConfig } from "../../config/loader.js";
import { getProjectConfigPath } from "../../config/paths.js";
import { CurriculaConfigSchema } from "../../config/schema.js";
import { ConfigError, formatError } from "../../utils/errors.js";

export interface ConfigCommandOptions {
  cwd?: string;
  json?: boolean;
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command("config").description("Manage Curricula configuration");

  configCmd
    .command("get <key>")
    .description("Get a configuration value")
    .action(async (key: string) => {
      await guard(() => runConfigGet(key));
    });

  configCmd
    .command("set <key> <value>")
    .description("Set a value in the project configuration")
    .action(async (key: string, value: string) => {
      await guard(() => runConfigSet(key, value));
    });

  configCmd
    .command("list")
    .description("List all configuration values")
    .option("--json", "Output as JSON")
    .action(async (options: { json?: boolean }) => {
      await guard(() => runConfigList(options));
    });

  configCmd
    .command("path")
    .description("Show which configuration file is in effect")
    .action(async () => {
      await guard(() => runConfigPath());
    });
}

async function guard(action: () => Promise<boolean>): Promise<void> {
  try {
    if (!(await action())) {
      process.exit(1);
    }
  } catch (error) {
    p.log.error(formatError(error));
    process.exit(1);
  }
}

/**
 * Print one resolved value
 *
 * @returns False when the key does not exist
 */
export async function runConfigGet(key: string, options: ConfigCommandOptions = {}): Promise<boolean> {
  const config = await loadConfig(undefined, { cwd: options.cwd });
  const value = getNestedValue(config, key);

  if (value === undefined) {
    p.log.error(`Configuration key '${key}' not found.`);
    return false;
  }

  console.log(typeof value === "object" ? JSON.stringify(value, null, 2) : String(value));
  return true;
}

/**
 * Write one value into <cwd>/.curricula/config.json. The project file is
 * validated as a whole before anything is written.
 *
 * @throws ConfigError when the key is unknown or the value is rejected
 */
export async function runConfigSet(
  key: string,
  value: string,
  options: ConfigCommandOptions = {},
): Promise<boolean> {
  const configPath = getProjectConfigPath(options.cwd);
  const raw = await readProjectConfig(configPath);

  // Bare words are strings; numbers, booleans and arrays parse as JSON5
  let parsedValue: unknown;
  try {
    parsedValue = JSON5.parse(value);
  } catch {
    parsedValue = value;
  }
  setNestedValue(raw, key, parsedValue);

  const result = CurriculaConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid value for '${key}'`, {
      issues: result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      configPath,
    });
  }
  // Unknown keys are stripped by the schema
  if (getNestedValue(result.data, key) === undefined) {
    throw new ConfigError(`Unknown configuration key '${key}'`, { configPath });
  }

  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, JSON.stringify(raw, null, 2) + "\n", "utf-8");

  p.log.success(`Set ${key} = ${JSON.stringify(parsedValue)}`);
  return true;
}

export async function runConfigList(options: ConfigCommandOptions = {}): Promise<boolean> {
  const config = await loadConfig(undefined, { cwd: options.cwd });

  if (options.json) {
    console.log(JSON.stringify(config, null, 2));
    return true;
  }

  console.log(chalk.bold("\nCurricula Configuration:\n"));
  printConfig(config, "");
  return true;
}

export async function runConfigPath(options: ConfigCommandOptions = {}): Promise<boolean> {
  const configPath = await findConfigPath(options.cwd);
  if (configPath) {
    console.log(configPath);
  } else {
    p.log.info("No configuration file found; built-in defaults are in effect.");
  }
  return true;
}

// Helper functions

type ConfigObject = Record<string, unknown>;

function isConfigObject(value: unknown): value is ConfigObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readProjectConfig(configPath: string): Promise<ConfigObject> {
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isConfigObject(error) && error["code"] === "ENOENT") return {};
    throw new ConfigError("Failed to read configuration", { configPath, cause: error });
  }

  const parsed: unknown = JSON5.parse(content);
  if (!isConfigObject(parsed)) {
    throw new ConfigError("Invalid configuration: expected an object", { configPath });
  }
  return parsed;
}

export function getNestedValue(obj: unknown, keyPath: string): unknown {
  let current: unknown = obj;

  for (const key of keyPath.split(".")) {
    if (!isConfigObject(current)) {
      return undefined;
    }
    current = current[key];
  }

  return current;
}

export function setNestedValue(obj: ConfigObject, keyPath: string, value: unknown): void {
  const keys = keyPath.split(".");
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (isConfigObject(next)) {
      current = next;
    } else {
      const created: ConfigObject = {};
      current[key] = created;
      current = created;
    }
  }
  current[lastKey] = value;
}

function printConfig(obj: unknown, prefix: string): void {
  if (!isConfigObject(obj)) {
    console.log(`  ${chalk.dim(prefix + ":")} ${chalk.cyan(JSON.stringify(obj))}`);
    return;
  }

  for (const [key, value] of Object.entries(obj)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;

    if (isConfigObject(value)) {
      printConfig(value, fullKey);
    } else {
      console.log(`  ${chalk.dim(fullKey + ":")} ${chalk.cyan(JSON.stringify(value))}`);
    }
  }
}
