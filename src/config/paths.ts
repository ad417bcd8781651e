/**
 * Centralized configuration paths
 *
 * Global configuration is stored in ~/.curricula/, project configuration in
 * <cwd>/.curricula/.
 */

import { homedir } from "node:os";
import { join } from "node:path";

/**
 * Base directory for global configuration
 */
export const CURRICULA_HOME = join(homedir(), ".curricula");

/**
 * Project-level configuration directory name
 */
export const PROJECT_DIR = ".curricula";

/**
 * Configuration paths
 */
export const CONFIG_PATHS = {
  /** Base directory: ~/.curricula/ */
  home: CURRICULA_HOME,

  /** Main config file: ~/.curricula/config.json */
  config: join(CURRICULA_HOME, "config.json"),

  /** Environment variables: ~/.curricula/.env (API keys) */
  env: join(CURRICULA_HOME, ".env"),

  /** Logs directory: ~/.curricula/logs/ */
  logs: join(CURRICULA_HOME, "logs"),
} as const;

/**
 * Project config file for a working directory
 */
export function getProjectConfigPath(cwd: string = process.cwd()): string {
  return join(cwd, PROJECT_DIR, "config.json");
}
