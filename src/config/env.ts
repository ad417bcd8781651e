/**
 * Environment configuration for Curricula
 *
 * API keys come from the process environment, with ~/.curricula/.env filling in
 * anything not already set. Keys never live in project config files.
 */

import * as fs from "node:fs";
import { CONFIG_PATHS } from "./paths.js";
import type { BackendId } from "../types/workflow.js";

/**
 * Load ~/.curricula/.env into process.env without overriding existing variables
 */
export function loadGlobalEnv(envPath: string = CONFIG_PATHS.env): void {
  let content: string;
  try {
    content = fs.readFileSync(envPath, "utf-8");
  } catch {
    // No global env file
    return;
  }

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const eqIndex = trimmed.indexOf("=");
    if (eqIndex <= 0) continue;

    const key = trimmed.substring(0, eqIndex).trim();
    const value = trimmed
      .substring(eqIndex + 1)
      .trim()
      .replace(/^(["'])(.*)\1$/, "$2");
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}

/**
 * Get API key for a backend
 */
export function getApiKey(backend: BackendId): string | undefined {
  switch (backend) {
    case "anthropic":
      return process.env["ANTHROPIC_API_KEY"];
    case "openai":
      return process.env["OPENAI_API_KEY"];
  }
}

/**
 * Get base URL for a backend (for custom endpoints)
 */
export function getBaseUrl(backend: BackendId): string | undefined {
  switch (backend) {
    case "anthropic":
      return process.env["ANTHROPIC_BASE_URL"];
    case "openai":
      return process.env["OPENAI_BASE_URL"];
  }
}
