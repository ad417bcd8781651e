#!/usr/bin/env node

/**
 * Curricula CLI Entry Point
 */

import { Command } from "commander";
import { VERSION } from "../version.js";
import { registerDesignCommand } from "./commands/design.js";
import { registerConfigCommand } from "./commands/config.js";
import { loadGlobalEnv } from "../config/env.js";
import { formatError } from "../utils/errors.js";

const program = new Command();

program
  .name("curricula")
  .description("Design project-based learning curricula with a team of specialist agents")
  .version(VERSION, "-v, --version", "Output the current version");

registerDesignCommand(program);
registerConfigCommand(program);

async function main(): Promise<void> {
  // API keys may live in ~/.curricula/.env
  loadGlobalEnv();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(1);
});
