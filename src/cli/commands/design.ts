/**
 * Design command - run the curriculum workflow for one requirement record
 */

import fs from "node:fs/promises";
import path from "node:path";
import { Command, InvalidArgumentError, Option } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { loadConfig } from "../../config/loader.js";
import { CONFIG_PATHS } from "../../config/paths.js";
import type { CurriculaConfig, WorkflowConfigInput } from "../../config/schema.js";
import { Orchestrator } from "../../orchestrator/orchestrator.js";
import { renderMarkdown } from "../../orchestrator/deliverable.js";
import { formatDuration } from "../../orchestrator/metrics.js";
import type { Deliverable, ProgressEvent } from "../../orchestrator/types.js";
import { formatCost } from "../../providers/pricing.js";
import type { RequirementsInput } from "../../types/artifacts.js";
import { OrchestrationModeSchema, type Phase, type PhaseState } from "../../types/workflow.js";
import { CancelledError, formatError } from "../../utils/errors.js";
import { createLogger, setLogger } from "../../utils/logger.js";
import { validate } from "../../utils/validation.js";

export interface DesignOptions {
  topic?: string;
  audience?: string;
  duration?: string;
  goal?: string[];
  constraint?: string[];
  context?: string;
  mode?: string;
  maxIterations?: number;
  threshold?: number;
  config?: string;
  output?: string;
  json?: boolean;
  stream?: boolean;
  interactive?: boolean;
}

export interface DesignDependencies {
  /** Resolved configuration; loaded from disk when omitted */
  config?: CurriculaConfig;
  orchestrator?: Orchestrator;
  signal?: AbortSignal;
}

const PHASE_LABELS: Record<Phase, string> = {
  initialize: "Requirements accepted",
  theoretical_foundation: "Theoretical framework",
  architecture_design: "Course architecture",
  content_creation: "Module content",
  assessment_design: "Assessment strategy",
  material_production: "Learning materials",
  review_iteration: "Revision round",
  finalize: "Finalized",
};

function labelOf(phase: PhaseState): string {
  return phase === "terminated" ? "Terminated" : PHASE_LABELS[phase];
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Register the design command
 */
export function registerDesignCommand(program: Command): void {
  program
    .command("design")
    .description("Design a project-based curriculum from requirements")
    .option("-t, --topic <topic>", "Course topic")
    .option("-a, --audience <audience>", "Target learners")
    .option("-d, --duration <duration>", "Course length, e.g. '6 weeks'")
    .option("-g, --goal <goal>", "Learning goal (repeatable)", collect, [])
    .option("--constraint <constraint>", "Design constraint (repeatable)", collect, [])
    .option("--context <context>", "Free-form background for every role")
    .addOption(
      new Option("-m, --mode <mode>", "Orchestration mode")
        .choices(OrchestrationModeSchema.options)
        .default("full_course"),
    )
    .option("--max-iterations <n>", "Revision rounds allowed", parseInteger)
    .option("--threshold <score>", "Quality threshold between 0 and 1", parseNumber)
    .option("-c, --config <path>", "Configuration file")
    .option("-o, --output <file>", "Write the curriculum to a file")
    .option("--json", "Emit the deliverable as JSON")
    .option("--stream", "Print every progress event")
    .option("--no-interactive", "Never prompt for missing requirements")
    .action(async (options: DesignOptions) => {
      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once("SIGINT", onInterrupt);

      try {
        const config = await loadConfig(options.config);
        setLogger(
          createLogger({
            level: config.logging.level,
            logToFile: config.logging.logToFile,
            logDir: config.logging.logDir ?? CONFIG_PATHS.logs,
          }),
        );
        await runDesign(options, { config, signal: controller.signal });
      } catch (error) {
        if (error instanceof CancelledError) {
          p.cancel("Design cancelled.");
        } else {
          p.log.error(formatError(error));
        }
        process.exit(1);
      } finally {
        process.off("SIGINT", onInterrupt);
      }
    });
}

/**
 * Run the workflow and emit the deliverable
 */
export async function runDesign(
  options: DesignOptions,
  deps: DesignDependencies = {},
): Promise<Deliverable> {
  const config = deps.config ?? (await loadConfig(options.config));
  const orchestrator = deps.orchestrator ?? new Orchestrator({ config });
  const mode = validate(OrchestrationModeSchema, options.mode ?? "full_course", "mode");
  const requirements = await collectRequirements(options);
  // JSON on stdout must stay parseable
  const quiet = options.json === true && !options.output;

  const overrides: WorkflowConfigInput = {};
  if (options.maxIterations !== undefined) overrides.maxIterations = options.maxIterations;
  if (options.threshold !== undefined) overrides.qualityThreshold = options.threshold;

  const spinner = !quiet && !options.stream ? p.spinner() : undefined;
  spinner?.start(`Designing "${requirements.topic}"`);

  let deliverable: Deliverable | undefined;
  try {
    const events = orchestrator.stream(requirements, overrides, { mode, signal: deps.signal });
    for await (const event of events) {
      if (options.stream && !quiet) {
        console.log(formatEvent(event));
      }
      if (event.type === "phase" || event.type === "step") {
        spinner?.message(`${labelOf(event.phase)} (${event.percent}%)`);
      } else if (event.type === "complete") {
        deliverable = event.deliverable;
      } else {
        throw event.error;
      }
    }
  } catch (error) {
    spinner?.stop(chalk.red("Design failed"), 1);
    throw error;
  }

  if (!deliverable) {
    throw new CancelledError("Workflow stream ended without a result");
  }
  spinner?.stop(chalk.green("Curriculum ready"));

  const content = options.json ? JSON.stringify(deliverable, null, 2) : renderMarkdown(deliverable);
  if (options.output) {
    await fs.mkdir(path.dirname(options.output), { recursive: true });
    await fs.writeFile(options.output, content + "\n", "utf-8");
  } else {
    process.stdout.write(content + "\n");
  }

  if (!quiet) {
    p.log.info(formatSummary(deliverable));
    if (deliverable.belowThreshold) {
      p.log.warning("Quality stayed below the threshold; the best available result was kept.");
    }
    if (options.output) {
      p.log.success(`Saved to ${options.output}`);
    }
  }
  return deliverable;
}

/**
 * Build the requirement record from flags, prompting for gaps on a TTY
 */
export async function collectRequirements(options: DesignOptions): Promise<RequirementsInput> {
  const requirements: RequirementsInput = {
    topic: options.topic ?? "",
    audience: options.audience,
    duration: options.duration,
    goals: options.goal ?? [],
    constraints: options.constraint ?? [],
    context: options.context,
  };

  if (requirements.topic || options.interactive === false || !process.stdin.isTTY) {
    return requirements;
  }

  p.intro(chalk.cyan("New curriculum"));

  const topic = await p.text({
    message: "What is the course about?",
    validate: (value) => (value?.trim() ? undefined : "A topic is required"),
  });
  if (p.isCancel(topic)) {
    throw new CancelledError("Requirements entry cancelled");
  }
  requirements.topic = topic;

  if (!requirements.audience) {
    const audience = await p.text({ message: "Who are the learners?", placeholder: "optional" });
    if (p.isCancel(audience)) {
      throw new CancelledError("Requirements entry cancelled");
    }
    requirements.audience = audience.trim() || undefined;
  }

  if (requirements.goals?.length === 0) {
    const goals = await p.text({
      message: "Learning goals (comma separated)",
      placeholder: "optional",
    });
    if (p.isCancel(goals)) {
      throw new CancelledError("Requirements entry cancelled");
    }
    requirements.goals = goals
      .split(",")
      .map((goal) => goal.trim())
      .filter(Boolean);
  }

  return requirements;
}

/**
 * One console line per progress event
 */
export function formatEvent(event: ProgressEvent): string {
  const percent = chalk.dim(`${String(event.percent).padStart(3)}%`);
  switch (event.type) {
    case "phase": {
      const quality = event.quality ? ` quality ${event.quality.composite.toFixed(2)}` : "";
      return `${percent} ${chalk.green("✓")} ${labelOf(event.phase)}${quality}`;
    }
    case "step":
      return `${percent}   ${event.step} ${event.completed}/${event.total}`;
    case "complete":
      return `${percent} ${chalk.green("✓")} Complete`;
    case "error":
      return `${percent} ${chalk.red("✗")} ${labelOf(event.phase)}: ${event.error.message}`;
  }
}

export function formatSummary(deliverable: Deliverable): string {
  const { metadata } = deliverable;
  return [
    `Quality ${deliverable.qualityMetrics.composite.toFixed(2)}`,
    `${deliverable.iterationCount} revision(s)`,
    formatDuration(metadata.durationMs),
    `${metadata.usage.totals.calls} calls`,
    formatCost(metadata.usage.totals.costUsd),
  ].join(" · ");
}
