/**
 * Base specialist role
 *
 * Builds the task prompt, calls the gateway on the profile routed to the task
 * type and validates the output against the artifact schema. An output that
 * fails validation is a failed attempt; the gateway retries or falls back.
 */

import type { z } from "zod";
import type { ArtifactFor, Role, RoleContext, TaskFor } from "./types.js";
import type { RoleId, TaskType } from "../types/workflow.js";
import { ExhaustedRetriesError, GenerationError } from "../utils/errors.js";
import { extractJsonObject, validate } from "../utils/validation.js";
import { SYSTEM_PROMPTS } from "./prompts.js";

export abstract class BaseSpecialist<K extends TaskType> implements Role<K> {
  abstract readonly id: RoleId;
  abstract readonly taskType: K;
  abstract readonly description: string;

  protected abstract readonly schema: z.ZodType<ArtifactFor<K>, z.ZodTypeDef, unknown>;

  /**
   * Output budget for one call; backend default when undefined
   */
  protected readonly maxTokens?: number;

  protected abstract buildPrompt(task: TaskFor<K>): string;

  /**
   * Fix up a parsed artifact against the task, e.g. pin the module id
   */
  protected finalize(artifact: ArtifactFor<K>, _task: TaskFor<K>): ArtifactFor<K> {
    return artifact;
  }

  async execute(task: TaskFor<K>, context: RoleContext): Promise<ArtifactFor<K>> {
    const profile = context.routing[this.taskType];
    const label = `${this.id}/${this.taskType}`;

    try {
      const result = await context.gateway.generate(
        {
          system: SYSTEM_PROMPTS[this.id],
          prompt: this.buildPrompt(task),
          maxTokens: this.maxTokens,
          label,
        },
        profile,
        { parse: (raw) => this.parse(raw, task), signal: context.signal },
      );

      context.logger?.debug(
        `${label} completed on ${result.backend} (attempt ${result.attempt}, ${Math.round(result.durationMs)}ms)`,
      );
      return result.value;
    } catch (error) {
      if (error instanceof ExhaustedRetriesError && !(error instanceof GenerationError)) {
        throw new GenerationError(`Role '${this.id}' could not complete ${this.taskType}`, {
          role: this.id,
          taskType: this.taskType,
          exhausted: error,
        });
      }
      throw error;
    }
  }

  protected parse(raw: string, task: TaskFor<K>): ArtifactFor<K> {
    const json = extractJsonObject(raw);
    if (json === undefined) {
      throw new Error("No JSON object found in output");
    }
    return this.finalize(validate(this.schema, json, this.taskType), task);
  }
}
