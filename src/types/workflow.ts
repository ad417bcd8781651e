/**
 * Shared vocabulary for Curricula: roles, phases, task and material kinds
 */

import { z } from "zod";

/**
 * The five specialist roles
 */
export const RoleIdSchema = z.enum([
  "education_theorist",
  "course_architect",
  "content_designer",
  "assessment_expert",
  "material_creator",
]);

export type RoleId = z.infer<typeof RoleIdSchema>;

export const ROLE_IDS: readonly RoleId[] = RoleIdSchema.options;

/**
 * Message sender/recipient: a role or the orchestrator itself
 */
export type Participant = RoleId | "orchestrator";

/**
 * Workflow phases, in full-course order
 */
export const PhaseSchema = z.enum([
  "initialize",
  "theoretical_foundation",
  "architecture_design",
  "content_creation",
  "assessment_design",
  "material_production",
  "review_iteration",
  "finalize",
]);

export type Phase = z.infer<typeof PhaseSchema>;

/**
 * Phase graph state: a phase, or the terminal state after finalize
 */
export type PhaseState = Phase | "terminated";

export const OrchestrationModeSchema = z.enum(["full_course", "quick_design"]);

export type OrchestrationMode = z.infer<typeof OrchestrationModeSchema>;

/**
 * Task types dispatched to roles. Each routes to a generation profile.
 */
export const TaskTypeSchema = z.enum([
  "develop_framework",
  "design_structure",
  "create_content",
  "design_strategy",
  "create_material",
]);

export type TaskType = z.infer<typeof TaskTypeSchema>;

export const MaterialTypeSchema = z.enum([
  "worksheet",
  "project_template",
  "teacher_guide",
  "digital_resource",
]);

export type MaterialType = z.infer<typeof MaterialTypeSchema>;

export const MATERIAL_TYPES: readonly MaterialType[] = MaterialTypeSchema.options;

/**
 * Generation profiles the gateway routes on
 */
export const ProfileNameSchema = z.enum(["reasoning", "creative", "structured"]);

export type ProfileName = z.infer<typeof ProfileNameSchema>;

export const BackendIdSchema = z.enum(["anthropic", "openai"]);

export type BackendId = z.infer<typeof BackendIdSchema>;

export type RoleStatus = "idle" | "in_progress" | "completed" | "failed";
