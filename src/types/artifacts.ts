/**
 * Artifact schemas
 *
 * Every role output is validated against one of these before it reaches the
 * workflow state. Field names follow what the prompts ask the model to return.
 */

import { z } from "zod";
import { MaterialTypeSchema } from "./workflow.js";

const text = z.string().trim().min(1);

/**
 * Optional 0..1 self-rating a role attaches to creative artifacts
 */
export const SelfAssessmentSchema = z.object({
  innovation: z.number().min(0).max(1),
  practicality: z.number().min(0).max(1),
});

export type SelfAssessment = z.infer<typeof SelfAssessmentSchema>;

/**
 * Requirements record supplied by the caller
 */
export const RequirementsSchema = z.object({
  topic: text,
  audience: z.string().trim().optional(),
  duration: z.string().trim().min(1).default("4 weeks"),
  goals: z.array(text).default([]),
  constraints: z.array(text).default([]),
  context: z.string().optional(),
});

export type Requirements = z.infer<typeof RequirementsSchema>;
export type RequirementsInput = z.input<typeof RequirementsSchema>;

export const TheoreticalFrameworkSchema = z.object({
  pedagogicalApproach: text,
  principles: z.array(text).min(1),
  learningObjectives: z.array(text),
  competencies: z.array(text).default([]),
});

export type TheoreticalFramework = z.infer<typeof TheoreticalFrameworkSchema>;

export const CourseModuleSchema = z.object({
  id: text,
  title: text,
  duration: z.string().default(""),
  objectives: z.array(text).default([]),
  keyConcepts: z.array(text).default([]),
  deliverables: z.array(text).default([]),
});

export type CourseModule = z.infer<typeof CourseModuleSchema>;

export const CourseArchitectureSchema = z
  .object({
    title: text,
    overview: z.string().default(""),
    duration: z.string().default(""),
    modules: z.array(CourseModuleSchema).min(1),
  })
  .refine((a) => new Set(a.modules.map((m) => m.id)).size === a.modules.length, {
    message: "Module ids must be unique",
    path: ["modules"],
  });

export type CourseArchitecture = z.infer<typeof CourseArchitectureSchema>;

export const LearningActivitySchema = z.object({
  title: text,
  format: text,
  description: z.string().default(""),
  durationMinutes: z.number().int().positive().optional(),
});

export type LearningActivity = z.infer<typeof LearningActivitySchema>;

export const ContentModuleSchema = z.object({
  moduleId: text,
  title: text,
  summary: text,
  drivingQuestion: z.string().default(""),
  activities: z.array(LearningActivitySchema).min(1),
  resources: z.array(text).default([]),
  selfAssessment: SelfAssessmentSchema.optional(),
});

export type ContentModule = z.infer<typeof ContentModuleSchema>;

export const FormativeAssessmentSchema = z.object({
  name: text,
  moduleId: text,
  method: text,
});

export const SummativeAssessmentSchema = z.object({
  name: text,
  moduleIds: z.array(text).min(1),
  weight: z.number().min(0).max(1).default(0),
  criteria: z.array(text).default([]),
});

export const RubricSchema = z.object({
  name: text,
  levels: z.array(z.object({ label: text, description: text })).min(1),
});

export const AssessmentStrategySchema = z.object({
  approach: text,
  formative: z.array(FormativeAssessmentSchema).default([]),
  summative: z.array(SummativeAssessmentSchema).default([]),
  rubrics: z.array(RubricSchema).default([]),
});

export type AssessmentStrategy = z.infer<typeof AssessmentStrategySchema>;

export const LearningMaterialSchema = z.object({
  materialType: MaterialTypeSchema,
  title: text,
  description: z.string().default(""),
  moduleIds: z.array(text).default([]),
  format: z.string().default("markdown"),
  content: text,
  selfAssessment: SelfAssessmentSchema.optional(),
});

export type LearningMaterial = z.infer<typeof LearningMaterialSchema>;

/**
 * The five artifact slots of a run
 */
export interface Artifacts {
  theoreticalFramework?: TheoreticalFramework;
  courseArchitecture?: CourseArchitecture;
  contentModules: ContentModule[];
  assessmentStrategy?: AssessmentStrategy;
  learningMaterials: LearningMaterial[];
}
