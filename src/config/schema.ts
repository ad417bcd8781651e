/**
 * Configuration schema for Curricula
 */

import { z } from "zod";
import {
  BackendIdSchema,
  MATERIAL_TYPES,
  MaterialTypeSchema,
  ProfileNameSchema,
} from "../types/workflow.js";

export const DEFAULT_ANTHROPIC_MODEL = "claude-sonnet-4-20250514";
export const DEFAULT_OPENAI_MODEL = "gpt-4o";

/**
 * A single generation backend
 */
export const BackendConfigSchema = z.object({
  model: z.string().min(1),
  apiKey: z.string().optional(),
  baseUrl: z.string().url().optional(),
  maxTokens: z.number().int().min(1).max(200000).default(4096),
  temperature: z.number().min(0).max(2).default(0.7),
});

export type BackendConfig = z.infer<typeof BackendConfigSchema>;

/**
 * Primary/fallback pair for one task profile
 */
export const ProfileConfigSchema = z.object({
  primary: BackendIdSchema,
  fallback: BackendIdSchema.optional(),
  temperature: z.number().min(0).max(2).optional(),
});

export type ProfileConfig = z.infer<typeof ProfileConfigSchema>;

/** Attempts per generation across primary and fallback */
export const MAX_ATTEMPTS = 3;

/**
 * Attempt plan and backoff for the gateway
 */
export const RetryConfigSchema = z
  .object({
    primaryAttempts: z.number().int().min(1).max(MAX_ATTEMPTS).default(2),
    fallbackAttempts: z.number().int().min(0).max(MAX_ATTEMPTS - 1).default(1),
    initialDelayMs: z.number().int().min(0).default(1000),
    maxDelayMs: z.number().int().min(0).default(30000),
    backoffMultiplier: z.number().min(1).default(2),
    jitterFactor: z.number().min(0).max(1).default(0.1),
  })
  .refine((r) => r.primaryAttempts + r.fallbackAttempts <= MAX_ATTEMPTS, {
    message: `At most ${MAX_ATTEMPTS} attempts per generation`,
    path: ["fallbackAttempts"],
  });

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

/**
 * Per-call timeout: baseMs + perOutputTokenMs * maxTokens
 */
export const TimeoutConfigSchema = z.object({
  baseMs: z.number().int().min(1).default(30000),
  perOutputTokenMs: z.number().min(0).default(15),
});

export type TimeoutConfig = z.infer<typeof TimeoutConfigSchema>;

export const GatewayConfigSchema = z.object({
  backends: z
    .object({
      anthropic: BackendConfigSchema.default({ model: DEFAULT_ANTHROPIC_MODEL }),
      openai: BackendConfigSchema.default({ model: DEFAULT_OPENAI_MODEL }),
    })
    .default({}),
  profiles: z
    .object({
      reasoning: ProfileConfigSchema.default({ primary: "anthropic", fallback: "openai" }),
      creative: ProfileConfigSchema.default({
        primary: "anthropic",
        fallback: "openai",
        temperature: 0.9,
      }),
      structured: ProfileConfigSchema.default({
        primary: "anthropic",
        fallback: "openai",
        temperature: 0.2,
      }),
    })
    .default({}),
  retry: RetryConfigSchema.default({}),
  timeout: TimeoutConfigSchema.default({}),
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type GatewayConfigInput = z.input<typeof GatewayConfigSchema>;

/**
 * Weights of the five quality sub-scores. Only ratios matter.
 */
export const QualityWeightsSchema = z
  .object({
    completeness: z.number().min(0).default(0.2),
    coherence: z.number().min(0).default(0.2),
    alignment: z.number().min(0).default(0.2),
    innovation: z.number().min(0).default(0.2),
    practicality: z.number().min(0).default(0.2),
  })
  .refine((w) => Object.values(w).some((v) => v > 0), {
    message: "At least one quality weight must be positive",
  });

export type QualityWeights = z.infer<typeof QualityWeightsSchema>;

export const RoutingConfigSchema = z.object({
  develop_framework: ProfileNameSchema.default("reasoning"),
  design_structure: ProfileNameSchema.default("structured"),
  create_content: ProfileNameSchema.default("creative"),
  design_strategy: ProfileNameSchema.default("structured"),
  create_material: ProfileNameSchema.default("creative"),
});

export type RoutingConfig = z.infer<typeof RoutingConfigSchema>;

export const WorkflowConfigSchema = z.object({
  maxIterations: z.number().int().min(0).max(10).default(3),
  qualityThreshold: z.number().min(0).max(1).default(0.85),
  concurrencyLimit: z.number().int().min(1).max(32).default(4),
  materialTypes: z
    .array(MaterialTypeSchema)
    .min(1)
    .refine((types) => new Set(types).size === types.length, {
      message: "Material types must be unique",
    })
    .default([...MATERIAL_TYPES]),
  qualityWeights: QualityWeightsSchema.default({}),
  routing: RoutingConfigSchema.default({}),
});

export type WorkflowConfig = z.infer<typeof WorkflowConfigSchema>;
export type WorkflowConfigInput = z.input<typeof WorkflowConfigSchema>;

export const LoggingConfigSchema = z.object({
  level: z.enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  logToFile: z.boolean().default(false),
  logDir: z.string().optional(),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Complete configuration schema
 */
export const CurriculaConfigSchema = z.object({
  workflow: WorkflowConfigSchema.default({}),
  gateway: GatewayConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type CurriculaConfig = z.infer<typeof CurriculaConfigSchema>;

/**
 * Partial configuration as written in files or passed as run overrides
 */
export type CurriculaConfigInput = z.input<typeof CurriculaConfigSchema>;

/**
 * Validate configuration object
 */
export function validateConfig(config: unknown): {
  success: boolean;
  data?: CurriculaConfig;
  error?: z.ZodError;
} {
  const result = CurriculaConfigSchema.safeParse(config);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Create default configuration
 */
export function createDefaultConfig(): CurriculaConfig {
  return CurriculaConfigSchema.parse({});
}
