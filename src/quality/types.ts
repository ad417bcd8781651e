/**
 * Quality gate types for Curricula
 */

import type { RoleId } from "../types/workflow.js";

/**
 * The five quality dimensions, each scored 0..1
 */
export interface QualityDimensions {
  /**
   * Are all expected artifacts present?
   */
  completeness: number;

  /**
   * Do assessment references resolve to architecture modules?
   */
  coherence: number;

  /**
   * Are the stated goals covered by objectives and content?
   */
  alignment: number;

  innovation: number;
  practicality: number;
}

export type QualityDimension = keyof QualityDimensions;

export const QUALITY_DIMENSIONS: readonly QualityDimension[] = [
  "completeness",
  "coherence",
  "alignment",
  "innovation",
  "practicality",
];

/**
 * Scores computed for one pass of the pipeline
 */
export interface QualityMetrics extends QualityDimensions {
  /** Weighted mean of the dimensions, rounded to 4 decimals */
  composite: number;
  /** Iteration the metrics were computed on */
  iteration: number;
  evaluatedAt: string;
}

/**
 * Improvement feedback produced on loop-back
 */
export interface RevisionNote {
  dimension: QualityDimension;
  role: RoleId;
  score: number;
  priority: "high" | "medium";
  instruction: string;
}

/**
 * Scores below this are marked high priority
 */
export const HIGH_PRIORITY_BELOW = 0.7;

/**
 * Which role is asked to improve which dimension
 */
export const DIMENSION_OWNERS: Record<QualityDimension, RoleId> = {
  completeness: "course_architect",
  coherence: "course_architect",
  alignment: "education_theorist",
  innovation: "content_designer",
  practicality: "material_creator",
};
