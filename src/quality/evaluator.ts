/**
 * Quality gate
 *
 * Scores a pass of the pipeline from the artifacts alone. Pure: the same
 * state and weights always give the same metrics.
 */

import type { QualityWeights } from "../config/schema.js";
import type { Artifacts, Requirements, SelfAssessment } from "../types/artifacts.js";
import type { MaterialType, OrchestrationMode } from "../types/workflow.js";
import {
  DIMENSION_OWNERS,
  HIGH_PRIORITY_BELOW,
  QUALITY_DIMENSIONS,
  type QualityDimensions,
  type QualityMetrics,
  type RevisionNote,
} from "./types.js";

/**
 * The slice of workflow state the gate reads
 */
export interface QualityInput {
  mode: OrchestrationMode;
  requirements: Requirements;
  artifacts: Artifacts;
  materialTypes: readonly MaterialType[];
  iteration: number;
}

/**
 * Distinct activity formats that count as full marks for innovation
 */
const FORMAT_TARGET = 4;

const MIN_KEYWORD_LENGTH = 4;

/**
 * Scripts written without spaces between words. A run of these letters is one
 * keyword, matched by containment instead of as a whole word.
 */
const UNSPACED_SCRIPT = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Thai}]/u;

const MIN_UNSPACED_KEYWORD_LENGTH = 2;

const STOP_WORDS = new Set([
  "able",
  "about",
  "after",
  "also",
  "been",
  "being",
  "both",
  "each",
  "from",
  "have",
  "into",
  "learn",
  "learners",
  "more",
  "most",
  "much",
  "only",
  "other",
  "over",
  "should",
  "some",
  "student",
  "students",
  "such",
  "than",
  "that",
  "their",
  "them",
  "then",
  "there",
  "these",
  "they",
  "this",
  "through",
  "understand",
  "what",
  "when",
  "which",
  "will",
  "with",
  "within",
  "would",
  "your",
]);

export function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

function ratio(passed: number, total: number): number {
  return total === 0 ? 0 : passed / total;
}

/**
 * Lower-case words of at least four letters, minus stop words. Runs of an
 * unspaced script (Chinese, Japanese, Thai) count from two characters.
 */
export function extractKeywords(text: string): string[] {
  const words = text.toLowerCase().match(/[\p{L}\p{M}]+/gu) ?? [];
  return [...new Set(words.filter(isKeyword))];
}

function isKeyword(word: string): boolean {
  if (UNSPACED_SCRIPT.test(word)) {
    return [...word].length >= MIN_UNSPACED_KEYWORD_LENGTH;
  }
  return word.length >= MIN_KEYWORD_LENGTH && !STOP_WORDS.has(word);
}

function scoreCompleteness({ mode, artifacts, materialTypes }: QualityInput): number {
  const architecture = artifacts.courseArchitecture;
  const moduleIds = architecture?.modules.map((m) => m.id) ?? [];
  const contentIds = artifacts.contentModules.map((c) => c.moduleId);
  const assessment = artifacts.assessmentStrategy;
  const producedTypes = artifacts.learningMaterials.map((m) => m.materialType);

  const structural = [
    moduleIds.length > 0,
    moduleIds.length > 0 &&
      contentIds.length === moduleIds.length &&
      moduleIds.every((id) => contentIds.filter((c) => c === id).length === 1),
  ];
  // Quick designs produce no framework, assessment or materials
  const checks =
    mode === "quick_design"
      ? structural
      : [
          (artifacts.theoreticalFramework?.learningObjectives.length ?? 0) > 0,
          ...structural,
          assessment !== undefined &&
            assessment.formative.length + assessment.summative.length > 0,
          materialTypes.length > 0 &&
            producedTypes.length === materialTypes.length &&
            materialTypes.every((t) => producedTypes.includes(t)),
        ];

  return ratio(checks.filter(Boolean).length, checks.length);
}

function scoreCoherence({ mode, artifacts }: QualityInput): number {
  const known = new Set(artifacts.courseArchitecture?.modules.map((m) => m.id) ?? []);
  const assessment = artifacts.assessmentStrategy;

  let refs: string[];
  if (assessment) {
    refs = [
      ...assessment.formative.map((f) => f.moduleId),
      ...assessment.summative.flatMap((s) => s.moduleIds),
    ];
  } else if (mode === "quick_design") {
    refs = artifacts.contentModules.map((c) => c.moduleId);
  } else {
    return 0;
  }

  return ratio(refs.filter((ref) => known.has(ref)).length, refs.length);
}

function scoreAlignment({ requirements, artifacts }: QualityInput): number {
  const architecture = artifacts.courseArchitecture;
  if (requirements.goals.length === 0) {
    return architecture ? 1 : 0;
  }

  const text = [
    ...(architecture?.modules.flatMap((m) => m.objectives) ?? []),
    ...(artifacts.theoreticalFramework?.learningObjectives ?? []),
    ...artifacts.contentModules.map((c) => c.summary),
  ]
    .join(" ")
    .toLowerCase();
  const corpus = new Set(extractKeywords(text));
  const found = (keyword: string): boolean =>
    corpus.has(keyword) || (UNSPACED_SCRIPT.test(keyword) && text.includes(keyword));

  const covered = requirements.goals.filter((goal) => {
    const keywords = extractKeywords(goal);
    if (keywords.length === 0) return false;
    const hits = keywords.filter(found).length;
    return hits / keywords.length >= 0.5;
  });

  return ratio(covered.length, requirements.goals.length);
}

function selfAssessments({ artifacts }: QualityInput): SelfAssessment[] {
  return [...artifacts.contentModules, ...artifacts.learningMaterials].flatMap((a) =>
    a.selfAssessment ? [a.selfAssessment] : [],
  );
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function scoreInnovation(input: QualityInput, reported: SelfAssessment[]): number {
  if (reported.length > 0) {
    return mean(reported.map((r) => r.innovation));
  }
  const formats = new Set(
    input.artifacts.contentModules.flatMap((c) =>
      c.activities.map((a) => a.format.trim().toLowerCase()),
    ),
  );
  return Math.min(1, formats.size / FORMAT_TARGET);
}

function scorePracticality(input: QualityInput, reported: SelfAssessment[]): number {
  if (reported.length > 0) {
    return mean(reported.map((r) => r.practicality));
  }
  const { artifacts } = input;
  if (input.mode === "quick_design") {
    // share of modules that list at least one resource
    const withResources = artifacts.contentModules.filter((c) => c.resources.length > 0);
    return ratio(withResources.length, artifacts.contentModules.length);
  }
  return Math.min(1, ratio(artifacts.learningMaterials.length, input.materialTypes.length));
}

/**
 * Weighted mean of the dimensions, rounded to 4 decimals
 */
export function compositeScore(dimensions: QualityDimensions, weights: QualityWeights): number {
  let weighted = 0;
  let total = 0;
  for (const dimension of QUALITY_DIMENSIONS) {
    weighted += weights[dimension] * dimensions[dimension];
    total += weights[dimension];
  }
  return total === 0 ? 0 : round4(weighted / total);
}

/**
 * Score the current artifacts
 */
export function evaluateQuality(input: QualityInput, weights: QualityWeights): QualityMetrics {
  const reported = selfAssessments(input);

  const dimensions: QualityDimensions = {
    completeness: round4(scoreCompleteness(input)),
    coherence: round4(scoreCoherence(input)),
    alignment: round4(scoreAlignment(input)),
    innovation: round4(scoreInnovation(input, reported)),
    practicality: round4(scorePracticality(input, reported)),
  };

  return {
    ...dimensions,
    composite: compositeScore(dimensions, weights),
    iteration: input.iteration,
    evaluatedAt: new Date().toISOString(),
  };
}

/**
 * Turn the dimensions below threshold into feedback for their owning roles
 */
export function buildRevisionNotes(metrics: QualityMetrics, threshold: number): RevisionNote[] {
  return QUALITY_DIMENSIONS.filter((d) => metrics[d] < threshold).map((dimension): RevisionNote => {
    const score = metrics[dimension];
    return {
      dimension,
      role: DIMENSION_OWNERS[dimension],
      score,
      priority: score < HIGH_PRIORITY_BELOW ? "high" : "medium",
      instruction: `Improve ${dimension}: scored ${score.toFixed(2)}, target ${threshold.toFixed(2)}`,
    };
  });
}
