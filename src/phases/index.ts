/**
 * Phase handlers
 */

import type { Phase } from "../types/workflow.js";
import type { PhaseHandler } from "./types.js";
import { InitializeHandler } from "./initialize.js";
import { TheoreticalFoundationHandler } from "./theoretical-foundation.js";
import { ArchitectureDesignHandler } from "./architecture-design.js";
import { ContentCreationHandler } from "./content-creation.js";
import { AssessmentDesignHandler } from "./assessment-design.js";
import { MaterialProductionHandler } from "./material-production.js";
import { ReviewIterationHandler } from "./review-iteration.js";
import { FinalizeHandler } from "./finalize.js";

export type PhaseHandlers = Record<Phase, PhaseHandler>;

export function createPhaseHandlers(overrides: Partial<PhaseHandlers> = {}): PhaseHandlers {
  return {
    initialize: overrides.initialize ?? new InitializeHandler(),
    theoretical_foundation: overrides.theoretical_foundation ?? new TheoreticalFoundationHandler(),
    architecture_design: overrides.architecture_design ?? new ArchitectureDesignHandler(),
    content_creation: overrides.content_creation ?? new ContentCreationHandler(),
    assessment_design: overrides.assessment_design ?? new AssessmentDesignHandler(),
    material_production: overrides.material_production ?? new MaterialProductionHandler(),
    review_iteration: overrides.review_iteration ?? new ReviewIterationHandler(),
    finalize: overrides.finalize ?? new FinalizeHandler(),
  };
}

export type { PhaseHandler, PhaseContext, StepProgress } from "./types.js";
export { InitializeHandler } from "./initialize.js";
export { TheoreticalFoundationHandler } from "./theoretical-foundation.js";
export { ArchitectureDesignHandler } from "./architecture-design.js";
export { ContentCreationHandler } from "./content-creation.js";
export { AssessmentDesignHandler } from "./assessment-design.js";
export { MaterialProductionHandler } from "./material-production.js";
export { ReviewIterationHandler } from "./review-iteration.js";
export { FinalizeHandler } from "./finalize.js";
