/**
 * Assessment Expert: formative and summative assessment strategy
 */

import { BaseSpecialist } from "./specialist.js";
import type { DesignStrategyTask } from "./types.js";
import { AssessmentStrategySchema } from "../types/artifacts.js";
import { DESIGN_STRATEGY_PROMPT, bulletList, fillPrompt } from "./prompts.js";

export class AssessmentExpert extends BaseSpecialist<"design_strategy"> {
  override readonly id = "assessment_expert";
  override readonly taskType = "design_strategy";
  override readonly description = "Designs formative checks, summative assessments and rubrics";

  protected override readonly schema = AssessmentStrategySchema;

  protected override buildPrompt(task: DesignStrategyTask): string {
    const { architecture, contentModules } = task;
    return fillPrompt(DESIGN_STRATEGY_PROMPT, {
      courseTitle: architecture.title,
      modules: bulletList(architecture.modules.map((m) => `${m.id}: ${m.title}`)),
      summaries: bulletList(contentModules.map((c) => `${c.moduleId}: ${c.summary}`)),
    });
  }
}
