/**
 * Education Theorist: pedagogical framework for the course
 */

import { BaseSpecialist } from "./specialist.js";
import type { DevelopFrameworkTask } from "./types.js";
import { TheoreticalFrameworkSchema } from "../types/artifacts.js";
import { DEVELOP_FRAMEWORK_PROMPT, bulletList, fillPrompt } from "./prompts.js";

export class EducationTheorist extends BaseSpecialist<"develop_framework"> {
  override readonly id = "education_theorist";
  override readonly taskType = "develop_framework";
  override readonly description = "Develops the pedagogical framework and learning objectives";

  protected override readonly schema = TheoreticalFrameworkSchema;

  protected override buildPrompt(task: DevelopFrameworkTask): string {
    const { requirements } = task;
    return fillPrompt(DEVELOP_FRAMEWORK_PROMPT, {
      topic: requirements.topic,
      audience: requirements.audience ?? "general learners",
      duration: requirements.duration,
      goals: bulletList(requirements.goals),
      constraints: bulletList(requirements.constraints),
    });
  }
}
