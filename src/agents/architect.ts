/**
 * Course Architect: module structure of the course
 */

import { BaseSpecialist } from "./specialist.js";
import type { DesignStructureTask } from "./types.js";
import { CourseArchitectureSchema } from "../types/artifacts.js";
import { DESIGN_STRUCTURE_PROMPT, bulletList, fillPrompt } from "./prompts.js";

export class CourseArchitect extends BaseSpecialist<"design_structure"> {
  override readonly id = "course_architect";
  override readonly taskType = "design_structure";
  override readonly description = "Designs the module structure, sequencing and deliverables";

  protected override readonly schema = CourseArchitectureSchema;
  protected override readonly maxTokens = 8192;

  protected override buildPrompt(task: DesignStructureTask): string {
    const { requirements, framework, revisionNotes } = task;
    return fillPrompt(DESIGN_STRUCTURE_PROMPT, {
      topic: requirements.topic,
      audience: requirements.audience ?? "general learners",
      duration: requirements.duration,
      goals: bulletList(requirements.goals),
      framework: framework ?? "(none: design directly from the goals)",
      revisionNotes: bulletList(
        revisionNotes.map((note) => `[${note.priority}] ${note.role}: ${note.instruction}`),
      ),
    });
  }
}
