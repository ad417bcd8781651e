/**
 * Content Designer: learning content for one architecture module
 */

import { BaseSpecialist } from "./specialist.js";
import type { CreateContentTask } from "./types.js";
import { ContentModuleSchema, type ContentModule } from "../types/artifacts.js";
import { CREATE_CONTENT_PROMPT, bulletList, fillPrompt } from "./prompts.js";

export class ContentDesigner extends BaseSpecialist<"create_content"> {
  override readonly id = "content_designer";
  override readonly taskType = "create_content";
  override readonly description = "Creates driving questions, activities and resources per module";

  protected override readonly schema = ContentModuleSchema;

  protected override buildPrompt(task: CreateContentTask): string {
    const { module, architecture, framework } = task;
    return fillPrompt(CREATE_CONTENT_PROMPT, {
      courseTitle: architecture.title,
      moduleId: module.id,
      moduleTitle: module.title,
      moduleDuration: module.duration || "unspecified",
      objectives: bulletList(module.objectives),
      keyConcepts: bulletList(module.keyConcepts),
      approach: framework?.pedagogicalApproach ?? "project-based learning",
    });
  }

  /**
   * The content always belongs to the module it was requested for
   */
  protected override finalize(artifact: ContentModule, task: CreateContentTask): ContentModule {
    return { ...artifact, moduleId: task.module.id };
  }
}
