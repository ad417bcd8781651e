/**
 * Material Creator: one learning material per configured type
 */

import { BaseSpecialist } from "./specialist.js";
import type { CreateMaterialTask } from "./types.js";
import { LearningMaterialSchema, type LearningMaterial } from "../types/artifacts.js";
import { CREATE_MATERIAL_PROMPT, bulletList, fillPrompt } from "./prompts.js";

export class MaterialCreator extends BaseSpecialist<"create_material"> {
  override readonly id = "material_creator";
  override readonly taskType = "create_material";
  override readonly description = "Produces worksheets, templates, guides and digital resources";

  protected override readonly schema = LearningMaterialSchema;
  protected override readonly maxTokens = 8192;

  protected override buildPrompt(task: CreateMaterialTask): string {
    const { architecture, contentModules, materialType } = task;
    return fillPrompt(CREATE_MATERIAL_PROMPT, {
      courseTitle: architecture.title,
      materialType,
      modules: bulletList(architecture.modules.map((m) => `${m.id}: ${m.title}`)),
      summaries: bulletList(contentModules.map((c) => `${c.moduleId}: ${c.summary}`)),
    });
  }

  protected override finalize(
    artifact: LearningMaterial,
    task: CreateMaterialTask,
  ): LearningMaterial {
    return { ...artifact, materialType: task.materialType };
  }
}
