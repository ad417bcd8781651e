/**
 * Role registry
 *
 * The team is closed: exactly one implementation per role id. Tests swap
 * individual roles through `overrides`.
 */

import type { Role } from "./types.js";
import { EducationTheorist } from "./theorist.js";
import { CourseArchitect } from "./architect.js";
import { ContentDesigner } from "./content-designer.js";
import { AssessmentExpert } from "./assessment-expert.js";
import { MaterialCreator } from "./material-creator.js";

export interface RoleRegistry {
  education_theorist: Role<"develop_framework">;
  course_architect: Role<"design_structure">;
  content_designer: Role<"create_content">;
  assessment_expert: Role<"design_strategy">;
  material_creator: Role<"create_material">;
}

/**
 * Create the default team
 */
export function createRoleRegistry(overrides: Partial<RoleRegistry> = {}): RoleRegistry {
  return {
    education_theorist: overrides.education_theorist ?? new EducationTheorist(),
    course_architect: overrides.course_architect ?? new CourseArchitect(),
    content_designer: overrides.content_designer ?? new ContentDesigner(),
    assessment_expert: overrides.assessment_expert ?? new AssessmentExpert(),
    material_creator: overrides.material_creator ?? new MaterialCreator(),
  };
}
