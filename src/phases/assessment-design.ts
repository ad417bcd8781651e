/**
 * ASSESSMENT DESIGN phase
 */

import type { PhaseContext, PhaseHandler } from "./types.js";
import type { WorkflowState } from "../orchestrator/types.js";
import { beginPhase, invokeRole, withRoleStatus } from "./dispatch.js";

export class AssessmentDesignHandler implements PhaseHandler {
  readonly phase = "assessment_design";
  readonly description = "Design the assessment strategy";
  readonly roles = ["assessment_expert"] as const;

  async handle(state: WorkflowState, context: PhaseContext): Promise<WorkflowState> {
    const architecture = state.artifacts.courseArchitecture;
    const missing: string[] = [];
    if (!architecture) {
      missing.push("courseArchitecture");
    } else {
      for (const module of architecture.modules) {
        const matches = state.artifacts.contentModules.filter((c) => c.moduleId === module.id);
        if (matches.length !== 1) missing.push(`contentModules[${module.id}]`);
      }
    }
    beginPhase(state, this.phase, missing);
    if (!architecture) return state;

    const role = context.roles.assessment_expert;
    state.artifacts.assessmentStrategy = await withRoleStatus(state, role.id, () =>
      invokeRole(
        state,
        role,
        {
          type: "design_strategy",
          requirements: state.requirements,
          architecture,
          contentModules: state.artifacts.contentModules,
        },
        context,
      ),
    );

    return state;
  }
}
