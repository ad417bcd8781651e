/**
 * ARCHITECTURE DESIGN phase
 *
 * Entry point of every loop-back: the downstream slots are cleared so the
 * content, assessment and material phases rebuild them for the new structure.
 */

import type { PhaseContext, PhaseHandler } from "./types.js";
import type { WorkflowState } from "../orchestrator/types.js";
import { beginPhase, invokeRole, withRoleStatus } from "./dispatch.js";

export class ArchitectureDesignHandler implements PhaseHandler {
  readonly phase = "architecture_design";
  readonly description = "Design the module structure";
  readonly roles = ["course_architect"] as const;

  async handle(state: WorkflowState, context: PhaseContext): Promise<WorkflowState> {
    const missing: string[] = [];
    if (!state.requirements.topic) missing.push("requirements");
    if (state.mode === "full_course" && !state.artifacts.theoreticalFramework) {
      missing.push("theoreticalFramework");
    }
    beginPhase(state, this.phase, missing);

    state.artifacts.contentModules = [];
    delete state.artifacts.assessmentStrategy;
    state.artifacts.learningMaterials = [];

    const role = context.roles.course_architect;
    state.artifacts.courseArchitecture = await withRoleStatus(state, role.id, () =>
      invokeRole(
        state,
        role,
        {
          type: "design_structure",
          requirements: state.requirements,
          framework: state.artifacts.theoreticalFramework,
          revisionNotes: state.revisionNotes,
        },
        context,
      ),
    );

    return state;
  }
}
