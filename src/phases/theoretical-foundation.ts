/**
 * THEORETICAL FOUNDATION phase
 */

import type { PhaseContext, PhaseHandler } from "./types.js";
import type { WorkflowState } from "../orchestrator/types.js";
import { beginPhase, invokeRole, withRoleStatus } from "./dispatch.js";

export class TheoreticalFoundationHandler implements PhaseHandler {
  readonly phase = "theoretical_foundation";
  readonly description = "Develop the pedagogical framework";
  readonly roles = ["education_theorist"] as const;

  async handle(state: WorkflowState, context: PhaseContext): Promise<WorkflowState> {
    beginPhase(state, this.phase, state.requirements.topic ? [] : ["requirements"]);

    const role = context.roles.education_theorist;
    state.artifacts.theoreticalFramework = await withRoleStatus(state, role.id, () =>
      invokeRole(
        state,
        role,
        { type: "develop_framework", requirements: state.requirements },
        context,
      ),
    );

    return state;
  }
}
