/**
 * INITIALIZE phase
 *
 * Resets role status and announces the run to the team
 */

import type { PhaseContext, PhaseHandler } from "./types.js";
import type { WorkflowState } from "../orchestrator/types.js";
import { appendMessage, deepFreeze, idleRoles } from "../orchestrator/state.js";
import { beginPhase } from "./dispatch.js";

export class InitializeHandler implements PhaseHandler {
  readonly phase = "initialize";
  readonly description = "Freeze requirements and brief the team";
  readonly roles = [] as const;

  async handle(state: WorkflowState, context: PhaseContext): Promise<WorkflowState> {
    beginPhase(state, this.phase, state.requirements.topic ? [] : ["requirements.topic"]);

    deepFreeze(state.requirements);
    state.roleStatus = idleRoles();

    appendMessage(state, {
      sender: "orchestrator",
      type: "broadcast",
      payload: {
        event: "run_started",
        mode: state.mode,
        topic: state.requirements.topic,
        materialTypes: [...context.config.materialTypes],
      },
      requiresResponse: false,
    });

    context.logger.info(`Session ${state.sessionId}: designing "${state.requirements.topic}"`);
    return state;
  }
}
