/**
 * REVIEW / ITERATION phase
 *
 * Turns the low quality dimensions into improvement requests for the roles
 * that own them, then opens the next iteration.
 */

import type { PhaseContext, PhaseHandler } from "./types.js";
import type { WorkflowState } from "../orchestrator/types.js";
import { appendMessage } from "../orchestrator/state.js";
import { buildRevisionNotes } from "../quality/evaluator.js";
import { beginPhase } from "./dispatch.js";

export class ReviewIterationHandler implements PhaseHandler {
  readonly phase = "review_iteration";
  readonly description = "Send improvement feedback and loop back";
  readonly roles = [] as const;

  async handle(state: WorkflowState, context: PhaseContext): Promise<WorkflowState> {
    const metrics = state.qualityMetrics;
    beginPhase(state, this.phase, metrics ? [] : ["qualityMetrics"]);
    if (!metrics) return state;

    const notes = buildRevisionNotes(metrics, context.config.qualityThreshold);
    for (const note of notes) {
      appendMessage(state, {
        sender: "orchestrator",
        recipient: note.role,
        type: "request",
        payload: {
          kind: "improve",
          dimension: note.dimension,
          score: note.score,
          priority: note.priority,
          instruction: note.instruction,
          iteration: state.iterationCount,
        },
        requiresResponse: false,
      });
    }

    state.revisionNotes = notes;
    state.iterationCount += 1;
    context.logger.info(
      `Quality ${metrics.composite} below ${context.config.qualityThreshold}; starting iteration ${state.iterationCount}`,
    );
    return state;
  }
}
