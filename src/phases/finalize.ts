/**
 * FINALIZE phase
 */

import type { PhaseContext, PhaseHandler } from "./types.js";
import type { WorkflowState } from "../orchestrator/types.js";
import { appendMessage } from "../orchestrator/state.js";
import { evaluateQuality } from "../quality/evaluator.js";
import { beginPhase } from "./dispatch.js";

export class FinalizeHandler implements PhaseHandler {
  readonly phase = "finalize";
  readonly description = "Score the result and close the run";
  readonly roles = [] as const;

  async handle(state: WorkflowState, context: PhaseContext): Promise<WorkflowState> {
    beginPhase(state, this.phase, state.artifacts.courseArchitecture ? [] : ["courseArchitecture"]);

    // Modes without material production have not been scored yet
    let metrics = state.qualityMetrics;
    if (!metrics || metrics.iteration !== state.iterationCount) {
      metrics = evaluateQuality(
        {
          mode: state.mode,
          requirements: state.requirements,
          artifacts: state.artifacts,
          materialTypes: context.config.materialTypes,
          iteration: state.iterationCount,
        },
        context.config.qualityWeights,
      );
      state.qualityMetrics = metrics;
      state.qualityHistory.push(metrics);
    }

    state.completedAt = new Date().toISOString();
    appendMessage(state, {
      sender: "orchestrator",
      type: "broadcast",
      payload: {
        event: "run_completed",
        composite: metrics.composite,
        iterations: state.iterationCount,
      },
      requiresResponse: false,
    });

    return state;
  }
}
