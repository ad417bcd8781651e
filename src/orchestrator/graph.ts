/**
 * Phase graph
 *
 * A fixed state machine per mode. The only conditional edge leaves
 * material_production: loop back through review_iteration while quality is
 * below threshold and iterations remain, otherwise finalize.
 */

import type { OrchestrationMode, Phase, PhaseState } from "../types/workflow.js";

/**
 * Legal transitions per mode
 */
export const VALID_TRANSITIONS: Record<OrchestrationMode, Record<Phase, PhaseState[]>> = {
  full_course: {
    initialize: ["theoretical_foundation"],
    theoretical_foundation: ["architecture_design"],
    architecture_design: ["content_creation"],
    content_creation: ["assessment_design"],
    assessment_design: ["material_production"],
    material_production: ["review_iteration", "finalize"],
    review_iteration: ["architecture_design"],
    finalize: ["terminated"],
  },
  quick_design: {
    initialize: ["architecture_design"],
    theoretical_foundation: [],
    architecture_design: ["content_creation"],
    content_creation: ["finalize"],
    assessment_design: [],
    material_production: [],
    review_iteration: [],
    finalize: ["terminated"],
  },
};

/**
 * Inputs of the quality gate decision
 */
export interface GateInput {
  composite: number;
  threshold: number;
  iterationCount: number;
  maxIterations: number;
}

export type GateDecision = "pass" | "iterate" | "limit";

export function decideGate(gate: GateInput): GateDecision {
  if (gate.composite >= gate.threshold) return "pass";
  return gate.iterationCount < gate.maxIterations ? "iterate" : "limit";
}

/**
 * Successor of `phase`. The gate decision is required after material_production.
 */
export function nextPhase(
  mode: OrchestrationMode,
  phase: Phase,
  decision?: GateDecision,
): PhaseState {
  const options = VALID_TRANSITIONS[mode][phase];
  if (options.length > 1) {
    return decision === "iterate" ? "review_iteration" : "finalize";
  }
  const next = options[0];
  if (next === undefined) {
    throw new Error(`Phase ${phase} is not part of the ${mode} graph`);
  }
  return next;
}

export function isValidTransition(mode: OrchestrationMode, from: Phase, to: PhaseState): boolean {
  return VALID_TRANSITIONS[mode][from].includes(to);
}

/**
 * Phases of one straight pass through the graph
 */
export function phasesOf(mode: OrchestrationMode): Phase[] {
  const phases: Phase[] = [];
  let current: PhaseState = "initialize";
  while (current !== "terminated") {
    phases.push(current);
    current = nextPhase(mode, current, "pass");
  }
  return phases;
}
