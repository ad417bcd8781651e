/**
 * Progress percentage for streamed events
 *
 * Each phase owns a share of the run. A phase's share is spent as its
 * sub-tasks finish. Percent never decreases: after a loop-back the reported
 * value holds until the new pass overtakes it.
 */

import type { OrchestrationMode, Phase } from "../types/workflow.js";
import { phasesOf } from "./graph.js";

/**
 * Relative weight of each phase in a full-course run
 */
export const PHASE_WEIGHTS: Record<Phase, number> = {
  initialize: 0.05,
  theoretical_foundation: 0.15,
  architecture_design: 0.2,
  content_creation: 0.25,
  assessment_design: 0.15,
  material_production: 0.15,
  review_iteration: 0.03,
  finalize: 0.02,
};

export class ProgressTracker {
  private readonly start = new Map<Phase, number>();
  private readonly share = new Map<Phase, number>();
  private last = 0;

  constructor(mode: OrchestrationMode) {
    const phases = phasesOf(mode);
    const total = phases.reduce((sum, p) => sum + PHASE_WEIGHTS[p], 0);
    let offset = 0;
    for (const phase of phases) {
      const share = PHASE_WEIGHTS[phase] / total;
      this.start.set(phase, offset);
      this.share.set(phase, share);
      offset += share;
    }
    // review_iteration is off the straight pass; it sits just before finalize
    if (!this.start.has("review_iteration")) {
      const finalizeStart = this.start.get("finalize") ?? 1;
      this.start.set("review_iteration", finalizeStart);
      this.share.set("review_iteration", 0);
    }
  }

  /**
   * Percent (0-100) once `fraction` of `phase` is done
   */
  percent(phase: Phase, fraction = 1): number {
    const start = this.start.get(phase) ?? 0;
    const share = this.share.get(phase) ?? 0;
    const clamped = Math.min(1, Math.max(0, fraction));
    const value = Math.round((start + share * clamped) * 100);
    this.last = Math.max(this.last, Math.min(100, value));
    return this.last;
  }

  /**
   * Last percent reported
   */
  get current(): number {
    return this.last;
  }
}
