/**
 * Orchestrator module exports
 */

export { Orchestrator, drain } from "./orchestrator.js";
export type { OrchestratorOptions, RunOptions, ResumeOptions } from "./orchestrator.js";
export { WorkflowService } from "./service.js";
export type { WorkflowServiceOptions, StartOptions } from "./service.js";
export { InMemorySessionStore } from "./sessions.js";
export type { SessionRecord, SessionStatus, SessionStore } from "./sessions.js";
export { VALID_TRANSITIONS, decideGate, nextPhase, isValidTransition, phasesOf } from "./graph.js";
export type { GateDecision, GateInput } from "./graph.js";
export { ProgressTracker, PHASE_WEIGHTS } from "./progress.js";
export { MetricsCollector, formatDuration } from "./metrics.js";
export type { AggregatedMetrics, PhaseMetrics } from "./metrics.js";
export { compileDeliverable, renderMarkdown } from "./deliverable.js";
export { createInitialState, lastCheckpoint, restoreCheckpoint } from "./state.js";
export type * from "./types.js";
