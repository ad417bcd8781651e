/**
 * Workflow state, messages, progress events and the deliverable
 */

import type { Artifacts, Requirements } from "../types/artifacts.js";
import type {
  OrchestrationMode,
  Participant,
  Phase,
  PhaseState,
  RoleId,
  RoleStatus,
} from "../types/workflow.js";
import type { QualityMetrics, RevisionNote } from "../quality/types.js";
import type { AggregatedMetrics } from "./metrics.js";
import type { UsageSnapshot } from "../providers/usage.js";

export type MessageType = "request" | "response" | "broadcast";

/**
 * One entry of the message log. Frozen once appended.
 */
export interface WorkflowMessage {
  readonly id: string;
  readonly sender: Participant;
  /** Absent for broadcasts */
  readonly recipient?: Participant;
  readonly type: MessageType;
  readonly payload: Readonly<Record<string, unknown>>;
  readonly requiresResponse: boolean;
  /** Set on a response: the id of its request */
  readonly parentId?: string;
  readonly timestamp: string;
}

/**
 * Snapshot taken at the start of each phase
 */
export interface Checkpoint {
  readonly id: string;
  readonly phase: Phase;
  readonly iteration: number;
  readonly createdAt: string;
  readonly artifacts: Artifacts;
  readonly qualityMetrics?: QualityMetrics;
  readonly revisionNotes: readonly RevisionNote[];
  readonly messageCount: number;
}

/**
 * Everything one run knows. Written only by the orchestrator and the phase
 * handler it is currently executing.
 */
export interface WorkflowState {
  readonly sessionId: string;
  readonly mode: OrchestrationMode;
  requirements: Requirements;
  phase: PhaseState;
  iterationCount: number;
  /** Append-only */
  readonly messageLog: WorkflowMessage[];
  artifacts: Artifacts;
  roleStatus: Record<RoleId, RoleStatus>;
  qualityMetrics?: QualityMetrics;
  qualityHistory: QualityMetrics[];
  revisionNotes: RevisionNote[];
  /** Ordered, never pruned during a run */
  readonly checkpoints: Checkpoint[];
  startedAt: string;
  completedAt?: string;
}

interface BaseEvent {
  sessionId: string;
  percent: number;
  timestamp: string;
}

/**
 * Emitted after each phase completes
 */
export interface PhaseEvent extends BaseEvent {
  type: "phase";
  phase: Phase;
  iteration: number;
  delta?: Partial<Artifacts>;
  /** Present after the quality gate ran */
  quality?: QualityMetrics;
}

/**
 * Emitted after each sub-task of a list phase
 */
export interface StepEvent extends BaseEvent {
  type: "step";
  phase: Phase;
  step: string;
  /** Sub-tasks finished so far, including this one */
  completed: number;
  total: number;
  delta?: Partial<Artifacts>;
}

export interface CompleteEvent extends BaseEvent {
  type: "complete";
  phase: "finalize";
  deliverable: Deliverable;
}

export interface ErrorEvent extends BaseEvent {
  type: "error";
  phase: PhaseState;
  error: Error;
}

export type ProgressEvent = PhaseEvent | StepEvent | CompleteEvent | ErrorEvent;

/**
 * Final result of a run
 */
export interface Deliverable extends Artifacts {
  sessionId: string;
  mode: OrchestrationMode;
  requirements: Requirements;
  qualityMetrics: QualityMetrics;
  iterationCount: number;
  /** Finalized below the quality threshold after the iteration limit */
  belowThreshold: boolean;
  metadata: {
    startedAt: string;
    completedAt: string;
    durationMs: number;
    messageCount: number;
    phases: AggregatedMetrics;
    usage: UsageSnapshot;
  };
}
