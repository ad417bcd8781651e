/**
 * Shared workflow state
 */

import { randomUUID } from "node:crypto";
import type { Artifacts, Requirements } from "../types/artifacts.js";
import type { OrchestrationMode, Phase, RoleId, RoleStatus } from "../types/workflow.js";
import type { Checkpoint, WorkflowMessage, WorkflowState } from "./types.js";
import { RecoveryError } from "../utils/errors.js";

/**
 * Freeze a value and everything reachable from it
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function emptyArtifacts(): Artifacts {
  return { contentModules: [], learningMaterials: [] };
}

export function idleRoles(): Record<RoleId, RoleStatus> {
  return {
    education_theorist: "idle",
    course_architect: "idle",
    content_designer: "idle",
    assessment_expert: "idle",
    material_creator: "idle",
  };
}

/**
 * Create the state for a new run. Requirements must already be validated.
 */
export function createInitialState(
  requirements: Requirements,
  mode: OrchestrationMode,
  sessionId: string = randomUUID(),
): WorkflowState {
  return {
    sessionId,
    mode,
    requirements: deepFreeze(structuredClone(requirements)),
    phase: "initialize",
    iterationCount: 0,
    messageLog: [],
    artifacts: emptyArtifacts(),
    roleStatus: idleRoles(),
    qualityHistory: [],
    revisionNotes: [],
    checkpoints: [],
    startedAt: new Date().toISOString(),
  };
}

/**
 * Move the state into a phase and record the start-of-phase checkpoint
 */
export function enterPhase(state: WorkflowState, phase: Phase): Checkpoint {
  state.phase = phase;
  const checkpoint: Checkpoint = deepFreeze({
    id: randomUUID(),
    phase,
    iteration: state.iterationCount,
    createdAt: new Date().toISOString(),
    artifacts: structuredClone(state.artifacts),
    qualityMetrics: state.qualityMetrics ? structuredClone(state.qualityMetrics) : undefined,
    revisionNotes: structuredClone(state.revisionNotes),
    messageCount: state.messageLog.length,
  });
  state.checkpoints.push(checkpoint);
  return checkpoint;
}

/**
 * Append a frozen message to the log
 */
export function appendMessage(
  state: WorkflowState,
  message: Omit<WorkflowMessage, "id" | "timestamp">,
): WorkflowMessage {
  const entry: WorkflowMessage = deepFreeze({
    ...message,
    id: randomUUID(),
    timestamp: new Date().toISOString(),
  });
  state.messageLog.push(entry);
  return entry;
}

/**
 * The checkpoint a resumed run restarts from
 */
export function lastCheckpoint(state: WorkflowState): Checkpoint {
  const checkpoint = state.checkpoints.at(-1);
  if (!checkpoint) {
    throw new RecoveryError("Run has no checkpoint to resume from", {
      sessionId: state.sessionId,
    });
  }
  return checkpoint;
}

/**
 * Roll the mutable parts of the state back to a checkpoint. The message log
 * and the checkpoint list are kept as they are.
 */
export function restoreCheckpoint(state: WorkflowState, checkpoint: Checkpoint): void {
  state.phase = checkpoint.phase;
  state.iterationCount = checkpoint.iteration;
  state.artifacts = structuredClone(checkpoint.artifacts);
  state.qualityMetrics = checkpoint.qualityMetrics
    ? structuredClone(checkpoint.qualityMetrics)
    : undefined;
  state.revisionNotes = structuredClone([...checkpoint.revisionNotes]);
  state.roleStatus = idleRoles();
  delete state.completedAt;
}
