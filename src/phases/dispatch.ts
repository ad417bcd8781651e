/**
 * Role invocation shared by the phase handlers
 */

import type { Role, TaskFor, ArtifactFor } from "../agents/types.js";
import type { Phase, RoleId, TaskType } from "../types/workflow.js";
import type { WorkflowState } from "../orchestrator/types.js";
import type { PhaseContext } from "./types.js";
import { appendMessage, enterPhase } from "../orchestrator/state.js";
import { throwIfAborted } from "../utils/async.js";
import { DependencyMissingError } from "../utils/errors.js";

/**
 * Start a phase visit: set the phase, take the checkpoint, then check inputs.
 * `missing` lists the slots the phase needs but does not have.
 */
export function beginPhase(state: WorkflowState, phase: Phase, missing: string[]): void {
  enterPhase(state, phase);
  if (missing.length > 0) {
    throw new DependencyMissingError(phase, missing);
  }
}

/**
 * Send one task to a role: request message, execution, response message.
 * The artifact is returned; writing it to its slot is the handler's job.
 */
export async function invokeRole<K extends TaskType>(
  state: WorkflowState,
  role: Role<K>,
  task: TaskFor<K>,
  context: PhaseContext,
  subject?: string,
): Promise<ArtifactFor<K>> {
  throwIfAborted(context.signal, state.phase);

  const request = appendMessage(state, {
    sender: "orchestrator",
    recipient: role.id,
    type: "request",
    payload: { taskType: role.taskType, subject, iteration: state.iterationCount },
    requiresResponse: true,
  });

  const artifact = await role.execute(task, {
    gateway: context.gateway,
    routing: context.config.routing,
    signal: context.signal,
    logger: context.logger,
  });

  appendMessage(state, {
    sender: role.id,
    recipient: "orchestrator",
    type: "response",
    payload: { taskType: role.taskType, subject, artifact: structuredClone(artifact) },
    requiresResponse: false,
    parentId: request.id,
  });

  return artifact;
}

/**
 * Run `fn` with the role marked in progress; completed or failed afterwards
 */
export async function withRoleStatus<T>(
  state: WorkflowState,
  roleId: RoleId,
  fn: () => Promise<T>,
): Promise<T> {
  state.roleStatus[roleId] = "in_progress";
  try {
    const result = await fn();
    state.roleStatus[roleId] = "completed";
    return result;
  } catch (error) {
    state.roleStatus[roleId] = "failed";
    throw error;
  }
}
