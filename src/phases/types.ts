/**
 * Phase handler contract
 */

import type { Logger, ILogObj } from "tslog";
import type { RoleRegistry } from "../agents/registry.js";
import type { GenerationGateway } from "../providers/gateway.js";
import type { WorkflowConfig } from "../config/schema.js";
import type { Artifacts } from "../types/artifacts.js";
import type { Phase, RoleId } from "../types/workflow.js";
import type { WorkflowState } from "../orchestrator/types.js";

/**
 * Progress of one sub-task inside a list phase
 */
export interface StepProgress {
  step: string;
  completed: number;
  total: number;
  delta?: Partial<Artifacts>;
}

/**
 * What a handler gets from the orchestrator for one phase visit
 */
export interface PhaseContext {
  config: WorkflowConfig;
  roles: RoleRegistry;
  gateway: GenerationGateway;
  logger: Logger<ILogObj>;
  signal?: AbortSignal;
  onStep?: (progress: StepProgress) => void;
}

export interface PhaseHandler {
  readonly phase: Phase;
  /** Roles the handler may invoke */
  readonly roles: readonly RoleId[];
  handle(state: WorkflowState, context: PhaseContext): Promise<WorkflowState>;
}
