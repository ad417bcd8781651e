/**
 * Curricula: multi-agent curriculum design
 *
 * A fixed team of five specialist roles is driven through a phase-sequenced
 * workflow that turns a requirement record into a project-based curriculum:
 * framework, module architecture, content, assessment and materials.
 *
 * @packageDocumentation
 */

// Version
export { VERSION } from "./version.js";

// Orchestrator
export {
  Orchestrator,
  WorkflowService,
  InMemorySessionStore,
  drain,
  renderMarkdown,
} from "./orchestrator/index.js";
export type {
  OrchestratorOptions,
  RunOptions,
  ResumeOptions,
  WorkflowServiceOptions,
  StartOptions,
  SessionRecord,
  SessionStatus,
  SessionStore,
  WorkflowState,
  WorkflowMessage,
  Checkpoint,
  ProgressEvent,
  Deliverable,
} from "./orchestrator/index.js";

// Configuration
export { loadConfig, mergeConfig } from "./config/loader.js";
export { CurriculaConfigSchema, WorkflowConfigSchema, createDefaultConfig } from "./config/schema.js";
export type { CurriculaConfig, CurriculaConfigInput, WorkflowConfig, WorkflowConfigInput } from "./config/schema.js";

// Artifacts and vocabulary
export * from "./types/artifacts.js";
export * from "./types/workflow.js";

// Roles
export { createRoleRegistry } from "./agents/registry.js";
export type { RoleRegistry } from "./agents/registry.js";
export type { Role, RoleContext, TaskFor, ArtifactFor } from "./agents/types.js";

// Phases
export { createPhaseHandlers } from "./phases/index.js";
export type { PhaseHandler, PhaseHandlers, PhaseContext } from "./phases/index.js";

// Quality
export { evaluateQuality, buildRevisionNotes } from "./quality/evaluator.js";
export type { QualityMetrics, QualityDimensions, RevisionNote } from "./quality/types.js";

// Providers
export { GenerationGateway, UsageTracker, AnthropicProvider, OpenAIProvider } from "./providers/index.js";
export type { LLMProvider, Message, ChatResponse, ChatOptions } from "./providers/types.js";

// Utilities
export * from "./utils/errors.js";
export { createLogger } from "./utils/logger.js";
