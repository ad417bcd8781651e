/**
 * Workflow orchestrator
 *
 * Drives one run through the phase graph. Every run is a stream of progress
 * events pushed into a channel; the batch contract drains that stream and
 * returns the deliverable from its `complete` event.
 */

import type { Logger, ILogObj } from "tslog";
import type { Deliverable, ProgressEvent, WorkflowState } from "./types.js";
import type { Artifacts } from "../types/artifacts.js";
import { RequirementsSchema } from "../types/artifacts.js";
import type { OrchestrationMode, Phase, PhaseState } from "../types/workflow.js";
import type { QualityMetrics } from "../quality/types.js";
import {
  createDefaultConfig,
  type CurriculaConfig,
  type WorkflowConfig,
  type WorkflowConfigInput,
} from "../config/schema.js";
import { mergeConfig } from "../config/loader.js";
import { createRoleRegistry, type RoleRegistry } from "../agents/registry.js";
import { createPhaseHandlers, type PhaseHandlers } from "../phases/index.js";
import type { PhaseContext } from "../phases/types.js";
import { GenerationGateway } from "../providers/gateway.js";
import { evaluateQuality } from "../quality/evaluator.js";
import { createInitialState, lastCheckpoint, restoreCheckpoint } from "./state.js";
import { decideGate, nextPhase, type GateDecision } from "./graph.js";
import { ProgressTracker } from "./progress.js";
import { MetricsCollector } from "./metrics.js";
import { compileDeliverable } from "./deliverable.js";
import { Channel } from "../utils/channel.js";
import { throwIfAborted } from "../utils/async.js";
import { validate } from "../utils/validation.js";
import {
  CancelledError,
  IterationLimitError,
  RecoveryError,
  WorkflowError,
  formatError,
} from "../utils/errors.js";
import { createChildLogger, getLogger } from "../utils/logger.js";

export interface RunOptions {
  mode?: OrchestrationMode;
  signal?: AbortSignal;
  sessionId?: string;
  /** Receives the live state as soon as it exists */
  onState?: (state: WorkflowState) => void;
}

export interface ResumeOptions {
  signal?: AbortSignal;
  config?: WorkflowConfigInput;
  onState?: (state: WorkflowState) => void;
}

export interface OrchestratorOptions {
  config?: CurriculaConfig;
  gateway?: GenerationGateway;
  roles?: Partial<RoleRegistry>;
  handlers?: Partial<PhaseHandlers>;
  logger?: Logger<ILogObj>;
}

interface PreparedRun {
  state: WorkflowState;
  workflow: WorkflowConfig;
  start: Phase;
  onState?: (state: WorkflowState) => void;
}

/**
 * Consume a run's events and return its deliverable, or throw its error
 */
export async function drain(events: AsyncIterable<ProgressEvent>): Promise<Deliverable> {
  for await (const event of events) {
    if (event.type === "complete") return event.deliverable;
    if (event.type === "error") throw event.error;
  }
  throw new CancelledError("Workflow stream ended without a result");
}

function toError(error: unknown): Error {
  if (error instanceof Error) return error;
  return new WorkflowError(String(error), { code: "UNEXPECTED_ERROR", recoverable: false });
}

function deltaOf(state: WorkflowState, phase: Phase): Partial<Artifacts> | undefined {
  const { artifacts } = state;
  switch (phase) {
    case "theoretical_foundation":
      return structuredClone({ theoreticalFramework: artifacts.theoreticalFramework });
    case "architecture_design":
      return structuredClone({ courseArchitecture: artifacts.courseArchitecture });
    case "content_creation":
      return structuredClone({ contentModules: artifacts.contentModules });
    case "assessment_design":
      return structuredClone({ assessmentStrategy: artifacts.assessmentStrategy });
    case "material_production":
      return structuredClone({ learningMaterials: artifacts.learningMaterials });
    default:
      return undefined;
  }
}

export class Orchestrator {
  readonly gateway: GenerationGateway;

  private readonly config: CurriculaConfig;
  private readonly roles: RoleRegistry;
  private readonly handlers: PhaseHandlers;
  private readonly logger: Logger<ILogObj>;

  constructor(options: OrchestratorOptions = {}) {
    this.config = options.config ?? createDefaultConfig();
    this.logger = options.logger ?? createChildLogger(getLogger(), "orchestrator");
    this.gateway =
      options.gateway ??
      new GenerationGateway({
        config: this.config.gateway,
        logger: createChildLogger(this.logger, "gateway"),
      });
    this.roles = createRoleRegistry(options.roles);
    this.handlers = createPhaseHandlers(options.handlers);
  }

  /**
   * Run to completion and return the deliverable.
   *
   * @throws ValidationError on malformed requirements or config
   * @throws GenerationError when a role exhausts its attempts
   * @throws CancelledError when the signal aborts
   */
  run(
    requirements: unknown,
    config?: WorkflowConfigInput,
    options: RunOptions = {},
  ): Promise<Deliverable> {
    return drain(this.stream(requirements, config, options));
  }

  /**
   * Run and yield progress events. The last event is `complete` or `error`.
   * Leaving the loop early cancels the run.
   */
  stream(
    requirements: unknown,
    config?: WorkflowConfigInput,
    options: RunOptions = {},
  ): AsyncIterableIterator<ProgressEvent> {
    return this.launch(options.signal, () => {
      const valid = validate(RequirementsSchema, requirements, "requirements");
      const state = createInitialState(valid, options.mode ?? "full_course", options.sessionId);
      options.onState?.(state);
      return {
        state,
        workflow: this.resolveConfig(config),
        start: "initialize",
        onState: options.onState,
      };
    });
  }

  /**
   * Continue a stopped run from its last checkpoint
   */
  resume(state: WorkflowState, options: ResumeOptions = {}): Promise<Deliverable> {
    return drain(this.resumeStream(state, options));
  }

  resumeStream(
    state: WorkflowState,
    options: ResumeOptions = {},
  ): AsyncIterableIterator<ProgressEvent> {
    return this.launch(options.signal, () => {
      if (state.phase === "terminated") {
        throw new RecoveryError("Run already completed", { sessionId: state.sessionId });
      }
      const checkpoint = lastCheckpoint(state);
      restoreCheckpoint(state, checkpoint);
      this.logger.info(
        `Resuming session ${state.sessionId} at ${checkpoint.phase} (iteration ${checkpoint.iteration})`,
      );
      return {
        state,
        workflow: this.resolveConfig(options.config),
        start: checkpoint.phase,
        onState: options.onState,
      };
    });
  }

  private resolveConfig(overrides: WorkflowConfigInput | undefined): WorkflowConfig {
    if (overrides === undefined) return this.config.workflow;
    return mergeConfig(this.config, { workflow: overrides }).workflow;
  }

  private launch(
    signal: AbortSignal | undefined,
    prepare: () => PreparedRun,
  ): AsyncIterableIterator<ProgressEvent> {
    const channel = new Channel<ProgressEvent>();
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();

    if (signal?.aborted) controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    channel.onCancel(() => controller.abort());

    void this.execute(channel, controller.signal, prepare).finally(() =>
      signal?.removeEventListener("abort", onAbort),
    );
    return channel;
  }

  private async execute(
    channel: Channel<ProgressEvent>,
    signal: AbortSignal,
    prepare: () => PreparedRun,
  ): Promise<void> {
    let state: WorkflowState | undefined;
    let tracker: ProgressTracker | undefined;

    try {
      const prepared = prepare();
      state = prepared.state;
      const { workflow } = prepared;
      let run = state;
      const progress = new ProgressTracker(run.mode);
      tracker = progress;
      const metrics = new MetricsCollector();

      let current: PhaseState = prepared.start;
      while (current !== "terminated") {
        const phase: Phase = current;
        throwIfAborted(signal, phase);

        const context: PhaseContext = {
          config: workflow,
          roles: this.roles,
          gateway: this.gateway,
          logger: this.logger,
          signal,
          onStep: (step) =>
            channel.push({
              type: "step",
              sessionId: run.sessionId,
              phase,
              step: step.step,
              completed: step.completed,
              total: step.total,
              percent: progress.percent(phase, step.completed / step.total),
              delta: step.delta ? structuredClone(step.delta) : undefined,
              timestamp: new Date().toISOString(),
            }),
        };

        this.logger.debug(`Entering ${phase} (iteration ${run.iterationCount})`);
        metrics.startPhase(phase, { iteration: run.iterationCount });
        try {
          const next = await this.handlers[phase].handle(run, context);
          metrics.completePhase(true);
          if (next !== run) {
            run = next;
            state = next;
            prepared.onState?.(next);
          }
        } catch (error) {
          metrics.completePhase(false, error instanceof Error ? error.message : String(error));
          throw error;
        }

        let decision: GateDecision | undefined;
        let quality: QualityMetrics | undefined;
        if (phase === "material_production") {
          quality = this.scoreRun(run, workflow);
          decision = decideGate({
            composite: quality.composite,
            threshold: workflow.qualityThreshold,
            iterationCount: run.iterationCount,
            maxIterations: workflow.maxIterations,
          });
          if (decision === "limit") {
            const limit = new IterationLimitError({
              iterations: run.iterationCount,
              score: quality.composite,
              threshold: workflow.qualityThreshold,
            });
            this.logger.warn(`${limit.message}; finalizing best available result`);
          }
        }

        channel.push({
          type: "phase",
          sessionId: run.sessionId,
          phase,
          iteration: run.iterationCount,
          percent: progress.percent(phase),
          delta: deltaOf(run, phase),
          quality,
          timestamp: new Date().toISOString(),
        });

        current = nextPhase(run.mode, phase, decision);
      }

      run.phase = "terminated";
      const deliverable = compileDeliverable(run, workflow, {
        phases: metrics.getAggregatedMetrics(),
        usage: this.gateway.usage.snapshot(),
      });
      this.logger.info(
        `Session ${run.sessionId} finished: quality ${deliverable.qualityMetrics.composite} after ${run.iterationCount} iteration(s)`,
      );
      channel.push({
        type: "complete",
        sessionId: run.sessionId,
        phase: "finalize",
        percent: 100,
        deliverable,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      const failure = toError(error);
      if (failure instanceof CancelledError) {
        this.logger.info(`Session ${state?.sessionId ?? "(new)"} cancelled`);
      } else {
        this.logger.error(`Run failed: ${formatError(failure)}`);
      }
      channel.push({
        type: "error",
        sessionId: state?.sessionId ?? "",
        phase: state?.phase ?? "initialize",
        percent: tracker?.current ?? 0,
        error: failure,
        timestamp: new Date().toISOString(),
      });
    } finally {
      channel.close();
    }
  }

  /**
   * Quality gate after material production
   */
  private scoreRun(state: WorkflowState, workflow: WorkflowConfig): QualityMetrics {
    const metrics = evaluateQuality(
      {
        mode: state.mode,
        requirements: state.requirements,
        artifacts: state.artifacts,
        materialTypes: workflow.materialTypes,
        iteration: state.iterationCount,
      },
      workflow.qualityWeights,
    );
    state.qualityMetrics = metrics;
    state.qualityHistory.push(metrics);
    this.logger.info(
      `Quality after iteration ${state.iterationCount}: ${metrics.composite} (threshold ${workflow.qualityThreshold})`,
    );
    return metrics;
  }
}
