/**
 * Workflow service
 *
 * Ingress facade over the orchestrator: sessions are created from
 * requirements, then started, cancelled, resumed and evicted by id.
 * At most one run per session is active at a time.
 */

import { randomUUID } from "node:crypto";
import type { Logger, ILogObj } from "tslog";
import type { Deliverable, ProgressEvent } from "./types.js";
import { RequirementsSchema } from "../types/artifacts.js";
import { OrchestrationModeSchema, type OrchestrationMode } from "../types/workflow.js";
import { WorkflowConfigSchema, type WorkflowConfigInput } from "../config/schema.js";
import { Orchestrator, drain } from "./orchestrator.js";
import { InMemorySessionStore, type SessionRecord, type SessionStore } from "./sessions.js";
import { validate } from "../utils/validation.js";
import {
  CancelledError,
  RecoveryError,
  SessionError,
  formatError,
  isWorkflowError,
} from "../utils/errors.js";
import { Channel } from "../utils/channel.js";
import { createChildLogger, getLogger } from "../utils/logger.js";

export interface WorkflowServiceOptions {
  orchestrator?: Orchestrator;
  store?: SessionStore;
  logger?: Logger<ILogObj>;
}

export interface StartOptions {
  /** Return the event stream instead of the deliverable */
  stream?: boolean;
}

export class WorkflowService {
  readonly orchestrator: Orchestrator;

  private readonly store: SessionStore;
  private readonly logger: Logger<ILogObj>;
  private readonly active = new Map<string, AbortController>();

  constructor(options: WorkflowServiceOptions = {}) {
    this.logger = options.logger ?? createChildLogger(getLogger(), "service");
    this.orchestrator = options.orchestrator ?? new Orchestrator({ logger: this.logger });
    this.store = options.store ?? new InMemorySessionStore();
  }

  /**
   * Validate the inputs and register a new session
   *
   * @throws ValidationError on malformed requirements, mode or config
   */
  async createSession(
    requirements: unknown,
    mode: OrchestrationMode = "full_course",
    config?: WorkflowConfigInput,
  ): Promise<string> {
    const now = new Date();
    const record: SessionRecord = {
      id: randomUUID(),
      requirements: validate(RequirementsSchema, requirements, "requirements"),
      mode: validate(OrchestrationModeSchema, mode, "mode"),
      status: "created",
      createdAt: now,
      updatedAt: now,
    };
    if (config !== undefined) {
      validate(WorkflowConfigSchema, config, "config");
      record.config = config;
    }

    await this.store.save(record);
    this.logger.debug(`Created session ${record.id} (${record.mode})`);
    return record.id;
  }

  /**
   * Start a run for the session.
   *
   * @throws SessionError when the session is unknown or already running
   */
  startRun(sessionId: string, options: { stream: true }): Promise<AsyncIterable<ProgressEvent>>;
  startRun(sessionId: string, options?: { stream?: false }): Promise<Deliverable>;
  startRun(
    sessionId: string,
    options?: StartOptions,
  ): Promise<Deliverable | AsyncIterable<ProgressEvent>>;
  async startRun(
    sessionId: string,
    options: StartOptions = {},
  ): Promise<Deliverable | AsyncIterable<ProgressEvent>> {
    const record = await this.require(sessionId);
    const events = await this.begin(record, (signal) =>
      this.orchestrator.stream(record.requirements, record.config, {
        mode: record.mode,
        sessionId: record.id,
        signal,
        onState: (state) => {
          record.state = state;
        },
      }),
    );
    return options.stream ? events : drain(events);
  }

  /**
   * Continue the session's stopped run from its last checkpoint
   *
   * @throws RecoveryError when the session has no resumable run
   */
  resume(sessionId: string, options: { stream: true }): Promise<AsyncIterable<ProgressEvent>>;
  resume(sessionId: string, options?: { stream?: false }): Promise<Deliverable>;
  resume(
    sessionId: string,
    options?: StartOptions,
  ): Promise<Deliverable | AsyncIterable<ProgressEvent>>;
  async resume(
    sessionId: string,
    options: StartOptions = {},
  ): Promise<Deliverable | AsyncIterable<ProgressEvent>> {
    const record = await this.require(sessionId);
    const state = record.state;
    if (!state || record.status === "completed") {
      throw new RecoveryError(`Session ${sessionId} has no stopped run to resume`, { sessionId });
    }

    const events = await this.begin(record, (signal) =>
      this.orchestrator.resumeStream(state, {
        signal,
        config: record.config,
        onState: (next) => {
          record.state = next;
        },
      }),
    );
    return options.stream ? events : drain(events);
  }

  /**
   * Abort the session's active run
   *
   * @returns False when nothing was running
   */
  async cancel(sessionId: string): Promise<boolean> {
    await this.require(sessionId);
    const controller = this.active.get(sessionId);
    if (!controller) return false;
    this.logger.info(`Cancelling session ${sessionId}`);
    controller.abort();
    return true;
  }

  async getSession(sessionId: string): Promise<SessionRecord | null> {
    return this.store.get(sessionId);
  }

  async listSessions(): Promise<SessionRecord[]> {
    return this.store.list();
  }

  /**
   * Remove a session that is not running
   */
  async evict(sessionId: string): Promise<boolean> {
    if (this.active.has(sessionId)) {
      throw new SessionError(`Session ${sessionId} is running; cancel it first`, { sessionId });
    }
    return this.store.delete(sessionId);
  }

  private async require(sessionId: string): Promise<SessionRecord> {
    const record = await this.store.get(sessionId);
    if (!record) {
      throw new SessionError(`Unknown session ${sessionId}`, { sessionId });
    }
    return record;
  }

  private async begin(
    record: SessionRecord,
    start: (signal: AbortSignal) => AsyncIterable<ProgressEvent>,
  ): Promise<AsyncIterable<ProgressEvent>> {
    if (this.active.has(record.id)) {
      throw new SessionError(`Session ${record.id} already has an active run`, {
        sessionId: record.id,
      });
    }
    const controller = new AbortController();
    this.active.set(record.id, controller);

    record.status = "running";
    delete record.error;
    delete record.deliverable;
    try {
      await this.touch(record);
    } catch (error) {
      this.release(record.id, controller);
      throw error;
    }

    // The record is kept up to date whether or not anyone reads the events
    const channel = new Channel<ProgressEvent>();
    channel.onCancel(() => controller.abort());
    void this.pump(record, controller, start(controller.signal), channel);
    return channel;
  }

  /**
   * Mirror terminal events into the session record, then republish them
   */
  private async pump(
    record: SessionRecord,
    controller: AbortController,
    events: AsyncIterable<ProgressEvent>,
    channel: Channel<ProgressEvent>,
  ): Promise<void> {
    let settled = false;
    try {
      for await (const event of events) {
        if (event.type === "complete") {
          settled = true;
          this.release(record.id, controller);
          record.status = "completed";
          record.deliverable = event.deliverable;
          await this.touch(record);
        } else if (event.type === "error") {
          settled = true;
          this.release(record.id, controller);
          record.status = event.error instanceof CancelledError ? "cancelled" : "failed";
          record.error = {
            code: isWorkflowError(event.error) ? event.error.code : "UNEXPECTED_ERROR",
            message: event.error.message,
          };
          await this.touch(record);
        }
        channel.push(event);
      }
      if (!settled) {
        this.release(record.id, controller);
        record.status = "cancelled";
        await this.touch(record);
      }
    } catch (error) {
      this.release(record.id, controller);
      this.logger.error(`Session ${record.id} could not be recorded: ${formatError(error)}`);
      channel.push({
        type: "error",
        sessionId: record.id,
        phase: record.state?.phase ?? "initialize",
        percent: 0,
        error: error instanceof Error ? error : new Error(String(error)),
        timestamp: new Date().toISOString(),
      });
    } finally {
      channel.close();
    }
  }

  private release(sessionId: string, controller: AbortController): void {
    if (this.active.get(sessionId) === controller) {
      this.active.delete(sessionId);
    }
  }

  private async touch(record: SessionRecord): Promise<void> {
    record.updatedAt = new Date();
    await this.store.save(record);
  }
}
