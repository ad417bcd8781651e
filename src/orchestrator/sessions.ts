/**
 * Session storage for the workflow service
 *
 * A session is one set of requirements plus the state of its latest run.
 * The store holds plain records; live run handles stay in the service.
 */

import type { Requirements } from "../types/artifacts.js";
import type { OrchestrationMode } from "../types/workflow.js";
import type { WorkflowConfigInput } from "../config/schema.js";
import type { Deliverable, WorkflowState } from "./types.js";

/**
 * Lifecycle of a session's latest run
 */
export type SessionStatus = "created" | "running" | "completed" | "failed" | "cancelled";

export interface SessionRecord {
  /** Unique session identifier, shared with the run state */
  id: string;
  requirements: Requirements;
  mode: OrchestrationMode;
  /** Run-level overrides applied on top of the service configuration */
  config?: WorkflowConfigInput;
  status: SessionStatus;
  /** Live state of the latest run; kept after failure for resume */
  state?: WorkflowState;
  deliverable?: Deliverable;
  /** Message and code of the error that ended the latest run */
  error?: { code: string; message: string };
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Storage operations the service needs
 */
export interface SessionStore {
  /**
   * @returns The record, or null if not found
   */
  get(id: string): Promise<SessionRecord | null>;

  save(record: SessionRecord): Promise<void>;

  /**
   * @returns True if deleted, false if not found
   */
  delete(id: string): Promise<boolean>;

  /**
   * Records ordered by most recent update first
   */
  list(): Promise<SessionRecord[]>;
}

/**
 * Default store: records live in process memory
 */
export class InMemorySessionStore implements SessionStore {
  private readonly records = new Map<string, SessionRecord>();

  async get(id: string): Promise<SessionRecord | null> {
    return this.records.get(id) ?? null;
  }

  async save(record: SessionRecord): Promise<void> {
    this.records.set(record.id, record);
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }

  async list(): Promise<SessionRecord[]> {
    return [...this.records.values()].sort(
      (a, b) => b.updatedAt.getTime() - a.updatedAt.getTime(),
    );
  }

  get size(): number {
    return this.records.size;
  }
}
