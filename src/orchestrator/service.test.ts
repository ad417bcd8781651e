/**
 * Tests for the workflow service
 */

import { describe, it, expect, vi } from "vitest";
import { WorkflowService } from "./service.js";
import { Orchestrator } from "./orchestrator.js";
import { InMemorySessionStore } from "./sessions.js";
import type { ProgressEvent } from "./types.js";
import { SYSTEM_PROMPTS } from "../agents/prompts.js";
import {
  CancelledError,
  RecoveryError,
  SessionError,
  ValidationError,
} from "../utils/errors.js";
import { createScriptedGateway, type Responder } from "../../test/mocks/provider.js";
import { FIXTURE_REQUIREMENTS, createCurriculumFixture } from "../../test/fixtures/curriculum.js";

function setup() {
  const fixture = createCurriculumFixture();
  const gate = { hang: false };
  const responder: Responder = (request, call) =>
    gate.hang && request.system === SYSTEM_PROMPTS.assessment_expert
      ? new Promise<never>(() => undefined)
      : fixture.responder(request, call);
  const { gateway } = createScriptedGateway(responder);
  const store = new InMemorySessionStore();
  const service = new WorkflowService({ orchestrator: new Orchestrator({ gateway }), store });
  return { service, store, fixture, gate };
}

async function collect(events: AsyncIterable<ProgressEvent>): Promise<ProgressEvent[]> {
  const all: ProgressEvent[] = [];
  for await (const event of events) {
    all.push(event);
  }
  return all;
}

describe("WorkflowService", () => {
  describe("createSession", () => {
    it("should store a validated session", async () => {
      const { service, store } = setup();

      const id = await service.createSession(FIXTURE_REQUIREMENTS, "quick_design", {
        maxIterations: 1,
      });

      const session = await service.getSession(id);
      expect(session?.status).toBe("created");
      expect(session?.mode).toBe("quick_design");
      expect(session?.requirements.duration).toBe("6 weeks");
      expect(session?.config).toEqual({ maxIterations: 1 });
      expect(store.size).toBe(1);
    });

    it("should reject malformed requirements and config", async () => {
      const { service, store } = setup();

      await expect(service.createSession({ topic: "" })).rejects.toBeInstanceOf(ValidationError);
      await expect(
        service.createSession(FIXTURE_REQUIREMENTS, "full_course", { concurrencyLimit: 0 }),
      ).rejects.toBeInstanceOf(ValidationError);
      expect(store.size).toBe(0);
    });
  });

  describe("startRun", () => {
    it("should return the deliverable and record it", async () => {
      const { service } = setup();
      const id = await service.createSession(FIXTURE_REQUIREMENTS);

      const deliverable = await service.startRun(id);

      expect(deliverable.sessionId).toBe(id);
      const session = await service.getSession(id);
      expect(session?.status).toBe("completed");
      expect(session?.deliverable?.qualityMetrics.composite).toBe(0.96);
      expect(session?.state?.sessionId).toBe(id);
    });

    it("should stream events when asked", async () => {
      const { service } = setup();
      const id = await service.createSession(FIXTURE_REQUIREMENTS, "quick_design");

      const events = await collect(await service.startRun(id, { stream: true }));

      expect(events.at(-1)?.type).toBe("complete");
      expect(events.filter((e) => e.type === "phase").map((e) => e.phase)).toEqual([
        "initialize",
        "architecture_design",
        "content_creation",
        "finalize",
      ]);
      expect((await service.getSession(id))?.status).toBe("completed");
    });

    it("should reject unknown sessions", async () => {
      const { service } = setup();

      await expect(service.startRun("missing")).rejects.toBeInstanceOf(SessionError);
    });

    it("should reject a second run while one is active", async () => {
      const { service, gate } = setup();
      gate.hang = true;
      const id = await service.createSession(FIXTURE_REQUIREMENTS);

      const first = await service.startRun(id, { stream: true });
      await expect(service.startRun(id)).rejects.toBeInstanceOf(SessionError);

      expect(await service.cancel(id)).toBe(true);
      const events = await collect(first);
      expect(events.at(-1)?.type).toBe("error");
    });

    it("should record a streamed run that nobody reads", async () => {
      const { service } = setup();
      const id = await service.createSession(FIXTURE_REQUIREMENTS);

      await service.startRun(id, { stream: true });

      await vi.waitFor(async () => {
        expect((await service.getSession(id))?.status).toBe("completed");
      });
      const deliverable = await service.startRun(id);
      expect(deliverable.sessionId).toBe(id);
    });

    it("should cancel and release the session when the stream is closed before reading", async () => {
      const { service, gate } = setup();
      gate.hang = true;
      const id = await service.createSession(FIXTURE_REQUIREMENTS);

      const events = await service.startRun(id, { stream: true });
      await events[Symbol.asyncIterator]().return?.();

      await vi.waitFor(async () => {
        expect((await service.getSession(id))?.status).toBe("cancelled");
      });
      expect(await service.cancel(id)).toBe(false);

      gate.hang = false;
      const deliverable = await service.startRun(id);
      expect(deliverable.qualityMetrics.composite).toBe(0.96);
    });

    it("should record failures with their code", async () => {
      const fixture = createCurriculumFixture({ failing: ["course_architect"] });
      const { gateway } = createScriptedGateway(fixture.responder);
      const service = new WorkflowService({ orchestrator: new Orchestrator({ gateway }) });
      const id = await service.createSession(FIXTURE_REQUIREMENTS);

      await expect(service.startRun(id)).rejects.toThrow(
        "Role 'course_architect' could not complete design_structure",
      );

      const session = await service.getSession(id);
      expect(session?.status).toBe("failed");
      expect(session?.error?.code).toBe("GENERATION_ERROR");
    });
  });

  describe("cancel and resume", () => {
    it("should cancel an active run and resume it from its checkpoint", async () => {
      const { service, fixture, gate } = setup();
      gate.hang = true;
      const id = await service.createSession(FIXTURE_REQUIREMENTS);

      const events: ProgressEvent[] = [];
      for await (const event of await service.startRun(id, { stream: true })) {
        events.push(event);
        if (event.type === "phase" && event.phase === "content_creation") {
          expect(await service.cancel(id)).toBe(true);
        }
      }

      const last = events.at(-1);
      expect(last?.type === "error" && last.error).toBeInstanceOf(CancelledError);
      expect((await service.getSession(id))?.status).toBe("cancelled");

      gate.hang = false;
      const deliverable = await service.resume(id);

      expect(deliverable.assessmentStrategy?.approach).toBe("Portfolio assessment");
      expect(fixture.calls.course_architect).toBe(1);
      expect((await service.getSession(id))?.status).toBe("completed");
    });

    it("should report false when nothing is running", async () => {
      const { service } = setup();
      const id = await service.createSession(FIXTURE_REQUIREMENTS);

      expect(await service.cancel(id)).toBe(false);
    });

    it("should refuse to resume sessions without a stopped run", async () => {
      const { service } = setup();
      const id = await service.createSession(FIXTURE_REQUIREMENTS);

      await expect(service.resume(id)).rejects.toBeInstanceOf(RecoveryError);
      await service.startRun(id);
      await expect(service.resume(id)).rejects.toBeInstanceOf(RecoveryError);
    });
  });

  describe("evict", () => {
    it("should remove idle sessions", async () => {
      const { service } = setup();
      const id = await service.createSession(FIXTURE_REQUIREMENTS);

      expect(await service.evict(id)).toBe(true);
      expect(await service.getSession(id)).toBeNull();
      expect(await service.evict(id)).toBe(false);
    });

    it("should refuse to evict a running session", async () => {
      const { service, gate } = setup();
      gate.hang = true;
      const id = await service.createSession(FIXTURE_REQUIREMENTS);
      const events = await service.startRun(id, { stream: true });

      await expect(service.evict(id)).rejects.toBeInstanceOf(SessionError);

      await service.cancel(id);
      await collect(events);
      expect(await service.evict(id)).toBe(true);
    });
  });

  describe("listSessions", () => {
    it("should list the most recently updated first", async () => {
      const { service } = setup();
      const first = await service.createSession(FIXTURE_REQUIREMENTS);
      const second = await service.createSession({ topic: "Data literacy" });
      await service.startRun(first, { stream: false });

      const ids = (await service.listSessions()).map((s) => s.id);

      expect(ids).toEqual([first, second]);
    });
  });
});
