/**
 * End-to-end tests for the quality gate loop
 */

import { describe, it, expect } from "vitest";
import { Orchestrator } from "../../src/orchestrator/orchestrator.js";
import type { WorkflowState } from "../../src/orchestrator/types.js";
import { SYSTEM_PROMPTS } from "../../src/agents/prompts.js";
import { createScriptedGateway } from "../mocks/provider.js";
import {
  FIXTURE_REQUIREMENTS,
  createCurriculumFixture,
  type CurriculumFixtureOptions,
} from "../fixtures/curriculum.js";

function setup(options: CurriculumFixtureOptions = {}) {
  const fixture = createCurriculumFixture(options);
  const scripted = createScriptedGateway(fixture.responder);
  const orchestrator = new Orchestrator({ gateway: scripted.gateway });
  const captured: { state?: WorkflowState } = {};
  const onState = (state: WorkflowState): void => {
    captured.state = state;
  };
  return { fixture, orchestrator, captured, onState, ...scripted };
}

describe("convergence loop", () => {
  it("should loop back exactly once when the second pass clears the threshold", async () => {
    const { orchestrator, fixture, captured, onState } = setup({ scores: [0.25, 0.75] });

    const deliverable = await orchestrator.run(FIXTURE_REQUIREMENTS, undefined, { onState });

    expect(deliverable.iterationCount).toBe(1);
    expect(deliverable.qualityMetrics.composite).toBe(0.9);
    expect(deliverable.qualityMetrics.iteration).toBe(1);
    expect(deliverable.belowThreshold).toBe(false);
    expect(deliverable.courseArchitecture?.title).toBe("Web Studio (pass 2)");
    expect(fixture.pass()).toBe(2);
    expect(fixture.calls).toEqual({
      education_theorist: 1,
      course_architect: 2,
      content_designer: 4,
      assessment_expert: 2,
      material_creator: 8,
    });

    const state = captured.state;
    expect(state?.qualityHistory.map((q) => q.composite)).toEqual([0.7, 0.9]);
    expect(state?.checkpoints.map((c) => c.phase)).toEqual([
      "initialize",
      "theoretical_foundation",
      "architecture_design",
      "content_creation",
      "assessment_design",
      "material_production",
      "review_iteration",
      "architecture_design",
      "content_creation",
      "assessment_design",
      "material_production",
      "finalize",
    ]);
  });

  it("should overwrite the downstream slots on loop-back", async () => {
    const { orchestrator } = setup({ scores: [0.25, 0.75] });

    const deliverable = await orchestrator.run(FIXTURE_REQUIREMENTS);

    expect(deliverable.contentModules).toHaveLength(2);
    expect(deliverable.learningMaterials).toHaveLength(4);
    expect(deliverable.contentModules.every((c) => c.selfAssessment?.innovation === 0.75)).toBe(
      true,
    );
  });

  it("should send improvement requests to the owners of low dimensions", async () => {
    const { orchestrator, captured, onState, anthropic } = setup({ scores: [0.25, 0.75] });

    await orchestrator.run(FIXTURE_REQUIREMENTS, undefined, { onState });

    const improve = (captured.state?.messageLog ?? []).filter(
      (m) => m.payload["kind"] === "improve",
    );
    expect(improve.map((m) => m.recipient)).toEqual(["content_designer", "material_creator"]);
    expect(improve.map((m) => m.payload["priority"])).toEqual(["high", "high"]);
    expect(improve.every((m) => m.requiresResponse === false)).toBe(true);

    const architectPrompts = anthropic.requests
      .filter((r) => r.system === SYSTEM_PROMPTS.course_architect)
      .map((r) => r.prompt);
    expect(architectPrompts).toHaveLength(2);
    expect(architectPrompts[0]).toContain("Revision notes from the previous review:\n(none)");
    expect(architectPrompts[1]).toContain(
      "- [high] content_designer: Improve innovation: scored 0.25, target 0.85",
    );
    expect(architectPrompts[1]).toContain(
      "- [high] material_creator: Improve practicality: scored 0.25, target 0.85",
    );
  });

  it("should stop at maxIterations and finalize below threshold", async () => {
    const { orchestrator, fixture } = setup({ scores: [0.25] });

    const deliverable = await orchestrator.run(FIXTURE_REQUIREMENTS, { maxIterations: 2 });

    expect(deliverable.iterationCount).toBe(2);
    expect(deliverable.qualityMetrics.composite).toBe(0.7);
    expect(deliverable.belowThreshold).toBe(true);
    expect(fixture.calls.course_architect).toBe(3);
    expect(fixture.calls.education_theorist).toBe(1);
  });

  it("should finalize the first pass when maxIterations is 0", async () => {
    const { orchestrator, fixture, captured, onState } = setup({
      scores: [0.5],
      coverGoals: false,
      danglingRefs: true,
    });

    const deliverable = await orchestrator.run(
      FIXTURE_REQUIREMENTS,
      { maxIterations: 0 },
      { onState },
    );

    expect(deliverable.qualityMetrics).toMatchObject({
      completeness: 1,
      coherence: 0.5,
      alignment: 0,
      innovation: 0.5,
      practicality: 0.5,
      composite: 0.5,
    });
    expect(deliverable.iterationCount).toBe(0);
    expect(deliverable.belowThreshold).toBe(true);
    expect(fixture.pass()).toBe(1);
    expect(captured.state?.checkpoints.some((c) => c.phase === "review_iteration")).toBe(false);
  });

  it("should honor a lower threshold from the run config", async () => {
    const { orchestrator } = setup({ scores: [0.25] });

    const deliverable = await orchestrator.run(FIXTURE_REQUIREMENTS, { qualityThreshold: 0.6 });

    expect(deliverable.iterationCount).toBe(0);
    expect(deliverable.qualityMetrics.composite).toBe(0.7);
    expect(deliverable.belowThreshold).toBe(false);
  });
});
