/**
 * Deliverable compilation
 */

import type { Deliverable, WorkflowState } from "./types.js";
import type { AggregatedMetrics } from "./metrics.js";
import type { UsageSnapshot } from "../providers/usage.js";
import type { WorkflowConfig } from "../config/schema.js";
import { DependencyMissingError } from "../utils/errors.js";

/**
 * Build the deliverable from a finalized state
 */
export function compileDeliverable(
  state: WorkflowState,
  config: WorkflowConfig,
  extras: { phases: AggregatedMetrics; usage: UsageSnapshot },
): Deliverable {
  const metrics = state.qualityMetrics;
  if (!metrics) {
    throw new DependencyMissingError("finalize", ["qualityMetrics"]);
  }

  const completedAt = state.completedAt ?? new Date().toISOString();
  const { theoreticalFramework, courseArchitecture, assessmentStrategy } = state.artifacts;

  return structuredClone({
    sessionId: state.sessionId,
    mode: state.mode,
    requirements: state.requirements,
    theoreticalFramework,
    courseArchitecture,
    contentModules: state.artifacts.contentModules,
    assessmentStrategy,
    learningMaterials: state.artifacts.learningMaterials,
    qualityMetrics: metrics,
    iterationCount: state.iterationCount,
    belowThreshold: metrics.composite < config.qualityThreshold,
    metadata: {
      startedAt: state.startedAt,
      completedAt,
      durationMs: Date.parse(completedAt) - Date.parse(state.startedAt),
      messageCount: state.messageLog.length,
      phases: extras.phases,
      usage: extras.usage,
    },
  });
}

/**
 * Render a deliverable as a Markdown course outline
 */
export function renderMarkdown(deliverable: Deliverable): string {
  const lines: string[] = [];
  const architecture = deliverable.courseArchitecture;

  lines.push(`# ${architecture?.title ?? deliverable.requirements.topic}`);
  lines.push("");
  if (architecture?.overview) {
    lines.push(architecture.overview, "");
  }
  lines.push(`- **Duration:** ${architecture?.duration || deliverable.requirements.duration}`);
  if (deliverable.requirements.audience) {
    lines.push(`- **Audience:** ${deliverable.requirements.audience}`);
  }
  lines.push(
    `- **Quality:** ${deliverable.qualityMetrics.composite.toFixed(2)}` +
      (deliverable.belowThreshold ? " (below threshold)" : ""),
  );
  lines.push("");

  const framework = deliverable.theoreticalFramework;
  if (framework) {
    lines.push("## Framework", "", `**Approach:** ${framework.pedagogicalApproach}`, "");
    for (const objective of framework.learningObjectives) {
      lines.push(`- ${objective}`);
    }
    lines.push("");
  }

  lines.push("## Modules", "");
  for (const module of architecture?.modules ?? []) {
    const content = deliverable.contentModules.find((c) => c.moduleId === module.id);
    lines.push(`### ${module.id}: ${module.title}`, "");
    if (content?.drivingQuestion) {
      lines.push(`> ${content.drivingQuestion}`, "");
    }
    if (content) {
      lines.push(content.summary, "");
      for (const activity of content.activities) {
        lines.push(`- ${activity.title} (${activity.format})`);
      }
      lines.push("");
    }
  }

  const assessment = deliverable.assessmentStrategy;
  if (assessment) {
    lines.push("## Assessment", "", assessment.approach, "");
    for (const item of assessment.summative) {
      lines.push(`- ${item.name}: ${item.moduleIds.join(", ")}`);
    }
    lines.push("");
  }

  if (deliverable.learningMaterials.length > 0) {
    lines.push("## Materials", "");
    for (const material of deliverable.learningMaterials) {
      lines.push(`- ${material.title} (${material.materialType})`);
    }
    lines.push("");
  }

  return lines.join("\n");
}
