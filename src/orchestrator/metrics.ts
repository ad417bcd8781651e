/**
 * Timing and outcome of each phase visit, aggregated into the deliverable
 */

import { PhaseSchema, type Phase } from "../types/workflow.js";

/**
 * Phase metrics
 */
export interface PhaseMetrics {
  phase: Phase;
  startTime: Date;
  endTime?: Date;
  durationMs?: number;
  success: boolean;
  error?: string;
  details: Record<string, unknown>;
}

/**
 * Aggregated metrics
 */
export interface AggregatedMetrics {
  totalDurationMs: number;
  phaseCount: number;
  successCount: number;
  failureCount: number;
  averageDurationMs: number;
  phaseBreakdown: Partial<
    Record<
      Phase,
      {
        count: number;
        totalDurationMs: number;
        averageDurationMs: number;
        successRate: number;
      }
    >
  >;
}

/**
 * Metrics collector
 */
export class MetricsCollector {
  private metrics: PhaseMetrics[] = [];
  private currentPhase: PhaseMetrics | null = null;
  private startedAt = 0;

  /**
   * Start tracking a phase
   */
  startPhase(phase: Phase, details: Record<string, unknown> = {}): void {
    this.startedAt = performance.now();
    this.currentPhase = {
      phase,
      startTime: new Date(),
      success: false,
      details,
    };
  }

  /**
   * Complete current phase
   */
  completePhase(
    success: boolean,
    error?: string,
    additionalDetails?: Record<string, unknown>,
  ): void {
    if (!this.currentPhase) return;

    this.currentPhase.endTime = new Date();
    this.currentPhase.durationMs = Math.round(performance.now() - this.startedAt);
    this.currentPhase.success = success;
    this.currentPhase.error = error;

    if (additionalDetails) {
      this.currentPhase.details = {
        ...this.currentPhase.details,
        ...additionalDetails,
      };
    }

    this.metrics.push(this.currentPhase);
    this.currentPhase = null;
  }

  /**
   * Get all metrics
   */
  getMetrics(): PhaseMetrics[] {
    return [...this.metrics];
  }

  /**
   * Get metrics for a specific phase
   */
  getPhaseMetrics(phase: Phase): PhaseMetrics[] {
    return this.metrics.filter((m) => m.phase === phase);
  }

  /**
   * Get aggregated metrics
   */
  getAggregatedMetrics(): AggregatedMetrics {
    const breakdown: AggregatedMetrics["phaseBreakdown"] = {};

    for (const phase of PhaseSchema.options) {
      const phaseMetrics = this.getPhaseMetrics(phase);
      if (phaseMetrics.length === 0) continue;
      const totalDuration = phaseMetrics.reduce((sum, m) => sum + (m.durationMs ?? 0), 0);
      const successCount = phaseMetrics.filter((m) => m.success).length;

      breakdown[phase] = {
        count: phaseMetrics.length,
        totalDurationMs: totalDuration,
        averageDurationMs: totalDuration / phaseMetrics.length,
        successRate: successCount / phaseMetrics.length,
      };
    }

    const totalDuration = this.metrics.reduce((sum, m) => sum + (m.durationMs ?? 0), 0);
    const successCount = this.metrics.filter((m) => m.success).length;

    return {
      totalDurationMs: totalDuration,
      phaseCount: this.metrics.length,
      successCount,
      failureCount: this.metrics.length - successCount,
      averageDurationMs: this.metrics.length > 0 ? totalDuration / this.metrics.length : 0,
      phaseBreakdown: breakdown,
    };
  }
}

/**
 * Format duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}
