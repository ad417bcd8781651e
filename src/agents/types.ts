/**
 * Specialist role contract
 */

import type { Logger, ILogObj } from "tslog";
import type { GenerationGateway } from "../providers/gateway.js";
import type { RoutingConfig } from "../config/schema.js";
import type {
  AssessmentStrategy,
  ContentModule,
  CourseArchitecture,
  CourseModule,
  LearningMaterial,
  Requirements,
  TheoreticalFramework,
} from "../types/artifacts.js";
import type { MaterialType, RoleId, TaskType } from "../types/workflow.js";
import type { RevisionNote } from "../quality/types.js";

export interface DevelopFrameworkTask {
  type: "develop_framework";
  requirements: Requirements;
}

export interface DesignStructureTask {
  type: "design_structure";
  requirements: Requirements;
  framework?: TheoreticalFramework;
  revisionNotes: readonly RevisionNote[];
}

export interface CreateContentTask {
  type: "create_content";
  requirements: Requirements;
  architecture: CourseArchitecture;
  module: CourseModule;
  framework?: TheoreticalFramework;
}

export interface DesignStrategyTask {
  type: "design_strategy";
  requirements: Requirements;
  architecture: CourseArchitecture;
  contentModules: readonly ContentModule[];
}

export interface CreateMaterialTask {
  type: "create_material";
  requirements: Requirements;
  materialType: MaterialType;
  architecture: CourseArchitecture;
  contentModules: readonly ContentModule[];
}

/**
 * Task record and artifact per task type
 */
export interface RoleTaskMap {
  develop_framework: { task: DevelopFrameworkTask; artifact: TheoreticalFramework };
  design_structure: { task: DesignStructureTask; artifact: CourseArchitecture };
  create_content: { task: CreateContentTask; artifact: ContentModule };
  design_strategy: { task: DesignStrategyTask; artifact: AssessmentStrategy };
  create_material: { task: CreateMaterialTask; artifact: LearningMaterial };
}

export type TaskFor<K extends TaskType> = RoleTaskMap[K]["task"];
export type ArtifactFor<K extends TaskType> = RoleTaskMap[K]["artifact"];

/**
 * What a role needs from the run executing it
 */
export interface RoleContext {
  gateway: GenerationGateway;
  routing: RoutingConfig;
  signal?: AbortSignal;
  logger?: Logger<ILogObj>;
}

/**
 * A specialist role: one task type, one artifact
 */
export interface Role<K extends TaskType = TaskType> {
  readonly id: RoleId;
  readonly taskType: K;
  readonly description: string;
  execute(task: TaskFor<K>, context: RoleContext): Promise<ArtifactFor<K>>;
}
