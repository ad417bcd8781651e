/**
 * MATERIAL PRODUCTION phase
 *
 * One learning material per configured type, created concurrently
 */

import type { PhaseContext, PhaseHandler } from "./types.js";
import type { WorkflowState } from "../orchestrator/types.js";
import { beginPhase, invokeRole, withRoleStatus } from "./dispatch.js";
import { mapBounded } from "../utils/async.js";
import { formatError } from "../utils/errors.js";

export class MaterialProductionHandler implements PhaseHandler {
  readonly phase = "material_production";
  readonly description = "Produce the learning materials";
  readonly roles = ["material_creator"] as const;

  async handle(state: WorkflowState, context: PhaseContext): Promise<WorkflowState> {
    const architecture = state.artifacts.courseArchitecture;
    const missing: string[] = [];
    if (!architecture) missing.push("courseArchitecture");
    if (state.artifacts.contentModules.length === 0) missing.push("contentModules");
    beginPhase(state, this.phase, missing);
    if (!architecture) return state;

    const role = context.roles.material_creator;
    const types = context.config.materialTypes;
    let completed = 0;

    state.artifacts.learningMaterials = await withRoleStatus(state, role.id, () =>
      mapBounded(
        types,
        async (materialType) => {
          const material = await invokeRole(
            state,
            role,
            {
              type: "create_material",
              requirements: state.requirements,
              materialType,
              architecture,
              contentModules: state.artifacts.contentModules,
            },
            context,
            materialType,
          );
          completed += 1;
          context.onStep?.({
            step: materialType,
            completed,
            total: types.length,
            delta: { learningMaterials: [material] },
          });
          return material;
        },
        {
          concurrency: context.config.concurrencyLimit,
          signal: context.signal,
          onError: (error, materialType) =>
            context.logger.error(`Material ${materialType} failed: ${formatError(error)}`),
        },
      ),
    );

    return state;
  }
}
