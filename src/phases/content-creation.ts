/**
 * CONTENT CREATION phase
 *
 * One content module per architecture module, created concurrently
 */

import type { PhaseContext, PhaseHandler } from "./types.js";
import type { WorkflowState } from "../orchestrator/types.js";
import { beginPhase, invokeRole, withRoleStatus } from "./dispatch.js";
import { mapBounded } from "../utils/async.js";
import { formatError } from "../utils/errors.js";

export class ContentCreationHandler implements PhaseHandler {
  readonly phase = "content_creation";
  readonly description = "Create the content of every module";
  readonly roles = ["content_designer"] as const;

  async handle(state: WorkflowState, context: PhaseContext): Promise<WorkflowState> {
    const architecture = state.artifacts.courseArchitecture;
    beginPhase(
      state,
      this.phase,
      architecture && architecture.modules.length > 0 ? [] : ["courseArchitecture.modules"],
    );
    if (!architecture) return state;

    const role = context.roles.content_designer;
    const total = architecture.modules.length;
    let completed = 0;

    state.artifacts.contentModules = await withRoleStatus(state, role.id, () =>
      mapBounded(
        architecture.modules,
        async (module) => {
          const content = await invokeRole(
            state,
            role,
            {
              type: "create_content",
              requirements: state.requirements,
              architecture,
              module,
              framework: state.artifacts.theoreticalFramework,
            },
            context,
            module.id,
          );
          completed += 1;
          context.onStep?.({
            step: module.id,
            completed,
            total,
            delta: { contentModules: [content] },
          });
          return content;
        },
        {
          concurrency: context.config.concurrencyLimit,
          signal: context.signal,
          onError: (error, module) =>
            context.logger.error(`Content for module ${module.id} failed: ${formatError(error)}`),
        },
      ),
    );

    return state;
  }
}
