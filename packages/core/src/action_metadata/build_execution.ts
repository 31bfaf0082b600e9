import type { ActionExecution } from "../output_schema";
import type { ActionMetadata, IActionMetadataLoader, RunnerMetadata } from "./action_metadata.types";

/**
 * Assembles the execution view read by output validation and masking.
 */
export function buildActionExecution(action: ActionMetadata, runner: RunnerMetadata): ActionExecution {
  return {
    action: { output_schema: action.output_schema },
    runner: { output_key: runner.output_key, output_schema: runner.output_schema }
  };
}

/**
 * Loads an action together with the runner it declares.
 */
export async function loadActionExecution(
  loader: IActionMetadataLoader,
  actionName: string
): Promise<ActionExecution> {
  const action = await loader.loadAction(actionName);
  const runner = await loader.loadRunner(action.runner_type);
  return buildActionExecution(action, runner);
}
