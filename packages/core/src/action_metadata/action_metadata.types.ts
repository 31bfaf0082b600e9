import type { OutputSchema } from "../output_schema";

/**
 * Action metadata as declared in an action's YAML file.
 * `output_schema` is kept as authored; it may be a legacy or malformed schema.
 */
export type ActionMetadata = {
  name: string;
  runner_type: string;
  description?: string;
  enabled?: boolean;
  output_schema?: Record<string, unknown>;
};

/**
 * Runner metadata as declared in a runner's YAML file.
 */
export type RunnerMetadata = {
  name: string;
  description?: string;
  output_key?: string;
  output_schema?: OutputSchema;
};

/**
 * Interface for metadata loaders (filesystem, memory).
 */
export interface IActionMetadataLoader {
  loadAction(name: string): Promise<ActionMetadata>;
  loadRunner(name: string): Promise<RunnerMetadata>;
}
