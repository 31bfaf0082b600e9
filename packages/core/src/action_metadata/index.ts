/**
 * ActionMetadata - action and runner metadata declarations
 *
 * Implementations live in the entry points:
 * - @outcheck/core/fs for FsActionMetadataLoader
 * - @outcheck/core/memory for MemoryActionMetadataLoader
 */

export type { ActionMetadata, RunnerMetadata, IActionMetadataLoader } from "./action_metadata.types";
export {
  ACTION_METADATA_SCHEMA_PATH,
  RUNNER_METADATA_SCHEMA_PATH,
  isActionMetadata,
  isRunnerMetadata,
  validateActionMetadataSchema,
  validateActionMetadataDetailed,
  validateRunnerMetadataSchema,
  validateRunnerMetadataDetailed
} from "./action_metadata_validator";
export { buildActionExecution, loadActionExecution } from "./build_execution";
export { MetadataLoadError, MetadataNotFoundError, MetadataValidationError } from "./errors";
