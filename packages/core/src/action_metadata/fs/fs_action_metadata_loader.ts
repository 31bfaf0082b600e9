/**
 * FsActionMetadataLoader - reads action and runner metadata from YAML files.
 *
 * Layout under the metadata root:
 *   actions/<name>.yaml
 *   runners/<name>.yaml
 */

import { promises as fs } from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { createLogger } from "../../logger";
import type { ActionMetadata, IActionMetadataLoader, RunnerMetadata } from "../action_metadata.types";
import {
  isActionMetadata,
  isRunnerMetadata,
  validateActionMetadataDetailed,
  validateRunnerMetadataDetailed
} from "../action_metadata_validator";
import { MetadataLoadError, MetadataNotFoundError, MetadataValidationError } from "../errors";

const logger = createLogger("[ActionMetadata] ");

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Metadata names map to single files: no separators, no dot segments.
 */
function isPlainName(name: string): boolean {
  return name.length > 0 && name !== "." && name !== ".." && !/[\\/]/.test(name);
}

export class FsActionMetadataLoader implements IActionMetadataLoader {
  private readonly rootPath: string;

  constructor(rootPath: string) {
    this.rootPath = rootPath;
  }

  private async readDocument(kind: "action" | "runner", name: string): Promise<unknown> {
    if (!isPlainName(name)) {
      throw new MetadataLoadError(name, `invalid ${kind} name`);
    }
    const filePath = path.join(this.rootPath, `${kind}s`, `${name}.yaml`);
    let content: string;
    try {
      content = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        throw new MetadataNotFoundError(kind, name);
      }
      throw new MetadataLoadError(filePath, error instanceof Error ? error.message : String(error));
    }

    try {
      return yaml.load(content);
    } catch (error) {
      throw new MetadataLoadError(filePath, error instanceof Error ? error.message : String(error));
    }
  }

  async loadAction(name: string): Promise<ActionMetadata> {
    const document = await this.readDocument("action", name);
    if (!isActionMetadata(document)) {
      throw new MetadataValidationError("ActionMetadata", validateActionMetadataDetailed(document).errors);
    }
    logger.debug(`Loaded action ${document.name} (runner: ${document.runner_type})`);
    return document;
  }

  async loadRunner(name: string): Promise<RunnerMetadata> {
    const document = await this.readDocument("runner", name);
    if (!isRunnerMetadata(document)) {
      throw new MetadataValidationError("RunnerMetadata", validateRunnerMetadataDetailed(document).errors);
    }
    logger.debug(`Loaded runner ${document.name}`);
    return document;
  }
}
