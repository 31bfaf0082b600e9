/**
 * MemoryActionMetadataLoader - in-memory metadata for tests and serverless use.
 */

import type { ActionMetadata, IActionMetadataLoader, RunnerMetadata } from "../action_metadata.types";
import { MetadataNotFoundError } from "../errors";

export class MemoryActionMetadataLoader implements IActionMetadataLoader {
  private readonly actions = new Map<string, ActionMetadata>();
  private readonly runners = new Map<string, RunnerMetadata>();

  constructor(initial?: { actions?: ActionMetadata[]; runners?: RunnerMetadata[] }) {
    initial?.actions?.forEach((action) => this.setAction(action));
    initial?.runners?.forEach((runner) => this.setRunner(runner));
  }

  async loadAction(name: string): Promise<ActionMetadata> {
    const action = this.actions.get(name);
    if (!action) {
      throw new MetadataNotFoundError("action", name);
    }
    return action;
  }

  async loadRunner(name: string): Promise<RunnerMetadata> {
    const runner = this.runners.get(name);
    if (!runner) {
      throw new MetadataNotFoundError("runner", name);
    }
    return runner;
  }

  // ==================== Test Helper Methods ====================

  setAction(action: ActionMetadata): void {
    this.actions.set(action.name, action);
  }

  setRunner(runner: RunnerMetadata): void {
    this.runners.set(runner.name, runner);
  }

  clear(): void {
    this.actions.clear();
    this.runners.clear();
  }
}
