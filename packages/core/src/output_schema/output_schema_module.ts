import type { IConfigManager, OutputSchemaConfig } from "../config_manager";
import type { ExecutionStatus } from "../constants";
import { createLogger } from "../logger";
import type { ConsoleLogger, Logger } from "../logger";
import { classifyOutputSchema, isOutputSchema } from "./classify";
import type {
  ActionExecution,
  ExecutionResult,
  OutputSchema,
  ValidateOutputResult,
} from "./output_schema.types";
import { maskSecretOutput } from "./redactor";
import { validateOutput } from "./validator";

/**
 * Result key used when a runner does not declare one.
 */
export const DEFAULT_OUTPUT_KEY = "result";

/**
 * Schema that accepts any instance; stands in for an action layer that
 * cannot be checked.
 */
const ACCEPT_ANY_SCHEMA: OutputSchema = {};

export type OutputSchemaModuleDependencies = {
  configManager: IConfigManager;
  logger?: Logger;
};

export type MaskOptions = {
  /** Return secrets unmasked (privileged viewers) */
  showSecrets?: boolean;
};

export type ProcessedOutput = {
  /** Result to persist: the validated result or the validation error payload */
  result: ExecutionResult;
  status: ExecutionStatus;
  /** Result to display: `result` with secrets masked */
  displayResult: ExecutionResult;
};

/**
 * Applies output validation and secret masking to finished executions,
 * as enabled by project configuration.
 *
 * Missing schemas are not errors here:
 * - a runner without an output schema skips validation entirely;
 * - an action without an output schema, or with a legacy/malformed one,
 *   leaves only the runner layer to check.
 */
export class OutputSchemaModule {
  private readonly configManager: IConfigManager;
  private readonly logger: Logger;
  /** Set when no logger was injected; follows the configured logLevel */
  private readonly ownLogger: ConsoleLogger | null;

  constructor(dependencies: OutputSchemaModuleDependencies) {
    this.configManager = dependencies.configManager;
    if (dependencies.logger) {
      this.logger = dependencies.logger;
      this.ownLogger = null;
    } else {
      const ownLogger = createLogger("[OutputSchemaModule] ");
      this.logger = ownLogger;
      this.ownLogger = ownLogger;
    }
  }

  async validateExecutionOutput(
    execution: ActionExecution,
    result: ExecutionResult,
    status: ExecutionStatus
  ): Promise<ValidateOutputResult> {
    const config = await this.loadConfig();
    return this.validateWithConfig(config, execution, result, status);
  }

  async maskExecutionOutput(
    execution: ActionExecution,
    result: ExecutionResult,
    options: MaskOptions = {}
  ): Promise<ExecutionResult> {
    const config = await this.loadConfig();
    return this.maskWithConfig(config, execution, result, options);
  }

  /**
   * Validates, then masks the validated result for display.
   */
  async processExecutionOutput(
    execution: ActionExecution,
    result: ExecutionResult,
    status: ExecutionStatus,
    options: MaskOptions = {}
  ): Promise<ProcessedOutput> {
    const config = await this.loadConfig();
    const [validatedResult, finalStatus] = this.validateWithConfig(config, execution, result, status);

    return {
      result: validatedResult,
      status: finalStatus,
      displayResult: this.maskWithConfig(config, execution, validatedResult, options)
    };
  }

  private async loadConfig(): Promise<OutputSchemaConfig> {
    if (this.ownLogger) {
      const logLevel = await this.configManager.getLogLevel();
      if (logLevel) {
        this.ownLogger.setLevel(logLevel);
      }
    }
    return this.configManager.getOutputSchemaConfig();
  }

  private validateWithConfig(
    config: OutputSchemaConfig,
    execution: ActionExecution,
    result: ExecutionResult,
    status: ExecutionStatus
  ): ValidateOutputResult {
    if (!config.validateOutputSchema) {
      return [result, status];
    }

    const runnerSchema = execution.runner.output_schema;
    if (!runnerSchema) {
      this.logger.debug("Runner declares no output schema; skipping output validation");
      return [result, status];
    }

    return validateOutput(
      runnerSchema,
      this.resolveActionSchema(execution.action.output_schema),
      result,
      status,
      execution.runner.output_key ?? DEFAULT_OUTPUT_KEY
    );
  }

  private resolveActionSchema(schema: unknown): OutputSchema {
    if (schema === undefined || schema === null) {
      return ACCEPT_ANY_SCHEMA;
    }

    const classified = classifyOutputSchema(schema);
    if (isOutputSchema(schema, classified)) {
      return schema;
    }
    if (classified.kind === "malformed") {
      this.logger.warn(`Ignoring unusable action output schema (${classified.reason}); checking runner output only`);
    }
    return ACCEPT_ANY_SCHEMA;
  }

  private maskWithConfig(
    config: OutputSchemaConfig,
    execution: ActionExecution,
    result: ExecutionResult,
    options: MaskOptions
  ): ExecutionResult {
    if (!config.maskSecrets || options.showSecrets) {
      return result;
    }
    return maskSecretOutput(execution, result);
  }
}
