/**
 * ConfigManager Types
 */

import type { LogLevel } from '../logger';

/**
 * Outcheck project configuration (.outcheck/config.json)
 */
export type OutcheckConfig = {
  protocolVersion?: string;
  /** Level of the OutputSchemaModule logger when none is injected */
  logLevel?: LogLevel;
  outputSchema?: {
    /** Check execution results against runner and action output schemas (default: false) */
    validate?: boolean;
    /** Mask values marked secret before results are displayed (default: true) */
    maskSecrets?: boolean;
  };
};

/**
 * Output schema settings resolved with defaults
 */
export type OutputSchemaConfig = {
  validateOutputSchema: boolean;
  maskSecrets: boolean;
};

/**
 * IConfigManager interface
 *
 * Provides typed access to Outcheck project configuration.
 */
export interface IConfigManager {
  /**
   * Load Outcheck configuration
   */
  loadConfig(): Promise<OutcheckConfig | null>;

  /**
   * Get output schema settings, falling back to defaults for missing keys
   */
  getOutputSchemaConfig(): Promise<OutputSchemaConfig>;

  /**
   * Get the configured log level, if any
   */
  getLogLevel(): Promise<LogLevel | null>;
}
