export { ConfigManager, DEFAULT_OUTPUT_SCHEMA_CONFIG, isOutcheckConfig } from './config_manager';
export type { IConfigManager, OutcheckConfig, OutputSchemaConfig } from './config_manager.types';
