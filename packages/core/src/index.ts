export * as OutputSchema from "./output_schema";
export * as ActionMetadata from "./action_metadata";
export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as Constants from "./constants";
export * as Logger from "./logger";
export * as Schemas from "./schemas";
export * as Types from "./types";
