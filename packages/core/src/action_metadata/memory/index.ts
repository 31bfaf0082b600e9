export { MemoryActionMetadataLoader } from "./memory_action_metadata_loader";
