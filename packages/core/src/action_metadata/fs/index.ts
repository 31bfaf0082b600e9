export { FsActionMetadataLoader } from "./fs_action_metadata_loader";
