export { FsConfigStore, createConfigManager, CONFIG_DIR, CONFIG_FILE } from './fs_config_store';
