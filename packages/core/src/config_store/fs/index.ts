export { FsConfigStore, TRUSTLINE_DIR, createConfigManager } from './fs_config_store';
