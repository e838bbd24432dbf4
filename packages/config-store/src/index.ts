export {
  LocalFileSystemConfigStore,
  detectConfigFormat,
  loadOrganizationConfigs,
  type LocalFileSystemConfigStoreOptions
} from './local-file-system.js';
export type { ConfigFormat, OrganizationConfigStore } from './types.js';
