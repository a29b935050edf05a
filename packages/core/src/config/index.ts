export {
  loadConfigFile,
  validateConfigFile,
  readDetectPropertiesFile,
  resolveConfig,
  requireCredentials,
} from './config_loader';
export { DEFAULT_MAX_SCAN_SIZE_BYTES, DEFAULT_DETECT_JAR_PATH } from './config.types';
export type {
  ScanSplitConfig,
  ScanSplitConfigFile,
  ServerCredentials,
  ConfigEnv,
} from './config.types';
