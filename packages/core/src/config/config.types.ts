/**
 * Config Types
 */

/** 5 GiB, the largest signature scan the server accepts */
export const DEFAULT_MAX_SCAN_SIZE_BYTES = 5 * 1024 * 1024 * 1024;

export const DEFAULT_DETECT_JAR_PATH = './synopsys-detect-6.5.0.jar';

/**
 * Connection settings handed to the scan executor.
 */
export type ServerCredentials = {
  serverUrl: string;
  apiToken: string;
  project: string;
  version: string;
};

/**
 * Fully resolved configuration for a run.
 * Connection fields stay optional until a command needs them.
 */
export type ScanSplitConfig = Partial<ServerCredentials> & {
  maxScanSizeBytes: number;
  exclude: string[];
  followSymlinks: boolean;
  loggingDir: string;
  detectJarPath: string;
  detectProperties: string[];
  scanOversized: boolean;
};

/**
 * Shape of a config file on disk (YAML or JSON). Every field is optional.
 */
export type ScanSplitConfigFile = Partial<ScanSplitConfig>;

/**
 * Environment variables consulted during resolution.
 */
export type ConfigEnv = {
  SCANSPLIT_API_TOKEN?: string | undefined;
  SYNOPSYS_DETECT_PATH?: string | undefined;
};
