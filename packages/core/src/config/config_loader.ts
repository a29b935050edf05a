/**
 * Config loading and resolution
 *
 * Precedence, lowest first: built-in defaults, environment, config file,
 * command-line overrides. Config files are YAML or JSON and are checked
 * against scansplit_config.schema.json before use.
 */

import Ajv from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { promises as fs } from 'fs';
import * as yaml from 'js-yaml';
import * as path from 'path';
import { InvalidConfigError } from '../errors';
import { assertValidThreshold } from '../partitioner/partitioner';
import configSchema from './scansplit_config.schema.json';
import {
  DEFAULT_DETECT_JAR_PATH,
  DEFAULT_MAX_SCAN_SIZE_BYTES,
} from './config.types';
import type {
  ConfigEnv,
  ScanSplitConfig,
  ScanSplitConfigFile,
  ServerCredentials,
} from './config.types';

let cachedValidator: ValidateFunction<ScanSplitConfigFile> | null = null;

function getValidator(): ValidateFunction<ScanSplitConfigFile> {
  if (!cachedValidator) {
    const ajv = new Ajv({ allErrors: true });
    addFormats(ajv);
    cachedValidator = ajv.compile<ScanSplitConfigFile>(configSchema);
  }
  return cachedValidator;
}

function formatSchemaError(error: ErrorObject): string {
  const missing = error.params['missingProperty'];
  const field = error.instancePath.replace(/^\//, '') || (typeof missing === 'string' ? missing : 'root');
  return `${field} ${error.message ?? 'is invalid'}`;
}

/**
 * Validates parsed config file content.
 * @throws InvalidConfigError listing every schema violation
 */
export function validateConfigFile(data: unknown, source: string = 'config'): ScanSplitConfigFile {
  const validate = getValidator();
  if (!validate(data)) {
    const details = (validate.errors ?? []).map(formatSchemaError);
    throw new InvalidConfigError(`Invalid ${source}`, details);
  }
  return data;
}

/**
 * Reads and validates a YAML or JSON config file.
 * An empty file is an empty config.
 */
export async function loadConfigFile(filePath: string): Promise<ScanSplitConfigFile> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new InvalidConfigError(`Cannot read config file ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new InvalidConfigError(`Cannot parse config file ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  return validateConfigFile(parsed ?? {}, `config file ${path.basename(filePath)}`);
}

/**
 * Reads extra Detect properties, one per line. Blank lines are dropped.
 */
export async function readDetectPropertiesFile(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new InvalidConfigError(`Cannot read detect properties file ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/**
 * Merges defaults, environment, file config and overrides into a ScanSplitConfig.
 * @throws InvalidConfigError if the resulting size threshold is not a positive integer
 */
export function resolveConfig(
  overrides: ScanSplitConfigFile = {},
  fileConfig: ScanSplitConfigFile = {},
  env: ConfigEnv = process.env
): ScanSplitConfig {
  const layers = [overrides, fileConfig];
  const pick = <K extends keyof ScanSplitConfigFile>(key: K): ScanSplitConfigFile[K] =>
    layers.map(layer => layer[key]).find(value => value !== undefined);

  const config: ScanSplitConfig = {
    serverUrl: pick('serverUrl'),
    apiToken: pick('apiToken') ?? (env.SCANSPLIT_API_TOKEN || undefined),
    project: pick('project'),
    version: pick('version'),
    maxScanSizeBytes: pick('maxScanSizeBytes') ?? DEFAULT_MAX_SCAN_SIZE_BYTES,
    exclude: pick('exclude') ?? [],
    followSymlinks: pick('followSymlinks') ?? true,
    loggingDir: pick('loggingDir') ?? process.cwd(),
    detectJarPath: pick('detectJarPath') ?? (env.SYNOPSYS_DETECT_PATH || DEFAULT_DETECT_JAR_PATH),
    detectProperties: pick('detectProperties') ?? [],
    scanOversized: pick('scanOversized') ?? false,
  };

  try {
    assertValidThreshold(config.maxScanSizeBytes);
  } catch (error) {
    if (error instanceof InvalidConfigError) {
      throw new InvalidConfigError(`Invalid max_scan_size_bytes: ${error.message}`);
    }
    throw error;
  }

  return config;
}

/**
 * Extracts the server connection settings.
 * @throws InvalidConfigError naming every missing field
 */
export function requireCredentials(config: ScanSplitConfig): ServerCredentials {
  const { serverUrl, apiToken, project, version } = config;
  if (serverUrl && apiToken && project && version) {
    return { serverUrl, apiToken, project, version };
  }

  const missing = (['serverUrl', 'apiToken', 'project', 'version'] as const)
    .filter(field => !config[field]);
  throw new InvalidConfigError('Missing server settings', missing.map(field => `${field} is required`));
}
