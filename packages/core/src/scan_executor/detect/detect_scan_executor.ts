/**
 * DetectScanExecutor - runs Synopsys Detect once per scan group
 *
 * The group's common parent directory becomes the Detect source path and the
 * members are passed as the signature scanner paths, so only the group's
 * files are uploaded.
 *
 * @module scan_executor/detect
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ServerCredentials } from '../../config/config.types';
import type { Logger } from '../../logger';
import { createLogger } from '../../logger';
import type { ScanGroup } from '../../partitioner/partitioner.types';
import type { ExecCommand, ScanExecutor, ScanResult } from '../scan_executor';

export type DetectScanExecutorOptions = {
  credentials: ServerCredentials;
  /** Path to the Detect jar */
  detectJarPath: string;
  /** Extra `--key=value` properties appended to every run */
  detectProperties?: string[];
  /** Directory that receives one log file per group. Default: cwd */
  loggingDir?: string;
  /** Java launcher. Default: 'java' */
  javaCommand?: string;
}

export type DetectScanExecutorDependencies = {
  execCommand: ExecCommand;
  logger?: Logger;
}

/**
 * Deepest directory containing every path in the list.
 */
export function commonParentDirectory(paths: readonly string[]): string {
  const [first, ...rest] = paths.map(p => path.dirname(path.resolve(p)));
  if (first === undefined) {
    throw new Error('commonParentDirectory needs at least one path');
  }

  let common = first.split(path.sep);
  for (const dir of rest) {
    const segments = dir.split(path.sep);
    let shared = 0;
    while (shared < common.length && shared < segments.length && common[shared] === segments[shared]) {
      shared++;
    }
    common = common.slice(0, shared);
  }

  const joined = common.join(path.sep);
  // Splitting '/x' yields ['', 'x']; an empty join is the filesystem root
  return joined === '' ? path.parse(first).root : joined;
}

/**
 * Code location name: project, version, source path and group index,
 * with path separators flattened to dashes.
 */
export function buildCodeLocationName(credentials: ServerCredentials, sourcePath: string, groupIndex: number): string {
  return `${credentials.project}-${credentials.version}-${sourcePath}-${groupIndex}`.replace(/[/\\]/g, '-');
}

export class DetectScanExecutor implements ScanExecutor {
  private readonly options: DetectScanExecutorOptions;
  private readonly execCommand: ExecCommand;
  private readonly logger: Logger;

  constructor(options: DetectScanExecutorOptions, dependencies: DetectScanExecutorDependencies) {
    this.options = options;
    this.execCommand = dependencies.execCommand;
    this.logger = dependencies.logger ?? createLogger('[detect] ');
  }

  /**
   * Java arguments for one group.
   */
  buildArgs(group: ScanGroup): { args: string[]; codeLocation: string; sourcePath: string } {
    const { credentials, detectJarPath, detectProperties = [] } = this.options;
    const sourcePath = commonParentDirectory(group.members);
    const codeLocation = buildCodeLocationName(credentials, sourcePath, group.index);

    const args = [
      '-jar',
      detectJarPath,
      `--blackduck.url=${credentials.serverUrl}`,
      `--blackduck.api.token=${credentials.apiToken}`,
      '--blackduck.trust.cert=true',
      '--detect.parallel.processors=-1',
      `--detect.project.name=${credentials.project}`,
      `--detect.project.version.name=${credentials.version}`,
      `--detect.source.path=${sourcePath}`,
      `--detect.code.location.name=${codeLocation}`,
      `--detect.blackduck.signature.scanner.paths=${group.members.join(',')}`,
      ...detectProperties,
    ];

    return { args, codeLocation, sourcePath };
  }

  async scan(group: ScanGroup): Promise<ScanResult> {
    const { args, codeLocation, sourcePath } = this.buildArgs(group);
    const javaCommand = this.options.javaCommand ?? 'java';

    this.logger.debug(`Running Detect on ${sourcePath} as code location ${codeLocation}`);
    const result = await this.execCommand(javaCommand, args);

    const logPath = path.join(this.options.loggingDir ?? process.cwd(), `${codeLocation}-detect.log`);
    await fs.mkdir(path.dirname(logPath), { recursive: true });
    await fs.writeFile(logPath, result.stdout + result.stderr, 'utf-8');
    this.logger.debug(`Wrote Detect output to ${logPath}`);

    if (result.exitCode === 0) {
      return { status: 'passed', codeLocation, exitCode: 0, logPath };
    }

    this.logger.error(
      `Detect failed with exit code ${result.exitCode} on code location ${codeLocation}. See ${logPath}`
    );
    return { status: 'failed', codeLocation, exitCode: result.exitCode, logPath };
  }
}
