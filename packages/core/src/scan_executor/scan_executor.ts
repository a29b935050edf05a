/**
 * ScanExecutor Interface
 *
 * The scanner is a black box: it receives one frozen group at a time and
 * reports whether the scan went through. Executors never mutate groups.
 *
 * @module scan_executor
 */

import type { ScanGroup } from '../partitioner/partitioner.types';

export type ScanStatus = 'passed' | 'failed';

/**
 * Outcome of scanning one group.
 */
export type ScanResult = {
  status: ScanStatus;
  /** Name the server files the scan under */
  codeLocation: string;
  exitCode: number;
  /** Where the scanner output was written, if anywhere */
  logPath?: string;
}

export interface ScanExecutor {
  scan(group: ScanGroup): Promise<ScanResult>;
}

/**
 * Result of running an external command.
 */
export type ExecResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type ExecOptions = {
  cwd?: string;
  env?: Record<string, string>;
}

/**
 * Runs an external command. Injected so executors can be tested without
 * spawning processes.
 */
export type ExecCommand = (command: string, args: string[], options?: ExecOptions) => Promise<ExecResult>;
