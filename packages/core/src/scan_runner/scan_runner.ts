/**
 * Scan runner
 *
 * Hands groups to a ScanExecutor one at a time, in partition order. A group
 * that fails or throws is reported and the run moves on to the next one.
 *
 * @module scan_runner
 */

import type { Logger } from '../logger';
import { createLogger } from '../logger';
import type { ScanGroup } from '../partitioner/partitioner.types';
import type { ScanExecutor, ScanResult } from '../scan_executor/scan_executor';

export type ScanOutcome = {
  group: ScanGroup;
  status: 'passed' | 'failed' | 'skipped';
  result?: ScanResult;
  /** Set when the executor threw, or why the group was skipped */
  message?: string;
}

export type ScanRunReport = {
  outcomes: ScanOutcome[];
  passed: number;
  failed: number;
  skipped: number;
}

export type ScanRunOptions = {
  /** Hand oversized groups to the executor anyway. Default: false */
  scanOversized?: boolean;
  logger?: Logger;
  /** Called after each group settles */
  onOutcome?: (outcome: ScanOutcome) => void;
}

export async function runScanGroups(
  groups: readonly ScanGroup[],
  executor: ScanExecutor,
  options: ScanRunOptions = {}
): Promise<ScanRunReport> {
  const logger = options.logger ?? createLogger('[scan] ');
  const outcomes: ScanOutcome[] = [];

  for (const group of groups) {
    let outcome: ScanOutcome;

    if (group.oversized && !options.scanOversized) {
      const message = `${group.members[0]} is ${group.size} bytes, larger than the scan size limit`;
      logger.warn(`Skipping group ${group.index}: ${message}`);
      outcome = { group, status: 'skipped', message };
    } else {
      logger.info(`Scanning group ${group.index} of ${groups.length} (${group.members.length} paths, ${group.size} bytes)`);
      try {
        const result = await executor.scan(group);
        outcome = { group, status: result.status, result };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Scan of group ${group.index} failed: ${message}`);
        outcome = { group, status: 'failed', message };
      }
    }

    outcomes.push(outcome);
    options.onOutcome?.(outcome);
  }

  return {
    outcomes,
    passed: outcomes.filter(o => o.status === 'passed').length,
    failed: outcomes.filter(o => o.status === 'failed').length,
    skipped: outcomes.filter(o => o.status === 'skipped').length,
  };
}
