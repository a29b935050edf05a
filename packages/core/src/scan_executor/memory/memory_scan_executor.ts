import type { ScanGroup } from '../../partitioner/partitioner.types';
import type { ScanExecutor, ScanResult } from '../scan_executor';

export type MemoryScanExecutorOptions = {
  /** Group indexes whose scan reports failure */
  failingGroups?: number[];
  /** Group indexes whose scan throws */
  throwingGroups?: number[];
}

/**
 * In-memory ScanExecutor for tests and dry runs. Records every group it
 * receives and passes unless told otherwise.
 */
export class MemoryScanExecutor implements ScanExecutor {
  readonly scanned: ScanGroup[] = [];
  private readonly failingGroups: Set<number>;
  private readonly throwingGroups: Set<number>;

  constructor(options: MemoryScanExecutorOptions = {}) {
    this.failingGroups = new Set(options.failingGroups ?? []);
    this.throwingGroups = new Set(options.throwingGroups ?? []);
  }

  async scan(group: ScanGroup): Promise<ScanResult> {
    this.scanned.push(group);
    const codeLocation = `memory-${group.index}`;

    if (this.throwingGroups.has(group.index)) {
      throw new Error(`Scanner crashed on group ${group.index}`);
    }
    if (this.failingGroups.has(group.index)) {
      return { status: 'failed', codeLocation, exitCode: 1 };
    }
    return { status: 'passed', codeLocation, exitCode: 0 };
  }
}
