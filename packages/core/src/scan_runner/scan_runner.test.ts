import { createLogger } from '../logger';
import type { ScanGroup } from '../partitioner/partitioner.types';
import { MemoryScanExecutor } from '../scan_executor/memory';
import { runScanGroups } from './scan_runner';

const groups: ScanGroup[] = [
  { index: 1, members: ['/r/a', '/r/b'], size: 4, oversized: false },
  { index: 2, members: ['/r/huge.iso'], size: 90, oversized: true },
  { index: 3, members: ['/r/c'], size: 5, oversized: false },
];

describe('runScanGroups', () => {
  const logger = createLogger('', 'silent');

  it('should scan groups in order and skip oversized ones', async () => {
    const executor = new MemoryScanExecutor();

    const report = await runScanGroups(groups, executor, { logger });

    expect(executor.scanned.map(group => group.index)).toEqual([1, 3]);
    expect(report.outcomes.map(outcome => outcome.status)).toEqual(['passed', 'skipped', 'passed']);
    expect(report.outcomes[1]?.message).toBe('/r/huge.iso is 90 bytes, larger than the scan size limit');
    expect(report).toMatchObject({ passed: 2, failed: 0, skipped: 1 });
  });

  it('should scan oversized groups when asked to', async () => {
    const executor = new MemoryScanExecutor();

    const report = await runScanGroups(groups, executor, { logger, scanOversized: true });

    expect(executor.scanned.map(group => group.index)).toEqual([1, 2, 3]);
    expect(report).toMatchObject({ passed: 3, failed: 0, skipped: 0 });
  });

  it('should keep going after a failed or crashed scan', async () => {
    const executor = new MemoryScanExecutor({ failingGroups: [1], throwingGroups: [3] });

    const report = await runScanGroups(groups, executor, { logger, scanOversized: true });

    expect(report.outcomes.map(outcome => outcome.status)).toEqual(['failed', 'passed', 'failed']);
    expect(report.outcomes[0]?.result?.exitCode).toBe(1);
    expect(report.outcomes[2]?.message).toBe('Scanner crashed on group 3');
    expect(report).toMatchObject({ passed: 1, failed: 2, skipped: 0 });
  });

  it('should report each outcome as it settles', async () => {
    const onOutcome = jest.fn();

    await runScanGroups(groups, new MemoryScanExecutor(), { logger, onOutcome });

    expect(onOutcome).toHaveBeenCalledTimes(3);
    expect(onOutcome.mock.calls.map(([outcome]) => outcome.group.index)).toEqual([1, 2, 3]);
  });

  it('should return an empty report for no groups', async () => {
    await expect(runScanGroups([], new MemoryScanExecutor(), { logger })).resolves.toEqual({
      outcomes: [],
      passed: 0,
      failed: 0,
      skipped: 0,
    });
  });
});
