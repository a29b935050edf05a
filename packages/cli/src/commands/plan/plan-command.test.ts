// Mock DependencyInjectionService before importing
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import { PlanCommand } from './plan-command';
import { DependencyInjectionService } from '../../services/dependency-injection';
import { Errors, Sizer } from '@scansplit/core';

// Mock console methods to capture output
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleWarn = jest.spyOn(console, 'warn').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

const mockDI = jest.mocked(DependencyInjectionService);

describe('PlanCommand', () => {
  let planCommand: PlanCommand;
  let mockSizeTree: jest.Mock;
  let mockContainer: {
    loadConfigFile: jest.Mock;
    getTreeSizer: jest.Mock;
  };

  // /proj: a.txt (3), lib/ (x.js 4, y.js 2)
  const sized: Sizer.TreeSizeResult = {
    root: Sizer.createDirectoryNode('/proj', [
      Sizer.createFileNode('/proj/a.txt', 3),
      Sizer.createDirectoryNode('/proj/lib', [
        Sizer.createFileNode('/proj/lib/x.js', 4),
        Sizer.createFileNode('/proj/lib/y.js', 2),
      ]),
    ]),
    skipped: [
      { path: '/proj/dead', code: 'BROKEN_SYMLINK', reason: 'symbolic link target does not exist' },
    ],
    excluded: [],
  };

  beforeEach(() => {
    jest.clearAllMocks();

    mockSizeTree = jest.fn().mockResolvedValue(sized);
    mockContainer = {
      loadConfigFile: jest.fn().mockResolvedValue({}),
      getTreeSizer: jest.fn().mockReturnValue({ sizeTree: mockSizeTree }),
    };
    mockDI.getInstance.mockReturnValue(mockContainer as unknown as DependencyInjectionService);

    planCommand = new PlanCommand();
  });

  it('should print every planned group', async () => {
    await planCommand.execute({ targetDir: '/proj', sizeLimit: 5 });

    expect(mockSizeTree).toHaveBeenCalledWith('/proj');
    expect(mockConsoleLog).toHaveBeenCalledWith('📦 3 scan group(s) for /proj (9 B, limit 5 B)');
    expect(mockConsoleLog).toHaveBeenCalledWith('  #1 3 B in 1 path(s)');
    expect(mockConsoleLog).toHaveBeenCalledWith('  #2 4 B in 1 path(s)');
    expect(mockConsoleLog).toHaveBeenCalledWith('  #3 2 B in 1 path(s)');
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('should warn about skipped paths without failing', async () => {
    await planCommand.execute({ targetDir: '/proj', sizeLimit: 5 });

    expect(mockConsoleWarn).toHaveBeenCalledWith('⚠️ Skipped 1 unreadable path(s):');
    expect(mockConsoleWarn).toHaveBeenCalledWith('  /proj/dead: symbolic link target does not exist');
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('should pass sizing options to the tree sizer', async () => {
    await planCommand.execute({
      targetDir: '/proj',
      sizeLimit: 5,
      exclude: ['*.iso'],
      dontFollowSymlinks: true,
    });

    expect(mockContainer.getTreeSizer).toHaveBeenCalledWith(
      expect.objectContaining({ exclude: ['*.iso'], followSymlinks: false, maxScanSizeBytes: 5 })
    );
  });

  it('should use the size limit from the config file', async () => {
    mockContainer.loadConfigFile.mockResolvedValue({ maxScanSizeBytes: 1000 });

    await planCommand.execute({ targetDir: '/proj', config: 'scansplit.yaml' });

    expect(mockContainer.loadConfigFile).toHaveBeenCalledWith('scansplit.yaml');
    expect(mockConsoleLog).toHaveBeenCalledWith('📦 1 scan group(s) for /proj (9 B, limit 1000 B)');
  });

  it('should print a JSON plan', async () => {
    await planCommand.execute({ targetDir: '/proj', sizeLimit: 5, json: true });

    expect(mockConsoleLog).toHaveBeenCalledTimes(1);
    const output = JSON.parse(String(mockConsoleLog.mock.calls[0]?.[0]));
    expect(output.success).toBe(true);
    expect(output.data.totalBytes).toBe(9);
    expect(output.data.summary).toEqual({
      groupCount: 3,
      oversizedCount: 0,
      totalBytes: 9,
      largestGroupBytes: 4,
    });
    expect(output.data.groups[1]).toEqual({
      index: 2,
      members: ['/proj/lib/x.js'],
      size: 4,
      oversized: false,
    });
    expect(output.data.skipped).toHaveLength(1);
    expect(mockConsoleWarn).not.toHaveBeenCalled();
  });

  it('should exit with 1 when the target directory is missing', async () => {
    mockSizeTree.mockRejectedValue(new Errors.NotFoundError('/missing', 'not found'));

    await planCommand.execute({ targetDir: '/missing', sizeLimit: 5 });

    expect(mockConsoleError).toHaveBeenCalledWith('❌ Target directory /missing not found');
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  it('should exit with 1 for an invalid size limit before walking the tree', async () => {
    await planCommand.execute({ targetDir: '/proj', sizeLimit: Number.NaN });

    expect(mockConsoleError).toHaveBeenCalledWith(
      '❌ Invalid max_scan_size_bytes: Size threshold must be a positive integer number of bytes, got NaN'
    );
    expect(mockContainer.getTreeSizer).not.toHaveBeenCalled();
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });
});
