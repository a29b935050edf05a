export { createExecCommand } from './exec_command';
export { DetectScanExecutor, commonParentDirectory, buildCodeLocationName } from './detect';
export type { DetectScanExecutorOptions, DetectScanExecutorDependencies } from './detect';
export { MemoryScanExecutor } from './memory';
export type { MemoryScanExecutorOptions } from './memory';
export type {
  ScanExecutor,
  ScanResult,
  ScanStatus,
  ExecCommand,
  ExecOptions,
  ExecResult,
} from './scan_executor';
