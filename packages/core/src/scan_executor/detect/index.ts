export { DetectScanExecutor, commonParentDirectory, buildCodeLocationName } from './detect_scan_executor';
export type { DetectScanExecutorOptions, DetectScanExecutorDependencies } from './detect_scan_executor';
