export { runScanGroups } from './scan_runner';
export type { ScanOutcome, ScanRunReport, ScanRunOptions } from './scan_runner';
