export { MemoryScanExecutor } from './memory_scan_executor';
export type { MemoryScanExecutorOptions } from './memory_scan_executor';
