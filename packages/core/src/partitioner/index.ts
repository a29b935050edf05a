export { partition, assertValidThreshold, summarizeGroups, expandGroupFiles } from './partitioner';
export type { ScanGroup, GroupSummary } from './partitioner.types';
