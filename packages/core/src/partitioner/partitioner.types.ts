/**
 * One scan unit: paths handed to the scanner together.
 */
export type ScanGroup = {
  /** 1-based position in the emitted sequence */
  readonly index: number;
  /** Files or whole directories, in tree order */
  readonly members: readonly string[];
  /** Sum of member sizes in bytes */
  readonly size: number;
  /** A single file larger than the threshold */
  readonly oversized: boolean;
}

/**
 * Totals over a partition, for run summaries.
 */
export type GroupSummary = {
  groupCount: number;
  oversizedCount: number;
  totalBytes: number;
  largestGroupBytes: number;
}
