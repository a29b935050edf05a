/**
 * Group partitioner
 *
 * Greedy, depth-first packing of a sized tree into scan groups bounded by a
 * byte threshold. A subtree that fits in the remaining capacity goes in whole;
 * a directory that cannot fit even in an empty group is opened up and its
 * children are packed in turn with the same running group.
 *
 * @module partitioner
 */

import { InvalidConfigError } from '../errors';
import { collectFilePaths, findNode } from '../tree_sizer/tree_node';
import type { SizeNode } from '../tree_sizer/tree_sizer.types';
import type { GroupSummary, ScanGroup } from './partitioner.types';

/**
 * @throws InvalidConfigError unless thresholdBytes is a positive safe integer
 */
export function assertValidThreshold(thresholdBytes: unknown): asserts thresholdBytes is number {
  if (typeof thresholdBytes !== 'number' || !Number.isSafeInteger(thresholdBytes) || thresholdBytes <= 0) {
    throw new InvalidConfigError(
      `Size threshold must be a positive integer number of bytes, got ${String(thresholdBytes)}`
    );
  }
}

class GroupAccumulator {
  private readonly groups: ScanGroup[] = [];
  private members: string[] = [];
  private size = 0;

  constructor(private readonly thresholdBytes: number) { }

  remaining(): number {
    return this.thresholdBytes - this.size;
  }

  add(node: SizeNode): void {
    this.members.push(node.path);
    this.size += node.size;
  }

  /** Emits the open group, if any, and starts an empty one. */
  close(): void {
    if (this.members.length === 0) return;
    this.push(this.members, this.size, false);
    this.members = [];
    this.size = 0;
  }

  emitOversized(node: SizeNode): void {
    this.push([node.path], node.size, true);
  }

  finish(): ScanGroup[] {
    this.close();
    return this.groups;
  }

  private push(members: string[], size: number, oversized: boolean): void {
    this.groups.push(Object.freeze({
      index: this.groups.length + 1,
      members: Object.freeze([...members]),
      size,
      oversized,
    }));
  }
}

function holdsNoFiles(node: SizeNode): boolean {
  return node.kind === 'directory' && node.children.every(holdsNoFiles);
}

function packChildren(directory: SizeNode, accumulator: GroupAccumulator, thresholdBytes: number): void {
  for (const child of directory.children) {
    if (holdsNoFiles(child)) {
      // nothing to scan
      continue;
    }
    if (child.size <= accumulator.remaining()) {
      accumulator.add(child);
    } else if (child.size > thresholdBytes && child.kind === 'directory') {
      packChildren(child, accumulator, thresholdBytes);
    } else if (child.size > thresholdBytes) {
      accumulator.emitOversized(child);
    } else {
      accumulator.close();
      accumulator.add(child);
    }
  }
}

/**
 * Partitions the children of root into scan groups.
 *
 * Every group is at most thresholdBytes, except oversized groups which hold
 * exactly one file that is larger than the threshold on its own. The result
 * depends only on the tree and the threshold.
 *
 * @example
 * ```typescript
 * const { root } = await sizeTree('/srv/checkout');
 * for (const group of partition(root, 5 * 1024 ** 3)) {
 *   console.log(group.index, group.size, group.members);
 * }
 * ```
 */
export function partition(root: SizeNode, thresholdBytes: number): ScanGroup[] {
  assertValidThreshold(thresholdBytes);

  const accumulator = new GroupAccumulator(thresholdBytes);
  if (root.kind === 'file') {
    // Not produced by the sizer, but a bare file still gets a group
    if (root.size > thresholdBytes) {
      accumulator.emitOversized(root);
    } else {
      accumulator.add(root);
    }
    return accumulator.finish();
  }

  packChildren(root, accumulator, thresholdBytes);
  return accumulator.finish();
}

export function summarizeGroups(groups: readonly ScanGroup[]): GroupSummary {
  return {
    groupCount: groups.length,
    oversizedCount: groups.filter(group => group.oversized).length,
    totalBytes: groups.reduce((total, group) => total + group.size, 0),
    largestGroupBytes: groups.reduce((largest, group) => Math.max(largest, group.size), 0),
  };
}

/**
 * Lists the files a group covers, expanding directory members through the tree.
 * Members that are not in the tree are returned as-is.
 */
export function expandGroupFiles(root: SizeNode, group: ScanGroup): string[] {
  return group.members.flatMap(member => {
    const node = findNode(root, member);
    return node ? collectFilePaths(node) : [member];
  });
}
