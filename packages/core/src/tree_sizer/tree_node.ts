import * as path from 'path';
import type { SizeNode } from './tree_sizer.types';

/**
 * Orders entry names by UTF-16 code units, independent of locale.
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function createFileNode(filePath: string, size: number): SizeNode {
  return Object.freeze({
    path: filePath,
    name: path.basename(filePath),
    kind: 'file' as const,
    size,
    children: Object.freeze([]),
  });
}

/**
 * Builds a directory node whose size is the sum of its children.
 * Children are sorted by name so hand-built trees follow walk order.
 */
export function createDirectoryNode(dirPath: string, children: readonly SizeNode[] = []): SizeNode {
  const sorted = [...children].sort((a, b) => compareNames(a.name, b.name));
  const size = sorted.reduce((total, child) => total + child.size, 0);
  return Object.freeze({
    path: dirPath,
    name: path.basename(dirPath),
    kind: 'directory' as const,
    size,
    children: Object.freeze(sorted),
  });
}

/**
 * Lists the file paths under a node, in tree order. A file node yields itself.
 */
export function collectFilePaths(node: SizeNode): string[] {
  if (node.kind === 'file') {
    return [node.path];
  }
  return node.children.flatMap(collectFilePaths);
}

/**
 * Finds the node at an absolute path inside the tree, or null.
 */
export function findNode(root: SizeNode, targetPath: string): SizeNode | null {
  if (root.path === targetPath) {
    return root;
  }
  const relative = path.relative(root.path, targetPath);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    return null;
  }

  let current: SizeNode = root;
  for (const segment of relative.split(path.sep)) {
    const next = current.children.find(child => child.name === segment);
    if (!next) {
      return null;
    }
    current = next;
  }
  return current;
}
