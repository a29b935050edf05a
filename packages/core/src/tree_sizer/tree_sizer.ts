/**
 * FsTreeSizer - walks a directory and annotates every entry with its size
 *
 * The walk is sequential and visits entries in name order, so the same
 * filesystem always yields the same tree. Entries that cannot be sized are
 * collected as SkipRecords instead of aborting the walk.
 *
 * @module tree_sizer
 */

import type { Dirent, Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import picomatch from 'picomatch';
import { NotFoundError } from '../errors';
import { compareNames, createDirectoryNode, createFileNode } from './tree_node';
import type {
  SizeNode,
  SkipCode,
  SkipRecord,
  TreeSizeResult,
  TreeSizerOptions,
} from './tree_sizer.types';

/**
 * Anything that can produce a sized tree for a root directory.
 */
export interface TreeSizer {
  sizeTree(rootPath: string): Promise<TreeSizeResult>;
}

type WalkState = {
  rootPath: string;
  realRoot: string;
  /** Real paths of every directory walked so far */
  visited: Set<string>;
  skipped: SkipRecord[];
  excluded: string[];
}

const SKIP_REASONS: Record<SkipCode, string> = {
  BROKEN_SYMLINK: 'symbolic link target does not exist',
  PERMISSION_DENIED: 'permission denied',
  SYMLINK_CYCLE: 'symbolic link points back into its own ancestry',
  SYMLINK_DUPLICATE: 'symbolic link target is already part of the walk',
  SYMLINK_NOT_FOLLOWED: 'symbolic link not followed',
  UNSUPPORTED_TYPE: 'not a regular file or directory',
  READ_ERROR: 'could not be read',
};

// fs errors may come from another realm, so read them by shape
function errnoCode(error: unknown): string | undefined {
  const code = typeof error === 'object' && error !== null ? Reflect.get(error, 'code') : undefined;
  return typeof code === 'string' ? code : undefined;
}

function errorMessage(error: unknown): string {
  const message = typeof error === 'object' && error !== null ? Reflect.get(error, 'message') : undefined;
  return typeof message === 'string' ? message : String(error);
}

function isInside(parent: string, candidate: string): boolean {
  const relative = path.relative(parent, candidate);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

function skipRecord(entryPath: string, code: SkipCode, detail?: string): SkipRecord {
  const reason = detail ? `${SKIP_REASONS[code]} (${detail})` : SKIP_REASONS[code];
  return { path: entryPath, code, reason };
}

/**
 * Maps a failed filesystem call to a SkipRecord.
 * @param viaSymlink - The entry is a symbolic link, so ENOENT means a dangling target
 */
export function skipRecordFromError(entryPath: string, error: unknown, viaSymlink: boolean): SkipRecord {
  const code = errnoCode(error);
  switch (code) {
    case 'ENOENT':
      return viaSymlink ? skipRecord(entryPath, 'BROKEN_SYMLINK') : skipRecord(entryPath, 'READ_ERROR', code);
    case 'ELOOP':
      return skipRecord(entryPath, 'SYMLINK_CYCLE');
    case 'EACCES':
    case 'EPERM':
      return skipRecord(entryPath, 'PERMISSION_DENIED');
    default:
      return skipRecord(entryPath, 'READ_ERROR', code ?? errorMessage(error));
  }
}

/**
 * Filesystem-backed TreeSizer.
 *
 * @example
 * ```typescript
 * const sizer = new FsTreeSizer({ exclude: ['node_modules'] });
 * const { root, skipped } = await sizer.sizeTree('/path/to/project');
 * console.log(root.size, skipped.length);
 * ```
 */
export class FsTreeSizer implements TreeSizer {
  private readonly followSymlinks: boolean;
  private readonly isExcludedPattern: ((candidate: string) => boolean) | null;

  constructor(options: TreeSizerOptions = {}) {
    this.followSymlinks = options.followSymlinks ?? true;
    const exclude = options.exclude ?? [];
    this.isExcludedPattern = exclude.length > 0 ? picomatch(exclude, { dot: true }) : null;
  }

  /**
   * Sizes every entry under rootPath.
   * @throws NotFoundError if rootPath is missing or not a directory
   */
  async sizeTree(rootPath: string): Promise<TreeSizeResult> {
    const absoluteRoot = path.resolve(rootPath);

    let isDirectory = false;
    try {
      isDirectory = (await fs.stat(absoluteRoot)).isDirectory();
    } catch (error) {
      throw new NotFoundError(absoluteRoot, errnoCode(error) === 'ENOENT' ? 'not found' : 'could not be read');
    }
    if (!isDirectory) {
      throw new NotFoundError(absoluteRoot, 'is not a directory');
    }

    const realRoot = await fs.realpath(absoluteRoot);
    const state: WalkState = {
      rootPath: absoluteRoot,
      realRoot,
      visited: new Set([realRoot]),
      skipped: [],
      excluded: [],
    };
    const root = await this.sizeDirectory(absoluteRoot, new Set([realRoot]), state);

    return {
      // An unreadable root is already in `skipped`; report it as empty
      root: root ?? createDirectoryNode(absoluteRoot),
      skipped: state.skipped,
      excluded: state.excluded,
    };
  }

  private isExcluded(entryPath: string, state: WalkState): boolean {
    if (!this.isExcludedPattern) return false;
    const relative = path.relative(state.rootPath, entryPath).split(path.sep).join('/');
    return this.isExcludedPattern(relative) || this.isExcludedPattern(path.basename(entryPath));
  }

  /**
   * Lists a directory and sizes its children in name order.
   * @param ancestors - Real paths of the directories on the current descent
   * @returns The directory node, or null when it cannot be listed
   */
  private async sizeDirectory(
    dirPath: string,
    ancestors: ReadonlySet<string>,
    state: WalkState
  ): Promise<SizeNode | null> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      state.skipped.push(skipRecordFromError(dirPath, error, false));
      return null;
    }
    entries.sort((a, b) => compareNames(a.name, b.name));

    const children: SizeNode[] = [];
    for (const entry of entries) {
      const entryPath = path.join(dirPath, entry.name);
      if (this.isExcluded(entryPath, state)) {
        state.excluded.push(entryPath);
        continue;
      }
      const child = await this.sizeEntry(entry, entryPath, ancestors, state);
      if (child) {
        children.push(child);
      }
    }

    return createDirectoryNode(dirPath, children);
  }

  private async sizeEntry(
    entry: Dirent,
    entryPath: string,
    ancestors: ReadonlySet<string>,
    state: WalkState
  ): Promise<SizeNode | null> {
    const isSymlink = entry.isSymbolicLink();
    if (isSymlink && !this.followSymlinks) {
      state.skipped.push(skipRecord(entryPath, 'SYMLINK_NOT_FOLLOWED'));
      return null;
    }

    // stat() follows links, so a dangling target fails here
    let stats: Stats;
    try {
      stats = await fs.stat(entryPath);
    } catch (error) {
      state.skipped.push(skipRecordFromError(entryPath, error, isSymlink));
      return null;
    }

    if (stats.isFile()) {
      return createFileNode(entryPath, stats.size);
    }

    if (stats.isDirectory()) {
      let realPath: string;
      try {
        realPath = await fs.realpath(entryPath);
      } catch (error) {
        state.skipped.push(skipRecordFromError(entryPath, error, isSymlink));
        return null;
      }
      if (ancestors.has(realPath)) {
        state.skipped.push(skipRecord(entryPath, 'SYMLINK_CYCLE'));
        return null;
      }
      // A linked directory inside the root is walked under its own path
      if (isSymlink && (state.visited.has(realPath) || isInside(state.realRoot, realPath))) {
        state.skipped.push(skipRecord(entryPath, 'SYMLINK_DUPLICATE', realPath));
        return null;
      }
      state.visited.add(realPath);
      return this.sizeDirectory(entryPath, new Set([...ancestors, realPath]), state);
    }

    state.skipped.push(skipRecord(entryPath, 'UNSUPPORTED_TYPE'));
    return null;
  }
}

/**
 * Sizes a directory tree with a one-off FsTreeSizer.
 */
export async function sizeTree(rootPath: string, options: TreeSizerOptions = {}): Promise<TreeSizeResult> {
  return new FsTreeSizer(options).sizeTree(rootPath);
}
