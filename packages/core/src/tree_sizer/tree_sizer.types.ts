/**
 * Kind of a sized filesystem entry.
 */
export type NodeKind = 'file' | 'directory';

/**
 * A filesystem entry annotated with its byte size.
 *
 * For directories, `size` is the sum of the children's sizes at the moment
 * the tree was built. The tree is a snapshot and is never updated afterwards.
 */
export type SizeNode = {
  /** Absolute path of the entry */
  readonly path: string;
  /** Base name of the entry */
  readonly name: string;
  readonly kind: NodeKind;
  /** Bytes for a file, sum of descendant file bytes for a directory */
  readonly size: number;
  /** Ordered by entry name; always empty for files */
  readonly children: readonly SizeNode[];
}

/**
 * Why an entry could not be sized.
 */
export type SkipCode =
  | 'BROKEN_SYMLINK'
  | 'PERMISSION_DENIED'
  | 'SYMLINK_CYCLE'
  | 'SYMLINK_DUPLICATE'
  | 'SYMLINK_NOT_FOLLOWED'
  | 'UNSUPPORTED_TYPE'
  | 'READ_ERROR';

/**
 * An entry the walk could not size. It contributes 0 bytes and is left out
 * of the tree.
 */
export type SkipRecord = {
  readonly path: string;
  readonly code: SkipCode;
  readonly reason: string;
}

/**
 * Options for sizeTree().
 */
export type TreeSizerOptions = {
  /** Glob patterns (picomatch) matched against the relative path and the base name. Default: [] */
  exclude?: string[];
  /** Follow symbolic links to files and directories. Default: true */
  followSymlinks?: boolean;
}

/**
 * Result of sizing a directory tree.
 */
export type TreeSizeResult = {
  root: SizeNode;
  /** Entries that could not be sized, in walk order */
  skipped: SkipRecord[];
  /** Entries dropped by exclude patterns, in walk order */
  excluded: string[];
}
