export { FsTreeSizer, sizeTree } from './tree_sizer';
export type { TreeSizer } from './tree_sizer';
export {
  compareNames,
  createFileNode,
  createDirectoryNode,
  collectFilePaths,
  findNode,
} from './tree_node';
export type {
  NodeKind,
  SizeNode,
  SkipCode,
  SkipRecord,
  TreeSizerOptions,
  TreeSizeResult,
} from './tree_sizer.types';
