import { collectFilePaths, compareNames, createDirectoryNode, createFileNode, findNode } from './tree_node';

describe('tree_node', () => {
  const tree = createDirectoryNode('/r', [
    createDirectoryNode('/r/lib', [
      createFileNode('/r/lib/y.js', 2),
      createFileNode('/r/lib/x.js', 4),
    ]),
    createFileNode('/r/a.txt', 3),
  ]);

  it('should sum child sizes and sort children by name', () => {
    expect(tree.size).toBe(9);
    expect(tree.children.map(c => c.name)).toEqual(['a.txt', 'lib']);
    expect(tree.children[1]?.children.map(c => c.name)).toEqual(['x.js', 'y.js']);
  });

  it('should freeze nodes', () => {
    expect(Object.isFrozen(tree)).toBe(true);
    expect(Object.isFrozen(tree.children)).toBe(true);
  });

  it('should compare names without locale rules', () => {
    expect(['b', 'B', 'a', '_'].sort(compareNames)).toEqual(['B', '_', 'a', 'b']);
  });

  it('should collect file paths in tree order', () => {
    expect(collectFilePaths(tree)).toEqual(['/r/a.txt', '/r/lib/x.js', '/r/lib/y.js']);
    expect(collectFilePaths(createFileNode('/solo', 1))).toEqual(['/solo']);
  });

  it('should find nodes by absolute path', () => {
    expect(findNode(tree, '/r')).toBe(tree);
    expect(findNode(tree, '/r/lib/y.js')?.size).toBe(2);
    expect(findNode(tree, '/r/lib/missing.js')).toBeNull();
    expect(findNode(tree, '/elsewhere/a.txt')).toBeNull();
  });
});
