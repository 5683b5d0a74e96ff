import type { FileFormat } from './format.js';

/**
 * Walk the tree from `node` and return the most specific format whose
 * predicate accepts `input`.
 *
 * The first matching child wins and the walk never backtracks: once a child
 * matches, its siblings are not tried again even if none of the child's own
 * children match. Returns `node` itself when no child matches.
 */
export function matchBytes(node: FileFormat, input: Uint8Array): FileFormat {
  for (const child of node.children) {
    if (child.matches(input)) {
      return matchBytes(child, input);
    }
  }
  return node;
}

/**
 * Every node of the subtree in depth-first pre-order, `node` first
 */
export function flatten(node: FileFormat): FileFormat[] {
  const result: FileFormat[] = [node];
  for (const child of node.children) {
    result.push(...flatten(child));
  }
  return result;
}

/**
 * Number of edges between `node` and the root
 */
export function depth(node: FileFormat): number {
  let level = 0;
  for (let current = node.parent; current !== undefined; current = current.parent) {
    level++;
  }
  return level;
}
