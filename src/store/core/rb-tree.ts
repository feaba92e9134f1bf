/**
 * Generic Red-Black tree utilities.
 * Immutable balancing operations shared by every augmented tree in the
 * engine. Node types supply a `withNode` function that rebuilds a node
 * and recomputes its aggregates.
 */

import type { NodeColor, RBNode } from '../../types/state.ts';

export type { RBNode };

// =============================================================================
// Types
// =============================================================================

/**
 * Creates a copy of a node with new color or children.
 * Implementations recompute subtree aggregates.
 */
export type WithNodeFn<N extends RBNode<N>> = (
  node: N,
  updates: Partial<{ color: NodeColor; left: N | null; right: N | null }>
) => N;

/**
 * A node on the path from the root to an insertion point, and the
 * direction taken from it.
 */
export interface InsertionPathEntry<N extends RBNode<N>> {
  node: N;
  direction: 'left' | 'right';
}

// =============================================================================
// Color Utilities
// =============================================================================

/**
 * Null children count as black.
 */
export function isRed<N extends RBNode<N>>(node: N | null | undefined): boolean {
  return node != null && node.color === 'red';
}

// =============================================================================
// Rotations
// =============================================================================

/**
 *       x                y
 *      / \              / \
 *     a   y    =>      x   c
 *        / \          / \
 *       b   c        a   b
 */
export function rotateLeft<N extends RBNode<N>>(node: N, withNode: WithNodeFn<N>): N {
  const right = node.right;
  if (right === null) return node;
  return withNode(right, { left: withNode(node, { right: right.left }) });
}

/**
 *         y            x
 *        / \          / \
 *       x   c   =>   a   y
 *      / \              / \
 *     a   b            b   c
 */
export function rotateRight<N extends RBNode<N>>(node: N, withNode: WithNodeFn<N>): N {
  const left = node.left;
  if (left === null) return node;
  return withNode(left, { right: withNode(node, { left: left.right }) });
}

// =============================================================================
// Balancing
// =============================================================================

export function ensureBlackRoot<N extends RBNode<N>>(node: N, withNode: WithNodeFn<N>): N {
  return node.color === 'red' ? withNode(node, { color: 'black' }) : node;
}

/**
 * Resolve a red-red violation below `node` with one of the four rotations.
 * The returned subtree root is black with two red children.
 */
export function fixRedViolations<N extends RBNode<N>>(node: N, withNode: WithNodeFn<N>): N {
  const left = node.left;
  const right = node.right;
  let result = node;

  if (left !== null && isRed(left) && isRed(left.left)) {
    result = rotateRight(result, withNode);
  } else if (left !== null && isRed(left) && isRed(left.right)) {
    result = rotateRight(withNode(result, { left: rotateLeft(left, withNode) }), withNode);
  } else if (right !== null && isRed(right) && isRed(right.right)) {
    result = rotateLeft(result, withNode);
  } else if (right !== null && isRed(right) && isRed(right.left)) {
    result = rotateLeft(withNode(result, { right: rotateRight(right, withNode) }), withNode);
  } else {
    return node;
  }

  return withNode(result, {
    color: 'black',
    left: result.left ? withNode(result.left, { color: 'red' }) : null,
    right: result.right ? withNode(result.right, { color: 'red' }) : null,
  });
}

/**
 * Fix a violation at one level of the insertion path: a color flip when
 * both children are red, a rotation otherwise.
 */
function fixInsertViolation<N extends RBNode<N>>(node: N, withNode: WithNodeFn<N>): N {
  const { left, right } = node;
  const leftViolation = left !== null && isRed(left) && (isRed(left.left) || isRed(left.right));
  const rightViolation = right !== null && isRed(right) && (isRed(right.left) || isRed(right.right));

  if (!leftViolation && !rightViolation) return node;

  if (left !== null && right !== null && isRed(left) && isRed(right)) {
    return withNode(node, {
      color: 'red',
      left: withNode(left, { color: 'black' }),
      right: withNode(right, { color: 'black' }),
    });
  }

  return fixRedViolations(node, withNode);
}

/**
 * Rebalance after inserting a red leaf, walking the insertion path from the
 * leaf's parent back to the root. O(log n).
 *
 * @param path - Rebuilt nodes from root (index 0) to the leaf's parent.
 */
export function fixInsertWithPath<N extends RBNode<N>>(
  path: InsertionPathEntry<N>[],
  withNode: WithNodeFn<N>
): N {
  for (let i = path.length - 1; i >= 0; i--) {
    if (i < path.length - 1) {
      const below = path[i + 1].node;
      const entry = path[i];
      const current = entry.direction === 'left' ? entry.node.left : entry.node.right;
      if (current !== below) {
        entry.node = entry.direction === 'left'
          ? withNode(entry.node, { left: below })
          : withNode(entry.node, { right: below });
      }
    }
    path[i].node = fixInsertViolation(path[i].node, withNode);
  }

  return ensureBlackRoot(path[0].node, withNode);
}

// =============================================================================
// Join
// =============================================================================

/**
 * Black nodes on the leftmost path, null leaves not counted.
 */
export function blackHeight<N extends RBNode<N>>(node: N | null): number {
  let height = 0;
  for (let current = node; current !== null; current = current.left) {
    if (current.color === 'black') height++;
  }
  return height;
}

/**
 * Descend the right spine of `left` to the first black subtree as tall as
 * `right` and hang `pivot` there; rotations repair red-red on the way up.
 */
function joinRight<N extends RBNode<N>>(
  left: N | null,
  leftHeight: number,
  pivot: N,
  right: N | null,
  rightHeight: number,
  withNode: WithNodeFn<N>
): N {
  if (left === null || (left.color === 'black' && leftHeight === rightHeight)) {
    return withNode(pivot, { color: 'red', left, right });
  }

  const childHeight = left.color === 'black' ? leftHeight - 1 : leftHeight;
  const joined = withNode(left, {
    right: joinRight(left.right, childHeight, pivot, right, rightHeight, withNode),
  });
  const child = joined.right;
  const grandchild = child?.right ?? null;
  if (left.color === 'black' && child !== null && isRed(child) && grandchild !== null && isRed(grandchild)) {
    const recolored = withNode(joined, {
      right: withNode(child, { right: withNode(grandchild, { color: 'black' }) }),
    });
    return rotateLeft(recolored, withNode);
  }
  return joined;
}

function joinLeft<N extends RBNode<N>>(
  left: N | null,
  leftHeight: number,
  pivot: N,
  right: N | null,
  rightHeight: number,
  withNode: WithNodeFn<N>
): N {
  if (right === null || (right.color === 'black' && leftHeight === rightHeight)) {
    return withNode(pivot, { color: 'red', left, right });
  }

  const childHeight = right.color === 'black' ? rightHeight - 1 : rightHeight;
  const joined = withNode(right, {
    left: joinLeft(left, leftHeight, pivot, right.left, childHeight, withNode),
  });
  const child = joined.left;
  const grandchild = child?.left ?? null;
  if (right.color === 'black' && child !== null && isRed(child) && grandchild !== null && isRed(grandchild)) {
    const recolored = withNode(joined, {
      left: withNode(child, { left: withNode(grandchild, { color: 'black' }) }),
    });
    return rotateRight(recolored, withNode);
  }
  return joined;
}

/**
 * Join two valid trees with `pivot` between them: everything in `left`
 * precedes the pivot, everything in `right` follows it. The pivot's own
 * children and color are replaced. O(|black height difference| + 1).
 */
export function joinTrees<N extends RBNode<N>>(
  left: N | null,
  pivot: N,
  right: N | null,
  withNode: WithNodeFn<N>
): N {
  const blackLeft = left === null ? null : ensureBlackRoot(left, withNode);
  const blackRight = right === null ? null : ensureBlackRoot(right, withNode);
  const leftHeight = blackHeight(blackLeft);
  const rightHeight = blackHeight(blackRight);

  if (leftHeight > rightHeight) {
    return ensureBlackRoot(joinRight(blackLeft, leftHeight, pivot, blackRight, rightHeight, withNode), withNode);
  }
  if (rightHeight > leftHeight) {
    return ensureBlackRoot(joinLeft(blackLeft, leftHeight, pivot, blackRight, rightHeight, withNode), withNode);
  }
  return withNode(pivot, { color: 'black', left: blackLeft, right: blackRight });
}

// =============================================================================
// Construction
// =============================================================================

/**
 * Build a balanced tree from items in order. Nodes on the last, incomplete
 * level are red so every root-to-leaf path has the same black height.
 */
export function buildBalancedTree<T, N extends RBNode<N>>(
  items: readonly T[],
  create: (item: T, color: NodeColor, left: N | null, right: N | null) => N
): N | null {
  const fullLevels = Math.floor(Math.log2(items.length + 1));

  function build(start: number, end: number, depth: number): N | null {
    if (start > end) return null;
    const mid = Math.floor((start + end) / 2);
    const left = build(start, mid - 1, depth + 1);
    const right = build(mid + 1, end, depth + 1);
    return create(items[mid], depth >= fullLevels ? 'red' : 'black', left, right);
  }

  return build(0, items.length - 1, 0);
}

/**
 * In-order traversal.
 */
export function* walkInOrder<N extends RBNode<N>>(root: N | null): Generator<N> {
  const stack: N[] = [];
  let node = root;
  while (node !== null || stack.length > 0) {
    while (node !== null) {
      stack.push(node);
      node = node.left;
    }
    const top = stack.pop();
    if (top === undefined) break;
    yield top;
    node = top.right;
  }
}
