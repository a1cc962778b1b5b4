import type { TreeNode } from './node.js';

/** A value that may be missing; a missing element is a legitimate wrapped state. */
export type Maybe<T> = T | null | undefined;

/**
 * Yields the ordered children of an element. Must be pure and must not
 * revisit an ancestor: the builder performs no cycle detection.
 */
export type ChildrenProducer<E> = (element: E) => Iterable<Maybe<E>>;

/** Per-node traversal decision. */
export const Visit = {
  /** Keep going, including into this node's children. */
  Descend: 'descend',
  /** Keep going, but not into this node's children. */
  Skip: 'skip',
  /** Stop the whole traversal. */
  Halt: 'halt',
} as const;

export type Visit = (typeof Visit)[keyof typeof Visit];

export type Visitor<E> = (node: TreeNode<E>) => Visit;

export interface BuildOptions {
  /** Upper bound on the number of nodes; unbounded when omitted. */
  maxNodes?: number;
}
