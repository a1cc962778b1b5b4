import { NilParameterError } from '../errors.js';
import type { TreeNode } from '../tree/node.js';
import type { Tree } from '../tree/tree.js';
import { Visit } from '../tree/types.js';
import type { Maybe } from '../tree/types.js';
import { matches, toCriteria } from './criteria.js';
import type { CriteriaInput, SearchCriteria } from './criteria.js';

// The root is the search context: visitors descend from it without testing it.
function decide<E>(
  node: TreeNode<E>,
  root: TreeNode<E>,
  c: SearchCriteria<E>,
  onMatch: (element: E) => Visit,
): Visit {
  if (node === root) return Visit.Descend;
  if (!node.hasElement()) throw new NilParameterError('node.element');
  if (!matches(c, node.element)) return Visit.Descend;
  return onMatch(node.element);
}

/**
 * Breadth-first search returning the shallowest match along every branch.
 * The subtree under a match is not searched, so no result is an ancestor
 * of another. Results come in breadth-first order.
 */
export function collectAndPrune<E>(tree: Tree<E>, input: Maybe<CriteriaInput<E>>): E[] {
  const c = toCriteria(input, 'collectAndPrune');
  const root = tree.root();
  const found: E[] = [];
  tree.bfs((node) =>
    decide(node, root, c, (element) => {
      found.push(element);
      return Visit.Skip;
    }),
  );
  return found;
}

/** Depth-first search for the first match; the walk stops there. */
export function firstMatch<E>(tree: Tree<E>, input: Maybe<CriteriaInput<E>>): E | undefined {
  const c = toCriteria(input, 'firstMatch');
  const root = tree.root();
  let found: E | undefined;
  tree.dfs((node) =>
    decide(node, root, c, (element) => {
      found = element;
      return Visit.Halt;
    }),
  );
  return found;
}

/** Filter the root's immediate children without recursing. */
export function directChildrenMatching<E>(tree: Tree<E>, input: Maybe<CriteriaInput<E>>): E[] {
  const c = toCriteria(input, 'directChildrenMatching');
  const result: E[] = [];
  for (const child of tree.directChildren()) {
    if (child.hasElement() && matches(c, child.element)) result.push(child.element);
  }
  return result;
}
