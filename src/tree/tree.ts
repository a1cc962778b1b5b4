import { nanoid } from 'nanoid';
import { NANOID_LENGTH_TREE, TREE_ID_PREFIX } from '../constants.js';
import {
  BuildFailureError,
  ConfigError,
  NavigatorError,
  NilParameterError,
  NodeLimitError,
  TraversalFailureError,
} from '../errors.js';
import { validate } from '../infra/validator.js';
import type { FieldRule } from '../infra/validator.js';
import { TreeNode } from './node.js';
import { Visit } from './types.js';
import type { BuildOptions, ChildrenProducer, Maybe, Visitor } from './types.js';

export const MAX_NODES_RULE: FieldRule = { type: 'number', min: 1, integer: true, required: false };

function nodeLimit(options: BuildOptions): number {
  const errors = validate({ maxNodes: options.maxNodes }, { maxNodes: MAX_NODES_RULE });
  if (errors.length > 0) throw new ConfigError('Invalid build options', errors);
  return options.maxNodes ?? Infinity;
}

function runVisitor<E>(visitor: Visitor<E>, node: TreeNode<E>): Visit {
  try {
    return visitor(node);
  } catch (e) {
    if (e instanceof NavigatorError) throw e;
    throw new TraversalFailureError(e);
  }
}

/**
 * Eagerly materialized tree over raw elements. Immutable once built.
 */
export class Tree<E> {
  readonly id: string;

  private constructor(
    private readonly rootNode: TreeNode<E>,
    readonly size: number,
  ) {
    this.id = `${TREE_ID_PREFIX}${nanoid(NANOID_LENGTH_TREE)}`;
  }

  /**
   * Wrap `rootElement` and expand every node through `children`, level by level,
   * until no node yields further children.
   *
   * Throws NilParameterError when a node holds no element and
   * BuildFailureError when the producer throws or `maxNodes` is exceeded.
   * A `maxNodes` that is not a positive integer is a ConfigError. Never returns a partial tree.
   */
  static build<E>(
    rootElement: Maybe<E>,
    children: ChildrenProducer<E>,
    options: BuildOptions = {},
  ): Tree<E> {
    const limit = nodeLimit(options);
    const root = TreeNode.wrap(rootElement);
    const nodes: TreeNode<E>[] = [root];

    for (let i = 0; i < nodes.length; i++) {
      const node = nodes[i];
      if (!node.hasElement()) throw new NilParameterError('element');

      let produced: Maybe<E>[];
      try {
        produced = [...children(node.element)];
      } catch (e) {
        throw new BuildFailureError(e);
      }

      for (const element of produced) {
        if (nodes.length >= limit) throw new BuildFailureError(new NodeLimitError(limit));
        nodes.push(node.attach(element));
      }
    }

    for (const node of nodes) node.freeze();
    return new Tree(root, nodes.length);
  }

  root(): TreeNode<E> {
    return this.rootNode;
  }

  directChildren(): readonly TreeNode<E>[] {
    return this.rootNode.children;
  }

  /** Breadth-first walk from the root. */
  bfs(visitor: Visitor<E>): void {
    const queue: TreeNode<E>[] = [this.rootNode];
    for (let i = 0; i < queue.length; i++) {
      const node = queue[i];
      const outcome = runVisitor(visitor, node);
      if (outcome === Visit.Halt) return;
      if (outcome === Visit.Skip) continue;
      for (const child of node.children) queue.push(child);
    }
  }

  /** Pre-order depth-first walk from the root, children left to right. */
  dfs(visitor: Visitor<E>): void {
    const stack: TreeNode<E>[] = [this.rootNode];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      const outcome = runVisitor(visitor, node);
      if (outcome === Visit.Halt) return;
      if (outcome === Visit.Skip) continue;
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push(node.children[i]);
      }
    }
  }

  /** All nodes in breadth-first order. */
  nodes(): TreeNode<E>[] {
    const result: TreeNode<E>[] = [];
    this.bfs((node) => {
      result.push(node);
      return Visit.Descend;
    });
    return result;
  }
}

export function buildTree<E>(
  rootElement: Maybe<E>,
  children: ChildrenProducer<E>,
  options?: BuildOptions,
): Tree<E> {
  return Tree.build(rootElement, children, options);
}
