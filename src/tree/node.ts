import type { Maybe } from './types.js';

export class TreeNode<E> {
  private readonly kids: TreeNode<E>[] = [];

  private constructor(
    public readonly element: E | null,
    public readonly parent: TreeNode<E> | undefined,
    public readonly depth: number,
  ) {}

  /** Wrap a raw element as a detached root node. `null` and `undefined` become the empty state. */
  static wrap<E>(element: Maybe<E>): TreeNode<E> {
    return new TreeNode<E>(element ?? null, undefined, 0);
  }

  get children(): readonly TreeNode<E>[] {
    return this.kids;
  }

  hasElement(): this is TreeNode<E> & { readonly element: E } {
    return this.element !== null;
  }

  isRoot(): boolean {
    return this.parent === undefined;
  }

  isLeaf(): boolean {
    return this.kids.length === 0;
  }

  /** Ancestors from the parent up to the root. */
  ancestors(): TreeNode<E>[] {
    const result: TreeNode<E>[] = [];
    for (let n = this.parent; n; n = n.parent) result.push(n);
    return result;
  }

  /** @internal Used by the builder only; trees are immutable once built. */
  attach(element: Maybe<E>): TreeNode<E> {
    const child = new TreeNode<E>(element ?? null, this, this.depth + 1);
    this.kids.push(child);
    return child;
  }

  /** @internal */
  freeze(): void {
    Object.freeze(this.kids);
  }
}
