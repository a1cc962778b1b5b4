import { Tree } from '../tree/tree.js';
import type { BuildOptions } from '../tree/types.js';

/** Weight of the edge from `from` to `to`, or undefined when there is none. */
export type WeightFunc<T> = (from: T, to: T) => number | undefined;

export type Equals<T> = (a: T, b: T) => boolean;

/**
 * Directed graph stored as a weighted adjacency matrix. Offers lookup and
 * neighbour listing only; there are no path or connectivity algorithms.
 */
export class WeightedGraph<T> {
  private readonly verts: readonly T[];
  private readonly matrix: (number | undefined)[][];

  constructor(
    vertices: readonly T[],
    weight: WeightFunc<T>,
    private readonly equals: Equals<T> = Object.is,
  ) {
    // Own copy: the matrix rows are indexed by this array.
    this.verts = [...vertices];
    this.matrix = this.verts.map((from) => this.verts.map((to) => weight(from, to)));
  }

  vertices(): readonly T[] {
    return this.verts;
  }

  edges(): readonly (readonly (number | undefined)[])[] {
    return this.matrix;
  }

  /** Index of the first vertex equal to `vertex`, or -1. */
  indexOf(vertex: T): number {
    return this.verts.findIndex((v) => this.equals(v, vertex));
  }

  /** Vertices reachable through one outgoing edge, in vertex order. */
  adjacentOf(from: T): T[] {
    const i = this.indexOf(from);
    if (i === -1) return [];
    return this.verts.filter((_, j) => this.matrix[i][j] !== undefined);
  }

  getEdge(from: T, to: T): number | undefined {
    const i = this.indexOf(from);
    const j = this.indexOf(to);
    if (i === -1 || j === -1) return undefined;
    return this.matrix[i][j];
  }

  /**
   * Unfold the graph into a tree rooted at `root`, following outgoing edges.
   * A graph with a cycle reachable from `root` never stops expanding: bound
   * it with `maxNodes`.
   */
  makeTree(root: T, options?: BuildOptions): Tree<T> {
    return Tree.build(root, (v) => this.adjacentOf(v), options);
  }
}
