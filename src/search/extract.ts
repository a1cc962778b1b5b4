import { BuildFailureError, NilParameterError, TraversalFailureError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { Tree } from '../tree/tree.js';
import type { BuildOptions, ChildrenProducer, Maybe } from '../tree/types.js';
import { compactCriteria } from './criteria.js';
import type { CriteriaInput } from './criteria.js';
import { collectAndPrune } from './visitors.js';

export interface ExtractOptions extends BuildOptions {
  logger?: Logger;
}

/**
 * Cascading search: each stage runs collect-and-prune over every tree of the
 * working set, then re-roots a fresh tree at each match for the next stage.
 *
 * Absent criteria are dropped; with none left the result is empty. A stage
 * that matches nothing ends the search with an empty result and later stages
 * are never evaluated. Failures carry the 1-based stage and ordinal.
 *
 * @returns the roots of the trees that survived the last stage, in order
 */
export function extractNodes<E>(
  rootElement: Maybe<E>,
  children: ChildrenProducer<E>,
  criteriaList: readonly Maybe<CriteriaInput<E>>[],
  options: ExtractOptions = {},
): E[] {
  const { logger, ...build } = options;
  const stages = compactCriteria(criteriaList);
  if (stages.length === 0) {
    logger?.debug('No criteria given, nothing to extract');
    return [];
  }

  let working: Tree<E>[] = [Tree.build(rootElement, children, build)];

  for (let s = 0; s < stages.length; s++) {
    const stage = s + 1;
    const matched: E[] = [];

    for (let t = 0; t < working.length; t++) {
      try {
        for (const element of collectAndPrune(working[t], stages[s])) matched.push(element);
      } catch (e) {
        const cause = e instanceof TraversalFailureError ? e.cause : e;
        throw new TraversalFailureError(cause, { stage, ordinal: t + 1 });
      }
    }

    if (matched.length === 0) {
      logger?.debug('Stage matched nothing, search ends', { stage, trees: working.length });
      return [];
    }

    working = matched.map((element, i) => {
      try {
        return Tree.build(element, children, build);
      } catch (e) {
        const cause = e instanceof BuildFailureError ? e.cause : e;
        throw new BuildFailureError(cause, { stage, ordinal: i + 1 });
      }
    });

    logger?.debug('Stage complete', { stage, of: stages.length, matches: matched.length });
  }

  return working.map((tree) => {
    const root = tree.root();
    if (!root.hasElement()) throw new NilParameterError('root.element');
    return root.element;
  });
}
