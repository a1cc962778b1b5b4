import { resolveConfig } from './config/loader.js';
import type { NavigatorConfig, PartialNavigatorConfig } from './config/types.js';
import { Logger } from './logging/logger.js';
import { compactCriteria } from './search/criteria.js';
import type { CriteriaInput } from './search/criteria.js';
import { extractNodes } from './search/extract.js';
import { collectAndPrune, directChildrenMatching, firstMatch } from './search/visitors.js';
import { Tree } from './tree/tree.js';
import type { ChildrenProducer, Maybe } from './tree/types.js';

export interface NavigatorOptions<E> {
  children: ChildrenProducer<E>;
  logger?: Logger;
  /** A loaded config, or overrides merged over the defaults. */
  config?: NavigatorConfig | PartialNavigatorConfig;
}

/**
 * Binds a children producer, a logger and build limits once, so callers
 * search a hierarchy without threading them through every call.
 */
export class Navigator<E> {
  readonly config: NavigatorConfig;
  private readonly children: ChildrenProducer<E>;
  private readonly logger: Logger;

  constructor(options: NavigatorOptions<E>) {
    this.children = options.children;
    this.config = resolveConfig(options.config);
    this.logger = (options.logger ?? new Logger({ level: this.config.logging.level })).child('navigator');
  }

  buildTree(root: Maybe<E>): Tree<E> {
    const tree = Tree.build(root, this.children, this.config.build);
    this.logger.debug('Tree built', { tree: tree.id, nodes: tree.size });
    return tree;
  }

  /** Shallowest matches along every branch, breadth-first. */
  matchNodes(tree: Tree<E>, criteria: Maybe<CriteriaInput<E>>): E[] {
    const found = collectAndPrune(tree, criteria);
    this.logger.debug('Collected matches', { tree: tree.id, matches: found.length });
    return found;
  }

  findFirst(tree: Tree<E>, criteria: Maybe<CriteriaInput<E>>): E | undefined {
    return firstMatch(tree, criteria);
  }

  directChildren(tree: Tree<E>, criteria: Maybe<CriteriaInput<E>>): E[] {
    return directChildrenMatching(tree, criteria);
  }

  extractNodes(root: Maybe<E>, ...criteria: Maybe<CriteriaInput<E>>[]): E[] {
    const result = extractNodes(root, this.children, criteria, {
      ...this.config.build,
      logger: this.logger.child('extract'),
    });
    const stages = compactCriteria(criteria).length;
    if (result.length === 0 && stages > 0) {
      this.logger.warn('Cascading search matched nothing', { stages });
    }
    return result;
  }
}
