// Tree
export { Tree, buildTree } from './tree/tree.js';
export { TreeNode } from './tree/node.js';
export { Visit } from './tree/types.js';
export type { ChildrenProducer, Visitor, BuildOptions, Maybe } from './tree/types.js';

// Search
export {
  WILDCARD, wildcard, criteria, isWildcard, toCriteria, matches,
  compactCriteria, allOf, anyOf, not,
} from './search/criteria.js';
export type {
  Predicate, SearchCriteria, CriteriaInput, WildcardCriteria, PredicateCriteria,
} from './search/criteria.js';
export { collectAndPrune, firstMatch, directChildrenMatching } from './search/visitors.js';
export { extractNodes } from './search/extract.js';
export type { ExtractOptions } from './search/extract.js';
export { Navigator } from './navigator.js';
export type { NavigatorOptions } from './navigator.js';

// HTML
export { parseHtml, htmlChildren, getDirectChildren, textContent } from './html/document.js';
export { HtmlCriteriaBuilder, htmlCriteria, kindOf, IS_TEXT_NODE } from './html/criteria.js';
export type { HtmlNodeKind } from './html/criteria.js';
export { createHtmlNavigator } from './html/navigator.js';
export type { HtmlNavigatorOptions } from './html/navigator.js';

// Graph
export { WeightedGraph } from './graph/weighted-graph.js';
export type { WeightFunc, Equals } from './graph/weighted-graph.js';

// Config
export { ConfigLoader, resolveConfig } from './config/loader.js';
export { DEFAULT_CONFIG } from './config/types.js';
export type { NavigatorConfig, PartialNavigatorConfig } from './config/types.js';

// Logging
export { Logger, stderrTransport, formatEntry, LOG_LEVELS } from './logging/logger.js';
export type {
  LogLevel, EntryLevel, LogData, LogEntry, LoggerOptions, Transport,
} from './logging/logger.js';

// Errors
export {
  NavigatorError, NilParameterError, BuildFailureError, TraversalFailureError,
  NodeLimitError, MissingCriteriaError, ConfigError,
} from './errors.js';
export type { StagePosition } from './errors.js';
