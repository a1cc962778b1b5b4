import { isCDATA, isComment, isDirective, isDocument, isTag, isText } from 'domhandler';
import type { AnyNode } from 'domhandler';
import { allOf, criteria } from '../search/criteria.js';
import type { Predicate, SearchCriteria } from '../search/criteria.js';
import { textContent } from './document.js';

export type HtmlNodeKind = 'document' | 'element' | 'text' | 'comment' | 'directive' | 'cdata';

const KIND_TESTS: Record<HtmlNodeKind, Predicate<AnyNode>> = {
  document: isDocument,
  element: isTag,
  text: isText,
  comment: isComment,
  directive: isDirective,
  cdata: isCDATA,
};

const KINDS: readonly HtmlNodeKind[] = ['document', 'element', 'text', 'comment', 'directive', 'cdata'];

export function kindOf(node: AnyNode): HtmlNodeKind | undefined {
  return KINDS.find((kind) => KIND_TESTS[kind](node));
}

/**
 * Fluent builder for criteria over htmlparser2 nodes. Every condition added
 * narrows the match; tag and attribute conditions only match elements.
 *
 * @example
 * htmlCriteria('element').tag('a').attribute('href').build()
 */
export class HtmlCriteriaBuilder {
  private readonly tests: Predicate<AnyNode>[] = [];

  constructor(kind?: HtmlNodeKind) {
    if (kind) this.tests.push(KIND_TESTS[kind]);
  }

  /** Element tag name, case-insensitive. */
  tag(name: string): this {
    const wanted = name.toLowerCase();
    this.tests.push((node) => isTag(node) && node.name.toLowerCase() === wanted);
    return this;
  }

  /** Attribute present, or present with exactly `value`. */
  attribute(name: string, value?: string): this {
    this.tests.push((node) => {
      if (!isTag(node) || !Object.hasOwn(node.attribs, name)) return false;
      return value === undefined || node.attribs[name] === value;
    });
    return this;
  }

  hasClass(name: string): this {
    this.tests.push((node) => {
      if (!isTag(node) || name === '') return false;
      const classes = (node.attribs['class'] ?? '').split(/\s+/).filter(Boolean);
      return classes.includes(name);
    });
    return this;
  }

  /** Text of the node (descendant text for elements): substring or predicate. */
  text(match: string | Predicate<string>): this {
    const test = typeof match === 'string' ? (t: string) => t.includes(match) : match;
    this.tests.push((node) => test(textContent(node)));
    return this;
  }

  build(): SearchCriteria<AnyNode> {
    return allOf(...this.tests.map((t) => criteria(t)));
  }
}

export function htmlCriteria(kind?: HtmlNodeKind): HtmlCriteriaBuilder {
  return new HtmlCriteriaBuilder(kind);
}

export const IS_TEXT_NODE: SearchCriteria<AnyNode> = htmlCriteria('text').build();
