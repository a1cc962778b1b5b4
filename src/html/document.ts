import { parseDocument } from 'htmlparser2';
import { hasChildren, isText } from 'domhandler';
import type { AnyNode, ChildNode, Document } from 'domhandler';
import type { ChildrenProducer, Maybe } from '../tree/types.js';

export function parseHtml(source: string): Document {
  return parseDocument(source);
}

/** Children producer over the htmlparser2 DOM. Leaves yield nothing. */
export const htmlChildren: ChildrenProducer<AnyNode> = (node) =>
  hasChildren(node) ? node.children : [];

export function getDirectChildren(node: Maybe<AnyNode>): ChildNode[] {
  if (!node || !hasChildren(node)) return [];
  return [...node.children];
}

/** Concatenated text of a node and its descendants. */
export function textContent(node: AnyNode): string {
  if (isText(node)) return node.data;
  if (!hasChildren(node)) return '';
  return node.children.map(textContent).join('');
}
