import type { AnyNode } from 'domhandler';
import { Navigator } from '../navigator.js';
import type { NavigatorOptions } from '../navigator.js';
import { htmlChildren } from './document.js';

export type HtmlNavigatorOptions = Omit<NavigatorOptions<AnyNode>, 'children'>;

/** A Navigator over htmlparser2 documents. */
export function createHtmlNavigator(options: HtmlNavigatorOptions = {}): Navigator<AnyNode> {
  return new Navigator<AnyNode>({ ...options, children: htmlChildren });
}
