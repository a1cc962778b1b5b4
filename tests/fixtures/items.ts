import type { ChildrenProducer } from '../../src/tree/types.js';

/** Minimal hierarchical record used as the raw element in tests. */
export interface Item {
  name: string;
  children?: Item[];
}

export function item(name: string, ...children: Item[]): Item {
  return children.length > 0 ? { name, children } : { name };
}

export const itemChildren: ChildrenProducer<Item> = (i) => i.children ?? [];

export function names(items: readonly Item[]): string[] {
  return items.map((i) => i.name);
}

export const startsWith = (prefix: string) => (i: Item): boolean => i.name.startsWith(prefix);
export const endsWith = (suffix: string) => (i: Item): boolean => i.name.endsWith(suffix);
export const named = (name: string) => (i: Item): boolean => i.name === name;

/** root -> {a, b}, a -> {a1, a2}, b -> {} */
export function sampleTree(): Item {
  return item('root', item('a', item('a1'), item('a2')), item('b'));
}
