import { MissingCriteriaError } from '../errors.js';
import type { Maybe } from '../tree/types.js';

export type Predicate<E> = (element: E) => boolean;

export interface WildcardCriteria {
  readonly kind: 'wildcard';
}

export interface PredicateCriteria<E> {
  readonly kind: 'predicate';
  readonly test: Predicate<E>;
}

/** Matches everything (`wildcard`) or what `test` accepts. */
export type SearchCriteria<E> = WildcardCriteria | PredicateCriteria<E>;

/** Anything the search operations accept in place of a criteria value. */
export type CriteriaInput<E> = SearchCriteria<E> | Predicate<E>;

export const WILDCARD: WildcardCriteria = { kind: 'wildcard' };

const NOTHING: PredicateCriteria<unknown> = { kind: 'predicate', test: () => false };

export function wildcard(): WildcardCriteria {
  return WILDCARD;
}

export function criteria<E>(test: Predicate<E>): PredicateCriteria<E> {
  return { kind: 'predicate', test };
}

export function isWildcard<E>(c: SearchCriteria<E>): c is WildcardCriteria {
  return c.kind === 'wildcard';
}

/**
 * Normalize a criteria value or bare predicate. Absent input is a contract
 * violation, not a wildcard: callers that mean "everything" pass `wildcard()`.
 */
export function toCriteria<E>(input: Maybe<CriteriaInput<E>>, operation = 'search'): SearchCriteria<E> {
  if (input === null || input === undefined) throw new MissingCriteriaError(operation);
  return typeof input === 'function' ? criteria(input) : input;
}

export function matches<E>(c: SearchCriteria<E>, element: E): boolean {
  return c.kind === 'wildcard' || c.test(element);
}

/** Drop absent entries, keeping order. */
export function compactCriteria<E>(list: readonly Maybe<CriteriaInput<E>>[]): SearchCriteria<E>[] {
  const result: SearchCriteria<E>[] = [];
  for (const entry of list) {
    if (entry !== null && entry !== undefined) result.push(toCriteria(entry));
  }
  return result;
}

export function allOf<E>(...list: CriteriaInput<E>[]): SearchCriteria<E> {
  const tests = list.map((c) => toCriteria(c)).filter((c): c is PredicateCriteria<E> => !isWildcard(c));
  if (tests.length === 0) return WILDCARD;
  if (tests.length === 1) return tests[0];
  return criteria((el) => tests.every((c) => c.test(el)));
}

export function anyOf<E>(...list: CriteriaInput<E>[]): SearchCriteria<E> {
  const all = list.map((c) => toCriteria(c));
  if (all.length === 0) return NOTHING;
  if (all.some(isWildcard)) return WILDCARD;
  return criteria((el) => all.some((c) => matches(c, el)));
}

export function not<E>(input: CriteriaInput<E>): SearchCriteria<E> {
  const c = toCriteria(input);
  if (isWildcard(c)) return NOTHING;
  return criteria((el) => !c.test(el));
}
