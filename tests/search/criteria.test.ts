import { describe, it, expect } from 'vitest';
import {
  WILDCARD,
  allOf,
  anyOf,
  compactCriteria,
  criteria,
  isWildcard,
  matches,
  not,
  toCriteria,
  wildcard,
} from '../../src/search/criteria.js';
import { MissingCriteriaError } from '../../src/errors.js';

const even = (n: number): boolean => n % 2 === 0;
const positive = (n: number): boolean => n > 0;

describe('SearchCriteria', () => {
  it('wildcard matches everything', () => {
    expect(matches(wildcard(), 'anything')).toBe(true);
    expect(matches(WILDCARD, null)).toBe(true);
    expect(isWildcard(wildcard())).toBe(true);
  });

  it('predicate criteria delegate to the test', () => {
    const c = criteria(even);
    expect(isWildcard(c)).toBe(false);
    expect(matches(c, 4)).toBe(true);
    expect(matches(c, 3)).toBe(false);
  });

  describe('toCriteria', () => {
    it('wraps a bare predicate', () => {
      const c = toCriteria(even);
      expect(c.kind).toBe('predicate');
      expect(matches(c, 2)).toBe(true);
    });

    it('returns criteria values as they are', () => {
      const c = criteria(even);
      expect(toCriteria(c)).toBe(c);
    });

    it('rejects absent criteria', () => {
      expect(() => toCriteria(undefined, 'lookup')).toThrow(MissingCriteriaError);
      expect(() => toCriteria(null, 'lookup')).toThrow(
        'lookup requires search criteria; pass wildcard() to match everything',
      );
    });
  });

  it('compactCriteria drops absent entries and keeps order', () => {
    const list = compactCriteria<number>([null, even, undefined, wildcard(), positive]);
    expect(list).toHaveLength(3);
    expect(list.map((c) => c.kind)).toEqual(['predicate', 'wildcard', 'predicate']);
    expect(matches(list[0], 2)).toBe(true);
    expect(matches(list[2], -1)).toBe(false);
  });

  describe('composition', () => {
    it('allOf requires every criteria', () => {
      const c = allOf(even, positive);
      expect(matches(c, 4)).toBe(true);
      expect(matches(c, -4)).toBe(false);
      expect(matches(c, 3)).toBe(false);
    });

    it('allOf of nothing, or of wildcards only, is the wildcard', () => {
      expect(isWildcard(allOf())).toBe(true);
      expect(isWildcard(allOf(wildcard(), wildcard()))).toBe(true);
    });

    it('allOf of a single predicate returns it', () => {
      const c = criteria(even);
      expect(allOf(c, wildcard())).toBe(c);
    });

    it('anyOf requires one criteria', () => {
      const c = anyOf(even, positive);
      expect(matches(c, -4)).toBe(true);
      expect(matches(c, 3)).toBe(true);
      expect(matches(c, -3)).toBe(false);
    });

    it('anyOf of nothing matches nothing', () => {
      expect(matches(anyOf<number>(), 1)).toBe(false);
    });

    it('anyOf with a wildcard is the wildcard', () => {
      expect(isWildcard(anyOf(even, wildcard()))).toBe(true);
    });

    it('not inverts', () => {
      expect(matches(not(even), 3)).toBe(true);
      expect(matches(not(even), 2)).toBe(false);
      expect(matches(not<number>(wildcard()), 2)).toBe(false);
    });
  });
});
