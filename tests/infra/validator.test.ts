import { describe, it, expect } from 'vitest';
import { getPath, isPlainObject, validate } from '../../src/infra/validator.js';

describe('Validator', () => {
  describe('paths', () => {
    it('reads nested values', () => {
      expect(getPath({ build: { maxNodes: 3 } }, 'build.maxNodes')).toBe(3);
    });

    it('returns undefined through missing or non-object parents', () => {
      expect(getPath({}, 'build.maxNodes')).toBeUndefined();
      expect(getPath({ build: 7 }, 'build.maxNodes')).toBeUndefined();
    });

    it('recognizes plain objects', () => {
      expect(isPlainObject({})).toBe(true);
      expect(isPlainObject([])).toBe(false);
      expect(isPlainObject(null)).toBe(false);
    });
  });

  describe('number rules', () => {
    it('requires number fields', () => {
      expect(validate({}, { 'build.maxNodes': { type: 'number' } })).toEqual(['build.maxNodes is required']);
    });

    it('allows optional numbers', () => {
      expect(validate({}, { 'build.maxNodes': { type: 'number', required: false } })).toEqual([]);
    });

    it('rejects non-numbers', () => {
      expect(validate({ n: '3' }, { n: { type: 'number' } })).toEqual(['n must be a number']);
      expect(validate({ n: Number.NaN }, { n: { type: 'number' } })).toEqual(['n must be a number']);
    });

    it('checks bounds and integers', () => {
      const rule = { type: 'number', min: 1, max: 10, integer: true } as const;
      expect(validate({ n: 0 }, { n: rule })).toEqual(['n must be >= 1']);
      expect(validate({ n: 11 }, { n: rule })).toEqual(['n must be <= 10']);
      expect(validate({ n: 1.5 }, { n: rule })).toEqual(['n must be an integer']);
      expect(validate({ n: 5 }, { n: rule })).toEqual([]);
    });
  });

  describe('enum rules', () => {
    it('accepts listed values only', () => {
      const schema = { 'logging.level': { type: 'enum', values: ['info', 'warn'] } } as const;
      expect(validate({ logging: { level: 'info' } }, schema)).toEqual([]);
      expect(validate({ logging: { level: 3 } }, schema)).toEqual([
        'logging.level must be one of: info, warn',
      ]);
    });
  });
});
