import { describe, expect, it } from 'vitest';
import type { FilterRule } from './filter.types.js';
import { ruleHolds, rulesHold, wildcardToRegExp } from './rule-matcher.js';

const tokens = ['img', 'example', 'com', 'gallery', '42'];

function rule(partial: Partial<FilterRule> & Pick<FilterRule, 'mode'>): FilterRule {
  return { position: 0, expression: '', ...partial };
}

describe('ruleHolds', () => {
  it('should compare the token at a position', () => {
    expect(ruleHolds(rule({ position: 1, mode: 'exact', expression: 'example' }), tokens)).toBe(true);
    expect(ruleHolds(rule({ position: 1, mode: 'exact', expression: 'Example' }), tokens)).toBe(false);
    expect(ruleHolds(rule({ position: 1, mode: 'case_insensitive', expression: 'EXAMPLE' }), tokens)).toBe(true);
  });

  it('should apply substring modes', () => {
    expect(ruleHolds(rule({ position: 3, mode: 'starts_with', expression: 'gal' }), tokens)).toBe(true);
    expect(ruleHolds(rule({ position: 3, mode: 'ends_with', expression: 'ery' }), tokens)).toBe(true);
    expect(ruleHolds(rule({ position: 3, mode: 'contains', expression: 'll' }), tokens)).toBe(true);
    expect(ruleHolds(rule({ position: 3, mode: 'contains_not', expression: 'll' }), tokens)).toBe(false);
    expect(ruleHolds(rule({ position: 3, mode: 'starts_with_not', expression: 'x' }), tokens)).toBe(true);
    expect(ruleHolds(rule({ position: 3, mode: 'ends_with_not', expression: 'ery' }), tokens)).toBe(false);
  });

  it('should search with regex modes', () => {
    expect(ruleHolds(rule({ position: 4, mode: 'regex', expression: '\\d' }), tokens)).toBe(true);
    expect(ruleHolds(rule({ position: 4, mode: 'regex_not', expression: '^\\d+$' }), tokens)).toBe(false);
    expect(ruleHolds(rule({ position: 3, mode: 'regex_not', expression: '^\\d+$' }), tokens)).toBe(true);
  });

  it('should match wildcard expressions against the whole token', () => {
    expect(ruleHolds(rule({ position: 3, mode: 'expression', expression: 'gal*' }), tokens)).toBe(true);
    expect(ruleHolds(rule({ position: 3, mode: 'expression', expression: 'gal' }), tokens)).toBe(false);
    expect(ruleHolds(rule({ position: 4, mode: 'expression', expression: '?2' }), tokens)).toBe(true);
  });

  it('should only let any hold when the position is missing', () => {
    expect(ruleHolds(rule({ position: 9, mode: 'any' }), tokens)).toBe(true);
    expect(ruleHolds(rule({ position: 9, mode: 'contains_not', expression: 'x' }), tokens)).toBe(false);
    expect(ruleHolds(rule({ position: 9, mode: 'exact', expression: 'img' }), tokens)).toBe(false);
  });

  it('should look at every token for any-position rules', () => {
    expect(ruleHolds(rule({ position: 'any', mode: 'exact', expression: 'gallery' }), tokens)).toBe(true);
    expect(ruleHolds(rule({ position: 'any', mode: 'contains_not', expression: 'xyz' }), tokens)).toBe(true);
    expect(ruleHolds(rule({ position: 'any', mode: 'contains_not', expression: 'gall' }), tokens)).toBe(false);
  });

  it('should fail a negated any-position rule when one token matches and the rest do not', () => {
    expect(ruleHolds(rule({ position: 'any', mode: 'ends_with_not', expression: 'com' }), tokens)).toBe(false);
    expect(ruleHolds(rule({ position: 'any', mode: 'regex_not', expression: '^\\d+$' }), tokens)).toBe(false);
    expect(ruleHolds(rule({ position: 'any', mode: 'starts_with_not', expression: 'zz' }), tokens)).toBe(true);
  });
});

describe('rulesHold', () => {
  it('should require at least one rule', () => {
    expect(rulesHold([], tokens)).toBe(false);
  });

  it('should require every rule to hold', () => {
    const rules: FilterRule[] = [
      { position: 1, mode: 'exact', expression: 'example' },
      { position: 4, mode: 'regex', expression: '^[a-z]+$' },
    ];

    expect(rulesHold(rules, tokens)).toBe(false);
    expect(rulesHold(rules.slice(0, 1), tokens)).toBe(true);
  });
});

describe('wildcardToRegExp', () => {
  it('should treat regex characters literally', () => {
    expect(wildcardToRegExp('a.b').test('a.b')).toBe(true);
    expect(wildcardToRegExp('a.b').test('axb')).toBe(false);
    expect(wildcardToRegExp('page=*').test('page=2&sort=new')).toBe(true);
  });
});
