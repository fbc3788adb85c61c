import type { FilterRule, MatchMode } from './filter.types.js';

type PositiveMode = Exclude<MatchMode, 'any' | 'contains_not' | 'starts_with_not' | 'ends_with_not' | 'regex_not'>;

const regexCache = new Map<string, RegExp | null>();
const wildcardCache = new Map<string, RegExp>();

function compileRegex(expression: string): RegExp | null {
  const cached = regexCache.get(expression);
  if (cached !== undefined) {
    return cached;
  }

  let compiled: RegExp | null;
  try {
    compiled = new RegExp(expression);
  } catch {
    // Stored filters are validated on entry; a bad pattern simply never matches
    compiled = null;
  }
  regexCache.set(expression, compiled);
  return compiled;
}

/**
 * `*` matches any run of characters, `?` exactly one; everything else is literal.
 */
export function wildcardToRegExp(pattern: string): RegExp {
  const cached = wildcardCache.get(pattern);
  if (cached) {
    return cached;
  }

  const source = pattern
    .split('')
    .map((char) => {
      if (char === '*') return '.*';
      if (char === '?') return '.';
      return char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');

  const compiled = new RegExp(`^${source}$`, 's');
  wildcardCache.set(pattern, compiled);
  return compiled;
}

function positiveHolds(mode: PositiveMode, expression: string, token: string): boolean {
  switch (mode) {
    case 'exact':
      return token === expression;
    case 'case_insensitive':
      return token.toLowerCase() === expression.toLowerCase();
    case 'expression':
      return wildcardToRegExp(expression).test(token);
    case 'regex':
      return compileRegex(expression)?.test(token) ?? false;
    case 'starts_with':
      return token.startsWith(expression);
    case 'ends_with':
      return token.endsWith(expression);
    case 'contains':
      return token.includes(expression);
    default: {
      const unreachable: never = mode;
      throw new Error(`Unhandled match mode: ${String(unreachable)}`);
    }
  }
}

type RuleShape = { kind: 'always' } | { kind: 'positive' | 'negated'; mode: PositiveMode };

function shapeOf(mode: MatchMode): RuleShape {
  switch (mode) {
    case 'any':
      return { kind: 'always' };
    case 'contains_not':
      return { kind: 'negated', mode: 'contains' };
    case 'starts_with_not':
      return { kind: 'negated', mode: 'starts_with' };
    case 'ends_with_not':
      return { kind: 'negated', mode: 'ends_with' };
    case 'regex_not':
      return { kind: 'negated', mode: 'regex' };
    case 'exact':
    case 'case_insensitive':
    case 'expression':
    case 'regex':
    case 'starts_with':
    case 'ends_with':
    case 'contains':
      return { kind: 'positive', mode };
    default: {
      const unreachable: never = mode;
      throw new Error(`Unhandled match mode: ${String(unreachable)}`);
    }
  }
}

/**
 * Evaluates one rule against a token sequence.
 *
 * A positional rule reads only the token at its position; when there is no
 * such token only `any` holds. An any-position rule holds when its predicate
 * holds for some token, and a negated any-position rule holds when the
 * positive predicate holds for none.
 */
export function ruleHolds(rule: FilterRule, tokens: readonly string[]): boolean {
  const shape = shapeOf(rule.mode);
  if (shape.kind === 'always') {
    return true;
  }

  const test = (token: string): boolean => positiveHolds(shape.mode, rule.expression, token);

  if (rule.position === 'any') {
    const found = tokens.some(test);
    return shape.kind === 'positive' ? found : !found;
  }

  const token = tokens[rule.position];
  if (token === undefined) {
    return false;
  }

  return shape.kind === 'positive' ? test(token) : !test(token);
}

/**
 * A filter holds when it has at least one rule and every rule holds.
 */
export function rulesHold(rules: readonly FilterRule[], tokens: readonly string[]): boolean {
  return rules.length > 0 && rules.every((rule) => ruleHolds(rule, tokens));
}
