export const MATCH_MODES = [
  'exact',
  'case_insensitive',
  'any',
  'expression',
  'regex',
  'starts_with',
  'ends_with',
  'contains',
  'contains_not',
  'starts_with_not',
  'ends_with_not',
  'regex_not',
] as const;

export type MatchMode = (typeof MATCH_MODES)[number];

export const FILTER_ACTIONS = ['to_download', 'to_skip', 'deleted'] as const;

export type FilterAction = (typeof FILTER_ACTIONS)[number];

export type RulePosition = number | 'any';

export interface FilterRule {
  position: RulePosition;
  mode: MatchMode;
  expression: string;
}

export interface LinkFilter {
  numericId: number;
  name: string;
  rules: FilterRule[];
  action: FilterAction;
  priorityRank: number;
  /** Disabled filters are kept in place but never match. */
  enabled: boolean;
}

/**
 * Caller-supplied filter content before validation. Name is optional and
 * replaced by a placeholder when blank; `enabled` defaults to true on add
 * and to the current value on update.
 */
export interface FilterDraft {
  name?: string;
  rules: FilterRule[];
  action: FilterAction;
  enabled?: boolean;
}

export interface FilterMatch {
  filter: LinkFilter | null;
  evaluated: number;
}

export type MoveDirection = 'up' | 'down';

export const MAX_EXPRESSION_LENGTH = 500;
export const MAX_RULES_PER_FILTER = 64;

export function placeholderName(numericId: number): string {
  return `Unnamed_${numericId}`;
}
