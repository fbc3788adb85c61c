export { FilterSet } from './filter-set.js';
export { ruleHolds, rulesHold, wildcardToRegExp } from './rule-matcher.js';
export type {
  FilterAction,
  FilterDraft,
  FilterMatch,
  FilterRule,
  LinkFilter,
  MatchMode,
  MoveDirection,
  RulePosition,
} from './filter.types.js';
export {
  FILTER_ACTIONS,
  MATCH_MODES,
  MAX_EXPRESSION_LENGTH,
  MAX_RULES_PER_FILTER,
  placeholderName,
} from './filter.types.js';
