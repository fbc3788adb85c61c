import { z } from 'zod';
import {
  FILTER_ACTIONS,
  MATCH_MODES,
  MAX_EXPRESSION_LENGTH,
  MAX_RULES_PER_FILTER,
  type FilterDraft,
  type FilterRule,
} from '../filters/filter.types.js';

/**
 * Validate regex pattern
 */
export function validateRegexPattern(pattern: string): { valid: boolean; error?: string } {
  try {
    new RegExp(pattern);
    return { valid: true };
  } catch (error) {
    return {
      valid: false,
      error: `Invalid regex pattern: ${error instanceof Error ? error.message : 'Unknown error'}`,
    };
  }
}

/**
 * Sanitize filter expression by removing control characters
 */
export function sanitizeFilterPattern(pattern: string): string {
  return pattern
    .trim()
    .replace(/[\x00-\x1f\x7f-\x9f]/g, '') // Remove control characters
    .slice(0, MAX_EXPRESSION_LENGTH);
}

export const rulePositionSchema = z.union([z.literal('any'), z.number().int().min(0)]);

/**
 * Schema for a single rule. The expression is sanitised first and then
 * checked against what its mode needs.
 */
export const filterRuleSchema = z
  .object({
    position: rulePositionSchema,
    mode: z.enum(MATCH_MODES, {
      errorMap: () => ({ message: `Match mode must be one of: ${MATCH_MODES.join(', ')}` }),
    }),
    expression: z
      .string()
      .max(MAX_EXPRESSION_LENGTH, `Expression must be less than ${MAX_EXPRESSION_LENGTH} characters`)
      .optional()
      .default(''),
  })
  .transform(
    (rule): FilterRule => ({
      position: rule.position,
      mode: rule.mode,
      expression: rule.mode === 'any' ? '' : sanitizeFilterPattern(rule.expression),
    })
  )
  .superRefine((rule, ctx) => {
    if (rule.mode === 'any') {
      return;
    }

    if (rule.expression.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expression is required for mode "${rule.mode}"`,
      });
      return;
    }

    if (rule.mode === 'regex' || rule.mode === 'regex_not') {
      const regexValidation = validateRegexPattern(rule.expression);
      if (!regexValidation.valid) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: regexValidation.error || 'Invalid regex pattern',
        });
      }
    }
  });

/**
 * Schema for validating filter creation and replacement input
 */
export const filterDraftSchema = z.object({
  name: z
    .string()
    .max(200, 'Filter name must be less than 200 characters')
    .transform((str) => str.trim())
    .optional(),
  rules: z
    .array(filterRuleSchema)
    .min(1, 'A filter needs at least one rule')
    .max(MAX_RULES_PER_FILTER, `A filter may hold at most ${MAX_RULES_PER_FILTER} rules`),
  action: z.enum(FILTER_ACTIONS, {
    errorMap: () => ({ message: 'Action must be one of "to_download", "to_skip" or "deleted"' }),
  }),
  enabled: z.boolean().optional(),
});

/**
 * Schema for validating filter move input
 */
export const moveFilterSchema = z.object({
  direction: z.enum(['up', 'down']),
});

/**
 * Schema for validating filter enable/disable input
 */
export const filterEnabledSchema = z.object({
  enabled: z.boolean(),
});

/**
 * Schema for validating filter reorder input
 */
export const reorderFilterSchema = z.object({
  index: z.number().int().min(0),
});

export type ValidatedFilterDraft = z.infer<typeof filterDraftSchema>;

/**
 * Validates and sanitises a draft; returns the list of messages on failure.
 */
export function parseFilterDraft(
  input: unknown
): { success: true; draft: FilterDraft } | { success: false; errors: string[] } {
  const result = filterDraftSchema.safeParse(input);
  if (!result.success) {
    return {
      success: false,
      errors: result.error.errors.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message)),
    };
  }

  return { success: true, draft: result.data };
}
